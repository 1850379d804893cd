/**
 * Connection parameters resolved from a PostgreSQL connection URL.
 * Built once per run and never persisted.
 */
export interface ConnectionSpec {
  readonly host: string;
  readonly port: number;
  readonly database: string;

  /** Undefined when neither the URL nor the fallback names a user; pg_dump then picks its default */
  readonly user?: string;

  readonly password: string;
}
