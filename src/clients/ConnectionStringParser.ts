import { ConnectionSpec } from '../interfaces/ConnectionSpec';
import { BackupConfig } from '../interfaces/BackupConfig';
import { MalformedUrlError, MissingCredentialError } from '../errors';

export const DEFAULT_POSTGRES_PORT = 5432;

/**
 * Parse a PostgreSQL connection URL into connection parameters.
 *
 * The password is taken from the URL user-info when present, otherwise from the first
 * `password` query parameter. The first source found wins entirely; the two are never
 * merged. The query value is form-decoded, so `+` reads as a space there; a literal `+`
 * in a query password must be written `%2B`. The user-info password keeps `+` as is.
 * When neither the URL nor `fallbackUser` names a user the result carries no user
 * and pg_dump falls back to its own default.
 *
 * @throws MalformedUrlError when the URL has no scheme, host or database path
 * @throws MissingCredentialError when no password can be resolved
 */
export function parseConnectionString(url: string, fallbackUser?: string): ConnectionSpec {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    // The URL parser echoes its input, which may hold a password
    throw new MalformedUrlError('Database URL could not be parsed: expected scheme://host/database');
  }

  const host = stripIpv6Brackets(parsed.hostname);
  if (!host) {
    throw new MalformedUrlError('Database URL has no host');
  }

  const database = decodeComponent(parsed.pathname.replace(/^\//, ''), 'database name');
  if (!database) {
    throw new MalformedUrlError('Database URL has no database path');
  }

  const port = parsed.port ? Number(parsed.port) : DEFAULT_POSTGRES_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new MalformedUrlError(`Database URL has an invalid port: ${parsed.port}`);
  }

  const urlUser = decodeComponent(parsed.username, 'user name');
  const user = urlUser || fallbackUser || undefined;

  const password = resolvePassword(parsed);
  if (!password) {
    throw new MissingCredentialError(
      `No password found for ${host}:${port}/${database}: set it in the URL user-info or as a "password" query parameter`
    );
  }

  const spec: ConnectionSpec = user
    ? { host, port, database, user, password }
    : { host, port, database, password };
  return Object.freeze(spec);
}

/**
 * Credential-free description of a connection, safe for log lines
 */
export function describeConnection(spec: ConnectionSpec): string {
  const host = spec.host.includes(':') ? `[${spec.host}]` : spec.host;
  return `${host}:${spec.port}/${spec.database}`;
}

function resolvePassword(url: URL): string | undefined {
  const userInfoPassword = decodeComponent(url.password, 'password');
  if (userInfoPassword) {
    return userInfoPassword;
  }

  // URLSearchParams.get returns the first value and has already decoded it
  const queryPassword = url.searchParams.get('password');
  if (queryPassword) {
    return queryPassword;
  }

  return undefined;
}

function decodeComponent(value: string, what: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new MalformedUrlError(`Database URL has an invalid percent-encoded ${what}`);
  }
}

function stripIpv6Brackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;
}

/**
 * Resolve the connection for a run from configuration. DB_NAME, when set, replaces the
 * database named in the URL path.
 */
export function resolveConnectionSpec(
  config: Pick<BackupConfig, 'databaseUrl' | 'databaseUser' | 'databaseName'>
): ConnectionSpec {
  const spec = parseConnectionString(config.databaseUrl, config.databaseUser);
  if (config.databaseName && config.databaseName !== spec.database) {
    return Object.freeze({ ...spec, database: config.databaseName });
  }
  return spec;
}
