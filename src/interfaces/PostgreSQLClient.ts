export interface PostgreSQLClient {
  /** Open and immediately close a connection to the target database */
  testConnection(): Promise<void>;

  /** Run pg_dump in custom format into outputPath */
  createDump(outputPath: string): Promise<DumpInfo>;

  getDatabaseName(): string;
}

export interface DumpInfo {
  filePath: string;
  fileSize: number;
  databaseName: string;
  timestamp: Date;
}
