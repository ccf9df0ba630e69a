import { Pool } from "pg";

export interface PostgresConfig {
  connectionString: string;
  max?: number;
}

export function requireDatabaseUrl(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const value = env.NLS_DATABASE_URL?.trim() || env.DATABASE_URL?.trim();
  if (!value) {
    throw new Error(
      "DATABASE_URL (or NLS_DATABASE_URL) is required for the postgres bundle source",
    );
  }
  return value;
}

export function createPostgresPool(config?: Partial<PostgresConfig>): Pool {
  const connectionString = config?.connectionString ?? requireDatabaseUrl();
  const max = config?.max ?? 4;
  return new Pool({ connectionString, max });
}
