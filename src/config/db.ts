import { Pool } from "pg";
import type { DatabaseSettings } from "./env";
import type { Logger } from "../logger";
import { consoleLogger } from "../logger";

export function createPool(
  settings: DatabaseSettings,
  statementTimeoutMs: number,
  logger: Logger = consoleLogger
): Pool {
  const pool = settings.connectionString
    ? new Pool({ connectionString: settings.connectionString, statement_timeout: statementTimeoutMs })
    : new Pool({
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database,
        ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
        statement_timeout: statementTimeoutMs
      });

  pool.on("error", (error: Error) => {
    logger.error("Unexpected PostgreSQL error", error);
  });

  return pool;
}
