import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { Logger as DrizzleLogger } from "drizzle-orm/logger";
import postgres from "postgres";
import * as schema from "@shared/schema";
import type { AppConfig } from "./config";
import logger from "./logger";

export type Database = PostgresJsDatabase<typeof schema>;

export type DatabaseHandle = {
  db: Database;
  slowThresholdMs: number;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
};

const queryLogger: DrizzleLogger = {
  logQuery(query, params) {
    logger.debug({ category: "storage", params }, `[DB] ${query}`);
  },
};

export function createDatabase(options: AppConfig["database"]): DatabaseHandle {
  if (!options.url) {
    throw new Error("DATABASE_URL environment variable is required");
  }

  const client = postgres(options.url, {
    max: options.poolSize,
    onnotice: (notice) => logger.debug({ notice }, "[DB] notice"),
  });
  const db = drizzle(client, { schema, logger: queryLogger });

  return {
    db,
    slowThresholdMs: options.slowThresholdMs,
    async testConnection() {
      try {
        await client`SELECT 1`;
        logger.info("✅ Database connection successful");
        return true;
      } catch (error) {
        logger.error({ err: error }, "❌ Database connection failed");
        return false;
      }
    },
    async close() {
      await client.end();
      logger.info("Database connections closed");
    },
  };
}
