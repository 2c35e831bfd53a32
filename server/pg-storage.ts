import { and, asc, eq, gt, gte, lt, lte, or, sql, type SQL } from "drizzle-orm";
import { promotions, isPromotionType, type Promotion, type PromotionInput } from "@shared/schema";
import type { DatabaseHandle, Database } from "./db";
import type { IStorage, PromotionFilter } from "./storage";
import { DatabaseError } from "./errors";
import logger from "./logger";

// SQLSTATE classes and client error codes that mean "database unreachable"
const UNAVAILABLE_SQLSTATE_PREFIXES = ["08", "57P", "53300"];
const UNAVAILABLE_CLIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "CONNECT_TIMEOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
]);

export function isUnavailableError(error: unknown): boolean {
  if (!error || typeof error !== "object" || !("code" in error)) return false;
  const code = error.code;
  if (typeof code !== "string") return false;
  return (
    UNAVAILABLE_CLIENT_CODES.has(code) ||
    UNAVAILABLE_SQLSTATE_PREFIXES.some((prefix) => code.startsWith(prefix))
  );
}

export function promotionFilterCondition(filter: PromotionFilter): SQL | undefined {
  switch (filter.kind) {
    case "all":
      return undefined;
    case "id":
      return eq(promotions.id, filter.id);
    case "active":
      return filter.active
        ? and(lte(promotions.startDate, filter.on), gte(promotions.endDate, filter.on))
        : or(gt(promotions.startDate, filter.on), lt(promotions.endDate, filter.on));
    case "name":
      return eq(promotions.name, filter.name);
    case "productId":
      return eq(promotions.productId, filter.productId);
    case "promotionType":
      return isPromotionType(filter.promotionType)
        ? eq(promotions.promotionType, filter.promotionType)
        : sql`false`;
  }
}

/**
 * Runs one unit of work against the database. PostgreSQL rolls back a failed
 * statement on its own; here the failure is logged and rethrown as a
 * DatabaseError, with connection-class failures marked unavailable.
 */
export async function runStorageOperation<T>(
  operation: string,
  slowThresholdMs: number,
  work: () => Promise<T>,
): Promise<T> {
  const start = Date.now();
  try {
    return await work();
  } catch (error) {
    logger.error({ err: error, operation, category: "storage" }, `Error during ${operation}`);
    throw new DatabaseError(`Database error during ${operation}`, {
      cause: error,
      unavailable: isUnavailableError(error),
    });
  } finally {
    const duration = Date.now() - start;
    if (duration > slowThresholdMs) {
      logger.warn({ operation, duration }, `[SLOW] ${operation} took ${duration}ms`);
    }
  }
}

export class PostgresStorage implements IStorage {
  private readonly db: Database;

  constructor(private readonly handle: DatabaseHandle) {
    this.db = handle.db;
  }

  private run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return runStorageOperation(operation, this.handle.slowThresholdMs, work);
  }

  async listPromotions(filter: PromotionFilter): Promise<Promotion[]> {
    return this.run("listPromotions", () =>
      this.db
        .select()
        .from(promotions)
        .where(promotionFilterCondition(filter))
        .orderBy(asc(promotions.id)),
    );
  }

  async getPromotion(id: number): Promise<Promotion | undefined> {
    const [promotion] = await this.run("getPromotion", () =>
      this.db.select().from(promotions).where(eq(promotions.id, id)),
    );
    return promotion;
  }

  async createPromotion(input: PromotionInput): Promise<Promotion> {
    const [created] = await this.run("createPromotion", () =>
      this.db.insert(promotions).values(input).returning(),
    );
    if (!created) {
      throw new DatabaseError("Insert returned no promotion row");
    }
    return created;
  }

  async updatePromotion(id: number, input: PromotionInput): Promise<Promotion | undefined> {
    const [updated] = await this.run("updatePromotion", () =>
      this.db.update(promotions).set(input).where(eq(promotions.id, id)).returning(),
    );
    return updated;
  }

  async deactivatePromotion(id: number, cutoff: string): Promise<Promotion | undefined> {
    const [updated] = await this.run("deactivatePromotion", () =>
      this.db
        .update(promotions)
        .set({ endDate: sql`LEAST(${promotions.endDate}, ${cutoff}::date)` })
        .where(eq(promotions.id, id))
        .returning(),
    );
    return updated;
  }

  async deletePromotion(id: number): Promise<boolean> {
    const deleted = await this.run("deletePromotion", () =>
      this.db.delete(promotions).where(eq(promotions.id, id)).returning({ id: promotions.id }),
    );
    return deleted.length > 0;
  }

  async deleteAllPromotions(): Promise<number> {
    const deleted = await this.run("deleteAllPromotions", () =>
      this.db.delete(promotions).returning({ id: promotions.id }),
    );
    return deleted.length;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
