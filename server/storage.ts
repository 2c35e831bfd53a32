import logger from "./logger";
import type { AppConfig } from "./config";
import type { Promotion, PromotionInput } from "@shared/schema";
import { earlierIsoDate, isActiveOn } from "@shared/date-utils";

/**
 * A single collection filter. Exactly one applies per listing; choosing which
 * one is the job of the query dispatcher, not the storage.
 */
export type PromotionFilter =
  | { kind: "all" }
  | { kind: "id"; id: number }
  | { kind: "active"; active: boolean; on: string }
  | { kind: "name"; name: string }
  | { kind: "productId"; productId: number }
  | { kind: "promotionType"; promotionType: string };

export interface IStorage {
  /** Matching promotions ordered by id. */
  listPromotions(filter: PromotionFilter): Promise<Promotion[]>;
  getPromotion(id: number): Promise<Promotion | undefined>;
  createPromotion(input: PromotionInput): Promise<Promotion>;
  /** Full replace of every client-controlled field. */
  updatePromotion(id: number, input: PromotionInput): Promise<Promotion | undefined>;
  /** Sets end_date to the earlier of its current value and `cutoff`. */
  deactivatePromotion(id: number, cutoff: string): Promise<Promotion | undefined>;
  deletePromotion(id: number): Promise<boolean>;
  deleteAllPromotions(): Promise<number>;
  close(): Promise<void>;
}

export function matchesFilter(promotion: Promotion, filter: PromotionFilter): boolean {
  switch (filter.kind) {
    case "all":
      return true;
    case "id":
      return promotion.id === filter.id;
    case "active":
      return isActiveOn(promotion, filter.on) === filter.active;
    case "name":
      return promotion.name === filter.name;
    case "productId":
      return promotion.productId === filter.productId;
    case "promotionType":
      return promotion.promotionType === filter.promotionType;
  }
}

export class MemStorage implements IStorage {
  private promotions: Map<number, Promotion>;
  private currentId: number;

  constructor(private readonly clock: () => Date = () => new Date()) {
    this.promotions = new Map();
    this.currentId = 1;
  }

  async listPromotions(filter: PromotionFilter): Promise<Promotion[]> {
    return Array.from(this.promotions.values())
      .filter((promotion) => matchesFilter(promotion, filter))
      .sort((a, b) => a.id - b.id)
      .map((promotion) => ({ ...promotion }));
  }

  async getPromotion(id: number): Promise<Promotion | undefined> {
    const promotion = this.promotions.get(id);
    return promotion ? { ...promotion } : undefined;
  }

  async createPromotion(input: PromotionInput): Promise<Promotion> {
    const now = this.clock();
    const promotion: Promotion = {
      ...input,
      id: this.currentId++,
      createdAt: now,
      lastUpdated: now,
    };
    this.promotions.set(promotion.id, promotion);
    return { ...promotion };
  }

  async updatePromotion(id: number, input: PromotionInput): Promise<Promotion | undefined> {
    const existing = this.promotions.get(id);
    if (!existing) return undefined;
    const updated: Promotion = {
      ...existing,
      ...input,
      id,
      lastUpdated: this.clock(),
    };
    this.promotions.set(id, updated);
    return { ...updated };
  }

  async deactivatePromotion(id: number, cutoff: string): Promise<Promotion | undefined> {
    const existing = this.promotions.get(id);
    if (!existing) return undefined;
    const updated: Promotion = {
      ...existing,
      endDate: earlierIsoDate(existing.endDate, cutoff),
      lastUpdated: this.clock(),
    };
    this.promotions.set(id, updated);
    return { ...updated };
  }

  async deletePromotion(id: number): Promise<boolean> {
    return this.promotions.delete(id);
  }

  async deleteAllPromotions(): Promise<number> {
    const count = this.promotions.size;
    this.promotions.clear();
    return count;
  }

  async close(): Promise<void> {}
}

export async function createStorage(config: AppConfig): Promise<IStorage> {
  if (config.database.useInMemory) {
    const message =
      "Using in-memory storage for promotions. Data is lost on restart and not shared across processes.";
    if (config.nodeEnv === "test") {
      logger.info({ testEnv: true }, message);
    } else {
      logger.warn(message);
    }
    return new MemStorage();
  }

  const { PostgresStorage } = await import("./pg-storage");
  const { createDatabase } = await import("./db");
  logger.info("Using PostgreSQL-backed storage for promotions.");
  const handle = createDatabase(config.database);
  if (!(await handle.testConnection())) {
    logger.warn("Database unreachable at startup; storage calls will fail until it recovers");
  }
  return new PostgresStorage(handle);
}
