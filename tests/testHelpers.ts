import { PromotionService } from "../server/services/promotion.service";
import { MemStorage, type IStorage } from "../server/storage";
import { createApp } from "../server/app";

export const FIXED_NOW = new Date("2025-08-15T12:00:00Z");

export function promotionPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "Summer Sale",
    promotion_type: "PERCENT",
    value: 20,
    product_id: 101,
    start_date: "2025-08-01",
    end_date: "2025-08-31",
    ...overrides,
  };
}

export function createTestApp(
  options: { storage?: IStorage; isProduction?: boolean; allowedOrigins?: string[] } = {},
) {
  const storage = options.storage ?? new MemStorage(() => FIXED_NOW);
  const service = new PromotionService({ storage, timeZone: "UTC", now: () => FIXED_NOW });
  const app = createApp({
    service,
    config: { isProduction: options.isProduction ?? false, allowedOrigins: options.allowedOrigins ?? [] },
  });
  return { app, storage, service };
}
