import { pgTable, serial, text, integer, date, timestamp, index } from "drizzle-orm/pg-core";

export const PROMOTION_TYPES = ["PERCENT", "DISCOUNT", "BOGO"] as const;
export type PromotionType = (typeof PROMOTION_TYPES)[number];

export function isPromotionType(value: string): value is PromotionType {
  return (PROMOTION_TYPES as readonly string[]).includes(value);
}

export const PROMOTION_NAME_MAX_LENGTH = 63;
// Upper bound of a PostgreSQL `integer` column
export const MAX_INT32 = 2_147_483_647;

export const promotions = pgTable(
  "promotions",
  {
    id: serial("id").primaryKey(),
    name: text("name").notNull(),
    promotionType: text("promotion_type").$type<PromotionType>().notNull(),
    value: integer("value").notNull(),
    productId: integer("product_id").notNull(),
    // Calendar dates travel as YYYY-MM-DD strings so they never shift across time zones
    startDate: date("start_date", { mode: "string" }).notNull(),
    endDate: date("end_date", { mode: "string" }).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    lastUpdated: timestamp("last_updated")
      .defaultNow()
      .notNull()
      .$onUpdate(() => new Date()),
  },
  (table) => ({
    productIdx: index("promotions_product_id_idx").on(table.productId),
    typeIdx: index("promotions_promotion_type_idx").on(table.promotionType),
  }),
);

export type Promotion = typeof promotions.$inferSelect;

/** Fields a client controls; id and audit timestamps are server-assigned. */
export type PromotionInput = Pick<
  Promotion,
  "name" | "promotionType" | "value" | "productId" | "startDate" | "endDate"
>;

/** Wire representation returned by the REST API. */
export type PromotionResponse = {
  id: number;
  name: string;
  promotion_type: PromotionType;
  value: number;
  product_id: number;
  start_date: string;
  end_date: string;
  created_at: string;
  last_updated: string;
};

export function serializePromotion(promotion: Promotion): PromotionResponse {
  return {
    id: promotion.id,
    name: promotion.name,
    promotion_type: promotion.promotionType,
    value: promotion.value,
    product_id: promotion.productId,
    start_date: promotion.startDate,
    end_date: promotion.endDate,
    created_at: promotion.createdAt.toISOString(),
    last_updated: promotion.lastUpdated.toISOString(),
  };
}
