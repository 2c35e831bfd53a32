/**
 * Tests for server/pg-storage.ts
 * SQL conditions are rendered with Drizzle's dialect; no database is involved.
 */
import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";
import { PgDialect } from "drizzle-orm/pg-core";
import {
  isUnavailableError,
  promotionFilterCondition,
  runStorageOperation,
} from "../server/pg-storage";
import type { PromotionFilter } from "../server/storage";
import { DatabaseError } from "../server/errors";
import logger from "../server/logger";

const dialect = new PgDialect();

function render(filter: PromotionFilter) {
  const condition = promotionFilterCondition(filter);
  return condition ? dialect.sqlToQuery(condition) : undefined;
}

function rejectWith(error: unknown): () => Promise<never> {
  return () => Promise.reject(error);
}

describe("promotionFilterCondition", () => {
  it("has no condition for the full listing", () => {
    assert.equal(render({ kind: "all" }), undefined);
  });

  it("matches id, name and product id exactly", () => {
    const byId = render({ kind: "id", id: 5 });
    assert.equal(byId?.sql, '"promotions"."id" = $1');
    assert.deepEqual(byId?.params, [5]);

    const byName = render({ kind: "name", name: "Summer Sale" });
    assert.equal(byName?.sql, '"promotions"."name" = $1');
    assert.deepEqual(byName?.params, ["Summer Sale"]);

    const byProduct = render({ kind: "productId", productId: 101 });
    assert.equal(byProduct?.sql, '"promotions"."product_id" = $1');
    assert.deepEqual(byProduct?.params, [101]);
  });

  it("checks the active window inclusively", () => {
    const active = render({ kind: "active", active: true, on: "2025-08-15" });
    assert.equal(
      active?.sql,
      '("promotions"."start_date" <= $1 and "promotions"."end_date" >= $2)',
    );
    assert.deepEqual(active?.params, ["2025-08-15", "2025-08-15"]);

    const inactive = render({ kind: "active", active: false, on: "2025-08-15" });
    assert.equal(
      inactive?.sql,
      '("promotions"."start_date" > $1 or "promotions"."end_date" < $2)',
    );
    assert.deepEqual(inactive?.params, ["2025-08-15", "2025-08-15"]);
  });

  it("never matches an unknown promotion type", () => {
    const known = render({ kind: "promotionType", promotionType: "BOGO" });
    assert.equal(known?.sql, '"promotions"."promotion_type" = $1');
    assert.deepEqual(known?.params, ["BOGO"]);

    const unknown = render({ kind: "promotionType", promotionType: "bogo" });
    assert.equal(unknown?.sql, "false");
    assert.deepEqual(unknown?.params, []);
  });
});

describe("isUnavailableError", () => {
  it("recognises connection failures", () => {
    assert.equal(isUnavailableError({ code: "ECONNREFUSED" }), true);
    assert.equal(isUnavailableError({ code: "CONNECT_TIMEOUT" }), true);
    assert.equal(isUnavailableError({ code: "08006" }), true);
    assert.equal(isUnavailableError({ code: "57P01" }), true);
    assert.equal(isUnavailableError({ code: "53300" }), true);
  });

  it("leaves other failures alone", () => {
    assert.equal(isUnavailableError({ code: "23505" }), false);
    assert.equal(isUnavailableError({ code: 8006 }), false);
    assert.equal(isUnavailableError(new Error("syntax error")), false);
    assert.equal(isUnavailableError(null), false);
  });
});

describe("runStorageOperation", () => {
  it("returns the result of the work", async () => {
    assert.equal(await runStorageOperation("getPromotion", 1_000, async () => 3), 3);
  });

  it("wraps failures in a DatabaseError that keeps the cause", async () => {
    const cause = Object.assign(new Error("duplicate key"), { code: "23505" });

    await assert.rejects(runStorageOperation("createPromotion", 1_000, rejectWith(cause)), (error: unknown) => {
      assert.ok(error instanceof DatabaseError);
      assert.equal(error.message, "Database error during createPromotion");
      assert.equal(error.status, 500);
      assert.equal(error.cause, cause);
      return true;
    });
  });

  it("marks connection failures as unavailable", async () => {
    const cause = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });

    await assert.rejects(runStorageOperation("listPromotions", 1_000, rejectWith(cause)), (error: unknown) => {
      assert.ok(error instanceof DatabaseError);
      assert.equal(error.status, 503);
      return true;
    });
  });

  it("warns about slow operations", async (t) => {
    const messages: string[] = [];
    t.mock.method(logger, "warn", (_obj: unknown, message: unknown) => {
      if (typeof message === "string") messages.push(message);
    });

    await runStorageOperation("listPromotions", 0, async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return [];
    });

    assert.equal(messages.length, 1);
    assert.match(messages[0] ?? "", /^\[SLOW\] listPromotions took \d+ms$/);
  });

  it("stays quiet under the threshold", async () => {
    const warn = mock.method(logger, "warn", () => {});
    try {
      await runStorageOperation("getPromotion", 60_000, async () => undefined);
      assert.equal(warn.mock.callCount(), 0);
    } finally {
      warn.mock.restore();
    }
  });
});
