import { beforeEach, describe, it, mock } from "node:test";
import assert from "node:assert/strict";
import { PromotionService } from "../server/services/promotion.service";
import { MemStorage } from "../server/storage";
import { DataValidationError, NotFoundError } from "../server/errors";

const NOW = new Date("2025-08-15T12:00:00Z");

function body(overrides: Record<string, unknown> = {}): Record<string, unknown> {
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

function isNotFound(message: string) {
  return (error: unknown) => {
    assert.ok(error instanceof NotFoundError);
    assert.equal(error.message, message);
    return true;
  };
}

describe("PromotionService", () => {
  let storage: MemStorage;
  let service: PromotionService;

  beforeEach(() => {
    storage = new MemStorage(() => NOW);
    service = new PromotionService({ storage, timeZone: "UTC", now: () => NOW });
  });

  it("derives today and yesterday from the clock and zone", () => {
    assert.equal(service.today(), "2025-08-15");
    assert.equal(service.yesterday(), "2025-08-14");

    const tokyo = new PromotionService({
      storage,
      timeZone: "Asia/Tokyo",
      now: () => new Date("2025-08-15T20:00:00Z"),
    });
    assert.equal(tokyo.today(), "2025-08-16");
  });

  it("creates a validated promotion", async () => {
    const promotion = await service.create(body());

    assert.equal(promotion.id, 1);
    assert.equal(promotion.promotionType, "PERCENT");
    assert.equal(promotion.startDate, "2025-08-01");
  });

  it("rejects an invalid payload without storing anything", async () => {
    await assert.rejects(service.create(body({ value: -5 })), (error: unknown) => {
      assert.ok(error instanceof DataValidationError);
      assert.equal(error.kind, "InvalidRange");
      assert.equal(error.field, "value");
      return true;
    });
    assert.deepEqual(await storage.listPromotions({ kind: "all" }), []);
  });

  it("lists active promotions as of today", async () => {
    await service.create(body({ name: "Running" }));
    await service.create(body({ name: "Upcoming", start_date: "2025-08-16", end_date: "2025-08-20" }));
    await service.create(body({ name: "Ends today", start_date: "2025-08-10", end_date: "2025-08-15" }));

    const active = await service.list({ kind: "active", active: true });
    const inactive = await service.list({ kind: "active", active: false });

    assert.deepEqual(active.map((p) => p.name), ["Running", "Ends today"]);
    assert.deepEqual(inactive.map((p) => p.name), ["Upcoming"]);
  });

  it("answers an impossible filter without reading storage", async () => {
    const list = mock.method(storage, "listPromotions");
    try {
      assert.deepEqual(await service.list({ kind: "none", param: "id" }), []);
      assert.equal(list.mock.callCount(), 0);
    } finally {
      list.mock.restore();
    }
  });

  it("reports a missing promotion", async () => {
    await assert.rejects(service.get(42), isNotFound("Promotion with id '42' was not found."));
  });

  it("checks existence before the body on update", async () => {
    await assert.rejects(service.update(42, { id: 7 }), isNotFound("Promotion with id '42' was not found."));
  });

  it("rejects a mismatched id without changing the record", async () => {
    const created = await service.create(body());

    await assert.rejects(service.update(created.id, body({ id: 2, name: "Other" })), (error: unknown) => {
      assert.ok(error instanceof DataValidationError);
      assert.equal(error.kind, "IdMismatch");
      assert.equal(error.message, "ID in body must match resource path");
      return true;
    });
    assert.equal((await service.get(created.id)).name, "Summer Sale");
  });

  it("replaces the record on update", async () => {
    const created = await service.create(body());
    const updated = await service.update(
      created.id,
      body({ id: created.id, name: "Winter Sale", promotion_type: "DISCOUNT", value: 5 }),
    );

    assert.equal(updated.id, created.id);
    assert.equal(updated.name, "Winter Sale");
    assert.equal(updated.promotionType, "DISCOUNT");
    assert.equal(updated.value, 5);
  });

  it("deactivates idempotently and never extends an ended promotion", async () => {
    const running = await service.create(body());
    const ended = await service.create(body({ start_date: "2025-07-01", end_date: "2025-07-10" }));

    assert.equal((await service.deactivate(running.id)).endDate, "2025-08-14");
    assert.equal((await service.deactivate(running.id)).endDate, "2025-08-14");
    assert.equal((await service.deactivate(ended.id)).endDate, "2025-07-10");

    const active = await service.list({ kind: "active", active: true });
    assert.deepEqual(active, []);
    await assert.rejects(service.deactivate(99), isNotFound("Promotion with id '99' was not found."));
  });

  it("deletes once", async () => {
    const created = await service.create(body());

    await service.remove(created.id);
    await assert.rejects(service.remove(created.id), isNotFound("Promotion with id '1' was not found."));
  });
});
