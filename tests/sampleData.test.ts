import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { isActiveOn } from "../shared/date-utils";
import { readSampleEntries, resolveSampleEntry } from "../scripts/sampleData";

const TODAY = "2025-08-15";

describe("sample promotions", async () => {
  const entries = await readSampleEntries();

  it("ships eleven entries covering every promotion type", () => {
    assert.equal(entries.length, 11);
    assert.deepEqual(
      [...new Set(entries.map((entry) => entry.promotion_type))].sort(),
      ["BOGO", "DISCOUNT", "PERCENT"],
    );
  });

  it("dates entries relative to today", () => {
    const [first] = entries;
    assert.ok(first);
    assert.deepEqual(resolveSampleEntry(first, TODAY), {
      name: "Spring Kickoff 15% Off",
      promotionType: "PERCENT",
      value: 15,
      productId: 1101,
      startDate: "2025-08-15",
      endDate: "2025-09-14",
    });
  });

  it("validates and mixes active, upcoming and expired promotions", () => {
    const resolved = entries.map((entry) => resolveSampleEntry(entry, TODAY));
    const active = resolved.filter((promotion) => isActiveOn(promotion, TODAY));
    const expired = resolved.filter((promotion) => promotion.endDate < TODAY);
    const upcoming = resolved.filter((promotion) => promotion.startDate > TODAY);

    assert.equal(active.length, 7);
    assert.equal(expired.length, 2);
    assert.equal(upcoming.length, 2);
  });

  it("refuses an entry that fails validation", () => {
    assert.throws(
      () =>
        resolveSampleEntry(
          {
            name: "Broken",
            promotion_type: "PERCENT",
            value: -5,
            product_id: 1,
            start_offset_days: 0,
            end_offset_days: 1,
          },
          TODAY,
        ),
      { message: "Sample promotion 'Broken' is invalid: Invalid value: must be >= 0" },
    );
  });
});
