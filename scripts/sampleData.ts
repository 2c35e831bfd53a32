import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { PromotionInput } from "@shared/schema";
import { shiftIsoDate } from "@shared/date-utils";
import { validatePromotionInput } from "@shared/promotionValidation";

export const SAMPLE_DATA_PATH = fileURLToPath(
  new URL("./data/sample-promotions.json", import.meta.url),
);

const sampleEntrySchema = z.object({
  name: z.string(),
  promotion_type: z.string(),
  value: z.number().int(),
  product_id: z.number().int(),
  start_offset_days: z.number().int(),
  end_offset_days: z.number().int(),
});

export type SamplePromotionEntry = z.infer<typeof sampleEntrySchema>;

export async function readSampleEntries(
  filePath: string = SAMPLE_DATA_PATH,
): Promise<SamplePromotionEntry[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, "utf8"));
  return z.array(sampleEntrySchema).parse(raw);
}

/**
 * Turns a sample entry into a promotion payload dated relative to `today`
 * and runs it through the same validation as the API.
 */
export function resolveSampleEntry(entry: SamplePromotionEntry, today: string): PromotionInput {
  const result = validatePromotionInput({
    name: entry.name,
    promotion_type: entry.promotion_type,
    value: entry.value,
    product_id: entry.product_id,
    start_date: shiftIsoDate(today, entry.start_offset_days),
    end_date: shiftIsoDate(today, entry.end_offset_days),
  });
  if (!result.success) {
    throw new Error(`Sample promotion '${entry.name}' is invalid: ${result.error.message}`);
  }
  return result.data;
}
