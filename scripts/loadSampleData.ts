import { todayIsoDate } from "@shared/date-utils";
import { loadConfig } from "../server/config";
import { createStorage } from "../server/storage";
import logger, { runWithLogContext } from "../server/logger";
import { readSampleEntries, resolveSampleEntry } from "./sampleData";

async function main() {
  const config = loadConfig();
  const storage = await createStorage(config);
  const today = todayIsoDate(new Date(), config.timeZone);

  try {
    const entries = await readSampleEntries();
    let created = 0;
    for (const entry of entries) {
      const promotion = await storage.createPromotion(resolveSampleEntry(entry, today));
      created += 1;
      logger.info(
        { promotionId: promotion.id, promotionType: promotion.promotionType },
        `Created: ${promotion.name}`,
      );
    }
    logger.info({ created }, `Loaded ${created} sample promotions`);
  } finally {
    await storage.close();
  }
}

runWithLogContext(main, { category: "script" }).catch((error: unknown) => {
  logger.error({ err: error }, "Failed to load sample promotions");
  process.exit(1);
});
