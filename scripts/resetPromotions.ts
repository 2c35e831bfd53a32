import { loadConfig } from "../server/config";
import { createStorage } from "../server/storage";
import logger, { runWithLogContext } from "../server/logger";

async function main() {
  const storage = await createStorage(loadConfig());
  try {
    const removed = await storage.deleteAllPromotions();
    logger.info({ removed }, `Removed ${removed} promotions`);
  } finally {
    await storage.close();
  }
}

runWithLogContext(main, { category: "script" }).catch((error: unknown) => {
  logger.error({ err: error }, "Failed to reset promotions");
  process.exit(1);
});
