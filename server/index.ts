import { createServer, type Server } from "http";
import { loadConfig, type AppConfig } from "./config";
import { createStorage, type IStorage } from "./storage";
import { PromotionService } from "./services/promotion.service";
import { createApp } from "./app";
import logger from "./logger";

type RunningServer = {
  server: Server;
  storage: IStorage;
};

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function startServer(config: AppConfig = loadConfig()): Promise<RunningServer> {
  const storage = await createStorage(config);
  const service = new PromotionService({ storage, timeZone: config.timeZone });
  const app = createApp({ service, config });
  const server = createServer(app);

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host, () => {
      logger.info(
        { port: config.port, host: config.host, env: config.nodeEnv },
        `Server is running on http://${config.host}:${config.port}`,
      );
      resolve();
    });
  });

  return { server, storage };
}

function registerShutdown({ server, storage }: RunningServer) {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    try {
      await closeServer(server);
      await storage.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

if (process.env.NODE_ENV !== "test") {
  startServer()
    .then(registerShutdown)
    .catch((error: unknown) => {
      logger.fatal({ err: error }, "Failed to start server");
      process.exit(1);
    });
}
