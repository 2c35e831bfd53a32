import pino from "pino";
import type { LogContext } from "@shared/logging";
import { loadLogConfig } from "./config";
import {
  getRequestContextStore,
  runWithRequestContext,
  updateLogContext,
} from "./requestContext";

export function runWithLogContext<T>(callback: () => T, initialContext: LogContext = {}): T {
  return runWithRequestContext(callback, initialContext);
}

export function setLogContext(context: Partial<LogContext>): void {
  updateLogContext(context);
}

export function getLogContext(): LogContext | undefined {
  return getRequestContextStore();
}

const logConfig = loadLogConfig();
const level = logConfig.level;

function buildDestination(): pino.DestinationStream {
  const streams: pino.StreamEntry[] = [];

  if (logConfig.filePath) {
    streams.push({
      level: "trace",
      stream: pino.destination({ dest: logConfig.filePath, mkdir: true, sync: false }),
    });
  }

  if (logConfig.toStdout || streams.length === 0) {
    streams.push({ level: "trace", stream: pino.destination({ dest: 1, sync: true }) });
  }

  return pino.multistream(streams);
}

const logger = pino(
  {
    level,
    base: { service: "promotions-service" },
    mixin() {
      const context = getRequestContextStore();
      return context ? { ...context } : {};
    },
  },
  buildDestination(),
);

export default logger;
