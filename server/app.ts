import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import helmet, { type HelmetOptions } from "helmet";
import cors, { type CorsOptions } from "cors";
import swaggerUi from "swagger-ui-express";
import type { AppConfig } from "./config";
import type { PromotionService } from "./services/promotion.service";
import { registerRoutes } from "./routes";
import { swaggerSpec } from "./swagger";
import { requestContextMiddleware } from "./requestContext";
import { methodNotAllowed } from "./middleware/http";
import {
  DataValidationError,
  NotFoundError,
  extractStatusCode,
  resolveErrorMessage,
  statusLabel,
  type ErrorResponseBody,
} from "./errors";
import logger, { getLogContext } from "./logger";

export type CreateAppOptions = {
  service: PromotionService;
  config: Pick<AppConfig, "isProduction" | "allowedOrigins">;
};

export const SERVICE_INFO = {
  name: "promotions-service",
  version: "1.0.0",
  description: "REST API for creating and managing product promotions",
  paths: {
    promotions: "/promotions",
    health: "/health",
    docs: "/apidocs",
  },
} as const;

const GENERIC_SERVER_ERROR = "An unexpected error occurred. Please try again later.";

const publicDir = fileURLToPath(new URL("./public", import.meta.url));
const indexHtmlPath = fileURLToPath(new URL("./public/index.html", import.meta.url));

type OriginMatcher = (origin: string) => boolean;

const SPECIAL_CHARS_REGEX = /[-/\\^$*+?.()|[\]{}]/g;

function escapeRegex(input: string): string {
  return input.replace(SPECIAL_CHARS_REGEX, "\\$&");
}

/** Exact origins, or patterns with `*` wildcards such as `https://*.example.com`. */
export function buildOriginMatchers(origins: string[]): OriginMatcher[] {
  return origins.map((origin) => {
    if (!origin.includes("*")) {
      return (candidate: string) => candidate === origin;
    }
    const pattern = origin.split("*").map(escapeRegex).join(".*");
    const regex = new RegExp(`^${pattern}$`);
    return (candidate: string) => regex.test(candidate);
  });
}

function corsOptions(allowedOrigins: string[]): CorsOptions {
  if (allowedOrigins.length === 0 || allowedOrigins.includes("*")) {
    return { origin: true };
  }
  const matchers = buildOriginMatchers(allowedOrigins);
  return {
    origin: (origin, callback) => {
      if (!origin || matchers.some((matches) => matches(origin))) {
        return callback(null, true);
      }
      logger.warn({ origin, allowedOrigins }, "Blocked CORS origin");
      callback(null, false);
    },
  };
}

function helmetOptions(isProduction: boolean): HelmetOptions {
  return {
    contentSecurityPolicy: isProduction,
    crossOriginEmbedderPolicy: false,
  };
}

function logRequestCompletion(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();
  const context = getLogContext();
  res.once("finish", () => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000;
    logger.info(
      {
        ...context,
        status: res.statusCode,
        ip: req.ip,
        userAgent: req.get("user-agent"),
        duration: Math.round(duration * 100) / 100,
      },
      `${req.method} ${req.originalUrl} ${res.statusCode}`,
    );
  });
  next();
}

/** body-parser failures carry an HTTP status and a `type` such as `entity.parse.failed`. */
function bodyParserErrorType(error: unknown): string | undefined {
  if (error && typeof error === "object" && "type" in error && "status" in error) {
    return typeof error.type === "string" ? error.type : undefined;
  }
  return undefined;
}

export function buildErrorBody(error: unknown, errorId: string, isProduction: boolean): ErrorResponseBody {
  const status = extractStatusCode(error);
  const body: ErrorResponseBody = {
    status,
    error: statusLabel(status),
    message: resolveErrorMessage(error),
  };

  if (bodyParserErrorType(error) === "entity.parse.failed") {
    body.message = "Malformed JSON in request body";
  }

  if (error instanceof DataValidationError) {
    if (error.kind) body.kind = error.kind;
    if (error.field) body.field = error.field;
  }

  if (status >= 500) {
    body.errorId = errorId;
    if (isProduction) {
      body.message = GENERIC_SERVER_ERROR;
    }
  }

  return body;
}

function errorHandler(isProduction: boolean) {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    const errorId = randomUUID();
    const body = buildErrorBody(err, errorId, isProduction);

    if (body.status >= 500) {
      logger.error(
        {
          err: err instanceof Error ? err : new Error(resolveErrorMessage(err)),
          errorId,
          status: body.status,
          path: req.originalUrl,
          method: req.method,
          ip: req.ip,
          userAgent: req.get("user-agent"),
        },
        "Unhandled request error",
      );
    } else {
      logger.warn(
        { status: body.status, kind: body.kind, field: body.field, path: req.originalUrl },
        body.message,
      );
    }

    if (res.headersSent) {
      return next(err);
    }

    res.status(body.status).json(body);
  };
}

export function createApp({ service, config }: CreateAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  app.use(requestContextMiddleware);
  app.use(logRequestCompletion);
  app.use(helmet(helmetOptions(config.isProduction)));
  app.use(cors(corsOptions(config.allowedOrigins)));
  app.use(express.json());

  /**
   * @openapi
   * /health:
   *   get:
   *     summary: Health check
   *     description: Answers without touching the database.
   *     responses:
   *       200:
   *         description: Service is up
   */
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "OK" });
  });
  app.all("/health", methodNotAllowed(["GET"]));

  /**
   * @openapi
   * /api:
   *   get:
   *     summary: Service information
   *     responses:
   *       200:
   *         description: Name, version and entry points of the service
   */
  app.get("/api", (_req, res) => {
    res.status(200).json(SERVICE_INFO);
  });
  app.all("/api", methodNotAllowed(["GET"]));

  app.use("/apidocs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  app.get("/", (_req, res, next) => {
    res.sendFile(indexHtmlPath, (error) => {
      if (error) next(error);
    });
  });
  app.all("/", methodNotAllowed(["GET"]));
  app.use(express.static(publicDir, { index: false }));

  registerRoutes(app, service);

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`The requested URL ${req.path} was not found on the server.`));
  });

  app.use(errorHandler(config.isProduction));

  return app;
}
