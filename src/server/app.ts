// ---------------------------------------------------------------------------
// HTTP surface
// ---------------------------------------------------------------------------
// Thin express layer: each route parses JSON, hands the body to one service
// action and maps the ExecuteResult to a response.
// ---------------------------------------------------------------------------

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
} from "express";
import cors, { type CorsOptions } from "cors";
import type { InsightsService } from "../service/index.js";
import type { ActionType } from "../service/types.js";
import type { ServiceConfig } from "../config/types.js";
import type { Logger } from "../lib/logger.js";
import { toHttpResponse } from "./http.js";

export const SERVICE_NAME = "perfume-ad-insights";

export interface Route {
  /** Key under "endpoints" in the service descriptor */
  name: string;
  method: "get" | "post";
  path: string;
  action: ActionType;
  /** Builds the action parameters; defaults to the JSON body */
  params?: (req: Request) => unknown;
}

export const ROUTES: readonly Route[] = [
  { name: "ad_insights", method: "post", path: "/api/ad-insight", action: "insights.ad.generate" },
  { name: "ad_insights_llm", method: "post", path: "/api/ad-insight/llm", action: "insights.ad.generate-llm" },
  {
    name: "video_prompt",
    method: "get",
    path: "/api/video-analysis-prompt",
    action: "insights.prompt.get",
    params: () => ({ kind: "video" }),
  },
  {
    name: "influencer_prompt",
    method: "get",
    path: "/api/influencer-analysis-prompt",
    action: "insights.prompt.get",
    params: () => ({ kind: "influencer" }),
  },
  {
    name: "language_extraction",
    method: "post",
    path: "/api/extract-languages",
    action: "insights.video.extract-languages",
  },
  {
    name: "product_categorization",
    method: "post",
    path: "/api/categorize-product",
    action: "insights.product.categorize",
  },
];

/** Body for GET / */
export function describeService(service: InsightsService): Record<string, unknown> {
  const endpoints: Record<string, string> = { health: "/health" };
  for (const route of ROUTES) {
    endpoints[route.name] = `${route.path} (${route.method.toUpperCase()})`;
  }
  return {
    service: SERVICE_NAME,
    version: service.manifest.version,
    llm_enabled: service.llmEnabled,
    endpoints,
  };
}

export function healthStatus(service: InsightsService, now: Date = new Date()) {
  return {
    status: "healthy",
    service: SERVICE_NAME,
    version: service.manifest.version,
    timestamp: now.toISOString(),
  };
}

export function corsOptions(config: ServiceConfig): CorsOptions {
  const wildcard = config.allowedOrigins.includes("*");
  return {
    origin: wildcard ? "*" : config.allowedOrigins,
    // Browsers reject credentials together with a wildcard origin
    credentials: !wildcard,
    methods: ["GET", "POST"],
  };
}

/**
 * The 4xx status carried by a body-parser rejection (malformed JSON, oversized
 * body, unsupported charset or encoding), if any.
 */
export function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) return status;
  return err instanceof SyntaxError ? 400 : undefined;
}

export function createApp(
  service: InsightsService,
  config: ServiceConfig,
  log: Logger
): Express {
  const app = express();

  app.use(cors(corsOptions(config)));
  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.json(describeService(service));
  });

  app.get("/health", (_req, res) => {
    res.json(healthStatus(service));
  });

  for (const route of ROUTES) {
    const handler: RequestHandler = (req, res, next) => {
      const params: unknown = route.params ? route.params(req) : req.body;
      log.debug("Request received", { path: route.path, action: route.action });
      service
        .execute(route.action, params)
        .then((result) => {
          const { status, body } = toHttpResponse(result);
          res.status(status).json(body);
        })
        .catch(next);
    };

    if (route.method === "get") {
      app.get(route.path, handler);
    } else {
      app.post(route.path, handler);
    }
  }

  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const message = err instanceof Error ? err.message : "Bad request";
      res.status(status).json({ detail: `Invalid request payload: ${message}` });
      return;
    }
    log.error("Unhandled request error", err);
    res.status(500).json({ detail: "Internal server error" });
  };
  app.use(onError);

  return app;
}
