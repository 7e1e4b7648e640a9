import express, { type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import { Readable, pipeline } from "stream";
import { promisify } from "util";
import { z } from "zod";

import logger from "./utils/logger.js";
import { attempt, describeError } from "./utils/result.js";
import { generationRequestSchema, historyQuerySchema } from "./types.js";
import { renderQrCode, toQrStyle } from "./services/qrcode.js";
import { fetchLogo, type LogoFetcher } from "./services/logo.js";
import {
  DatabaseUnavailableError,
  loadHistory,
  saveHistory,
  type HistoryStore,
} from "./services/history.js";

const streamPipeline = promisify(pipeline);

export interface AppDependencies {
  store: HistoryStore;
  fetchLogo?: LogoFetcher;
  historyCollection?: string;
  jsonBodyLimit?: string;
}

/**
 * Permissive CORS: echo the caller's origin (or `*`), allow credentials,
 * and answer preflights directly.
 */
function allowCors(req: Request, res: Response, next: NextFunction): void {
  const origin = req.headers.origin;
  res.setHeader("Access-Control-Allow-Origin", origin ?? "*");
  res.setHeader("Access-Control-Allow-Credentials", "true");
  if (origin) {
    res.setHeader("Vary", "Origin");
  }

  if (req.method === "OPTIONS") {
    res.setHeader(
      "Access-Control-Allow-Methods",
      "GET,POST,PUT,PATCH,DELETE,OPTIONS"
    );
    res.setHeader(
      "Access-Control-Allow-Headers",
      req.headers["access-control-request-headers"] ?? "*"
    );
    res.status(204).end();
    return;
  }

  next();
}

function invalidRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    detail: "Invalid request format",
    errors: error.issues,
  });
}

// body-parser errors carry an HTTP status and a `type`
function clientError(
  err: unknown
): { status: number; detail: string } | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) {
    return undefined;
  }
  const { status } = err;
  if (typeof status !== "number" || status < 400 || status >= 500) {
    return undefined;
  }
  const parseFailed = "type" in err && err.type === "entity.parse.failed";
  return {
    status,
    detail: parseFailed ? "Invalid JSON body" : describeError(err),
  };
}

export function createApp({
  store,
  fetchLogo: loadLogo = fetchLogo,
  historyCollection = "qr",
  jsonBodyLimit = "1mb",
}: AppDependencies): express.Express {
  const app = express();
  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(allowCors);
  app.use(express.json({ limit: jsonBodyLimit }));

  app.get("/", (_req, res) => {
    res.json({ message: "QR Code API ready" });
  });

  app.get("/test", async (_req, res) => {
    const probe = await attempt(() => store.ping());
    let database = "✅ Connected";
    if (!probe.ok) {
      database =
        probe.error instanceof DatabaseUnavailableError
          ? "❌ Not Available"
          : `❌ ${describeError(probe.error)}`;
    }
    res.json({ backend: "✅ Running", database });
  });

  app.post("/api/qrcode.png", async (req, res, next) => {
    try {
      const request = generationRequestSchema.parse(req.body);
      if (!request.content.trim()) {
        res.status(400).json({ detail: "content is required" });
        return;
      }

      let logo: Buffer | undefined;
      if (request.logo_url) {
        const fetched = await loadLogo(request.logo_url);
        if (fetched.ok) {
          logo = fetched.value;
        } else {
          logger.warn(
            { err: fetched.error, logoUrl: request.logo_url },
            "Logo unavailable, rendering without overlay"
          );
        }
      }

      const png = await renderQrCode(request.content, toQrStyle(request), logo);

      // Persist request for history; the response never waits on it
      void saveHistory(store, historyCollection, request).then((saved) => {
        if (!saved.ok) {
          logger.warn(
            { err: saved.error, collection: historyCollection },
            "Failed to persist QR history"
          );
        }
      });

      res.status(200).type("png");
      await streamPipeline(Readable.from([png]), res);
    } catch (error) {
      if (error instanceof z.ZodError) {
        invalidRequest(res, error);
      } else {
        next(error);
      }
    }
  });

  app.get("/api/history", async (req, res, next) => {
    try {
      const { limit } = historyQuerySchema.parse(req.query);
      const history = await loadHistory(store, historyCollection, limit);
      if (!history.ok) {
        logger.warn(
          { err: history.error, collection: historyCollection },
          "Failed to read QR history"
        );
        res.json([]);
        return;
      }
      res.json(history.value);
    } catch (error) {
      if (error instanceof z.ZodError) {
        invalidRequest(res, error);
      } else {
        next(error);
      }
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: "Not Found" });
  });

  // Error handling middleware
  app.use(
    (err: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(err);
        return;
      }

      const rejected = clientError(err);
      if (rejected) {
        res.status(rejected.status).json({ detail: rejected.detail });
        return;
      }

      logger.error(
        {
          err,
          path: req.path,
          method: req.method,
        },
        "Express error"
      );

      res
        .status(500)
        .json({ detail: "Internal server error. See server logs." });
    }
  );

  return app;
}
