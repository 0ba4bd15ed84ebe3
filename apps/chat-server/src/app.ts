import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { z } from "zod";
import type { Logger } from "pino";
import type { Gateway } from "@concierge/types";
import { makeNoopLogger } from "@concierge/core";

export const MAX_MESSAGE_LENGTH = 4000;

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1).max(MAX_MESSAGE_LENGTH),
  session_id: z.string().max(128).optional(),
});

export interface AppOptions {
  gateway: Gateway;
  /** CORS allow-list. */
  allowedOrigins: string[];
  logger?: Logger;
}

export function createApp(opts: AppOptions): express.Express {
  const log = (opts.logger ?? makeNoopLogger()).child({ component: "http" });
  const app = express();

  app.use(cors({ origin: opts.allowedOrigins, methods: ["GET", "POST"] }));
  app.use(express.json({ limit: "64kb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/api/chat", (req, res, next) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid request",
        issues: parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`),
      });
      return;
    }

    opts.gateway
      .handleMessage(parsed.data.message, parsed.data.session_id)
      .then((reply) => {
        res.status(reply.status).json({ response: reply.response, session_id: reply.sessionId });
      })
      .catch(next);
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON bodies land here as well as anything a route passed on.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: "Invalid JSON body" });
      return;
    }
    log.error({ err }, "request failed");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}
