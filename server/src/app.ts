import express from "express";
import cors from "cors";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { AppError, formatUnknownError } from "./shared/errors.js";
import type { WebhookService } from "./webhooks/service.js";

const ChatSendSchema = z.object({
  tenant_api_key: z.string().min(1),
  message: z.string().min(1).max(8000),
  sender_id: z.string().trim().min(1).max(255).optional(),
});

const MetaVerifyQuerySchema = z.object({
  "hub.mode": z.string().optional(),
  "hub.verify_token": z.string().optional(),
  "hub.challenge": z.string().optional(),
});

const BODY_REJECTED_TYPES = new Set(["entity.parse.failed", "entity.too.large"]);

/** body-parser failures: malformed JSON or a body over the size limit. */
const isRejectedBody = (error: unknown) =>
  error instanceof Error &&
  "type" in error &&
  typeof error.type === "string" &&
  BODY_REJECTED_TYPES.has(error.type);

export const createApp = (deps: { config: Readonly<AppConfig>; webhooks: WebhookService }) => {
  const { config, webhooks } = deps;

  const app = express();
  app.use(cors({ origin: config.corsOrigins === "*" ? "*" : [...config.corsOrigins] }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/chat/send", async (req, res, next) => {
    try {
      const body = ChatSendSchema.parse(req.body);
      const result = await webhooks.handleDirectChat({
        tenantApiKey: body.tenant_api_key,
        message: body.message,
        senderId: body.sender_id,
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post("/webhooks/telegram/:verifyToken", async (req, res, next) => {
    try {
      const ack = await webhooks.handleTelegram(req.params.verifyToken, req.body);
      if (ack.status === "not_found") {
        res.status(404).json({ detail: "Integration not found" });
        return;
      }
      res.json(ack);
    } catch (error) {
      next(error);
    }
  });

  app.get("/webhooks/meta", async (req, res, next) => {
    try {
      const query = MetaVerifyQuerySchema.safeParse(req.query);
      const verification = await webhooks.verifyMeta(
        query.success
          ? {
              mode: query.data["hub.mode"],
              verifyToken: query.data["hub.verify_token"],
              challenge: query.data["hub.challenge"],
            }
          : {}
      );
      if (verification.kind === "invalid_request") {
        res.status(400).json({ detail: "Invalid verification request" });
        return;
      }
      if (verification.kind === "forbidden") {
        res.status(403).json({ detail: "Invalid verify_token" });
        return;
      }
      res.type("text/plain").send(verification.challenge);
    } catch (error) {
      next(error);
    }
  });

  app.post("/webhooks/meta", async (req, res, next) => {
    try {
      res.json(await webhooks.handleMeta(req.body));
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Webhooks always get a 2xx; an unreadable body is dropped.
    if (req.path.startsWith("/webhooks/") && isRejectedBody(error)) {
      console.warn(`Unreadable webhook body on ${req.path}:`, formatUnknownError(error));
      res.json({ status: "ignored" });
      return;
    }

    if (error instanceof z.ZodError) {
      res.status(400).json({ error: "Invalid input.", details: error.errors });
      return;
    }

    if (error instanceof SyntaxError || isRejectedBody(error)) {
      res.status(400).json({ error: "Invalid JSON body." });
      return;
    }

    if (error instanceof AppError) {
      console.error(`Request failed (${error.name}):`, error.message);
      res.status(500).json({ error: error.userMessage });
      return;
    }

    console.error("Request failed:", formatUnknownError(error));
    res.status(500).json({ error: "Internal server error." });
  });

  return app;
};
