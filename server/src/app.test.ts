import type { AddressInfo } from "net";
import type { Server } from "http";
import axios from "axios";
import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import type { WebhookService } from "./webhooks/service.js";

const webhooks: WebhookService = {
  handleTelegram: async (verifyToken) => ({ status: verifyToken === "known" ? "ok" : "not_found" }),
  verifyMeta: async (query) =>
    query.mode !== "subscribe"
      ? { kind: "invalid_request" }
      : query.verifyToken === "known" && query.challenge
        ? { kind: "verified", challenge: query.challenge }
        : { kind: "forbidden" },
  handleMeta: async () => ({ status: "ignored" }),
  handleDirectChat: async (input) => ({ response: `echo: ${input.message}`, source: "bot" }),
};

let server: Server | null = null;

const start = async () => {
  const app = createApp({ config: loadConfig({}), webhooks });
  const listening = await new Promise<Server>((resolve) => {
    const instance = app.listen(0, "127.0.0.1", () => resolve(instance));
  });
  server = listening;
  const address: AddressInfo | string | null = listening.address();
  const port = address && typeof address === "object" ? address.port : 0;
  return axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
};

afterEach(async () => {
  const current = server;
  server = null;
  if (current) {
    await new Promise<void>((resolve) => current.close(() => resolve()));
  }
});

describe("createApp", () => {
  it("validates /chat/send bodies", async () => {
    const http = await start();

    const ok = await http.post("/chat/send", { tenant_api_key: "k", message: "hi" });
    expect(ok.status).toBe(200);
    expect(ok.data).toEqual({ response: "echo: hi", source: "bot" });

    const invalid = await http.post("/chat/send", { tenant_api_key: "", message: "hi" });
    expect(invalid.status).toBe(400);
    expect(invalid.data.error).toBe("Invalid input.");
  });

  it("answers 404 for an unknown Telegram verify token", async () => {
    const http = await start();

    const unknown = await http.post("/webhooks/telegram/other", { message: {} });
    expect(unknown.status).toBe(404);
    const known = await http.post("/webhooks/telegram/known", { message: {} });
    expect(known.data).toEqual({ status: "ok" });
  });

  it("echoes the Meta challenge as plain text", async () => {
    const http = await start();

    const verified = await http.get("/webhooks/meta", {
      params: { "hub.mode": "subscribe", "hub.verify_token": "known", "hub.challenge": "4242" },
      responseType: "text",
    });
    expect(verified.status).toBe(200);
    expect(verified.headers["content-type"]).toContain("text/plain");
    expect(verified.data).toBe("4242");

    const forbidden = await http.get("/webhooks/meta", {
      params: { "hub.mode": "subscribe", "hub.verify_token": "other", "hub.challenge": "1" },
    });
    expect(forbidden.status).toBe(403);

    const invalid = await http.get("/webhooks/meta", { params: { "hub.mode": "nope" } });
    expect(invalid.status).toBe(400);
  });

  it("acknowledges a webhook whose JSON body is cut off", async () => {
    const http = await start();
    const truncated = '{"object":"page","entry":[';
    const headers = { "Content-Type": "application/json" };

    const meta = await http.post("/webhooks/meta", truncated, { headers, transformRequest: [(body) => body] });
    expect(meta.status).toBe(200);
    expect(meta.data).toEqual({ status: "ignored" });

    const telegram = await http.post("/webhooks/telegram/known", truncated, {
      headers,
      transformRequest: [(body) => body],
    });
    expect(telegram.status).toBe(200);
    expect(telegram.data).toEqual({ status: "ignored" });

    const chat = await http.post("/chat/send", truncated, { headers, transformRequest: [(body) => body] });
    expect(chat.status).toBe(400);
    expect(chat.data).toEqual({ error: "Invalid JSON body." });
  });
});
