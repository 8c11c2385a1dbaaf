import { describe, expect, it } from "vitest";
import type { ChannelIntegration, QuickReply } from "../shared/types.js";
import { createFakeAdapter } from "../../test/helpers/fakeHttp.js";
import {
  createInstagramAdapter,
  createMessengerAdapter,
  metaObjectChannel,
  parseMetaPageWebhook,
} from "./meta.js";

const quickReplies: QuickReply[] = [
  { id: "11", tenantId: "t1", title: "Opening hours", payloadText: "hours", sortOrder: 1, isActive: true },
  { id: "12", tenantId: "t1", title: "Talk to a human please", payloadText: "human", sortOrder: 2, isActive: true },
];

const pageIntegration = (channelType: "messenger" | "instagram"): ChannelIntegration => ({
  id: `int-${channelType}`,
  tenantId: "t1",
  channelType,
  externalId: "page-1",
  accessToken: "test-token",
  verifyToken: `verify-${channelType}`,
  isActive: true,
});

describe("metaObjectChannel", () => {
  it("maps Graph webhook objects to channels", () => {
    expect(metaObjectChannel({ object: "whatsapp_business_account" })).toBe("whatsapp");
    expect(metaObjectChannel({ object: "page" })).toBe("messenger");
    expect(metaObjectChannel({ object: "instagram" })).toBe("instagram");
    expect(metaObjectChannel({ object: "user" })).toBeNull();
    expect(metaObjectChannel("nope")).toBeNull();
  });
});

describe("parseMetaPageWebhook", () => {
  it("reads text and quick reply payloads per entry", () => {
    const inbound = parseMetaPageWebhook(
      {
        object: "page",
        entry: [
          {
            id: "page-1",
            messaging: [
              { sender: { id: "u1" }, message: { text: "hello" } },
              { sender: { id: "u2" }, message: { quick_reply: { payload: "11" } } },
              { sender: { id: "u3" }, delivery: { watermark: 1 } },
            ],
          },
          { messaging: [{ sender: { id: "u4" }, message: { text: "no page id" } }] },
        ],
      },
      "messenger"
    );

    expect(inbound).toEqual([
      { channel: "messenger", routingKey: "page-1", senderId: "u1", text: "hello" },
      { channel: "messenger", routingKey: "page-1", senderId: "u2", text: "11" },
    ]);
  });
});

describe("page adapters", () => {
  it("sends Messenger quick replies with the id as payload", async () => {
    const fake = createFakeAdapter(() => ({ status: 200 }));
    const adapter = createMessengerAdapter({ graphVersion: "v21.0", adapter: fake.adapter });

    await adapter.send(pageIntegration("messenger"), { recipientId: "u1", text: "Hi", quickReplies });

    const [request] = fake.requests;
    expect(request?.url).toBe("/me/messages");
    expect(request?.params).toEqual({ access_token: "test-token" });
    expect(request?.body).toEqual({
      messaging_type: "RESPONSE",
      recipient: { id: "u1" },
      message: {
        text: "Hi",
        quick_replies: [
          { content_type: "text", title: "Opening hours", payload: "11" },
          { content_type: "text", title: "Talk to a human plea", payload: "12" },
        ],
      },
    });
  });

  it("never sends quick_replies to Instagram and appends the menu instead", async () => {
    const fake = createFakeAdapter(() => ({ status: 200 }));
    const adapter = createInstagramAdapter({ graphVersion: "v21.0", adapter: fake.adapter });

    await adapter.send(pageIntegration("instagram"), { recipientId: "u1", text: "Hi", quickReplies });

    expect(adapter.channel).toBe("instagram");

    expect(fake.requests[0]?.body).toEqual({
      messaging_type: "RESPONSE",
      recipient: { id: "u1" },
      message: {
        text: "Hi\n\nQuick options:\n1) Opening hours\n2) Talk to a human please",
      },
    });
  });

  it("skips integrations without a page token", async () => {
    const fake = createFakeAdapter(() => ({ status: 200 }));
    const adapter = createMessengerAdapter({ graphVersion: "v21.0", adapter: fake.adapter });

    await adapter.send(
      { ...pageIntegration("messenger"), accessToken: null },
      { recipientId: "u1", text: "Hi", quickReplies: [] }
    );
    expect(fake.requests).toHaveLength(0);
  });
});
