import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import type { ChannelIntegration, ChannelType } from "../shared/types.js";
import type { ChannelAdapter, InboundMessage, OutboundMessage } from "./types.js";
import {
  META_TIMEOUT_MS,
  createChannelHttp,
  graphApiBaseUrl,
  idToString,
  mapChannelError,
  parseItems,
} from "./http.js";
import { formatQuickReplyMenuText, toOutboundQuickReplies, type OutboundQuickReply } from "./menu.js";

export type MetaChannel = Exclude<ChannelType, "telegram">;
export type PageChannel = Exclude<MetaChannel, "whatsapp">;

const MESSENGER_MAX_QUICK_REPLIES = 10;

/** Maps the `object` field of a Graph webhook to the channel it belongs to. */
export const metaObjectChannel = (payload: unknown): MetaChannel | null => {
  const parsed = z.object({ object: z.string().nullish() }).safeParse(payload);
  const object = parsed.success ? parsed.data.object : null;
  if (object === "whatsapp_business_account") return "whatsapp";
  if (object === "page") return "messenger";
  if (object === "instagram") return "instagram";
  return null;
};

const MessagingEventSchema = z.object({
  sender: z.object({ id: z.union([z.string(), z.number()]).nullish() }).nullish(),
  message: z
    .object({
      text: z.string().nullish(),
      quick_reply: z.object({ payload: z.string().nullish() }).nullish(),
    })
    .nullish(),
});

const PageEntrySchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  messaging: z.array(z.unknown()).nullish(),
});

const EnvelopeSchema = z.object({
  entry: z.array(z.unknown()).nullish(),
});

/** Messenger and Instagram events; a quick reply tap arrives as `quick_reply.payload`. */
export const parseMetaPageWebhook = (payload: unknown, channel: PageChannel): InboundMessage[] => {
  const envelope = EnvelopeSchema.safeParse(payload);
  if (!envelope.success) return [];

  const inbound: InboundMessage[] = [];
  for (const entry of parseItems(PageEntrySchema, envelope.data.entry)) {
    const pageId = idToString(entry.id);
    if (!pageId) continue;
    for (const event of parseItems(MessagingEventSchema, entry.messaging)) {
      const senderId = idToString(event.sender?.id);
      const text = event.message?.text || event.message?.quick_reply?.payload;
      if (!senderId || !text) continue;
      inbound.push({ channel, routingKey: pageId, senderId, text });
    }
  }
  return inbound;
};

export type PageMessagePayload = {
  messaging_type: "RESPONSE";
  recipient: { id: string };
  message: {
    text: string;
    quick_replies?: Array<{ content_type: "text"; title: string; payload: string }>;
  };
};

export const buildPageMessage = (
  recipientId: string,
  text: string,
  quickReplies: OutboundQuickReply[] = []
): PageMessagePayload => {
  const payload: PageMessagePayload = {
    messaging_type: "RESPONSE",
    recipient: { id: recipientId },
    message: { text },
  };
  if (quickReplies.length > 0) {
    payload.message.quick_replies = quickReplies.slice(0, MESSENGER_MAX_QUICK_REPLIES).map((item) => ({
      content_type: "text" as const,
      title: item.title.slice(0, 20),
      payload: item.id.slice(0, 512),
    }));
  }
  return payload;
};

/** Instagram has no quick replies; the labels become a numbered menu in the text. */
export const buildInstagramMessage = (
  recipientId: string,
  text: string,
  quickReplies: OutboundQuickReply[]
): PageMessagePayload =>
  buildPageMessage(
    recipientId,
    formatQuickReplyMenuText(
      text,
      quickReplies.map((item) => item.title)
    )
  );

export const sendPageMessage = async (
  http: AxiosInstance,
  channel: PageChannel,
  pageAccessToken: string,
  payload: PageMessagePayload
) => {
  try {
    await http.post("/me/messages", payload, { params: { access_token: pageAccessToken } });
  } catch (error) {
    throw mapChannelError(channel, error);
  }
};

type PageAdapterOptions = {
  graphVersion: string;
  adapter?: AxiosAdapter;
};

const createGraphHttp = (options: PageAdapterOptions) =>
  createChannelHttp({
    baseURL: graphApiBaseUrl(options.graphVersion),
    timeoutMs: META_TIMEOUT_MS,
    adapter: options.adapter,
  });

const pageAccessTokenOf = (channel: PageChannel, integration: ChannelIntegration, message: OutboundMessage) => {
  const pageAccessToken = integration.accessToken?.trim();
  if (!pageAccessToken || !message.recipientId) {
    console.warn(`${channel} integration ${integration.id} has no page access token; reply not sent.`);
    return null;
  }
  return pageAccessToken;
};

export const createMessengerAdapter = (options: PageAdapterOptions): ChannelAdapter => {
  const http = createGraphHttp(options);

  const send = async (integration: ChannelIntegration, message: OutboundMessage) => {
    const pageAccessToken = pageAccessTokenOf("messenger", integration, message);
    if (!pageAccessToken) return;
    const payload = buildPageMessage(
      message.recipientId,
      message.text,
      toOutboundQuickReplies(message.quickReplies)
    );
    await sendPageMessage(http, "messenger", pageAccessToken, payload);
  };

  return { channel: "messenger", resolvesQuickReplyIds: true, send };
};

export const createInstagramAdapter = (options: PageAdapterOptions): ChannelAdapter => {
  const http = createGraphHttp(options);

  const send = async (integration: ChannelIntegration, message: OutboundMessage) => {
    const pageAccessToken = pageAccessTokenOf("instagram", integration, message);
    if (!pageAccessToken) return;
    const payload = buildInstagramMessage(
      message.recipientId,
      message.text,
      toOutboundQuickReplies(message.quickReplies)
    );
    await sendPageMessage(http, "instagram", pageAccessToken, payload);
  };

  return { channel: "instagram", resolvesQuickReplyIds: true, send };
};
