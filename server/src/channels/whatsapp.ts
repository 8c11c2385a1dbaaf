import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import type { ChannelIntegration } from "../shared/types.js";
import { formatUnknownError } from "../shared/errors.js";
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

export const WHATSAPP_MAX_BUTTONS = 3;
export const WHATSAPP_MAX_LIST_ROWS = 10;
export const WHATSAPP_LIST_BUTTON_LABEL = "Choose";
export const WHATSAPP_LIST_SECTION_TITLE = "Quick menu";

const ReplySchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
});

const WhatsAppMessageSchema = z.object({
  from: z.union([z.string(), z.number()]).nullish(),
  type: z.string().nullish(),
  text: z.object({ body: z.string().nullish() }).nullish(),
  button: z.object({ text: z.string().nullish() }).nullish(),
  interactive: z
    .object({
      type: z.string().nullish(),
      button_reply: ReplySchema.nullish(),
      list_reply: ReplySchema.nullish(),
    })
    .nullish(),
});

type WhatsAppMessage = z.infer<typeof WhatsAppMessageSchema>;

const WhatsAppChangeSchema = z.object({
  value: z
    .object({
      metadata: z
        .object({ phone_number_id: z.union([z.string(), z.number()]).nullish() })
        .nullish(),
      messages: z.array(z.unknown()).nullish(),
    })
    .nullish(),
});

const EntrySchema = z.object({
  changes: z.array(z.unknown()).nullish(),
});

const EnvelopeSchema = z.object({
  entry: z.array(z.unknown()).nullish(),
});

const replyText = (reply: z.infer<typeof ReplySchema> | null | undefined) =>
  reply?.id || reply?.title || null;

/** Text carried by one WhatsApp message, by message type. */
export const whatsAppMessageText = (message: WhatsAppMessage): string | null => {
  const type = (message.type ?? "").trim().toLowerCase();
  if (type === "text") return message.text?.body || null;
  if (type === "button") return message.button?.text || null;
  if (type === "interactive") {
    const interactiveType = (message.interactive?.type ?? "").trim().toLowerCase();
    if (interactiveType === "button_reply") return replyText(message.interactive?.button_reply);
    if (interactiveType === "list_reply") return replyText(message.interactive?.list_reply);
  }
  return null;
};

export const parseWhatsAppWebhook = (payload: unknown): InboundMessage[] => {
  const envelope = EnvelopeSchema.safeParse(payload);
  if (!envelope.success) return [];

  const inbound: InboundMessage[] = [];
  for (const entry of parseItems(EntrySchema, envelope.data.entry)) {
    for (const change of parseItems(WhatsAppChangeSchema, entry.changes)) {
      const phoneNumberId = idToString(change.value?.metadata?.phone_number_id);
      for (const message of parseItems(WhatsAppMessageSchema, change.value?.messages)) {
        const text = whatsAppMessageText(message);
        const from = idToString(message.from);
        if (!phoneNumberId || !text || !from) continue;
        inbound.push({ channel: "whatsapp", routingKey: phoneNumberId, senderId: from, text });
      }
    }
  }
  return inbound;
};

export type WhatsAppTextPayload = {
  messaging_product: "whatsapp";
  to: string;
  type: "text";
  text: { body: string };
};

export type WhatsAppInteractivePayload = {
  messaging_product: "whatsapp";
  to: string;
  type: "interactive";
  interactive:
    | {
        type: "button";
        body: { text: string };
        action: { buttons: Array<{ type: "reply"; reply: OutboundQuickReply }> };
      }
    | {
        type: "list";
        body: { text: string };
        action: {
          button: string;
          sections: Array<{ title: string; rows: OutboundQuickReply[] }>;
        };
      };
};

export const buildWhatsAppText = (to: string, text: string): WhatsAppTextPayload => ({
  messaging_product: "whatsapp",
  to,
  type: "text",
  text: { body: text },
});

/** Buttons for up to three quick replies, a single-section list beyond that. */
export const buildWhatsAppInteractive = (
  to: string,
  bodyText: string,
  items: OutboundQuickReply[]
): WhatsAppInteractivePayload => {
  if (items.length <= WHATSAPP_MAX_BUTTONS) {
    return {
      messaging_product: "whatsapp",
      to,
      type: "interactive",
      interactive: {
        type: "button",
        body: { text: bodyText },
        action: {
          buttons: items.slice(0, WHATSAPP_MAX_BUTTONS).map((item) => ({
            type: "reply" as const,
            reply: { id: item.id.slice(0, 200), title: item.title.slice(0, 20) },
          })),
        },
      },
    };
  }

  return {
    messaging_product: "whatsapp",
    to,
    type: "interactive",
    interactive: {
      type: "list",
      body: { text: bodyText },
      action: {
        button: WHATSAPP_LIST_BUTTON_LABEL,
        sections: [
          {
            title: WHATSAPP_LIST_SECTION_TITLE,
            rows: items.slice(0, WHATSAPP_MAX_LIST_ROWS).map((item) => ({
              id: item.id.slice(0, 200),
              title: item.title.slice(0, 24),
            })),
          },
        ],
      },
    },
  };
};

const postMessage = async (
  http: AxiosInstance,
  accessToken: string,
  phoneNumberId: string,
  payload: WhatsAppTextPayload | WhatsAppInteractivePayload
) => {
  try {
    await http.post(`/${phoneNumberId}/messages`, payload, { params: { access_token: accessToken } });
  } catch (error) {
    throw mapChannelError("whatsapp", error);
  }
};

/** Interactive first; any failure, or no quick replies, sends text with the numbered menu. */
export const sendWhatsAppReply = async (
  http: AxiosInstance,
  target: { accessToken: string; phoneNumberId: string; to: string },
  message: { text: string; quickReplies: OutboundQuickReply[] }
) => {
  const { accessToken, phoneNumberId, to } = target;

  if (message.quickReplies.length > 0) {
    try {
      await postMessage(
        http,
        accessToken,
        phoneNumberId,
        buildWhatsAppInteractive(to, message.text, message.quickReplies)
      );
      return;
    } catch (error) {
      console.warn(
        `WhatsApp interactive send to ${phoneNumberId} failed, sending text menu:`,
        formatUnknownError(error)
      );
    }
  }

  const text = formatQuickReplyMenuText(
    message.text,
    message.quickReplies.map((item) => item.title)
  );
  await postMessage(http, accessToken, phoneNumberId, buildWhatsAppText(to, text));
};

export const createWhatsAppAdapter = (options: {
  graphVersion: string;
  adapter?: AxiosAdapter;
}): ChannelAdapter => {
  const http = createChannelHttp({
    baseURL: graphApiBaseUrl(options.graphVersion),
    timeoutMs: META_TIMEOUT_MS,
    adapter: options.adapter,
  });

  const send = async (integration: ChannelIntegration, message: OutboundMessage) => {
    const accessToken = integration.accessToken?.trim();
    const phoneNumberId = integration.externalId?.trim();
    if (!accessToken || !phoneNumberId || !message.recipientId) {
      console.warn(`WhatsApp integration ${integration.id} is missing a token or phone number id.`);
      return;
    }
    await sendWhatsAppReply(
      http,
      { accessToken, phoneNumberId, to: message.recipientId },
      { text: message.text, quickReplies: toOutboundQuickReplies(message.quickReplies) }
    );
  };

  return { channel: "whatsapp", resolvesQuickReplyIds: true, send };
};
