import type { ConversationResolver } from "../conversation/resolver.js";
import type { LeadExtractor } from "../leads/extractor.js";
import { resolveQuickReplyText } from "../channels/menu.js";
import { metaObjectChannel, parseMetaPageWebhook } from "../channels/meta.js";
import { parseTelegramUpdate } from "../channels/telegram.js";
import type { ChannelRegistry, InboundMessage } from "../channels/types.js";
import { parseWhatsAppWebhook } from "../channels/whatsapp.js";
import { formatUnknownError } from "../shared/errors.js";
import type { BackgroundQueue } from "../shared/queue.js";
import type { ChannelIntegration, ChatResult, QuickReply } from "../shared/types.js";
import type { ChatStore } from "../store/types.js";

export type WebhookAck = { status: "ok" | "ignored" | "not_found" };

export type MetaVerifyQuery = {
  mode?: string;
  verifyToken?: string;
  challenge?: string;
};

export type MetaVerification =
  | { kind: "verified"; challenge: string }
  | { kind: "invalid_request" }
  | { kind: "forbidden" };

export type DirectChatInput = {
  tenantApiKey: string;
  message: string;
  senderId?: string | null;
};

export const DIRECT_CHAT_MESSAGES = {
  invalidKey: "Invalid tenant_api_key",
  unavailable: "Sorry, the assistant is unavailable right now. Please try again later.",
} as const;

export type WebhookService = {
  handleTelegram: (verifyToken: string, payload: unknown) => Promise<WebhookAck>;
  verifyMeta: (query: MetaVerifyQuery) => Promise<MetaVerification>;
  handleMeta: (payload: unknown) => Promise<WebhookAck>;
  handleDirectChat: (input: DirectChatInput) => Promise<ChatResult>;
};

const META_VERIFY_CHANNELS = ["whatsapp", "messenger", "instagram"] as const;

/**
 * Turns inbound webhooks into replies. The reply is computed inline; lead
 * capture and delivery to the channel run on the background queue.
 */
export const createWebhookService = (deps: {
  store: ChatStore;
  resolver: ConversationResolver;
  leadExtractor: LeadExtractor;
  channels: ChannelRegistry;
  queue: BackgroundQueue;
}): WebhookService => {
  const { store, resolver, leadExtractor, channels, queue } = deps;

  const listQuickReplies = async (tenantId: string): Promise<QuickReply[]> => {
    try {
      return await store.listActiveQuickReplies(tenantId);
    } catch (error) {
      console.warn(`Quick replies unavailable for tenant ${tenantId}:`, formatUnknownError(error));
      return [];
    }
  };

  const enqueueLeadCapture = (tenantId: string, userMessage: string, senderId?: string | null) => {
    queue.enqueue(`lead-capture:${tenantId}`, () =>
      leadExtractor.detectAndSaveLead({ tenantId, userMessage, senderId })
    );
  };

  const handleInbound = async (integration: ChannelIntegration, inbound: InboundMessage) => {
    const { tenantId } = integration;
    const adapter = channels[integration.channelType];
    const message = adapter.resolvesQuickReplyIds
      ? await resolveQuickReplyText(store, tenantId, inbound.text)
      : inbound.text;

    const result = await resolver.resolve({ tenantId, senderId: inbound.senderId, message });
    enqueueLeadCapture(tenantId, message, inbound.senderId);

    const quickReplies = await listQuickReplies(tenantId);
    queue.enqueue(`deliver:${integration.channelType}:${integration.id}`, () =>
      adapter.send(integration, { recipientId: inbound.senderId, text: result.response, quickReplies })
    );
  };

  const handleEach = async (integration: ChannelIntegration, inbound: InboundMessage) => {
    try {
      await handleInbound(integration, inbound);
    } catch (error) {
      console.error(
        `Inbound ${inbound.channel} message for tenant ${integration.tenantId} failed:`,
        formatUnknownError(error)
      );
    }
  };

  const handleTelegram = async (verifyToken: string, payload: unknown): Promise<WebhookAck> => {
    let integration: ChannelIntegration | null;
    try {
      integration = await store.getIntegrationByVerifyToken(verifyToken, ["telegram"]);
    } catch (error) {
      console.error("Telegram integration lookup failed:", formatUnknownError(error));
      return { status: "ignored" };
    }
    if (!integration || !integration.isActive) return { status: "not_found" };

    const inbound = parseTelegramUpdate(payload, verifyToken);
    if (inbound.length === 0) return { status: "ignored" };

    for (const message of inbound) {
      await handleEach(integration, message);
    }
    return { status: "ok" };
  };

  const verifyMeta = async (query: MetaVerifyQuery): Promise<MetaVerification> => {
    if (query.mode !== "subscribe" || !query.verifyToken || !query.challenge) {
      return { kind: "invalid_request" };
    }
    try {
      const integration = await store.getIntegrationByVerifyToken(query.verifyToken, [
        ...META_VERIFY_CHANNELS,
      ]);
      if (!integration || !integration.isActive) return { kind: "forbidden" };
      return { kind: "verified", challenge: query.challenge };
    } catch (error) {
      console.error("Meta verify token lookup failed:", formatUnknownError(error));
      return { kind: "forbidden" };
    }
  };

  const handleMeta = async (payload: unknown): Promise<WebhookAck> => {
    const channel = metaObjectChannel(payload);
    if (!channel) return { status: "ignored" };

    const inbound =
      channel === "whatsapp" ? parseWhatsAppWebhook(payload) : parseMetaPageWebhook(payload, channel);

    for (const message of inbound) {
      try {
        const integration = await store.getIntegrationByExternalId(channel, message.routingKey);
        if (!integration || !integration.isActive) continue;
        await handleEach(integration, message);
      } catch (error) {
        console.error(`Integration lookup for ${channel} ${message.routingKey} failed:`, formatUnknownError(error));
      }
    }
    return { status: "ok" };
  };

  const handleDirectChat = async (input: DirectChatInput): Promise<ChatResult> => {
    let tenantId: string;
    try {
      const tenant = await store.getTenantByApiKey(input.tenantApiKey);
      if (!tenant) return { response: DIRECT_CHAT_MESSAGES.invalidKey, source: "bot" };
      tenantId = tenant.id;
    } catch (error) {
      console.error("Tenant lookup by API key failed:", formatUnknownError(error));
      return { response: DIRECT_CHAT_MESSAGES.unavailable, source: "bot" };
    }

    const senderId = input.senderId?.trim() || null;
    const result = await resolver.resolve({ tenantId, senderId, message: input.message });
    enqueueLeadCapture(tenantId, input.message, senderId);
    return result;
  };

  return { handleTelegram, verifyMeta, handleMeta, handleDirectChat };
};
