import type { ChannelIntegration, ChannelType, QuickReply } from "../shared/types.js";

/** One normalized inbound message, before tenant lookup. */
export type InboundMessage = {
  channel: ChannelType;
  /** Provider-side id that selects the integration (phone number id, page id, verify token). */
  routingKey: string;
  senderId: string;
  text: string;
};

export type OutboundMessage = {
  recipientId: string;
  text: string;
  quickReplies: QuickReply[];
};

export type ChannelAdapter = {
  channel: ChannelType;
  /** Whether inbound text that is a quick-reply id is swapped for its payload text. */
  resolvesQuickReplyIds: boolean;
  /** Delivers a reply. Rejects with an `ExternalApiError` or `TimeoutError`. */
  send: (integration: ChannelIntegration, message: OutboundMessage) => Promise<void>;
};

export type ChannelRegistry = Record<ChannelType, ChannelAdapter>;
