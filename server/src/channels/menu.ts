import type { QuickReply } from "../shared/types.js";
import type { ChatStore } from "../store/types.js";
import { formatUnknownError } from "../shared/errors.js";

export const QUICK_MENU_HEADER = "Quick options:";
export const QUICK_MENU_MAX_ITEMS = 8;
export const MAX_OUTBOUND_QUICK_REPLIES = 10;

export type OutboundQuickReply = { id: string; title: string };

export const toOutboundQuickReplies = (items: QuickReply[]): OutboundQuickReply[] =>
  items
    .map((item) => ({ id: String(item.id).trim(), title: item.title.trim() }))
    .filter((item) => item.id && item.title)
    .slice(0, MAX_OUTBOUND_QUICK_REPLIES);

/** Appends a numbered `1) Label` menu to the reply; unchanged when there are no labels. */
export const formatQuickReplyMenuText = (text: string, titles: string[]) => {
  const labels = titles.map((title) => title.trim()).filter(Boolean);
  if (labels.length === 0) return text;
  const lines = [text, "", QUICK_MENU_HEADER];
  labels.slice(0, QUICK_MENU_MAX_ITEMS).forEach((label, index) => {
    lines.push(`${index + 1}) ${label}`);
  });
  return lines.join("\n");
};

const INTEGER_TEXT = /^\s*\d+\s*$/;

/**
 * Channels echo a quick reply back as its id. Maps such an id to the
 * payload text of the tenant's active quick reply; anything else passes through.
 */
export const resolveQuickReplyText = async (store: ChatStore, tenantId: string, text: string) => {
  if (!INTEGER_TEXT.test(text)) return text;
  try {
    const quickReply = await store.getQuickReply(String(Number.parseInt(text, 10)));
    if (quickReply && quickReply.tenantId === tenantId && quickReply.isActive) {
      return quickReply.payloadText;
    }
  } catch (error) {
    console.warn(`Quick reply lookup failed for tenant ${tenantId}:`, formatUnknownError(error));
  }
  return text;
};
