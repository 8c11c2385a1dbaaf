import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import type { ChannelIntegration } from "../shared/types.js";
import type { ChannelAdapter, InboundMessage, OutboundMessage } from "./types.js";
import {
  TELEGRAM_API_BASE_URL,
  TELEGRAM_TIMEOUT_MS,
  createChannelHttp,
  idToString,
  mapChannelError,
} from "./http.js";
import { QUICK_MENU_MAX_ITEMS } from "./menu.js";

const TelegramUpdateSchema = z.object({
  message: z
    .object({
      text: z.string().nullish(),
      chat: z.object({ id: z.union([z.number(), z.string()]).nullish() }).nullish(),
    })
    .nullish(),
});

/** A Telegram update carries at most one message; updates without text or chat are ignored. */
export const parseTelegramUpdate = (payload: unknown, routingKey: string): InboundMessage[] => {
  const parsed = TelegramUpdateSchema.safeParse(payload);
  if (!parsed.success) return [];
  const text = parsed.data.message?.text;
  const chatId = parsed.data.message?.chat?.id;
  if (!text || !chatId) return [];
  return [{ channel: "telegram", routingKey, senderId: idToString(chatId), text }];
};

export type TelegramSendPayload = {
  chat_id: number | string;
  text: string;
  reply_markup?: {
    keyboard: Array<Array<{ text: string }>>;
    resize_keyboard: boolean;
    one_time_keyboard: boolean;
    selective: boolean;
  };
};

/** Reply keyboard with one label per row, so a tap sends the label as plain text. */
export const buildTelegramPayload = (
  chatId: string,
  text: string,
  labels: string[]
): TelegramSendPayload => {
  const payload: TelegramSendPayload = {
    chat_id: /^-?\d+$/.test(chatId) ? Number(chatId) : chatId,
    text,
  };
  const keyboard = labels
    .map((label) => label.trim())
    .filter(Boolean)
    .slice(0, QUICK_MENU_MAX_ITEMS)
    .map((label) => [{ text: label }]);
  if (keyboard.length > 0) {
    payload.reply_markup = {
      keyboard,
      resize_keyboard: true,
      one_time_keyboard: false,
      selective: false,
    };
  }
  return payload;
};

export const sendTelegramMessage = async (
  http: AxiosInstance,
  botToken: string,
  payload: TelegramSendPayload
) => {
  try {
    await http.post(`/bot${botToken}/sendMessage`, payload);
  } catch (error) {
    throw mapChannelError("telegram", error);
  }
};

export const createTelegramAdapter = (options: { adapter?: AxiosAdapter } = {}): ChannelAdapter => {
  const http = createChannelHttp({
    baseURL: TELEGRAM_API_BASE_URL,
    timeoutMs: TELEGRAM_TIMEOUT_MS,
    adapter: options.adapter,
  });

  const send = async (integration: ChannelIntegration, message: OutboundMessage) => {
    const botToken = integration.accessToken?.trim();
    if (!botToken) {
      console.warn(`Telegram integration ${integration.id} has no bot token; reply not sent.`);
      return;
    }
    const labels = message.quickReplies.map((item) => item.title);
    await sendTelegramMessage(http, botToken, buildTelegramPayload(message.recipientId, message.text, labels));
  };

  return { channel: "telegram", resolvesQuickReplyIds: false, send };
};
