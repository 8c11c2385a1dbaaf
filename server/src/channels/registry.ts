import type { AxiosAdapter } from "axios";
import type { ChannelRegistry } from "./types.js";
import { createInstagramAdapter, createMessengerAdapter } from "./meta.js";
import { createTelegramAdapter } from "./telegram.js";
import { createWhatsAppAdapter } from "./whatsapp.js";

export const createChannelRegistry = (options: {
  graphVersion: string;
  adapter?: AxiosAdapter;
}): ChannelRegistry => ({
  telegram: createTelegramAdapter({ adapter: options.adapter }),
  whatsapp: createWhatsAppAdapter(options),
  messenger: createMessengerAdapter(options),
  instagram: createInstagramAdapter(options),
});
