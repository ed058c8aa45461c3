import { Api } from "grammy";
import { type ChannelAdapter, DeliveryError, errorMessage } from "@tidewire/core";
import { parseTelegramUpdate, TELEGRAM_CHANNEL_ID } from "./update.js";

export { parseTelegramUpdate, TelegramUpdateSchema, TELEGRAM_CHANNEL_ID } from "./update.js";
export type { TelegramUpdate } from "./update.js";

/** Telegram rejects messages longer than this. */
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

export interface TelegramChannelOptions {
  token?: string;
  /** Upper bound on each Bot API call. */
  timeoutSeconds?: number;
  /** Preconfigured client; built from `token` when absent. */
  api?: Api;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split a reply into chunks Telegram accepts, preferring line breaks.
 */
export function splitMessage(text: string, limit = TELEGRAM_MAX_MESSAGE_LENGTH): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const newline = rest.lastIndexOf("\n", limit);
    if (newline > 0) {
      chunks.push(rest.slice(0, newline));
      rest = rest.slice(newline + 1);
      continue;
    }
    // Never separate a surrogate pair.
    const cut = limit > 1 && isHighSurrogate(rest.charCodeAt(limit - 1)) ? limit - 1 : limit;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  chunks.push(rest);
  return chunks;
}

/**
 * Telegram channel over the Bot API webhook. Updates arrive through the
 * gateway's HTTP server; replies go out with grammy's Api client.
 */
export function createTelegramChannel(options: TelegramChannelOptions = {}): ChannelAdapter {
  const api =
    options.api ??
    (options.token
      ? new Api(options.token, { timeoutSeconds: options.timeoutSeconds })
      : undefined);

  return {
    id: TELEGRAM_CHANNEL_ID,

    parseUpdate: parseTelegramUpdate,

    isConfigured(): boolean {
      return api !== undefined;
    },

    async sendMessage(chatId: string, text: string): Promise<void> {
      if (!api) {
        throw new DeliveryError("Telegram bot token is not configured");
      }
      try {
        for (const chunk of splitMessage(text)) {
          await api.sendMessage(chatId, chunk);
        }
      } catch (err) {
        throw new DeliveryError(`Telegram sendMessage failed: ${errorMessage(err)}`, err);
      }
    },
  };
}

export interface SetWebhookOptions {
  token: string;
  url: string;
  /** Echoed back by Telegram in X-Telegram-Bot-Api-Secret-Token. */
  secret?: string;
  api?: Api;
}

/**
 * Point the bot's webhook at `url`, subscribing to new and edited messages.
 */
export async function setTelegramWebhook(options: SetWebhookOptions): Promise<void> {
  const api = options.api ?? new Api(options.token);
  await api.setWebhook(options.url, {
    allowed_updates: ["message", "edited_message"],
    ...(options.secret && { secret_token: options.secret }),
  });
}
