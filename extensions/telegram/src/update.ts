import type { InboundMessage } from "@tidewire/core";
import { z } from "zod";

export const TELEGRAM_CHANNEL_ID = "telegram";

/**
 * The part of a Telegram Update the gateway reads. Unknown fields pass
 * through untouched.
 */
const TelegramMessageSchema = z.object({
  message_id: z.number().int().optional(),
  chat: z.object({
    id: z.number().int(),
    type: z.string(),
  }),
  from: z.object({ id: z.number().int() }).optional(),
  text: z.string().optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int().optional(),
  message: TelegramMessageSchema.optional(),
  edited_message: TelegramMessageSchema.optional(),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

/**
 * Pull the text message out of an update, preferring `message` over
 * `edited_message`. Updates without text (stickers, joins, callback
 * queries, malformed payloads) yield undefined.
 */
export function parseTelegramUpdate(raw: unknown): InboundMessage | undefined {
  const result = TelegramUpdateSchema.safeParse(raw);
  if (!result.success) return undefined;

  const message = result.data.message ?? result.data.edited_message;
  if (!message?.text) return undefined;

  const chatId = String(message.chat.id);
  return {
    channel: TELEGRAM_CHANNEL_ID,
    chatId,
    chatType: message.chat.type,
    // Channel posts have no sender; the chat stands in for it.
    senderId: message.from ? String(message.from.id) : chatId,
    text: message.text,
    metadata:
      message.message_id === undefined ? {} : { telegram_message_id: message.message_id },
  };
}
