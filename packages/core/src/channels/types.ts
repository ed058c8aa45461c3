/**
 * A chat message pulled out of a channel's webhook update.
 */
export interface InboundMessage {
  /** Channel identifier, first segment of the session key (e.g. "telegram"). */
  channel: string;
  chatId: string;
  /** Platform chat type ("private", "group", ...). */
  chatType: string;
  senderId: string;
  text: string;
  /** Channel-specific fields kept on the stored user message. */
  metadata: Record<string, unknown>;
}

/**
 * Messaging integration the orchestrator reads updates from and replies
 * through.
 */
export interface ChannelAdapter {
  readonly id: string;
  /**
   * Extract the message from a raw webhook update. Returns undefined for
   * updates that carry no text message.
   */
  parseUpdate(raw: unknown): InboundMessage | undefined;
  /** Deliver a text reply. Rejects with DeliveryError on failure. */
  sendMessage(chatId: string, text: string): Promise<void>;
  /** Whether the channel has the credentials it needs to send. */
  isConfigured(): boolean;
}
