import type { ChatSender, DeliveryReceipt } from "../interfaces/chat-sender.js";
import type { Logger } from "../interfaces/logger.js";
import { formatUserRef } from "../types/identity.js";
import type { OutboundMessage } from "../types/relay.js";

/**
 * Writes outbound chat to the log instead of the platform. Used when no chat
 * credentials are configured.
 */
export class LogChatSender implements ChatSender {
  constructor(private readonly logger: Logger) {}

  async send(message: OutboundMessage): Promise<DeliveryReceipt> {
    this.logger.info("Outbound chat message (not sent, no chat credentials)", {
      component: "relay",
      author: message.author ? formatUserRef(message.author) : "bot",
      content: message.content,
    });
    return { sent: true };
  }
}
