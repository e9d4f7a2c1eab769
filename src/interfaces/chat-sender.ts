import type { OutboundMessage } from "../types/relay.js";

export interface DeliveryReceipt {
  sent: boolean;
  /** Platform message id, fed to the echo guard. */
  messageId?: string;
  dropReason?: string;
}

/** Delivers outbound chat payloads to the stream platform. */
export interface ChatSender {
  /** `signal` aborts a request still in flight on timeout or shutdown. */
  send(message: OutboundMessage, signal?: AbortSignal): Promise<DeliveryReceipt>;
}
