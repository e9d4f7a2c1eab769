/**
 * Helix chat sender: typed wrapper around fetch for the Send Chat Message API.
 */

import { z } from "zod";
import { DeliveryError, errorMessage } from "../errors.js";
import type { ChatSender, DeliveryReceipt } from "../interfaces/chat-sender.js";
import type { Logger } from "../interfaces/logger.js";
import { STREAM_PLATFORM } from "../types/identity.js";
import type { OutboundMessage } from "../types/relay.js";
import { noopLogger } from "../utils/noop-logger.js";

export const DEFAULT_HELIX_BASE_URL = "https://api.twitch.tv/helix";
const DEFAULT_RETRY_DELAY_MS = 500;
const TOO_MANY_REQUESTS = 429;

const sendChatResponseSchema = z.object({
  data: z
    .array(
      z.object({
        message_id: z.string(),
        is_sent: z.boolean(),
        drop_reason: z.object({ code: z.string(), message: z.string() }).nullish(),
      }),
    )
    .min(1),
});

export interface HelixChatSenderOptions {
  clientId: string;
  accessToken: string;
  broadcasterId: string;
  /** Sender for messages without a linked author. */
  botUserId: string;
  baseUrl?: string;
  /** Wait before the single retry after a 429. */
  retryDelayMs?: number;
  logger?: Logger;
}

export class HelixChatSender implements ChatSender {
  private readonly baseUrl: string;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: HelixChatSenderOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_HELIX_BASE_URL).replace(/\/$/, "");
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger ?? noopLogger;
  }

  async send(message: OutboundMessage, signal?: AbortSignal): Promise<DeliveryReceipt> {
    const senderId =
      message.author?.platform === STREAM_PLATFORM ? message.author.userId : this.options.botUserId;
    const body = JSON.stringify({
      broadcaster_id: this.options.broadcasterId,
      sender_id: senderId,
      message: message.content,
    });

    let res = await this.post("/chat/messages", body, signal);
    if (res.status === TOO_MANY_REQUESTS) {
      this.logger.warn("Helix rate limited chat message, retrying once", {
        component: "helix",
        retryDelayMs: this.retryDelayMs,
      });
      await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      res = await this.post("/chat/messages", body, signal);
    }

    if (!res.ok) {
      const errorText = await res.text().catch(() => "");
      throw new DeliveryError(
        `Helix POST /chat/messages failed: ${res.status} ${errorText}`.trim(),
      );
    }

    const parsed = sendChatResponseSchema.safeParse(await res.json().catch(() => null));
    if (!parsed.success) {
      throw new DeliveryError("Helix POST /chat/messages returned an unexpected body", {
        cause: parsed.error,
      });
    }

    const [result] = parsed.data.data;
    if (!result.is_sent) {
      const dropReason = result.drop_reason
        ? `${result.drop_reason.code}: ${result.drop_reason.message}`
        : "unknown";
      this.logger.warn("Helix accepted but did not send chat message", {
        component: "helix",
        messageId: result.message_id,
        dropReason,
      });
      return { sent: false, messageId: result.message_id, dropReason };
    }
    return { sent: true, messageId: result.message_id };
  }

  private async post(path: string, body: string, signal?: AbortSignal): Promise<Response> {
    try {
      return await globalThis.fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.options.accessToken}`,
          "Client-Id": this.options.clientId,
        },
        body,
        signal,
      });
    } catch (err) {
      throw new DeliveryError(`Helix POST ${path} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
