import type { UserRef } from "./identity.js";
import type { StreamEvent } from "./stream-events.js";

/** A verified, deduplicated webhook event awaiting the inbound pipeline. */
export interface InboundEvent {
  fingerprint: string;
  /** Absent for events that are not attributable to a stream user. */
  source: UserRef | null;
  event: StreamEvent;
  receivedAt: number;
}

export interface ConsoleCommand {
  text: string;
  originFingerprint: string;
}

/** One complete line read from the bridge log. */
export interface LogEvent {
  rawLine: string;
  /** Offset of the line's first byte. */
  byteOffset: number;
  /** Offset just past the line terminator. */
  nextOffset: number;
  timestamp: number;
}

/** A chat payload for the stream platform. */
export interface OutboundMessage {
  /** Stream identity the message is sent as; `null` sends as the bot. */
  author: UserRef | null;
  content: string;
  /** Offset of the log line that produced it. */
  origin: number;
}
