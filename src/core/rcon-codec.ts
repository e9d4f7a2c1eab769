/**
 * Source RCON packet framing.
 *
 * Little-endian `size | id | type | body | 0x00 | 0x00`, where `size` counts
 * everything after itself. The decoder is incremental: TCP delivers arbitrary
 * slices, so partial packets are buffered until complete.
 * @module
 */

export const PacketType = {
  RESPONSE_VALUE: 0,
  EXEC_COMMAND: 2,
  AUTH_RESPONSE: 2,
  AUTH: 3,
} as const;

export interface RconPacket {
  id: number;
  type: number;
  body: string;
}

/** id + type + two terminating NULs. */
const HEADER_OVERHEAD = 10;
/** Upper bound on a declared packet size; anything above is a protocol error. */
export const MAX_PACKET_SIZE = 1024 * 1024;

export class RconProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RconProtocolError";
  }
}

export function encodePacket(packet: RconPacket): Buffer {
  const body = Buffer.from(packet.body, "utf-8");
  const size = HEADER_OVERHEAD + body.length;
  const buf = Buffer.alloc(4 + size);
  buf.writeInt32LE(size, 0);
  buf.writeInt32LE(packet.id, 4);
  buf.writeInt32LE(packet.type, 8);
  body.copy(buf, 12);
  // Trailing two bytes stay zero from alloc.
  return buf;
}

export class RconPacketDecoder {
  private pending: Buffer = Buffer.alloc(0);

  /** Feed bytes; returns every packet completed by them, in order. */
  push(chunk: Buffer): RconPacket[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const packets: RconPacket[] = [];

    while (this.pending.length >= 4) {
      const size = this.pending.readInt32LE(0);
      if (size < HEADER_OVERHEAD || size > MAX_PACKET_SIZE) {
        throw new RconProtocolError(`Invalid packet size ${size}`);
      }
      if (this.pending.length < 4 + size) break;

      const id = this.pending.readInt32LE(4);
      const type = this.pending.readInt32LE(8);
      // Body ends at the first NUL of the two-byte terminator.
      const body = this.pending.toString("utf-8", 12, 4 + size - 2);
      packets.push({ id, type, body });
      this.pending = this.pending.subarray(4 + size);
    }

    return packets;
  }

  /** Bytes buffered towards an incomplete packet. */
  get bufferedBytes(): number {
    return this.pending.length;
  }
}
