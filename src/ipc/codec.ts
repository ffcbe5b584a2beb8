import { Either } from "effect";
import { IpcProtocolError, describeCause } from "../errors.js";

/** Frame opcodes of the local IPC protocol */
export const IpcOp = {
  Handshake: 0,
  Frame: 1,
  Close: 2,
  Ping: 3,
  Pong: 4,
} as const;

export type IpcOp = (typeof IpcOp)[keyof typeof IpcOp];

export interface IpcPacket {
  op: IpcOp;
  body: unknown;
}

const HEADER_BYTES = 8;
/** Anything larger is treated as a corrupt stream */
export const MAX_FRAME_BYTES = 64 * 1024;

function isIpcOp(value: number): value is IpcOp {
  return value >= IpcOp.Handshake && value <= IpcOp.Pong;
}

/** `op` int32 LE, `length` int32 LE, then `length` bytes of UTF-8 JSON */
export function encodePacket(op: IpcOp, body: unknown): Buffer {
  const json = Buffer.from(JSON.stringify(body), "utf8");
  const header = Buffer.alloc(HEADER_BYTES);
  header.writeInt32LE(op, 0);
  header.writeInt32LE(json.length, 4);
  return Buffer.concat([header, json]);
}

/**
 * Reassembles packets from a byte stream. Chunks may split or join frames
 * arbitrarily; complete packets are returned as soon as their last byte
 * arrives. After an error the decoder must be discarded.
 */
export class PacketDecoder {
  private pending: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): Either.Either<IpcPacket[], IpcProtocolError> {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const packets: IpcPacket[] = [];

    while (this.pending.length >= HEADER_BYTES) {
      const op = this.pending.readInt32LE(0);
      const length = this.pending.readInt32LE(4);
      if (!isIpcOp(op)) {
        return Either.left(new IpcProtocolError({ reason: `unknown opcode ${op}` }));
      }
      if (length < 0 || length > MAX_FRAME_BYTES) {
        return Either.left(new IpcProtocolError({ reason: `frame length ${length} out of range` }));
      }
      if (this.pending.length < HEADER_BYTES + length) break;

      const raw = this.pending.subarray(HEADER_BYTES, HEADER_BYTES + length).toString("utf8");
      this.pending = this.pending.subarray(HEADER_BYTES + length);
      try {
        packets.push({ op, body: raw.length === 0 ? null : JSON.parse(raw) });
      } catch (err) {
        return Either.left(new IpcProtocolError({ reason: `invalid JSON: ${describeCause(err)}` }));
      }
    }

    return Either.right(packets);
  }
}
