import { z } from 'zod';
import { DecodeError } from './errors';
import type { Command, Response } from '../types/protocol';

// Little-endian fixed-width layout: u32 variant tags, u64 integers and
// string lengths, u8 option markers.
const COMMAND_TAGS = { connect: 0, move: 1, reset: 2 } as const;
const RESPONSE_TAGS = { ok: 0, fail: 1, move: 2, reset: 3 } as const;

export const MAX_STRING_BYTES = 1024;

const utf8 = new TextDecoder('utf-8', { fatal: true });

const nameSchema = z.string().trim();

const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('connect'), name: nameSchema }),
  z.object({ type: z.literal('move'), cellIndex: z.number().int().nonnegative(), name: nameSchema }),
  z.object({ type: z.literal('reset') }),
]);

class Reader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  private need(bytes: number) {
    if (this.offset + bytes > this.buf.length) {
      throw new DecodeError(`payload truncated at byte ${this.offset}, needed ${bytes} more`);
    }
  }

  u8(): number {
    this.need(1);
    const v = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return v;
  }

  u32(): number {
    this.need(4);
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  u64(): number {
    this.need(8);
    const v = this.buf.readBigUInt64LE(this.offset);
    this.offset += 8;
    if (v > BigInt(Number.MAX_SAFE_INTEGER)) throw new DecodeError(`integer ${v} out of range`);
    return Number(v);
  }

  string(): string {
    const length = this.u64();
    if (length > MAX_STRING_BYTES) throw new DecodeError(`string of ${length} bytes exceeds ${MAX_STRING_BYTES}`);
    this.need(length);
    const bytes = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    try {
      return utf8.decode(bytes);
    } catch {
      throw new DecodeError('string is not valid UTF-8');
    }
  }

  option<T>(read: () => T): T | null {
    const marker = this.u8();
    if (marker === 0) return null;
    if (marker === 1) return read();
    throw new DecodeError(`invalid option marker ${marker}`);
  }

  end() {
    if (this.offset !== this.buf.length) {
      throw new DecodeError(`${this.buf.length - this.offset} trailing bytes`);
    }
  }
}

class Writer {
  private readonly chunks: Buffer[] = [];

  u8(v: number): this {
    const b = Buffer.alloc(1);
    b.writeUInt8(v);
    this.chunks.push(b);
    return this;
  }

  u32(v: number): this {
    const b = Buffer.alloc(4);
    b.writeUInt32LE(v);
    this.chunks.push(b);
    return this;
  }

  u64(v: number): this {
    const b = Buffer.alloc(8);
    b.writeBigUInt64LE(BigInt(v));
    this.chunks.push(b);
    return this;
  }

  string(s: string): this {
    const bytes = Buffer.from(s, 'utf8');
    this.u64(bytes.length);
    this.chunks.push(bytes);
    return this;
  }

  option<T>(value: T | null, write: (v: T) => void): this {
    if (value === null) return this.u8(0);
    this.u8(1);
    write(value);
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof Uint8Array) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  throw new DecodeError(`expected a binary payload, got ${typeof data}`);
}

function readCommand(r: Reader): unknown {
  const tag = r.u32();
  switch (tag) {
    case COMMAND_TAGS.connect:
      return { type: 'connect', name: r.string() };
    case COMMAND_TAGS.move: {
      const cellIndex = r.u64();
      return { type: 'move', cellIndex, name: r.string() };
    }
    case COMMAND_TAGS.reset:
      return { type: 'reset' };
    default:
      throw new DecodeError(`unknown command tag ${tag}`);
  }
}

export function decodeCommand(data: unknown): Command {
  const r = new Reader(toBuffer(data));
  const raw = readCommand(r);
  r.end();
  const parsed = commandSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(`invalid command: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`);
  }
  return parsed.data;
}

export function encodeCommand(command: Command): Buffer {
  const w = new Writer().u32(COMMAND_TAGS[command.type]);
  switch (command.type) {
    case 'connect':
      w.string(command.name);
      break;
    case 'move':
      w.u64(command.cellIndex).string(command.name);
      break;
    case 'reset':
      break;
  }
  return w.toBuffer();
}

export function encodeResponse(response: Response): Buffer {
  const w = new Writer().u32(RESPONSE_TAGS[response.type]);
  switch (response.type) {
    case 'ok':
      w.string(response.peer);
      break;
    case 'fail':
      w.string(response.message).string(response.peer);
      break;
    case 'move':
      w.u64(response.cellIndex)
        .u64(response.color)
        .option(response.winner, (name) => w.string(name));
      break;
    case 'reset':
      break;
  }
  return w.toBuffer();
}

export function decodeResponse(data: unknown): Response {
  const r = new Reader(toBuffer(data));
  const tag = r.u32();
  let response: Response;
  switch (tag) {
    case RESPONSE_TAGS.ok:
      response = { type: 'ok', peer: r.string() };
      break;
    case RESPONSE_TAGS.fail: {
      const message = r.string();
      response = { type: 'fail', message, peer: r.string() };
      break;
    }
    case RESPONSE_TAGS.move: {
      const cellIndex = r.u64();
      const color = r.u64();
      if (color !== 1 && color !== 2) throw new DecodeError(`invalid color ${color}`);
      response = { type: 'move', cellIndex, color, winner: r.option(() => r.string()) };
      break;
    }
    case RESPONSE_TAGS.reset:
      response = { type: 'reset' };
      break;
    default:
      throw new DecodeError(`unknown response tag ${tag}`);
  }
  r.end();
  return response;
}
