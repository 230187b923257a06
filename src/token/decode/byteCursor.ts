import { Buffer } from "buffer";
import { PublicKey } from "@solana/web3.js";
import type { DecodeError, DecodeResult } from "../types.js";

const PUBKEY_LEN = 32;

function ok<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

function fail<T>(error: DecodeError): DecodeResult<T> {
  return { ok: false, error };
}

/**
 * Forward-only reader over untrusted account bytes.
 *
 * Every read is bounds-checked before the buffer is touched and reports a
 * DecodeError instead of throwing. A failed read leaves the position unchanged.
 *
 * - Fixed-width reads (u8, u16, u32, u64, pubkey, take, skip) fail with TruncatedBuffer
 * - Reads whose width comes from the data (takeDeclared, skipDeclared, lengthPrefixed)
 *   fail with OverrunField
 */
export class ByteCursor {
  private pos: number;

  constructor(private readonly data: Buffer, start = 0) {
    this.pos = start;
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return Math.max(0, this.data.length - this.pos);
  }

  private ensure(needed: number): DecodeError | null {
    if (needed <= this.remaining) return null;
    return { kind: "TruncatedBuffer", offset: this.pos, needed, available: this.remaining };
  }

  u8(): DecodeResult<number> {
    const err = this.ensure(1);
    if (err) return fail(err);
    const v = this.data.readUInt8(this.pos);
    this.pos += 1;
    return ok(v);
  }

  u16(): DecodeResult<number> {
    const err = this.ensure(2);
    if (err) return fail(err);
    const v = this.data.readUInt16LE(this.pos);
    this.pos += 2;
    return ok(v);
  }

  u32(): DecodeResult<number> {
    const err = this.ensure(4);
    if (err) return fail(err);
    const v = this.data.readUInt32LE(this.pos);
    this.pos += 4;
    return ok(v);
  }

  u64(): DecodeResult<bigint> {
    const err = this.ensure(8);
    if (err) return fail(err);
    const v = this.data.readBigUInt64LE(this.pos);
    this.pos += 8;
    return ok(v);
  }

  pubkey(): DecodeResult<PublicKey> {
    const bytes = this.take(PUBKEY_LEN);
    if (!bytes.ok) return bytes;
    return ok(new PublicKey(bytes.value));
  }

  /** Copy out exactly `len` bytes */
  take(len: number): DecodeResult<Buffer> {
    const err = this.ensure(len);
    if (err) return fail(err);
    const out = Buffer.from(this.data.subarray(this.pos, this.pos + len));
    this.pos += len;
    return ok(out);
  }

  skip(len: number): DecodeResult<void> {
    const err = this.ensure(len);
    if (err) return fail(err);
    this.pos += len;
    return ok(undefined);
  }

  /** Like take(), for a length that was read from the data itself */
  takeDeclared(field: string, declared: number): DecodeResult<Buffer> {
    const err = this.overrun(field, declared);
    if (err) return fail(err);
    return this.take(declared);
  }

  /** Like skip(), for a length that was read from the data itself */
  skipDeclared(field: string, declared: number): DecodeResult<void> {
    const err = this.overrun(field, declared);
    if (err) return fail(err);
    return this.skip(declared);
  }

  /** u32 little-endian length followed by that many bytes */
  lengthPrefixed(field: string): DecodeResult<Buffer> {
    const start = this.pos;
    const len = this.u32();
    if (!len.ok) return len;
    const body = this.takeDeclared(field, len.value);
    if (!body.ok) this.pos = start;
    return body;
  }

  private overrun(field: string, declared: number): DecodeError | null {
    if (Number.isSafeInteger(declared) && declared >= 0 && declared <= this.remaining) return null;
    return { kind: "OverrunField", field, offset: this.pos, declared, remaining: this.remaining };
  }
}

/**
 * Human-readable one-liner for logs.
 */
export function describeDecodeError(error: DecodeError): string {
  switch (error.kind) {
    case "TruncatedBuffer":
      return `truncated buffer at offset ${error.offset}: needed ${error.needed} bytes, ${error.available} available`;
    case "OverrunField":
      return `field ${error.field} at offset ${error.offset} declares ${error.declared} bytes, ${error.remaining} remaining`;
  }
}
