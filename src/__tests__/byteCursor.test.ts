import { describe, it, expect } from "vitest";
import { Buffer } from "buffer";
import { PublicKey } from "@solana/web3.js";
import { ByteCursor, describeDecodeError } from "../token/decode/byteCursor.js";

describe("ByteCursor", () => {
  it("reads little-endian integers in order", () => {
    const buf = Buffer.alloc(15);
    buf.writeUInt8(7, 0);
    buf.writeUInt16LE(0x1234, 1);
    buf.writeUInt32LE(0xdeadbeef, 3);
    buf.writeBigUInt64LE(1_000_000n, 7);

    const cursor = new ByteCursor(buf);
    expect(cursor.u8()).toEqual({ ok: true, value: 7 });
    expect(cursor.u16()).toEqual({ ok: true, value: 0x1234 });
    expect(cursor.u32()).toEqual({ ok: true, value: 0xdeadbeef });
    expect(cursor.u64()).toEqual({ ok: true, value: 1_000_000n });
    expect(cursor.offset).toBe(15);
    expect(cursor.remaining).toBe(0);
  });

  it("reads a 32-byte public key", () => {
    const key = PublicKey.unique();
    const cursor = new ByteCursor(Buffer.concat([key.toBuffer(), Buffer.from([1])]));
    const read = cursor.pubkey();
    expect(read.ok && read.value.equals(key)).toBe(true);
    expect(cursor.remaining).toBe(1);
  });

  it("reports TruncatedBuffer without moving when a fixed read runs past the end", () => {
    const cursor = new ByteCursor(Buffer.alloc(3));
    expect(cursor.u32()).toEqual({
      ok: false,
      error: { kind: "TruncatedBuffer", offset: 0, needed: 4, available: 3 },
    });
    expect(cursor.offset).toBe(0);
  });

  it("reports OverrunField for a declared length beyond the remaining bytes", () => {
    const buf = Buffer.alloc(10);
    buf.writeUInt32LE(100, 0);
    const cursor = new ByteCursor(buf);
    expect(cursor.lengthPrefixed("uri")).toEqual({
      ok: false,
      error: { kind: "OverrunField", field: "uri", offset: 4, declared: 100, remaining: 6 },
    });
    // position restored to before the length prefix
    expect(cursor.offset).toBe(0);
  });

  it("returns the body of a length-prefixed field", () => {
    const buf = Buffer.concat([Buffer.from([3, 0, 0, 0]), Buffer.from("abc"), Buffer.from([9])]);
    const cursor = new ByteCursor(buf);
    const body = cursor.lengthPrefixed("name");
    expect(body.ok && body.value.toString("utf8")).toBe("abc");
    expect(cursor.u8()).toEqual({ ok: true, value: 9 });
  });

  it("rejects negative and non-integer declared lengths", () => {
    const cursor = new ByteCursor(Buffer.alloc(8));
    expect(cursor.skipDeclared("creators", -1).ok).toBe(false);
    expect(cursor.skipDeclared("creators", 1.5).ok).toBe(false);
    expect(cursor.offset).toBe(0);
  });

  it("can start at an offset", () => {
    const buf = Buffer.from([1, 2, 3]);
    const cursor = new ByteCursor(buf, 2);
    expect(cursor.u8()).toEqual({ ok: true, value: 3 });
    expect(cursor.u8().ok).toBe(false);
  });

  it("describes errors for logs", () => {
    expect(describeDecodeError({ kind: "TruncatedBuffer", offset: 10, needed: 4, available: 2 })).toBe(
      "truncated buffer at offset 10: needed 4 bytes, 2 available"
    );
    expect(
      describeDecodeError({ kind: "OverrunField", field: "symbol", offset: 69, declared: 500, remaining: 20 })
    ).toBe("field symbol at offset 69 declares 500 bytes, 20 remaining");
  });
});
