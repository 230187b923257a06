import { describe, it, expect } from "vitest";
import { Buffer } from "buffer";
import { PublicKey } from "@solana/web3.js";
import { LEGACY_MINT_LEN, decodeLegacyMint } from "../token/decode/legacyMintDecoder.js";
import { buildMintHeader } from "./helpers/accountFixtures.js";

describe("Legacy mint decoder", () => {
  it("decodes supply, decimals and both authorities", () => {
    const mintAuthority = PublicKey.unique();
    const freezeAuthority = PublicKey.unique();
    const data = buildMintHeader({ mintAuthority, freezeAuthority, supply: 5_000_000_000n, decimals: 9 });

    const result = decodeLegacyMint(data);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.mintAuthority?.equals(mintAuthority)).toBe(true);
    expect(result.value.freezeAuthority?.equals(freezeAuthority)).toBe(true);
    expect(result.value.supply).toBe(5_000_000_000n);
    expect(result.value.decimals).toBe(9);
    expect(result.value.isInitialized).toBe(true);
    expect(result.value.isToken2022).toBe(false);
    expect(result.value.parseFail).toBe(false);
  });

  it("returns null authorities when the option flags are 0", () => {
    const result = decodeLegacyMint(buildMintHeader({ supply: 1n, decimals: 6 }));
    expect(result.ok && result.value.mintAuthority).toBeNull();
    expect(result.ok && result.value.freezeAuthority).toBeNull();
  });

  it("ignores a populated key slot when its option flag is 0", () => {
    const data = buildMintHeader({});
    PublicKey.unique().toBuffer().copy(data, 4);
    const result = decodeLegacyMint(data);
    expect(result.ok && result.value.mintAuthority).toBeNull();
  });

  it("treats an option flag other than 1 as absent", () => {
    const data = buildMintHeader({ freezeAuthority: PublicKey.unique() });
    data.writeUInt32LE(2, 46);
    const result = decodeLegacyMint(data);
    expect(result.ok && result.value.freezeAuthority).toBeNull();
  });

  it("returns the exact 32 bytes following the mint authority flag", () => {
    const data = buildMintHeader({});
    data.writeUInt32LE(1, 0);
    const keyBytes = Buffer.alloc(32, 0xab);
    keyBytes.copy(data, 4);

    const result = decodeLegacyMint(data);
    expect(result.ok && result.value.mintAuthority?.toBuffer().equals(keyBytes)).toBe(true);
  });

  it("fails for every length below 82 bytes", () => {
    for (let len = 0; len < LEGACY_MINT_LEN; len++) {
      const result = decodeLegacyMint(Buffer.alloc(len));
      expect(result).toEqual({
        ok: false,
        error: { kind: "TruncatedBuffer", offset: 0, needed: 82, available: len },
      });
    }
  });

  it("fails for a buffer longer than 82 bytes", () => {
    const data = Buffer.concat([buildMintHeader({}), Buffer.alloc(18)]);
    expect(decodeLegacyMint(data)).toEqual({
      ok: false,
      error: { kind: "OverrunField", field: "mint", offset: 0, declared: 82, remaining: 100 },
    });
  });

  it("reads an uninitialized mint", () => {
    const result = decodeLegacyMint(buildMintHeader({ isInitialized: false }));
    expect(result.ok && result.value.isInitialized).toBe(false);
  });
});
