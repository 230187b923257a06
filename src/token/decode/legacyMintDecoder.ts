import type { Buffer } from "buffer";
import type { PublicKey } from "@solana/web3.js";
import { ByteCursor } from "./byteCursor.js";
import type { DecodeResult, MintFacts, MintHeader } from "../types.js";

/**
 * SPL Token Mint account structure (82 bytes):
 * - Bytes 0-3: mint_authority option (u32, 1 = present)
 * - Bytes 4-35: mint_authority (Pubkey)
 * - Bytes 36-43: supply (u64)
 * - Byte 44: decimals (u8)
 * - Byte 45: is_initialized (bool)
 * - Bytes 46-49: freeze_authority option (u32, 1 = present)
 * - Bytes 50-81: freeze_authority (Pubkey)
 */
export const LEGACY_MINT_LEN = 82;

const OPTION_SOME = 1;

function readOptionalAuthority(cursor: ByteCursor): DecodeResult<PublicKey | null> {
  const option = cursor.u32();
  if (!option.ok) return option;
  // The key slot is always present; it only counts when the option flag is set
  const key = cursor.pubkey();
  if (!key.ok) return key;
  return { ok: true, value: option.value === OPTION_SOME ? key.value : null };
}

/**
 * Reads the 82-byte mint header shared by the legacy and extensible layouts.
 * Only fails when fewer than 82 bytes are available.
 */
export function decodeMintHeader(data: Buffer): DecodeResult<MintHeader> {
  const cursor = new ByteCursor(data);

  const mintAuthority = readOptionalAuthority(cursor);
  if (!mintAuthority.ok) return mintAuthority;
  const supply = cursor.u64();
  if (!supply.ok) return supply;
  const decimals = cursor.u8();
  if (!decimals.ok) return decimals;
  const initialized = cursor.u8();
  if (!initialized.ok) return initialized;
  const freezeAuthority = readOptionalAuthority(cursor);
  if (!freezeAuthority.ok) return freezeAuthority;

  return {
    ok: true,
    value: {
      mintAuthority: mintAuthority.value,
      freezeAuthority: freezeAuthority.value,
      supply: supply.value,
      decimals: decimals.value,
      isInitialized: initialized.value !== 0,
    },
  };
}

/**
 * Decodes a legacy SPL Token mint. The record must be exactly 82 bytes: a
 * shorter one is truncated, a longer one carries bytes the layout does not
 * declare.
 */
export function decodeLegacyMint(data: Buffer): DecodeResult<MintFacts> {
  if (data.length < LEGACY_MINT_LEN) {
    return {
      ok: false,
      error: { kind: "TruncatedBuffer", offset: 0, needed: LEGACY_MINT_LEN, available: data.length },
    };
  }
  if (data.length > LEGACY_MINT_LEN) {
    return {
      ok: false,
      error: { kind: "OverrunField", field: "mint", offset: 0, declared: LEGACY_MINT_LEN, remaining: data.length },
    };
  }

  const header = decodeMintHeader(data);
  if (!header.ok) return header;

  return {
    ok: true,
    value: {
      ...header.value,
      isToken2022: false,
      metadataPointer: null,
      updateAuthorityFlag: null,
      foundExtension: false,
      extensionTypes: [],
      parseFail: false,
      parseError: null,
    },
  };
}
