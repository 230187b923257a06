import type { Buffer } from "buffer";
import { ByteCursor } from "./byteCursor.js";
import { LEGACY_MINT_LEN, decodeMintHeader } from "./legacyMintDecoder.js";
import type { DecodeError, MintFacts } from "../types.js";

/**
 * Token-2022 mints reuse the 82-byte base layout, pad it out to the size of a
 * token account (165 bytes) and append a 1-byte account type followed by the
 * TLV extension chain:
 *
 *   [0..82)    mint header (same offsets as the legacy layout)
 *   [82..165)  zero padding
 *   [165]      account type (1 = mint)
 *   [166..)    repeated { type: u16, length: u16, value: [u8; length] }
 */
export const BASE_ACCOUNT_LEN = 165;
export const ACCOUNT_TYPE_MINT = 1;
export const EXTENSIONS_OFFSET = BASE_ACCOUNT_LEN + 1;

const TLV_HEADER_LEN = 4;

/** Extension tags this scanner reads; everything else is walked over */
export const ExtensionTag = {
  /** Payload starts with the 32-byte address of the mint's metadata record */
  METADATA_ACCOUNT: 12,
  /** First payload byte is nonzero when a metadata update authority exists */
  UPDATE_AUTHORITY_MARKER: 13,
} as const;

function emptyFacts(): MintFacts {
  return {
    mintAuthority: null,
    freezeAuthority: null,
    supply: 0n,
    decimals: 0,
    isInitialized: false,
    isToken2022: true,
    metadataPointer: null,
    updateAuthorityFlag: null,
    foundExtension: false,
    extensionTypes: [],
    parseFail: false,
    parseError: null,
  };
}

function markFailed(facts: MintFacts, error: DecodeError): MintFacts {
  return { ...facts, parseFail: true, parseError: error };
}

/**
 * Decodes a Token-2022 mint and its extension chain.
 *
 * Never throws. When the record is cut short the returned facts carry
 * `parseFail = true` along with every field read before the failure point.
 */
export function decodeExtensionMint(data: Buffer): MintFacts {
  let facts = emptyFacts();

  const header = decodeMintHeader(data);
  if (!header.ok) return markFailed(facts, header.error);
  facts = { ...facts, ...header.value };

  // A Token-2022 mint without extensions is stored at the base size
  if (data.length === LEGACY_MINT_LEN) return facts;

  // Padding and the account type byte are not validated, only skipped
  const cursor = new ByteCursor(data, LEGACY_MINT_LEN);
  const padding = cursor.skip(EXTENSIONS_OFFSET - LEGACY_MINT_LEN);
  if (!padding.ok) return markFailed(facts, padding.error);

  const extensionTypes: number[] = [];
  while (cursor.remaining >= TLV_HEADER_LEN) {
    const tag = cursor.u16();
    if (!tag.ok) return markFailed({ ...facts, extensionTypes }, tag.error);
    const length = cursor.u16();
    if (!length.ok) return markFailed({ ...facts, extensionTypes }, length.error);
    const payload = cursor.takeDeclared(`extension_${tag.value}`, length.value);
    if (!payload.ok) return markFailed({ ...facts, extensionTypes }, payload.error);

    extensionTypes.push(tag.value);
    const value = new ByteCursor(payload.value);

    switch (tag.value) {
      case ExtensionTag.METADATA_ACCOUNT: {
        const pointer = value.pubkey();
        if (!pointer.ok) return markFailed({ ...facts, extensionTypes }, pointer.error);
        facts = { ...facts, metadataPointer: pointer.value, foundExtension: true };
        break;
      }
      case ExtensionTag.UPDATE_AUTHORITY_MARKER: {
        const marker = value.u8();
        facts = {
          ...facts,
          updateAuthorityFlag: marker.ok ? marker.value !== 0 : facts.updateAuthorityFlag,
          foundExtension: true,
        };
        break;
      }
      default:
        break;
    }
  }

  return { ...facts, extensionTypes };
}
