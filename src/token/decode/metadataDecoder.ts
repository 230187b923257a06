import type { Buffer } from "buffer";
import { ByteCursor } from "./byteCursor.js";
import type { DecodeResult, DecodedMetadata } from "../types.js";

/** Key byte of a Metaplex metadata-v1 record */
export const METADATA_V1_KEY = 4;

/** Shorter buffers are rejected before any field is read */
export const METADATA_MIN_LEN = 67;

const CREATOR_ENTRY_LEN = 32 + 1 + 1; // address + verified + share

/**
 * Walks a metadata-v1 record up to its is_mutable flag.
 *
 * Layout:
 *   key u8 | update_authority [32] | mint [32]
 *   name, symbol, uri: u32 length + utf8 bytes each
 *   seller_fee_basis_points u16
 *   creators: u8 flag, then u32 count + count * 34 bytes
 *   primary_sale_happened u8
 *   is_mutable u8
 */
export function parseMetadataAccount(data: Buffer): DecodeResult<DecodedMetadata> {
  const cursor = new ByteCursor(data);

  const key = cursor.skip(1);
  if (!key.ok) return key;
  const updateAuthority = cursor.pubkey();
  if (!updateAuthority.ok) return updateAuthority;
  const mint = cursor.pubkey();
  if (!mint.ok) return mint;

  for (const field of ["name", "symbol", "uri"]) {
    const str = cursor.lengthPrefixed(field);
    if (!str.ok) return str;
  }

  const fee = cursor.skip(2);
  if (!fee.ok) return fee;

  const hasCreators = cursor.u8();
  if (!hasCreators.ok) return hasCreators;
  if (hasCreators.value !== 0) {
    const count = cursor.u32();
    if (!count.ok) return count;
    const creators = cursor.skipDeclared("creators", count.value * CREATOR_ENTRY_LEN);
    if (!creators.ok) return creators;
  }

  const primarySale = cursor.u8();
  if (!primarySale.ok) return primarySale;
  const isMutable = cursor.u8();
  if (!isMutable.ok) return isMutable;

  return {
    ok: true,
    value: {
      updateAuthority: updateAuthority.value,
      mint: mint.value,
      primarySaleHappened: primarySale.value !== 0,
      isMutable: isMutable.value !== 0,
    },
  };
}

/**
 * Decodes a metadata record, or null when it is absent, too short or malformed.
 */
export function decodeMetadataAccount(data: Buffer | null | undefined): DecodedMetadata | null {
  if (!data || data.length < METADATA_MIN_LEN) return null;
  const parsed = parseMetadataAccount(data);
  return parsed.ok ? parsed.value : null;
}

/**
 * is_mutable flag of a metadata record; null when it cannot be determined.
 */
export function readMetadataMutability(data: Buffer | null | undefined): boolean | null {
  return decodeMetadataAccount(data)?.isMutable ?? null;
}
