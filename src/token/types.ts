import type { Buffer } from "buffer";
import type { PublicKey } from "@solana/web3.js";

/**
 * Account as returned by the node: owning program plus raw storage bytes.
 */
export interface RawAccount {
  owner: PublicKey;
  data: Buffer;
}

/**
 * Parse-time failure kinds. These are returned as values and folded into the
 * decoded facts; decoders never throw them.
 */
export type DecodeError =
  | {
      kind: "TruncatedBuffer";
      /** Offset of the read that ran out of bytes */
      offset: number;
      needed: number;
      available: number;
    }
  | {
      kind: "OverrunField";
      /** Name of the length-prefixed field whose declared length overran */
      field: string;
      offset: number;
      declared: number;
      remaining: number;
    };

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

/**
 * Which token program owns a mint account. A new mint format adds a member
 * here, a decoder, and a branch in decodeMintAccount.
 */
export type TokenProgramKind = "legacy" | "extensible" | "unrecognized";

/**
 * Fields shared by both mint layouts (the first 82 bytes).
 */
export interface MintHeader {
  mintAuthority: PublicKey | null;
  freezeAuthority: PublicKey | null;
  supply: bigint;
  decimals: number;
  isInitialized: boolean;
}

/**
 * Decoded mint account.
 */
export interface MintFacts extends MintHeader {
  /** True when decoded through the extensible (Token-2022) path */
  isToken2022: boolean;
  /** Metadata record address from extension type 12 */
  metadataPointer: PublicKey | null;
  /** First byte of extension type 13: whether an update authority exists */
  updateAuthorityFlag: boolean | null;
  /** At least one recognized extension was consumed */
  foundExtension: boolean;
  /** Every TLV tag walked, in chain order */
  extensionTypes: number[];
  /** The record could not be read to the end; fields hold what was parsed before the failure */
  parseFail: boolean;
  parseError: DecodeError | null;
}

/**
 * Fixed fields of a metadata-v1 record that the mutability decoder passes over.
 */
export interface DecodedMetadata {
  updateAuthority: PublicKey;
  mint: PublicKey;
  primarySaleHappened: boolean;
  isMutable: boolean;
}

export type MetadataSource = "metadata-account" | "update-authority-flag" | "none";

export interface MetadataFacts {
  /** null = could not be determined (record absent, malformed, or fetch failed) */
  isMutable: boolean | null;
  source: MetadataSource;
}

export type ReasonTag =
  | "MINTABLE"
  | "FREEZABLE"
  | "MUTABLE_METADATA"
  | "UNDETERMINED_METADATA"
  | "MALFORMED_RECORD";

export type UnknownCause = "ACCOUNT_NOT_FOUND" | "UNRECOGNIZED_OWNER";

export type Verdict =
  | { status: "SAFE" }
  | { status: "DANGER"; reasons: ReasonTag[] }
  | { status: "UNKNOWN"; cause: UnknownCause };

export type SecurityStatus = Verdict["status"];

/**
 * Result of inspecting one mint address end to end.
 */
export interface MintInspection {
  mint: PublicKey;
  program: TokenProgramKind | null;
  /** null when the account was missing, the owner unrecognized, or the legacy record malformed */
  facts: MintFacts | null;
  metadata: MetadataFacts;
  verdict: Verdict;
}
