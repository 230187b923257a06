import { Buffer } from "buffer";
import { PublicKey } from "@solana/web3.js";
import {
  EXTENSIBLE_TOKEN_PROGRAM_ID,
  LEGACY_TOKEN_PROGRAM_ID,
  METADATA_PROGRAM_ID,
} from "../constants/programs.js";
import { logger } from "../observability/logger.js";
import type { AccountFetcher } from "../solana/accountFetcher.js";
import { describeDecodeError } from "./decode/byteCursor.js";
import { decodeExtensionMint } from "./decode/extensionMintDecoder.js";
import { decodeLegacyMint } from "./decode/legacyMintDecoder.js";
import { readMetadataMutability } from "./decode/metadataDecoder.js";
import { classifyMint } from "./riskClassifier.js";
import type {
  MetadataFacts,
  MintFacts,
  MintInspection,
  RawAccount,
  TokenProgramKind,
} from "./types.js";

const METADATA_SEED = Buffer.from("metadata");

export function resolveTokenProgram(owner: PublicKey): TokenProgramKind {
  if (owner.equals(LEGACY_TOKEN_PROGRAM_ID)) return "legacy";
  if (owner.equals(EXTENSIBLE_TOKEN_PROGRAM_ID)) return "extensible";
  return "unrecognized";
}

export interface MintDecodeOutcome {
  program: TokenProgramKind;
  /** null for unrecognized owners and malformed legacy records */
  facts: MintFacts | null;
}

/**
 * Routes raw mint bytes to the decoder of the owning token program.
 */
export function decodeMintAccount(account: RawAccount): MintDecodeOutcome {
  const program = resolveTokenProgram(account.owner);
  switch (program) {
    case "legacy": {
      const decoded = decodeLegacyMint(account.data);
      if (!decoded.ok) {
        logger.debug(
          { event: "legacy_mint_malformed", reason: describeDecodeError(decoded.error) },
          "legacy mint record malformed"
        );
        return { program, facts: null };
      }
      return { program, facts: decoded.value };
    }
    case "extensible":
      return { program, facts: decodeExtensionMint(account.data) };
    case "unrecognized":
      return { program, facts: null };
  }
}

/**
 * Metadata record PDA: seeds ("metadata", metadata program id, mint).
 */
export function deriveMetadataAddress(mint: PublicKey): PublicKey {
  const [address] = PublicKey.findProgramAddressSync(
    [METADATA_SEED, METADATA_PROGRAM_ID.toBuffer(), mint.toBuffer()],
    METADATA_PROGRAM_ID
  );
  return address;
}

/**
 * The metadata pointer extension wins over the derived address.
 */
export function resolveMetadataAddress(mint: PublicKey, facts: MintFacts | null): PublicKey {
  return facts?.metadataPointer ?? deriveMetadataAddress(mint);
}

/**
 * Whether the metadata record can change the verdict. An extensible mint
 * without any recognized extension is never reported immutable.
 */
export function needsMetadataLookup(facts: MintFacts | null): boolean {
  return !(facts?.isToken2022 && !facts.foundExtension);
}

/**
 * Mutability from the metadata record bytes. The update authority marker
 * extension is consulted only when no record came back; a record that was
 * returned but does not decode leaves mutability undetermined.
 */
export function resolveMetadataFacts(facts: MintFacts | null, metadataData: Buffer | null): MetadataFacts {
  if (!needsMetadataLookup(facts)) {
    return { isMutable: null, source: "none" };
  }

  if (metadataData) {
    const isMutable = readMetadataMutability(metadataData);
    return isMutable === null
      ? { isMutable: null, source: "none" }
      : { isMutable, source: "metadata-account" };
  }

  if (facts?.updateAuthorityFlag != null) {
    return { isMutable: facts.updateAuthorityFlag, source: "update-authority-flag" };
  }
  return { isMutable: null, source: "none" };
}

const UNDETERMINED: MetadataFacts = { isMutable: null, source: "none" };

/**
 * Fetches, decodes and classifies one mint. Fetch errors are logged and turn
 * into UNKNOWN (mint) or undetermined mutability (metadata); nothing is thrown.
 */
export async function inspectMint(mint: PublicKey, fetcher: AccountFetcher): Promise<MintInspection> {
  const mintAddress = mint.toBase58();

  let account: RawAccount | null;
  try {
    account = await fetcher.fetchAccount(mint);
  } catch (err) {
    logger.error({ event: "mint_fetch_failed", mint: mintAddress, err }, "failed to fetch mint account");
    account = null;
  }

  if (!account) {
    logger.warn({ event: "mint_not_found", mint: mintAddress }, "mint account not found");
    return {
      mint,
      program: null,
      facts: null,
      metadata: UNDETERMINED,
      verdict: classifyMint({ accountFound: false, program: null, facts: null, metadata: UNDETERMINED }),
    };
  }

  const { program, facts } = decodeMintAccount(account);

  if (program === "unrecognized") {
    logger.warn(
      { event: "mint_owner_unrecognized", mint: mintAddress, owner: account.owner.toBase58() },
      "account is not owned by a known token program"
    );
    return {
      mint,
      program,
      facts: null,
      metadata: UNDETERMINED,
      verdict: classifyMint({ accountFound: true, program, facts: null, metadata: UNDETERMINED }),
    };
  }

  if (facts?.parseError) {
    logger.debug(
      { event: "mint_parse_incomplete", mint: mintAddress, reason: describeDecodeError(facts.parseError) },
      "mint record could not be read to the end"
    );
  }

  let metadataData: Buffer | null = null;
  if (needsMetadataLookup(facts)) {
    const metadataAddress = resolveMetadataAddress(mint, facts);
    try {
      const metadataAccount = await fetcher.fetchAccount(metadataAddress);
      metadataData = metadataAccount?.data ?? null;
    } catch (err) {
      logger.warn(
        { event: "metadata_fetch_failed", mint: mintAddress, metadata: metadataAddress.toBase58(), err },
        "failed to fetch metadata account"
      );
    }
  }

  const metadata = resolveMetadataFacts(facts, metadataData);
  const verdict = classifyMint({ accountFound: true, program, facts, metadata });

  return { mint, program, facts, metadata, verdict };
}
