export {
  LEGACY_TOKEN_PROGRAM_ID,
  EXTENSIBLE_TOKEN_PROGRAM_ID,
  METADATA_PROGRAM_ID,
} from "./constants/programs.js";
export { ByteCursor, describeDecodeError } from "./token/decode/byteCursor.js";
export { LEGACY_MINT_LEN, decodeLegacyMint, decodeMintHeader } from "./token/decode/legacyMintDecoder.js";
export {
  BASE_ACCOUNT_LEN,
  EXTENSIONS_OFFSET,
  ExtensionTag,
  decodeExtensionMint,
} from "./token/decode/extensionMintDecoder.js";
export {
  decodeMetadataAccount,
  parseMetadataAccount,
  readMetadataMutability,
} from "./token/decode/metadataDecoder.js";
export {
  decodeMintAccount,
  deriveMetadataAddress,
  inspectMint,
  resolveMetadataAddress,
  needsMetadataLookup,
  resolveMetadataFacts,
  resolveTokenProgram,
} from "./token/mintInspector.js";
export type { MintDecodeOutcome } from "./token/mintInspector.js";
export { classifyMint, summarizeVerdict } from "./token/riskClassifier.js";
export type { ClassifierInput } from "./token/riskClassifier.js";
export { ConnectionAccountFetcher } from "./solana/accountFetcher.js";
export type { AccountFetcher, ConnectionFetcherOptions } from "./solana/accountFetcher.js";
export { MintLedger, toLedgerRecord } from "./ledger/mintLedger.js";
export type { LedgerRecord } from "./ledger/mintLedger.js";
export { scanMints } from "./pipeline/scanMints.js";
export type { ScanOptions, ScanSummary } from "./pipeline/scanMints.js";
export type * from "./token/types.js";
