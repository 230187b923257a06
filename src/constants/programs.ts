import { PublicKey } from "@solana/web3.js";
import { TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID } from "@solana/spl-token";

/**
 * SPL Token program (legacy, fixed 82-byte mint layout)
 */
export const LEGACY_TOKEN_PROGRAM_ID: PublicKey = TOKEN_PROGRAM_ID;

/**
 * Token-2022 program (extensible mint layout with a TLV extension chain)
 */
export const EXTENSIBLE_TOKEN_PROGRAM_ID: PublicKey = TOKEN_2022_PROGRAM_ID;

/**
 * Metaplex Token Metadata program.
 * Only used to derive the metadata record address of a mint.
 */
export const METADATA_PROGRAM_ID = new PublicKey("metaqbxxUerdq28cj1RbAWkYQm3ybzjb6a8bt518x1s");
