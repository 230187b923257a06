import { Buffer } from "buffer";
import { PublicKey } from "@solana/web3.js";
import { MINT_SIZE, MintLayout } from "@solana/spl-token";
import type { AccountFetcher } from "../../solana/accountFetcher.js";
import {
  ACCOUNT_TYPE_MINT,
  BASE_ACCOUNT_LEN,
} from "../../token/decode/extensionMintDecoder.js";
import { METADATA_V1_KEY } from "../../token/decode/metadataDecoder.js";
import type { RawAccount } from "../../token/types.js";

export interface MintFixture {
  mintAuthority?: PublicKey | null;
  freezeAuthority?: PublicKey | null;
  supply?: bigint;
  decimals?: number;
  isInitialized?: boolean;
}

/**
 * 82-byte mint record encoded with spl-token's own layout.
 */
export function buildMintHeader(fixture: MintFixture = {}): Buffer {
  const buf = Buffer.alloc(MINT_SIZE);
  MintLayout.encode(
    {
      mintAuthorityOption: fixture.mintAuthority ? 1 : 0,
      mintAuthority: fixture.mintAuthority ?? PublicKey.default,
      supply: fixture.supply ?? 0n,
      decimals: fixture.decimals ?? 0,
      isInitialized: fixture.isInitialized ?? true,
      freezeAuthorityOption: fixture.freezeAuthority ? 1 : 0,
      freezeAuthority: fixture.freezeAuthority ?? PublicKey.default,
    },
    buf
  );
  return buf;
}

export interface ExtensionFixture {
  type: number;
  payload: Buffer;
}

export function encodeExtension(ext: ExtensionFixture): Buffer {
  const head = Buffer.alloc(4);
  head.writeUInt16LE(ext.type, 0);
  head.writeUInt16LE(ext.payload.length, 2);
  return Buffer.concat([head, ext.payload]);
}

/**
 * Token-2022 mint: header, padding to 165 bytes, account type, TLV chain.
 */
export function buildExtensionMint(fixture: MintFixture, extensions: ExtensionFixture[]): Buffer {
  const base = Buffer.alloc(BASE_ACCOUNT_LEN + 1);
  buildMintHeader(fixture).copy(base, 0);
  base.writeUInt8(ACCOUNT_TYPE_MINT, BASE_ACCOUNT_LEN);
  return Buffer.concat([base, ...extensions.map(encodeExtension)]);
}

export interface MetadataFixture {
  updateAuthority?: PublicKey;
  mint?: PublicKey;
  name?: string;
  symbol?: string;
  uri?: string;
  sellerFeeBasisPoints?: number;
  creatorCount?: number;
  primarySaleHappened?: boolean;
  isMutable: boolean;
  /** Bytes appended after is_mutable (real records carry more fields) */
  trailing?: number;
}

function lengthPrefixed(value: string): Buffer {
  const body = Buffer.from(value, "utf8");
  const len = Buffer.alloc(4);
  len.writeUInt32LE(body.length, 0);
  return Buffer.concat([len, body]);
}

export function buildMetadata(fixture: MetadataFixture): Buffer {
  const fee = Buffer.alloc(2);
  fee.writeUInt16LE(fixture.sellerFeeBasisPoints ?? 500, 0);

  const creatorCount = fixture.creatorCount ?? 0;
  let creators: Buffer;
  if (creatorCount > 0) {
    creators = Buffer.alloc(1 + 4 + creatorCount * 34);
    creators.writeUInt8(1, 0);
    creators.writeUInt32LE(creatorCount, 1);
  } else {
    creators = Buffer.from([0]);
  }

  return Buffer.concat([
    Buffer.from([METADATA_V1_KEY]),
    (fixture.updateAuthority ?? PublicKey.unique()).toBuffer(),
    (fixture.mint ?? PublicKey.unique()).toBuffer(),
    lengthPrefixed(fixture.name ?? "Test Token"),
    lengthPrefixed(fixture.symbol ?? "TEST"),
    lengthPrefixed(fixture.uri ?? "https://example.com/token.json"),
    fee,
    creators,
    Buffer.from([fixture.primarySaleHappened ? 1 : 0, fixture.isMutable ? 1 : 0]),
    Buffer.alloc(fixture.trailing ?? 0),
  ]);
}

/**
 * In-process stand-in for the RPC: serves accounts from a map and records
 * every address asked for. Addresses listed in `failing` throw.
 */
export class InMemoryAccountFetcher implements AccountFetcher {
  readonly requested: string[] = [];
  private readonly accounts = new Map<string, RawAccount>();
  private readonly failing = new Set<string>();

  set(address: PublicKey, account: RawAccount): this {
    this.accounts.set(address.toBase58(), account);
    return this;
  }

  fail(address: PublicKey): this {
    this.failing.add(address.toBase58());
    return this;
  }

  async fetchAccount(address: PublicKey): Promise<RawAccount | null> {
    const key = address.toBase58();
    this.requested.push(key);
    if (this.failing.has(key)) throw new Error(`rpc unavailable for ${key}`);
    return this.accounts.get(key) ?? null;
  }
}
