import { Buffer } from "buffer";
import type { Commitment, Connection, PublicKey } from "@solana/web3.js";
import { logger } from "../observability/logger.js";
import { withRetry } from "../utils/retry.js";
import type { RawAccount } from "../token/types.js";

/**
 * Source of raw account bytes. Returns null when the account does not exist;
 * transport errors are thrown.
 */
export interface AccountFetcher {
  fetchAccount(address: PublicKey): Promise<RawAccount | null>;
}

export interface ConnectionFetcherOptions {
  commitment?: Commitment;
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * AccountFetcher backed by a web3.js Connection, retrying transient RPC
 * failures with exponential backoff.
 */
export class ConnectionAccountFetcher implements AccountFetcher {
  private readonly commitment: Commitment;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly connection: Pick<Connection, "getAccountInfo">,
    options: ConnectionFetcherOptions = {}
  ) {
    this.commitment = options.commitment ?? "confirmed";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  async fetchAccount(address: PublicKey): Promise<RawAccount | null> {
    const info = await withRetry(() => this.connection.getAccountInfo(address, this.commitment), {
      maxRetries: this.maxRetries,
      delayMs: this.retryDelayMs,
      onRetry: (err, attempt, delayMs) =>
        logger.warn(
          { event: "account_fetch_retry", address: address.toBase58(), attempt, delayMs, err: err.message },
          "getAccountInfo failed, retrying"
        ),
    });
    if (!info) return null;
    return { owner: info.owner, data: Buffer.from(info.data) };
  }
}
