#!/usr/bin/env node
import { PublicKey } from "@solana/web3.js";
import { loadEnv } from "../config/env.js";
import { logger } from "../observability/logger.js";
import { ConnectionAccountFetcher } from "../solana/accountFetcher.js";
import { getConnection } from "../solana/connection.js";
import { inspectMint } from "../token/mintInspector.js";
import { summarizeVerdict } from "../token/riskClassifier.js";

/**
 * CLI tool for inspecting a single mint
 * Usage:
 *   npm run inspect:mint <mint_pubkey>
 */

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

async function main() {
  const [mintArg] = process.argv.slice(2);
  if (!mintArg) {
    console.error("Usage: npm run inspect:mint <mint_pubkey>");
    process.exit(1);
  }

  let mint: PublicKey;
  try {
    mint = new PublicKey(mintArg);
  } catch {
    console.error("Invalid public key:", mintArg);
    process.exit(1);
  }

  const env = loadEnv();
  const fetcher = new ConnectionAccountFetcher(getConnection(), {
    maxRetries: env.FETCH_MAX_RETRIES,
    retryDelayMs: env.FETCH_RETRY_DELAY_MS,
  });

  logger.info({ event: "inspect_start", mint: mint.toBase58() }, "inspecting mint");
  const inspection = await inspectMint(mint, fetcher);

  console.log("\n=== Mint Inspection ===");
  console.log(JSON.stringify({ ...inspection, summary: summarizeVerdict(inspection.verdict) }, jsonReplacer, 2));
}

main().catch((err) => {
  logger.fatal({ event: "inspect_failed", err }, "inspect_failed");
  process.exit(1);
});
