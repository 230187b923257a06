#!/usr/bin/env node
import path from "node:path";
import { loadEnv } from "../config/env.js";
import { MintLedger } from "../ledger/mintLedger.js";
import { logger } from "../observability/logger.js";
import { parseMintInputs, scanMints } from "../pipeline/scanMints.js";
import { ConnectionAccountFetcher } from "../solana/accountFetcher.js";
import { getConnection } from "../solana/connection.js";

/**
 * Scans mints and writes their security status to the ledger.
 * Usage:
 *   npm run scan:mints                  # every pending mint in the ledger
 *   npm run scan:mints <mint> [<mint>]  # the given mints
 */

async function main() {
  const env = loadEnv();
  const ledgerPath = path.resolve(env.LEDGER_PATH);
  const ledger = await MintLedger.open(ledgerPath);

  const args = process.argv.slice(2);
  const requested = parseMintInputs(args);
  for (const mint of requested.mints) ledger.track(mint);
  const mints = args.length > 0 ? requested.mints.map((m) => m.toBase58()) : ledger.pendingMints();

  if (mints.length === 0) {
    logger.info({ event: "scan_nothing_pending", ledger: ledgerPath }, "no new tokens to scan");
    return;
  }

  const fetcher = new ConnectionAccountFetcher(getConnection(), {
    maxRetries: env.FETCH_MAX_RETRIES,
    retryDelayMs: env.FETCH_RETRY_DELAY_MS,
  });

  const summary = await scanMints(mints, {
    fetcher,
    ledger,
    batchSize: env.SCAN_BATCH_SIZE,
    requestDelayMs: env.SCAN_REQUEST_DELAY_MS,
    batchCooldownMs: env.SCAN_BATCH_COOLDOWN_MS,
  });

  logger.info(
    { event: "scan_summary", ...ledger.countByStatus(), scannedThisRun: summary.scanned, ledger: ledgerPath },
    "ledger totals"
  );
}

main().catch((err) => {
  logger.fatal({ event: "scan_failed", err }, "scan_failed");
  process.exit(1);
});
