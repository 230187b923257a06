import { PublicKey } from '@solana/web3.js';
import { MintLedger, toLedgerRecord } from '../ledger/mintLedger.js';
import { logger } from '../observability/logger.js';
import type { AccountFetcher } from '../solana/accountFetcher.js';
import { inspectMint } from '../token/mintInspector.js';
import { summarizeVerdict } from '../token/riskClassifier.js';
import { sleep } from '../utils/retry.js';

export interface ScanSummary {
  scanned: number;
  safe: number;
  danger: number;
  unknown: number;
  /** Inputs that were not valid base58 addresses */
  invalid: string[];
}

export interface ScanOptions {
  fetcher: AccountFetcher;
  ledger: MintLedger;
  batchSize: number;
  requestDelayMs: number;
  batchCooldownMs: number;
  now?: () => Date;
}

function parseMint(input: string): PublicKey | null {
  try {
    return new PublicKey(input.trim());
  } catch (err) {
    logger.warn(
      { event: 'scan_invalid_mint', input, err: err instanceof Error ? err.message : String(err) },
      'skipping invalid mint address'
    );
    return null;
  }
}

export interface ParsedMintInputs {
  mints: PublicKey[];
  invalid: string[];
}

/**
 * Splits raw address inputs into parsed mints and the inputs that are not
 * valid base58 addresses.
 */
export function parseMintInputs(inputs: string[]): ParsedMintInputs {
  const parsed: ParsedMintInputs = { mints: [], invalid: [] };
  for (const input of inputs) {
    const mint = parseMint(input);
    if (mint) parsed.mints.push(mint);
    else parsed.invalid.push(input);
  }
  return parsed;
}

/**
 * Inspects mints one at a time and merges each result into the ledger.
 * A failure on one mint never stops the batch; the ledger is saved after
 * every batch.
 */
export async function scanMints(mints: string[], opts: ScanOptions): Promise<ScanSummary> {
  const now = opts.now ?? (() => new Date());
  const summary: ScanSummary = { scanned: 0, safe: 0, danger: 0, unknown: 0, invalid: [] };
  const batchSize = Math.max(1, opts.batchSize);

  logger.info({ event: 'scan_start', total: mints.length, batchSize }, 'scanning mints');

  for (let start = 0; start < mints.length; start += batchSize) {
    const batch = mints.slice(start, start + batchSize);
    logger.info({ event: 'scan_batch', from: start, size: batch.length, total: mints.length }, 'scanning batch');

    for (const input of batch) {
      const mint = parseMint(input);
      if (!mint) {
        summary.invalid.push(input);
        continue;
      }

      const inspection = await inspectMint(mint, opts.fetcher);
      opts.ledger.merge(toLedgerRecord(inspection, now()));
      summary.scanned += 1;

      switch (inspection.verdict.status) {
        case 'SAFE':
          summary.safe += 1;
          break;
        case 'DANGER':
          summary.danger += 1;
          break;
        case 'UNKNOWN':
          summary.unknown += 1;
          break;
      }

      logger.info(
        {
          event: 'mint_scanned',
          mint: mint.toBase58(),
          program: inspection.program,
          status: inspection.verdict.status,
          summary: summarizeVerdict(inspection.verdict),
        },
        'mint scanned'
      );

      await sleep(opts.requestDelayMs);
    }

    await opts.ledger.save();
    const remaining = Math.max(0, mints.length - (start + batch.length));
    logger.info({ event: 'scan_batch_saved', saved: batch.length, remaining }, 'batch written to ledger');

    if (remaining > 0) await sleep(opts.batchCooldownMs);
  }

  logger.info(
    { event: 'scan_done', ...summary, invalid: summary.invalid.length },
    'scan finished'
  );
  return summary;
}
