import type { PublicKey } from "@solana/web3.js";
import { z } from "zod";
import { logger } from "../observability/logger.js";
import { readJsonIfExists, writeJsonAtomic } from "../shared/fs.js";
import { summarizeVerdict } from "../token/riskClassifier.js";
import type { MintInspection } from "../token/types.js";

export const LedgerRecordSchema = z.object({
  mint_address: z.string().min(1),
  is_spl2022: z.union([z.literal(0), z.literal(1), z.literal("unknown")]),
  mint_authority_exist: z.union([z.literal(0), z.literal(1), z.literal("unknown")]),
  freeze_authority_exist: z.union([z.literal(0), z.literal(1), z.literal("unknown")]),
  metadata_mutable: z.union([z.literal(0), z.literal(1), z.literal("unknown")]),
  security_status: z.enum(["SAFE", "DANGER", "UNKNOWN", ""]),
  health_summary: z.string(),
  first_seen_on: z.string(),
  last_updated: z.string(),
});

export type LedgerRecord = z.infer<typeof LedgerRecordSchema>;

const LedgerFileSchema = z.record(z.string(), LedgerRecordSchema);

type Flag = LedgerRecord["metadata_mutable"];

function flag(value: boolean | null): Flag {
  if (value === null) return "unknown";
  return value ? 1 : 0;
}

/**
 * Flattens an inspection into the ledger's column set.
 */
export function toLedgerRecord(inspection: MintInspection, now: Date): LedgerRecord {
  const { facts } = inspection;
  const timestamp = now.toISOString();
  return {
    mint_address: inspection.mint.toBase58(),
    is_spl2022: flag(facts ? facts.isToken2022 : null),
    mint_authority_exist: flag(facts ? facts.mintAuthority !== null : null),
    freeze_authority_exist: flag(facts ? facts.freezeAuthority !== null : null),
    metadata_mutable: flag(inspection.metadata.isMutable),
    security_status: inspection.verdict.status,
    health_summary: summarizeVerdict(inspection.verdict),
    first_seen_on: timestamp,
    last_updated: timestamp,
  };
}

/**
 * JSON-file ledger keyed by mint address.
 *
 * Saves are chained on a single promise so overlapping merges and saves are
 * written in call order.
 */
export class MintLedger {
  private readonly records = new Map<string, LedgerRecord>();
  private pending: Promise<void> = Promise.resolve();

  private constructor(private readonly filePath: string) {}

  static async open(filePath: string): Promise<MintLedger> {
    const ledger = new MintLedger(filePath);
    const raw = await readJsonIfExists(filePath);
    if (raw !== undefined) {
      const parsed = LedgerFileSchema.safeParse(raw);
      if (!parsed.success) {
        const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
        throw new Error(`Invalid ledger file ${filePath}:\n${msg}`);
      }
      for (const [mint, record] of Object.entries(parsed.data)) {
        ledger.records.set(mint, record);
      }
    }
    logger.debug({ event: "ledger_opened", path: filePath, records: ledger.records.size }, "ledger opened");
    return ledger;
  }

  get size(): number {
    return this.records.size;
  }

  get(mint: string): LedgerRecord | undefined {
    return this.records.get(mint);
  }

  /**
   * Adds a mint with empty security columns if it is not tracked yet.
   */
  track(mint: PublicKey): void {
    const address = mint.toBase58();
    if (this.records.has(address)) return;
    this.records.set(address, {
      mint_address: address,
      is_spl2022: "unknown",
      mint_authority_exist: "unknown",
      freeze_authority_exist: "unknown",
      metadata_mutable: "unknown",
      security_status: "",
      health_summary: "",
      first_seen_on: "",
      last_updated: "",
    });
  }

  /**
   * Replaces the security columns of a mint, keeping its first_seen_on.
   */
  merge(record: LedgerRecord): LedgerRecord {
    const existing = this.records.get(record.mint_address);
    const merged: LedgerRecord = {
      ...record,
      first_seen_on: existing?.first_seen_on || record.first_seen_on,
    };
    this.records.set(record.mint_address, merged);
    return merged;
  }

  /**
   * Mints never classified, or last classified UNKNOWN.
   */
  pendingMints(): string[] {
    return [...this.records.values()]
      .filter((r) => r.security_status === "" || r.security_status === "UNKNOWN")
      .map((r) => r.mint_address);
  }

  countByStatus(): Record<"SAFE" | "DANGER" | "UNKNOWN", number> {
    const counts = { SAFE: 0, DANGER: 0, UNKNOWN: 0 };
    for (const r of this.records.values()) {
      if (r.security_status !== "") counts[r.security_status] += 1;
    }
    return counts;
  }

  save(): Promise<void> {
    const run = this.pending.then(() => writeJsonAtomic(this.filePath, Object.fromEntries(this.records)));
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.pending = run.catch((err: unknown) => {
      logger.error({ event: "ledger_save_failed", path: this.filePath, err }, "ledger save failed");
    });
    return run;
  }
}
