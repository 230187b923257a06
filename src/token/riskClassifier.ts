import type { MetadataFacts, MintFacts, ReasonTag, TokenProgramKind, Verdict } from "./types.js";

export interface ClassifierInput {
  /** Mint account was returned by the node */
  accountFound: boolean;
  program: TokenProgramKind | null;
  /** null when the record could not be decoded at all */
  facts: MintFacts | null;
  metadata: MetadataFacts;
}

const REASON_LABELS: Record<ReasonTag, string> = {
  MINTABLE: "mintable",
  FREEZABLE: "freezable",
  MUTABLE_METADATA: "mutable metadata",
  UNDETERMINED_METADATA: "undetermined metadata",
  MALFORMED_RECORD: "malformed record",
};

/**
 * Folds decoded facts into a verdict.
 *
 * UNKNOWN only when there was nothing to decode (account missing or not a
 * mint of a known token program). Everything else is SAFE only if no reason
 * was collected; an undeterminable metadata state counts as a reason.
 * Reasons keep evaluation order: authorities, then metadata, then parse state.
 */
export function classifyMint(input: ClassifierInput): Verdict {
  if (!input.accountFound) return { status: "UNKNOWN", cause: "ACCOUNT_NOT_FOUND" };
  if (input.program === null || input.program === "unrecognized") {
    return { status: "UNKNOWN", cause: "UNRECOGNIZED_OWNER" };
  }

  const reasons: ReasonTag[] = [];
  const { facts, metadata } = input;

  if (facts?.mintAuthority) reasons.push("MINTABLE");
  if (facts?.freezeAuthority) reasons.push("FREEZABLE");

  if (metadata.isMutable === true) reasons.push("MUTABLE_METADATA");
  else if (metadata.isMutable === null) reasons.push("UNDETERMINED_METADATA");

  if (!facts || facts.parseFail) reasons.push("MALFORMED_RECORD");

  return reasons.length === 0 ? { status: "SAFE" } : { status: "DANGER", reasons };
}

/**
 * Short text for the ledger's health_summary column.
 */
export function summarizeVerdict(verdict: Verdict): string {
  switch (verdict.status) {
    case "SAFE":
      return "Safe";
    case "DANGER":
      return `Danger - ${verdict.reasons.map((r) => REASON_LABELS[r]).join(", ")}`;
    case "UNKNOWN":
      return verdict.cause === "ACCOUNT_NOT_FOUND" ? "Unknown - account not found" : "Unknown - not a token mint";
  }
}
