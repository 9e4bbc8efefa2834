import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AggregateResult, SourceOutcome } from "../discovery/types.js";
import type { Opportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";

/**
 * Write opportunities to JSON file with pretty formatting.
 */
export async function writeJson(
  opportunities: readonly Opportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const filePath = path.join(outDir, "opportunities.json");
  await writeFile(filePath, JSON.stringify(opportunities, null, 2), "utf-8");

  logger.info({ filePath, count: opportunities.length }, "Wrote JSON file");
  return filePath;
}

type OutcomeSummary =
  | Omit<Extract<SourceOutcome, { status: "ok" }>, "opportunities">
  | Extract<SourceOutcome, { status: "error" }>
  | Omit<Extract<SourceOutcome, { status: "timed_out" }>, "opportunities">;

// Opportunity lists already live in opportunities.json
function withoutOpportunities(outcome: SourceOutcome): OutcomeSummary {
  if (outcome.status === "error") return outcome;
  const { opportunities: _listed, ...rest } = outcome;
  return rest;
}

export function summarize(result: AggregateResult) {
  const sources: Record<string, OutcomeSummary> = {};
  for (const name of result.sourcesAttempted) {
    const outcome = result.bySource[name];
    if (outcome) sources[name] = withoutOpportunities(outcome);
  }

  return {
    caller: result.caller,
    totalFound: result.totalFound,
    totalValue: result.totalValue,
    defaultValuedCount: result.defaultValuedCount,
    sourcesAttempted: result.sourcesAttempted,
    completedAt: result.completedAt,
    durationMs: result.durationMs,
    sources,
  };
}

export async function writeSummary(result: AggregateResult, outDir: string, logger: Logger): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const filePath = path.join(outDir, "summary.json");
  await writeFile(filePath, JSON.stringify(summarize(result), null, 2), "utf-8");

  logger.info({ filePath }, "Wrote run summary");
  return filePath;
}
