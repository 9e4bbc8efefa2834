import type { Opportunity, SourceName } from "../transform/schema.js";
import type { ErrorKind } from "../util/errors.js";

export type SourceOutcome =
  | {
      status: "ok";
      count: number;
      opportunities: Opportunity[];
      durationMs: number;
    }
  | {
      status: "error";
      count: 0;
      error: string;
      errorKind: ErrorKind;
      durationMs: number;
    }
  | {
      /** Deadline hit; `opportunities` holds what was emitted before it. */
      status: "timed_out";
      count: number;
      opportunities: Opportunity[];
      error: string;
      durationMs: number;
    };

export interface AggregateResult {
  /** True whenever orchestration completes; source health lives in `bySource`. */
  ok: true;
  caller: string;
  opportunities: Opportunity[];
  bySource: Partial<Record<SourceName, SourceOutcome>>;
  totalFound: number;
  totalValue: number;
  /** Opportunities whose value is the placeholder rather than a platform or extracted amount. */
  defaultValuedCount: number;
  sourcesAttempted: SourceName[];
  completedAt: string;
  durationMs: number;
}
