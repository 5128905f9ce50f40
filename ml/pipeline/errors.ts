export type CorpusErrorCode =
  | "INPUT_MISSING"
  | "INPUT_COLUMN_MISSING"
  | "CONFIG_INVALID"
  | "CONFIG_CONTRADICTORY"
  | "OUTPUT_WRITE_FAILED";

export type CorpusFailureArtifact = {
  code: CorpusErrorCode | "UNEXPECTED";
  stage_failed: string;
  reason: string;
  details: string[];
  next_action: string;
};

const DEFAULT_NEXT_ACTION: Record<CorpusErrorCode, string> = {
  INPUT_MISSING: "Check the input paths, then rerun.",
  INPUT_COLUMN_MISSING: "Check the CSV header of the named input, then rerun.",
  CONFIG_INVALID: "Fix the listed options, then rerun.",
  CONFIG_CONTRADICTORY: "Pass either --all_jsonl or all of --train_jsonl/--val_jsonl/--test_jsonl.",
  OUTPUT_WRITE_FAILED: "Inspect the output directory permissions and the listed rows, then rerun.",
};

/**
 * File- and configuration-level failures. Row-level problems never raise; they are counted.
 */
export class CorpusPipelineError extends Error {
  readonly code: CorpusErrorCode;
  readonly stage: string;
  readonly details: string[];
  readonly next_action: string;

  constructor(params: {
    code: CorpusErrorCode;
    stage: string;
    reason: string;
    details?: string[];
    next_action?: string;
  }) {
    super(params.reason);
    this.name = "CorpusPipelineError";
    this.code = params.code;
    this.stage = params.stage;
    this.details = params.details ?? [];
    this.next_action = params.next_action ?? DEFAULT_NEXT_ACTION[params.code];
  }

  toFailureArtifact(): CorpusFailureArtifact {
    return {
      code: this.code,
      stage_failed: this.stage,
      reason: this.message,
      details: this.details,
      next_action: this.next_action,
    };
  }
}

export function toFailureArtifact(error: unknown, stage: string): CorpusFailureArtifact {
  if (error instanceof CorpusPipelineError) {
    return error.toFailureArtifact();
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    code: "UNEXPECTED",
    stage_failed: stage,
    reason,
    details: [],
    next_action: "Review the run log for the failing stage and rerun.",
  };
}
