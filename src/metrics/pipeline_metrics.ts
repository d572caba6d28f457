import type { ViolationType } from "../contracts/violation";

export type ReasoningStats = {
  totalQueries: number;
  successfulReasoning: number;
  failedReasoning: number;
  averageSteps: number;
  averageConfidence: number;
};

export type EthicsStats = {
  screenings: number;
  totalViolations: number;
  violationTypes: Partial<Record<ViolationType, number>>;
  guardrailsApplied: number;
  detectionFailures: number;
};

export type CorrectionStats = {
  totalCorrections: number;
  lowConfidenceCorrections: number;
  inconsistencyCorrections: number;
  rescreenViolations: number;
  lastCorrectionAt: string | null;
};

export type TurnStats = {
  totalTurns: number;
  failedTurns: number;
  timedOutTurns: number;
  clarificationsIssued: number;
  adaptationsApplied: number;
};

export type MetricsSnapshot = {
  reasoning: ReasoningStats;
  ethics: EthicsStats;
  corrections: CorrectionStats;
  turns: TurnStats;
};

/**
 * Process-wide counters, owned by the composition root and injected into each engine.
 *
 * Every mutator is a synchronous read-modify-write with no await inside, so
 * concurrent turns on the event loop can never interleave within an update.
 */
export class PipelineMetrics {
  private reasoning: ReasoningStats = {
    totalQueries: 0,
    successfulReasoning: 0,
    failedReasoning: 0,
    averageSteps: 0,
    averageConfidence: 0,
  };

  private ethics: EthicsStats = {
    screenings: 0,
    totalViolations: 0,
    violationTypes: {},
    guardrailsApplied: 0,
    detectionFailures: 0,
  };

  private corrections: CorrectionStats = {
    totalCorrections: 0,
    lowConfidenceCorrections: 0,
    inconsistencyCorrections: 0,
    rescreenViolations: 0,
    lastCorrectionAt: null,
  };

  private turns: TurnStats = {
    totalTurns: 0,
    failedTurns: 0,
    timedOutTurns: 0,
    clarificationsIssued: 0,
    adaptationsApplied: 0,
  };

  recordReasoning(args: { success: boolean; stepCount: number; confidence: number }): void {
    const r = this.reasoning;
    r.totalQueries += 1;
    if (args.success) {
      r.successfulReasoning += 1;
    } else {
      r.failedReasoning += 1;
    }
    r.averageSteps += (args.stepCount - r.averageSteps) / r.totalQueries;
    r.averageConfidence += (args.confidence - r.averageConfidence) / r.totalQueries;
  }

  recordScreening(args: {
    violationTypes: ViolationType[];
    guardrailApplied: boolean;
    detectionFailed: boolean;
  }): void {
    const e = this.ethics;
    e.screenings += 1;
    e.totalViolations += args.violationTypes.length;
    for (const type of args.violationTypes) {
      e.violationTypes[type] = (e.violationTypes[type] ?? 0) + 1;
    }
    if (args.guardrailApplied) e.guardrailsApplied += 1;
    if (args.detectionFailed) e.detectionFailures += 1;
  }

  recordCorrection(args: {
    kind: "low_confidence" | "inconsistency";
    rescreenFlagged: boolean;
    at: string;
  }): void {
    const c = this.corrections;
    c.totalCorrections += 1;
    if (args.kind === "low_confidence") {
      c.lowConfidenceCorrections += 1;
    } else {
      c.inconsistencyCorrections += 1;
    }
    if (args.rescreenFlagged) c.rescreenViolations += 1;
    c.lastCorrectionAt = args.at;
  }

  recordTurn(args: {
    outcome: "completed" | "failed" | "timeout";
    clarificationIssued?: boolean;
    adapted?: boolean;
  }): void {
    const t = this.turns;
    t.totalTurns += 1;
    if (args.outcome === "failed") t.failedTurns += 1;
    if (args.outcome === "timeout") {
      t.failedTurns += 1;
      t.timedOutTurns += 1;
    }
    if (args.clarificationIssued) t.clarificationsIssued += 1;
    if (args.adapted) t.adaptationsApplied += 1;
  }

  snapshot(): MetricsSnapshot {
    return {
      reasoning: { ...this.reasoning },
      ethics: { ...this.ethics, violationTypes: { ...this.ethics.violationTypes } },
      corrections: { ...this.corrections },
      turns: { ...this.turns },
    };
  }
}
