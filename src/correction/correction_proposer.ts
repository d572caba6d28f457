import type { ContextSummary, CorrectionRecord } from "../contracts/violation";
import type { EthicsGate, ScreeningResult } from "../gates/ethics_gate";
import { GATE_CORRECTION_RESCREEN } from "../gates/gate_interfaces";
import type { DetectionContext } from "../gates/violation_detector";
import type { PipelineLogger } from "../logger";
import { previewText, silentLogger } from "../logger";
import type { PipelineMetrics } from "../metrics/pipeline_metrics";
import type { AuditSink } from "../store/audit_log";

export type ProblemClass = "low_confidence" | `inconsistency:${string}`;

export type CorrectionOutcome = {
  response: string;
  rewritten: string;
  rescreen: ScreeningResult;
  record: CorrectionRecord;
};

export const LOW_CONFIDENCE_PREFIX =
  "I'm not entirely confident in this answer, so please treat it as a starting point and double-check the details.";
export const INCONSISTENCY_PREFIX = "I may have given you conflicting information earlier.";
export const INCONSISTENCY_SUFFIX =
  "If this differs from what I said before, please rely on this answer and tell me if you'd like me to re-check.";

const DEFAULT_RECENT_LIMIT = 10;

export function inconsistencyReason(problemClass: ProblemClass): string | null {
  return problemClass.startsWith("inconsistency:")
    ? problemClass.slice("inconsistency:".length).trim()
    : null;
}

export function rewriteForProblem(original: string, problemClass: ProblemClass): string {
  const reason = inconsistencyReason(problemClass);
  if (reason === null) {
    return `${LOW_CONFIDENCE_PREFIX} ${original}`;
  }
  const because = reason ? ` ${reason}` : "";
  return `${INCONSISTENCY_PREFIX}${because} To reconcile: ${original} ${INCONSISTENCY_SUFFIX}`;
}

export type CorrectionProposerDeps = {
  ethics: EthicsGate;
  metrics: PipelineMetrics;
  auditLog: AuditSink<CorrectionRecord>;
  log?: PipelineLogger;
  now?: () => Date;
  recentLimit?: number;
};

/**
 * Rewrites a response for a diagnosed problem and screens the rewrite once.
 *
 * The rewrite is never corrected again: if the re-screen flags it, the
 * guardrail output from that screen is the final answer.
 */
export class CorrectionProposer {
  private readonly ethics: EthicsGate;
  private readonly metrics: PipelineMetrics;
  private readonly auditLog: AuditSink<CorrectionRecord>;
  private readonly log: PipelineLogger;
  private readonly now: () => Date;
  private readonly recentLimit: number;
  private recent: CorrectionRecord[] = [];

  constructor(deps: CorrectionProposerDeps) {
    this.ethics = deps.ethics;
    this.metrics = deps.metrics;
    this.auditLog = deps.auditLog;
    this.log = deps.log ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.recentLimit = deps.recentLimit ?? DEFAULT_RECENT_LIMIT;
  }

  async propose(args: {
    originalResponse: string;
    problemClass: ProblemClass;
    userInput: string;
    detection: DetectionContext;
    summary: ContextSummary;
    signal?: AbortSignal;
  }): Promise<CorrectionOutcome> {
    const rewritten = rewriteForProblem(args.originalResponse, args.problemClass);

    const rescreen = await this.ethics.screen({
      userInput: args.userInput,
      response: rewritten,
      context: args.detection,
      summary: args.summary,
      gateName: GATE_CORRECTION_RESCREEN,
      signal: args.signal,
    });

    const reason = inconsistencyReason(args.problemClass);
    const record: CorrectionRecord = {
      timestamp: this.now().toISOString(),
      userInput: args.userInput,
      originalResponse: args.originalResponse,
      correctedResponse: rescreen.response,
      errorExplanation:
        reason === null
          ? `Low confidence detected (confidence ${args.summary.confidence.toFixed(2)}).`
          : `Inconsistency detected: ${reason}`,
      contextSummary: args.summary,
    };

    if (args.signal?.aborted) {
      return { response: rescreen.response, rewritten, rescreen, record };
    }

    this.metrics.recordCorrection({
      kind: reason === null ? "low_confidence" : "inconsistency",
      rescreenFlagged: !rescreen.isEthical,
      at: record.timestamp,
    });
    this.remember(record);

    try {
      await this.auditLog.append(record);
    } catch (error) {
      this.log.error(
        { evt: "correction.audit_append_failed", error: String(error) },
        "correction.audit_append_failed"
      );
    }

    this.log.info(
      {
        evt: "correction.proposed",
        problem: reason === null ? "low_confidence" : "inconsistency",
        query: previewText(args.userInput),
        intent: args.summary.intent,
        confidence: args.summary.confidence,
        rescreenFlagged: !rescreen.isEthical,
      },
      "correction.proposed"
    );

    return { response: rescreen.response, rewritten, rescreen, record };
  }

  recentCorrections(): CorrectionRecord[] {
    return [...this.recent];
  }

  private remember(record: CorrectionRecord): void {
    this.recent = [...this.recent, record].slice(-this.recentLimit);
  }
}
