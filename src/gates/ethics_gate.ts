import type { MemoryCollaborator } from "../contracts/collaborators";
import type { ContextSummary, Violation, ViolationAuditRecord } from "../contracts/violation";
import type { PipelineLogger } from "../logger";
import { previewText, silentLogger } from "../logger";
import type { PipelineMetrics } from "../metrics/pipeline_metrics";
import type { AuditSink } from "../store/audit_log";
import { applyGuardrails } from "./guardrails";
import type { GateName, GateOutput } from "./gate_interfaces";
import {
  PatternViolationDetector,
  systemErrorViolation,
  type DetectionContext,
  type ViolationDetector,
} from "./violation_detector";

export type ScreeningResult = {
  isEthical: boolean;
  violations: Violation[];
  response: string;
  guardrailApplied: boolean;
  detectionFailed: boolean;
  gate: GateOutput;
};

export type EthicsGateDeps = {
  metrics: PipelineMetrics;
  auditLog: AuditSink<ViolationAuditRecord>;
  detector?: ViolationDetector;
  memory?: MemoryCollaborator;
  log?: PipelineLogger;
  now?: () => Date;
};

/**
 * One screening pass: detect, record, then apply guardrails.
 *
 * Recording is best-effort; a failing audit sink or memory write is logged and
 * never prevents the guarded response from being returned. Nothing is recorded
 * once the turn's abort signal has fired.
 */
export class EthicsGate {
  private readonly detector: ViolationDetector;
  private readonly metrics: PipelineMetrics;
  private readonly auditLog: AuditSink<ViolationAuditRecord>;
  private readonly memory?: MemoryCollaborator;
  private readonly log: PipelineLogger;
  private readonly now: () => Date;

  constructor(deps: EthicsGateDeps) {
    this.detector = deps.detector ?? new PatternViolationDetector();
    this.metrics = deps.metrics;
    this.auditLog = deps.auditLog;
    this.memory = deps.memory;
    this.log = deps.log ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async screen(args: {
    userInput: string;
    response: string;
    context: DetectionContext;
    summary: ContextSummary;
    gateName: GateName;
    signal?: AbortSignal;
  }): Promise<ScreeningResult> {
    const violations = this.detectFailClosed(args.response, args.userInput, args.context);
    const detectionFailed = violations.some((v) => v.type === "system_error");
    const guarded = applyGuardrails({
      userInput: args.userInput,
      response: args.response,
      violations,
      log: this.log,
    });
    const guardrailApplied = guarded !== args.response;

    if (!args.signal?.aborted) {
      this.metrics.recordScreening({
        violationTypes: violations.map((v) => v.type),
        guardrailApplied,
        detectionFailed,
      });
    }

    if (violations.length > 0 && !args.signal?.aborted) {
      this.log.warn(
        {
          evt: "ethics.violations_detected",
          gate: args.gateName,
          query: previewText(args.userInput),
          intent: args.summary.intent,
          confidence: args.summary.confidence,
          types: violations.map((v) => v.type),
          severities: violations.map((v) => v.severity),
          guardrailApplied,
        },
        "ethics.violations_detected"
      );
      await this.record(args.userInput, args.response, violations, args.summary, args.signal);
    }

    return {
      isEthical: violations.length === 0,
      violations,
      response: guarded,
      guardrailApplied,
      detectionFailed,
      gate: {
        gateName: args.gateName,
        status: violations.length === 0 ? "pass" : guardrailApplied ? "fail" : "warn",
        summary:
          violations.length === 0
            ? "No violations"
            : `Violations: ${Array.from(new Set(violations.map((v) => v.type))).join(", ")}`,
        metadata: {
          violationCount: violations.length,
          guardrailApplied,
          detectionFailed,
        },
      },
    };
  }

  private detectFailClosed(response: string, userInput: string, context: DetectionContext): Violation[] {
    try {
      return this.detector.detect(response, userInput, context);
    } catch (error) {
      this.log.error(
        { evt: "ethics.detector_failed", error: String(error) },
        "ethics.detector_failed"
      );
      return [systemErrorViolation(error)];
    }
  }

  private async record(
    userInput: string,
    response: string,
    violations: Violation[],
    summary: ContextSummary,
    signal?: AbortSignal
  ): Promise<void> {
    const timestamp = this.now().toISOString();
    for (const violation of violations) {
      if (signal?.aborted) return;
      const record: ViolationAuditRecord = {
        ...violation,
        timestamp,
        userInput,
        response,
        contextSummary: summary,
      };

      try {
        await this.auditLog.append(record);
      } catch (error) {
        this.log.error(
          { evt: "ethics.audit_append_failed", type: violation.type, error: String(error) },
          "ethics.audit_append_failed"
        );
      }

      if (!this.memory || signal?.aborted) continue;
      try {
        await this.memory.addViolationRecord(record);
      } catch (error) {
        this.log.warn(
          { evt: "ethics.memory_record_failed", type: violation.type, error: String(error) },
          "ethics.memory_record_failed"
        );
      }
    }
  }
}
