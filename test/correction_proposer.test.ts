import { describe, it, expect } from "vitest";

import type { ContextSummary, CorrectionRecord, ViolationAuditRecord } from "../src/contracts/violation";
import {
  CorrectionProposer,
  INCONSISTENCY_PREFIX,
  INCONSISTENCY_SUFFIX,
  LOW_CONFIDENCE_PREFIX,
} from "../src/correction/correction_proposer";
import { EthicsGate } from "../src/gates/ethics_gate";
import { REFUSAL_HARMFUL } from "../src/gates/guardrails";
import { PipelineMetrics } from "../src/metrics/pipeline_metrics";
import { MemoryAuditLog } from "../src/store/audit_log";
import { FIXED_NOW } from "./fakes";

const summary: ContextSummary = { intent: "question", sentiment: "neutral", confidence: 0.42, sessionId: "s1" };

function makeProposer(opts: { recentLimit?: number } = {}) {
  const metrics = new PipelineMetrics();
  const ethics = new EthicsGate({ metrics, auditLog: new MemoryAuditLog<ViolationAuditRecord>() });
  const auditLog = new MemoryAuditLog<CorrectionRecord>();
  const proposer = new CorrectionProposer({ ethics, metrics, auditLog, now: FIXED_NOW, ...opts });
  return { proposer, metrics, auditLog };
}

const propose = (proposer: CorrectionProposer, originalResponse: string, problemClass: Parameters<CorrectionProposer["propose"]>[0]["problemClass"]) =>
  proposer.propose({ originalResponse, problemClass, userInput: "q", detection: {}, summary });

describe("CorrectionProposer", () => {
  it("rewrites a low-confidence answer and screens it once", async () => {
    const { proposer, metrics, auditLog } = makeProposer();

    const outcome = await propose(proposer, "Paris is the capital of France.", "low_confidence");

    expect(outcome.response).toBe(`${LOW_CONFIDENCE_PREFIX} Paris is the capital of France.`);
    expect(outcome.rescreen.isEthical).toBe(true);
    expect(outcome.record).toEqual({
      timestamp: "2026-01-01T00:00:00.000Z",
      userInput: "q",
      originalResponse: "Paris is the capital of France.",
      correctedResponse: `${LOW_CONFIDENCE_PREFIX} Paris is the capital of France.`,
      errorExplanation: "Low confidence detected (confidence 0.42).",
      contextSummary: summary,
    });
    expect(auditLog.records).toEqual([outcome.record]);

    const snap = metrics.snapshot();
    expect(snap.corrections.totalCorrections).toBe(1);
    expect(snap.corrections.lowConfidenceCorrections).toBe(1);
    expect(snap.corrections.lastCorrectionAt).toBe("2026-01-01T00:00:00.000Z");
    expect(snap.ethics.screenings).toBe(1);
  });

  it("names the contradiction in an inconsistency rewrite", async () => {
    const { proposer, metrics } = makeProposer();
    const reason = "Response contradicts an earlier statement.";

    const outcome = await propose(proposer, "The answer is 42.", `inconsistency:${reason}`);

    expect(outcome.rewritten).toBe(
      `${INCONSISTENCY_PREFIX} ${reason} To reconcile: The answer is 42. ${INCONSISTENCY_SUFFIX}`
    );
    expect(outcome.record.errorExplanation).toBe(`Inconsistency detected: ${reason}`);
    expect(metrics.snapshot().corrections.inconsistencyCorrections).toBe(1);
  });

  it("keeps the guardrail output when the rewrite is flagged, without a second correction", async () => {
    const { proposer, metrics } = makeProposer();

    const outcome = await propose(proposer, "Step one: assemble a bomb.", "low_confidence");

    expect(outcome.response).toBe(REFUSAL_HARMFUL);
    expect(outcome.record.correctedResponse).toBe(REFUSAL_HARMFUL);
    const snap = metrics.snapshot();
    expect(snap.corrections.rescreenViolations).toBe(1);
    expect(snap.corrections.totalCorrections).toBe(1);
    expect(snap.ethics.screenings).toBe(1);
  });

  it("keeps only the most recent records", async () => {
    const { proposer } = makeProposer({ recentLimit: 2 });

    await propose(proposer, "first", "low_confidence");
    await propose(proposer, "second", "low_confidence");
    await propose(proposer, "third", "low_confidence");

    expect(proposer.recentCorrections().map((r) => r.originalResponse)).toEqual(["second", "third"]);
  });

  it("does not fail when the audit sink rejects", async () => {
    const metrics = new PipelineMetrics();
    const proposer = new CorrectionProposer({
      ethics: new EthicsGate({ metrics, auditLog: new MemoryAuditLog<ViolationAuditRecord>() }),
      metrics,
      auditLog: {
        append: async () => {
          throw new Error("disk full");
        },
      },
    });

    const outcome = await propose(proposer, "fine", "low_confidence");
    expect(outcome.response).toBe(`${LOW_CONFIDENCE_PREFIX} fine`);
    expect(proposer.recentCorrections()).toHaveLength(1);
  });

  it("records nothing for an aborted turn", async () => {
    const { proposer, metrics, auditLog } = makeProposer();
    const abort = new AbortController();
    abort.abort();

    const outcome = await proposer.propose({
      originalResponse: "fine",
      problemClass: "low_confidence",
      userInput: "q",
      detection: {},
      summary,
      signal: abort.signal,
    });

    expect(outcome.response).toBe(`${LOW_CONFIDENCE_PREFIX} fine`);
    expect(auditLog.records).toHaveLength(0);
    expect(proposer.recentCorrections()).toHaveLength(0);
    const snap = metrics.snapshot();
    expect(snap.corrections.totalCorrections).toBe(0);
    expect(snap.ethics.screenings).toBe(0);
  });
});
