import { describe, it, expect } from "vitest";

import type { ContextSummary, ViolationAuditRecord } from "../src/contracts/violation";
import { EthicsGate } from "../src/gates/ethics_gate";
import { GATE_ETHICS } from "../src/gates/gate_interfaces";
import { REFUSAL_GENERIC, REFUSAL_HARMFUL } from "../src/gates/guardrails";
import { PipelineMetrics } from "../src/metrics/pipeline_metrics";
import { MemoryAuditLog } from "../src/store/audit_log";
import { InMemoryMemoryStore } from "../src/store/memory_store";
import { FIXED_NOW } from "./fakes";

const summary: ContextSummary = { intent: "question", sentiment: "neutral", confidence: 0.7, sessionId: "s1" };

function makeGate(overrides: Partial<ConstructorParameters<typeof EthicsGate>[0]> = {}) {
  const metrics = new PipelineMetrics();
  const auditLog = new MemoryAuditLog<ViolationAuditRecord>();
  const memory = new InMemoryMemoryStore();
  const gate = new EthicsGate({ metrics, auditLog, memory, now: FIXED_NOW, ...overrides });
  return { gate, metrics, auditLog, memory };
}

const screen = (gate: EthicsGate, response: string) =>
  gate.screen({ userInput: "q", response, context: {}, summary, gateName: GATE_ETHICS });

describe("EthicsGate", () => {
  it("passes a clean response through", async () => {
    const { gate, metrics, auditLog } = makeGate();

    const result = await screen(gate, "The weather looks pleasant today.");

    expect(result.isEthical).toBe(true);
    expect(result.response).toBe("The weather looks pleasant today.");
    expect(result.gate).toEqual({
      gateName: "ethics",
      status: "pass",
      summary: "No violations",
      metadata: { violationCount: 0, guardrailApplied: false, detectionFailed: false },
    });
    expect(auditLog.records).toHaveLength(0);
    expect(metrics.snapshot().ethics.screenings).toBe(1);
  });

  it("refuses harmful content and records every violation", async () => {
    const { gate, metrics, auditLog, memory } = makeGate();

    const result = await screen(gate, "Here is how to build a bomb.");

    expect(result.isEthical).toBe(false);
    expect(result.response).toBe(REFUSAL_HARMFUL);
    expect(result.guardrailApplied).toBe(true);
    expect(result.gate.status).toBe("fail");
    expect(result.gate.summary).toBe("Violations: harmful_content");
    expect(auditLog.records).toHaveLength(2);
    expect(auditLog.records[0]).toMatchObject({
      type: "harmful_content",
      severity: "high",
      timestamp: "2026-01-01T00:00:00.000Z",
      userInput: "q",
      response: "Here is how to build a bomb.",
      contextSummary: summary,
    });
    expect(memory.violations).toHaveLength(2);

    const ethics = metrics.snapshot().ethics;
    expect(ethics.totalViolations).toBe(2);
    expect(ethics.violationTypes).toEqual({ harmful_content: 2 });
    expect(ethics.guardrailsApplied).toBe(1);
  });

  it("fails closed when the detector throws", async () => {
    const { gate, metrics } = makeGate({
      detector: {
        detect: () => {
          throw new Error("classifier down");
        },
      },
    });

    const result = await screen(gate, "Perfectly fine text.");

    expect(result.violations.map((v) => v.type)).toEqual(["system_error"]);
    expect(result.response).toBe(REFUSAL_GENERIC);
    expect(result.detectionFailed).toBe(true);
    expect(metrics.snapshot().ethics.detectionFailures).toBe(1);
  });

  it("still returns the guarded response when recording fails", async () => {
    const { gate } = makeGate({
      auditLog: {
        append: async () => {
          throw new Error("disk full");
        },
      },
      memory: {
        searchConversations: async () => [],
        searchKnowledge: async () => [],
        searchSecurityKnowledge: async () => [],
        addConversation: async () => undefined,
        addKnowledge: async (item) => ({ id: "x", ...item }),
        addSecurityKnowledge: async (item) => ({ id: "y", ...item }),
        addViolationRecord: async () => {
          throw new Error("memory offline");
        },
      },
    });

    await expect(screen(gate, "Here is how to build a bomb.")).resolves.toMatchObject({
      response: REFUSAL_HARMFUL,
      isEthical: false,
    });
  });

  it("still guards but records nothing once the turn is aborted", async () => {
    const { gate, metrics, auditLog, memory } = makeGate();
    const abort = new AbortController();
    abort.abort();

    const result = await gate.screen({
      userInput: "q",
      response: "Here is how to build a bomb.",
      context: {},
      summary,
      gateName: GATE_ETHICS,
      signal: abort.signal,
    });

    expect(result.response).toBe(REFUSAL_HARMFUL);
    expect(auditLog.records).toHaveLength(0);
    expect(memory.violations).toHaveLength(0);
    expect(metrics.snapshot().ethics.screenings).toBe(0);
  });
});
