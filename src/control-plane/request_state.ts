import { randomUUID } from "node:crypto";

import type { NLUResult, RetrievedKnowledge } from "../contracts/collaborators";
import { EMPTY_KNOWLEDGE } from "../contracts/collaborators";
import type { ExecutionResult, ReasoningFlags, ReasoningStep } from "../contracts/reasoning";
import type { Violation } from "../contracts/violation";
import type { GateOutput } from "../gates/gate_interfaces";
import { clampUnit } from "../reasoning/confidence_factors";

export type CorrectionSummary = {
  problem: "low_confidence" | "inconsistency";
  explanation: string;
  rescreenFlagged: boolean;
};

export type RequestState = Readonly<{
  turnId: string;
  sessionId: string | null;
  query: string;
  userRole?: string;
  nlu: NLUResult | null;
  knowledge: RetrievedKnowledge;
  steps: readonly ReasoningStep[];
  plan: readonly string[];
  executionResults: readonly ExecutionResult[];
  flags: ReasoningFlags | null;
  response: string;
  confidence: number;
  violations: readonly Violation[];
  isEthical: boolean;
  guardrailApplied: boolean;
  selfCorrected: boolean;
  clarificationIssued: boolean;
  adapted: boolean;
  correction: CorrectionSummary | null;
  gates: readonly GateOutput[];
}>;

type Identity = "turnId" | "sessionId" | "query" | "userRole";

export type RequestStatePatch = Partial<Omit<RequestState, Identity>>;

export function createRequestState(args: {
  query: string;
  sessionId: string | null;
  userRole?: string;
  turnId?: string;
}): RequestState {
  return Object.freeze({
    turnId: args.turnId ?? randomUUID(),
    sessionId: args.sessionId,
    query: args.query,
    ...(args.userRole ? { userRole: args.userRole } : {}),
    nlu: null,
    knowledge: EMPTY_KNOWLEDGE,
    steps: [],
    plan: [],
    executionResults: [],
    flags: null,
    response: "",
    confidence: 0,
    violations: [],
    isEthical: true,
    guardrailApplied: false,
    selfCorrected: false,
    clarificationIssued: false,
    adapted: false,
    correction: null,
    gates: [],
  });
}

/** Returns a new frozen state; the input is never mutated. Confidence is clamped to [0,1]. */
export function updateRequestState(state: RequestState, patch: RequestStatePatch): RequestState {
  const next = { ...state, ...patch };
  return Object.freeze({ ...next, confidence: clampUnit(next.confidence) });
}

function violationKey(v: Violation): string {
  return `${v.type}|${v.matchedPattern ?? ""}|${v.description}`;
}

/** Accumulates violations across screenings of one turn without repeating identical entries. */
export function mergeViolations(existing: readonly Violation[], incoming: readonly Violation[]): Violation[] {
  const seen = new Set(existing.map(violationKey));
  const merged = [...existing];
  for (const violation of incoming) {
    const key = violationKey(violation);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(violation);
  }
  return merged;
}
