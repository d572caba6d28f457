import type {
  HistoryEntry,
  KnowledgeItem,
  MemoryCollaborator,
  NLUResult,
  NluProvider,
  RetrievedKnowledge,
  TeamingProvider,
  TurnContext,
} from "../contracts/collaborators";
import type { ExecutionResult, ReasoningFlags, ReasoningStep } from "../contracts/reasoning";
import type { ContextSummary, Violation } from "../contracts/violation";
import type { ConfidenceAssessor } from "../correction/confidence_assessor";
import type { CorrectionProposer, ProblemClass } from "../correction/correction_proposer";
import type { InconsistencyDetector, InconsistencyResult } from "../correction/inconsistency_detector";
import type { EthicsGate } from "../gates/ethics_gate";
import { GATE_ETHICS, type GateOutput } from "../gates/gate_interfaces";
import type { PipelineLogger } from "../logger";
import { previewText, silentLogger } from "../logger";
import type { PipelineMetrics } from "../metrics/pipeline_metrics";
import { CollaboratorError, type CollaboratorName } from "../providers/collaborator_error";
import type { ReasoningEngine } from "../reasoning/reasoning_engine";
import {
  createRequestState,
  mergeViolations,
  updateRequestState,
  type CorrectionSummary,
  type RequestState,
} from "./request_state";

export const UNCERTAINTY_RESPONSE =
  "I'm not sure I can answer that reliably right now. Could you try again or rephrase your question?";

export const DEFAULT_NLU_RESULT: NLUResult = {
  intent: "general",
  entities: [],
  confidence: 0,
  sentiment: "neutral",
};

export type TurnInput = {
  sessionId: string | null;
  message: string;
  userRole?: string;
};

export type TurnStatus = "completed" | "failed";

export type TurnResult = {
  turnId: string;
  sessionId: string | null;
  status: TurnStatus;
  failureReason?: "timeout" | "error";
  response: string;
  confidence: number;
  intent: string;
  isEthical: boolean;
  guardrailApplied: boolean;
  selfCorrected: boolean;
  clarificationIssued: boolean;
  adapted: boolean;
  violations: Violation[];
  correction: CorrectionSummary | null;
  plan: string[];
  steps: ReasoningStep[];
  executionResults: ExecutionResult[];
  flags: ReasoningFlags | null;
  gates: GateOutput[];
};

export type ControllerSettings = {
  selfCorrectionEnabled: boolean;
  correctionConfidenceThreshold: number;
  inconsistencyWindow: number;
  historyLimit: number;
  knowledgeLimit: number;
  turnTimeoutMs: number;
};

export type PipelineControllerDeps = {
  settings: ControllerSettings;
  nlu: NluProvider;
  memory: MemoryCollaborator;
  teaming: TeamingProvider;
  reasoning: ReasoningEngine;
  ethics: EthicsGate;
  assessor: ConfidenceAssessor;
  inconsistency: InconsistencyDetector;
  corrector: CorrectionProposer;
  metrics: PipelineMetrics;
  log?: PipelineLogger;
};

/**
 * Composition of one turn:
 * NLU, memory recall, reasoning, confidence and consistency checks,
 * conditional correction, ethics screening, clarification or adaptation,
 * memory write. Stages run strictly in order; nothing is retried.
 */
export class PipelineController {
  private readonly settings: ControllerSettings;
  private readonly nlu: NluProvider;
  private readonly memory: MemoryCollaborator;
  private readonly teaming: TeamingProvider;
  private readonly reasoning: ReasoningEngine;
  private readonly ethics: EthicsGate;
  private readonly assessor: ConfidenceAssessor;
  private readonly inconsistency: InconsistencyDetector;
  private readonly corrector: CorrectionProposer;
  private readonly metrics: PipelineMetrics;
  private readonly log: PipelineLogger;

  constructor(deps: PipelineControllerDeps) {
    this.settings = deps.settings;
    this.nlu = deps.nlu;
    this.memory = deps.memory;
    this.teaming = deps.teaming;
    this.reasoning = deps.reasoning;
    this.ethics = deps.ethics;
    this.assessor = deps.assessor;
    this.inconsistency = deps.inconsistency;
    this.corrector = deps.corrector;
    this.metrics = deps.metrics;
    this.log = deps.log ?? silentLogger;
  }

  get recentCorrections() {
    return this.corrector.recentCorrections();
  }

  /**
   * Runs the turn under the configured deadline. A turn that times out or
   * throws is reported as failed with a fixed uncertainty answer. The
   * abandoned turn stops at its next stage and records nothing after the
   * deadline: no memory, audit or metrics writes.
   */
  async runTurnWithTimeout(input: TurnInput): Promise<TurnResult> {
    const abort = new AbortController();
    const startNs = process.hrtime.bigint();
    let timer: NodeJS.Timeout | undefined;

    const turn = this.execute(input, abort.signal);
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.settings.turnTimeoutMs);
    });

    try {
      const winner = await Promise.race([turn, deadline]);
      if (winner !== "timeout") return winner;

      abort.abort(new Error(`turn exceeded ${this.settings.turnTimeoutMs}ms`));
      void turn.catch((error: unknown) => {
        this.log.warn(
          { evt: "turn.abandoned", error: String(error) },
          "turn.abandoned"
        );
      });
      this.log.error(
        {
          evt: "turn.timeout",
          query: previewText(input.message),
          timeoutMs: this.settings.turnTimeoutMs,
          totalMs: Math.round(Number(process.hrtime.bigint() - startNs) / 1e6),
        },
        "turn.timeout"
      );
      this.metrics.recordTurn({ outcome: "timeout" });
      return failedResult(input, "timeout");
    } catch (error) {
      abort.abort(error);
      this.log.error(
        { evt: "turn.failed", query: previewText(input.message), error: String(error) },
        "turn.failed"
      );
      this.metrics.recordTurn({ outcome: "failed" });
      return failedResult(input, "error");
    } finally {
      clearTimeout(timer);
    }
  }

  /** One turn with no deadline. */
  async runTurn(input: TurnInput): Promise<TurnResult> {
    return this.execute(input);
  }

  // Every await is followed by an abort check; nothing is recorded once the signal fires.
  private async execute(input: TurnInput, signal?: AbortSignal): Promise<TurnResult> {
    const startNs = process.hrtime.bigint();
    let state = createRequestState({
      query: input.message,
      sessionId: input.sessionId,
      userRole: input.userRole,
    });
    const baseContext: TurnContext = {
      sessionId: input.sessionId,
      ...(input.userRole ? { userRole: input.userRole } : {}),
    };

    // 1. NLU
    const nlu = await this.understand(state.query, baseContext);
    signal?.throwIfAborted();
    state = updateRequestState(state, { nlu });
    const turnContext: TurnContext = { ...baseContext, intent: nlu.intent, sentiment: nlu.sentiment };

    // 2. Memory recall
    const knowledge = await this.recall(state.query);
    signal?.throwIfAborted();
    state = updateRequestState(state, { knowledge });

    // 3. Reasoning
    const outcome = await this.reasoning.reason(state.query, nlu, knowledge, turnContext, signal);
    signal?.throwIfAborted();
    state = updateRequestState(state, {
      response: outcome.response,
      confidence: outcome.confidence,
      steps: outcome.steps,
      plan: outcome.plan,
      executionResults: outcome.executionResults,
      flags: outcome.flags,
    });

    // 4. Confidence + consistency
    const assessed = this.assessor.assess(state.response, {
      reasoningConfidence: outcome.confidence,
      nluConfidence: nlu.confidence,
    });
    const history = knowledge.conversationHistory.slice(0, this.settings.inconsistencyWindow);
    const consistency = this.inconsistency.detect(state.response, history, { query: state.query });
    state = updateRequestState(state, { confidence: assessed });

    const summary = (): ContextSummary => ({
      intent: nlu.intent,
      sentiment: nlu.sentiment,
      confidence: state.confidence,
      sessionId: state.sessionId,
    });
    const detection = { sentiment: nlu.sentiment, confidence: assessed, intent: nlu.intent };

    // 5. Conditional correction, at most once per turn
    const problemClass = this.diagnose(assessed, consistency);

    if (problemClass) {
      const corrected = await this.corrector.propose({
        originalResponse: state.response,
        problemClass,
        userInput: state.query,
        detection,
        summary: summary(),
        signal,
      });
      signal?.throwIfAborted();
      state = updateRequestState(state, {
        response: corrected.response,
        selfCorrected: true,
        violations: mergeViolations(state.violations, corrected.rescreen.violations),
        isEthical: corrected.rescreen.isEthical,
        guardrailApplied: corrected.rescreen.guardrailApplied,
        gates: [...state.gates, corrected.rescreen.gate],
        correction: {
          problem: problemClass === "low_confidence" ? "low_confidence" : "inconsistency",
          explanation: corrected.record.errorExplanation,
          rescreenFlagged: !corrected.rescreen.isEthical,
        },
      });
    }

    // 6. Ethics screening, always
    const screening = await this.ethics.screen({
      userInput: state.query,
      response: state.response,
      context: detection,
      summary: summary(),
      gateName: GATE_ETHICS,
      signal,
    });
    signal?.throwIfAborted();
    state = updateRequestState(state, {
      response: screening.response,
      violations: mergeViolations(state.violations, screening.violations),
      isEthical: state.isEthical && screening.isEthical,
      guardrailApplied: state.guardrailApplied || screening.guardrailApplied,
      gates: [...state.gates, screening.gate],
    });

    // 7. Clarification or adaptation; a guarded response is final
    if (!state.guardrailApplied) {
      state = await this.clarifyOrAdapt(state, nlu, turnContext);
      signal?.throwIfAborted();
    }

    // 8. Memory write
    await this.remember(state, nlu);
    signal?.throwIfAborted();

    this.metrics.recordTurn({
      outcome: "completed",
      clarificationIssued: state.clarificationIssued,
      adapted: state.adapted,
    });

    this.log.info(
      {
        evt: "turn.completed",
        turnId: state.turnId,
        sessionId: state.sessionId,
        intent: nlu.intent,
        confidence: state.confidence,
        isEthical: state.isEthical,
        selfCorrected: state.selfCorrected,
        clarificationIssued: state.clarificationIssued,
        totalMs: Math.round(Number(process.hrtime.bigint() - startNs) / 1e6),
      },
      "turn.completed"
    );

    return toTurnResult(state, "completed");
  }

  // Inconsistency takes precedence over low confidence when both apply.
  private diagnose(assessed: number, consistency: InconsistencyResult): ProblemClass | null {
    if (!this.settings.selfCorrectionEnabled) return null;
    if (consistency.inconsistent) return `inconsistency:${consistency.reason}`;
    if (assessed < this.settings.correctionConfidenceThreshold) return "low_confidence";
    return null;
  }

  private async understand(query: string, context: TurnContext): Promise<NLUResult> {
    try {
      return await this.nlu.process(query, context);
    } catch (cause) {
      this.logCollaboratorFailure(new CollaboratorError({ collaborator: "nlu", operation: "process", cause }), query);
      return DEFAULT_NLU_RESULT;
    }
  }

  private async recall(query: string): Promise<RetrievedKnowledge> {
    const conversationHistory = await this.bestEffort<HistoryEntry[]>(
      "memory",
      "searchConversations",
      query,
      () => this.memory.searchConversations(query, this.settings.historyLimit),
      []
    );
    const generalKnowledge = await this.bestEffort<KnowledgeItem[]>(
      "memory",
      "searchKnowledge",
      query,
      () => this.memory.searchKnowledge(query, this.settings.knowledgeLimit),
      []
    );
    const securityKnowledge = await this.bestEffort<KnowledgeItem[]>(
      "memory",
      "searchSecurityKnowledge",
      query,
      () => this.memory.searchSecurityKnowledge(query, this.settings.knowledgeLimit),
      []
    );
    return { conversationHistory, generalKnowledge, securityKnowledge, externalData: [] };
  }

  private async clarifyOrAdapt(
    state: RequestState,
    nlu: NLUResult,
    context: TurnContext
  ): Promise<RequestState> {
    const clarification = await this.bestEffort<string | null>(
      "teaming",
      "maybeClarify",
      state.query,
      () => this.teaming.maybeClarify(state.query, nlu.confidence, context),
      null
    );
    if (clarification) {
      return updateRequestState(state, { response: clarification, clarificationIssued: true });
    }

    const adapted = await this.bestEffort<string>(
      "teaming",
      "adapt",
      state.query,
      () => this.teaming.adapt(state.query, state.response, context),
      state.response
    );
    return updateRequestState(state, { response: adapted, adapted: adapted !== state.response });
  }

  private async remember(state: RequestState, nlu: NLUResult): Promise<void> {
    await this.bestEffort<void>(
      "memory",
      "addConversation",
      state.query,
      () =>
        this.memory.addConversation(state.query, state.response, {
          sessionId: state.sessionId,
          intent: nlu.intent,
          confidence: state.confidence,
          isEthical: state.isEthical,
          selfCorrected: state.selfCorrected,
        }),
      undefined
    );
  }

  private async bestEffort<T>(
    collaborator: CollaboratorName,
    operation: string,
    query: string,
    fn: () => Promise<T>,
    fallback: T
  ): Promise<T> {
    try {
      return await fn();
    } catch (cause) {
      this.logCollaboratorFailure(new CollaboratorError({ collaborator, operation, cause }), query);
      return fallback;
    }
  }

  private logCollaboratorFailure(error: CollaboratorError, query: string): void {
    this.log.warn(
      { evt: "collaborator.failed", ...error.toJSON(), query: previewText(query) },
      "collaborator.failed"
    );
  }
}

function toTurnResult(state: RequestState, status: TurnStatus): TurnResult {
  return {
    turnId: state.turnId,
    sessionId: state.sessionId,
    status,
    response: state.response,
    confidence: state.confidence,
    intent: state.nlu?.intent ?? DEFAULT_NLU_RESULT.intent,
    isEthical: state.isEthical,
    guardrailApplied: state.guardrailApplied,
    selfCorrected: state.selfCorrected,
    clarificationIssued: state.clarificationIssued,
    adapted: state.adapted,
    violations: [...state.violations],
    correction: state.correction,
    plan: [...state.plan],
    steps: [...state.steps],
    executionResults: [...state.executionResults],
    flags: state.flags,
    gates: [...state.gates],
  };
}

function failedResult(input: TurnInput, reason: "timeout" | "error"): TurnResult {
  const state = updateRequestState(
    createRequestState({ query: input.message, sessionId: input.sessionId, userRole: input.userRole }),
    { response: UNCERTAINTY_RESPONSE, confidence: 0 }
  );
  return { ...toTurnResult(state, "failed"), failureReason: reason };
}
