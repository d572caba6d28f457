import type {
  KnowledgeItem,
  NLUResult,
  NluProvider,
  RetrievedKnowledge,
  ThreatIntelProvider,
  TurnContext,
} from "../contracts/collaborators";
import type {
  ExecutionResult,
  ReasoningFlags,
  ReasoningOutcome,
  ReasoningStep,
} from "../contracts/reasoning";
import type { PipelineLogger } from "../logger";
import { previewText, silentLogger } from "../logger";
import type { PipelineMetrics } from "../metrics/pipeline_metrics";
import { analyzeQuery } from "./analyze";
import { clampUnit, reasoningConfidenceFactors, weightedConfidence } from "./confidence_factors";
import { buildPlan } from "./plan";
import {
  DEFAULT_STEP_HANDLERS,
  totalKnowledgeItems,
  type StepContext,
  type StepHandlerTable,
} from "./step_handlers";

export const GREETING_RESPONSE = "Hello! How can I assist you today?";
export const CANNED_FALLBACK_RESPONSE =
  "I'm having trouble working through that right now. Could you rephrase or add a bit more detail?";
export const FALLBACK_CONFIDENCE = 0.3;
export const FALLBACK_PLAN = ["generate_fallback_response"];

const FRAMING: Record<string, { intro: string; conclusion: string }> = {
  question: {
    intro: "Here's what I found.",
    conclusion: "Let me know if you'd like more detail.",
  },
  security: {
    intro: "Here is the relevant security information.",
    conclusion: "Review this guidance against your own environment before acting on it.",
  },
  technical: {
    intro: "Here's how I would approach this.",
    conclusion: "Let me know if you run into issues applying this.",
  },
  default: {
    intro: "Here's what I can tell you.",
    conclusion: "Is there anything else you'd like to know?",
  },
};

type ExternalFetchStatus = "skipped" | "success" | "empty" | "failed";

export type ReasoningEngineDeps = {
  nlu: NluProvider;
  metrics: PipelineMetrics;
  threatIntel?: ThreatIntelProvider;
  stepHandlers?: StepHandlerTable;
  enabled?: boolean;
  log?: PipelineLogger;
};

class StepTrace {
  readonly steps: ReasoningStep[] = [];

  add(name: string, description: string, detail: Record<string, unknown>): void {
    this.steps.push(
      Object.freeze({
        index: this.steps.length,
        name,
        description,
        detail: Object.freeze({ ...detail }),
      })
    );
  }
}

/**
 * Six fixed phases per query: analyze, retrieve, plan, execute, synthesize,
 * assess confidence. Each phase appends exactly one step to the trace.
 */
export class ReasoningEngine {
  private readonly nlu: NluProvider;
  private readonly metrics: PipelineMetrics;
  private readonly threatIntel?: ThreatIntelProvider;
  private readonly handlers: StepHandlerTable;
  private readonly enabled: boolean;
  private readonly log: PipelineLogger;

  constructor(deps: ReasoningEngineDeps) {
    this.nlu = deps.nlu;
    this.metrics = deps.metrics;
    this.threatIntel = deps.threatIntel;
    this.handlers = { ...DEFAULT_STEP_HANDLERS, ...(deps.stepHandlers ?? {}) };
    this.enabled = deps.enabled ?? true;
    this.log = deps.log ?? silentLogger;
  }

  async reason(
    query: string,
    nlu: NLUResult,
    context: RetrievedKnowledge,
    turnContext: TurnContext = { sessionId: null },
    signal?: AbortSignal
  ): Promise<ReasoningOutcome> {
    if (!this.enabled) {
      return this.directResponse(query, nlu, turnContext, signal);
    }

    try {
      const outcome = await this.runPhases(query, nlu, context, turnContext);
      if (signal?.aborted) return outcome;
      this.metrics.recordReasoning({
        success: true,
        stepCount: outcome.steps.length,
        confidence: outcome.confidence,
      });
      this.log.info(
        {
          evt: "reasoning.completed",
          intent: nlu.intent,
          plan: outcome.plan,
          confidence: outcome.confidence,
        },
        "reasoning.completed"
      );
      return outcome;
    } catch (error) {
      this.log.error(
        {
          evt: "reasoning.failed",
          query: previewText(query),
          intent: nlu.intent,
          nluConfidence: nlu.confidence,
          error: String(error),
        },
        "reasoning.failed"
      );
      const outcome = await this.fallbackOutcome(query, turnContext, error);
      if (signal?.aborted) return outcome;
      this.metrics.recordReasoning({
        success: false,
        stepCount: outcome.steps.length,
        confidence: outcome.confidence,
      });
      return outcome;
    }
  }

  private async runPhases(
    query: string,
    nlu: NLUResult,
    context: RetrievedKnowledge,
    turnContext: TurnContext
  ): Promise<ReasoningOutcome> {
    const trace = new StepTrace();

    // 1. Analyze
    const analysis = analyzeQuery(query, nlu.intent);
    const flags: ReasoningFlags = {
      queryComplexity: analysis.queryComplexity,
      requiresSecurityKnowledge: analysis.requiresSecurityKnowledge,
      requiresVision: analysis.requiresVision,
    };
    trace.add("analyze", `Classified query as ${flags.queryComplexity}`, {
      intent: nlu.intent,
      wordCount: analysis.wordCount,
      questionMarks: analysis.questionMarks,
      ...flags,
    });

    // 2. Retrieve
    const { items: externalData, status: externalFetch } = await this.fetchExternal(query, flags);
    const knowledge: RetrievedKnowledge = { ...context, externalData: [...context.externalData, ...externalData] };
    const knowledgeItems = totalKnowledgeItems(knowledge);
    trace.add("retrieve", `Assembled ${knowledgeItems} knowledge items`, {
      conversationHistory: knowledge.conversationHistory.length,
      generalKnowledge: knowledge.generalKnowledge.length,
      securityKnowledge: knowledge.securityKnowledge.length,
      externalData: knowledge.externalData.length,
      externalFetch,
    });

    // 3. Plan
    const plan = buildPlan(nlu.intent, flags);
    trace.add("plan", `Planned ${plan.length} steps`, { plan: [...plan] });

    // 4. Execute
    const stepContext: StepContext = { query, intent: nlu.intent, knowledge, flags };
    const executionResults = await this.execute(plan, stepContext);
    const succeeded = executionResults.filter((r) => r.success).length;
    trace.add("execute", `Executed ${executionResults.length} steps (${succeeded} succeeded)`, {
      succeeded,
      failed: executionResults.length - succeeded,
      results: executionResults.map((r) => ({ step: r.step, success: r.success, status: r.status })),
    });

    // 5. Synthesize
    const { response, strategy, components } = await this.synthesize(
      query,
      nlu,
      executionResults,
      turnContext
    );
    trace.add("synthesize", `Synthesized response (${strategy})`, { strategy, components });

    // 6. Assess confidence
    const factors = reasoningConfidenceFactors({
      nluConfidence: nlu.confidence,
      knowledgeItems,
      executed: executionResults.length,
      succeeded,
      responseLength: response.length,
    });
    const confidence = weightedConfidence(factors);
    trace.add("assess_confidence", `Confidence ${confidence.toFixed(2)}`, {
      factors: factors.map((f) => ({ ...f })),
      confidence,
    });

    return {
      response,
      confidence,
      steps: trace.steps,
      plan,
      executionResults,
      flags,
      fallback: false,
    };
  }

  private async fetchExternal(
    query: string,
    flags: ReasoningFlags
  ): Promise<{ items: KnowledgeItem[]; status: ExternalFetchStatus }> {
    if (!flags.requiresSecurityKnowledge || !this.threatIntel) {
      return { items: [], status: "skipped" };
    }
    try {
      const result = await this.threatIntel.fetch(query);
      if (result.status !== "success") {
        return { items: [], status: "empty" };
      }
      return { items: result.items, status: "success" };
    } catch (error) {
      this.log.warn(
        { evt: "reasoning.threat_intel_failed", query: previewText(query), error: String(error) },
        "reasoning.threat_intel_failed"
      );
      return { items: [], status: "failed" };
    }
  }

  private async execute(plan: string[], ctx: StepContext): Promise<ExecutionResult[]> {
    const results: ExecutionResult[] = [];
    for (const step of plan) {
      const handler = this.handlers[step];
      if (!handler) {
        results.push({ step, success: true, status: "No handler; skipped" });
        continue;
      }
      try {
        const output = await handler(ctx);
        results.push({
          step,
          success: true,
          status: output.status,
          ...(output.content ? { content: output.content } : {}),
        });
      } catch (error) {
        this.log.warn(
          { evt: "reasoning.step_failed", step, error: String(error) },
          "reasoning.step_failed"
        );
        results.push({ step, success: false, status: "failed", error: String(error) });
      }
    }
    return results;
  }

  private async synthesize(
    query: string,
    nlu: NLUResult,
    results: ExecutionResult[],
    turnContext: TurnContext
  ): Promise<{ response: string; strategy: string; components: number }> {
    if (nlu.intent === "greeting") {
      return { response: GREETING_RESPONSE, strategy: "greeting", components: 0 };
    }

    const components = results
      .filter((r) => r.success && typeof r.content === "string" && r.content.length > 0)
      .map((r) => r.content ?? "");

    if (components.length === 1) {
      return { response: components[0], strategy: "single", components: 1 };
    }
    if (components.length > 1) {
      const framing = FRAMING[nlu.intent] ?? FRAMING.default;
      return {
        response: [framing.intro, ...components, framing.conclusion].join(" "),
        strategy: "combined",
        components: components.length,
      };
    }

    const generated = await this.nlu.generateFallback(query, {
      ...turnContext,
      intent: nlu.intent,
      sentiment: nlu.sentiment,
    });
    return { response: generated, strategy: "fallback_generation", components: 0 };
  }

  private async fallbackOutcome(
    query: string,
    turnContext: TurnContext,
    cause: unknown
  ): Promise<ReasoningOutcome> {
    let response = CANNED_FALLBACK_RESPONSE;
    try {
      response = await this.nlu.generateFallback(query, turnContext);
    } catch (error) {
      this.log.warn(
        { evt: "reasoning.fallback_generation_failed", error: String(error) },
        "reasoning.fallback_generation_failed"
      );
    }

    const step: ReasoningStep = Object.freeze({
      index: 0,
      name: "fallback",
      description: "Reasoning failed; answered with the fallback response",
      detail: Object.freeze({ error: String(cause) }),
    });

    return {
      response,
      confidence: FALLBACK_CONFIDENCE,
      steps: [step],
      plan: [...FALLBACK_PLAN],
      executionResults: [],
      flags: null,
      fallback: true,
    };
  }

  private async directResponse(
    query: string,
    nlu: NLUResult,
    turnContext: TurnContext,
    signal?: AbortSignal
  ): Promise<ReasoningOutcome> {
    let response = CANNED_FALLBACK_RESPONSE;
    try {
      response = await this.nlu.generateFallback(query, turnContext);
    } catch (error) {
      this.log.warn(
        { evt: "reasoning.direct_response_failed", error: String(error) },
        "reasoning.direct_response_failed"
      );
    }
    const confidence = clampUnit(nlu.confidence);
    if (!signal?.aborted) {
      this.metrics.recordReasoning({ success: true, stepCount: 1, confidence });
    }

    return {
      response,
      confidence,
      steps: [
        Object.freeze({
          index: 0,
          name: "direct_response",
          description: "Reasoning disabled; answered directly",
          detail: Object.freeze({ intent: nlu.intent }),
        }),
      ],
      plan: ["generate_direct_response"],
      executionResults: [],
      flags: null,
      fallback: false,
    };
  }
}
