import type { ReasoningFlags } from "../contracts/reasoning";

export type PlanKey = "greeting" | "question" | "security" | "technical" | "default";

export const BASE_PLANS: Readonly<Record<PlanKey, readonly string[]>> = {
  greeting: ["acknowledge_greeting", "generate_response"],
  question: ["understand_question", "retrieve_relevant_info", "formulate_answer", "generate_response"],
  security: [
    "analyze_security_context",
    "retrieve_security_knowledge",
    "assess_threats",
    "generate_response",
  ],
  technical: [
    "analyze_technical_problem",
    "retrieve_technical_docs",
    "formulate_solution",
    "generate_response",
  ],
  default: ["understand_query", "retrieve_context", "generate_response"],
};

export function planKeyForIntent(intent: string): PlanKey {
  if (intent === "greeting" || intent === "question" || intent === "security" || intent === "technical") {
    return intent;
  }
  return "default";
}

function insertBeforeLast(plan: string[], ...steps: string[]): string[] {
  return [...plan.slice(0, -1), ...steps, ...plan.slice(-1)];
}

/**
 * Pure function of (intent, flags). Insertions always run in the same order:
 * complexity, then vision, then security.
 */
export function buildPlan(intent: string, flags: ReasoningFlags): string[] {
  let plan = [...BASE_PLANS[planKeyForIntent(intent)]];

  if (flags.queryComplexity === "complex") {
    plan = insertBeforeLast(plan, "break_down_problem", "synthesize_information");
  }
  if (flags.requiresVision) {
    plan = [...plan.slice(0, 1), "process_visual_content", ...plan.slice(1)];
  }
  if (flags.requiresSecurityKnowledge) {
    plan = insertBeforeLast(plan, "apply_security_filters");
  }

  return plan;
}
