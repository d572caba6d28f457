export type QueryComplexity = "simple" | "moderate" | "complex";

export type ReasoningFlags = {
  queryComplexity: QueryComplexity;
  requiresSecurityKnowledge: boolean;
  requiresVision: boolean;
};

export type ReasoningStep = Readonly<{
  index: number;
  name: string;
  description: string;
  detail: Readonly<Record<string, unknown>>;
}>;

export type ExecutionResult = Readonly<{
  step: string;
  success: boolean;
  status: string;
  content?: string;
  error?: string;
}>;

export type ReasoningOutcome = {
  response: string;
  confidence: number;
  steps: ReasoningStep[];
  plan: string[];
  executionResults: ExecutionResult[];
  flags: ReasoningFlags | null;
  fallback: boolean;
};
