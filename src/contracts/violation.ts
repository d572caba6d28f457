import { z } from "zod";

export const VIOLATION_TYPES = [
  "harmful_content",
  "privacy_violation",
  "misinformation",
  "inappropriate_content",
  "bias_discrimination",
  "emotional_escalation",
  "overconfidence",
  "system_error",
] as const;

export const SEVERITIES = ["low", "medium", "high"] as const;

export const ViolationType = z.enum(VIOLATION_TYPES);
export type ViolationType = z.infer<typeof ViolationType>;

export const Severity = z.enum(SEVERITIES);
export type Severity = z.infer<typeof Severity>;

export const Violation = z.object({
  type: ViolationType,
  description: z.string().min(1),
  severity: Severity,
  matchedPattern: z.string().optional(),
});

export type Violation = z.infer<typeof Violation>;

/**
 * Violation as it reaches the guardrails. Detectors are pluggable, so the
 * severity is only trusted after it has been bucketed.
 */
export type ScreenedViolation = Omit<Violation, "severity"> & { severity: string };

export type ContextSummary = {
  intent: string;
  sentiment: string;
  confidence: number;
  sessionId: string | null;
};

export type ViolationAuditRecord = Violation & {
  timestamp: string;
  userInput: string;
  response: string;
  contextSummary: ContextSummary;
};

export type CorrectionRecord = {
  timestamp: string;
  userInput: string;
  originalResponse: string;
  correctedResponse: string;
  errorExplanation: string;
  contextSummary: ContextSummary;
};
