import { SEVERITIES, type ScreenedViolation, type Severity } from "../contracts/violation";
import type { PipelineLogger } from "../logger";

export const REFUSAL_HARMFUL =
  "I can't help with that request. It could put people in danger, so I won't provide details for it.";
export const REFUSAL_PRIVACY =
  "I can't share that. It would expose private personal information, and I need to protect people's privacy.";
export const REFUSAL_INAPPROPRIATE =
  "I can't provide that content because it isn't appropriate for this conversation.";
export const REFUSAL_BIAS =
  "I can't respond that way. Generalizing about groups of people is unfair, and I aim to treat everyone with equal respect.";
export const REFUSAL_GENERIC =
  "I'm unable to provide a response to that request within my guidelines.";

export const MISINFORMATION_DISCLAIMER =
  "Please note: parts of this answer may be inaccurate or disputed.";
export const MISINFORMATION_FOOTER =
  "Verify these claims against authoritative, up-to-date sources before relying on them.";
export const PRIVACY_NOTICE =
  "I've left out part of that answer because it may contain someone's personal contact details. Please reach people through official channels.";
export const EMPATHY_OPENER = "I hear you, and I'm sorry this has been frustrating.";
export const VERIFICATION_SUFFIX =
  "That said, I can't be completely sure, so please verify this independently.";

const HIGH_SEVERITY_REFUSALS: Partial<Record<ScreenedViolation["type"], string>> = {
  harmful_content: REFUSAL_HARMFUL,
  privacy_violation: REFUSAL_PRIVACY,
  inappropriate_content: REFUSAL_INAPPROPRIATE,
  bias_discrimination: REFUSAL_BIAS,
};

// Refusal lookup follows this order when several high-severity types are present.
const HIGH_SEVERITY_ORDER: ScreenedViolation["type"][] = [
  "harmful_content",
  "privacy_violation",
  "inappropriate_content",
  "bias_discrimination",
];

function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

export type SeverityBuckets = Record<Severity, ScreenedViolation[]>;

export function bucketBySeverity(
  violations: readonly ScreenedViolation[],
  log?: PipelineLogger
): SeverityBuckets {
  const buckets: SeverityBuckets = { high: [], medium: [], low: [] };
  for (const violation of violations) {
    if (isSeverity(violation.severity)) {
      buckets[violation.severity].push(violation);
      continue;
    }
    log?.warn(
      { evt: "guardrails.unknown_severity", type: violation.type, severity: violation.severity },
      "guardrails.unknown_severity"
    );
    buckets.low.push(violation);
  }
  return buckets;
}

function applyHigh(violations: ScreenedViolation[]): string {
  const types = new Set(violations.map((v) => v.type));
  for (const type of HIGH_SEVERITY_ORDER) {
    const refusal = HIGH_SEVERITY_REFUSALS[type];
    if (types.has(type) && refusal) return refusal;
  }
  return REFUSAL_GENERIC;
}

function applyMedium(response: string, violations: ScreenedViolation[]): string {
  const types = new Set(violations.map((v) => v.type));
  if (types.has("privacy_violation")) {
    return PRIVACY_NOTICE;
  }

  let result = response;
  if (types.has("misinformation") && !result.includes(MISINFORMATION_DISCLAIMER)) {
    result = `${MISINFORMATION_DISCLAIMER}\n\n${result}\n\n${MISINFORMATION_FOOTER}`;
  }
  if (types.has("emotional_escalation") && !result.startsWith(EMPATHY_OPENER)) {
    result = `${EMPATHY_OPENER} ${result}`;
  }
  return result;
}

function applyLow(response: string, violations: ScreenedViolation[]): string {
  const overconfident = violations.some((v) => v.type === "overconfidence");
  if (!overconfident || response.endsWith(VERIFICATION_SUFFIX)) return response;
  return `${response} ${VERIFICATION_SUFFIX}`;
}

/**
 * Maps a violation set to exactly one output string.
 *
 * Only the highest non-empty severity bucket is acted on. Annotations are not
 * stacked twice when an already-guarded response is screened again.
 */
export function applyGuardrails(args: {
  userInput: string;
  response: string;
  violations: readonly ScreenedViolation[];
  log?: PipelineLogger;
}): string {
  if (args.violations.length === 0) return args.response;

  const buckets = bucketBySeverity(args.violations, args.log);
  if (buckets.high.length > 0) return applyHigh(buckets.high);
  if (buckets.medium.length > 0) return applyMedium(args.response, buckets.medium);
  return applyLow(args.response, buckets.low);
}
