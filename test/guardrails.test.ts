import { describe, it, expect } from "vitest";

import type { ScreenedViolation } from "../src/contracts/violation";
import {
  applyGuardrails,
  bucketBySeverity,
  EMPATHY_OPENER,
  MISINFORMATION_DISCLAIMER,
  MISINFORMATION_FOOTER,
  PRIVACY_NOTICE,
  REFUSAL_BIAS,
  REFUSAL_GENERIC,
  REFUSAL_HARMFUL,
  REFUSAL_INAPPROPRIATE,
  REFUSAL_PRIVACY,
  VERIFICATION_SUFFIX,
} from "../src/gates/guardrails";
import { PatternViolationDetector } from "../src/gates/violation_detector";
import { makeSpyLogger } from "./fakes";

const v = (type: ScreenedViolation["type"], severity: string): ScreenedViolation => ({
  type,
  severity,
  description: `${type} test`,
});

const guard = (response: string, violations: ScreenedViolation[]) =>
  applyGuardrails({ userInput: "q", response, violations });

describe("applyGuardrails", () => {
  it("returns the response unchanged when there are no violations", () => {
    expect(guard("All good.", [])).toBe("All good.");
  });

  it("acts only on the highest severity present", () => {
    expect(guard("Answer.", [v("misinformation", "medium"), v("harmful_content", "high")])).toBe(
      REFUSAL_HARMFUL
    );
    expect(guard("Answer.", [v("overconfidence", "low"), v("emotional_escalation", "medium")])).toBe(
      `${EMPATHY_OPENER} Answer.`
    );
  });

  it("picks the high-severity refusal by type", () => {
    expect(guard("x", [v("privacy_violation", "high")])).toBe(REFUSAL_PRIVACY);
    expect(guard("x", [v("inappropriate_content", "high")])).toBe(REFUSAL_INAPPROPRIATE);
    expect(guard("x", [v("bias_discrimination", "high")])).toBe(REFUSAL_BIAS);
    expect(guard("x", [v("bias_discrimination", "high"), v("privacy_violation", "high")])).toBe(
      REFUSAL_PRIVACY
    );
    expect(guard("x", [v("system_error", "high")])).toBe(REFUSAL_GENERIC);
  });

  it("wraps misinformation once", () => {
    const wrapped = guard("Answer.", [v("misinformation", "medium")]);
    expect(wrapped).toBe(`${MISINFORMATION_DISCLAIMER}\n\nAnswer.\n\n${MISINFORMATION_FOOTER}`);
    expect(guard(wrapped, [v("misinformation", "medium")])).toBe(wrapped);
  });

  it("does not stack annotations when misinformation and escalation are re-screened", () => {
    const both = [v("misinformation", "medium"), v("emotional_escalation", "medium")];
    const once = guard("Answer.", both);

    expect(once).toBe(
      `${EMPATHY_OPENER} ${MISINFORMATION_DISCLAIMER}\n\nAnswer.\n\n${MISINFORMATION_FOOTER}`
    );
    expect(guard(once, both)).toBe(once);
  });

  it("replaces medium privacy leaks with a notice", () => {
    expect(guard("Mail test.user@example.com", [v("privacy_violation", "medium")])).toBe(PRIVACY_NOTICE);
  });

  it("appends the verification suffix for overconfidence once", () => {
    const once = guard("It works.", [v("overconfidence", "low")]);
    expect(once).toBe(`It works. ${VERIFICATION_SUFFIX}`);
    expect(guard(once, [v("overconfidence", "low")])).toBe(once);
  });

  it("treats an unknown severity as low and logs it", () => {
    const { log, asLogger } = makeSpyLogger();
    const result = applyGuardrails({
      userInput: "q",
      response: "It works.",
      violations: [v("overconfidence", "critical")],
      log: asLogger,
    });

    expect(result).toBe(`It works. ${VERIFICATION_SUFFIX}`);
    expect(log.warn).toHaveBeenCalledWith(
      { evt: "guardrails.unknown_severity", type: "overconfidence", severity: "critical" },
      "guardrails.unknown_severity"
    );
  });

  it("buckets violations by severity", () => {
    const buckets = bucketBySeverity([v("harmful_content", "high"), v("overconfidence", "weird")]);
    expect(buckets.high).toHaveLength(1);
    expect(buckets.medium).toHaveLength(0);
    expect(buckets.low).toHaveLength(1);
  });

  it("guardrail texts are themselves clean", () => {
    const detector = new PatternViolationDetector();
    const texts = [
      REFUSAL_HARMFUL,
      REFUSAL_PRIVACY,
      REFUSAL_INAPPROPRIATE,
      REFUSAL_BIAS,
      REFUSAL_GENERIC,
      MISINFORMATION_DISCLAIMER,
      MISINFORMATION_FOOTER,
      PRIVACY_NOTICE,
      EMPATHY_OPENER,
      VERIFICATION_SUFFIX,
    ];
    for (const text of texts) {
      expect(detector.detect(text, "q", { sentiment: "negative", confidence: 0.1 })).toEqual([]);
    }
  });
});
