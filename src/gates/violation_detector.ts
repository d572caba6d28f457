import { z } from "zod";

import rulesFile from "./violation_rules.json";
import { Severity, ViolationType, type Violation } from "../contracts/violation";

const CategoryRule = z.object({
  type: ViolationType,
  severity: Severity,
  description: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
});

const ViolationRuleFile = z.object({
  version: z.string(),
  categories: z.array(CategoryRule),
  contactPatterns: z.object({
    severity: Severity,
    description: z.string().min(1),
    email: z.string().min(1),
    phone: z.string().min(1),
  }),
  escalationMarkers: z.array(z.string().min(1)),
  certaintyMarkers: z.array(z.string().min(1)),
});

export type ViolationRuleFile = z.infer<typeof ViolationRuleFile>;

type CompiledPattern = {
  source: string;
  regex: RegExp;
};

type CompiledCategory = {
  type: ViolationType;
  severity: Severity;
  description: string;
  patterns: CompiledPattern[];
};

export type CompiledRuleSet = {
  version: string;
  categories: CompiledCategory[];
  contact: {
    severity: Severity;
    description: string;
    email: CompiledPattern;
    phone: CompiledPattern;
  };
  escalationMarkers: string[];
  certaintyMarkers: string[];
};

export type DetectionContext = {
  sentiment?: string;
  confidence?: number;
  intent?: string;
};

export type ContextCheckInput = {
  response: string;
  responseLower: string;
  userInput: string;
  context: DetectionContext;
};

export type ContextCheck = (input: ContextCheckInput) => Violation | null;

/**
 * Screening strategy. A semantic classifier can replace the pattern detector
 * without any change to the pipeline.
 */
export interface ViolationDetector {
  detect(response: string, userInput: string, context: DetectionContext): Violation[];
}

export const OVERCONFIDENCE_CONFIDENCE_CEILING = 0.8;

// No "g" flag: a global regex keeps lastIndex between calls and would make detection stateful.
function compile(source: string): CompiledPattern {
  return { source, regex: new RegExp(source, "i") };
}

export function compileRules(raw: unknown): CompiledRuleSet {
  const rules = ViolationRuleFile.parse(raw);
  return {
    version: rules.version,
    categories: rules.categories.map((category) => ({
      type: category.type,
      severity: category.severity,
      description: category.description,
      patterns: category.patterns.map(compile),
    })),
    contact: {
      severity: rules.contactPatterns.severity,
      description: rules.contactPatterns.description,
      email: compile(rules.contactPatterns.email),
      phone: compile(rules.contactPatterns.phone),
    },
    escalationMarkers: rules.escalationMarkers.map((m) => m.toLowerCase()),
    certaintyMarkers: rules.certaintyMarkers.map((m) => m.toLowerCase()),
  };
}

export const DEFAULT_RULES: CompiledRuleSet = compileRules(rulesFile);

export function systemErrorViolation(error: unknown): Violation {
  return {
    type: "system_error",
    severity: "high",
    description: `Violation detection failed (${error instanceof Error ? error.message : String(error)}); response treated as unsafe.`,
  };
}

function escalationCheck(markers: string[]): ContextCheck {
  return ({ responseLower, context }) => {
    if (context.sentiment !== "negative") return null;
    const marker = markers.find((m) => responseLower.includes(m));
    if (!marker) return null;
    return {
      type: "emotional_escalation",
      severity: "medium",
      description: "Response may escalate a user who is already upset.",
      matchedPattern: marker,
    };
  };
}

function overconfidenceCheck(markers: string[]): ContextCheck {
  return ({ responseLower, context }) => {
    if (typeof context.confidence !== "number") return null;
    if (context.confidence >= OVERCONFIDENCE_CONFIDENCE_CEILING) return null;
    const marker = markers.find((m) => responseLower.includes(m));
    if (!marker) return null;
    return {
      type: "overconfidence",
      severity: "low",
      description: `Response claims certainty while confidence is ${context.confidence.toFixed(2)}.`,
      matchedPattern: marker,
    };
  };
}

/**
 * Keyword and regex screening against the violation taxonomy.
 *
 * One violation per matching pattern, so a response can carry several
 * violations of the same type. Any internal failure yields a single
 * system_error violation instead of an empty list.
 */
export class PatternViolationDetector implements ViolationDetector {
  private rules: CompiledRuleSet;
  private checks: ContextCheck[];

  constructor(opts: { rules?: CompiledRuleSet; extraChecks?: ContextCheck[] } = {}) {
    this.rules = opts.rules ?? DEFAULT_RULES;
    this.checks = [
      escalationCheck(this.rules.escalationMarkers),
      overconfidenceCheck(this.rules.certaintyMarkers),
      ...(opts.extraChecks ?? []),
    ];
  }

  get rulesVersion(): string {
    return this.rules.version;
  }

  detect(response: string, userInput: string, context: DetectionContext): Violation[] {
    try {
      return this.runDetection(response, userInput, context);
    } catch (error) {
      return [systemErrorViolation(error)];
    }
  }

  private runDetection(response: string, userInput: string, context: DetectionContext): Violation[] {
    const violations: Violation[] = [];

    for (const category of this.rules.categories) {
      for (const pattern of category.patterns) {
        if (pattern.regex.test(response)) {
          violations.push({
            type: category.type,
            severity: category.severity,
            description: category.description,
            matchedPattern: pattern.source,
          });
        }
      }
    }

    const { contact } = this.rules;
    for (const pattern of [contact.email, contact.phone]) {
      if (pattern.regex.test(response)) {
        violations.push({
          type: "privacy_violation",
          severity: contact.severity,
          description: contact.description,
          matchedPattern: pattern.source,
        });
      }
    }

    const input: ContextCheckInput = {
      response,
      responseLower: response.toLowerCase(),
      userInput,
      context,
    };
    for (const check of this.checks) {
      const violation = check(input);
      if (violation) violations.push(violation);
    }

    return violations;
  }
}
