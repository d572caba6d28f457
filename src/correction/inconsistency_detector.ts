import type { HistoryEntry } from "../contracts/collaborators";

export type InconsistencyResult =
  | { inconsistent: true; reason: string }
  | { inconsistent: false; reason: null };

type Assertion = {
  subject: string;
  negated: boolean;
  value: string;
  complement: string;
  text: string;
};

type Polarity = "affirmative" | "negative";

const PRONOUN_SUBJECTS = new Set([
  "it", "this", "that", "there", "he", "she", "they", "what", "which", "who", "i", "you", "we",
]);

const ASSERTION = /^(?:the\s+)?([a-z][a-z0-9' -]{0,60}?)\s+(is|are|was|were)\s+(not\s+)?(.+)$/i;
const LEADING_ARTICLE = /^(?:a|an|the)\s+/i;
// A proper name of up to three words, or a number.
const IDENTITY_VALUE = /^(?:\p{Lu}[\p{L}'-]*(?:\s+\p{Lu}[\p{L}'-]*){0,2}|-?\d+(?:\.\d+)?)$/u;
const AFFIRMATIVE = /^(yes|yeah|yep|correct|that's right|that is right|absolutely)\b/;
const NEGATIVE = /^(no|nope|not really|that's not|that is not|incorrect)\b/;

const CONSISTENT: InconsistencyResult = { inconsistent: false, reason: null };

function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

function sentences(text: string): string[] {
  return text
    .split(/[.!?\n;]+/)
    .map((s) => s.replace(/\s+/g, " ").trim())
    .filter(Boolean);
}

// Head complement: the text before the first comma, without a leading article.
function complementOf(value: string): string {
  return value.split(",")[0].trim().replace(LEADING_ARTICLE, "");
}

function assertionsOf(text: string): Assertion[] {
  const found: Assertion[] = [];
  for (const sentence of sentences(text)) {
    const match = ASSERTION.exec(sentence);
    if (!match) continue;
    const subject = match[1].trim().toLowerCase();
    if (PRONOUN_SUBJECTS.has(subject)) continue;
    const value = match[4].trim();
    found.push({
      subject,
      negated: Boolean(match[3]),
      value: value.toLowerCase(),
      complement: complementOf(value),
      text: sentence.toLowerCase(),
    });
  }
  return found;
}

function polarityOf(text: string): Polarity | null {
  const lower = normalize(text);
  if (AFFIRMATIVE.test(lower)) return "affirmative";
  if (NEGATIVE.test(lower)) return "negative";
  return null;
}

// Only distinct names or numbers conflict.
function conflictingValues(before: string, now: string): boolean {
  if (!IDENTITY_VALUE.test(before) || !IDENTITY_VALUE.test(now)) return false;
  const a = before.toLowerCase();
  const b = now.toLowerCase();
  return !a.includes(b) && !b.includes(a);
}

function contradictingAssertion(prior: Assertion[], current: Assertion[]): string | null {
  for (const now of current) {
    for (const before of prior) {
      if (now.subject !== before.subject) continue;
      const flipped = now.negated !== before.negated && now.value === before.value;
      const replaced = !now.negated && !before.negated && conflictingValues(before.complement, now.complement);
      if (flipped || replaced) {
        return `Response contradicts an earlier statement: "${before.text}" vs "${now.text}".`;
      }
    }
  }
  return null;
}

/**
 * Lexical contradiction check against recent turns. Only two narrow signatures
 * are recognised: a "X is Y" fact negated or restated with another name or
 * number, and a yes/no answer reversed for the same question. First match wins.
 */
export class InconsistencyDetector {
  private readonly enabled: boolean;

  constructor(opts: { enabled?: boolean } = {}) {
    this.enabled = opts.enabled ?? true;
  }

  detect(
    response: string,
    history: readonly HistoryEntry[],
    opts: { query?: string } = {}
  ): InconsistencyResult {
    if (!this.enabled || history.length === 0) return CONSISTENT;

    const current = assertionsOf(response);
    const currentPolarity = polarityOf(response);
    const query = opts.query ? normalize(opts.query) : null;

    for (const entry of history) {
      const reason = contradictingAssertion(assertionsOf(entry.assistantResponse), current);
      if (reason) return { inconsistent: true, reason };

      if (!currentPolarity) continue;
      const priorPolarity = polarityOf(entry.assistantResponse);
      if (!priorPolarity || priorPolarity === currentPolarity) continue;
      if (query && entry.userMessage && normalize(entry.userMessage) !== query) continue;

      return {
        inconsistent: true,
        reason: `Response contradicts an earlier ${priorPolarity} answer to "${entry.userMessage || "the same question"}".`,
      };
    }

    return CONSISTENT;
  }
}
