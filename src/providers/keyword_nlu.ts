import type { Entity, NLUResult, NluProvider, Sentiment, TurnContext } from "../contracts/collaborators";

export type KeywordIntent = "security" | "technical" | "gratitude" | "greeting" | "question" | "general";

const SECURITY_WORDS = [
  "security",
  "vulnerability",
  "threat",
  "malware",
  "phishing",
  "exploit",
  "cve",
  "breach",
  "firewall",
  "ransomware",
];

const TECHNICAL_WORDS = [
  "code",
  "bug",
  "error",
  "deploy",
  "install",
  "configure",
  "api",
  "database",
  "server",
  "compile",
  "debug",
  "function",
];

const NEGATIVE_WORDS = [
  "angry",
  "frustrated",
  "annoyed",
  "upset",
  "hate",
  "terrible",
  "awful",
  "useless",
  "worst",
  "furious",
];

const POSITIVE_WORDS = ["great", "thanks", "thank you", "love", "awesome", "happy", "excellent", "glad"];

const INTENT_CONFIDENCE: Record<KeywordIntent, number> = {
  security: 0.85,
  technical: 0.85,
  gratitude: 0.9,
  greeting: 0.9,
  question: 0.7,
  general: 0.45,
};

const GREETING = /\b(hello|hi|hey|good (morning|afternoon|evening))\b/;
const GRATITUDE = /\b(thank you|thanks|thank)\b/;
const QUESTION_START = /^(what|how|why|when|where|who|which|can|could|would|should|is|are|do|does|did)\b/;

function hasWord(text: string, words: string[]): boolean {
  return words.some((word) => new RegExp(`\\b${word}`).test(text));
}

export function classifyIntent(text: string): KeywordIntent {
  const lower = text.toLowerCase().trim();

  if (hasWord(lower, SECURITY_WORDS)) return "security";
  if (hasWord(lower, TECHNICAL_WORDS)) return "technical";
  if (GRATITUDE.test(lower)) return "gratitude";
  if (GREETING.test(lower)) return "greeting";
  if (lower.endsWith("?") || QUESTION_START.test(lower)) return "question";

  return "general";
}

export function detectSentiment(text: string): Sentiment {
  const lower = text.toLowerCase();
  const negative = NEGATIVE_WORDS.filter((w) => lower.includes(w)).length;
  const positive = POSITIVE_WORDS.filter((w) => lower.includes(w)).length;
  if (negative > positive) return "negative";
  if (positive > negative) return "positive";
  return "neutral";
}

export function extractEntities(text: string): Entity[] {
  const entities: Entity[] = [];
  for (const match of text.matchAll(/\bCVE-\d{4}-\d{4,}\b/gi)) {
    entities.push({ text: match[0].toUpperCase(), type: "cve" });
  }
  for (const match of text.matchAll(/https?:\/\/[^\s)]+/g)) {
    entities.push({ text: match[0], type: "url" });
  }
  // Capitalised words that do not open a sentence.
  for (const match of text.matchAll(/(?<![.!?]\s|^)\b([A-Z][a-z]{2,})\b/g)) {
    if (entities.some((e) => e.text === match[1])) continue;
    entities.push({ text: match[1], type: "proper_noun" });
  }
  return entities;
}

/**
 * Rule-based stand-in for the NLU collaborator. Keyword intent, lexicon
 * sentiment and regex entities; no model behind it.
 */
export class KeywordNluProvider implements NluProvider {
  async process(query: string, _context: TurnContext): Promise<NLUResult> {
    const intent = classifyIntent(query);
    return {
      intent,
      entities: extractEntities(query),
      confidence: INTENT_CONFIDENCE[intent],
      sentiment: detectSentiment(query),
    };
  }

  async generateFallback(query: string, context: TurnContext): Promise<string> {
    const intent = context.intent ?? classifyIntent(query);
    if (intent === "greeting") return "Hello there! How can I assist you today?";
    if (intent === "gratitude") return "You're welcome! Is there anything else I can do?";
    if (intent === "security") {
      return "I can help with security analysis. Which system or threat would you like to look into?";
    }
    return `I understand you asked: "${query.trim()}". How can I help further?`;
  }
}
