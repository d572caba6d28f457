import type { QueryComplexity, ReasoningFlags } from "../contracts/reasoning";

const SECURITY_KEYWORDS = [
  "security",
  "vulnerability",
  "vulnerabilities",
  "threat",
  "exploit",
  "malware",
  "phishing",
  "ransomware",
  "cve",
  "breach",
  "firewall",
  "encryption",
];

const VISION_KEYWORDS = ["vision", "image", "photo", "picture", "video", "camera", "screenshot"];

export type QueryAnalysis = ReasoningFlags & {
  wordCount: number;
  questionMarks: number;
};

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function countQuestionMarks(text: string): number {
  return (text.match(/\?/g) ?? []).length;
}

function complexityOf(wordCount: number, questionMarks: number): QueryComplexity {
  if (wordCount > 20 || questionMarks > 1) return "complex";
  if (wordCount > 10) return "moderate";
  return "simple";
}

export function classifyComplexity(query: string): QueryComplexity {
  return complexityOf(countWords(query), countQuestionMarks(query));
}

function mentions(intent: string, queryLower: string, keywords: string[]): boolean {
  const intentLower = intent.toLowerCase();
  return keywords.some((keyword) => intentLower.includes(keyword) || queryLower.includes(keyword));
}

export function analyzeQuery(query: string, intent: string): QueryAnalysis {
  const queryLower = query.toLowerCase();
  const wordCount = countWords(query);
  const questionMarks = countQuestionMarks(query);
  return {
    queryComplexity: complexityOf(wordCount, questionMarks),
    requiresSecurityKnowledge: mentions(intent, queryLower, SECURITY_KEYWORDS),
    requiresVision: mentions(intent, queryLower, VISION_KEYWORDS),
    wordCount,
    questionMarks,
  };
}
