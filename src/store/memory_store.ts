import { randomUUID } from "node:crypto";

import type {
  ConversationMetadata,
  HistoryEntry,
  KnowledgeItem,
  MemoryCollaborator,
  NewKnowledgeItem,
} from "../contracts/collaborators";
import type { ViolationAuditRecord } from "../contracts/violation";

const STOP_WORDS = new Set([
  "the",
  "and",
  "for",
  "you",
  "are",
  "how",
  "what",
  "can",
  "with",
  "this",
  "that",
  "your",
  "was",
  "were",
  "does",
  "about",
]);

export function searchTerms(query: string): string[] {
  const tokens = query.toLowerCase().match(/[a-z0-9]{3,}/g) ?? [];
  return Array.from(new Set(tokens.filter((t) => !STOP_WORDS.has(t))));
}

export function overlapScore(terms: string[], text: string): number {
  const lower = text.toLowerCase();
  return terms.filter((term) => lower.includes(term)).length;
}

/**
 * Ranks by term overlap, most recent first on ties. Entries without any
 * overlapping term are dropped.
 */
export function rankByOverlap<T>(
  entries: readonly T[],
  query: string,
  limit: number,
  textOf: (entry: T) => string
): Array<{ entry: T; score: number }> {
  const terms = searchTerms(query);
  if (terms.length === 0 || limit <= 0) return [];

  return entries
    .map((entry, order) => ({ entry, order, score: overlapScore(terms, textOf(entry)) }))
    .filter((scored) => scored.score > 0)
    .sort((a, b) => b.score - a.score || b.order - a.order)
    .slice(0, limit)
    .map(({ entry, score }) => ({ entry, score }));
}

export const conversationText = (entry: HistoryEntry) =>
  `${entry.userMessage}\n${entry.assistantResponse}`;
export const knowledgeText = (item: KnowledgeItem) => `${item.title}\n${item.content}`;

/**
 * Process-local memory. Used by tests and when no database path is configured.
 */
export class InMemoryMemoryStore implements MemoryCollaborator {
  readonly conversations: HistoryEntry[] = [];
  readonly knowledge: KnowledgeItem[] = [];
  readonly securityKnowledge: KnowledgeItem[] = [];
  readonly violations: ViolationAuditRecord[] = [];

  async searchConversations(query: string, limit: number): Promise<HistoryEntry[]> {
    return rankByOverlap(this.conversations, query, limit, conversationText).map((r) => r.entry);
  }

  async searchKnowledge(query: string, limit: number): Promise<KnowledgeItem[]> {
    return rankByOverlap(this.knowledge, query, limit, knowledgeText).map((r) => ({
      ...r.entry,
      score: r.score,
    }));
  }

  async searchSecurityKnowledge(query: string, limit: number): Promise<KnowledgeItem[]> {
    return rankByOverlap(this.securityKnowledge, query, limit, knowledgeText).map((r) => ({
      ...r.entry,
      score: r.score,
    }));
  }

  async addConversation(userInput: string, response: string, metadata: ConversationMetadata): Promise<void> {
    this.conversations.push({
      userMessage: userInput,
      assistantResponse: response,
      timestamp: new Date().toISOString(),
      metadata: { ...metadata },
    });
  }

  async addViolationRecord(record: ViolationAuditRecord): Promise<void> {
    this.violations.push(record);
  }

  async addKnowledge(item: NewKnowledgeItem): Promise<KnowledgeItem> {
    const stored: KnowledgeItem = { id: randomUUID(), ...item };
    this.knowledge.push(stored);
    return stored;
  }

  async addSecurityKnowledge(item: NewKnowledgeItem): Promise<KnowledgeItem> {
    const stored: KnowledgeItem = { id: randomUUID(), ...item };
    this.securityKnowledge.push(stored);
    return stored;
  }
}
