import type { ViolationAuditRecord } from "./violation";

export type Sentiment = "positive" | "negative" | "neutral";

export type Entity = {
  text: string;
  type: string;
};

export type NLUResult = {
  intent: string;
  entities: Entity[];
  confidence: number;
  sentiment: Sentiment;
};

export type HistoryEntry = {
  userMessage: string;
  assistantResponse: string;
  timestamp?: string;
  metadata?: Record<string, unknown>;
};

export type KnowledgeItem = {
  id: string;
  title: string;
  content: string;
  source?: string;
  score?: number;
};

export type NewKnowledgeItem = Omit<KnowledgeItem, "id" | "score">;

export type RetrievedKnowledge = {
  conversationHistory: HistoryEntry[];
  generalKnowledge: KnowledgeItem[];
  securityKnowledge: KnowledgeItem[];
  externalData: KnowledgeItem[];
};

export const EMPTY_KNOWLEDGE: RetrievedKnowledge = {
  conversationHistory: [],
  generalKnowledge: [],
  securityKnowledge: [],
  externalData: [],
};

export type TurnContext = {
  sessionId: string | null;
  userRole?: string;
  intent?: string;
  sentiment?: Sentiment;
};

export type ConversationMetadata = {
  sessionId: string | null;
  intent: string;
  confidence: number;
  isEthical: boolean;
  selfCorrected: boolean;
};

export interface NluProvider {
  process(query: string, context: TurnContext): Promise<NLUResult>;
  generateFallback(query: string, context: TurnContext): Promise<string>;
}

export interface MemoryCollaborator {
  searchConversations(query: string, limit: number): Promise<HistoryEntry[]>;
  searchKnowledge(query: string, limit: number): Promise<KnowledgeItem[]>;
  searchSecurityKnowledge(query: string, limit: number): Promise<KnowledgeItem[]>;
  addConversation(userInput: string, response: string, metadata: ConversationMetadata): Promise<void>;
  addViolationRecord(record: ViolationAuditRecord): Promise<void>;
  addKnowledge(item: NewKnowledgeItem): Promise<KnowledgeItem>;
  addSecurityKnowledge(item: NewKnowledgeItem): Promise<KnowledgeItem>;
}

export type ThreatIntelResponse = {
  status: string;
  items: KnowledgeItem[];
};

export interface ThreatIntelProvider {
  fetch(query: string): Promise<ThreatIntelResponse>;
}

export interface TeamingProvider {
  maybeClarify(query: string, confidence: number, context: TurnContext): Promise<string | null>;
  adapt(query: string, response: string, context: TurnContext): Promise<string>;
}
