import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import type {
  ConversationMetadata,
  HistoryEntry,
  KnowledgeItem,
  MemoryCollaborator,
  NewKnowledgeItem,
} from "../contracts/collaborators";
import type { ViolationAuditRecord } from "../contracts/violation";
import { conversationText, knowledgeText, rankByOverlap, searchTerms } from "./memory_store";

type KnowledgeKind = "general" | "security";

const ConversationRow = z.object({
  user_message: z.string(),
  assistant_response: z.string(),
  metadata_json: z.string().nullable(),
  created_at: z.string(),
});

const KnowledgeRow = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  source: z.string().nullable(),
});

const CountRow = z.object({ count: z.number() });

// Most recent candidate rows pulled per search before ranking in process.
const CANDIDATE_LIMIT = 200;

function parseMetadata(json: string | null): Record<string, unknown> | undefined {
  if (!json) return undefined;
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return undefined;
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * better-sqlite3 backed memory. Matching is LIKE prefiltering plus the same
 * term-overlap ranking as the in-memory store.
 */
export class SqliteMemoryStore implements MemoryCollaborator {
  private db: Database.Database;

  constructor(dbPath: string = ":memory:") {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        seq INTEGER NOT NULL,
        session_id TEXT,
        user_message TEXT NOT NULL,
        assistant_response TEXT NOT NULL,
        metadata_json TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_seq ON conversations(seq);

      CREATE TABLE IF NOT EXISTS knowledge_items (
        id TEXT PRIMARY KEY,
        seq INTEGER NOT NULL,
        kind TEXT NOT NULL CHECK (kind IN ('general', 'security')),
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        source TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_knowledge_kind_seq ON knowledge_items(kind, seq);

      CREATE TABLE IF NOT EXISTS violation_records (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        severity TEXT NOT NULL,
        description TEXT NOT NULL,
        matched_pattern TEXT,
        user_input TEXT NOT NULL,
        response TEXT NOT NULL,
        context_json TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
    `);
  }

  close(): void {
    this.db.close();
  }

  async searchConversations(query: string, limit: number): Promise<HistoryEntry[]> {
    const terms = searchTerms(query);
    if (terms.length === 0) return [];

    const where = terms
      .map(() => "(lower(user_message) LIKE ? OR lower(assistant_response) LIKE ?)")
      .join(" OR ");
    const params = terms.flatMap((t) => [`%${t}%`, `%${t}%`]);
    const rows = this.db
      .prepare(
        `SELECT user_message, assistant_response, metadata_json, created_at
         FROM conversations WHERE ${where} ORDER BY seq DESC LIMIT ${CANDIDATE_LIMIT}`
      )
      .all(...params)
      .reverse();

    const entries: HistoryEntry[] = rows.map((raw) => {
      const row = ConversationRow.parse(raw);
      const metadata = parseMetadata(row.metadata_json);
      return {
        userMessage: row.user_message,
        assistantResponse: row.assistant_response,
        timestamp: row.created_at,
        ...(metadata ? { metadata } : {}),
      };
    });
    return rankByOverlap(entries, query, limit, conversationText).map((r) => r.entry);
  }

  async searchKnowledge(query: string, limit: number): Promise<KnowledgeItem[]> {
    return this.searchKnowledgeKind("general", query, limit);
  }

  async searchSecurityKnowledge(query: string, limit: number): Promise<KnowledgeItem[]> {
    return this.searchKnowledgeKind("security", query, limit);
  }

  async addConversation(userInput: string, response: string, metadata: ConversationMetadata): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO conversations (id, seq, session_id, user_message, assistant_response, metadata_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        randomUUID(),
        this.nextSeq("conversations"),
        metadata.sessionId,
        userInput,
        response,
        JSON.stringify(metadata),
        new Date().toISOString()
      );
  }

  async addViolationRecord(record: ViolationAuditRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO violation_records
           (id, type, severity, description, matched_pattern, user_input, response, context_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        randomUUID(),
        record.type,
        record.severity,
        record.description,
        record.matchedPattern ?? null,
        record.userInput,
        record.response,
        JSON.stringify(record.contextSummary),
        record.timestamp
      );
  }

  async addKnowledge(item: NewKnowledgeItem): Promise<KnowledgeItem> {
    return this.insertKnowledge("general", item);
  }

  async addSecurityKnowledge(item: NewKnowledgeItem): Promise<KnowledgeItem> {
    return this.insertKnowledge("security", item);
  }

  countViolationRecords(): number {
    return CountRow.parse(this.db.prepare("SELECT COUNT(*) AS count FROM violation_records").get()).count;
  }

  private insertKnowledge(kind: KnowledgeKind, item: NewKnowledgeItem): KnowledgeItem {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO knowledge_items (id, seq, kind, title, content, source, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        this.nextSeq("knowledge_items"),
        kind,
        item.title,
        item.content,
        item.source ?? null,
        new Date().toISOString()
      );
    return { id, ...item };
  }

  private searchKnowledgeKind(kind: KnowledgeKind, query: string, limit: number): KnowledgeItem[] {
    const terms = searchTerms(query);
    if (terms.length === 0) return [];

    const where = terms.map(() => "(lower(title) LIKE ? OR lower(content) LIKE ?)").join(" OR ");
    const params = terms.flatMap((t) => [`%${t}%`, `%${t}%`]);
    const rows = this.db
      .prepare(
        `SELECT id, title, content, source FROM knowledge_items
         WHERE kind = ? AND (${where}) ORDER BY seq DESC LIMIT ${CANDIDATE_LIMIT}`
      )
      .all(kind, ...params)
      .reverse();

    const items: KnowledgeItem[] = rows.map((raw) => {
      const row = KnowledgeRow.parse(raw);
      return {
        id: row.id,
        title: row.title,
        content: row.content,
        ...(row.source !== null ? { source: row.source } : {}),
      };
    });
    return rankByOverlap(items, query, limit, knowledgeText).map((r) => ({ ...r.entry, score: r.score }));
  }

  private nextSeq(table: "conversations" | "knowledge_items"): number {
    const row = CountRow.parse(this.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get());
    return row.count + 1;
  }
}
