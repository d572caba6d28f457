import { describe, it, expect, afterEach } from "vitest";

import type { ConversationMetadata, MemoryCollaborator } from "../src/contracts/collaborators";
import type { ViolationAuditRecord } from "../src/contracts/violation";
import { InMemoryMemoryStore, searchTerms } from "../src/store/memory_store";
import { SqliteMemoryStore } from "../src/store/sqlite_memory_store";

const meta: ConversationMetadata = {
  sessionId: "s1",
  intent: "question",
  confidence: 0.8,
  isEthical: true,
  selfCorrected: false,
};

const violation: ViolationAuditRecord = {
  type: "harmful_content",
  severity: "high",
  description: "test",
  matchedPattern: "\\bbombs?\\b",
  timestamp: "2026-01-01T00:00:00.000Z",
  userInput: "q",
  response: "r",
  contextSummary: { intent: "question", sentiment: "neutral", confidence: 0.5, sessionId: "s1" },
};

describe("searchTerms", () => {
  it("drops short words, stop words and duplicates", () => {
    expect(searchTerms("What is the capital of France? The CAPITAL!")).toEqual(["capital", "france"]);
    expect(searchTerms("is it ok")).toEqual([]);
  });
});

const stores: Array<{ name: string; make: () => MemoryCollaborator & { close?: () => void } }> = [
  { name: "InMemoryMemoryStore", make: () => new InMemoryMemoryStore() },
  { name: "SqliteMemoryStore", make: () => new SqliteMemoryStore(":memory:") },
];

describe.each(stores)("$name", ({ make }) => {
  let store: MemoryCollaborator & { close?: () => void } = make();

  afterEach(() => {
    store.close?.();
    store = make();
  });

  it("ranks conversations by term overlap, newest first on ties", async () => {
    await store.addConversation("Tell me about France", "France is in Europe.", meta);
    await store.addConversation("What is the capital of France?", "The capital of France is Paris.", meta);
    await store.addConversation("Best pasta recipe?", "Boil water first.", meta);
    await store.addConversation("France trivia", "France has many cheeses.", meta);

    const results = await store.searchConversations("capital of France", 5);

    expect(results.map((r) => r.userMessage)).toEqual([
      "What is the capital of France?",
      "France trivia",
      "Tell me about France",
    ]);
    expect(results[0].metadata).toEqual(meta);
  });

  it("honours the limit and returns nothing without usable terms", async () => {
    await store.addConversation("France one", "a", meta);
    await store.addConversation("France two", "b", meta);

    expect(await store.searchConversations("France", 1)).toHaveLength(1);
    expect(await store.searchConversations("is it", 5)).toEqual([]);
  });

  it("keeps general and security knowledge apart", async () => {
    const general = await store.addKnowledge({ title: "Backups", content: "Keep offline backups." });
    await store.addSecurityKnowledge({ title: "Ransomware", content: "Ransomware encrypts backups.", source: "advisory" });

    const generalHits = await store.searchKnowledge("backups", 3);
    const securityHits = await store.searchSecurityKnowledge("backups", 3);

    expect(generalHits).toEqual([{ id: general.id, title: "Backups", content: "Keep offline backups.", score: 1 }]);
    expect(securityHits).toHaveLength(1);
    expect(securityHits[0]).toMatchObject({ title: "Ransomware", source: "advisory", score: 1 });
  });

  it("accepts violation records", async () => {
    await expect(store.addViolationRecord(violation)).resolves.toBeUndefined();
  });
});

describe("SqliteMemoryStore", () => {
  it("persists violation records", async () => {
    const store = new SqliteMemoryStore(":memory:");
    await store.addViolationRecord(violation);
    await store.addViolationRecord({ ...violation, type: "misinformation", severity: "medium" });

    expect(store.countViolationRecords()).toBe(2);
    store.close();
  });
});
