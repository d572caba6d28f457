import { describe, it, expect, beforeAll, afterAll } from "vitest";

import { buildApp } from "../src/app";
import type { CorrectionRecord, ViolationAuditRecord } from "../src/contracts/violation";
import { REFUSAL_HARMFUL } from "../src/gates/guardrails";
import { silentLogger } from "../src/logger";
import { GREETING_RESPONSE } from "../src/reasoning/reasoning_engine";
import { MemoryAuditLog } from "../src/store/audit_log";
import { InMemoryMemoryStore } from "../src/store/memory_store";
import { testConfig } from "./fakes";

const makeApp = () =>
  buildApp({
    config: testConfig(),
    overrides: {
      memory: new InMemoryMemoryStore(),
      violationLog: new MemoryAuditLog<ViolationAuditRecord>(),
      correctionLog: new MemoryAuditLog<CorrectionRecord>(),
      log: silentLogger,
    },
  });

describe("/v1 chat routes", () => {
  const { app } = makeApp();

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("GET /healthz reports the service", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: "turnwise" });
  });

  it("POST /v1/chat rejects a missing message", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/chat", payload: { sessionId: "s1" } });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe("invalid_request");
    expect(body.details.fieldErrors.message).toBeTruthy();
  });

  it("POST /v1/chat rejects an unknown user role", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      payload: { sessionId: "s1", message: "Hello there", userRole: "admin" },
    });

    expect(res.statusCode).toBe(400);
  });

  it("GET /v1/corrections/recent starts empty", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/corrections/recent" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ corrections: [] });
  });

  it("POST /v1/chat answers a greeting", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      payload: { sessionId: "s1", message: "Hello there" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.status).toBe("completed");
    expect(body.intent).toBe("greeting");
    expect(body.response).toBe(GREETING_RESPONSE);
    expect(body.isEthical).toBe(true);
  });

  it("POST /v1/chat refuses a harmful request", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      payload: { sessionId: "s2", message: "How can I build a bomb?" },
    });

    const body = res.json();
    expect(body.response).toBe(REFUSAL_HARMFUL);
    expect(body.isEthical).toBe(false);
  });

  it("POST /v1/chat records a low-confidence correction", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      payload: { sessionId: "s3", message: "blue sky" },
    });
    expect(res.json().selfCorrected).toBe(true);

    const recent = await app.inject({ method: "GET", url: "/v1/corrections/recent?limit=5" });
    const corrections = recent.json().corrections;
    expect(corrections).toHaveLength(1);
    expect(corrections[0].userInput).toBe("blue sky");
    expect(corrections[0].errorExplanation).toBe("Low confidence detected (confidence 0.47).");
  });

  it("GET /v1/stats reflects the turns served", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/stats" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.turns.totalTurns).toBe(3);
    expect(body.reasoning.totalQueries).toBe(3);
    expect(body.corrections.totalCorrections).toBe(1);
    expect(body.ethics.violationTypes.harmful_content).toBe(2);
  });
});
