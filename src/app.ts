import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import type {
  MemoryCollaborator,
  NluProvider,
  TeamingProvider,
  ThreatIntelProvider,
} from "./contracts/collaborators";
import type { CorrectionRecord, ViolationAuditRecord } from "./contracts/violation";
import type { PipelineConfig } from "./config/pipeline_config";
import { PipelineController } from "./control-plane/pipeline_controller";
import { ConfidenceAssessor } from "./correction/confidence_assessor";
import { CorrectionProposer } from "./correction/correction_proposer";
import { InconsistencyDetector } from "./correction/inconsistency_detector";
import { EthicsGate } from "./gates/ethics_gate";
import type { ViolationDetector } from "./gates/violation_detector";
import { createLogger, type PipelineLogger } from "./logger";
import { PipelineMetrics } from "./metrics/pipeline_metrics";
import { KeywordNluProvider } from "./providers/keyword_nlu";
import { RuleBasedTeamingProvider } from "./providers/teaming";
import { StubThreatIntelProvider } from "./providers/threat_intel";
import type { StepHandlerTable } from "./reasoning/step_handlers";
import { ReasoningEngine } from "./reasoning/reasoning_engine";
import { healthRoutes } from "./routes/healthz";
import { chatRoutes } from "./routes/chat";
import { JsonlAuditLog, MemoryAuditLog, type AuditSink } from "./store/audit_log";
import { InMemoryMemoryStore } from "./store/memory_store";
import { SqliteMemoryStore } from "./store/sqlite_memory_store";

export type PipelineOverrides = {
  nlu?: NluProvider;
  memory?: MemoryCollaborator;
  threatIntel?: ThreatIntelProvider;
  teaming?: TeamingProvider;
  detector?: ViolationDetector;
  stepHandlers?: StepHandlerTable;
  violationLog?: AuditSink<ViolationAuditRecord>;
  correctionLog?: AuditSink<CorrectionRecord>;
  metrics?: PipelineMetrics;
  log?: PipelineLogger;
};

export type Pipeline = {
  controller: PipelineController;
  metrics: PipelineMetrics;
  memory: MemoryCollaborator;
};

function defaultMemory(config: PipelineConfig): MemoryCollaborator {
  // The SQLite store also serves ":memory:"; the plain in-process store is for an explicit "none".
  if (config.memoryDbPath === "none") return new InMemoryMemoryStore();
  return new SqliteMemoryStore(config.memoryDbPath);
}

function auditSink<T>(path: string): AuditSink<T> {
  return path === "none" ? new MemoryAuditLog<T>() : new JsonlAuditLog<T>(path);
}

/** Wires every engine around one shared metrics object. */
export function buildPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): Pipeline {
  const log = overrides.log ?? createLogger({ level: config.logLevel, name: "turnwise.pipeline" });
  const metrics = overrides.metrics ?? new PipelineMetrics();
  const nlu = overrides.nlu ?? new KeywordNluProvider();
  const memory = overrides.memory ?? defaultMemory(config);

  const ethics = new EthicsGate({
    metrics,
    auditLog: overrides.violationLog ?? auditSink<ViolationAuditRecord>(config.violationLogPath),
    detector: overrides.detector,
    memory,
    log,
  });

  const controller = new PipelineController({
    settings: {
      selfCorrectionEnabled: config.selfCorrectionEnabled,
      correctionConfidenceThreshold: config.correctionConfidenceThreshold,
      inconsistencyWindow: config.inconsistencyWindow,
      historyLimit: config.historyLimit,
      knowledgeLimit: config.knowledgeLimit,
      turnTimeoutMs: config.turnTimeoutMs,
    },
    nlu,
    memory,
    teaming:
      overrides.teaming ??
      new RuleBasedTeamingProvider({
        clarificationThreshold: config.clarificationThreshold,
        adaptiveCommunication: config.adaptiveCommunicationEnabled,
      }),
    reasoning: new ReasoningEngine({
      nlu,
      metrics,
      threatIntel: overrides.threatIntel ?? new StubThreatIntelProvider(),
      stepHandlers: overrides.stepHandlers,
      enabled: config.reasoningEnabled,
      log,
    }),
    ethics,
    assessor: new ConfidenceAssessor({ enabled: config.selfCorrectionEnabled }),
    inconsistency: new InconsistencyDetector({ enabled: config.selfCorrectionEnabled }),
    corrector: new CorrectionProposer({
      ethics,
      metrics,
      auditLog: overrides.correctionLog ?? auditSink<CorrectionRecord>(config.correctionLogPath),
      log,
    }),
    metrics,
    log,
  });

  return { controller, metrics, memory };
}

export function buildApp(args: {
  config: PipelineConfig;
  overrides?: PipelineOverrides;
  logger?: boolean;
}): { app: FastifyInstance; pipeline: Pipeline } {
  const pipeline = buildPipeline(args.config, args.overrides);
  const app = Fastify({ logger: args.logger ?? false });

  // CORS (dev): permissive.
  app.register(cors, { origin: true });

  app.register(healthRoutes);
  app.register(chatRoutes, {
    prefix: "/v1",
    controller: pipeline.controller,
    metrics: pipeline.metrics,
  });

  return { app, pipeline };
}
