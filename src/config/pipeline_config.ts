import { config as loadEnv } from "dotenv";
import { z } from "zod";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") return fallback;
      return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
    });

const unitInterval = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const PipelineEnv = z.object({
  PORT: positiveInt(3333),
  LOG_LEVEL: z.string().optional(),
  REASONING_ENABLED: flag(true),
  SELF_CORRECTION_ENABLED: flag(true),
  CORRECTION_CONFIDENCE_THRESHOLD: unitInterval(0.6),
  INCONSISTENCY_WINDOW: positiveInt(5),
  CLARIFICATION_THRESHOLD: unitInterval(0.4),
  ADAPTIVE_COMMUNICATION_ENABLED: flag(true),
  TURN_TIMEOUT_MS: positiveInt(15_000),
  HISTORY_LIMIT: positiveInt(5),
  KNOWLEDGE_LIMIT: positiveInt(3),
  MEMORY_DB_PATH: z.string().min(1).default(":memory:"),
  VIOLATION_LOG_PATH: z.string().min(1).default("./data/ethical_violations/violations.jsonl"),
  CORRECTION_LOG_PATH: z.string().min(1).default("./data/self_correction/corrections.jsonl"),
});

export type PipelineConfig = {
  port: number;
  logLevel?: string;
  reasoningEnabled: boolean;
  selfCorrectionEnabled: boolean;
  correctionConfidenceThreshold: number;
  inconsistencyWindow: number;
  clarificationThreshold: number;
  adaptiveCommunicationEnabled: boolean;
  turnTimeoutMs: number;
  historyLimit: number;
  knowledgeLimit: number;
  memoryDbPath: string;
  violationLogPath: string;
  correctionLogPath: string;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pipeline configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Reads pipeline settings from the environment. Empty strings fall back to defaults.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = PipelineEnv.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    reasoningEnabled: e.REASONING_ENABLED,
    selfCorrectionEnabled: e.SELF_CORRECTION_ENABLED,
    correctionConfidenceThreshold: e.CORRECTION_CONFIDENCE_THRESHOLD,
    inconsistencyWindow: e.INCONSISTENCY_WINDOW,
    clarificationThreshold: e.CLARIFICATION_THRESHOLD,
    adaptiveCommunicationEnabled: e.ADAPTIVE_COMMUNICATION_ENABLED,
    turnTimeoutMs: e.TURN_TIMEOUT_MS,
    historyLimit: e.HISTORY_LIMIT,
    knowledgeLimit: e.KNOWLEDGE_LIMIT,
    memoryDbPath: e.MEMORY_DB_PATH,
    violationLogPath: e.VIOLATION_LOG_PATH,
    correctionLogPath: e.CORRECTION_LOG_PATH,
  };
}
