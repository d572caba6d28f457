import pino from "pino";

export type PipelineLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export function createLogger(args: { level?: string; name?: string } = {}): pino.Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const level =
    args.level ?? process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info");

  return pino({
    name: args.name ?? "turnwise",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}

export const silentLogger: PipelineLogger = createLogger({ level: "silent" });

/** Short, single-line preview of user or model text for log fields. */
export function previewText(text: string, max = 80): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}
