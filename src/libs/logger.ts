import { pino, type Logger, type LevelWithSilent } from "pino";

/**
 * The slice of a logger the pipeline needs. A pino logger satisfies it, and so
 * does a plain object of spies in tests.
 */
export type StageLog = {
  debug: (o: unknown, msg: string) => void;
  info: (o: unknown, msg: string) => void;
  warn: (o: unknown, msg: string) => void;
  error: (o: unknown, msg: string) => void;
};

export function createLogger(opts: { level?: LevelWithSilent } = {}): Logger {
  return pino({
    level: opts.level ?? "info",
    base: { service: "antigen-screen" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
