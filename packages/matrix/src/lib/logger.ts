import path from "node:path";
import pino from "pino";
import { formatZodErrors } from "@asset-matrix/kit";
import { MatrixEnvSchema } from "../types/config.js";

const LogEnvSchema = MatrixEnvSchema.pick({ LOG_LEVEL: true, LOG_DIR: true });

export interface LogSettings {
  level: pino.LevelWithSilent;
  logDir: string;
  /** Validation problems with the logging variables; defaults were used instead. */
  issues: string[];
}

/** Logging level and directory from the environment, falling back to defaults. */
export function resolveLogSettings(source: NodeJS.ProcessEnv = process.env): LogSettings {
  const parsed = LogEnvSchema.safeParse(source);
  if (!parsed.success) {
    return { level: "info", logDir: path.resolve("logs"), issues: formatZodErrors(parsed.error) };
  }
  return { level: parsed.data.LOG_LEVEL, logDir: path.resolve(parsed.data.LOG_DIR ?? "logs"), issues: [] };
}

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const { level, logDir, issues } = resolveLogSettings();
  const instance = pino(
    { level },
    pino.transport({
      targets: [
        { target: "pino/file", level, options: { destination: 1 } },
        {
          target: "pino-roll",
          level,
          options: {
            file: path.join(logDir, "asset-matrix"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
  if (issues.length > 0) {
    instance.warn({ issues }, "Invalid logging environment, using defaults");
  }
  return instance;
}

const pinoInstance = createPinoLogger();

/**
 * Process-wide logger. Lines from concurrent tasks interleave on stdout, so
 * task loggers always carry `strategy` and `asset` bindings.
 */
export const logger = Object.assign(pinoInstance, {
  createChild(module: string): pino.Logger {
    return pinoInstance.child({ module });
  },

  forTask(strategy: string, asset: string): pino.Logger {
    return pinoInstance.child({ module: "task", strategy, asset });
  },
});
