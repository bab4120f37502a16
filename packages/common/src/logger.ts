import winston from "winston";
import { loadConfig, LogLevel } from "./config";

// Custom log levels with abbreviations
const customLevels = {
  levels: {
    ERR: 0,
    WRN: 1,
    INF: 2,
    DBG: 3,
  } satisfies Record<LogLevel, number>,
  colors: {
    ERR: "red",
    WRN: "yellow",
    INF: "green",
    DBG: "blue",
  } satisfies Record<LogLevel, string>,
};

winston.addColors(customLevels.colors);

export type LogMeta = Record<string, unknown>;
export type LogMethod = (message: string, meta?: LogMeta) => void;

export interface ArmoryLogger {
  error: LogMethod;
  warn: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  ERR: LogMethod;
  WRN: LogMethod;
  INF: LogMethod;
  DBG: LogMethod;
  /** Logger that adds `meta` to every entry */
  child(meta: LogMeta): ArmoryLogger;
}

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
  transports?: winston.LoggerOptions["transports"];
}

const DIM_CODE = "\x1b[2m";
const RESET_CODE = "\x1b[0m";

const chars = {
  singleLine: "▪",
  startLine: "┏",
  line: "┃",
  endLine: "┗",
} as const;

function indent(line: string, lineType: keyof typeof chars, dimmed = true) {
  const text = `${chars[lineType]}  ${line}`;
  return dimmed ? `${DIM_CODE}${text}${RESET_CODE}` : text;
}

function formatBlock(content: string, firstLineBright = false): string {
  const lines = content.split("\n");
  if (lines.length === 1) {
    return indent(lines[0], "singleLine", !firstLineBright);
  }

  const last = lines.length - 1;
  return lines
    .map((line, i) => {
      if (i === 0) return indent(line, "startLine", !firstLineBright);
      return indent(line, i === last ? "endLine" : "line");
    })
    .join("\n");
}

function stringify(value: unknown): string {
  return typeof value === "object" && value !== null
    ? JSON.stringify(value, null, 2)
    : String(value);
}

export const consoleFormat = winston.format.printf(
  (info: winston.Logform.TransformableInfo) => {
    const { level, timestamp, message, stack, ...meta } = info;
    const prefix = `[${level}]`.padEnd(5) + `[${String(timestamp)}]`;

    let out = `${prefix}\n${formatBlock(stringify(message), true)}`;
    if (Object.keys(meta).length) {
      out += "\n" + formatBlock(JSON.stringify(meta, null, 2));
    }
    if (typeof stack === "string") {
      out += "\n" + formatBlock(stack);
    }
    return out;
  }
);

function wrap(base: winston.Logger, defaults: LogMeta): ArmoryLogger {
  const emit =
    (level: LogLevel): LogMethod =>
    (message, meta = {}) => {
      base.log(level, message, { ...defaults, ...meta });
    };

  return {
    error: emit("ERR"),
    warn: emit("WRN"),
    info: emit("INF"),
    debug: emit("DBG"),
    ERR: emit("ERR"),
    WRN: emit("WRN"),
    INF: emit("INF"),
    DBG: emit("DBG"),
    child: (meta) => wrap(base, { ...defaults, ...meta }),
  };
}

export function createLogger(options: LoggerOptions = {}): {
  logger: ArmoryLogger;
  base: winston.Logger;
} {
  const transports = options.transports ?? [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: "HH:mm:ss" }),
        consoleFormat,
        winston.format.colorize({ all: true })
      ),
    }),
  ];

  const base = winston.createLogger({
    levels: customLevels.levels,
    level: options.level ?? "DBG",
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports,
    silent: options.silent,
  });

  return { logger: wrap(base, {}), base };
}

/**
 * Options for the shared logger. An invalid environment does not stop the
 * import: the defaults apply and the problem is returned for reporting.
 */
export function defaultLoggerOptions(
  env: Record<string, string | undefined> = process.env
): { options: LoggerOptions; problem?: string } {
  const silent = env.NODE_ENV === "test";
  try {
    const config = loadConfig(env);
    return { options: { level: config.logLevel, silent } };
  } catch (err) {
    const problem = err instanceof Error ? err.message : String(err);
    return { options: { level: "DBG", silent }, problem };
  }
}

const startup = defaultLoggerOptions();
const { logger, base } = createLogger(startup.options);
if (startup.problem) {
  logger.warn("Falling back to default logging configuration", {
    problem: startup.problem,
  });
}

export const cleanup = async () => {
  await Promise.all(
    base.transports.map(
      (t) =>
        new Promise<void>((resolve) => {
          if (typeof t.close === "function") {
            t.on("finish", resolve);
            t.close();
          } else {
            resolve();
          }
        })
    )
  );
};

export default logger;
