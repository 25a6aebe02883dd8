// Structured JSON-line logger. Respects LOG_LEVEL (debug | info | warn | error).

const LEVELS = ["debug", "info", "warn", "error"] as const;
type Level = (typeof LEVELS)[number];

function isLevel(value: string): value is Level {
  return (LEVELS as readonly string[]).includes(value);
}

function configuredLevel(): Level {
  const raw = String(process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLevel(raw) ? raw : "info";
}

function shouldLog(level: Level) {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(configuredLevel());
}

export function formatLogLine(level: Level, message: string, meta?: Record<string, unknown>, now = new Date()) {
  return JSON.stringify({ timestamp: now.toISOString(), level, message, ...meta });
}

function log(level: Level, message: string, meta?: Record<string, unknown>) {
  if (!shouldLog(level)) return;
  const line = formatLogLine(level, message, meta);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log("debug", message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log("info", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log("warn", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log("error", message, meta)
};
