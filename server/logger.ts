import pino from "pino";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'api_key', 'apikey', 'authorization', 'cookie', 'session'];

export function scrubSensitive(obj: unknown, seen = new WeakSet<object>()): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj !== 'object') return obj;
  if (obj instanceof Error) return { name: obj.name, message: obj.message };

  if (seen.has(obj)) return '[Circular]';
  seen.add(obj);

  if (Array.isArray(obj)) return obj.slice(0, 25).map(item => scrubSensitive(item, seen));

  const result: Record<string, unknown> = {};
  const entries = Object.entries(obj).slice(0, 50);
  for (const [key, value] of entries) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(s => lowerKey.includes(s))) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      result[key] = scrubSensitive(value, seen);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : isProduction ? "info" : "debug"),
  transport: isProduction || isTest
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
  base: {
    service: "report-extraction",
    env: process.env.NODE_ENV || "development",
  },
  formatters: {
    level: (label) => ({ level: label }),
    log: (object) => {
      const scrubbed = scrubSensitive(object);
      return typeof scrubbed === 'object' && scrubbed !== null && !Array.isArray(scrubbed)
        ? { ...scrubbed }
        : { value: scrubbed };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const createContextLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

export const extractionLogger = createContextLogger({ component: "extraction" });
export const semanticLogger = createContextLogger({ component: "semantic" });
