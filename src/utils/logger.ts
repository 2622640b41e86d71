import pino from "pino";
import { loadEnv } from "../config/env.js";

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (_logger) return _logger;
  const env = loadEnv();
  _logger = pino({
    name: "hunkmap",
    level: env.LOG_LEVEL,
    transport:
      env.NODE_ENV === "development"
        ? { target: "pino/file", options: { destination: 1 } }
        : undefined,
  });
  return _logger;
}

export function createChildLogger(
  bindings: Record<string, unknown>
): pino.Logger {
  return getLogger().child(bindings);
}
