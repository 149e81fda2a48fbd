import pino from "pino";

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (_logger) return _logger;
  _logger = pino({
    name: "pr-steward",
    level: process.env.LOG_LEVEL ?? "info",
    base: { pid: process.pid, env: process.env.NODE_ENV ?? "development" },
    // Installation keys travel with credentials and setup forms
    redact: {
      paths: ["apiKey", "*.apiKey", "api_key", "*.api_key", "credentials", "token"],
      censor: "[redacted]",
    },
    transport:
      process.env.NODE_ENV === "development"
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

/** Logger for one webhook delivery; every line carries the subject. */
export function createDeliveryLogger(
  parent: pino.Logger,
  delivery: { deliveryId: string; repositoryId: string; subjectNumber: number }
): pino.Logger {
  return parent.child({
    deliveryId: delivery.deliveryId,
    repo: delivery.repositoryId,
    number: delivery.subjectNumber,
  });
}
