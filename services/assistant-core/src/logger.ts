import pino, { type DestinationStream, type LoggerOptions } from "pino";

// Avoid logging whole config objects; redaction only covers the paths below.
const REDACT_PATHS = ["apiKey", "openaiApiKey", "config.openaiApiKey"] as const;

export function createLogger(level: string, destination?: DestinationStream) {
  const options: LoggerOptions = {
    level,
    base: {
      service: "assistant-core",
    },
    redact: {
      paths: [...REDACT_PATHS],
      remove: true,
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
