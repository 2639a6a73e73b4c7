import { pino, destination, type Logger } from "pino";
import type { LoggingConfig } from "@chatsift/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";

// stdout carries command output, so diagnostics go to stderr.
export function createLogger(config: LoggingConfig = DEFAULT_CONFIG.logging): Logger {
  return pino({ name: "chatsift", level: config.level }, destination(2));
}
