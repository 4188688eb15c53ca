export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logging callback handed to every service; the adapter routes it to its own logger
 */
export type LogFn = (level: LogLevel, message: string) => void;
