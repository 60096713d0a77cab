/**
 * JSON line logger for the workflow and the HTTP layer.
 *
 * Each event is one object on one line: `ts`, `level`, `message` (a snake_case
 * event name) and whatever context the call site passes, usually `requestId`
 * and `stage`.
 *
 * Environment:
 * - LOG_LEVEL: debug | info | warn | error (default info)
 * - WORKFLOW_DEBUG_LOGGING: 1 or true to emit debug events
 * - WORKFLOW_LOG_USER_CONTENT: 1 or true to include question text; otherwise
 *   only its length is written
 *
 * Keys, full documents and untruncated prompts never go through here.
 */

type Severity = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string;
  stage?: string;
  [key: string]: unknown;
}

const SEVERITY_RANK: Record<Severity, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function flag(name: string): boolean {
  const value = process.env[name];
  return value === "1" || value === "true";
}

function minimumSeverity(): Severity {
  const configured = process.env.LOG_LEVEL;
  return configured === "debug" || configured === "warn" || configured === "error" ? configured : "info";
}

const settings = {
  minimum: minimumSeverity(),
  debug: flag("WORKFLOW_DEBUG_LOGGING"),
  userContent: flag("WORKFLOW_LOG_USER_CONTENT"),
};

function emit(severity: Severity, message: string, context: LogContext = {}): void {
  if (SEVERITY_RANK[severity] < SEVERITY_RANK[settings.minimum]) return;
  if (severity === "debug" && !settings.debug) return;

  const line = JSON.stringify({ ts: new Date().toISOString(), level: severity, message, ...context });

  if (severity === "error") console.error(line);
  else if (severity === "warn") console.warn(line);
  else console.log(line);
}

export const logDebug = (message: string, context?: LogContext) => emit("debug", message, context);
export const logInfo = (message: string, context?: LogContext) => emit("info", message, context);
export const logWarn = (message: string, context?: LogContext) => emit("warn", message, context);
export const logError = (message: string, context?: LogContext) => emit("error", message, context);

export function truncate(text: string | undefined | null, maxLen = 1000): string | undefined {
  if (!text) return undefined;
  return text.length > maxLen ? `${text.slice(0, maxLen)}…[truncated]` : text;
}

/**
 * Questions and prompts are written as `[redacted, length=N]` unless user
 * content logging is switched on.
 */
export function sanitizeUserContent(content: string | undefined | null, maxLen = 100): string | undefined {
  if (!content) return undefined;
  return settings.userContent ? truncate(content, maxLen) : `[redacted, length=${content.length}]`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
