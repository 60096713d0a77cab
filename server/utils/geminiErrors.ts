/**
 * Raised when a model reply cannot be parsed into the shape a task expects.
 * Call sites always catch it and fall back to the task's default.
 */
export class GatewayResponseError extends Error {
  constructor(
    message: string,
    public readonly task: string,
    public readonly responseText?: string
  ) {
    super(message);
    this.name = "GatewayResponseError";
  }
}

function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}

function mentionsQuota(message: unknown): boolean {
  return typeof message === "string" &&
    (message.includes("quota") || message.includes("RESOURCE_EXHAUSTED"));
}

export function isQuotaError(error: unknown): boolean {
  if (!error) return false;

  const message = readField(error, "message") ?? String(error);
  const nestedError = readField(error, "error");

  const hasQuotaInMessage = mentionsQuota(message);
  const hasQuotaStatus = readField(error, "status") === "RESOURCE_EXHAUSTED" ||
    readField(error, "status") === 429;
  const hasQuotaCode = readField(error, "code") === 429;

  const hasNestedQuotaCode = readField(nestedError, "code") === 429;
  const hasNestedQuotaStatus = readField(nestedError, "status") === "RESOURCE_EXHAUSTED";
  const hasNestedQuotaMessage = mentionsQuota(readField(nestedError, "message"));

  return (
    hasQuotaInMessage ||
    hasQuotaStatus ||
    hasQuotaCode ||
    hasNestedQuotaCode ||
    hasNestedQuotaStatus ||
    hasNestedQuotaMessage
  );
}
