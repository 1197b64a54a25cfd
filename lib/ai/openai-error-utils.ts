import OpenAI from "openai";

function readNumberField(value: unknown, key: string): number | null {
  if (!value || typeof value !== "object" || !(key in value)) return null;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : null;
}

function readStringField(value: unknown, key: string): string | null {
  if (!value || typeof value !== "object" || !(key in value)) return null;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : null;
}

export function getOpenAiErrorStatus(error: unknown): number | null {
  if (!error) return null;
  const direct = readNumberField(error, "status");
  if (direct !== null) return direct;
  const nested = error && typeof error === "object" && "error" in error ? Reflect.get(error, "error") : null;
  return readNumberField(nested, "status");
}

export function getOpenAiErrorRequestId(error: unknown): string | null {
  return readStringField(error, "request_id") ?? readStringField(error, "requestID") ?? readStringField(error, "_request_id");
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export function isRetryableOpenAiError(error: unknown): boolean {
  if (!error) return false;

  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.RateLimitError) return true;
  if (error instanceof OpenAI.InternalServerError) return true;

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return typeof status === "number" ? isRetryableStatus(status) : false;
  }

  const status = getOpenAiErrorStatus(error);
  if (typeof status === "number") return isRetryableStatus(status);

  // Plain network failures (ECONNRESET, fetch failed) carry no status.
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout") || message.includes("econnreset") || message.includes("fetch failed");
}

export function formatOpenAiErrorSummary(error: unknown): string {
  const message =
    error instanceof Error ? error.message : readStringField(error, "message") ?? String(error || "Unknown error");
  const status = getOpenAiErrorStatus(error);
  const requestId = getOpenAiErrorRequestId(error);

  const parts: string[] = [];
  if (typeof status === "number") parts.push(`status=${status}`);
  if (requestId) parts.push(`request_id=${requestId}`);

  return parts.length ? `${message} (${parts.join(", ")})` : message;
}
