import type { ModelCall } from "@/lib/ai/openai-client";

export type AIExecutionPattern = "structured_json" | "text";

export type AIErrorCategory =
  | "timeout"
  | "rate_limit"
  | "api_error"
  | "parse_error"
  | "incomplete_output"
  | "schema_violation"
  | "unknown";

export type PromptRunnerError = {
  category: AIErrorCategory;
  message: string;
  retryable: boolean;
  raw?: string;
};

export type PromptRunnerTelemetry = {
  promptKey: string;
  model: string;
  pattern: AIExecutionPattern;
  attemptCount: number;
  conversationId: string | null;
};

export type ReasoningEffort = "minimal" | "low" | "medium" | "high";

export type PromptRunnerBaseParams = {
  call: ModelCall;
  promptKey: string;
  model: string;
  /** System instructions; `{var}` / `{{var}}` placeholders are filled from templateVars. */
  system: string;
  templateVars?: Record<string, string>;
  input: string;
  /** Server-side conversation the request is appended to. */
  conversationId?: string | null;
  /** Enables the file_search tool over these vector stores. */
  vectorStoreIds?: string[];
  temperature?: number;
  reasoningEffort?: ReasoningEffort;
  maxOutputTokens?: number;
  /**
   * Max number of prompt attempts, covering transport retries and output
   * that fails to parse or validate. Defaults to 3.
   */
  maxAttempts?: number;
  /** Base for the 2^attempt backoff between transport retries. Defaults to 1000. */
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: string };

export type StructuredJsonPromptParams<T> = PromptRunnerBaseParams & {
  pattern: "structured_json";
  schemaName: string;
  schema: Record<string, unknown>;
  strict?: boolean;
  validate: (value: unknown) => ValidationResult<T>;
};

export type TextPromptParams = PromptRunnerBaseParams & {
  pattern: "text";
  retryOn?: AIErrorCategory[];
};

export type PromptRunnerResult<T> =
  | {
      success: true;
      data: T;
      rawOutput: string;
      telemetry: PromptRunnerTelemetry;
    }
  | {
      success: false;
      error: PromptRunnerError;
      rawOutput?: string;
      telemetry: PromptRunnerTelemetry;
    };
