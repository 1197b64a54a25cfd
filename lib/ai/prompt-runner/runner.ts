import type OpenAI from "openai";

import type { ModelResponse } from "@/lib/ai/openai-client";
import { categorizePromptRunnerError } from "@/lib/ai/prompt-runner/errors";
import { substituteTemplateVars } from "@/lib/ai/prompt-runner/template";
import type {
  AIErrorCategory,
  PromptRunnerBaseParams,
  PromptRunnerError,
  PromptRunnerResult,
  PromptRunnerTelemetry,
  StructuredJsonPromptParams,
  TextPromptParams,
} from "@/lib/ai/prompt-runner/types";
import {
  extractJsonObjectFromText,
  getTrimmedOutputText,
  isTruncatedResponse,
  summarizeResponse,
} from "@/lib/ai/response-utils";
import { computeRetryDelayMs, sleep } from "@/lib/retry";

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_MAX_OUTPUT_TOKENS = 800;
const RETRY_OUTPUT_TOKENS_MULTIPLIER = 1.2;
const DEFAULT_RETRY_ON: AIErrorCategory[] = ["timeout", "rate_limit", "api_error"];

function coerceMaxAttempts(value: unknown): number {
  const parsed = typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof parsed === "number") return Math.max(1, Math.min(10, parsed));
  return DEFAULT_MAX_ATTEMPTS;
}

// Each retry gets ~20% more output room; truncation is the usual cause of a bad parse.
function outputTokensForAttempt(base: number, attemptIndex: number): number {
  return Math.ceil(base * Math.pow(RETRY_OUTPUT_TOKENS_MULTIPLIER, attemptIndex));
}

function resolveTemperatureAndReasoning(opts: {
  model: string;
  temperature: number | null;
  reasoningEffort: PromptRunnerBaseParams["reasoningEffort"] | null;
}): Pick<OpenAI.Responses.ResponseCreateParamsNonStreaming, "temperature" | "reasoning"> {
  // Reasoning models reject sampling controls; keep only one of the two.
  const isReasoningModel = opts.model.startsWith("gpt-5") || /^o\d/.test(opts.model);
  if (isReasoningModel) {
    return opts.reasoningEffort ? { reasoning: { effort: opts.reasoningEffort } } : {};
  }
  return typeof opts.temperature === "number" ? { temperature: opts.temperature } : {};
}

function buildRequest(
  params: PromptRunnerBaseParams,
  maxOutputTokens: number,
  format: OpenAI.Responses.ResponseFormatTextConfig | null
): OpenAI.Responses.ResponseCreateParamsNonStreaming {
  const vectorStoreIds = (params.vectorStoreIds ?? []).filter(Boolean);
  const tools: OpenAI.Responses.Tool[] = vectorStoreIds.length
    ? [{ type: "file_search", vector_store_ids: vectorStoreIds }]
    : [];
  return {
    model: params.model,
    ...resolveTemperatureAndReasoning({
      model: params.model,
      temperature: typeof params.temperature === "number" && Number.isFinite(params.temperature) ? params.temperature : null,
      reasoningEffort: params.reasoningEffort ?? null,
    }),
    max_output_tokens: maxOutputTokens,
    instructions: substituteTemplateVars(params.system, params.templateVars),
    input: params.input,
    ...(params.conversationId ? { conversation: params.conversationId } : {}),
    ...(tools.length ? { tools } : {}),
    ...(format ? { text: { format } } : {}),
  };
}

function buildTelemetry(
  params: PromptRunnerBaseParams,
  pattern: PromptRunnerTelemetry["pattern"],
  attemptCount: number
): PromptRunnerTelemetry {
  return {
    promptKey: params.promptKey,
    model: params.model,
    pattern,
    attemptCount,
    conversationId: params.conversationId ?? null,
  };
}

async function backoff(params: PromptRunnerBaseParams, attempt: number): Promise<void> {
  const delayMs = computeRetryDelayMs(attempt, params.retryBaseDelayMs ?? 1000, "exponential");
  console.log(`[PromptRunner] ${params.promptKey} attempt ${attempt} failed, retrying in ${delayMs / 1000}s...`);
  await (params.sleep ?? sleep)(delayMs);
}

export async function runStructuredJsonPrompt<T>(params: StructuredJsonPromptParams<T>): Promise<PromptRunnerResult<T>> {
  const maxAttempts = coerceMaxAttempts(params.maxAttempts);
  const baseTokens = params.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
  const format: OpenAI.Responses.ResponseFormatTextConfig = {
    type: "json_schema",
    name: params.schemaName,
    strict: params.strict ?? true,
    schema: params.schema,
  };

  let lastError: PromptRunnerError | null = null;
  let lastRaw: string | null = null;

  for (let attemptIndex = 0; attemptIndex < maxAttempts; attemptIndex++) {
    const attempt = attemptIndex + 1;
    const isLastAttempt = attempt >= maxAttempts;

    let response: ModelResponse;
    try {
      response = await params.call(buildRequest(params, outputTokensForAttempt(baseTokens, attemptIndex), format));
    } catch (error) {
      const categorized = categorizePromptRunnerError(error);
      lastError = categorized;
      if (categorized.retryable && !isLastAttempt) {
        await backoff(params, attempt);
        continue;
      }
      return { success: false, error: categorized, telemetry: buildTelemetry(params, "structured_json", attempt) };
    }

    const text = getTrimmedOutputText(response);
    if (isTruncatedResponse(response) || !text) {
      const details = summarizeResponse(response);
      lastError = {
        category: "incomplete_output",
        message: `Post-process error: ${text ? "hit max_output_tokens" : "empty output_text"}${details ? ` (${details})` : ""}`,
        retryable: false,
        ...(text ? { raw: text } : {}),
      };
      continue;
    }

    lastRaw = text;

    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJsonObjectFromText(text));
    } catch (parseError) {
      lastError = {
        category: "parse_error",
        message: `Post-process error: failed to parse JSON (${parseError instanceof Error ? parseError.message : "unknown"})`,
        retryable: false,
        raw: text,
      };
      continue;
    }

    const validated = params.validate(parsed);
    if (!validated.success) {
      lastError = {
        category: "schema_violation",
        message: `Post-process error: schema violation (${validated.error})`,
        retryable: false,
        raw: text,
      };
      continue;
    }

    return {
      success: true,
      data: validated.data,
      rawOutput: text,
      telemetry: buildTelemetry(params, "structured_json", attempt),
    };
  }

  return {
    success: false,
    error: lastError ?? { category: "unknown", message: "Prompt runner failed", retryable: false },
    ...(lastRaw ? { rawOutput: lastRaw } : {}),
    telemetry: buildTelemetry(params, "structured_json", maxAttempts),
  };
}

export async function runTextPrompt(params: TextPromptParams): Promise<PromptRunnerResult<string>> {
  const maxAttempts = coerceMaxAttempts(params.maxAttempts);
  const baseTokens = params.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
  const retryOn = new Set(params.retryOn?.length ? params.retryOn : DEFAULT_RETRY_ON);

  let lastError: PromptRunnerError | null = null;
  let lastRaw: string | null = null;

  for (let attemptIndex = 0; attemptIndex < maxAttempts; attemptIndex++) {
    const attempt = attemptIndex + 1;
    const isLastAttempt = attempt >= maxAttempts;

    let response: ModelResponse;
    try {
      response = await params.call(buildRequest(params, outputTokensForAttempt(baseTokens, attemptIndex), null));
    } catch (error) {
      const categorized = categorizePromptRunnerError(error);
      if (categorized.retryable && retryOn.has(categorized.category) && !isLastAttempt) {
        await backoff(params, attempt);
        continue;
      }
      return { success: false, error: categorized, telemetry: buildTelemetry(params, "text", attempt) };
    }

    const text = getTrimmedOutputText(response);
    if (isTruncatedResponse(response)) {
      lastRaw = text;
      lastError = {
        category: "incomplete_output",
        message: `Post-process error: hit max_output_tokens (${summarizeResponse(response)})`,
        retryable: false,
        ...(text ? { raw: text } : {}),
      };
      continue;
    }
    if (!text) {
      lastError = { category: "incomplete_output", message: "Post-process error: empty output_text", retryable: false };
      break;
    }

    return { success: true, data: text, rawOutput: text, telemetry: buildTelemetry(params, "text", attempt) };
  }

  return {
    success: false,
    error: lastError ?? { category: "unknown", message: "Prompt runner failed", retryable: false },
    ...(lastRaw ? { rawOutput: lastRaw } : {}),
    telemetry: buildTelemetry(params, "text", maxAttempts),
  };
}
