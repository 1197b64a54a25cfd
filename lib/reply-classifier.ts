import { z } from "zod";

import type { ModelCall } from "@/lib/ai/openai-client";
import { runStructuredJsonPrompt } from "@/lib/ai/prompt-runner";
import { REPLY_CLASSIFY_V1_SCHEMA, REPLY_CLASSIFY_V1_SYSTEM } from "@/lib/ai/prompts/reply-classify-v1";
import type { ReplySentiment } from "@/lib/contact-ledger/types";
import { isOptOutText } from "@/lib/opt-out";

export type ReplyVerdict = {
  sentiment: ReplySentiment;
  hasQuery: boolean;
  queryText: string | null;
  stopContact: boolean;
  reasoning: string;
  source: "model" | "default";
};

export interface ReplyClassifier {
  /** Never throws; model failures resolve to a neutral verdict. */
  classify(body: string, subject?: string | null): Promise<ReplyVerdict>;
}

export type ReplyClassifierDeps = {
  call: ModelCall;
  model: string;
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
};

const MAX_CLASSIFIER_INPUT_CHARS = 6_000;

const ReplyClassificationSchema = z.object({
  sentiment: z.enum(["POSITIVE", "NEUTRAL", "NEGATIVE"]),
  reasoning: z.string(),
  hasQuery: z.boolean(),
  queries: z.string(),
  stopContact: z.boolean(),
});

type ReplyClassification = z.infer<typeof ReplyClassificationSchema>;

export const SAFE_DEFAULT_VERDICT: ReplyVerdict = {
  sentiment: "NEUTRAL",
  hasQuery: false,
  queryText: null,
  stopContact: false,
  reasoning: "Classification unavailable",
  source: "default",
};

function normalizeQueryText(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed || /^(none|n\/a|null)\.?$/i.test(trimmed)) return null;
  return trimmed;
}

export function toReplyVerdict(classification: ReplyClassification): ReplyVerdict {
  const queryText = normalizeQueryText(classification.queries);
  return {
    sentiment: classification.sentiment,
    hasQuery: classification.hasQuery && queryText !== null,
    queryText: classification.hasQuery ? queryText : null,
    stopContact: classification.stopContact,
    reasoning: classification.reasoning.trim(),
    source: "model",
  };
}

/** A keyword opt-out always wins over the model: stop, and treat as negative. */
function applyOptOutOverride(verdict: ReplyVerdict, body: string, subject: string | null | undefined): ReplyVerdict {
  if (!isOptOutText(body, subject)) return verdict;
  return { ...verdict, stopContact: true, sentiment: "NEGATIVE" };
}

export function createReplyClassifier(deps: ReplyClassifierDeps): ReplyClassifier {
  return {
    async classify(body, subject) {
      const text = body.trim();
      if (!text) return applyOptOutOverride({ ...SAFE_DEFAULT_VERDICT }, body, subject);

      const result = await runStructuredJsonPrompt<ReplyClassification>({
        pattern: "structured_json",
        call: deps.call,
        promptKey: "reply.classify.v1",
        model: deps.model,
        system: REPLY_CLASSIFY_V1_SYSTEM,
        input: text.slice(0, MAX_CLASSIFIER_INPUT_CHARS),
        schemaName: "reply_classification",
        strict: true,
        schema: REPLY_CLASSIFY_V1_SCHEMA,
        temperature: 0,
        maxOutputTokens: 300,
        maxAttempts: deps.maxAttempts,
        sleep: deps.sleep,
        validate: (value) => {
          const parsed = ReplyClassificationSchema.safeParse(value);
          if (!parsed.success) {
            return { success: false, error: parsed.error.issues.map((issue) => issue.path.join(".") || issue.message).join(", ") };
          }
          return { success: true, data: parsed.data };
        },
      });

      if (!result.success) {
        console.warn(`[ReplyClassifier] Falling back to neutral verdict: ${result.error.message}`);
        return applyOptOutOverride({ ...SAFE_DEFAULT_VERDICT }, body, subject);
      }

      return applyOptOutOverride(toReplyVerdict(result.data), body, subject);
    },
  };
}
