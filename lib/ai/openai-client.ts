import OpenAI from "openai";

import { requireConfigValue } from "@/lib/campaign-config";

/** The slice of a Responses API result the prompt runner reads. */
export type ModelResponse = Pick<OpenAI.Responses.Response, "output_text" | "status" | "incomplete_details">;

export type ModelCall = (params: OpenAI.Responses.ResponseCreateParamsNonStreaming) => Promise<ModelResponse>;

/** Creates a server-side conversation and returns its id. */
export type ConversationFactory = () => Promise<string>;

let client: OpenAI | null = null;

export function getOpenAiClient(apiKey: string | null = process.env.OPENAI_API_KEY ?? null): OpenAI {
  if (!client) {
    // Retries are owned by the prompt runner, not the SDK.
    client = new OpenAI({ apiKey: requireConfigValue(apiKey, "OPENAI_API_KEY"), maxRetries: 0 });
  }
  return client;
}

export function createModelCall(openai: OpenAI, opts: { timeoutMs: number }): ModelCall {
  return (params) => openai.responses.create(params, { timeout: opts.timeoutMs });
}

export function createConversationFactory(openai: OpenAI, metadata?: Record<string, string>): ConversationFactory {
  return async () => {
    const conversation = await openai.conversations.create(metadata ? { metadata } : {});
    return conversation.id;
  };
}
