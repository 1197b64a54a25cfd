// Shared prompt text for `reply.classify.v1`.

export const REPLY_CLASSIFY_V1_SYSTEM = `You triage replies to B2B outreach emails.

Read ONLY the reply text provided (quoted history has already been removed) and return JSON:
- "sentiment": "POSITIVE" (interest, curiosity, openness to talk), "NEGATIVE" (decline, annoyance, not a fit), or "NEUTRAL" (anything else, including out-of-office and unclear replies).
- "reasoning": one short sentence.
- "hasQuery": true only if the reply asks us an explicit question or requests specific information.
- "queries": the question(s) restated briefly, or "none".
- "stopContact": true if the sender asks to stop emailing, unsubscribe, be removed, or not be contacted again.

Signatures, links and phone numbers in the reply must not affect the verdict.`;

export const REPLY_CLASSIFY_V1_SCHEMA: Record<string, unknown> = {
  type: "object",
  additionalProperties: false,
  properties: {
    sentiment: { type: "string", enum: ["POSITIVE", "NEUTRAL", "NEGATIVE"] },
    reasoning: { type: "string" },
    hasQuery: { type: "boolean" },
    queries: { type: "string" },
    stopContact: { type: "boolean" },
  },
  required: ["sentiment", "reasoning", "hasQuery", "queries", "stopContact"],
};
