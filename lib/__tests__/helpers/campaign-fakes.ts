import { mock } from "node:test";

import type { ModelCall, ModelResponse } from "../../ai/openai-client";
import { ContentGenerationError } from "../../campaign-errors";
import type { ContentGenerator, GeneratedContent, GenerationContext } from "../../content-generator";
import type { Contact, LedgerSession } from "../../contact-ledger/types";
import type { ConversationThreadStore } from "../../conversation-threads";
import type { ContentStage } from "../../drip-campaign/content-templates";
import type { InboundEmail, Mailer, OutboundEmail, SendEmailResult } from "../../mail/types";
import type { ReplyClassifier, ReplyVerdict } from "../../reply-classifier";

export const SENDER = { name: "Alex Doe", title: "Head of Growth", company: "OurCo" };
export const SIGNATURE_BLOCK = "Best regards,\nAlex Doe\nHead of Growth\nOurCo";

export function makeContact(overrides: Partial<Contact> = {}): Contact {
  const createdAt = new Date("2026-01-01T00:00:00Z");
  return {
    id: 1,
    name: "Jamie Smith",
    email: "jamie@acme.example",
    companyName: "Acme",
    companyUrl: "https://acme.example",
    linkedin: null,
    industry: "Logistics",
    status: null,
    bookingStatus: null,
    mailSentStatus: null,
    firstMailDate: null,
    drip1Date: null,
    drip2Date: null,
    drip3Date: null,
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}

export function completed(text: string): ModelResponse {
  return { output_text: text, status: "completed", incomplete_details: null };
}

export function textCall(text: string) {
  return mock.fn<ModelCall>(async () => completed(text));
}

export function failingCall(status = 400) {
  return mock.fn<ModelCall>(async () => {
    throw Object.assign(new Error("Bad request"), { status });
  });
}

/** Generator double: subject/body derive from the stage so tests can assert on them. */
export function fakeGenerator(opts: { failStages?: ContentStage[]; industry?: string | null } = {}) {
  const generate = mock.fn(
    async (contact: Contact, stage: ContentStage, _context?: GenerationContext): Promise<GeneratedContent> => {
      if (opts.failStages?.includes(stage)) throw new ContentGenerationError(stage, "model unavailable");
      return { subject: `${stage} subject`, body: `${stage} body for ${contact.name}`, source: "model" };
    }
  );
  const resolveIndustry = mock.fn(async (_profile: Pick<Contact, "companyName" | "companyUrl">) =>
    opts.industry === undefined ? "Logistics" : opts.industry
  );
  const generator: ContentGenerator = { generate, resolveIndustry };
  return { generator, generate, resolveIndustry };
}

export function fakeMailer(opts: { inbox?: InboundEmail[]; failTo?: string[] } = {}) {
  let sent = 0;
  const send = mock.fn(async (email: OutboundEmail): Promise<SendEmailResult> => {
    if (opts.failTo?.includes(email.to)) return { success: false, error: "SMTP unavailable" };
    sent++;
    return { success: true, messageId: `<sent-${sent}@ourco.example>` };
  });
  const scanInboxSince = mock.fn(async (_since: Date) => opts.inbox ?? []);
  const mailer: Mailer = { send, scanInboxSince };
  return { mailer, send, scanInboxSince };
}

export function fakeThreads(threadId: string | null = "conv_1") {
  const getOrCreateThread = mock.fn(async (_session: LedgerSession, _contact: Pick<Contact, "id" | "email">) => threadId);
  const threads: ConversationThreadStore = { getOrCreateThread };
  return { threads, getOrCreateThread };
}

export function fakeClassifier(verdict: Partial<ReplyVerdict> = {}) {
  const classify = mock.fn(
    async (_body: string, _subject?: string | null): Promise<ReplyVerdict> => ({
      sentiment: "NEUTRAL",
      hasQuery: false,
      queryText: null,
      stopContact: false,
      reasoning: "test verdict",
      source: "model",
      ...verdict,
    })
  );
  const classifier: ReplyClassifier = { classify };
  return { classifier, classify };
}

export function makeInbound(overrides: Partial<InboundEmail> = {}): InboundEmail {
  return {
    from: "jamie@acme.example",
    fromName: "Jamie Smith",
    messageId: "<reply-1@acme.example>",
    subject: "Re: Quick idea for Acme",
    text: "Sounds interesting, tell me more.",
    html: null,
    date: new Date("2026-03-02T09:00:00Z"),
    inReplyTo: "<sent-1@ourco.example>",
    references: ["<sent-1@ourco.example>"],
    cc: [],
    ...overrides,
  };
}
