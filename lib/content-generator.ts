import type { ModelCall } from "@/lib/ai/openai-client";
import { runTextPrompt } from "@/lib/ai/prompt-runner";
import { CAMPAIGN_EMAIL_STAGE_BRIEFS, CAMPAIGN_EMAIL_V1_SYSTEM } from "@/lib/ai/prompts/campaign-email-v1";
import { INDUSTRY_RESOLVE_V1_SYSTEM } from "@/lib/ai/prompts/industry-resolve-v1";
import {
  MEETING_BUTTON_PLACEHOLDER,
  REPLY_RESPONSE_BRIEFS,
  REPLY_RESPONSE_V1_SYSTEM,
} from "@/lib/ai/prompts/reply-response-v1";
import type { SenderIdentity } from "@/lib/campaign-config";
import { ContentGenerationError } from "@/lib/campaign-errors";
import { parseSubjectBody } from "@/lib/content-format";
import type { Contact, ContactProfile } from "@/lib/contact-ledger/types";
import {
  ackBody,
  appendSignature,
  fallbackOutreach,
  fallbackReplyBody,
  insertBookingCta,
  isAckStage,
  isOutreachStage,
  renderTemplate,
  type ContentStage,
  type ModelReplyStage,
  type OutreachStage,
  type TemplateVars,
} from "@/lib/drip-campaign/content-templates";
import { extractFirstName } from "@/lib/email-participants";
import { toReplySubject } from "@/lib/email-threading";

export type GenerationContext = {
  /** Model conversation the request is appended to. */
  threadId?: string | null;
  replyText?: string | null;
  queries?: string | null;
  inboundSubject?: string | null;
};

export type GeneratedContent = {
  subject: string;
  body: string;
  /** "template" for acknowledgments, which never go through the model. */
  source: "model" | "fallback" | "template";
};

export interface ContentGenerator {
  /**
   * Outreach stages throw ContentGenerationError when the model cannot be
   * reached; reply stages fall back to deterministic copy instead.
   */
  generate(contact: Contact, stage: ContentStage, context?: GenerationContext): Promise<GeneratedContent>;
  resolveIndustry(profile: Pick<ContactProfile, "companyName" | "companyUrl">): Promise<string | null>;
}

export type ContentGeneratorDeps = {
  call: ModelCall;
  model: string;
  sender: SenderIdentity;
  bookingUrl: string | null;
  vectorStoreId?: string | null;
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
};

const MAX_INDUSTRY_LENGTH = 60;

function buildTemplateVars(contact: Contact, sender: SenderIdentity): TemplateVars {
  return {
    firstName: extractFirstName(contact.name) ?? "there",
    companyName: contact.companyName?.trim() || "your team",
    industry: contact.industry?.trim() || "your industry",
    senderName: sender.name,
    senderTitle: sender.title,
    senderCompany: sender.company || "our team",
  };
}

function describeRecipient(contact: Contact): string {
  return [
    `- Name: ${contact.name}`,
    `- Company: ${contact.companyName ?? "Unknown"}`,
    `- Website: ${contact.companyUrl ?? "Unknown"}`,
    `- Industry: ${contact.industry ?? "Unknown"}`,
    ...(contact.linkedin ? [`- LinkedIn: ${contact.linkedin}`] : []),
  ].join("\n");
}

function stripGreetingAndSignOff(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").trim().split("\n");
  if (lines.length > 1 && /^(hi|hello|hey|dear)\b.*,\s*$/i.test(lines[0] ?? "")) lines.shift();
  const signOffIndex = lines.findIndex((line) => /^(best( regards)?|kind regards|regards|thanks|cheers),?\s*$/i.test(line.trim()));
  const kept = signOffIndex > 0 ? lines.slice(0, signOffIndex) : lines;
  return kept.join("\n").trim();
}

export function cleanIndustry(raw: string | null | undefined): string | null {
  const firstLine = (raw || "").trim().split("\n")[0] ?? "";
  const cleaned = firstLine
    .replace(/^industry\s*:\s*/i, "")
    .replace(/^["'`]+|["'`.]+$/g, "")
    .trim();
  if (!cleaned || cleaned.toLowerCase() === "unknown" || cleaned.length > MAX_INDUSTRY_LENGTH) return null;
  return cleaned;
}

export function createContentGenerator(deps: ContentGeneratorDeps): ContentGenerator {
  const senderVars: Record<string, string> = {
    senderName: deps.sender.name || "the team",
    senderTitle: deps.sender.title || "Representative",
    senderCompany: deps.sender.company || "our company",
  };
  const vectorStoreIds = deps.vectorStoreId ? [deps.vectorStoreId] : [];

  function replyEnvelope(vars: TemplateVars, content: string, context: GenerationContext): GeneratedContent {
    return {
      subject: toReplySubject(context.inboundSubject),
      body: appendSignature(`Hi ${vars.firstName},\n\n${content.trim()}`, deps.sender),
      source: "template",
    };
  }

  async function generateOutreach(contact: Contact, stage: OutreachStage, context: GenerationContext): Promise<GeneratedContent> {
    const vars = buildTemplateVars(contact, deps.sender);
    const fallback = fallbackOutreach(stage, vars);

    const result = await runTextPrompt({
      pattern: "text",
      call: deps.call,
      promptKey: `campaign.email.v1.${stage}`,
      model: deps.model,
      system: CAMPAIGN_EMAIL_V1_SYSTEM,
      templateVars: senderVars,
      input: [
        `STAGE: ${stage}`,
        renderTemplate(CAMPAIGN_EMAIL_STAGE_BRIEFS[stage], vars),
        "",
        "RECIPIENT",
        describeRecipient(contact),
      ].join("\n"),
      conversationId: context.threadId ?? null,
      vectorStoreIds,
      temperature: 0.7,
      maxOutputTokens: 600,
      maxAttempts: deps.maxAttempts,
      sleep: deps.sleep,
    });

    if (!result.success && result.error.category !== "incomplete_output") {
      throw new ContentGenerationError(stage, result.error.message);
    }

    const raw = result.success ? result.data : result.rawOutput ?? null;
    const parsed = parseSubjectBody(raw, fallback);
    if (parsed.strategy === "fallback") {
      console.warn(`[ContentGenerator] Unusable ${stage} output for contact ${contact.id}, using fallback copy`);
    }

    return {
      subject: parsed.subject,
      body: appendSignature(parsed.body, deps.sender),
      source: parsed.strategy === "fallback" ? "fallback" : "model",
    };
  }

  async function generateReply(contact: Contact, stage: ModelReplyStage, context: GenerationContext): Promise<GeneratedContent> {
    const vars = buildTemplateVars(contact, deps.sender);

    const result = await runTextPrompt({
      pattern: "text",
      call: deps.call,
      promptKey: `reply.response.v1.${stage}`,
      model: deps.model,
      system: REPLY_RESPONSE_V1_SYSTEM,
      templateVars: senderVars,
      input: [
        REPLY_RESPONSE_BRIEFS[stage],
        "",
        "RECIPIENT",
        describeRecipient(contact),
        "",
        "THEIR REPLY",
        context.replyText?.trim() || "(empty)",
        ...(context.queries ? ["", "THEIR QUESTIONS", context.queries] : []),
      ].join("\n"),
      conversationId: context.threadId ?? null,
      vectorStoreIds,
      temperature: 0.4,
      maxOutputTokens: 500,
      maxAttempts: deps.maxAttempts,
      sleep: deps.sleep,
    });

    let content: string;
    let source: GeneratedContent["source"];
    if (result.success) {
      content = stripGreetingAndSignOff(result.data);
      source = "model";
    } else {
      console.warn(`[ContentGenerator] ${stage} generation failed for contact ${contact.id}: ${result.error.message}`);
      content = "";
      source = "fallback";
    }
    if (!content) {
      content = fallbackReplyBody(stage, vars);
      source = "fallback";
    }

    if (stage === "query_with_booking" || stage === "booking_invite") {
      content = insertBookingCta(content, deps.bookingUrl);
    } else {
      content = content.replaceAll(MEETING_BUTTON_PLACEHOLDER, "").trim();
    }

    return { ...replyEnvelope(vars, content, context), source };
  }

  return {
    async generate(contact, stage, context = {}) {
      if (isOutreachStage(stage)) return generateOutreach(contact, stage, context);
      if (isAckStage(stage)) {
        const vars = buildTemplateVars(contact, deps.sender);
        return replyEnvelope(vars, ackBody(stage, vars), context);
      }
      return generateReply(contact, stage, context);
    },

    async resolveIndustry(profile) {
      const companyName = profile.companyName?.trim();
      const companyUrl = profile.companyUrl?.trim();
      if (!companyName && !companyUrl) return null;

      const result = await runTextPrompt({
        pattern: "text",
        call: deps.call,
        promptKey: "industry.resolve.v1",
        model: deps.model,
        system: INDUSTRY_RESOLVE_V1_SYSTEM,
        input: `Company: ${companyName || "Unknown"}\nWebsite: ${companyUrl || "Unknown"}`,
        temperature: 0,
        maxOutputTokens: 50,
        maxAttempts: deps.maxAttempts,
        sleep: deps.sleep,
      });

      if (!result.success) {
        console.warn(`[ContentGenerator] Industry lookup failed for ${companyName || companyUrl}: ${result.error.message}`);
        return null;
      }
      return cleanIndustry(result.data);
    },
  };
}
