/**
 * Deterministic copy for the campaign: acknowledgments that never go through
 * the model, fallbacks when model output is unusable, and the booking line.
 */

import type { SenderIdentity } from "@/lib/campaign-config";
import { MEETING_BUTTON_PLACEHOLDER } from "@/lib/ai/prompts/reply-response-v1";
import { substituteTemplateVars } from "@/lib/ai/prompt-runner/template";

export const OUTREACH_STAGES = ["initial", "drip_1", "drip_2", "drip_3"] as const;
export type OutreachStage = (typeof OUTREACH_STAGES)[number];

export const MODEL_REPLY_STAGES = [
  "query_with_booking",
  "booking_invite",
  "negative_with_query",
  "neutral_with_query",
] as const;
export type ModelReplyStage = (typeof MODEL_REPLY_STAGES)[number];

export const ACK_STAGES = ["stop_ack", "negative_ack", "neutral_ack"] as const;
export type AckStage = (typeof ACK_STAGES)[number];

export type ContentStage = OutreachStage | ModelReplyStage | AckStage;

export type TemplateVars = {
  firstName: string;
  companyName: string;
  industry: string;
  senderName: string;
  senderTitle: string;
  senderCompany: string;
};

export const SIGN_OFF = "Best regards,";

const FALLBACK_OUTREACH: Record<OutreachStage, { subject: string; body: string }> = {
  initial: {
    subject: "Quick question for {companyName}",
    body: "Hi {firstName},\n\nI work with {industry} teams at {senderCompany} on getting more qualified conversations from the leads they already have. I thought it might be relevant for {companyName}.\n\nIs this something on your radar this quarter?",
  },
  drip_1: {
    subject: "Following up",
    body: "Hi {firstName},\n\nFollowing up on my last note. Teams like {companyName} usually start with a short review of where replies stall, which tends to surface a few quick wins.\n\nWould a 15-minute call be useful?",
  },
  drip_2: {
    subject: "An idea for {companyName}",
    body: "Hi {firstName},\n\nOne idea that has worked well for other {industry} companies: answer every inbound reply within the hour. It sounds simple, but it often doubles booked calls.\n\nHappy to share how others set it up.",
  },
  drip_3: {
    subject: "Closing the loop",
    body: "Hi {firstName},\n\nI haven't heard back, so this will be my last note. If improving reply-to-meeting rates becomes a priority for {companyName}, just reply and I'll pick it up from there.",
  },
};

const ACK_BODIES: Record<AckStage, string> = {
  stop_ack: "Understood. I've removed you from our list and you won't receive any further emails from me.",
  negative_ack:
    "Thanks for letting me know, I appreciate the reply. I won't follow up on this, but feel free to reach out if anything changes.",
  neutral_ack:
    "Thanks for getting back to me. If it would help to see how {senderCompany} could support {companyName}, just reply and I'll share more detail.",
};

const FALLBACK_REPLY_BODIES: Record<ModelReplyStage, string> = {
  query_with_booking:
    "Thanks for your questions. They deserve a proper answer rather than a rushed one, so the quickest way is a short call where I can walk you through it.",
  booking_invite: `Thanks for the reply, glad this caught your interest. A short call is the easiest way to see whether it fits {companyName}.\n\n${MEETING_BUTTON_PLACEHOLDER}`,
  negative_with_query:
    "Thanks for letting me know, and I respect your decision. On your question: it depends a little on your setup, and I'm happy to send specifics by email. I won't follow up beyond that.",
  neutral_with_query:
    "Thanks for your question. The short answer is that it depends on your current setup. If you can share a bit more about what you're looking for, I'll send over specifics.",
};

export function renderTemplate(template: string, vars: TemplateVars): string {
  return substituteTemplateVars(template, { ...vars });
}

export function formatSignature(sender: SenderIdentity): string {
  return [sender.name, sender.title, sender.company].map((line) => line.trim()).filter(Boolean).join("\n");
}

/** Appends the sign-off (unless the body already ends with it) and the signature block. */
export function appendSignature(body: string, sender: SenderIdentity): string {
  const trimmed = body.trimEnd();
  const withSignOff = trimmed.endsWith(SIGN_OFF) ? trimmed : `${trimmed}\n\n${SIGN_OFF}`;
  const signature = formatSignature(sender);
  return signature ? `${withSignOff}\n${signature}` : withSignOff;
}

export function fallbackOutreach(stage: OutreachStage, vars: TemplateVars): { subject: string; body: string } {
  const template = FALLBACK_OUTREACH[stage];
  return { subject: renderTemplate(template.subject, vars), body: renderTemplate(template.body, vars) };
}

export function ackBody(stage: AckStage, vars: TemplateVars): string {
  return renderTemplate(ACK_BODIES[stage], vars);
}

export function fallbackReplyBody(stage: ModelReplyStage, vars: TemplateVars): string {
  return renderTemplate(FALLBACK_REPLY_BODIES[stage], vars);
}

export function bookingLine(bookingUrl: string | null): string {
  if (bookingUrl) return `You can book a convenient time on my calendar here: ${bookingUrl}`;
  return "If you'd like to talk, reply with a couple of times that work for you and I'll send an invite.";
}

/** Swaps the meeting placeholder for the booking line, appending it when the placeholder is missing. */
export function insertBookingCta(text: string, bookingUrl: string | null): string {
  const line = bookingLine(bookingUrl);
  if (text.includes(MEETING_BUTTON_PLACEHOLDER)) return text.replaceAll(MEETING_BUTTON_PLACEHOLDER, line);
  return `${text.trimEnd()}\n\n${line}`;
}

export function isOutreachStage(stage: ContentStage): stage is OutreachStage {
  return OUTREACH_STAGES.some((candidate) => candidate === stage);
}

export function isAckStage(stage: ContentStage): stage is AckStage {
  return ACK_STAGES.some((candidate) => candidate === stage);
}
