import type { ContentGenerator } from "@/lib/content-generator";
import type { Contact, LedgerSession } from "@/lib/contact-ledger/types";
import type { AckStage, ModelReplyStage } from "@/lib/drip-campaign/content-templates";
import { buildThreadingHeaders, composeReplyBody } from "@/lib/email-threading";
import type { InboundEmail, MailSender } from "@/lib/mail/types";
import type { ReplyVerdict } from "@/lib/reply-classifier";

export type ReplyStrategy = ModelReplyStage | AckStage;

export type ReplyResponseOutcome =
  | { status: "sent"; strategy: ReplyStrategy; messageId: string }
  | { status: "send_failed"; strategy: ReplyStrategy; error: string };

/**
 * Stop requests win over everything else; otherwise sentiment and whether
 * the reply asked something decide the response.
 */
export function selectReplyStrategy(verdict: Pick<ReplyVerdict, "sentiment" | "hasQuery" | "stopContact">): ReplyStrategy {
  if (verdict.stopContact) return "stop_ack";
  switch (verdict.sentiment) {
    case "POSITIVE":
      return verdict.hasQuery ? "query_with_booking" : "booking_invite";
    case "NEGATIVE":
      return verdict.hasQuery ? "negative_with_query" : "negative_ack";
    case "NEUTRAL":
      return verdict.hasQuery ? "neutral_with_query" : "neutral_ack";
  }
}

export type ReplyResponderDeps = {
  generator: ContentGenerator;
  mailer: MailSender;
};

export type ReplyResponseParams = {
  contact: Contact;
  inbound: InboundEmail;
  /** The Message-ID or computed dedupe key the reply was stored under. */
  inboundMessageKey: string;
  replyText: string;
  verdict: ReplyVerdict;
  threadId: string | null;
};

/**
 * Generates, threads and sends the response to one reply, then appends it to
 * the contact's content log. A send failure is returned, not thrown.
 */
export async function sendReplyResponse(
  deps: ReplyResponderDeps,
  session: LedgerSession,
  params: ReplyResponseParams
): Promise<ReplyResponseOutcome> {
  const strategy = selectReplyStrategy(params.verdict);
  const content = await deps.generator.generate(params.contact, strategy, {
    threadId: params.threadId,
    replyText: params.replyText,
    queries: params.verdict.queryText,
    inboundSubject: params.inbound.subject,
  });

  const threading = buildThreadingHeaders({
    messageId: params.inbound.messageId,
    references: params.inbound.references,
  });
  const text = composeReplyBody(content.body, {
    body: params.replyText,
    from: params.inbound.fromName ? `${params.inbound.fromName} <${params.inbound.from}>` : params.inbound.from,
    date: params.inbound.date,
  });

  const sent = await deps.mailer.send({ to: params.contact.email, subject: content.subject, text, threading });
  if (!sent.success) {
    console.error(
      `[ReplyIngestion] Failed to send ${strategy} to contact ${params.contact.id} (${params.contact.email}): ${sent.error}`
    );
    return { status: "send_failed", strategy, error: sent.error };
  }

  await session.recordContent(params.contact.id, {
    emailType: strategy === "stop_ack" ? "stop_contact_ack" : "reply_response",
    subject: content.subject,
    body: text,
    messageId: sent.messageId,
    threadId: params.threadId,
    inReplyTo: threading?.inReplyTo ?? params.inboundMessageKey,
    reference: threading?.references ?? null,
  });

  console.log(`[ReplyIngestion] Sent ${strategy} (${content.source}) to contact ${params.contact.id}`);
  return { status: "sent", strategy, messageId: sent.messageId };
}
