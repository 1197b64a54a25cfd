import { getErrorMessage } from "@/lib/campaign-errors";
import type { ContentGenerator } from "@/lib/content-generator";
import { normalizeContactEmail } from "@/lib/contact-ledger/normalize";
import {
  DO_NOT_CONTACT_STATUS,
  type ContactLedger,
  type LedgerSession,
  type ReplySentiment,
} from "@/lib/contact-ledger/types";
import type { ConversationThreadStore } from "@/lib/conversation-threads";
import { sendReplyResponse, type ReplyStrategy } from "@/lib/drip-campaign/reply-responses";
import { resolveDripState, transitionDripState } from "@/lib/drip-campaign/state-machine";
import { cleanInboundBody } from "@/lib/email-cleaning";
import { collectReferralAddresses } from "@/lib/email-participants";
import { resolveInboundMessageKey } from "@/lib/inbound-dedupe";
import type { InboundEmail, Mailer } from "@/lib/mail/types";
import type { ReplyClassifier } from "@/lib/reply-classifier";

export type ReplyIngestionDeps = {
  ledger: ContactLedger;
  mailer: Mailer;
  classifier: ReplyClassifier;
  generator: ContentGenerator;
  threads: ConversationThreadStore;
  /** Our own mailbox; never recorded as a referral. */
  mailboxAddress: string | null;
  lookbackHours: number;
  now?: () => Date;
};

export type ReplyMessageOutcome = {
  contactId: number | null;
  email: string;
  messageKey: string;
  /** responded: reply stored and answered. recorded: reply stored, nothing (or nothing successful) sent. */
  status: "responded" | "recorded" | "duplicate" | "skipped" | "failed";
  sentiment?: ReplySentiment;
  strategy?: ReplyStrategy;
  stopContact?: boolean;
  referrals?: number;
  error?: string;
};

export type ReplyIngestionResult = {
  scanned: number;
  /** Messages from unknown senders or already in the content log. */
  ignored: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  newReplies: number;
  responseFailures: number;
  errors: string[];
  outcomes: ReplyMessageOutcome[];
};

export interface ReplyIngestion {
  ingestReplies(): Promise<ReplyIngestionResult>;
  /** Number of replies newly stored by this run. */
  checkReplies(): Promise<number>;
}

const HOUR_MS = 60 * 60 * 1000;

type PendingReply = { inbound: InboundEmail; messageKey: string };

function byDate(a: PendingReply, b: PendingReply): number {
  const aTime = a.inbound.date?.getTime() ?? Number.POSITIVE_INFINITY;
  const bTime = b.inbound.date?.getTime() ?? Number.POSITIVE_INFINITY;
  if (aTime === bTime) return 0;
  return aTime < bTime ? -1 : 1;
}

/**
 * Drops mail from senders we never emailed and messages already handled,
 * then groups the rest per sender, oldest first.
 */
export function groupPendingReplies(params: {
  inbound: InboundEmail[];
  knownEmails: Set<string>;
  processedKeys: Set<string>;
}): Map<string, PendingReply[]> {
  const seen = new Set(params.processedKeys);
  const grouped = new Map<string, PendingReply[]>();

  for (const inbound of params.inbound) {
    const sender = normalizeContactEmail(inbound.from);
    if (!params.knownEmails.has(sender)) continue;

    const messageKey = resolveInboundMessageKey(inbound);
    if (seen.has(messageKey)) continue;
    seen.add(messageKey);

    const bucket = grouped.get(sender) ?? [];
    bucket.push({ inbound, messageKey });
    grouped.set(sender, bucket);
  }

  for (const bucket of grouped.values()) bucket.sort(byDate);
  return grouped;
}

export function createReplyIngestion(deps: ReplyIngestionDeps): ReplyIngestion {
  const now = deps.now ?? (() => new Date());

  async function handleReply(
    session: LedgerSession,
    senderEmail: string,
    pending: PendingReply,
    knownEmails: Set<string>
  ): Promise<ReplyMessageOutcome> {
    const { inbound, messageKey } = pending;
    const base = { email: senderEmail, messageKey };

    const found = await session.findByEmail(senderEmail);
    const contact = found ? await session.lockContact(found.id) : null;
    if (!contact) return { ...base, contactId: null, status: "skipped" };

    // Another run may have stored this message since the batch was built.
    if (await session.hasMessageId(messageKey)) return { ...base, contactId: contact.id, status: "duplicate" };

    const replyText = cleanInboundBody({ text: inbound.text, html: inbound.html });

    const referralAddresses = collectReferralAddresses({
      cc: inbound.cc,
      exclude: [contact.email, deps.mailboxAddress, ...knownEmails],
    });
    const referrals = referralAddresses.length
      ? await session.recordReferrals(
          referralAddresses.map((cc) => ({ cc, companyName: contact.companyName, referredBy: contact.email }))
        )
      : 0;

    const verdict = await deps.classifier.classify(replyText, inbound.subject);

    const stored = await session.recordContent(contact.id, {
      emailType: "reply",
      subject: inbound.subject,
      body: replyText,
      messageId: messageKey,
      inReplyTo: inbound.inReplyTo,
      reference: inbound.references.length ? inbound.references.join(" ") : null,
      sentiment: verdict.sentiment,
    });
    if (!stored) return { ...base, contactId: contact.id, status: "duplicate" };

    const outcome: ReplyMessageOutcome = {
      ...base,
      contactId: contact.id,
      status: "recorded",
      sentiment: verdict.sentiment,
      stopContact: verdict.stopContact,
      referrals,
    };

    const state = resolveDripState(contact);
    if (state === "SUPPRESSED") {
      console.log(`[ReplyIngestion] Recorded reply from suppressed contact ${contact.id}; no response sent`);
      return outcome;
    }

    const next = transitionDripState(state, verdict.stopContact ? { type: "stop_requested" } : { type: "reply_received" });
    await session.markReplied(contact.id);
    if (next === "SUPPRESSED") {
      await session.markStatus(contact.id, DO_NOT_CONTACT_STATUS);
      console.log(`[ReplyIngestion] Contact ${contact.id} (${contact.email}) asked to stop; marked do_not_contact`);
    }

    const threadId = await deps.threads.getOrCreateThread(session, contact);
    const response = await sendReplyResponse(
      { generator: deps.generator, mailer: deps.mailer },
      session,
      { contact, inbound, inboundMessageKey: messageKey, replyText, verdict, threadId }
    );

    if (response.status === "send_failed") {
      return { ...outcome, strategy: response.strategy, error: response.error };
    }
    return { ...outcome, status: "responded", strategy: response.strategy };
  }

  async function ingestReplies(): Promise<ReplyIngestionResult> {
    const knownEmails = new Set((await deps.ledger.listContactedEmails()).map(normalizeContactEmail));
    const processedKeys = new Set(await deps.ledger.listProcessedMessageIds());

    const since = new Date(now().getTime() - deps.lookbackHours * HOUR_MS);
    const inbound = await deps.mailer.scanInboxSince(since);
    const grouped = groupPendingReplies({ inbound, knownEmails, processedKeys });

    const outcomes: ReplyMessageOutcome[] = [];
    for (const [senderEmail, pendingReplies] of grouped) {
      for (const pending of pendingReplies) {
        try {
          outcomes.push(
            await deps.ledger.transaction((session) => handleReply(session, senderEmail, pending, knownEmails))
          );
        } catch (error) {
          console.error(`[ReplyIngestion] Failed to process reply ${pending.messageKey} from ${senderEmail}:`, error);
          outcomes.push({
            contactId: null,
            email: senderEmail,
            messageKey: pending.messageKey,
            status: "failed",
            error: getErrorMessage(error),
          });
          // Later messages from this sender wait for the next run so they stay in order.
          break;
        }
      }
    }

    const queued = Array.from(grouped.values()).reduce((sum, bucket) => sum + bucket.length, 0);
    const result: ReplyIngestionResult = {
      scanned: inbound.length,
      ignored: inbound.length - queued,
      processed: outcomes.length,
      succeeded: outcomes.filter((o) => o.status === "responded" || o.status === "recorded").length,
      failed: outcomes.filter((o) => o.status === "failed").length,
      skipped: outcomes.filter((o) => o.status === "duplicate" || o.status === "skipped").length,
      newReplies: outcomes.filter((o) => o.status === "responded" || o.status === "recorded").length,
      responseFailures: outcomes.filter((o) => o.status === "recorded" && o.error).length,
      errors: outcomes.flatMap((o) => (o.error ? [`${o.email} ${o.messageKey}: ${o.error}`] : [])),
      outcomes,
    };

    console.log(
      `[ReplyIngestion] Scanned ${result.scanned}, stored ${result.newReplies} new repl${result.newReplies === 1 ? "y" : "ies"}, ${result.failed} failed`
    );
    return result;
  }

  return {
    ingestReplies,
    async checkReplies() {
      return (await ingestReplies()).newReplies;
    },
  };
}
