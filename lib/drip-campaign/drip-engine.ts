import { ContentGenerationError, getErrorMessage } from "@/lib/campaign-errors";
import type { ContentGenerator, GeneratedContent } from "@/lib/content-generator";
import {
  DRIP_STAGES,
  type CampaignStep,
  type Contact,
  type ContactLedger,
  type DripIntervalDays,
  type DripStage,
  type LedgerSession,
  type MailSentStatus,
} from "@/lib/contact-ledger/types";
import type { ConversationThreadStore } from "@/lib/conversation-threads";
import type { OutreachStage } from "@/lib/drip-campaign/content-templates";
import {
  computeDueStage,
  contentTypeForStep,
  nextCampaignStep,
  resolveDripState,
  stageDueAt,
  timestampFieldForStep,
  type DripState,
} from "@/lib/drip-campaign/state-machine";
import type { MailSender } from "@/lib/mail/types";

export type DripEngineDeps = {
  ledger: ContactLedger;
  generator: ContentGenerator;
  mailer: MailSender;
  threads: ConversationThreadStore;
  intervals: DripIntervalDays;
  now?: () => Date;
};

export type DripOutcomeReason =
  | "missing_company_profile"
  | "industry_unresolved"
  | "no_longer_due"
  | "generation_failed"
  | "send_failed"
  | "unexpected_error";

export type DripContactOutcome = {
  contactId: number;
  email: string;
  step: CampaignStep;
  status: "sent" | "skipped" | "failed";
  reason?: DripOutcomeReason;
  messageId?: string;
  error?: string;
};

export type DripRunResult = {
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  errors: string[];
  outcomes: DripContactOutcome[];
};

export type DripStageSnapshot = {
  step: CampaignStep;
  sentAt: Date | null;
  dueAt: Date | null;
};

export type DripStatusSnapshot = {
  contactId: number;
  email: string;
  state: DripState;
  mailSentStatus: MailSentStatus | null;
  stages: DripStageSnapshot[];
  nextStep: CampaignStep | null;
  nextDueAt: Date | null;
  isDueNow: boolean;
};

export interface DripEngine {
  /** Sends the first email to every new contact, or only to `contactIds` when given. */
  processInitialEmails(contactIds?: number[]): Promise<DripRunResult>;
  processDrips(): Promise<DripRunResult>;
  getDripStatus(contactId: number): Promise<DripStatusSnapshot | null>;
}

function outreachStageForStep(step: CampaignStep): OutreachStage {
  if (step === "initial") return "initial";
  return step === 1 ? "drip_1" : step === 2 ? "drip_2" : "drip_3";
}

function describeStep(step: CampaignStep): string {
  return step === "initial" ? "initial email" : `drip ${step}`;
}

function summarize(outcomes: DripContactOutcome[]): DripRunResult {
  const errors = outcomes.flatMap((outcome) =>
    outcome.error ? [`${outcome.email} (${describeStep(outcome.step)}): ${outcome.error}`] : []
  );
  return {
    processed: outcomes.length,
    succeeded: outcomes.filter((o) => o.status === "sent").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    skipped: outcomes.filter((o) => o.status === "skipped").length,
    errors,
    outcomes,
  };
}

export function createDripEngine(deps: DripEngineDeps): DripEngine {
  const now = deps.now ?? (() => new Date());

  function isStillDue(contact: Contact, step: CampaignStep, runStartedAt: Date): boolean {
    if (step === "initial") return nextCampaignStep(resolveDripState(contact)) === "initial";
    return computeDueStage(contact, runStartedAt, deps.intervals) === step;
  }

  /** Industry must be known before the first email; resolves it through the model when missing. */
  async function ensureIndustry(
    session: LedgerSession,
    contact: Contact
  ): Promise<{ contact: Contact } | { reason: "missing_company_profile" | "industry_unresolved" }> {
    if (contact.industry?.trim()) return { contact };
    if (!contact.companyName?.trim() || !contact.companyUrl?.trim()) return { reason: "missing_company_profile" };

    const industry = await deps.generator.resolveIndustry(contact);
    if (!industry) return { reason: "industry_unresolved" };

    await session.setIndustry(contact.id, industry);
    return { contact: { ...contact, industry } };
  }

  async function sendStep(session: LedgerSession, candidate: Contact, step: CampaignStep, runStartedAt: Date): Promise<DripContactOutcome> {
    const base = { contactId: candidate.id, email: candidate.email, step };

    // Re-read under lock: a reply may have landed since the due list was built.
    const locked = await session.lockContact(candidate.id);
    if (!locked || !isStillDue(locked, step, runStartedAt)) {
      return { ...base, status: "skipped", reason: "no_longer_due" };
    }

    let contact = locked;
    if (step === "initial") {
      const resolved = await ensureIndustry(session, locked);
      if ("reason" in resolved) {
        console.warn(`[DripEngine] Skipping contact ${locked.id} (${locked.email}): ${resolved.reason}`);
        return { ...base, status: "skipped", reason: resolved.reason };
      }
      contact = resolved.contact;
    }

    const threadId = await deps.threads.getOrCreateThread(session, contact);

    let content: GeneratedContent;
    try {
      content = await deps.generator.generate(contact, outreachStageForStep(step), { threadId });
    } catch (error) {
      if (!(error instanceof ContentGenerationError)) throw error;
      console.error(`[DripEngine] Generation failed for contact ${contact.id} (${contact.email}):`, error);
      return { ...base, status: "failed", reason: "generation_failed", error: error.message };
    }

    const sent = await deps.mailer.send({ to: contact.email, subject: content.subject, text: content.body });
    if (!sent.success) {
      return { ...base, status: "failed", reason: "send_failed", error: sent.error };
    }

    const sentAt = now();
    const advanced = await session.advanceStage(contact.id, step, sentAt);
    if (!advanced) {
      console.warn(`[DripEngine] Contact ${contact.id} was already past ${describeStep(step)} after send`);
    }
    await session.recordContent(contact.id, {
      emailType: contentTypeForStep(step),
      subject: content.subject,
      body: content.body,
      messageId: sent.messageId,
      threadId,
    });

    console.log(`[DripEngine] Sent ${describeStep(step)} to contact ${contact.id} (${contact.email})`);
    return { ...base, status: "sent", messageId: sent.messageId };
  }

  async function processContact(contact: Contact, step: CampaignStep, runStartedAt: Date): Promise<DripContactOutcome> {
    try {
      return await deps.ledger.transaction((session) => sendStep(session, contact, step, runStartedAt));
    } catch (error) {
      console.error(`[DripEngine] Failed ${describeStep(step)} for contact ${contact.id} (${contact.email}):`, error);
      return {
        contactId: contact.id,
        email: contact.email,
        step,
        status: "failed",
        reason: "unexpected_error",
        error: getErrorMessage(error),
      };
    }
  }

  // Selected contacts go through the same locked re-check, so ones already past the initial email are skipped.
  async function loadSelected(contactIds: number[]): Promise<Contact[]> {
    const contacts: Contact[] = [];
    for (const id of new Set(contactIds)) {
      const contact = await deps.ledger.findById(id);
      if (contact) {
        contacts.push(contact);
      } else {
        console.warn(`[DripEngine] Selected contact ${id} not found`);
      }
    }
    return contacts;
  }

  return {
    async processInitialEmails(contactIds) {
      const runStartedAt = now();
      const contacts = contactIds ? await loadSelected(contactIds) : await deps.ledger.listAwaitingInitial();
      console.log(`[DripEngine] ${contacts.length} contact(s) awaiting the initial email`);

      const outcomes: DripContactOutcome[] = [];
      for (const contact of contacts) {
        outcomes.push(await processContact(contact, "initial", runStartedAt));
      }

      const result = summarize(outcomes);
      console.log(
        `[DripEngine] Initial emails: ${result.succeeded} sent, ${result.skipped} skipped, ${result.failed} failed`
      );
      return result;
    },

    async processDrips() {
      const runStartedAt = now();

      // Collect every stage's due list first so a contact advanced this run is not picked up again.
      const due: { contact: Contact; stage: DripStage }[] = [];
      for (const stage of DRIP_STAGES) {
        const contacts = await deps.ledger.listDue(stage, runStartedAt, deps.intervals[stage]);
        console.log(`[DripEngine] ${contacts.length} contact(s) due for drip ${stage}`);
        for (const contact of contacts) due.push({ contact, stage });
      }

      const outcomes: DripContactOutcome[] = [];
      for (const { contact, stage } of due) {
        outcomes.push(await processContact(contact, stage, runStartedAt));
      }

      const result = summarize(outcomes);
      console.log(`[DripEngine] Drips: ${result.succeeded} sent, ${result.skipped} skipped, ${result.failed} failed`);
      return result;
    },

    async getDripStatus(contactId) {
      const contact = await deps.ledger.findById(contactId);
      if (!contact) return null;

      const state = resolveDripState(contact);
      const stages: DripStageSnapshot[] = [
        { step: "initial", sentAt: contact.firstMailDate, dueAt: null },
        ...DRIP_STAGES.map((stage) => ({
          step: stage,
          sentAt: contact[timestampFieldForStep(stage)],
          dueAt: stageDueAt(contact, stage, deps.intervals),
        })),
      ];

      const nextStep = nextCampaignStep(state);
      const nextDueAt = nextStep === null || nextStep === "initial" ? null : stageDueAt(contact, nextStep, deps.intervals);
      const isDueNow =
        nextStep === "initial" || (nextDueAt !== null && now().getTime() >= nextDueAt.getTime());

      return {
        contactId: contact.id,
        email: contact.email,
        state,
        mailSentStatus: contact.mailSentStatus,
        stages,
        nextStep,
        nextDueAt,
        isDueNow,
      };
    },
  };
}
