import { DuplicateContactError } from "@/lib/campaign-errors";
import { normalizeContactEmail } from "@/lib/contact-ledger/normalize";
import {
  BOOKING_CLICKED_STATUS,
  DO_NOT_CONTACT_STATUS,
  REPLIED_STATUS,
  type CampaignStats,
  type CampaignStep,
  type Contact,
  type ContactLedger,
  type ContactProfile,
  type ContentRecord,
  type DripStage,
  type LedgerSession,
  type NewContentRecord,
  type ReferralLead,
} from "@/lib/contact-ledger/types";
import {
  DAY_MS,
  assertStageTimestampOrder,
  anchorForStage,
  eventForStep,
  hasPassedStep,
  mailSentStatusForState,
  resolveDripState,
  timestampFieldForStep,
  transitionDripState,
} from "@/lib/drip-campaign/state-machine";

type StoredReferral = ReferralLead & { id: number; createdAt: Date };

type MemoryLedgerState = {
  contacts: Contact[];
  content: ContentRecord[];
  referrals: StoredReferral[];
  nextContactId: number;
  nextContentId: number;
  nextReferralId: number;
};

export type SeedContact = Partial<Omit<Contact, "email">> & { email: string };

function isTerminalStatus(status: string | null): boolean {
  return status === DO_NOT_CONTACT_STATUS || status === REPLIED_STATUS;
}

/**
 * In-process ledger with the same semantics as the Postgres one. Backs the
 * test suite; transactions snapshot the store and restore it on throw.
 */
export class MemoryContactLedger implements ContactLedger {
  private state: MemoryLedgerState = {
    contacts: [],
    content: [],
    referrals: [],
    nextContactId: 1,
    nextContentId: 1,
    nextReferralId: 1,
  };

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /** Inserts a contact with any lifecycle fields already set. */
  seedContact(seed: SeedContact): Contact {
    const now = this.clock();
    const contact: Contact = {
      id: seed.id ?? this.state.nextContactId,
      name: seed.name ?? "Test Contact",
      email: normalizeContactEmail(seed.email),
      companyName: seed.companyName ?? null,
      companyUrl: seed.companyUrl ?? null,
      linkedin: seed.linkedin ?? null,
      industry: seed.industry ?? null,
      status: seed.status ?? null,
      bookingStatus: seed.bookingStatus ?? null,
      mailSentStatus: seed.mailSentStatus ?? null,
      firstMailDate: seed.firstMailDate ?? null,
      drip1Date: seed.drip1Date ?? null,
      drip2Date: seed.drip2Date ?? null,
      drip3Date: seed.drip3Date ?? null,
      createdAt: seed.createdAt ?? now,
      updatedAt: seed.updatedAt ?? now,
    };
    this.state.nextContactId = Math.max(this.state.nextContactId, contact.id + 1);
    this.state.contacts.push(contact);
    return { ...contact };
  }

  listReferrals(): StoredReferral[] {
    return this.state.referrals.map((referral) => ({ ...referral }));
  }

  async transaction<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    try {
      return await fn(this);
    } catch (error) {
      this.state = snapshot;
      throw error;
    }
  }

  private find(contactId: number): Contact | undefined {
    return this.state.contacts.find((contact) => contact.id === contactId);
  }

  private update(contactId: number, patch: Partial<Contact>): Contact | null {
    const contact = this.find(contactId);
    if (!contact) return null;
    Object.assign(contact, patch, { updatedAt: this.clock() });
    return contact;
  }

  async findById(contactId: number): Promise<Contact | null> {
    const contact = this.find(contactId);
    return contact ? { ...contact } : null;
  }

  async findByEmail(email: string): Promise<Contact | null> {
    const normalized = normalizeContactEmail(email);
    const contact = this.state.contacts.find((c) => c.email === normalized);
    return contact ? { ...contact } : null;
  }

  async lockContact(contactId: number): Promise<Contact | null> {
    return this.findById(contactId);
  }

  async create(profile: ContactProfile): Promise<Contact> {
    const email = normalizeContactEmail(profile.email);
    if (this.state.contacts.some((c) => c.email === email)) throw new DuplicateContactError(email);
    return this.seedContact({ ...profile, name: profile.name.trim(), email });
  }

  async setIndustry(contactId: number, industry: string): Promise<void> {
    this.update(contactId, { industry });
  }

  async listAwaitingInitial(): Promise<Contact[]> {
    return this.state.contacts
      .filter((c) => c.mailSentStatus === null && !isTerminalStatus(c.status))
      .sort((a, b) => a.id - b.id)
      .map((c) => ({ ...c }));
  }

  async listDue(stage: DripStage, now: Date, intervalDays: number): Promise<Contact[]> {
    const cutoff = now.getTime() - intervalDays * DAY_MS;
    return this.state.contacts
      .filter((c) => {
        if (c.mailSentStatus !== stage || isTerminalStatus(c.status)) return false;
        const anchor = anchorForStage(c, stage);
        return anchor !== null && anchor.getTime() <= cutoff;
      })
      .map((c) => ({ ...c }));
  }

  async advanceStage(contactId: number, step: CampaignStep, sentAt: Date): Promise<boolean> {
    const contact = this.find(contactId);
    if (!contact || hasPassedStep(contact, step)) return false;

    const next = transitionDripState(resolveDripState(contact), eventForStep(step));
    assertStageTimestampOrder(contact, step, sentAt);
    contact[timestampFieldForStep(step)] = sentAt;
    contact.mailSentStatus = mailSentStatusForState(next, contact.mailSentStatus);
    contact.updatedAt = this.clock();
    return true;
  }

  async markStatus(contactId: number, status: string): Promise<void> {
    this.update(contactId, { status });
  }

  async markReplied(contactId: number): Promise<void> {
    this.update(contactId, { status: REPLIED_STATUS, mailSentStatus: 5 });
  }

  async recordBookingClick(contactId: number): Promise<boolean> {
    return this.update(contactId, { bookingStatus: BOOKING_CLICKED_STATUS }) !== null;
  }

  async deleteContact(contactId: number): Promise<boolean> {
    const before = this.state.contacts.length;
    this.state.contacts = this.state.contacts.filter((c) => c.id !== contactId);
    this.state.content = this.state.content.filter((record) => record.contactId !== contactId);
    return this.state.contacts.length < before;
  }

  async recordContent(contactId: number, record: NewContentRecord): Promise<ContentRecord | null> {
    if (record.messageId && (await this.hasMessageId(record.messageId))) return null;

    const contact = this.find(contactId);
    if (!contact) throw new Error(`Contact ${contactId} not found`);

    const stored: ContentRecord = {
      id: this.state.nextContentId++,
      contactId,
      clientEmail: contact.email,
      emailType: record.emailType,
      subject: record.subject ?? null,
      body: record.body ?? null,
      messageId: record.messageId ?? null,
      threadId: record.threadId ?? null,
      inReplyTo: record.inReplyTo ?? null,
      reference: record.reference ?? null,
      sentiment: record.sentiment ?? null,
      createdAt: this.clock(),
    };
    this.state.content.push(stored);
    return { ...stored };
  }

  async hasMessageId(messageId: string): Promise<boolean> {
    return this.state.content.some((record) => record.messageId === messageId);
  }

  async listProcessedMessageIds(): Promise<string[]> {
    return this.state.content.flatMap((record) => (record.messageId ? [record.messageId] : []));
  }

  async listContactedEmails(): Promise<string[]> {
    return this.state.contacts.filter((c) => c.mailSentStatus !== null).map((c) => c.email);
  }

  async findThreadId(contactId: number): Promise<string | null> {
    const records = this.state.content.filter(
      (record) => record.contactId === contactId && record.emailType === "thread_created" && record.threadId
    );
    return records[records.length - 1]?.threadId ?? null;
  }

  async listContent(contactId: number): Promise<ContentRecord[]> {
    return this.state.content.filter((record) => record.contactId === contactId).map((record) => ({ ...record }));
  }

  async recordReferrals(leads: ReferralLead[]): Promise<number> {
    let inserted = 0;
    for (const lead of leads) {
      const cc = normalizeContactEmail(lead.cc);
      const referredBy = normalizeContactEmail(lead.referredBy);
      if (this.state.referrals.some((r) => r.cc === cc && r.referredBy === referredBy)) continue;
      this.state.referrals.push({
        id: this.state.nextReferralId++,
        cc,
        companyName: lead.companyName,
        referredBy,
        createdAt: this.clock(),
      });
      inserted++;
    }
    return inserted;
  }

  async getStats(): Promise<CampaignStats> {
    const all = this.state.contacts;
    const count = (predicate: (c: Contact) => boolean) => all.filter(predicate).length;
    return {
      totalContacts: all.length,
      awaitingInitial: count((c) => c.mailSentStatus === null),
      initialSent: count((c) => c.mailSentStatus === 1),
      drip1Sent: count((c) => c.mailSentStatus === 2),
      drip2Sent: count((c) => c.mailSentStatus === 3),
      drip3Sent: count((c) => c.mailSentStatus === 4),
      replied: count((c) => c.mailSentStatus === 5),
      doNotContact: count((c) => c.status === DO_NOT_CONTACT_STATUS),
      bookingClicked: count((c) => c.bookingStatus === BOOKING_CLICKED_STATUS),
    };
  }
}
