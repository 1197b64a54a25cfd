import { and, asc, desc, eq, isNotNull, isNull, lte, notInArray, or, sql } from "drizzle-orm";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";

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
  type MailSentStatus,
  type NewContentRecord,
  type ReferralLead,
} from "@/lib/contact-ledger/types";
import type { CampaignDatabase } from "@/lib/db/client";
import { contacts, contentRecords, referralLeads, type ContactRow, type ContentRecordRow } from "@/lib/db/schema";
import {
  DAY_MS,
  assertStageTimestampOrder,
  eventForStep,
  hasPassedStep,
  mailSentStatusForState,
  resolveDripState,
  timestampFieldForStep,
  transitionDripState,
  type StageTimestampField,
} from "@/lib/drip-campaign/state-machine";
import type * as schema from "@/lib/db/schema";

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const MAIL_SENT_STATUSES: readonly MailSentStatus[] = [1, 2, 3, 4, 5];

export function toMailSentStatus(value: number | null): MailSentStatus | null {
  return MAIL_SENT_STATUSES.find((status) => status === value) ?? null;
}

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    companyName: row.companyName,
    companyUrl: row.companyUrl,
    linkedin: row.linkedin,
    industry: row.industry,
    status: row.status,
    bookingStatus: row.bookingStatus,
    mailSentStatus: toMailSentStatus(row.mailSentStatus),
    firstMailDate: row.firstMailDate,
    drip1Date: row.drip1Date,
    drip2Date: row.drip2Date,
    drip3Date: row.drip3Date,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toContentRecord(row: ContentRecordRow): ContentRecord {
  return { ...row };
}

function stageAnchorColumn(stage: DripStage) {
  if (stage === 1) return contacts.firstMailDate;
  if (stage === 2) return contacts.drip1Date;
  return contacts.drip2Date;
}

function stageTimestampPatch(field: StageTimestampField, sentAt: Date) {
  switch (field) {
    case "firstMailDate":
      return { firstMailDate: sentAt };
    case "drip1Date":
      return { drip1Date: sentAt };
    case "drip2Date":
      return { drip2Date: sentAt };
    case "drip3Date":
      return { drip3Date: sentAt };
  }
}

const notTerminal = or(isNull(contacts.status), notInArray(contacts.status, [DO_NOT_CONTACT_STATUS, REPLIED_STATUS]));

export class PgLedgerSession implements LedgerSession {
  constructor(protected readonly db: Executor) {}

  async findById(contactId: number): Promise<Contact | null> {
    const rows = await this.db.select().from(contacts).where(eq(contacts.id, contactId)).limit(1);
    const row = rows[0];
    return row ? toContact(row) : null;
  }

  async findByEmail(email: string): Promise<Contact | null> {
    const rows = await this.db
      .select()
      .from(contacts)
      .where(eq(contacts.email, normalizeContactEmail(email)))
      .limit(1);
    const row = rows[0];
    return row ? toContact(row) : null;
  }

  async lockContact(contactId: number): Promise<Contact | null> {
    const rows = await this.db.select().from(contacts).where(eq(contacts.id, contactId)).limit(1).for("update");
    const row = rows[0];
    return row ? toContact(row) : null;
  }

  async create(profile: ContactProfile): Promise<Contact> {
    const email = normalizeContactEmail(profile.email);
    const rows = await this.db
      .insert(contacts)
      .values({
        name: profile.name.trim(),
        email,
        companyName: profile.companyName,
        companyUrl: profile.companyUrl,
        linkedin: profile.linkedin,
        industry: profile.industry,
      })
      .onConflictDoNothing({ target: contacts.email })
      .returning();
    const row = rows[0];
    if (!row) throw new DuplicateContactError(email);
    return toContact(row);
  }

  async setIndustry(contactId: number, industry: string): Promise<void> {
    await this.db.update(contacts).set({ industry, updatedAt: new Date() }).where(eq(contacts.id, contactId));
  }

  async listAwaitingInitial(): Promise<Contact[]> {
    const rows = await this.db
      .select()
      .from(contacts)
      .where(and(isNull(contacts.mailSentStatus), notTerminal))
      .orderBy(asc(contacts.id));
    return rows.map(toContact);
  }

  async listDue(stage: DripStage, now: Date, intervalDays: number): Promise<Contact[]> {
    const anchor = stageAnchorColumn(stage);
    const cutoff = new Date(now.getTime() - intervalDays * DAY_MS);
    const rows = await this.db
      .select()
      .from(contacts)
      .where(and(eq(contacts.mailSentStatus, stage), isNotNull(anchor), lte(anchor, cutoff), notTerminal))
      .orderBy(asc(anchor), asc(contacts.id));
    return rows.map(toContact);
  }

  async advanceStage(contactId: number, step: CampaignStep, sentAt: Date): Promise<boolean> {
    const contact = await this.lockContact(contactId);
    if (!contact || hasPassedStep(contact, step)) return false;

    const next = transitionDripState(resolveDripState(contact), eventForStep(step));
    assertStageTimestampOrder(contact, step, sentAt);
    const expected = contact.mailSentStatus;
    const rows = await this.db
      .update(contacts)
      .set({
        ...stageTimestampPatch(timestampFieldForStep(step), sentAt),
        mailSentStatus: mailSentStatusForState(next, expected),
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(contacts.id, contactId),
          expected === null ? isNull(contacts.mailSentStatus) : eq(contacts.mailSentStatus, expected)
        )
      )
      .returning({ id: contacts.id });
    return rows.length > 0;
  }

  async markStatus(contactId: number, status: string): Promise<void> {
    await this.db.update(contacts).set({ status, updatedAt: new Date() }).where(eq(contacts.id, contactId));
  }

  async markReplied(contactId: number): Promise<void> {
    await this.db
      .update(contacts)
      .set({ status: REPLIED_STATUS, mailSentStatus: 5, updatedAt: new Date() })
      .where(eq(contacts.id, contactId));
  }

  async recordBookingClick(contactId: number): Promise<boolean> {
    const rows = await this.db
      .update(contacts)
      .set({ bookingStatus: BOOKING_CLICKED_STATUS, updatedAt: new Date() })
      .where(eq(contacts.id, contactId))
      .returning({ id: contacts.id });
    return rows.length > 0;
  }

  async deleteContact(contactId: number): Promise<boolean> {
    const rows = await this.db.delete(contacts).where(eq(contacts.id, contactId)).returning({ id: contacts.id });
    return rows.length > 0;
  }

  async recordContent(contactId: number, record: NewContentRecord): Promise<ContentRecord | null> {
    if (record.messageId && (await this.hasMessageId(record.messageId))) return null;

    const contact = await this.findById(contactId);
    if (!contact) throw new Error(`Contact ${contactId} not found`);

    const rows = await this.db
      .insert(contentRecords)
      .values({
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
      })
      .onConflictDoNothing({ target: contentRecords.messageId })
      .returning();
    const row = rows[0];
    return row ? toContentRecord(row) : null;
  }

  async hasMessageId(messageId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: contentRecords.id })
      .from(contentRecords)
      .where(eq(contentRecords.messageId, messageId))
      .limit(1);
    return rows.length > 0;
  }

  async listProcessedMessageIds(): Promise<string[]> {
    const rows = await this.db
      .select({ messageId: contentRecords.messageId })
      .from(contentRecords)
      .where(isNotNull(contentRecords.messageId));
    return rows.flatMap((row) => (row.messageId ? [row.messageId] : []));
  }

  async listContactedEmails(): Promise<string[]> {
    const rows = await this.db.select({ email: contacts.email }).from(contacts).where(isNotNull(contacts.mailSentStatus));
    return rows.map((row) => row.email);
  }

  async findThreadId(contactId: number): Promise<string | null> {
    const rows = await this.db
      .select({ threadId: contentRecords.threadId })
      .from(contentRecords)
      .where(
        and(
          eq(contentRecords.contactId, contactId),
          eq(contentRecords.emailType, "thread_created"),
          isNotNull(contentRecords.threadId)
        )
      )
      .orderBy(desc(contentRecords.id))
      .limit(1);
    return rows[0]?.threadId ?? null;
  }

  async listContent(contactId: number): Promise<ContentRecord[]> {
    const rows = await this.db
      .select()
      .from(contentRecords)
      .where(eq(contentRecords.contactId, contactId))
      .orderBy(asc(contentRecords.id));
    return rows.map(toContentRecord);
  }

  async recordReferrals(leads: ReferralLead[]): Promise<number> {
    if (leads.length === 0) return 0;
    const rows = await this.db
      .insert(referralLeads)
      .values(
        leads.map((lead) => ({
          cc: normalizeContactEmail(lead.cc),
          companyName: lead.companyName,
          referredBy: normalizeContactEmail(lead.referredBy),
        }))
      )
      .onConflictDoNothing()
      .returning({ id: referralLeads.id });
    return rows.length;
  }

  async getStats(): Promise<CampaignStats> {
    const rows = await this.db
      .select({
        totalContacts: sql`count(*)`.mapWith(Number),
        awaitingInitial: sql`count(*) filter (where ${contacts.mailSentStatus} is null)`.mapWith(Number),
        initialSent: sql`count(*) filter (where ${contacts.mailSentStatus} = 1)`.mapWith(Number),
        drip1Sent: sql`count(*) filter (where ${contacts.mailSentStatus} = 2)`.mapWith(Number),
        drip2Sent: sql`count(*) filter (where ${contacts.mailSentStatus} = 3)`.mapWith(Number),
        drip3Sent: sql`count(*) filter (where ${contacts.mailSentStatus} = 4)`.mapWith(Number),
        replied: sql`count(*) filter (where ${contacts.mailSentStatus} = 5)`.mapWith(Number),
        doNotContact: sql`count(*) filter (where ${contacts.status} = ${DO_NOT_CONTACT_STATUS})`.mapWith(Number),
        bookingClicked: sql`count(*) filter (where ${contacts.bookingStatus} = ${BOOKING_CLICKED_STATUS})`.mapWith(Number),
      })
      .from(contacts);
    return (
      rows[0] ?? {
        totalContacts: 0,
        awaitingInitial: 0,
        initialSent: 0,
        drip1Sent: 0,
        drip2Sent: 0,
        drip3Sent: 0,
        replied: 0,
        doNotContact: 0,
        bookingClicked: 0,
      }
    );
  }
}

export class PgContactLedger extends PgLedgerSession implements ContactLedger {
  constructor(private readonly root: CampaignDatabase) {
    super(root);
  }

  async transaction<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T> {
    return this.root.transaction(async (tx) => fn(new PgLedgerSession(tx)));
  }
}
