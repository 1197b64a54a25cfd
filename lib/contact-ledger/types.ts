export const DO_NOT_CONTACT_STATUS = "do_not_contact";
export const REPLIED_STATUS = "replied";
export const BOOKING_CLICKED_STATUS = "clicked";

export const DRIP_STAGES = [1, 2, 3] as const;
export type DripStage = (typeof DRIP_STAGES)[number];

/** Stage waits in days, keyed by drip stage. */
export type DripIntervalDays = Record<DripStage, number>;

/**
 * unset: nothing sent. 1: initial sent. 2-4: drip 1-3 sent. 5: contact replied.
 */
export type MailSentStatus = 1 | 2 | 3 | 4 | 5;

/** Outbound sends that move a contact forward. */
export type CampaignStep = "initial" | DripStage;

export const CONTENT_EMAIL_TYPES = [
  "initial",
  "drip_1",
  "drip_2",
  "drip_3",
  "reply",
  "reply_response",
  "thread_created",
  "stop_contact_ack",
] as const;
export type ContentEmailType = (typeof CONTENT_EMAIL_TYPES)[number];

export const REPLY_SENTIMENTS = ["POSITIVE", "NEUTRAL", "NEGATIVE"] as const;
export type ReplySentiment = (typeof REPLY_SENTIMENTS)[number];

export type ContactProfile = {
  name: string;
  email: string;
  companyName: string | null;
  companyUrl: string | null;
  linkedin: string | null;
  industry: string | null;
};

export type Contact = ContactProfile & {
  id: number;
  status: string | null;
  bookingStatus: string | null;
  mailSentStatus: MailSentStatus | null;
  firstMailDate: Date | null;
  drip1Date: Date | null;
  drip2Date: Date | null;
  drip3Date: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ContentRecord = {
  id: number;
  contactId: number;
  clientEmail: string;
  emailType: ContentEmailType;
  subject: string | null;
  body: string | null;
  messageId: string | null;
  threadId: string | null;
  inReplyTo: string | null;
  reference: string | null;
  sentiment: ReplySentiment | null;
  createdAt: Date;
};

export type NewContentRecord = {
  emailType: ContentEmailType;
  subject?: string | null;
  body?: string | null;
  messageId?: string | null;
  threadId?: string | null;
  inReplyTo?: string | null;
  reference?: string | null;
  sentiment?: ReplySentiment | null;
};

export type ReferralLead = {
  cc: string;
  companyName: string | null;
  referredBy: string;
};

export type CampaignStats = {
  totalContacts: number;
  awaitingInitial: number;
  initialSent: number;
  drip1Sent: number;
  drip2Sent: number;
  drip3Sent: number;
  replied: number;
  doNotContact: number;
  bookingClicked: number;
};

/**
 * Ledger operations bound to one unit of work. Every helper in a
 * per-contact iteration receives the same session.
 */
export interface LedgerSession {
  findById(contactId: number): Promise<Contact | null>;
  findByEmail(email: string): Promise<Contact | null>;
  /** Re-reads the contact under a row lock for the rest of the transaction. */
  lockContact(contactId: number): Promise<Contact | null>;
  /** Throws DuplicateContactError when the email is already present. */
  create(profile: ContactProfile): Promise<Contact>;
  setIndustry(contactId: number, industry: string): Promise<void>;

  listAwaitingInitial(): Promise<Contact[]>;
  listDue(stage: DripStage, now: Date, intervalDays: number): Promise<Contact[]>;
  /**
   * Sets the step's timestamp and moves mail_sent_status forward. Returns
   * false when the contact is already past the step or is terminal.
   */
  advanceStage(contactId: number, step: CampaignStep, sentAt: Date): Promise<boolean>;
  markStatus(contactId: number, status: string): Promise<void>;
  markReplied(contactId: number): Promise<void>;
  recordBookingClick(contactId: number): Promise<boolean>;
  deleteContact(contactId: number): Promise<boolean>;

  /** Returns null without inserting when messageId is already recorded. */
  recordContent(contactId: number, record: NewContentRecord): Promise<ContentRecord | null>;
  hasMessageId(messageId: string): Promise<boolean>;
  listProcessedMessageIds(): Promise<string[]>;
  listContactedEmails(): Promise<string[]>;
  findThreadId(contactId: number): Promise<string | null>;
  listContent(contactId: number): Promise<ContentRecord[]>;

  recordReferrals(leads: ReferralLead[]): Promise<number>;
  getStats(): Promise<CampaignStats>;
}

export interface ContactLedger extends LedgerSession {
  /** Commits when fn resolves, rolls back when it throws. */
  transaction<T>(fn: (session: LedgerSession) => Promise<T>): Promise<T>;
}
