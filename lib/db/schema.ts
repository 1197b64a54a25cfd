import { index, integer, pgTable, serial, text, timestamp, uniqueIndex } from "drizzle-orm/pg-core";

import { CONTENT_EMAIL_TYPES, REPLY_SENTIMENTS } from "@/lib/contact-ledger/types";

export const contacts = pgTable(
  "contacts",
  {
    id: serial("id").primaryKey(),
    name: text("name").notNull(),
    // Stored lowercased.
    email: text("email").notNull(),
    companyName: text("company_name"),
    companyUrl: text("company_url"),
    linkedin: text("linkedin"),
    industry: text("industry"),
    status: text("status"),
    bookingStatus: text("booking_status"),
    mailSentStatus: integer("mail_sent_status"),
    firstMailDate: timestamp("first_mail_date", { withTimezone: true }),
    drip1Date: timestamp("drip1_date", { withTimezone: true }),
    drip2Date: timestamp("drip2_date", { withTimezone: true }),
    drip3Date: timestamp("drip3_date", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    emailKey: uniqueIndex("contacts_email_key").on(table.email),
    mailSentStatusIdx: index("contacts_mail_sent_status_idx").on(table.mailSentStatus),
  })
);

export const contentRecords = pgTable(
  "content_records",
  {
    id: serial("id").primaryKey(),
    contactId: integer("contact_id")
      .notNull()
      .references(() => contacts.id, { onDelete: "cascade" }),
    clientEmail: text("client_email").notNull(),
    emailType: text("email_type", { enum: CONTENT_EMAIL_TYPES }).notNull(),
    subject: text("subject"),
    body: text("body"),
    messageId: text("message_id"),
    threadId: text("thread_id"),
    inReplyTo: text("in_reply_to"),
    reference: text("reference"),
    sentiment: text("sentiment", { enum: REPLY_SENTIMENTS }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    messageIdKey: uniqueIndex("content_records_message_id_key").on(table.messageId),
    contactIdx: index("content_records_contact_id_idx").on(table.contactId),
  })
);

export const referralLeads = pgTable(
  "referral_leads",
  {
    id: serial("id").primaryKey(),
    cc: text("cc").notNull(),
    companyName: text("company_name"),
    referredBy: text("referred_by").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    ccReferrerKey: uniqueIndex("referral_leads_cc_referred_by_key").on(table.cc, table.referredBy),
  })
);

export type ContactRow = typeof contacts.$inferSelect;
export type ContentRecordRow = typeof contentRecords.$inferSelect;
