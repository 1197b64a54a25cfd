import type { ThreadingHeaders } from "@/lib/email-threading";

export type OutboundEmail = {
  to: string;
  subject: string;
  text: string;
  threading?: ThreadingHeaders | null;
};

export type SendEmailResult = { success: true; messageId: string } | { success: false; error: string };

export type InboundEmail = {
  /** Lowercased sender address. */
  from: string;
  fromName: string | null;
  messageId: string | null;
  subject: string;
  text: string;
  html: string | null;
  date: Date | null;
  inReplyTo: string | null;
  references: string[];
  cc: string[];
};

export interface MailSender {
  /** Retries transport failures internally; the result is final for this run. */
  send(email: OutboundEmail): Promise<SendEmailResult>;
}

export interface InboxScanner {
  scanInboxSince(since: Date): Promise<InboundEmail[]>;
}

export interface Mailer extends MailSender, InboxScanner {}

export function createMailer(sender: MailSender, inbox: InboxScanner): Mailer {
  return {
    send: (email) => sender.send(email),
    scanInboxSince: (since) => inbox.scanInboxSince(since),
  };
}
