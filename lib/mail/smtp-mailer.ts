import { randomUUID } from "node:crypto";

import nodemailer, { type SendMailOptions } from "nodemailer";

import { getErrorMessage } from "@/lib/campaign-errors";
import { formatEmailParticipant } from "@/lib/email-participants";
import type { MailSender, OutboundEmail, SendEmailResult } from "@/lib/mail/types";
import { withRetry } from "@/lib/retry";

export type SmtpTransport = {
  sendMail(message: SendMailOptions): Promise<{ messageId?: string }>;
};

export type SmtpMailerDeps = {
  transport: SmtpTransport;
  fromAddress: string;
  fromName?: string | null;
  retry: { maxAttempts: number; baseDelayMs: number };
  sleep?: (ms: number) => Promise<void>;
};

export function createSmtpTransport(opts: {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
}): SmtpTransport {
  return nodemailer.createTransport({
    host: opts.host,
    port: opts.port,
    secure: opts.secure,
    auth: { user: opts.user, pass: opts.password },
  });
}

export function generateMessageId(fromAddress: string): string {
  const domain = fromAddress.split("@")[1]?.trim() || "localhost";
  return `<${randomUUID()}@${domain}>`;
}

export function buildMailOptions(deps: Pick<SmtpMailerDeps, "fromAddress" | "fromName">, email: OutboundEmail, messageId: string): SendMailOptions {
  return {
    from: formatEmailParticipant(deps.fromAddress, deps.fromName),
    to: email.to,
    subject: email.subject,
    text: email.text,
    messageId,
    ...(email.threading
      ? { inReplyTo: email.threading.inReplyTo, references: email.threading.references }
      : {}),
  };
}

export function createSmtpMailer(deps: SmtpMailerDeps): MailSender {
  return {
    async send(email): Promise<SendEmailResult> {
      // Fixed before the first attempt so every retry carries the same id.
      const messageId = generateMessageId(deps.fromAddress);
      const options = buildMailOptions(deps, email, messageId);

      try {
        const info = await withRetry(() => deps.transport.sendMail(options), {
          maxAttempts: deps.retry.maxAttempts,
          baseDelayMs: deps.retry.baseDelayMs,
          backoff: "linear",
          label: `[Mailer] send to ${email.to}`,
          sleep: deps.sleep,
        });
        return { success: true, messageId: info.messageId || messageId };
      } catch (error) {
        console.error(`[Mailer] Failed to send "${email.subject}" to ${email.to}:`, error);
        return { success: false, error: getErrorMessage(error) };
      }
    },
  };
}
