import { ImapFlow } from "imapflow";
import { simpleParser, type AddressObject, type ParsedMail } from "mailparser";

import { normalizeOptionalEmail } from "@/lib/email-participants";
import { parseReferencesHeader } from "@/lib/email-threading";
import type { InboundEmail, InboxScanner } from "@/lib/mail/types";
import { withRetry } from "@/lib/retry";

export type ImapInboxDeps = {
  host: string;
  port: number;
  secure: boolean;
  mailbox: string;
  user: string;
  password: string;
  retry: { maxAttempts: number; baseDelayMs: number };
};

function flattenAddresses(value: AddressObject | AddressObject[] | undefined): { address: string; name: string | null }[] {
  if (!value) return [];
  const objects = Array.isArray(value) ? value : [value];
  const out: { address: string; name: string | null }[] = [];
  for (const object of objects) {
    for (const entry of object.value) {
      const address = normalizeOptionalEmail(entry.address);
      if (address) out.push({ address, name: entry.name?.trim() || null });
    }
  }
  return out;
}

/** Maps a parsed MIME message to the pipeline's shape; null when there is no sender. */
export function toInboundEmail(parsed: ParsedMail): InboundEmail | null {
  const sender = flattenAddresses(parsed.from)[0];
  if (!sender) return null;

  return {
    from: sender.address,
    fromName: sender.name,
    messageId: parsed.messageId?.trim() || null,
    subject: parsed.subject?.trim() || "",
    text: parsed.text ?? "",
    html: typeof parsed.html === "string" ? parsed.html : null,
    date: parsed.date ?? null,
    inReplyTo: parsed.inReplyTo?.trim() || null,
    references: parseReferencesHeader(parsed.references),
    cc: flattenAddresses(parsed.cc).map((entry) => entry.address),
  };
}

export async function parseRawEmail(source: Buffer | string): Promise<InboundEmail | null> {
  return toInboundEmail(await simpleParser(source));
}

/** The slice of an ImapFlow client that mailbox sessions need. */
export type MailboxClient = {
  getMailboxLock(path: string): Promise<{ release(): void }>;
  logout(): Promise<void>;
  close(): void;
};

/** Logs out, or drops the socket when the server will not take a LOGOUT. */
export async function closeImapClient(client: Pick<MailboxClient, "logout" | "close">): Promise<void> {
  try {
    await client.logout();
  } catch (error) {
    console.warn("[Mailer] IMAP logout failed, closing connection:", error);
    client.close();
  }
}

/** Runs fn with the mailbox locked. The client is logged out on every path, including a failed lock. */
export async function withMailboxLock<T>(client: MailboxClient, mailbox: string, fn: () => Promise<T>): Promise<T> {
  let lock: { release(): void } | null = null;
  try {
    lock = await client.getMailboxLock(mailbox);
    return await fn();
  } finally {
    lock?.release();
    await closeImapClient(client);
  }
}

async function fetchSince(deps: ImapInboxDeps, since: Date): Promise<InboundEmail[]> {
  const client = new ImapFlow({
    host: deps.host,
    port: deps.port,
    secure: deps.secure,
    auth: { user: deps.user, pass: deps.password },
    logger: false,
  });

  await client.connect();
  return withMailboxLock(client, deps.mailbox, async () => {
    const emails: InboundEmail[] = [];
    const uids = await client.search({ since }, { uid: true });
    if (!Array.isArray(uids) || uids.length === 0) return emails;

    for await (const message of client.fetch(uids, { source: true }, { uid: true })) {
      if (!message.source) continue;
      const email = await parseRawEmail(message.source);
      // IMAP SINCE is day-granular; keep the exact boundary here.
      if (email && (!email.date || email.date.getTime() >= since.getTime())) emails.push(email);
    }
    return emails;
  });
}

export function createImapInbox(deps: ImapInboxDeps): InboxScanner {
  return {
    async scanInboxSince(since) {
      const emails = await withRetry(() => fetchSince(deps, since), {
        maxAttempts: deps.retry.maxAttempts,
        baseDelayMs: deps.retry.baseDelayMs,
        backoff: "linear",
        label: "[Mailer] inbox scan",
      });
      console.log(`[Mailer] Found ${emails.length} message(s) in ${deps.mailbox} since ${since.toISOString()}`);
      return emails;
    },
  };
}
