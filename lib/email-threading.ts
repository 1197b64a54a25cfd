export type ThreadingHeaders = {
  inReplyTo: string;
  references: string;
};

export type QuotedMessage = {
  body: string;
  from: string;
  date: Date | null;
};

/** Wraps a bare id in angle brackets so it can go in a header. */
export function normalizeMessageId(id: string): string {
  const trimmed = id.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("<") && trimmed.endsWith(">")) return trimmed;
  return `<${trimmed.replace(/^<|>$/g, "")}>`;
}

export function parseReferencesHeader(value: string | string[] | null | undefined): string[] {
  if (!value) return [];
  const joined = Array.isArray(value) ? value.join(" ") : value;
  const bracketed = joined.match(/<[^<>\s]+>/g);
  if (bracketed) return bracketed;
  return joined
    .split(/\s+/)
    .map((part) => part.trim())
    .filter(Boolean)
    .map(normalizeMessageId);
}

/**
 * In-Reply-To is the inbound Message-ID; References is the inbound chain
 * with the inbound Message-ID appended, without repeats.
 */
export function buildThreadingHeaders(inbound: {
  messageId: string | null;
  references: string[];
}): ThreadingHeaders | null {
  if (!inbound.messageId) return null;
  const messageId = normalizeMessageId(inbound.messageId);

  const chain: string[] = [];
  for (const ref of [...inbound.references.map(normalizeMessageId), messageId]) {
    if (ref && !chain.includes(ref)) chain.push(ref);
  }

  return { inReplyTo: messageId, references: chain.join(" ") };
}

export function toReplySubject(subject: string | null | undefined): string {
  const trimmed = (subject || "").trim();
  if (!trimmed) return "Re: your message";
  return /^re:/i.test(trimmed) ? trimmed : `Re: ${trimmed}`;
}

export function quoteOriginalMessage(original: QuotedMessage): string {
  const header = original.date ? `On ${original.date.toUTCString()}, ${original.from} wrote:` : `${original.from} wrote:`;
  const quoted = original.body
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => `> ${line}`)
    .join("\n");
  return `${header}\n${quoted}`;
}

/** New content first, then the quoted original beneath it. */
export function composeReplyBody(content: string, original: QuotedMessage): string {
  return `${content.trimEnd()}\n\n${quoteOriginalMessage(original)}`;
}
