export function stripNullBytes(text?: string | null): string | undefined {
  if (typeof text !== "string") return text ?? undefined;
  if (!text.includes("\u0000")) return text;
  return text.replace(/\u0000/g, "");
}

const WROTE_SUFFIX = /\bwrote:\s*$/i;

/**
 * Index of the first line that starts quoted history, or -1.
 * "On ... wrote:" is matched across up to three lines because Gmail wraps it.
 */
export function findThreadBoundary(lines: string[]): number {
  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? "").trim();
    if (!trimmed) continue;

    if (/^-{2,}\s*Original Message\s*-{2,}$/i.test(trimmed)) return i;
    if (/^Begin forwarded message:/i.test(trimmed)) return i;
    if (/^-{5,}\s*Forwarded message\s*-{5,}$/i.test(trimmed)) return i;
    if (/^_{10,}$/.test(trimmed)) return i;
    if (/^(From|Sent|To|Subject|Date):\s/i.test(trimmed)) return i;

    if (/^On\b/i.test(trimmed)) {
      if (WROTE_SUFFIX.test(trimmed)) return i;
      const next1 = (lines[i + 1] ?? "").trim();
      const next2 = (lines[i + 2] ?? "").trim();
      if (WROTE_SUFFIX.test(next1) || WROTE_SUFFIX.test(next2)) return i;
    }
    if (WROTE_SUFFIX.test(trimmed) && /@|\d{4}/.test(trimmed)) return i;
  }
  return -1;
}

const emailPattern = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/i;
const urlPattern = /\bhttps?:\/\/\S+|\bwww\.\S+/i;
const phonePattern = /(?:\+?\d{1,3}[-.\s]?)?(?:\(\d{2,4}\)|\d{2,4})[-.\s]?\d{3,4}[-.\s]?\d{3,4}\b/;
const signatureLabelPattern =
  /\b(tel|telephone|phone|mobile|cell|direct|linkedin|website|www)\b|(?:^|\s)(t:|m:|p:|e:)\b/i;

// Drops a trailing contact block (after the last blank line) that looks like a signature.
function trimSignatureFooter(lines: string[]): string[] {
  const out = [...lines];
  while (out.length > 0 && !(out[out.length - 1] ?? "").trim()) out.pop();

  const delimiter = out.findIndex((line) => /^\s*--\s*$/.test(line));
  if (delimiter !== -1) out.splice(delimiter);

  let lastBlank = -1;
  for (let i = out.length - 1; i >= 0; i--) {
    if (!(out[i] ?? "").trim()) {
      lastBlank = i;
      break;
    }
  }
  if (lastBlank === -1) return out;

  const bodyAbove = out.slice(0, lastBlank).some((line) => line.trim());
  const footer = out.slice(lastBlank + 1).filter((line) => line.trim());
  if (!bodyAbove || footer.length < 2) return out;

  const footerText = footer.join("\n");
  const looksLikeSignature =
    emailPattern.test(footerText) ||
    urlPattern.test(footerText) ||
    phonePattern.test(footerText) ||
    signatureLabelPattern.test(footerText);
  if (looksLikeSignature) out.splice(lastBlank);
  return out;
}

/**
 * The reply's own text: ">" quoted lines removed, cut at the first thread
 * boundary, signature footer trimmed.
 */
export function extractReplyText(text: string): string {
  const normalized = text.replace(/\r\n?/g, "\n").replace(/\u00a0/g, " ");
  const unquoted = normalized.split("\n").filter((line) => !line.trim().startsWith(">"));

  const boundary = findThreadBoundary(unquoted);
  const kept = boundary === -1 ? unquoted : unquoted.slice(0, boundary);

  return trimSignatureFooter(kept).join("\n").trim();
}

function decodeBasicHtmlEntities(input: string): string {
  return input
    .replaceAll("&nbsp;", " ")
    .replaceAll("&amp;", "&")
    .replaceAll("&lt;", "<")
    .replaceAll("&gt;", ">")
    .replaceAll("&quot;", '"')
    .replaceAll("&#39;", "'")
    .replaceAll("&#x27;", "'");
}

export function htmlToPlain(html: string): string {
  return decodeBasicHtmlEntities(
    html
      .replace(/<style[\s\S]*?<\/style>/gi, "")
      .replace(/<script[\s\S]*?<\/script>/gi, "")
      .replace(/<blockquote[\s\S]*?<\/blockquote>/gi, "")
      .replace(/<div class="gmail_quote[\s\S]*$/i, "")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<\/p>/gi, "\n")
      .replace(/<\/div>/gi, "\n")
      .replace(/<[^>]+>/g, "")
  );
}

/** Plain-text reply body from a parsed inbound message, preferring the text part. */
export function cleanInboundBody(parts: { text?: string | null; html?: string | null }): string {
  const text = stripNullBytes(parts.text);
  if (text && text.trim()) return stripNullBytes(extractReplyText(text)) ?? "";

  const html = stripNullBytes(parts.html);
  if (html && html.trim()) return stripNullBytes(extractReplyText(htmlToPlain(html))) ?? "";

  return "";
}
