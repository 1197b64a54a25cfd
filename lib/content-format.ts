import { CAMPAIGN_EMAIL_SEPARATOR } from "@/lib/ai/prompts/campaign-email-v1";

export type ParsedEmailContent = {
  subject: string;
  body: string;
  strategy: "separator" | "lines" | "fallback";
};

function cleanSubject(raw: string): string {
  return raw
    .replace(/^\s*\*{0,2}subject\*{0,2}\s*:\s*/i, "")
    .trim()
    .replace(/^["'`]+|["'`]+$/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

function cleanBody(raw: string): string {
  return raw
    .replace(/^\s*\*{0,2}body\*{0,2}\s*:\s*/i, "")
    .replace(/\r\n?/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Splits model output into subject and body: the `|||` separator first,
 * then first line as subject, then the supplied fallback.
 */
export function parseSubjectBody(raw: string | null | undefined, fallback: { subject: string; body: string }): ParsedEmailContent {
  const text = (raw || "").replace(/\r\n?/g, "\n").trim();

  const separatorIndex = text.indexOf(CAMPAIGN_EMAIL_SEPARATOR);
  if (separatorIndex >= 0) {
    const subject = cleanSubject(text.slice(0, separatorIndex));
    const body = cleanBody(text.slice(separatorIndex + CAMPAIGN_EMAIL_SEPARATOR.length));
    if (subject && body) return { subject, body, strategy: "separator" };
  }

  const lines = text.split("\n");
  if (lines.length >= 2) {
    const subject = cleanSubject(lines[0] ?? "");
    const body = cleanBody(lines.slice(1).join("\n"));
    if (subject && body) return { subject, body, strategy: "lines" };
  }

  return { subject: fallback.subject, body: fallback.body, strategy: "fallback" };
}
