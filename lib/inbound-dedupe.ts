import crypto from "crypto";

import type { InboundEmail } from "@/lib/mail/types";

/**
 * Computes a stable dedupe key for inbound mail that arrived without a
 * Message-ID header. Deterministic across inbox scans of the same message.
 */
export function computeInboundDedupeKey(email: Pick<InboundEmail, "from" | "date" | "subject" | "text">): string {
  // Normalize the body (trim, lowercase, collapse whitespace)
  const normalizedBody = (email.text || "").trim().toLowerCase().replace(/\s+/g, " ");

  const input = [
    (email.from || "").trim().toLowerCase(),
    email.date ? email.date.toISOString() : "",
    (email.subject || "").trim(),
    normalizedBody,
  ].join("|");

  const hash = crypto.createHash("sha256").update(input).digest("hex").slice(0, 32);

  return `inbound:${hash}`;
}

/** The Message-ID when present, otherwise the computed key. */
export function resolveInboundMessageKey(email: Pick<InboundEmail, "messageId" | "from" | "date" | "subject" | "text">): string {
  return email.messageId?.trim() || computeInboundDedupeKey(email);
}
