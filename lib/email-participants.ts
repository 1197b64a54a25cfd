export interface EmailParticipant {
  email: string;
  name?: string | null;
}

/**
 * Format a participant as "Name <email>" or just "email" if no name
 */
export function formatEmailParticipant(email: string, name?: string | null): string {
  const trimmed = (name || "").trim();
  if (!trimmed) return email;
  // Quote display names containing header specials.
  const display = /[",<>@;:]/.test(trimmed) ? `"${trimmed.replace(/"/g, "'")}"` : trimmed;
  return `${display} <${email}>`;
}

export function validateEmail(email: string): boolean {
  return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(email.trim());
}

/**
 * Handles "email@example.com" and "Name <email@example.com>".
 */
export function parseEmailAddress(input: string): EmailParticipant | null {
  const trimmed = input.trim();

  const angleMatch = trimmed.match(/^(.*?)\s*<([^>]+)>$/);
  if (angleMatch) {
    const name = (angleMatch[1] ?? "").trim().replace(/^"|"$/g, "");
    const email = (angleMatch[2] ?? "").trim();
    if (validateEmail(email)) {
      return { email, name: name || null };
    }
  }

  if (validateEmail(trimmed)) {
    return { email: trimmed, name: null };
  }

  return null;
}

export function normalizeOptionalEmail(email: string | null | undefined): string | null {
  if (!email) return null;
  const normalized = email.toLowerCase().trim();
  return normalized.length > 0 ? normalized : null;
}

/**
 * Deduplicate email list (case-insensitive), keeping first-seen order
 */
export function deduplicateEmails(emails: string[]): string[] {
  const seen = new Set<string>();
  return emails.filter((email) => {
    const lower = email.toLowerCase().trim();
    if (!lower || seen.has(lower)) return false;
    seen.add(lower);
    return true;
  });
}

export function extractFirstName(fullName: string | null | undefined): string | null {
  const trimmed = (fullName || "").trim();
  if (!trimmed) return null;
  const firstSpace = trimmed.indexOf(" ");
  return firstSpace > 0 ? trimmed.slice(0, firstSpace) : trimmed;
}

/**
 * CC'd addresses worth keeping as referral leads: valid, lowercased,
 * deduplicated, and not in `exclude` (our mailbox, the replier, known contacts).
 */
export function collectReferralAddresses(params: {
  cc: string[];
  exclude: Iterable<string | null | undefined>;
}): string[] {
  const excluded = new Set<string>();
  for (const value of params.exclude) {
    const normalized = normalizeOptionalEmail(value);
    if (normalized) excluded.add(normalized);
  }

  const candidates: string[] = [];
  for (const raw of params.cc) {
    const parsed = parseEmailAddress(raw);
    const email = normalizeOptionalEmail(parsed?.email);
    if (!email || excluded.has(email)) continue;
    candidates.push(email);
  }
  return deduplicateEmails(candidates);
}
