function stripCommonPunctuation(text: string): string {
  return (text || "").replace(/^[\s"'`*()\-–—_:;,.!?]+|[\s"'`*()\-–—_:;,.!?]+$/g, "").trim();
}

const SINGLE_WORD_OPT_OUTS = new Set(["stop", "unsubscribe", "optout", "opt out", "remove", "remove me"]);

const STRONG_OPT_OUT =
  /\b(unsubscribe|opt\s*-?\s*out|remove me|remove us|take me off|take us off|stop (emailing|contacting|messaging|sending|mailing|reaching out)|do not (contact|email|message)|don['’]?t (contact|email|message)|no (more|further) emails?)\b/i;

/**
 * Keyword opt-out detection on the reply's own text. A subject counts only
 * when it is a bare opt-out word.
 * "stop" counts as the whole reply or as "stop emailing" and the like, never
 * on its own inside a sentence.
 */
export function isOptOutText(body: string, subject?: string | null): boolean {
  const text = (body || "").replace(/\u00a0/g, " ").trim();
  const subjectText = (subject || "").replace(/^\s*(re|fwd?):\s*/i, "").trim();
  if (!text && !subjectText) return false;

  const normalizedBody = stripCommonPunctuation(text).toLowerCase();
  if (SINGLE_WORD_OPT_OUTS.has(normalizedBody)) return true;
  if (subjectText && SINGLE_WORD_OPT_OUTS.has(stripCommonPunctuation(subjectText).toLowerCase())) return true;

  // Subjects usually echo our own outbound subject, so only the body gets the phrase scan.
  return STRONG_OPT_OUT.test(text);
}
