import { z } from "zod";

import { MissingConfigError } from "@/lib/campaign-errors";
import type { DripIntervalDays } from "@/lib/contact-ledger/types";

export const DEFAULT_DRIP_INTERVAL_DAYS: DripIntervalDays = { 1: 7, 2: 14, 3: 30 };
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export type SenderIdentity = {
  name: string;
  title: string;
  company: string;
};

export type CampaignConfig = {
  databaseUrl: string | null;
  openai: {
    apiKey: string | null;
    model: string;
    timeoutMs: number;
    maxAttempts: number;
    vectorStoreId: string | null;
  };
  smtp: { host: string; port: number; secure: boolean };
  imap: { host: string; port: number; secure: boolean; mailbox: string };
  mailbox: { address: string | null; password: string | null };
  sender: SenderIdentity;
  bookingUrl: string | null;
  dripIntervalDays: DripIntervalDays;
  replyLookbackHours: number;
  mailRetry: { maxAttempts: number; baseDelayMs: number };
};

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const optionalText = z.preprocess(
  (value) => (typeof value === "string" && value.trim() ? value.trim() : undefined),
  z.string().optional()
);

const optionalUrl = z.preprocess(
  (value) => (typeof value === "string" && value.trim() ? value.trim() : undefined),
  z.string().url().optional()
);

const optionalEmail = z.preprocess(
  (value) => (typeof value === "string" && value.trim() ? value.trim() : undefined),
  z.string().email().optional()
);

const CampaignEnvSchema = z.object({
  DATABASE_URL: optionalText,
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText,
  OPENAI_TIMEOUT_MS: optionalText,
  OPENAI_PROMPT_MAX_ATTEMPTS: optionalText,
  OPENAI_VECTOR_STORE_ID: optionalText,
  SMTP_HOST: optionalText,
  SMTP_PORT: optionalText,
  SMTP_SECURE: optionalText,
  IMAP_HOST: optionalText,
  IMAP_PORT: optionalText,
  IMAP_MAILBOX: optionalText,
  EMAIL_ADDRESS: optionalEmail,
  EMAIL_PASSWORD: optionalText,
  SENDER_NAME: optionalText,
  SENDER_TITLE: optionalText,
  SENDER_COMPANY: optionalText,
  BOOKING_URL: optionalUrl,
  DRIP_INTERVAL_DAYS: optionalText,
  REPLY_LOOKBACK_HOURS: optionalText,
  MAIL_SEND_MAX_ATTEMPTS: optionalText,
  MAIL_RETRY_BASE_DELAY_MS: optionalText,
});

export type CampaignEnv = z.infer<typeof CampaignEnvSchema>;

export function parseBooleanLike(raw: string | undefined): boolean | null {
  if (!raw) return null;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return null;
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

export function parseClampedInt(raw: string | undefined, opts: { fallback: number; min: number; max: number }): number {
  const parsed = Number.parseInt(raw || "", 10);
  if (!Number.isFinite(parsed)) return opts.fallback;
  return Math.max(opts.min, Math.min(opts.max, parsed));
}

/**
 * Parses "7,14,30" into per-stage waits. Anything other than three
 * non-negative numbers falls back to the defaults.
 */
export function parseDripIntervalDays(raw: string | undefined): DripIntervalDays {
  if (!raw) return { ...DEFAULT_DRIP_INTERVAL_DAYS };
  const parts = raw.split(",").map((part) => Number.parseFloat(part.trim()));
  if (parts.length !== 3 || parts.some((n) => !Number.isFinite(n) || n < 0)) {
    console.warn(`[Config] Ignoring invalid DRIP_INTERVAL_DAYS "${raw}", using defaults`);
    return { ...DEFAULT_DRIP_INTERVAL_DAYS };
  }
  const [first, second, third] = parts;
  return { 1: first ?? 7, 2: second ?? 14, 3: third ?? 30 };
}

export function loadCampaignConfig(env: NodeJS.ProcessEnv = process.env): CampaignConfig {
  const parsed = CampaignEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid campaign configuration: ${issues}`);
  }
  const e = parsed.data;

  const smtpPort = parseClampedInt(e.SMTP_PORT, { fallback: 587, min: 1, max: 65_535 });
  const imapPort = parseClampedInt(e.IMAP_PORT, { fallback: 993, min: 1, max: 65_535 });

  return {
    databaseUrl: e.DATABASE_URL ?? null,
    openai: {
      apiKey: e.OPENAI_API_KEY ?? null,
      model: e.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
      timeoutMs: parseClampedInt(e.OPENAI_TIMEOUT_MS, { fallback: 60_000, min: 1_000, max: 300_000 }),
      maxAttempts: parseClampedInt(e.OPENAI_PROMPT_MAX_ATTEMPTS, { fallback: 3, min: 1, max: 10 }),
      vectorStoreId: e.OPENAI_VECTOR_STORE_ID ?? null,
    },
    smtp: { host: e.SMTP_HOST ?? "smtp.gmail.com", port: smtpPort, secure: parseBooleanLike(e.SMTP_SECURE) ?? smtpPort === 465 },
    imap: { host: e.IMAP_HOST ?? "imap.gmail.com", port: imapPort, secure: imapPort === 993, mailbox: e.IMAP_MAILBOX ?? "INBOX" },
    mailbox: { address: e.EMAIL_ADDRESS ?? null, password: e.EMAIL_PASSWORD ?? null },
    sender: {
      name: e.SENDER_NAME ?? "",
      title: e.SENDER_TITLE ?? "",
      company: e.SENDER_COMPANY ?? "",
    },
    bookingUrl: e.BOOKING_URL ?? null,
    dripIntervalDays: parseDripIntervalDays(e.DRIP_INTERVAL_DAYS),
    replyLookbackHours: parseClampedInt(e.REPLY_LOOKBACK_HOURS, { fallback: 24, min: 1, max: 24 * 30 }),
    mailRetry: {
      maxAttempts: parseClampedInt(e.MAIL_SEND_MAX_ATTEMPTS, { fallback: 3, min: 1, max: 10 }),
      baseDelayMs: parseClampedInt(e.MAIL_RETRY_BASE_DELAY_MS, { fallback: 5_000, min: 0, max: 120_000 }),
    },
  };
}

export function requireConfigValue(value: string | null, key: string): string {
  if (!value) throw new MissingConfigError(key);
  return value;
}
