import { InvalidDripTransitionError } from "@/lib/campaign-errors";
import {
  DO_NOT_CONTACT_STATUS,
  REPLIED_STATUS,
  type CampaignStep,
  type Contact,
  type ContentEmailType,
  type DripIntervalDays,
  type DripStage,
  type MailSentStatus,
} from "@/lib/contact-ledger/types";

export const DAY_MS = 24 * 60 * 60 * 1000;

export const DRIP_STATES = [
  "NEW",
  "AWAITING_DRIP1",
  "AWAITING_DRIP2",
  "AWAITING_DRIP3",
  "EXHAUSTED",
  "REPLIED",
  "SUPPRESSED",
] as const;
export type DripState = (typeof DRIP_STATES)[number];

export type DripEvent =
  | { type: "initial_sent" }
  | { type: "drip_sent"; stage: DripStage }
  | { type: "reply_received" }
  | { type: "stop_requested" };

export type StageTimestampField = "firstMailDate" | "drip1Date" | "drip2Date" | "drip3Date";

type LifecycleFields = Pick<Contact, "status" | "mailSentStatus">;
type TimestampFields = Pick<Contact, StageTimestampField>;

const AWAITING_STATE_BY_STAGE: Record<DripStage, DripState> = {
  1: "AWAITING_DRIP1",
  2: "AWAITING_DRIP2",
  3: "AWAITING_DRIP3",
};

const STATE_AFTER_DRIP: Record<DripStage, DripState> = {
  1: "AWAITING_DRIP2",
  2: "AWAITING_DRIP3",
  3: "EXHAUSTED",
};

// SUPPRESSED keeps whatever mail_sent_status the contact had.
const MAIL_SENT_STATUS_BY_STATE: Record<Exclude<DripState, "SUPPRESSED">, MailSentStatus | null> = {
  NEW: null,
  AWAITING_DRIP1: 1,
  AWAITING_DRIP2: 2,
  AWAITING_DRIP3: 3,
  EXHAUSTED: 4,
  REPLIED: 5,
};

export function resolveDripState(contact: LifecycleFields): DripState {
  if (contact.status === DO_NOT_CONTACT_STATUS) return "SUPPRESSED";
  if (contact.status === REPLIED_STATUS || contact.mailSentStatus === 5) return "REPLIED";

  switch (contact.mailSentStatus) {
    case null:
      return "NEW";
    case 1:
      return "AWAITING_DRIP1";
    case 2:
      return "AWAITING_DRIP2";
    case 3:
      return "AWAITING_DRIP3";
    default:
      return "EXHAUSTED";
  }
}

export function isTerminalDripState(state: DripState): boolean {
  return state === "REPLIED" || state === "SUPPRESSED";
}

export function describeDripEvent(event: DripEvent): string {
  return event.type === "drip_sent" ? `drip_sent(${event.stage})` : event.type;
}

/**
 * The only place drip lifecycle moves are decided. Throws
 * InvalidDripTransitionError for moves the campaign does not allow.
 */
export function transitionDripState(state: DripState, event: DripEvent): DripState {
  if (state === "SUPPRESSED") {
    if (event.type === "reply_received" || event.type === "stop_requested") return "SUPPRESSED";
    throw new InvalidDripTransitionError(state, describeDripEvent(event));
  }

  switch (event.type) {
    case "stop_requested":
      return "SUPPRESSED";
    case "reply_received":
      return "REPLIED";
    case "initial_sent":
      if (state === "NEW") return "AWAITING_DRIP1";
      break;
    case "drip_sent":
      if (state === AWAITING_STATE_BY_STAGE[event.stage]) return STATE_AFTER_DRIP[event.stage];
      break;
  }

  throw new InvalidDripTransitionError(state, describeDripEvent(event));
}

export function mailSentStatusForState(state: DripState, current: MailSentStatus | null): MailSentStatus | null {
  if (state === "SUPPRESSED") return current;
  return MAIL_SENT_STATUS_BY_STATE[state];
}

export function eventForStep(step: CampaignStep): DripEvent {
  return step === "initial" ? { type: "initial_sent" } : { type: "drip_sent", stage: step };
}

export function contentTypeForStep(step: CampaignStep): ContentEmailType {
  if (step === "initial") return "initial";
  return step === 1 ? "drip_1" : step === 2 ? "drip_2" : "drip_3";
}

export function timestampFieldForStep(step: CampaignStep): StageTimestampField {
  if (step === "initial") return "firstMailDate";
  return step === 1 ? "drip1Date" : step === 2 ? "drip2Date" : "drip3Date";
}

function stepIndex(step: CampaignStep): number {
  return step === "initial" ? 0 : step;
}

/** The outbound step the contact is waiting on, or null once exhausted or terminal. */
export function nextCampaignStep(state: DripState): CampaignStep | null {
  switch (state) {
    case "NEW":
      return "initial";
    case "AWAITING_DRIP1":
      return 1;
    case "AWAITING_DRIP2":
      return 2;
    case "AWAITING_DRIP3":
      return 3;
    default:
      return null;
  }
}

/**
 * True when sending `step` again would be a repeat: the contact already
 * moved past it, or reached a state where the engine no longer sends.
 */
export function hasPassedStep(contact: LifecycleFields, step: CampaignStep): boolean {
  const state = resolveDripState(contact);
  if (isTerminalDripState(state) || state === "EXHAUSTED") return true;
  const next = nextCampaignStep(state);
  if (next === null) return true;
  return stepIndex(step) < stepIndex(next);
}

export function anchorForStage(contact: TimestampFields, stage: DripStage): Date | null {
  if (stage === 1) return contact.firstMailDate;
  if (stage === 2) return contact.drip1Date;
  return contact.drip2Date;
}

export function stageDueAt(contact: TimestampFields, stage: DripStage, intervals: DripIntervalDays): Date | null {
  const anchor = anchorForStage(contact, stage);
  if (!anchor) return null;
  return new Date(anchor.getTime() + intervals[stage] * DAY_MS);
}

/** The drip stage that is due right now, if any. */
export function computeDueStage(
  contact: LifecycleFields & TimestampFields,
  now: Date,
  intervals: DripIntervalDays
): DripStage | null {
  const next = nextCampaignStep(resolveDripState(contact));
  if (next === null || next === "initial") return null;

  const dueAt = stageDueAt(contact, next, intervals);
  if (!dueAt) return null;
  return now.getTime() >= dueAt.getTime() ? next : null;
}

/** Later stage timestamps never exist without the earlier ones. */
export function hasMonotonicStageTimestamps(contact: TimestampFields): boolean {
  const ordered = [contact.firstMailDate, contact.drip1Date, contact.drip2Date, contact.drip3Date];
  let gapSeen = false;
  for (const value of ordered) {
    if (!value) {
      gapSeen = true;
      continue;
    }
    if (gapSeen) return false;
  }
  return true;
}

/**
 * Throws when recording `step` at `sentAt` would leave a stage timestamp set
 * while an earlier one is still empty.
 */
export function assertStageTimestampOrder(
  contact: LifecycleFields & TimestampFields,
  step: CampaignStep,
  sentAt: Date
): void {
  const next: TimestampFields = {
    firstMailDate: contact.firstMailDate,
    drip1Date: contact.drip1Date,
    drip2Date: contact.drip2Date,
    drip3Date: contact.drip3Date,
  };
  next[timestampFieldForStep(step)] = sentAt;
  if (!hasMonotonicStageTimestamps(next)) {
    throw new InvalidDripTransitionError(
      resolveDripState(contact),
      `${describeDripEvent(eventForStep(step))} before earlier stage timestamps`
    );
  }
}
