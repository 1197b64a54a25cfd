import assert from "node:assert/strict";
import { describe, it } from "node:test";

import type { ContentGenerator } from "../../content-generator";
import { MemoryContactLedger } from "../../contact-ledger/memory-ledger";
import { createDripEngine } from "../drip-engine";
import { fakeGenerator, fakeMailer, fakeThreads, makeContact } from "../../__tests__/helpers/campaign-fakes";

const NOW = new Date("2026-03-10T12:00:00Z");
const DAY = 24 * 60 * 60 * 1000;
const INTERVALS = { 1: 7, 2: 14, 3: 30 };

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY);
}

function setup(
  opts: {
    generator?: ContentGenerator;
    industry?: string | null;
    failTo?: string[];
    intervals?: typeof INTERVALS;
  } = {}
) {
  const ledger = new MemoryContactLedger(() => NOW);
  const gen = fakeGenerator({ industry: opts.industry });
  const mail = fakeMailer({ failTo: opts.failTo });
  const threads = fakeThreads();
  const engine = createDripEngine({
    ledger,
    generator: opts.generator ?? gen.generator,
    mailer: mail.mailer,
    threads: threads.threads,
    intervals: opts.intervals ?? INTERVALS,
    now: () => NOW,
  });
  return { ledger, gen, mail, threads, engine };
}

describe("processInitialEmails", () => {
  it("sends the first email and moves the contact to drip 1", async () => {
    const { ledger, gen, mail, engine } = setup({ industry: "Fintech" });
    ledger.seedContact(makeContact());
    ledger.seedContact(
      makeContact({ id: 2, name: "Riley Jones", email: "riley@beta.example", companyName: "Beta", companyUrl: "https://beta.example", industry: null })
    );
    ledger.seedContact(makeContact({ id: 3, email: "sam@gamma.example", status: "do_not_contact" }));

    const result = await engine.processInitialEmails();

    assert.equal(result.processed, 2);
    assert.equal(result.succeeded, 2);
    assert.equal(result.failed, 0);
    assert.equal(result.skipped, 0);
    assert.deepEqual(result.errors, []);
    assert.deepEqual(
      mail.send.mock.calls.map((call) => call.arguments[0].to),
      ["jamie@acme.example", "riley@beta.example"]
    );

    const first = await ledger.findById(1);
    assert.equal(first?.mailSentStatus, 1);
    assert.equal(first?.firstMailDate?.toISOString(), NOW.toISOString());

    const [record] = await ledger.listContent(1);
    assert.equal(record?.emailType, "initial");
    assert.equal(record?.subject, "initial subject");
    assert.equal(record?.body, "initial body for Jamie Smith");
    assert.equal(record?.messageId, "<sent-1@ourco.example>");
    assert.equal(record?.threadId, "conv_1");

    assert.equal(gen.resolveIndustry.mock.callCount(), 1);
    assert.equal((await ledger.findById(2))?.industry, "Fintech");
    assert.equal(gen.generate.mock.calls[1]?.arguments[0].industry, "Fintech");
  });

  it("skips contacts whose industry cannot be established", async () => {
    const { ledger, mail, engine } = setup({ industry: null });
    ledger.seedContact(makeContact({ industry: null, companyUrl: null }));
    ledger.seedContact(makeContact({ id: 2, email: "riley@beta.example", industry: null }));

    const result = await engine.processInitialEmails();

    assert.equal(result.skipped, 2);
    assert.deepEqual(
      result.outcomes.map((outcome) => outcome.reason),
      ["missing_company_profile", "industry_unresolved"]
    );
    assert.equal(mail.send.mock.callCount(), 0);
    assert.equal((await ledger.findById(1))?.mailSentStatus, null);
  });

  it("reports a generation failure and leaves the contact untouched", async () => {
    const gen = fakeGenerator({ failStages: ["initial"] });
    const { ledger, mail, engine } = setup({ generator: gen.generator });
    ledger.seedContact(makeContact());

    const result = await engine.processInitialEmails();

    assert.equal(result.failed, 1);
    assert.equal(result.outcomes[0]?.reason, "generation_failed");
    assert.deepEqual(result.errors, [
      "jamie@acme.example (initial email): Content generation failed for initial: model unavailable",
    ]);
    assert.equal(mail.send.mock.callCount(), 0);
    assert.equal((await ledger.findById(1))?.mailSentStatus, null);
  });

  it("does not advance a contact when the send fails", async () => {
    const { ledger, engine } = setup({ failTo: ["jamie@acme.example"] });
    ledger.seedContact(makeContact());

    const result = await engine.processInitialEmails();

    assert.equal(result.outcomes[0]?.reason, "send_failed");
    assert.deepEqual(result.errors, ["jamie@acme.example (initial email): SMTP unavailable"]);
    const contact = await ledger.findById(1);
    assert.equal(contact?.mailSentStatus, null);
    assert.equal(contact?.firstMailDate, null);
    assert.deepEqual(await ledger.listContent(1), []);
  });

  it("rolls back the contact's writes when an unexpected error escapes", async () => {
    const generator: ContentGenerator = {
      generate: async () => {
        throw new Error("boom");
      },
      resolveIndustry: async () => "Fintech",
    };
    const { ledger, engine } = setup({ generator });
    ledger.seedContact(makeContact({ industry: null }));

    const result = await engine.processInitialEmails();

    assert.equal(result.outcomes[0]?.reason, "unexpected_error");
    assert.deepEqual(result.errors, ["jamie@acme.example (initial email): boom"]);
    assert.equal((await ledger.findById(1))?.industry, null);
  });
});

describe("processInitialEmails for selected contacts", () => {
  it("sends only to the chosen contacts and skips ones already started", async () => {
    const { ledger, mail, engine } = setup();
    ledger.seedContact(makeContact());
    ledger.seedContact(makeContact({ id: 2, email: "riley@beta.example" }));
    ledger.seedContact(makeContact({ id: 3, email: "sam@gamma.example", mailSentStatus: 1, firstMailDate: daysAgo(2) }));

    const result = await engine.processInitialEmails([2, 3, 2, 99]);

    assert.deepEqual(
      result.outcomes.map((outcome) => [outcome.contactId, outcome.status, outcome.reason]),
      [
        [2, "sent", undefined],
        [3, "skipped", "no_longer_due"],
      ]
    );
    assert.deepEqual(
      mail.send.mock.calls.map((call) => call.arguments[0].to),
      ["riley@beta.example"]
    );
    assert.equal((await ledger.findById(1))?.mailSentStatus, null);
    assert.equal((await ledger.findById(2))?.mailSentStatus, 1);
    assert.equal((await ledger.findById(3))?.firstMailDate?.toISOString(), daysAgo(2).toISOString());
  });

  it("never starts a suppressed contact that was selected", async () => {
    const { ledger, mail, engine } = setup();
    ledger.seedContact(makeContact({ status: "do_not_contact" }));

    const result = await engine.processInitialEmails([1]);

    assert.equal(result.skipped, 1);
    assert.equal(result.outcomes[0]?.reason, "no_longer_due");
    assert.equal(mail.send.mock.callCount(), 0);
  });
});

describe("processDrips", () => {
  it("sends each due stage and leaves contacts that are not due", async () => {
    const { ledger, gen, engine } = setup();
    ledger.seedContact(makeContact({ mailSentStatus: 1, firstMailDate: daysAgo(8) }));
    ledger.seedContact(
      makeContact({ id: 2, email: "riley@beta.example", mailSentStatus: 2, firstMailDate: daysAgo(30), drip1Date: daysAgo(15) })
    );
    ledger.seedContact(
      makeContact({
        id: 3,
        email: "sam@gamma.example",
        mailSentStatus: 3,
        firstMailDate: daysAgo(60),
        drip1Date: daysAgo(40),
        drip2Date: daysAgo(10),
      })
    );
    ledger.seedContact(makeContact({ id: 4, email: "kim@delta.example", mailSentStatus: 1, firstMailDate: daysAgo(3) }));
    ledger.seedContact(
      makeContact({ id: 5, email: "lee@eps.example", status: "replied", mailSentStatus: 5, firstMailDate: daysAgo(30) })
    );

    const result = await engine.processDrips();

    assert.equal(result.processed, 2);
    assert.equal(result.succeeded, 2);
    assert.deepEqual(
      result.outcomes.map((outcome) => [outcome.contactId, outcome.step]),
      [
        [1, 1],
        [2, 2],
      ]
    );
    assert.deepEqual(
      gen.generate.mock.calls.map((call) => call.arguments[1]),
      ["drip_1", "drip_2"]
    );

    const first = await ledger.findById(1);
    assert.equal(first?.mailSentStatus, 2);
    assert.equal(first?.drip1Date?.toISOString(), NOW.toISOString());
    assert.equal((await ledger.findById(2))?.mailSentStatus, 3);
    assert.equal((await ledger.findById(3))?.mailSentStatus, 3);
    assert.equal((await ledger.findById(4))?.mailSentStatus, 1);
    assert.equal((await ledger.listContent(1))[0]?.emailType, "drip_1");
  });

  it("sends at most one drip per contact per run", async () => {
    const { ledger, mail, engine } = setup({ intervals: { 1: 0, 2: 0, 3: 0 } });
    ledger.seedContact(makeContact({ mailSentStatus: 1, firstMailDate: daysAgo(1) }));

    const result = await engine.processDrips();

    assert.equal(result.processed, 1);
    assert.equal(mail.send.mock.callCount(), 1);
    assert.equal((await ledger.findById(1))?.mailSentStatus, 2);
  });

  it("sends nothing on a second run at the same time", async () => {
    const { ledger, mail, engine } = setup();
    ledger.seedContact(makeContact({ mailSentStatus: 1, firstMailDate: daysAgo(8) }));

    const first = await engine.processDrips();
    const second = await engine.processDrips();

    assert.equal(first.succeeded, 1);
    assert.equal(second.processed, 0);
    assert.equal(mail.send.mock.callCount(), 1);
    assert.equal((await ledger.listContent(1)).length, 1);
    assert.equal((await ledger.findById(1))?.mailSentStatus, 2);
  });

  it("never drips a contact marked do_not_contact", async () => {
    const { ledger, mail, engine } = setup();
    ledger.seedContact(
      makeContact({ status: "do_not_contact", mailSentStatus: 1, firstMailDate: daysAgo(30) })
    );

    const result = await engine.processDrips();

    assert.equal(result.processed, 0);
    assert.equal(mail.send.mock.callCount(), 0);
    assert.equal((await ledger.findById(1))?.drip1Date, null);
  });

  it("skips a contact that replied after the due list was built", async () => {
    const { ledger, mail, engine } = setup();
    ledger.seedContact(makeContact({ mailSentStatus: 1, firstMailDate: daysAgo(8) }));
    const listDue = ledger.listDue.bind(ledger);
    ledger.listDue = async (stage, now, intervalDays) => {
      const due = await listDue(stage, now, intervalDays);
      await ledger.markReplied(1);
      return due;
    };

    const result = await engine.processDrips();

    assert.deepEqual(result.outcomes[0], {
      contactId: 1,
      email: "jamie@acme.example",
      step: 1,
      status: "skipped",
      reason: "no_longer_due",
    });
    assert.equal(mail.send.mock.callCount(), 0);
  });
});

describe("getDripStatus", () => {
  it("reports sent stages and when the next one falls due", async () => {
    const { ledger, engine } = setup();
    ledger.seedContact(makeContact({ mailSentStatus: 2, firstMailDate: daysAgo(20), drip1Date: daysAgo(5) }));

    const status = await engine.getDripStatus(1);

    assert.deepEqual(status, {
      contactId: 1,
      email: "jamie@acme.example",
      state: "AWAITING_DRIP2",
      mailSentStatus: 2,
      stages: [
        { step: "initial", sentAt: daysAgo(20), dueAt: null },
        { step: 1, sentAt: daysAgo(5), dueAt: daysAgo(13) },
        { step: 2, sentAt: null, dueAt: new Date(NOW.getTime() + 9 * DAY) },
        { step: 3, sentAt: null, dueAt: null },
      ],
      nextStep: 2,
      nextDueAt: new Date(NOW.getTime() + 9 * DAY),
      isDueNow: false,
    });
  });

  it("treats a new contact as due for the initial email", async () => {
    const { ledger, engine } = setup();
    ledger.seedContact(makeContact());

    const status = await engine.getDripStatus(1);

    assert.equal(status?.state, "NEW");
    assert.equal(status?.nextStep, "initial");
    assert.equal(status?.nextDueAt, null);
    assert.equal(status?.isDueNow, true);
  });

  it("returns null for an unknown contact", async () => {
    const { engine } = setup();
    assert.equal(await engine.getDripStatus(42), null);
  });
});
