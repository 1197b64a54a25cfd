import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { DuplicateContactError, InvalidDripTransitionError } from "../../campaign-errors";
import { MemoryContactLedger } from "../memory-ledger";

const NOW = new Date("2026-03-10T12:00:00Z");
const DAY = 24 * 60 * 60 * 1000;

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY);
}

function newLedger() {
  return new MemoryContactLedger(() => NOW);
}

const PROFILE = {
  name: " Jamie Smith ",
  email: " Jamie@Acme.example ",
  companyName: "Acme",
  companyUrl: "https://acme.example",
  linkedin: null,
  industry: null,
};

describe("MemoryContactLedger contacts", () => {
  it("normalizes email on create and rejects duplicates case-insensitively", async () => {
    const ledger = newLedger();
    const contact = await ledger.create(PROFILE);

    assert.equal(contact.email, "jamie@acme.example");
    assert.equal(contact.name, "Jamie Smith");
    assert.equal(contact.mailSentStatus, null);
    assert.equal((await ledger.findByEmail("JAMIE@acme.example"))?.id, contact.id);
    await assert.rejects(ledger.create({ ...PROFILE, email: "jamie@ACME.example" }), DuplicateContactError);
  });

  it("lists contacts awaiting the initial email in id order, skipping suppressed ones", async () => {
    const ledger = newLedger();
    ledger.seedContact({ id: 3, email: "c@x.example" });
    ledger.seedContact({ id: 1, email: "a@x.example" });
    ledger.seedContact({ id: 2, email: "b@x.example", status: "do_not_contact" });
    ledger.seedContact({ id: 4, email: "d@x.example", mailSentStatus: 1, firstMailDate: daysAgo(1) });

    const awaiting = await ledger.listAwaitingInitial();
    assert.deepEqual(
      awaiting.map((c) => c.id),
      [1, 3]
    );
  });

  it("lists contacts whose stage anchor is at least the interval old", async () => {
    const ledger = newLedger();
    ledger.seedContact({ id: 1, email: "due@x.example", mailSentStatus: 1, firstMailDate: daysAgo(7) });
    ledger.seedContact({ id: 2, email: "early@x.example", mailSentStatus: 1, firstMailDate: daysAgo(6) });
    ledger.seedContact({ id: 3, email: "replied@x.example", mailSentStatus: 1, firstMailDate: daysAgo(9), status: "replied" });
    ledger.seedContact({ id: 4, email: "stage2@x.example", mailSentStatus: 2, firstMailDate: daysAgo(30), drip1Date: daysAgo(15) });

    assert.deepEqual(
      (await ledger.listDue(1, NOW, 7)).map((c) => c.id),
      [1]
    );
    assert.deepEqual(
      (await ledger.listDue(2, NOW, 14)).map((c) => c.id),
      [4]
    );
    assert.deepEqual(await ledger.listDue(3, NOW, 30), []);
  });
});

describe("MemoryContactLedger.advanceStage", () => {
  it("sets the stage timestamp and moves mail_sent_status forward once", async () => {
    const ledger = newLedger();
    const contact = ledger.seedContact({ email: "jamie@acme.example" });
    const sentAt = daysAgo(0);

    assert.equal(await ledger.advanceStage(contact.id, "initial", sentAt), true);
    assert.equal(await ledger.advanceStage(contact.id, "initial", sentAt), false);

    const updated = await ledger.findById(contact.id);
    assert.equal(updated?.mailSentStatus, 1);
    assert.equal(updated?.firstMailDate?.getTime(), sentAt.getTime());
  });

  it("moves the last drip to exhausted", async () => {
    const ledger = newLedger();
    const contact = ledger.seedContact({
      email: "jamie@acme.example",
      mailSentStatus: 3,
      firstMailDate: daysAgo(60),
      drip1Date: daysAgo(50),
      drip2Date: daysAgo(31),
    });

    assert.equal(await ledger.advanceStage(contact.id, 3, NOW), true);
    const updated = await ledger.findById(contact.id);
    assert.equal(updated?.mailSentStatus, 4);
    assert.equal(updated?.drip3Date?.getTime(), NOW.getTime());
  });

  it("throws for an out-of-order stage and refuses replied contacts", async () => {
    const ledger = newLedger();
    const awaitingFirst = ledger.seedContact({ email: "a@x.example", mailSentStatus: 1, firstMailDate: daysAgo(10) });
    const replied = ledger.seedContact({ email: "b@x.example", mailSentStatus: 5, status: "replied", firstMailDate: daysAgo(10) });

    await assert.rejects(ledger.advanceStage(awaitingFirst.id, 2, NOW), InvalidDripTransitionError);
    assert.equal(await ledger.advanceStage(replied.id, 1, NOW), false);
    assert.equal((await ledger.findById(awaitingFirst.id))?.drip2Date, null);
  });

  it("refuses a drip for a contact whose earlier stage timestamp is missing", async () => {
    const ledger = newLedger();
    const contact = ledger.seedContact({ email: "jamie@acme.example", mailSentStatus: 1, firstMailDate: null });

    await assert.rejects(ledger.advanceStage(contact.id, 1, NOW), InvalidDripTransitionError);
    const unchanged = await ledger.findById(contact.id);
    assert.equal(unchanged?.drip1Date, null);
    assert.equal(unchanged?.mailSentStatus, 1);
  });
});

describe("MemoryContactLedger content log", () => {
  it("skips a content record whose message id is already stored", async () => {
    const ledger = newLedger();
    const contact = ledger.seedContact({ email: "jamie@acme.example", mailSentStatus: 1 });

    const first = await ledger.recordContent(contact.id, { emailType: "reply", messageId: "<m1@x>", body: "Hi" });
    const second = await ledger.recordContent(contact.id, { emailType: "reply", messageId: "<m1@x>", body: "Hi" });

    assert.equal(first?.clientEmail, "jamie@acme.example");
    assert.equal(second, null);
    assert.deepEqual(await ledger.listProcessedMessageIds(), ["<m1@x>"]);
    assert.equal(await ledger.hasMessageId("<m1@x>"), true);
  });

  it("deletes a contact together with its content", async () => {
    const ledger = newLedger();
    const contact = ledger.seedContact({ email: "jamie@acme.example" });
    await ledger.recordContent(contact.id, { emailType: "initial", messageId: "<m1@x>" });

    assert.equal(await ledger.deleteContact(contact.id), true);
    assert.equal(await ledger.deleteContact(contact.id), false);
    assert.equal(await ledger.hasMessageId("<m1@x>"), false);
  });
});

describe("MemoryContactLedger.transaction", () => {
  it("rolls back every write when the callback throws", async () => {
    const ledger = newLedger();
    const contact = ledger.seedContact({ email: "jamie@acme.example", mailSentStatus: 1 });

    await assert.rejects(
      ledger.transaction(async (session) => {
        await session.markReplied(contact.id);
        await session.recordContent(contact.id, { emailType: "reply", messageId: "<m1@x>" });
        throw new Error("boom");
      }),
      /boom/
    );

    const after = await ledger.findById(contact.id);
    assert.equal(after?.status, null);
    assert.equal(after?.mailSentStatus, 1);
    assert.equal(await ledger.hasMessageId("<m1@x>"), false);
  });
});

describe("MemoryContactLedger referrals and stats", () => {
  it("stores each (cc, referrer) pair once", async () => {
    const ledger = newLedger();
    const lead = { cc: "Pat@Partner.example", companyName: "Acme", referredBy: "jamie@acme.example" };

    assert.equal(await ledger.recordReferrals([lead, { ...lead, cc: "pat@partner.example" }]), 1);
    assert.equal(await ledger.recordReferrals([lead]), 0);
    assert.deepEqual(
      ledger.listReferrals().map((r) => [r.cc, r.companyName, r.referredBy]),
      [["pat@partner.example", "Acme", "jamie@acme.example"]]
    );
  });

  it("counts contacts per stage and status", async () => {
    const ledger = newLedger();
    ledger.seedContact({ email: "a@x.example" });
    ledger.seedContact({ email: "b@x.example", mailSentStatus: 1 });
    ledger.seedContact({ email: "c@x.example", mailSentStatus: 4 });
    ledger.seedContact({ email: "d@x.example", mailSentStatus: 5, status: "do_not_contact", bookingStatus: "clicked" });

    assert.deepEqual(await ledger.getStats(), {
      totalContacts: 4,
      awaitingInitial: 1,
      initialSent: 1,
      drip1Sent: 0,
      drip2Sent: 0,
      drip3Sent: 1,
      replied: 1,
      doNotContact: 1,
      bookingClicked: 1,
    });
    assert.deepEqual(await ledger.listContactedEmails(), ["b@x.example", "c@x.example", "d@x.example"]);
  });
});
