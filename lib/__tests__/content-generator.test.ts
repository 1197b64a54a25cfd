import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ContentGenerationError } from "../campaign-errors";
import { cleanIndustry, createContentGenerator } from "../content-generator";
import { SENDER, SIGNATURE_BLOCK, failingCall, makeContact, textCall } from "./helpers/campaign-fakes";

const BOOKING_URL = "https://cal.example/alex";

describe("createContentGenerator outreach", () => {
  it("parses model output and appends the signature", async () => {
    const call = textCall("Quick idea for Acme|||Hi Jamie,\n\nBody.\n\nBest regards,");
    const generator = createContentGenerator({ call, model: "gpt-4o-mini", sender: SENDER, bookingUrl: BOOKING_URL });

    const content = await generator.generate(makeContact(), "initial", { threadId: "conv_1" });

    assert.deepEqual(content, {
      subject: "Quick idea for Acme",
      body: `Hi Jamie,\n\nBody.\n\n${SIGNATURE_BLOCK}`,
      source: "model",
    });

    const request = call.mock.calls[0]?.arguments[0];
    assert.equal(request?.conversation, "conv_1");
    assert.ok(
      request?.instructions?.startsWith(
        "You write short, personal B2B outreach emails on behalf of Alex Doe, Head of Growth at OurCo."
      )
    );
    assert.match(String(request?.input), /^STAGE: initial\n/);
    assert.match(String(request?.input), /- Company: Acme\n/);
  });

  it("uses the fallback copy when the output cannot be parsed", async () => {
    const generator = createContentGenerator({
      call: textCall("Hello"),
      model: "gpt-4o-mini",
      sender: SENDER,
      bookingUrl: BOOKING_URL,
    });

    const content = await generator.generate(makeContact(), "drip_2");

    assert.equal(content.subject, "An idea for Acme");
    assert.equal(content.source, "fallback");
    assert.ok(content.body.startsWith("Hi Jamie,\n\nOne idea that has worked well for other Logistics companies:"));
    assert.ok(content.body.endsWith(`\n\n${SIGNATURE_BLOCK}`));
  });

  it("throws ContentGenerationError when the model cannot be reached", async () => {
    const generator = createContentGenerator({
      call: failingCall(),
      model: "gpt-4o-mini",
      sender: SENDER,
      bookingUrl: BOOKING_URL,
    });

    await assert.rejects(
      generator.generate(makeContact(), "drip_1"),
      (error: unknown) =>
        error instanceof ContentGenerationError && error.stage === "drip_1" && error.code === "content_generation_failed"
    );
  });
});

describe("createContentGenerator replies", () => {
  it("replaces the meeting placeholder with the booking line", async () => {
    const call = textCall("Hi Jamie,\nGreat to hear it.\n[MEETING_BUTTON]\nBest,\nAlex");
    const generator = createContentGenerator({ call, model: "gpt-4o-mini", sender: SENDER, bookingUrl: BOOKING_URL });

    const content = await generator.generate(makeContact(), "booking_invite", {
      replyText: "Sounds interesting",
      inboundSubject: "Quick idea for Acme",
    });

    assert.deepEqual(content, {
      subject: "Re: Quick idea for Acme",
      body: `Hi Jamie,\n\nGreat to hear it.\nYou can book a convenient time on my calendar here: ${BOOKING_URL}\n\n${SIGNATURE_BLOCK}`,
      source: "model",
    });
  });

  it("falls back to deterministic copy when the model fails", async () => {
    const generator = createContentGenerator({
      call: failingCall(),
      model: "gpt-4o-mini",
      sender: SENDER,
      bookingUrl: null,
    });

    const content = await generator.generate(makeContact(), "query_with_booking", {
      replyText: "How much is it?",
      queries: "How much is it?",
      inboundSubject: "Re: Quick idea for Acme",
    });

    assert.equal(content.subject, "Re: Quick idea for Acme");
    assert.equal(content.source, "fallback");
    assert.equal(
      content.body,
      [
        "Hi Jamie,",
        "",
        "Thanks for your questions. They deserve a proper answer rather than a rushed one, so the quickest way is a short call where I can walk you through it.",
        "",
        "If you'd like to talk, reply with a couple of times that work for you and I'll send an invite.",
        "",
        SIGNATURE_BLOCK,
      ].join("\n")
    );
  });

  it("passes the questions to the model and strips stray placeholders from non-booking answers", async () => {
    const call = textCall("Pricing depends on volume. [MEETING_BUTTON]");
    const generator = createContentGenerator({ call, model: "gpt-4o-mini", sender: SENDER, bookingUrl: BOOKING_URL });

    const content = await generator.generate(makeContact(), "neutral_with_query", {
      replyText: "How much?",
      queries: "How much?",
      inboundSubject: "Quick idea",
    });

    assert.equal(content.body, `Hi Jamie,\n\nPricing depends on volume.\n\n${SIGNATURE_BLOCK}`);
    assert.match(String(call.mock.calls[0]?.arguments[0].input), /THEIR QUESTIONS\nHow much\?/);
  });

  it("renders acknowledgments without calling the model", async () => {
    const call = textCall("unused");
    const generator = createContentGenerator({ call, model: "gpt-4o-mini", sender: SENDER, bookingUrl: BOOKING_URL });

    const content = await generator.generate(makeContact(), "stop_ack", { inboundSubject: "Quick idea for Acme" });

    assert.deepEqual(content, {
      subject: "Re: Quick idea for Acme",
      body: `Hi Jamie,\n\nUnderstood. I've removed you from our list and you won't receive any further emails from me.\n\n${SIGNATURE_BLOCK}`,
      source: "template",
    });
    assert.equal(call.mock.callCount(), 0);
  });
});

describe("resolveIndustry", () => {
  it("cleans the model answer", async () => {
    const generator = createContentGenerator({
      call: textCall("Industry: Logistics."),
      model: "gpt-4o-mini",
      sender: SENDER,
      bookingUrl: null,
    });
    assert.equal(await generator.resolveIndustry({ companyName: "Acme", companyUrl: null }), "Logistics");
  });

  it("returns null without a company or when the model does not know", async () => {
    const call = textCall("Unknown");
    const generator = createContentGenerator({ call, model: "gpt-4o-mini", sender: SENDER, bookingUrl: null });

    assert.equal(await generator.resolveIndustry({ companyName: null, companyUrl: "  " }), null);
    assert.equal(call.mock.callCount(), 0);
    assert.equal(await generator.resolveIndustry({ companyName: "Acme", companyUrl: null }), null);
  });
});

describe("cleanIndustry", () => {
  it("keeps the first line and rejects overly long answers", () => {
    assert.equal(cleanIndustry('"Dental Clinics"\nBecause...'), "Dental Clinics");
    assert.equal(cleanIndustry("x".repeat(61)), null);
    assert.equal(cleanIndustry(null), null);
  });
});
