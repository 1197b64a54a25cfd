import assert from "node:assert/strict";
import { describe, it } from "node:test";

import {
  buildThreadingHeaders,
  composeReplyBody,
  normalizeMessageId,
  parseReferencesHeader,
  quoteOriginalMessage,
  toReplySubject,
} from "../email-threading";

describe("normalizeMessageId", () => {
  it("wraps bare ids in angle brackets", () => {
    assert.equal(normalizeMessageId("abc@mail.example"), "<abc@mail.example>");
    assert.equal(normalizeMessageId(" <abc@mail.example> "), "<abc@mail.example>");
  });
});

describe("parseReferencesHeader", () => {
  it("splits bracketed and bare references", () => {
    assert.deepEqual(parseReferencesHeader("<a@x> <b@x>"), ["<a@x>", "<b@x>"]);
    assert.deepEqual(parseReferencesHeader(["<a@x>", "<b@x>"]), ["<a@x>", "<b@x>"]);
    assert.deepEqual(parseReferencesHeader("a@x b@x"), ["<a@x>", "<b@x>"]);
    assert.deepEqual(parseReferencesHeader(null), []);
  });
});

describe("buildThreadingHeaders", () => {
  it("replies to the inbound id and appends it to the chain without repeats", () => {
    assert.deepEqual(buildThreadingHeaders({ messageId: "<c@x>", references: ["<a@x>", "<b@x>", "<a@x>"] }), {
      inReplyTo: "<c@x>",
      references: "<a@x> <b@x> <c@x>",
    });
  });

  it("does not duplicate an inbound id already in References", () => {
    assert.deepEqual(buildThreadingHeaders({ messageId: "c@x", references: ["<a@x>", "<c@x>"] }), {
      inReplyTo: "<c@x>",
      references: "<a@x> <c@x>",
    });
  });

  it("returns null without an inbound Message-ID", () => {
    assert.equal(buildThreadingHeaders({ messageId: null, references: ["<a@x>"] }), null);
  });
});

describe("toReplySubject", () => {
  it("adds a single Re: prefix", () => {
    assert.equal(toReplySubject("Quick question"), "Re: Quick question");
    assert.equal(toReplySubject("RE: Quick question"), "RE: Quick question");
    assert.equal(toReplySubject("  "), "Re: your message");
  });
});

describe("quoteOriginalMessage", () => {
  it("attributes and quotes every line", () => {
    const quoted = quoteOriginalMessage({
      body: "Sounds good.\r\nWhat next?",
      from: "Jamie <jamie@acme.example>",
      date: new Date("2026-03-02T09:00:00Z"),
    });
    assert.equal(
      quoted,
      "On Mon, 02 Mar 2026 09:00:00 GMT, Jamie <jamie@acme.example> wrote:\n> Sounds good.\n> What next?"
    );
  });

  it("omits the date when unknown", () => {
    assert.equal(quoteOriginalMessage({ body: "Hi", from: "jamie@acme.example", date: null }), "jamie@acme.example wrote:\n> Hi");
  });
});

describe("composeReplyBody", () => {
  it("puts the new content above the quote", () => {
    assert.equal(
      composeReplyBody("Thanks!\n\n", { body: "Hi", from: "jamie@acme.example", date: null }),
      "Thanks!\n\njamie@acme.example wrote:\n> Hi"
    );
  });
});
