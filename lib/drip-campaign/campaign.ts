import { createConversationFactory, createModelCall, getOpenAiClient } from "@/lib/ai/openai-client";
import { requireConfigValue, type CampaignConfig } from "@/lib/campaign-config";
import { createContentGenerator } from "@/lib/content-generator";
import { PgContactLedger } from "@/lib/contact-ledger/pg-ledger";
import { createConversationThreadStore } from "@/lib/conversation-threads";
import { getDb } from "@/lib/db/client";
import { createCampaignService, type CampaignService } from "@/lib/drip-campaign/campaign-service";
import { createDripEngine } from "@/lib/drip-campaign/drip-engine";
import { createReplyIngestion } from "@/lib/drip-campaign/reply-ingestion";
import { createImapInbox } from "@/lib/mail/imap-inbox";
import { createSmtpMailer, createSmtpTransport } from "@/lib/mail/smtp-mailer";
import { createMailer } from "@/lib/mail/types";
import { createReplyClassifier } from "@/lib/reply-classifier";

/** Wires the production collaborators: Postgres ledger, OpenAI, SMTP and IMAP. */
export function createDefaultCampaign(config: CampaignConfig): CampaignService {
  const ledger = new PgContactLedger(getDb(config.databaseUrl));

  const openai = getOpenAiClient(config.openai.apiKey);
  const call = createModelCall(openai, { timeoutMs: config.openai.timeoutMs });

  const address = requireConfigValue(config.mailbox.address, "EMAIL_ADDRESS");
  const password = requireConfigValue(config.mailbox.password, "EMAIL_PASSWORD");

  const mailer = createMailer(
    createSmtpMailer({
      transport: createSmtpTransport({ ...config.smtp, user: address, password }),
      fromAddress: address,
      fromName: config.sender.name || null,
      retry: config.mailRetry,
    }),
    createImapInbox({ ...config.imap, user: address, password, retry: config.mailRetry })
  );

  const generator = createContentGenerator({
    call,
    model: config.openai.model,
    sender: config.sender,
    bookingUrl: config.bookingUrl,
    vectorStoreId: config.openai.vectorStoreId,
    maxAttempts: config.openai.maxAttempts,
  });
  const threads = createConversationThreadStore(createConversationFactory(openai, { source: "drip-campaign" }));

  return createCampaignService({
    ledger,
    dripEngine: createDripEngine({ ledger, generator, mailer, threads, intervals: config.dripIntervalDays }),
    replyIngestion: createReplyIngestion({
      ledger,
      mailer,
      classifier: createReplyClassifier({ call, model: config.openai.model, maxAttempts: config.openai.maxAttempts }),
      generator,
      threads,
      mailboxAddress: address,
      lookbackHours: config.replyLookbackHours,
    }),
  });
}
