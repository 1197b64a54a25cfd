import { z } from "zod";

import { getErrorMessage, isDuplicateContactError, type CampaignErrorCode } from "@/lib/campaign-errors";
import type { CampaignStats, Contact, ContactLedger } from "@/lib/contact-ledger/types";
import type { DripEngine, DripRunResult, DripStatusSnapshot } from "@/lib/drip-campaign/drip-engine";
import type { ReplyIngestion, ReplyIngestionResult } from "@/lib/drip-campaign/reply-ingestion";

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: { code: CampaignErrorCode | "not_found"; message: string } };

const optionalTrimmed = z.preprocess(
  (value) => (typeof value === "string" && value.trim() ? value.trim() : undefined),
  z.string().optional()
);

export const ContactProfileInputSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  email: z.string().trim().email("email must be a valid address"),
  companyName: optionalTrimmed,
  companyUrl: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? value.trim() : undefined),
    z.string().url("companyUrl must be a URL").optional()
  ),
  linkedin: optionalTrimmed,
  industry: optionalTrimmed,
});

export type ContactProfileInput = z.input<typeof ContactProfileInputSchema>;

export interface CampaignService {
  processInitialEmails(contactIds?: number[]): Promise<DripRunResult>;
  processDrips(): Promise<DripRunResult>;
  checkReplies(): Promise<number>;
  ingestReplies(): Promise<ReplyIngestionResult>;
  getDripStatus(contactId: number): Promise<DripStatusSnapshot | null>;
  registerContact(input: ContactProfileInput): Promise<ServiceResult<Contact>>;
  /** Registers the contact and sends its initial email right away. */
  registerAndStart(input: ContactProfileInput): Promise<ServiceResult<{ contact: Contact; initial: DripRunResult }>>;
  getCampaignStats(): Promise<CampaignStats>;
  recordBookingClick(contactId: number): Promise<ServiceResult<{ contactId: number }>>;
  deleteContact(contactId: number): Promise<ServiceResult<{ contactId: number }>>;
}

export type CampaignServiceDeps = {
  ledger: ContactLedger;
  dripEngine: DripEngine;
  replyIngestion: ReplyIngestion;
};

function notFound(contactId: number): ServiceResult<never> {
  return { success: false, error: { code: "not_found", message: `Contact ${contactId} not found` } };
}

export function createCampaignService(deps: CampaignServiceDeps): CampaignService {
  const service: CampaignService = {
    processInitialEmails: (contactIds) => deps.dripEngine.processInitialEmails(contactIds),
    processDrips: () => deps.dripEngine.processDrips(),
    checkReplies: () => deps.replyIngestion.checkReplies(),
    ingestReplies: () => deps.replyIngestion.ingestReplies(),
    getDripStatus: (contactId) => deps.dripEngine.getDripStatus(contactId),
    getCampaignStats: () => deps.ledger.getStats(),

    async registerContact(input) {
      const parsed = ContactProfileInputSchema.safeParse(input);
      if (!parsed.success) {
        const message = parsed.error.issues.map((issue) => issue.message).join("; ");
        return { success: false, error: { code: "invalid_contact", message } };
      }

      const profile = parsed.data;
      try {
        const contact = await deps.ledger.create({
          name: profile.name,
          email: profile.email,
          companyName: profile.companyName ?? null,
          companyUrl: profile.companyUrl ?? null,
          linkedin: profile.linkedin ?? null,
          industry: profile.industry ?? null,
        });
        console.log(`[Campaign] Registered contact ${contact.id} (${contact.email})`);
        return { success: true, data: contact };
      } catch (error) {
        if (isDuplicateContactError(error)) {
          return { success: false, error: { code: error.code, message: getErrorMessage(error) } };
        }
        throw error;
      }
    },

    async recordBookingClick(contactId) {
      const updated = await deps.ledger.recordBookingClick(contactId);
      if (!updated) return notFound(contactId);
      console.log(`[Campaign] Booking link clicked by contact ${contactId}`);
      return { success: true, data: { contactId } };
    },

    async deleteContact(contactId) {
      const deleted = await deps.ledger.deleteContact(contactId);
      if (!deleted) return notFound(contactId);
      console.log(`[Campaign] Deleted contact ${contactId} and its content history`);
      return { success: true, data: { contactId } };
    },

    async registerAndStart(input) {
      const registered = await service.registerContact(input);
      if (!registered.success) return registered;

      const initial = await deps.dripEngine.processInitialEmails([registered.data.id]);
      const contact = (await deps.ledger.findById(registered.data.id)) ?? registered.data;
      return { success: true, data: { contact, initial } };
    },
  };

  return service;
}
