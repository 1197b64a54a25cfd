import type { ConversationFactory } from "@/lib/ai/openai-client";
import type { Contact, LedgerSession } from "@/lib/contact-ledger/types";

export const THREAD_CREATED_SUBJECT = "Thread Created";

export interface ConversationThreadStore {
  /** The contact's model conversation id, created on first use. Null when creation fails. */
  getOrCreateThread(session: LedgerSession, contact: Pick<Contact, "id" | "email">): Promise<string | null>;
}

export function createConversationThreadStore(createConversation: ConversationFactory): ConversationThreadStore {
  return {
    async getOrCreateThread(session, contact) {
      const existing = await session.findThreadId(contact.id);
      if (existing) return existing;

      let threadId: string;
      try {
        threadId = await createConversation();
      } catch (error) {
        console.warn(`[ConversationThreads] Failed to create thread for contact ${contact.id} (${contact.email}):`, error);
        return null;
      }

      await session.recordContent(contact.id, {
        emailType: "thread_created",
        subject: THREAD_CREATED_SUBJECT,
        threadId,
      });
      console.log(`[ConversationThreads] Created thread ${threadId} for contact ${contact.id}`);
      return threadId;
    },
  };
}
