import { getErrorMessage } from "@/lib/campaign-errors";
import type { CampaignService } from "@/lib/drip-campaign/campaign-service";
import type { ReplyIngestionResult } from "@/lib/drip-campaign/reply-ingestion";

export type RepliesCronResult = {
  success: boolean;
  errors: string[];
  replies: ReplyIngestionResult | null;
};

export async function runRepliesCron(service: Pick<CampaignService, "ingestReplies">): Promise<RepliesCronResult> {
  const errors: string[] = [];
  let replies: ReplyIngestionResult | null = null;

  console.log("[Cron] Checking replies...");
  try {
    replies = await service.ingestReplies();
    console.log("[Cron] Reply check complete:", {
      scanned: replies.scanned,
      newReplies: replies.newReplies,
      failed: replies.failed,
      responseFailures: replies.responseFailures,
    });
  } catch (error) {
    errors.push(`ingestReplies: ${getErrorMessage(error)}`);
    console.error("[Cron] Failed to check replies:", error);
  }

  return { success: errors.length === 0, errors, replies };
}
