import { getErrorMessage } from "@/lib/campaign-errors";
import type { CampaignService } from "@/lib/drip-campaign/campaign-service";
import type { DripRunResult } from "@/lib/drip-campaign/drip-engine";

export type DripsCronResult = {
  success: boolean;
  errors: string[];
  initial: DripRunResult | null;
  drips: DripRunResult | null;
};

/** Daily run: initial emails first, then the due drips. Each step runs even if the other fails. */
export async function runDripsCron(service: Pick<CampaignService, "processInitialEmails" | "processDrips">): Promise<DripsCronResult> {
  const errors: string[] = [];

  let initial: DripRunResult | null = null;
  let drips: DripRunResult | null = null;

  console.log("[Cron] Processing initial emails...");
  try {
    initial = await service.processInitialEmails();
    console.log("[Cron] Initial emails complete:", {
      processed: initial.processed,
      succeeded: initial.succeeded,
      failed: initial.failed,
      skipped: initial.skipped,
    });
  } catch (error) {
    errors.push(`processInitialEmails: ${getErrorMessage(error)}`);
    console.error("[Cron] Failed to process initial emails:", error);
  }

  console.log("[Cron] Processing drips...");
  try {
    drips = await service.processDrips();
    console.log("[Cron] Drips complete:", {
      processed: drips.processed,
      succeeded: drips.succeeded,
      failed: drips.failed,
      skipped: drips.skipped,
    });
  } catch (error) {
    errors.push(`processDrips: ${getErrorMessage(error)}`);
    console.error("[Cron] Failed to process drips:", error);
  }

  return { success: errors.length === 0, errors, initial, drips };
}
