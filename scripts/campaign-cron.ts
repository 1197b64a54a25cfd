/**
 * Entry point for the external scheduler.
 *
 * Run:
 *   npx tsx scripts/campaign-cron.ts drips        # daily: initial emails + due drips
 *   npx tsx scripts/campaign-cron.ts replies      # every 30 minutes: inbox check
 *   npx tsx scripts/campaign-cron.ts all
 *   npx tsx scripts/campaign-cron.ts status <contactId>
 *   npx tsx scripts/campaign-cron.ts stats
 */
import * as dotenv from "dotenv";
dotenv.config({ path: ".env.local" });
dotenv.config({ path: ".env" });

import { loadCampaignConfig } from "../lib/campaign-config";
import { runDripsCron } from "../lib/cron/drips";
import { runRepliesCron } from "../lib/cron/replies";
import { closeDb } from "../lib/db/client";
import { createDefaultCampaign } from "../lib/drip-campaign/campaign";

const COMMANDS = ["drips", "replies", "all", "status", "stats"] as const;
type Command = (typeof COMMANDS)[number];

function parseCommand(value: string | undefined): Command | null {
  return COMMANDS.find((command) => command === value) ?? null;
}

function printUsage() {
  console.log("Usage:");
  console.log("  npx tsx scripts/campaign-cron.ts drips|replies|all");
  console.log("  npx tsx scripts/campaign-cron.ts status <contactId>");
  console.log("  npx tsx scripts/campaign-cron.ts stats");
}

async function main(): Promise<number> {
  const command = parseCommand(process.argv[2]);
  if (!command) {
    printUsage();
    return 1;
  }

  const service = createDefaultCampaign(loadCampaignConfig());

  switch (command) {
    case "drips": {
      const result = await runDripsCron(service);
      return result.success ? 0 : 1;
    }
    case "replies": {
      const result = await runRepliesCron(service);
      return result.success ? 0 : 1;
    }
    case "all": {
      const drips = await runDripsCron(service);
      const replies = await runRepliesCron(service);
      return drips.success && replies.success ? 0 : 1;
    }
    case "status": {
      const contactId = Number.parseInt(process.argv[3] || "", 10);
      if (!Number.isFinite(contactId)) {
        printUsage();
        return 1;
      }
      const status = await service.getDripStatus(contactId);
      if (!status) {
        console.error(`Contact ${contactId} not found`);
        return 1;
      }
      console.log(JSON.stringify(status, null, 2));
      return 0;
    }
    case "stats": {
      console.log(JSON.stringify(await service.getCampaignStats(), null, 2));
      return 0;
    }
  }
}

main()
  .then(async (code) => {
    await closeDb();
    process.exit(code);
  })
  .catch(async (error) => {
    console.error("[Cron] Fatal:", error);
    await closeDb().catch((closeError) => console.error("[DB] Failed to close pool:", closeError));
    process.exit(1);
  });
