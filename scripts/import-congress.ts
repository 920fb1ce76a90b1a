/**
 * Import congress bills and subject terms from GovTrack-style XML files
 *
 * Usage:
 *   npx tsx scripts/import-congress.ts [options]
 *
 * Options:
 *   --prod               Use production database (.env.production.local)
 *   --congress=N         Only bills of congress N (and the term scheme it uses)
 *   --filter=REGEX       Only bill files whose path starts with a match
 *   --force              Reprocess files even if unchanged since the last run
 *   --disable-indexing   Do not update the search index
 *   --disable-events     Do not create events
 *   --slow               Pause between bill documents
 *   --house-floor=PATH   Apply a docs.house.gov floor schedule XML file
 *   --reset-progress     Forget every recorded file signature before the run
 */

import { readFileSync } from "node:fs";
import { ChangeTracker } from "@/lib/congress/change-tracker";
import {
  type Collaborators,
  loggingCollaborators,
} from "@/lib/congress/collaborators";
import { loadImportConfig } from "@/lib/congress/config";
import { congressLogger } from "@/lib/congress/debug";
import { runIngest } from "@/lib/congress/ingest";
import { closeDb, getDb } from "@/lib/db/connection";
import { DrizzleCongressStore } from "@/lib/db/congress/queries";

// Parse command line arguments
const args = process.argv.slice(2);
const isProd = args.includes("--prod");
const congressArg = args.find((a) => a.startsWith("--congress="))?.split("=")[1];
// Keep everything after the first "=" so the regex may contain "="
const filterArg = args
  .find((a) => a.startsWith("--filter="))
  ?.slice("--filter=".length);
const houseFloorArg = args
  .find((a) => a.startsWith("--house-floor="))
  ?.slice("--house-floor=".length);
const force = args.includes("--force");
const disableIndexing = args.includes("--disable-indexing");
const disableEvents = args.includes("--disable-events");
const slow = args.includes("--slow");
const resetProgress = args.includes("--reset-progress");

function log(message: string): void {
  console.log(`[import] ${message}`);
}

function parseCongressArg(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const congress = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || congress <= 0) {
    console.error(`[import] Invalid --congress value: ${value}`);
    process.exit(1);
  }
  return congress;
}

let tracker: ChangeTracker | null = null;

async function main() {
  const config = loadImportConfig({ prod: isProd });
  const congress = parseCongressArg(congressArg);

  log("Starting congress import");
  if (isProd) {
    log("⚠️  PRODUCTION MODE - Using .env.production.local");
  }
  try {
    log(`Database host: ${new URL(config.postgresUrl).host}`);
  } catch {
    log("Database: (unable to parse URL)");
  }
  log(
    `Options: data=${config.dataDir}, congress=${congress ?? "all"}, filter=${filterArg ?? "none"}, force=${force}, indexing=${!disableIndexing}, events=${!disableEvents}, slow=${slow}, house-floor=${houseFloorArg ?? "none"}, reset-progress=${resetProgress}`
  );

  tracker = new ChangeTracker(config.changeTrackerPath);
  if (resetProgress) {
    tracker.clearAll();
    log("Change tracker cleared");
  }
  const store = new DrizzleCongressStore(getDb(config.postgresUrl));
  const collaborators: Collaborators = loggingCollaborators(
    congressLogger("collaborators")
  );

  const stats = await runIngest(
    {
      dataDir: config.dataDir,
      currentCongress: config.currentCongress,
      congress,
      filter: filterArg,
      force,
      disableIndexing,
      disableEvents,
      slow,
      houseFloor: houseFloorArg
        ? { xml: readFileSync(houseFloorArg, "utf-8"), source: houseFloorArg }
        : undefined,
    },
    { store, tracker, collaborators }
  );

  log("");
  log("=== Import Complete ===");
  log(
    `Terms: ${stats.terms.created} created, ${stats.terms.reused} reused, ${stats.terms.deleted} deleted, ${stats.terms.duplicates} duplicated, ${stats.terms.skipped} skipped`
  );
  log(`Files processed: ${stats.filesProcessed}`);
  log(`Files skipped: ${stats.filesSkipped}`);
  log(`Files failed: ${stats.filesFailed}`);
  log(`Bills created: ${stats.billsCreated}`);
  log(`Bills updated: ${stats.billsUpdated}`);
  if (stats.textReindexed > 0) {
    log(`Full texts re-indexed: ${stats.textReindexed}`);
  }
  if (stats.floor) {
    log(
      `House floor: ${stats.floor.updated} updated, ${stats.floor.failed} failed`
    );
  }

  tracker.close();
  await closeDb();
  process.exit(stats.filesFailed > 0 ? 1 : 0);
}

main().catch(async (error) => {
  console.error("Fatal error:", error);
  // Clean up connections on error
  tracker?.close();
  await closeDb();
  process.exit(1);
});
