/**
 * One import run: taxonomy pass, bill pass, then the optional House floor
 * schedule.
 *
 * Files are processed one at a time. A bill file whose signature matches the
 * ChangeTracker is skipped when its bill is stored (the collaborators only
 * run again if its full-text file changed); an unchanged file whose bill is
 * missing is imported again. A bill that fails to map is logged and its
 * tracker record dropped so the next run retries it; a malformed file
 * aborts the run.
 */

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { BillReconciler } from "./bill-reconciler";
import type { ChangeTracker } from "./change-tracker";
import { type Collaborators, notifyCollaborators } from "./collaborators";
import {
  type BillType,
  billTypeByXmlCode,
  TERM_TYPES,
  termTypeForCongress,
} from "./constants";
import { congressLogger, type Logger } from "./debug";
import { MappingError } from "./errors";
import {
  applyHouseFloorSchedule,
  type FloorScheduleResult,
} from "./floor-schedule";
import { PersonCache, TermCache } from "./reference-cache";
import type { CongressStore } from "./store";
import {
  type TermReconcileResult,
  TermReconciler,
  taxonomySources,
} from "./term-reconciler";
import type { Bill } from "./types";
import { parseXmlDocument } from "./xml";

const PROGRESS_EVERY = 100;
const SLOW_DELAY_MS = 1000;

const BILL_FILE_REGEX = /^([a-z]+)(\d+)\.xml$/;

export type IngestOptions = {
  dataDir: string;
  currentCongress: number;
  /** Only bills of this congress, and only the term scheme it uses */
  congress?: number;
  /** Regular expression matched at the start of each bill file path */
  filter?: string;
  /** Reprocess files even when their signature is unchanged */
  force?: boolean;
  disableIndexing?: boolean;
  disableEvents?: boolean;
  /** Pause between bill documents */
  slow?: boolean;
  houseFloor?: { xml: string; source: string };
};

export type IngestContext = {
  store: CongressStore;
  tracker: Pick<ChangeTracker, "isChanged" | "save" | "forget">;
  collaborators: Collaborators;
  logger?: Logger;
  pause?: (ms: number) => Promise<unknown>;
};

export type IngestStats = {
  terms: TermReconcileResult;
  filesProcessed: number;
  filesSkipped: number;
  filesFailed: number;
  billsCreated: number;
  billsUpdated: number;
  textReindexed: number;
  floor: FloorScheduleResult | null;
};

export type BillFile = {
  path: string;
  congress: number;
  /** XML code from the file name ("hr"), with its bill type when known */
  code: string;
  billType: BillType | undefined;
  number: number;
};

function listCongressDirs(dataDir: string): number[] {
  return readdirSync(dataDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && /^\d+$/.test(entry.name))
    .map((entry) => Number.parseInt(entry.name, 10))
    .sort((a, b) => a - b);
}

/**
 * Bill files under <dataDir>/<congress>/bills, congress by congress.
 */
export function listBillFiles(
  dataDir: string,
  options: { congress?: number; filter?: string } = {}
): BillFile[] {
  const congresses =
    options.congress === undefined
      ? listCongressDirs(dataDir)
      : [options.congress];
  const filter = options.filter
    ? new RegExp(`^(?:${options.filter})`)
    : null;

  const files: BillFile[] = [];
  for (const congress of congresses) {
    const dir = join(dataDir, String(congress), "bills");
    if (!existsSync(dir)) {
      continue;
    }
    for (const name of readdirSync(dir).sort()) {
      const match = BILL_FILE_REGEX.exec(name);
      if (!match?.[1] || !match[2]) {
        continue;
      }
      const path = join(dir, name);
      if (filter && !filter.test(path)) {
        continue;
      }
      files.push({
        path,
        congress,
        code: match[1],
        billType: billTypeByXmlCode(match[1]),
        number: Number.parseInt(match[2], 10),
      });
    }
  }
  return files;
}

export function billTextPath(dataDir: string, file: BillFile): string {
  return join(
    dataDir,
    "bills.text",
    String(file.congress),
    file.code,
    `${file.code}${file.number}.txt`
  );
}

/**
 * Run the taxonomy pass, the bill pass and, when given, the House floor
 * schedule.
 *
 * @throws MalformedDocumentError when any taxonomy or bill file is not
 *   well-formed XML
 */
export async function runIngest(
  options: IngestOptions,
  context: IngestContext
): Promise<IngestStats> {
  const log = context.logger ?? congressLogger("ingest");
  const pause = context.pause ?? sleep;
  const { store, tracker } = context;
  const collaborators: Collaborators = {
    searchIndex: options.disableIndexing
      ? null
      : context.collaborators.searchIndex,
    events: options.disableEvents ? null : context.collaborators.events,
  };

  const termTypes =
    options.congress === undefined
      ? TERM_TYPES
      : [termTypeForCongress(options.congress)];
  const terms = await new TermReconciler({ store, logger: log }).reconcile(
    taxonomySources(options.dataDir, termTypes)
  );
  log.info(
    "Terms: %d created, %d reused, %d deleted",
    terms.created,
    terms.reused,
    terms.deleted
  );

  // Populated after the taxonomy pass so new terms are visible to bills
  const people = new PersonCache(store);
  const termCache = new TermCache(store);
  await people.populate();
  await termCache.populate();

  const reconciler = new BillReconciler({
    store,
    people,
    terms: termCache,
    logger: log,
  });

  const stats: IngestStats = {
    terms,
    filesProcessed: 0,
    filesSkipped: 0,
    filesFailed: 0,
    billsCreated: 0,
    billsUpdated: 0,
    textReindexed: 0,
    floor: null,
  };

  const files = listBillFiles(options.dataDir, options);
  log.info("Found %d bill files to process", files.length);

  for (const [index, file] of files.entries()) {
    if (index > 0 && index % PROGRESS_EVERY === 0) {
      log.info(
        "Processed %d/%d bill files (%d skipped)",
        index,
        files.length,
        stats.filesSkipped
      );
    }

    if (!options.force && !tracker.isChanged(file.path)) {
      const stored = file.billType
        ? await store.findBillByNaturalKey({
            congress: file.congress,
            billType: file.billType,
            number: file.number,
          })
        : null;
      if (stored) {
        stats.filesSkipped++;
        const refreshed = await refreshChangedText(
          file,
          stored,
          options.dataDir,
          context,
          collaborators
        );
        if (refreshed) {
          stats.textReindexed++;
        }
        continue;
      }
      log.debug("%s is unchanged but its bill is not stored", file.path);
    }

    const root = parseXmlDocument(readFileSync(file.path, "utf-8"), file.path);
    try {
      const result = await reconciler.reconcileElement(root);
      if (result.outcome === "created") {
        stats.billsCreated++;
      } else {
        stats.billsUpdated++;
      }
      await notifyCollaborators(collaborators, result.bill);
    } catch (error) {
      if (!(error instanceof MappingError)) {
        throw error;
      }
      log.error("Error in processing %s: %s", file.path, error.message);
      tracker.forget(file.path);
      stats.filesFailed++;
      continue;
    }

    tracker.save(file.path);
    stats.filesProcessed++;

    if (options.slow) {
      await pause(SLOW_DELAY_MS);
    }
  }

  if (options.houseFloor) {
    stats.floor = await applyHouseFloorSchedule(options.houseFloor.xml, {
      store,
      currentCongress: options.currentCongress,
      collaborators,
      source: options.houseFloor.source,
      logger: log,
    });
  }

  return stats;
}

// An unchanged bill file can still have new full text for the collaborators
async function refreshChangedText(
  file: BillFile,
  bill: Bill,
  dataDir: string,
  context: IngestContext,
  collaborators: Collaborators
): Promise<boolean> {
  if (!collaborators.searchIndex && !collaborators.events) {
    return false;
  }
  const textPath = billTextPath(dataDir, file);
  if (!existsSync(textPath) || !context.tracker.isChanged(textPath)) {
    return false;
  }
  await notifyCollaborators(collaborators, bill);
  context.tracker.save(textPath);
  return true;
}
