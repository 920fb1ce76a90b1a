import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { expect, test } from "@playwright/test";
import { ChangeTracker } from "@/lib/congress/change-tracker";
import type { Collaborators } from "@/lib/congress/collaborators";
import { MalformedDocumentError } from "@/lib/congress/errors";
import {
  billTextPath,
  type IngestOptions,
  listBillFiles,
  runIngest,
} from "@/lib/congress/ingest";
import type { Person } from "@/lib/congress/types";
import { billXml, cosponsorsXml } from "./fixtures";

const UNKNOWN_STATUS =
  '<state datetime="2009-02-17T00:00:00Z">LOST_IN_COMMITTEE</state>';
import { MemoryCongressStore, recordingLogger } from "./memory-store";

let dataDir: string;
let tracker: ChangeTracker;

function write(relativePath: string, content: string): string {
  const path = join(dataDir, relativePath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

function member(id: number): Person {
  return {
    id,
    firstName: "Test",
    lastName: `Member ${id}`,
    roles: [
      {
        id: `role-${id}`,
        personId: id,
        roleType: "representative",
        party: null,
        state: "ZZ",
        district: 1,
        startDate: new Date("2009-01-06T00:00:00Z"),
        endDate: null,
      },
    ],
  };
}

function recordingCollaborators() {
  const calls: string[] = [];
  const collaborators: Collaborators = {
    searchIndex: {
      updateObject: async (bill) => {
        calls.push(`index ${bill.title}`);
      },
    },
    events: {
      createEvents: async (bill) => {
        calls.push(`events ${bill.title}`);
      },
    },
  };
  return { calls, collaborators };
}

function setup() {
  const store = new MemoryCongressStore();
  store.people = [member(400001), member(400002)];
  store.committees = [{ id: "c-hsap", code: "HSAP", name: "House Appropriations" }];
  const { calls, collaborators } = recordingCollaborators();
  const { lines, logger } = recordingLogger();
  const options: IngestOptions = {
    dataDir,
    currentCongress: 111,
    congress: 111,
  };
  const context = { store, tracker, collaborators, logger };
  return { store, calls, lines, options, context };
}

test.beforeEach(() => {
  dataDir = mkdtempSync(join(tmpdir(), "congress-data-"));
  tracker = new ChangeTracker(":memory:");
  write(
    "liv111.xml",
    `<liv><top-term value="Economics and public finance"/></liv>`
  );
  write("crsnet.xml", `<liv><top-term value="Taxation"/></liv>`);
  write("111/bills/hr1.xml", billXml());
  write("111/bills/hr2.xml", billXml({ number: "2", state: UNKNOWN_STATUS }));
});

test.afterEach(() => {
  tracker.close();
  rmSync(dataDir, { recursive: true, force: true });
});

test.describe("listBillFiles", () => {
  test("lists bill files per congress with their key", () => {
    write("110/bills/s10.xml", billXml({ session: "110", type: "s", number: "10" }));
    write("111/bills/notes.txt", "not a bill");

    const files = listBillFiles(dataDir);

    expect(
      files.map((f) => [f.congress, f.code, f.billType, f.number])
    ).toEqual([
      [110, "s", "S", 10],
      [111, "hr", "HR", 1],
      [111, "hr", "HR", 2],
    ]);
  });

  test("anchors the filter at the start of the path", () => {
    expect(listBillFiles(dataDir, { filter: "hr1" })).toEqual([]);
    expect(
      listBillFiles(dataDir, { filter: ".*/hr1\\.xml" }).map((f) => f.number)
    ).toEqual([1]);
  });

  test("builds the full-text path from the bill key", () => {
    const [file] = listBillFiles(dataDir, { congress: 111 });
    expect(file && billTextPath(dataDir, file)).toBe(
      join(dataDir, "bills.text", "111", "hr", "hr1.txt")
    );
  });
});

test.describe("runIngest", () => {
  test("reconciles changed files and records only successes", async () => {
    const { store, calls, lines, options, context } = setup();

    const stats = await runIngest(options, context);

    expect(stats).toMatchObject({
      filesProcessed: 1,
      filesSkipped: 0,
      filesFailed: 1,
      billsCreated: 1,
      billsUpdated: 0,
      textReindexed: 0,
      floor: null,
    });
    expect(stats.terms.created).toBe(2);
    const bill = await store.findBillByNaturalKey({
      congress: 111,
      billType: "HR",
      number: 1,
    });
    expect(bill?.sponsorId).toBe(400001);
    expect(bill && store.billTerms.get(bill.id)).toHaveLength(1);
    expect(calls).toEqual([
      "index H.R. 1: Recovery Test Act of 2009",
      "events H.R. 1: Recovery Test Act of 2009",
    ]);
    expect(tracker.isChanged(join(dataDir, "111/bills/hr1.xml"))).toBe(false);
    expect(tracker.isChanged(join(dataDir, "111/bills/hr2.xml"))).toBe(true);
    expect(lines.error).toEqual([
      `Error in processing ${join(dataDir, "111/bills/hr2.xml")}: Invalid value "LOST_IN_COMMITTEE" for state (unknown bill status)`,
    ]);
  });

  test("imports a bill whose only cosponsor is unknown and undated", async () => {
    const { store, lines, options, context } = setup();
    write(
      "111/bills/hr3.xml",
      billXml({ number: "3", cosponsors: cosponsorsXml([{ id: "999999" }]) })
    );

    const stats = await runIngest(options, context);

    expect(stats.billsCreated).toBe(2);
    expect(stats.filesFailed).toBe(1);
    const bill = await store.findBillByNaturalKey({
      congress: 111,
      billType: "HR",
      number: 3,
    });
    expect(bill?.title).toBe("H.R. 3: Recovery Test Act of 2009");
    expect(lines.error).toHaveLength(1);
  });

  test("drops the tracker record of a file that fails to map", async () => {
    const { options, context } = setup();
    const stale = new ChangeTracker(":memory:", () => "same");
    const failing = join(dataDir, "111/bills/hr2.xml");
    stale.save(failing);

    await runIngest(options, { ...context, tracker: stale });

    expect(stale.isChanged(failing)).toBe(true);
    stale.close();
  });

  test("skips unchanged files on the next run without writing", async () => {
    const { store, calls, options, context } = setup();
    await runIngest(options, context);
    calls.length = 0;
    const writesBefore = { ...store.writes };

    const stats = await runIngest(options, context);

    expect(stats.filesSkipped).toBe(1);
    expect(stats.filesProcessed).toBe(0);
    expect(stats.filesFailed).toBe(1);
    expect(calls).toEqual([]);
    expect(store.writes).toEqual(writesBefore);
  });

  test("imports an unchanged file again when its bill is not stored", async () => {
    const first = setup();
    await runIngest(first.options, first.context);
    const { store, options, context } = setup();

    const stats = await runIngest(options, context);

    expect(stats.filesSkipped).toBe(0);
    expect(stats.filesProcessed).toBe(1);
    expect(stats.billsCreated).toBe(1);
    expect(store.bills.size).toBe(1);
  });

  test("notifies collaborators when an unchanged bill's full text changes", async () => {
    const { calls, options, context } = setup();
    await runIngest(options, context);
    calls.length = 0;
    write("bills.text/111/hr/hr1.txt", "SEC. 1. SHORT TITLE.");

    const stats = await runIngest(options, context);
    const again = await runIngest(options, context);

    expect(stats.textReindexed).toBe(1);
    expect(calls).toEqual([
      "index H.R. 1: Recovery Test Act of 2009",
      "events H.R. 1: Recovery Test Act of 2009",
    ]);
    expect(again.textReindexed).toBe(0);
  });

  test("full-text changes reach events when indexing is disabled", async () => {
    const { calls, options, context } = setup();
    await runIngest(options, context);
    calls.length = 0;
    write("bills.text/111/hr/hr1.txt", "SEC. 1. SHORT TITLE.");

    const stats = await runIngest(
      { ...options, disableIndexing: true },
      context
    );

    expect(stats.textReindexed).toBe(1);
    expect(calls).toEqual(["events H.R. 1: Recovery Test Act of 2009"]);
  });

  test("force reprocesses unchanged files", async () => {
    const { store, options, context } = setup();
    await runIngest(options, context);

    const stats = await runIngest({ ...options, force: true }, context);

    expect(stats.filesSkipped).toBe(0);
    expect(stats.billsUpdated).toBe(1);
    expect(store.bills.size).toBe(1);
  });

  test("disabled collaborators are not called", async () => {
    const { calls, options, context } = setup();

    await runIngest(
      { ...options, disableIndexing: true, disableEvents: true },
      context
    );

    expect(calls).toEqual([]);
  });

  test("pauses after each reconciled document in slow mode", async () => {
    const { options, context } = setup();
    const pauses: number[] = [];

    await runIngest(
      { ...options, slow: true },
      {
        ...context,
        pause: async (ms) => {
          pauses.push(ms);
        },
      }
    );

    expect(pauses).toEqual([1000]);
  });

  test("aborts the run on a malformed bill file", async () => {
    const { options, context } = setup();
    write("111/bills/hr3.xml", "<bill session='111'><titles></bill>");

    await expect(runIngest(options, context)).rejects.toThrow(
      MalformedDocumentError
    );
  });

  test("applies the House floor schedule after the bill pass", async () => {
    const { store, options, context } = setup();
    const xml = `<floorschedule><category><floor-items>
      <floor-item add-date="2009-02-10T09:00:00Z"><legis-num>H.R. 1</legis-num></floor-item>
    </floor-items></category></floorschedule>`;

    const stats = await runIngest(
      { ...options, houseFloor: { xml, source: "floor.xml" } },
      context
    );

    expect(stats.floor).toEqual({ updated: 1, failed: 0 });
    const bill = await store.findBillByNaturalKey({
      congress: 111,
      billType: "HR",
      number: 1,
    });
    expect(bill?.docsHouseGovPostdate?.toISOString()).toBe(
      "2009-02-10T09:00:00.000Z"
    );
  });
});
