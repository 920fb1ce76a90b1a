import { expect, test } from "@playwright/test";
import type { Collaborators } from "@/lib/congress/collaborators";
import {
  applyHouseFloorSchedule,
  parseFloorItems,
  parseLegisNum,
} from "@/lib/congress/floor-schedule";
import type { Bill, BillDraft } from "@/lib/congress/types";
import { MemoryCongressStore, recordingLogger } from "./memory-store";

test.describe("parseLegisNum", () => {
  test("reads plain bill numbers of every label", () => {
    expect(parseLegisNum("H.R. 1234")).toEqual({ billType: "HR", number: 1234 });
    expect(parseLegisNum("S. 5")).toEqual({ billType: "S", number: 5 });
    expect(parseLegisNum("H.Res. 88")).toEqual({ billType: "HRES", number: 88 });
    expect(parseLegisNum("H.J.Res. 3")).toEqual({ billType: "HJRES", number: 3 });
    expect(parseLegisNum("S.Con.Res. 14")).toEqual({
      billType: "SCONRES",
      number: 14,
    });
  });

  test("accepts loose spacing and missing periods", () => {
    expect(parseLegisNum("H. R. 1234")).toEqual({ billType: "HR", number: 1234 });
    expect(parseLegisNum("HRES 7")).toEqual({ billType: "HRES", number: 7 });
  });

  test("strips amendment prefixes and conference report suffix", () => {
    expect(parseLegisNum("Senate Amendment to H.R. 5")).toEqual({
      billType: "HR",
      number: 5,
    });
    expect(parseLegisNum("Concur in the Senate Amendment to H.R. 6")).toEqual({
      billType: "HR",
      number: 6,
    });
    expect(parseLegisNum("H.R. 2 [Conference Report]")).toEqual({
      billType: "HR",
      number: 2,
    });
  });

  test("returns null for anything else", () => {
    expect(parseLegisNum("Motion to go to conference")).toBeNull();
    expect(parseLegisNum("H.R.")).toBeNull();
  });
});

const SCHEDULE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<floorschedule week-date="2024-03-04">
  <category type="suspension">
    <floor-items>
      <floor-item add-date="2024-03-01T16:12:00Z">
        <legis-num>H.R. 1234</legis-num>
        <floor-text>Test Facilities Act</floor-text>
      </floor-item>
      <floor-item add-date="2024-03-01T16:15:00Z">
        <legis-num>H.R. 4321</legis-num>
      </floor-item>
      <floor-item add-date="2024-03-01T16:20:00Z">
        <legis-num>Motion to go to conference</legis-num>
      </floor-item>
      <floor-item add-date="soon">
        <legis-num>H.Res. 9</legis-num>
      </floor-item>
    </floor-items>
  </category>
</floorschedule>`;

function draft(billType: BillDraft["billType"], number: number): BillDraft {
  return {
    congress: 118,
    billType,
    number,
    title: `${billType} ${number}`,
    titles: [],
    introducedDate: new Date("2024-01-10T00:00:00Z"),
    currentStatus: "REPORTED",
    currentStatusDate: new Date("2024-02-01T00:00:00Z"),
    sponsorId: null,
    sponsorRoleId: null,
    majorActions: [],
    docsHouseGovPostdate: null,
    senateFloorSchedulePostdate: null,
  };
}

test("parseFloorItems reads legis-num and add-date", () => {
  expect(parseFloorItems(SCHEDULE_XML, "floor.xml")).toEqual([
    { legisNum: "H.R. 1234", addDate: "2024-03-01T16:12:00Z" },
    { legisNum: "H.R. 4321", addDate: "2024-03-01T16:15:00Z" },
    { legisNum: "Motion to go to conference", addDate: "2024-03-01T16:20:00Z" },
    { legisNum: "H.Res. 9", addDate: "soon" },
  ]);
});

test("applyHouseFloorSchedule stamps known bills and logs the rest", async () => {
  const store = new MemoryCongressStore();
  const scheduled = await store.saveBill(draft("HR", 1234));
  await store.saveBill(draft("HRES", 9));
  const indexed: Bill[] = [];
  const collaborators: Collaborators = {
    searchIndex: {
      updateObject: async (bill) => {
        indexed.push(bill);
      },
    },
    events: null,
  };
  const { lines, logger } = recordingLogger();

  const result = await applyHouseFloorSchedule(SCHEDULE_XML, {
    store,
    currentCongress: 118,
    collaborators,
    logger,
  });

  expect(result).toEqual({ updated: 1, failed: 3 });
  expect(
    store.bills.get(scheduled.id)?.docsHouseGovPostdate?.toISOString()
  ).toBe("2024-03-01T16:12:00.000Z");
  expect(indexed.map((bill) => bill.id)).toEqual([scheduled.id]);
  expect(lines.error).toEqual([
    'Could not find bill "H.R. 4321" in docs.house.gov.',
    'Could not parse legis-num "Motion to go to conference" in docs.house.gov.',
    'Could not parse add-date "soon" for "H.Res. 9" in docs.house.gov.',
  ]);
});
