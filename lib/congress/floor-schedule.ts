/**
 * House floor schedule (docs.house.gov weekly XML).
 *
 * Marks bills scheduled for the floor this week by stamping
 * docsHouseGovPostdate on the current-congress bill each floor item names:
 *
 *   <floorschedule week-date="2024-03-04">
 *     <category type="suspension">
 *       <floor-items>
 *         <floor-item add-date="2024-03-01T16:12:00">
 *           <legis-num>H.R. 1234</legis-num>
 *         </floor-item>
 *       </floor-items>
 *     </category>
 *   </floorschedule>
 */

import { type Collaborators, notifyCollaborators } from "./collaborators";
import { BILL_TYPES, BILL_TYPE_VALUES, type BillType } from "./constants";
import { congressLogger, type Logger } from "./debug";
import { MappingError } from "./errors";
import type { CongressStore } from "./store";
import { parseXmlDateTime } from "./utils/dates";
import { attr, parseXmlDocument, select, stringValue } from "./xml";

export type FloorItem = {
  legisNum: string;
  addDate: string | undefined;
};

export type FloorScheduleResult = {
  updated: number;
  failed: number;
};

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// "H.R." matches "H.R.", "HR", "H. R." ...
function labelPattern(billType: BillType): string {
  return escapeRegex(BILL_TYPES[billType].label).replace(/\\\./g, "\\.?\\s*");
}

// Longer labels first so "H.Res." is not read as "H.R." + "es."
const LABEL_ORDER = [...BILL_TYPE_VALUES].sort(
  (a, b) => BILL_TYPES[b].label.length - BILL_TYPES[a].label.length
);

const LEGIS_NUM_REGEX = new RegExp(
  "^\\s*(?:Concur in the Senate Amendment to |Senate Amendment to )?(" +
    LABEL_ORDER.map(labelPattern).join("|") +
    ")(\\d+)\\s*(?:\\[Conference Report\\]\\s*)?$",
  "i"
);

const LABEL_REGEXES = LABEL_ORDER.map((billType) => ({
  billType,
  regex: new RegExp(`^${labelPattern(billType)}$`, "i"),
}));

/**
 * Parse a floor item's legis-num ("H.R. 1234", "Senate Amendment to H.R. 5")
 * into a bill type and number.
 */
export function parseLegisNum(
  legisNum: string
): { billType: BillType; number: number } | null {
  const match = LEGIS_NUM_REGEX.exec(legisNum);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  const label = match[1];
  const billType = LABEL_REGEXES.find(({ regex }) => regex.test(label))?.billType;
  if (!billType) {
    return null;
  }
  return { billType, number: Number.parseInt(match[2], 10) };
}

export function parseFloorItems(xml: string, source: string): FloorItem[] {
  const root = parseXmlDocument(xml, source);
  return select(root, "category/floor-items/floor-item").map((item) => {
    const legisNumEl = select(item, "legis-num")[0];
    return {
      legisNum: legisNumEl ? stringValue(legisNumEl) : "",
      addDate: attr(item, "add-date"),
    };
  });
}

/**
 * Stamp docsHouseGovPostdate on every current-congress bill the schedule
 * lists. Entries that cannot be parsed or matched are logged and skipped.
 */
export async function applyHouseFloorSchedule(
  xml: string,
  deps: {
    store: CongressStore;
    currentCongress: number;
    collaborators: Collaborators;
    source?: string;
    logger?: Logger;
  }
): Promise<FloorScheduleResult> {
  const log = deps.logger ?? congressLogger("floor");
  const result: FloorScheduleResult = { updated: 0, failed: 0 };

  for (const item of parseFloorItems(xml, deps.source ?? "docs.house.gov")) {
    const parsed = parseLegisNum(item.legisNum);
    if (!parsed) {
      log.error('Could not parse legis-num "%s" in docs.house.gov.', item.legisNum);
      result.failed++;
      continue;
    }

    let postdate: Date;
    try {
      postdate = parseXmlDateTime(item.addDate ?? "", "floor-item/@add-date");
    } catch (error) {
      if (!(error instanceof MappingError)) {
        throw error;
      }
      log.error(
        'Could not parse add-date "%s" for "%s" in docs.house.gov.',
        item.addDate ?? "",
        item.legisNum
      );
      result.failed++;
      continue;
    }

    const bill = await deps.store.findBillByNaturalKey({
      congress: deps.currentCongress,
      ...parsed,
    });
    if (!bill) {
      log.error('Could not find bill "%s" in docs.house.gov.', item.legisNum);
      result.failed++;
      continue;
    }

    bill.docsHouseGovPostdate = postdate;
    const saved = await deps.store.saveBill(bill);
    await notifyCollaborators(deps.collaborators, saved);
    result.updated++;
  }

  return result;
}
