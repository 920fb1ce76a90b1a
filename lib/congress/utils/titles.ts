import { type BillType, billDisplayNumber } from "../constants";
import type { BillTitle } from "../types";

// Lower rank wins; unlisted title types rank after these
const TITLE_TYPE_RANK = new Map<string, number>([
  ["popular", 0],
  ["short", 1],
  ["official", 2],
]);
const UNRANKED = TITLE_TYPE_RANK.size;

/**
 * Pick the title a bill is displayed under.
 *
 * Titles are ranked popular > short > official > other; within a rank the
 * last one listed wins, since <titles> lists them in legislative order and
 * later stages supersede earlier ones. Titles without text are ignored.
 */
export function selectPrimaryTitle(titles: readonly BillTitle[]): BillTitle | null {
  let best: BillTitle | null = null;
  let bestRank = Number.POSITIVE_INFINITY;

  for (const title of titles) {
    if (!title.text?.trim()) {
      continue;
    }
    const rank = TITLE_TYPE_RANK.get(title.type?.toLowerCase() ?? "") ?? UNRANKED;
    if (rank <= bestRank) {
      best = title;
      bestRank = rank;
    }
  }

  return best;
}

/**
 * "H.R. 1: American Recovery and Reinvestment Act of 2009", or just the
 * display number when the bill has no usable title.
 */
export function getPrimaryBillTitle(
  billType: BillType,
  number: number,
  titles: readonly BillTitle[]
): string {
  const displayNumber = billDisplayNumber(billType, number);
  const primary = selectPrimaryTitle(titles);
  return primary?.text ? `${displayNumber}: ${primary.text.trim()}` : displayNumber;
}
