/**
 * Collaborators notified after a bill is reconciled.
 * Their behaviour is owned elsewhere; the importer only calls them.
 */

import type { Logger } from "./debug";
import type { Bill } from "./types";

export type SearchIndex = {
  updateObject(bill: Bill): Promise<void>;
};

export type EventGenerator = {
  createEvents(bill: Bill): Promise<void>;
};

export type Collaborators = {
  searchIndex: SearchIndex | null;
  events: EventGenerator | null;
};

/**
 * Run whichever collaborators are enabled for a bill, index first.
 * Returns false when none is enabled.
 */
export async function notifyCollaborators(
  collaborators: Collaborators,
  bill: Bill
): Promise<boolean> {
  const { searchIndex, events } = collaborators;
  if (searchIndex) {
    await searchIndex.updateObject(bill);
  }
  if (events) {
    await events.createEvents(bill);
  }
  return searchIndex !== null || events !== null;
}

/**
 * Stand-ins used by the CLI until a search backend and event feed exist:
 * they record the call in the log and do nothing else.
 */
export function loggingCollaborators(log: Logger): {
  searchIndex: SearchIndex;
  events: EventGenerator;
} {
  return {
    searchIndex: {
      updateObject: async (bill) => {
        log.debug("index %s (%s)", bill.title, bill.id);
      },
    },
    events: {
      createEvents: async (bill) => {
        log.debug("events for %s (%s)", bill.title, bill.id);
      },
    },
  };
}
