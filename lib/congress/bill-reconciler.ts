/**
 * Per-document bill reconciliation.
 *
 * A parsed bill is upserted on its natural key (congress, type, number) and
 * each relationship collection is rewritten to match the document:
 *
 * - committees, subject terms: replaced as sets
 * - related bills: all rows for the bill deleted and recreated
 * - cosponsors: get-or-create, dates updated only when they changed; a
 *   known cosponsor with unreadable dates is logged and left out
 * - major actions: replaced as an ordered list
 *
 * Reconciling the same document twice leaves the same rows behind.
 */

import {
  BillMapper,
  type ParsedBill,
  parseCosponsorDates,
} from "./bill-mapper";
import { billDisplayNumber } from "./constants";
import { congressLogger, type Logger } from "./debug";
import { MappingError } from "./errors";
import type { PersonCache, TermCache } from "./reference-cache";
import type { CongressStore } from "./store";
import type { Bill, BillDraft, NewRelatedBill } from "./types";
import { sameInstant } from "./utils/dates";
import { roleAtDate } from "./utils/roles";
import type { XmlElement } from "./xml";

export type BillReconcileOutcome = "created" | "updated";

export type CosponsorStats = {
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
};

export type BillReconcileResult = {
  bill: Bill;
  outcome: BillReconcileOutcome;
  committees: number;
  terms: number;
  relatedBills: number;
  cosponsors: CosponsorStats;
};

function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

export class BillReconciler {
  private readonly store: CongressStore;
  private readonly people: PersonCache;
  private readonly terms: TermCache;
  private readonly mapper: BillMapper;
  private readonly log: Logger;

  constructor(deps: {
    store: CongressStore;
    people: PersonCache;
    terms: TermCache;
    mapper?: BillMapper;
    logger?: Logger;
  }) {
    this.store = deps.store;
    this.people = deps.people;
    this.terms = deps.terms;
    this.mapper = deps.mapper ?? new BillMapper();
    this.log = deps.logger ?? congressLogger("bills");
  }

  /**
   * Map and reconcile a <bill> element.
   *
   * @throws MappingError before any write when the document is incomplete
   */
  async reconcileElement(node: XmlElement): Promise<BillReconcileResult> {
    return this.reconcile(this.mapper.parse(node));
  }

  async reconcile(parsed: ParsedBill): Promise<BillReconcileResult> {
    const { sponsorId, sponsorRoleId } = await this.resolveSponsor(parsed);

    // Adopt the stored identity so the write below is an update
    const existing = await this.store.findBillByNaturalKey(parsed);
    const draft: BillDraft = {
      id: existing?.id,
      congress: parsed.congress,
      billType: parsed.billType,
      number: parsed.number,
      title: parsed.title,
      titles: parsed.titles,
      introducedDate: parsed.introducedDate,
      currentStatus: parsed.currentStatus,
      currentStatusDate: parsed.currentStatusDate,
      sponsorId,
      sponsorRoleId,
      majorActions: existing?.majorActions ?? [],
      docsHouseGovPostdate: existing?.docsHouseGovPostdate ?? null,
      senateFloorSchedulePostdate: existing?.senateFloorSchedulePostdate ?? null,
    };

    // Saved before relationships so they can reference the bill id
    let bill = await this.store.saveBill(draft);
    const outcome: BillReconcileOutcome = existing ? "updated" : "created";
    this.log.debug(
      "%s %s (%d)",
      outcome,
      billDisplayNumber(bill.billType, bill.number),
      bill.congress
    );

    const committees = await this.reconcileCommittees(bill, parsed);
    const terms = await this.reconcileTerms(bill, parsed);
    const relatedBills = await this.reconcileRelatedBills(bill, parsed);
    const cosponsors = await this.reconcileCosponsors(bill, parsed);

    bill.majorActions = parsed.majorActions;
    bill = await this.store.saveBill(bill);

    return { bill, outcome, committees, terms, relatedBills, cosponsors };
  }

  private async resolveSponsor(
    parsed: ParsedBill
  ): Promise<{ sponsorId: number | null; sponsorRoleId: string | null }> {
    if (parsed.sponsorId === null) {
      return { sponsorId: null, sponsorRoleId: null };
    }
    const sponsor = await this.people.find(parsed.sponsorId);
    if (!sponsor) {
      return { sponsorId: null, sponsorRoleId: null };
    }
    return {
      sponsorId: sponsor.id,
      sponsorRoleId: roleAtDate(sponsor, parsed.introducedDate)?.id ?? null,
    };
  }

  private async reconcileCommittees(
    bill: Bill,
    parsed: ParsedBill
  ): Promise<number> {
    const committeeIds: string[] = [];
    for (const code of parsed.committeeCodes) {
      const committee = await this.store.findCommitteeByCode(code);
      if (!committee) {
        this.log.error("Could not find committee %s", code);
        continue;
      }
      committeeIds.push(committee.id);
    }
    const ids = unique(committeeIds);
    await this.store.replaceBillCommittees(bill.id, ids);
    return ids.length;
  }

  private async reconcileTerms(bill: Bill, parsed: ParsedBill): Promise<number> {
    const termIds: string[] = [];
    for (const name of parsed.subjectNames) {
      const term = await this.terms.find(name, bill.congress);
      if (!term) {
        this.log.error("Could not find term [name: %s]", name);
        continue;
      }
      termIds.push(term.id);
    }
    const ids = unique(termIds);
    await this.store.replaceBillTerms(bill.id, ids);
    return ids.length;
  }

  // Targets outside the ingested corpus are expected, so misses are silent
  private async reconcileRelatedBills(
    bill: Bill,
    parsed: ParsedBill
  ): Promise<number> {
    const rows: NewRelatedBill[] = [];
    for (const ref of parsed.relatedBills) {
      const target = await this.store.findBillByNaturalKey(ref);
      if (!target) {
        continue;
      }
      rows.push({
        billId: bill.id,
        relatedBillId: target.id,
        relation: ref.relation,
      });
    }
    const created = await this.store.replaceRelatedBills(bill.id, rows);
    return created.length;
  }

  private async reconcileCosponsors(
    bill: Bill,
    parsed: ParsedBill
  ): Promise<CosponsorStats> {
    const stats: CosponsorStats = {
      created: 0,
      updated: 0,
      unchanged: 0,
      skipped: 0,
    };

    for (const ref of parsed.cosponsors) {
      // Cosponsor lists are best-effort; unknown people are skipped quietly
      const person = await this.people.find(ref.personId);
      if (!person) {
        continue;
      }

      let dates: { joined: Date; withdrawn: Date | null };
      try {
        dates = parseCosponsorDates(ref);
      } catch (error) {
        if (!(error instanceof MappingError)) {
          throw error;
        }
        this.log.error(
          "Skipping cosponsor %s of %s: %s",
          ref.personId,
          billDisplayNumber(bill.billType, bill.number),
          error.message
        );
        stats.skipped++;
        continue;
      }

      const existing = await this.store.findCosponsor(person.id, bill.id);
      if (!existing) {
        await this.store.insertCosponsor({
          personId: person.id,
          billId: bill.id,
          joined: dates.joined,
          withdrawn: dates.withdrawn,
          roleId: roleAtDate(person, dates.joined)?.id ?? null,
        });
        stats.created++;
        continue;
      }

      if (
        sameInstant(existing.joined, dates.joined) &&
        sameInstant(existing.withdrawn, dates.withdrawn)
      ) {
        stats.unchanged++;
        continue;
      }

      await this.store.updateCosponsorDates(existing.id, dates);
      stats.updated++;
    }

    return stats;
  }
}
