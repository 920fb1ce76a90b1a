/**
 * Persistence port used by the reconcilers.
 *
 * The production implementation is DrizzleCongressStore
 * (lib/db/congress/queries.ts); tests use an in-memory store.
 */

import type { TermType } from "./constants";
import type {
  Bill,
  BillDraft,
  BillNaturalKey,
  Committee,
  Cosponsor,
  NewCosponsor,
  NewRelatedBill,
  NewTerm,
  Person,
  RelatedBill,
  Term,
} from "./types";

export type CongressStore = {
  // Reference data
  listPeople(): Promise<Person[]>;
  findCommitteeByCode(code: string): Promise<Committee | null>;

  // Subject terms
  listTerms(termTypes?: readonly TermType[]): Promise<Term[]>;
  /**
   * @throws DuplicateTermError when (termType, nameNormalized) already exists
   */
  insertTerm(term: NewTerm): Promise<Term>;
  setTermParent(termId: string, parentId: string | null): Promise<void>;
  deleteTerms(termIds: readonly string[]): Promise<number>;

  // Bills
  findBillByNaturalKey(key: BillNaturalKey): Promise<Bill | null>;
  saveBill(bill: BillDraft): Promise<Bill>;
  replaceBillCommittees(
    billId: string,
    committeeIds: readonly string[]
  ): Promise<void>;
  replaceBillTerms(billId: string, termIds: readonly string[]): Promise<void>;
  replaceRelatedBills(
    billId: string,
    related: readonly NewRelatedBill[]
  ): Promise<RelatedBill[]>;

  // Cosponsors
  findCosponsor(personId: number, billId: string): Promise<Cosponsor | null>;
  insertCosponsor(cosponsor: NewCosponsor): Promise<Cosponsor>;
  updateCosponsorDates(
    cosponsorId: string,
    dates: { joined: Date; withdrawn: Date | null }
  ): Promise<void>;
};
