/**
 * Domain types for congress bill and subject-term records
 */

import type { BillStatus, BillType, TermType } from "./constants";

export type PersonRole = {
  id: string;
  personId: number;
  roleType: string; // "representative" | "senator" | ...
  party: string | null;
  state: string | null;
  district: number | null;
  startDate: Date;
  endDate: Date | null; // null while the role is current
};

export type Person = {
  id: number;
  firstName: string;
  lastName: string;
  roles: PersonRole[];
};

export type Committee = {
  id: string;
  code: string;
  name: string;
};

export type Term = {
  id: string;
  name: string;
  nameNormalized: string;
  termType: TermType;
  parentId: string | null;
};

export type NewTerm = Omit<Term, "id">;

/**
 * One <titles>/<title> entry, in document order
 */
export type BillTitle = {
  type: string | null; // "short" | "official" | "popular"
  as: string | null; // usage context, e.g. "introduced", "passed house"
  text: string | null;
};

export type MajorAction = {
  datetime: string; // ISO 8601
  status: BillStatus;
  text: string;
};

export type BillNaturalKey = {
  congress: number;
  billType: BillType;
  number: number;
};

export type Bill = BillNaturalKey & {
  id: string;
  title: string;
  titles: BillTitle[];
  introducedDate: Date;
  currentStatus: BillStatus;
  currentStatusDate: Date;
  sponsorId: number | null;
  sponsorRoleId: string | null;
  majorActions: MajorAction[];
  docsHouseGovPostdate: Date | null;
  senateFloorSchedulePostdate: Date | null;
};

/**
 * A bill about to be written: without an id it is inserted,
 * with one it replaces the stored row.
 */
export type BillDraft = Omit<Bill, "id"> & { id?: string };

export type Cosponsor = {
  id: string;
  personId: number;
  billId: string;
  joined: Date;
  withdrawn: Date | null;
  roleId: string | null;
};

export type NewCosponsor = Omit<Cosponsor, "id">;

export type RelatedBill = {
  id: string;
  billId: string;
  relatedBillId: string;
  relation: string | null;
};

export type NewRelatedBill = Omit<RelatedBill, "id">;
