import { and, asc, eq, inArray } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { TermType } from "@/lib/congress/constants";
import { DuplicateTermError } from "@/lib/congress/errors";
import type { CongressStore } from "@/lib/congress/store";
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
  PersonRole,
  RelatedBill,
  Term,
} from "@/lib/congress/types";
import { getDb } from "../connection";
import {
  type BillRow,
  type BillTermRow,
  billCommittees,
  billSubjectTerms,
  billTerms,
  bills,
  committees,
  cosponsors,
  people,
  personRoles,
  relatedBills,
} from "./schema";

const UNIQUE_VIOLATION = "23505";

// drizzle wraps driver errors, so the PostgresError may sit in `cause`
function isUniqueViolation(error: unknown): boolean {
  if (error instanceof postgres.PostgresError) {
    return error.code === UNIQUE_VIOLATION;
  }
  return error instanceof Error && isUniqueViolation(error.cause);
}

function toTerm(row: BillTermRow): Term {
  return {
    id: row.id,
    name: row.name,
    nameNormalized: row.nameNormalized,
    termType: row.termType,
    parentId: row.parentId,
  };
}

function toBill(row: BillRow): Bill {
  return {
    id: row.id,
    congress: row.congress,
    billType: row.billType,
    number: row.number,
    title: row.title,
    titles: row.titles,
    introducedDate: row.introducedDate,
    currentStatus: row.currentStatus,
    currentStatusDate: row.currentStatusDate,
    sponsorId: row.sponsorId,
    sponsorRoleId: row.sponsorRoleId,
    majorActions: row.majorActions,
    docsHouseGovPostdate: row.docsHouseGovPostdate,
    senateFloorSchedulePostdate: row.senateFloorSchedulePostdate,
  };
}

/**
 * CongressStore over the congress Postgres schema.
 *
 * Relationship replacements run in a transaction so a bill never shows a
 * half-written committee, subject or related-bill set.
 */
export class DrizzleCongressStore implements CongressStore {
  private readonly db: PostgresJsDatabase;

  constructor(db: PostgresJsDatabase = getDb()) {
    this.db = db;
  }

  async listPeople(): Promise<Person[]> {
    const personRows = await this.db.select().from(people);
    const roleRows = await this.db
      .select()
      .from(personRoles)
      .orderBy(asc(personRoles.personId), asc(personRoles.startDate));

    const rolesByPerson = new Map<number, PersonRole[]>();
    for (const role of roleRows) {
      const roles = rolesByPerson.get(role.personId) ?? [];
      roles.push(role);
      rolesByPerson.set(role.personId, roles);
    }

    return personRows.map((row) => ({
      id: row.id,
      firstName: row.firstName,
      lastName: row.lastName,
      roles: rolesByPerson.get(row.id) ?? [],
    }));
  }

  async findCommitteeByCode(code: string): Promise<Committee | null> {
    const [row] = await this.db
      .select()
      .from(committees)
      .where(eq(committees.code, code))
      .limit(1);
    return row ?? null;
  }

  async listTerms(termTypes?: readonly TermType[]): Promise<Term[]> {
    if (termTypes && termTypes.length === 0) {
      return [];
    }
    const rows = termTypes
      ? await this.db
          .select()
          .from(billTerms)
          .where(inArray(billTerms.termType, [...termTypes]))
      : await this.db.select().from(billTerms);
    return rows.map(toTerm);
  }

  async insertTerm(term: NewTerm): Promise<Term> {
    try {
      const [row] = await this.db.insert(billTerms).values(term).returning();
      if (!row) {
        throw new Error(`Insert of term ${term.name} returned no row`);
      }
      return toTerm(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateTermError(term.termType, term.name);
      }
      throw error;
    }
  }

  async setTermParent(termId: string, parentId: string | null): Promise<void> {
    await this.db
      .update(billTerms)
      .set({ parentId })
      .where(eq(billTerms.id, termId));
  }

  async deleteTerms(termIds: readonly string[]): Promise<number> {
    if (termIds.length === 0) {
      return 0;
    }
    const deleted = await this.db
      .delete(billTerms)
      .where(inArray(billTerms.id, [...termIds]))
      .returning({ id: billTerms.id });
    return deleted.length;
  }

  async findBillByNaturalKey(key: BillNaturalKey): Promise<Bill | null> {
    const [row] = await this.db
      .select()
      .from(bills)
      .where(
        and(
          eq(bills.congress, key.congress),
          eq(bills.billType, key.billType),
          eq(bills.number, key.number)
        )
      )
      .limit(1);
    return row ? toBill(row) : null;
  }

  async saveBill(bill: BillDraft): Promise<Bill> {
    const { id, ...values } = bill;
    const [row] = await this.db
      .insert(bills)
      .values(id ? { id, ...values } : values)
      .onConflictDoUpdate({
        target: bills.id,
        set: { ...values, updatedAt: new Date() },
      })
      .returning();
    if (!row) {
      throw new Error(
        `Save of bill ${bill.billType}${bill.number} (${bill.congress}) returned no row`
      );
    }
    return toBill(row);
  }

  async replaceBillCommittees(
    billId: string,
    committeeIds: readonly string[]
  ): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(billCommittees).where(eq(billCommittees.billId, billId));
      if (committeeIds.length > 0) {
        await tx
          .insert(billCommittees)
          .values(committeeIds.map((committeeId) => ({ billId, committeeId })));
      }
    });
  }

  async replaceBillTerms(
    billId: string,
    termIds: readonly string[]
  ): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .delete(billSubjectTerms)
        .where(eq(billSubjectTerms.billId, billId));
      if (termIds.length > 0) {
        await tx
          .insert(billSubjectTerms)
          .values(termIds.map((termId) => ({ billId, termId })));
      }
    });
  }

  async replaceRelatedBills(
    billId: string,
    related: readonly NewRelatedBill[]
  ): Promise<RelatedBill[]> {
    return this.db.transaction(async (tx) => {
      await tx.delete(relatedBills).where(eq(relatedBills.billId, billId));
      if (related.length === 0) {
        return [];
      }
      return tx.insert(relatedBills).values([...related]).returning();
    });
  }

  async findCosponsor(
    personId: number,
    billId: string
  ): Promise<Cosponsor | null> {
    const [row] = await this.db
      .select()
      .from(cosponsors)
      .where(
        and(eq(cosponsors.personId, personId), eq(cosponsors.billId, billId))
      )
      .limit(1);
    return row ?? null;
  }

  async insertCosponsor(cosponsor: NewCosponsor): Promise<Cosponsor> {
    const [row] = await this.db
      .insert(cosponsors)
      .values(cosponsor)
      .returning();
    if (!row) {
      throw new Error(
        `Insert of cosponsor ${cosponsor.personId} on ${cosponsor.billId} returned no row`
      );
    }
    return row;
  }

  async updateCosponsorDates(
    cosponsorId: string,
    dates: { joined: Date; withdrawn: Date | null }
  ): Promise<void> {
    await this.db
      .update(cosponsors)
      .set(dates)
      .where(eq(cosponsors.id, cosponsorId));
  }
}
