import type { InferSelectModel } from "drizzle-orm";
import {
  type AnyPgColumn,
  date,
  index,
  integer,
  jsonb,
  pgSchema,
  primaryKey,
  text,
  timestamp,
  unique,
  varchar,
} from "drizzle-orm/pg-core";
import { nanoid } from "nanoid";
import {
  BILL_STATUSES,
  BILL_TYPE_VALUES,
  TERM_TYPES,
} from "../../congress/constants";
import type { BillTitle, MajorAction } from "../../congress/types";

export const congressSchema = pgSchema("congress");

export const termTypeEnum = congressSchema.enum("term_type", TERM_TYPES);

export const billTypeEnum = congressSchema.enum("bill_type", BILL_TYPE_VALUES);

export const billStatusEnum = congressSchema.enum(
  "bill_status",
  BILL_STATUSES
);

/**
 * Members of Congress. Loaded by a separate people import; the bill
 * importer only reads them. The id is the numeric GovTrack identifier.
 */
export const people = congressSchema.table("people", {
  id: integer("id").primaryKey(),
  firstName: varchar("first_name", { length: 100 }).notNull(),
  lastName: varchar("last_name", { length: 100 }).notNull(),
});

export type PersonRow = InferSelectModel<typeof people>;

export const personRoles = congressSchema.table(
  "person_roles",
  {
    id: varchar("id", { length: 191 })
      .primaryKey()
      .$defaultFn(() => nanoid()),
    personId: integer("person_id")
      .notNull()
      .references(() => people.id, { onDelete: "cascade" }),
    // "representative", "senator", ...
    roleType: varchar("role_type", { length: 30 }).notNull(),
    party: varchar("party", { length: 50 }),
    state: varchar("state", { length: 2 }),
    district: integer("district"),
    startDate: date("start_date", { mode: "date" }).notNull(),
    // Null while the role is current
    endDate: date("end_date", { mode: "date" }),
  },
  (table) => [index("person_roles_person_id_idx").on(table.personId)]
);

export type PersonRoleRow = InferSelectModel<typeof personRoles>;

export const committees = congressSchema.table("committees", {
  id: varchar("id", { length: 191 })
    .primaryKey()
    .$defaultFn(() => nanoid()),
  // Thomas/GovTrack committee code, e.g. "HSAG"
  code: varchar("code", { length: 20 }).notNull().unique(),
  name: text("name").notNull(),
});

export type CommitteeRow = InferSelectModel<typeof committees>;

/**
 * Subject terms of both classification schemes. A subterm points at the
 * one top term that owns it.
 */
export const billTerms = congressSchema.table(
  "bill_terms",
  {
    id: varchar("id", { length: 191 })
      .primaryKey()
      .$defaultFn(() => nanoid()),
    name: text("name").notNull(),
    // Whitespace-collapsed, lowercased name; unique per scheme
    nameNormalized: text("name_normalized").notNull(),
    termType: termTypeEnum("term_type").notNull(),
    parentId: varchar("parent_id", { length: 191 }).references(
      (): AnyPgColumn => billTerms.id,
      { onDelete: "set null" }
    ),
  },
  (table) => [
    unique("bill_terms_term_type_name_unique").on(
      table.termType,
      table.nameNormalized
    ),
    index("bill_terms_parent_id_idx").on(table.parentId),
  ]
);

export type BillTermRow = InferSelectModel<typeof billTerms>;

export const bills = congressSchema.table(
  "bills",
  {
    id: varchar("id", { length: 191 })
      .primaryKey()
      .$defaultFn(() => nanoid()),
    congress: integer("congress").notNull(),
    billType: billTypeEnum("bill_type").notNull(),
    number: integer("number").notNull(),
    // Display title derived from titles
    title: text("title").notNull(),
    titles: jsonb("titles").$type<BillTitle[]>().notNull(),
    introducedDate: timestamp("introduced_date").notNull(),
    currentStatus: billStatusEnum("current_status").notNull(),
    currentStatusDate: timestamp("current_status_date").notNull(),
    sponsorId: integer("sponsor_id").references(() => people.id, {
      onDelete: "set null",
    }),
    sponsorRoleId: varchar("sponsor_role_id", { length: 191 }).references(
      () => personRoles.id,
      { onDelete: "set null" }
    ),
    majorActions: jsonb("major_actions").$type<MajorAction[]>().notNull(),
    // Written by the floor schedule imports only
    docsHouseGovPostdate: timestamp("docs_house_gov_postdate"),
    senateFloorSchedulePostdate: timestamp("senate_floor_schedule_postdate"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => [
    unique("bills_congress_type_number_unique").on(
      table.congress,
      table.billType,
      table.number
    ),
    index("bills_sponsor_id_idx").on(table.sponsorId),
    index("bills_current_status_idx").on(table.currentStatus),
  ]
);

export type BillRow = InferSelectModel<typeof bills>;

export const billCommittees = congressSchema.table(
  "bill_committees",
  {
    billId: varchar("bill_id", { length: 191 })
      .notNull()
      .references(() => bills.id, { onDelete: "cascade" }),
    committeeId: varchar("committee_id", { length: 191 })
      .notNull()
      .references(() => committees.id, { onDelete: "cascade" }),
  },
  (table) => [primaryKey({ columns: [table.billId, table.committeeId] })]
);

export const billSubjectTerms = congressSchema.table(
  "bill_subject_terms",
  {
    billId: varchar("bill_id", { length: 191 })
      .notNull()
      .references(() => bills.id, { onDelete: "cascade" }),
    termId: varchar("term_id", { length: 191 })
      .notNull()
      .references(() => billTerms.id, { onDelete: "cascade" }),
  },
  (table) => [
    primaryKey({ columns: [table.billId, table.termId] }),
    index("bill_subject_terms_term_id_idx").on(table.termId),
  ]
);

export const cosponsors = congressSchema.table(
  "cosponsors",
  {
    id: varchar("id", { length: 191 })
      .primaryKey()
      .$defaultFn(() => nanoid()),
    personId: integer("person_id")
      .notNull()
      .references(() => people.id, { onDelete: "cascade" }),
    billId: varchar("bill_id", { length: 191 })
      .notNull()
      .references(() => bills.id, { onDelete: "cascade" }),
    joined: timestamp("joined").notNull(),
    withdrawn: timestamp("withdrawn"),
    // Role the person held on the joined date
    roleId: varchar("role_id", { length: 191 }).references(
      () => personRoles.id,
      { onDelete: "set null" }
    ),
  },
  (table) => [
    unique("cosponsors_person_bill_unique").on(table.personId, table.billId),
    index("cosponsors_bill_id_idx").on(table.billId),
  ]
);

export type CosponsorRow = InferSelectModel<typeof cosponsors>;

export const relatedBills = congressSchema.table(
  "related_bills",
  {
    id: varchar("id", { length: 191 })
      .primaryKey()
      .$defaultFn(() => nanoid()),
    billId: varchar("bill_id", { length: 191 })
      .notNull()
      .references(() => bills.id, { onDelete: "cascade" }),
    relatedBillId: varchar("related_bill_id", { length: 191 })
      .notNull()
      .references(() => bills.id, { onDelete: "cascade" }),
    // "rule", "identical", "related", ...
    relation: varchar("relation", { length: 50 }),
  },
  (table) => [index("related_bills_bill_id_idx").on(table.billId)]
);

export type RelatedBillRow = InferSelectModel<typeof relatedBills>;
