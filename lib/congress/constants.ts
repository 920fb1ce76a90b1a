/**
 * Code tables for congress bill XML.
 */

// Bill types: XML code (also the file name / URL slug prefix) → display label
export const BILL_TYPES = {
  HR: { xmlCode: "hr", label: "H.R." },
  S: { xmlCode: "s", label: "S." },
  HRES: { xmlCode: "hres", label: "H.Res." },
  SRES: { xmlCode: "sres", label: "S.Res." },
  HJRES: { xmlCode: "hjres", label: "H.J.Res." },
  SJRES: { xmlCode: "sjres", label: "S.J.Res." },
  HCONRES: { xmlCode: "hconres", label: "H.Con.Res." },
  SCONRES: { xmlCode: "sconres", label: "S.Con.Res." },
} as const;

export type BillType = keyof typeof BILL_TYPES;

export const BILL_TYPE_VALUES = [
  "HR",
  "S",
  "HRES",
  "SRES",
  "HJRES",
  "SJRES",
  "HCONRES",
  "SCONRES",
] as const satisfies readonly BillType[];

const BILL_TYPE_BY_XML_CODE: ReadonlyMap<string, BillType> = new Map(
  BILL_TYPE_VALUES.map((type): [string, BillType] => [
    BILL_TYPES[type].xmlCode,
    type,
  ])
);

/**
 * Resolve a bill type from its XML code ("hr", "sjres", ...).
 * Returns undefined for unknown codes.
 */
export function billTypeByXmlCode(code: string): BillType | undefined {
  return BILL_TYPE_BY_XML_CODE.get(code.trim().toLowerCase());
}

/**
 * "H.R. 1", "S.J.Res. 12"
 */
export function billDisplayNumber(billType: BillType, number: number): string {
  return `${BILL_TYPES[billType].label} ${number}`;
}

// Status vocabulary used by <state> and actions/*[@state]
export const BILL_STATUSES = [
  "INTRODUCED",
  "REFERRED",
  "REPORTED",
  "PASS_OVER:HOUSE",
  "PASS_OVER:SENATE",
  "PASSED:SIMPLERES",
  "PASSED:CONSTAMEND",
  "PASSED:CONCURRENTRES",
  "PASSED:BILL",
  "PASS_BACK:HOUSE",
  "PASS_BACK:SENATE",
  "PROV_KILL:SUSPENSIONFAILED",
  "PROV_KILL:CLOTUREFAILED",
  "PROV_KILL:PINGPONGFAIL",
  "PROV_KILL:VETO",
  "FAIL:ORIGINATING:HOUSE",
  "FAIL:ORIGINATING:SENATE",
  "FAIL:SECOND:HOUSE",
  "FAIL:SECOND:SENATE",
  "OVERRIDE_PASS_OVER:HOUSE",
  "OVERRIDE_PASS_OVER:SENATE",
  "VETOED:POCKET",
  "VETOED:OVERRIDE_FAIL_ORIGINATING:HOUSE",
  "VETOED:OVERRIDE_FAIL_ORIGINATING:SENATE",
  "VETOED:OVERRIDE_FAIL_SECOND:HOUSE",
  "VETOED:OVERRIDE_FAIL_SECOND:SENATE",
  "ENACTED:SIGNED",
  "ENACTED:VETO_OVERRIDE",
  "ENACTED:TENDAYRULE",
] as const;

export type BillStatus = (typeof BILL_STATUSES)[number];

const BILL_STATUS_SET: ReadonlySet<string> = new Set(BILL_STATUSES);

function isBillStatus(value: string): value is BillStatus {
  return BILL_STATUS_SET.has(value);
}

export function billStatusByXmlCode(code: string): BillStatus | undefined {
  const normalized = code.trim().toUpperCase();
  return isBillStatus(normalized) ? normalized : undefined;
}

// Subject-term classification schemes
export const TERM_TYPES = ["old", "new"] as const;
export type TermType = (typeof TERM_TYPES)[number];

// First congress indexed with the post-reform subject scheme
export const NEW_TERM_SCHEME_CONGRESS = 111;

export function termTypeForCongress(congress: number): TermType {
  return congress >= NEW_TERM_SCHEME_CONGRESS ? "new" : "old";
}

export const TAXONOMY_FILES: Record<TermType, readonly string[]> = {
  old: ["liv.xml"],
  new: ["liv111.xml", "crsnet.xml"],
};
