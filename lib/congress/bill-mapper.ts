/**
 * Bill document mapper.
 *
 * Turns a <bill> element into a ParsedBill without touching storage, so a
 * document that fails to map leaves the stored bill exactly as it was.
 *
 *   <bill session="111" type="hr" number="1">
 *     <introduced datetime="2009-01-26"/>
 *     <titles><title type="official" as="introduced">...</title></titles>
 *     <sponsor id="400001"/>
 *     <cosponsors><cosponsor id="400002" joined="2009-01-27"/></cosponsors>
 *     <actions><action datetime="..." state="REFERRED"><text>...</text></action></actions>
 *     <committees><committee code="HSAP"/></committees>
 *     <relatedbills><bill relation="rule" session="111" type="hres" number="88"/></relatedbills>
 *     <subjects><term name="Economics and public finance"/></subjects>
 *     <state datetime="2009-02-17">ENACTED:SIGNED</state>
 *   </bill>
 */

import {
  AttributeMapper,
  AttributeSchema,
  asCode,
  asInteger,
} from "./attribute-mapper";
import {
  type BillStatus,
  billStatusByXmlCode,
  billTypeByXmlCode,
} from "./constants";
import {
  MissingRequiredAttributeError,
  MissingRequiredElementError,
} from "./errors";
import type { BillNaturalKey, BillTitle, MajorAction } from "./types";
import {
  parseOptionalXmlDateTime,
  parseXmlDateTime,
} from "./utils/dates";
import { getPrimaryBillTitle } from "./utils/titles";
import {
  attr,
  childElements,
  describeElement,
  select,
  selectFirst,
  stringValue,
  type XmlElement,
} from "./xml";

/**
 * Cosponsor as listed in the document. Dates stay raw until the person is
 * resolved: an unknown cosponsor is dropped whatever its dates say.
 */
export type CosponsorRef = {
  personId: string;
  joined: string | null;
  withdrawn: string | null;
};

export type RelatedBillRef = BillNaturalKey & {
  relation: string | null;
};

export type ParsedBill = BillNaturalKey & {
  title: string;
  titles: BillTitle[];
  introducedDate: Date;
  currentStatus: BillStatus;
  currentStatusDate: Date;
  sponsorId: string | null;
  committeeCodes: string[];
  subjectNames: string[];
  relatedBills: RelatedBillRef[];
  cosponsors: CosponsorRef[];
  majorActions: MajorAction[];
};

const billSchema = AttributeSchema.for<ParsedBill>()
  .required("type", "billType", asCode(billTypeByXmlCode, "bill type"))
  .required("session", "congress", asInteger)
  .required("number", "number", asInteger);

const parseStatus = asCode(billStatusByXmlCode, "bill status");

function emptyParsedBill(): ParsedBill {
  return {
    congress: 0,
    billType: "HR",
    number: 0,
    title: "",
    titles: [],
    introducedDate: new Date(0),
    currentStatus: "INTRODUCED",
    currentStatusDate: new Date(0),
    sponsorId: null,
    committeeCodes: [],
    subjectNames: [],
    relatedBills: [],
    cosponsors: [],
    majorActions: [],
  };
}

function requireElement(node: XmlElement, path: string): XmlElement {
  const element = selectFirst(node, path);
  if (!element) {
    throw new MissingRequiredElementError(`${node.name}/${path}`);
  }
  return element;
}

function requireAttribute(element: XmlElement, name: string): string {
  const value = attr(element, name);
  if (value === undefined || value.trim() === "") {
    throw new MissingRequiredAttributeError(name, describeElement(element));
  }
  return value;
}

/**
 * @throws MappingError when joined is absent or either date is invalid
 */
export function parseCosponsorDates(ref: CosponsorRef): {
  joined: Date;
  withdrawn: Date | null;
} {
  if (ref.joined === null || ref.joined.trim() === "") {
    throw new MissingRequiredAttributeError(
      "joined",
      `<cosponsor id="${ref.personId}">`
    );
  }
  return {
    joined: parseXmlDateTime(ref.joined, "cosponsor/@joined"),
    withdrawn: parseOptionalXmlDateTime(
      ref.withdrawn ?? undefined,
      "cosponsor/@withdrawn"
    ),
  };
}

export class BillMapper extends AttributeMapper<ParsedBill> {
  constructor() {
    super(billSchema);
  }

  /**
   * Map a <bill> root element.
   *
   * @throws MappingError when a required attribute or element is missing
   *   or a coded value is unknown
   */
  parse(node: XmlElement): ParsedBill {
    if (node.name !== "bill") {
      throw new MissingRequiredElementError("bill");
    }
    return this.process(emptyParsedBill(), node);
  }

  override process(target: ParsedBill, node: XmlElement): ParsedBill {
    const bill = super.process(target, node);
    this.processTitles(bill, node);
    this.processIntroduced(bill, node);
    this.processCurrentStatus(bill, node);
    this.processSponsor(bill, node);
    this.processCommittees(bill, node);
    this.processSubjects(bill, node);
    this.processRelatedBills(bill, node);
    this.processCosponsors(bill, node);
    this.processActions(bill, node);
    return bill;
  }

  private processTitles(bill: ParsedBill, node: XmlElement): void {
    bill.titles = select(node, "titles/title").map((el) => ({
      type: attr(el, "type") ?? null,
      as: attr(el, "as") ?? null,
      text: stringValue(el) || null,
    }));
    bill.title = getPrimaryBillTitle(bill.billType, bill.number, bill.titles);
  }

  private processIntroduced(bill: ParsedBill, node: XmlElement): void {
    const introduced = requireElement(node, "introduced");
    bill.introducedDate = parseXmlDateTime(
      requireAttribute(introduced, "datetime"),
      "introduced/@datetime"
    );
  }

  private processCurrentStatus(bill: ParsedBill, node: XmlElement): void {
    const state = requireElement(node, "state");
    bill.currentStatusDate = parseXmlDateTime(
      requireAttribute(state, "datetime"),
      "state/@datetime"
    );
    if (!state.text) {
      throw new MissingRequiredElementError(`${node.name}/state/text()`);
    }
    bill.currentStatus = parseStatus(state.text, "state");
  }

  // Sponsor resolution happens at reconcile time; a missing node or id
  // means the bill has no sponsor.
  private processSponsor(bill: ParsedBill, node: XmlElement): void {
    const sponsor = selectFirst(node, "sponsor");
    const id = sponsor ? attr(sponsor, "id") : undefined;
    bill.sponsorId = id?.trim() ? id.trim() : null;
  }

  private processCommittees(bill: ParsedBill, node: XmlElement): void {
    bill.committeeCodes = select(node, "committees/committee")
      .map((el) => attr(el, "code")?.trim() ?? "")
      .filter((code) => code !== "");
  }

  private processSubjects(bill: ParsedBill, node: XmlElement): void {
    bill.subjectNames = select(node, "subjects/term").map(
      (el) => attr(el, "name") ?? ""
    );
  }

  // Related bills that cannot be keyed are dropped here; those that can be
  // keyed but are not stored yet are dropped at reconcile time.
  private processRelatedBills(bill: ParsedBill, node: XmlElement): void {
    const related: RelatedBillRef[] = [];
    for (const el of select(node, "relatedbills/bill")) {
      const billType = billTypeByXmlCode(attr(el, "type") ?? "");
      const congress = Number.parseInt(attr(el, "session") ?? "", 10);
      const number = Number.parseInt(attr(el, "number") ?? "", 10);
      if (!billType || Number.isNaN(congress) || Number.isNaN(number)) {
        continue;
      }
      related.push({
        congress,
        billType,
        number,
        relation: attr(el, "relation") ?? null,
      });
    }
    bill.relatedBills = related;
  }

  private processCosponsors(bill: ParsedBill, node: XmlElement): void {
    const cosponsors: CosponsorRef[] = [];
    for (const el of select(node, "cosponsors/cosponsor")) {
      const personId = attr(el, "id")?.trim();
      if (!personId) {
        continue;
      }
      cosponsors.push({
        personId,
        joined: attr(el, "joined") ?? null,
        withdrawn: attr(el, "withdrawn") ?? null,
      });
    }
    bill.cosponsors = cosponsors;
  }

  private processActions(bill: ParsedBill, node: XmlElement): void {
    const actions: MajorAction[] = [];
    for (const actionsEl of childElements(node, "actions")) {
      for (const el of actionsEl.children) {
        const state = attr(el, "state");
        if (state === undefined) {
          continue;
        }
        const datetime = parseXmlDateTime(
          requireAttribute(el, "datetime"),
          `${el.name}/@datetime`
        );
        const textEl = selectFirst(el, "text");
        actions.push({
          datetime: datetime.toISOString(),
          status: parseStatus(state, `${el.name}/@state`),
          text: textEl ? stringValue(textEl) : "",
        });
      }
    }
    bill.majorActions = actions;
  }
}

