/**
 * Bill XML builders for tests. Every section can be swapped for raw markup;
 * pass an empty string to leave a section out.
 */

export type BillXmlParts = {
  session: string;
  type: string;
  number: string;
  state: string;
  introduced: string;
  titles: string;
  sponsor: string;
  cosponsors: string;
  actions: string;
  committees: string;
  relatedbills: string;
  subjects: string;
};

export const DEFAULT_BILL_PARTS: BillXmlParts = {
  session: "111",
  type: "hr",
  number: "1",
  state: '<state datetime="2009-02-17T00:00:00-05:00">ENACTED:SIGNED</state>',
  introduced: '<introduced datetime="2009-01-26T00:00:00-05:00"/>',
  titles: `<titles>
    <title type="short" as="introduced">Recovery Test Act of 2009</title>
    <title type="official" as="introduced">Making supplemental appropriations for test purposes.</title>
  </titles>`,
  sponsor: '<sponsor id="400001"/>',
  cosponsors: `<cosponsors>
    <cosponsor id="400002" joined="2009-01-27T00:00:00-05:00"/>
    <cosponsor id="" joined="2009-01-27T00:00:00-05:00"/>
  </cosponsors>`,
  actions: `<actions>
    <action datetime="2009-01-26T00:00:00-05:00" state="REFERRED"><text>Referred to the Committee on Appropriations.</text></action>
    <calendar datetime="2009-01-27T00:00:00-05:00"><text>Placed on the Union Calendar.</text></calendar>
    <vote datetime="2009-01-28T19:34:00-05:00" state="PASS_OVER:HOUSE"><text>On passage Passed by recorded vote.</text></vote>
  </actions>`,
  committees: `<committees>
    <committee code="HSAP" name="House Appropriations" activity="Referral"/>
  </committees>`,
  relatedbills: `<relatedbills>
    <bill relation="rule" session="111" type="hres" number="88"/>
  </relatedbills>`,
  subjects: `<subjects>
    <term name="Economics and public finance"/>
  </subjects>`,
};

export function billXml(overrides: Partial<BillXmlParts> = {}): string {
  const parts = { ...DEFAULT_BILL_PARTS, ...overrides };
  return `<?xml version="1.0" encoding="UTF-8"?>
<bill session="${parts.session}" type="${parts.type}" number="${parts.number}">
  ${parts.state}
  ${parts.introduced}
  ${parts.titles}
  ${parts.sponsor}
  ${parts.cosponsors}
  ${parts.actions}
  ${parts.committees}
  ${parts.relatedbills}
  ${parts.subjects}
</bill>`;
}

export function cosponsorsXml(
  entries: { id: string; joined?: string; withdrawn?: string }[]
): string {
  const rows = entries.map((entry) => {
    const joined = entry.joined ? ` joined="${entry.joined}"` : "";
    const withdrawn = entry.withdrawn ? ` withdrawn="${entry.withdrawn}"` : "";
    return `<cosponsor id="${entry.id}"${joined}${withdrawn}/>`;
  });
  return `<cosponsors>${rows.join("")}</cosponsors>`;
}

export function subjectsXml(names: string[]): string {
  return `<subjects>${names.map((name) => `<term name="${name}"/>`).join("")}</subjects>`;
}
