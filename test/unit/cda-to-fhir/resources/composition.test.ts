import { describe, test, expect } from "vitest";
import { compositionKey, mapComposition, type MappedSection } from "../../../../src/cda-to-fhir/resources/composition";
import type { ParsedDocument, Section } from "../../../../src/cda-to-fhir/parser/types";
import { nameBasedUuid } from "../../../../src/cda-to-fhir/references/reference-registry";
import { makeTestContext, parseTestDocument, resourceAt } from "../helpers";
import { clinicalDocument, section } from "../fragments";

const FALLBACK_DATE = "2020-03-02T00:00:00.000Z";
const EMPTY_REASON_SYSTEM = "http://terminology.hl7.org/CodeSystem/list-empty-reason";

function problemsSection(text = "<paragraph>No known problems</paragraph>"): string {
  return section({ templateRoot: "2.16.840.1.113883.10.20.22.2.5.1", code: "11450-4", title: "Problems", text });
}

function allergiesSection(nullFlavor?: string): string {
  return section({
    templateRoot: "2.16.840.1.113883.10.20.22.2.6.1",
    code: "48765-2",
    title: "Allergies",
    ...(nullFlavor && { nullFlavor }),
  });
}

function parse(sections: string[]): ParsedDocument {
  return parseTestDocument(clinicalDocument({ sections }));
}

function unmapped(sections: readonly Section[]): MappedSection[] {
  return sections.map((entry) => ({ section: entry, entries: [], sections: unmapped(entry.sections) }));
}

describe("mapComposition", () => {
  test("maps the header", () => {
    const ctx = makeTestContext();
    const { header } = parse([]);
    const composition = mapComposition(header, [], ctx, { fallbackDate: FALLBACK_DATE });

    expect(composition).toMatchObject({
      resourceType: "Composition",
      id: nameBasedUuid(compositionKey(header)),
      language: "en-US",
      identifier: { system: "urn:oid:2.16.840.1.113883.19.5.99999.1", value: "TT988" },
      status: "final",
      type: {
        coding: [{ system: "http://loinc.org", code: "34133-9", display: "Summarization of Episode Note" }],
        text: "Summarization of Episode Note",
      },
      subject: { reference: "urn:uuid:test-patient" },
      date: "2020-03-01T12:00:00-05:00",
      title: "Continuity of Care Document",
      confidentiality: "N",
    });
    expect(composition.section).toBeUndefined();

    expect(resourceAt(ctx, composition.author[0]?.reference, "Practitioner").identifier).toEqual([
      { system: "http://hl7.org/fhir/sid/us-npi", value: "1234567890" },
    ]);
    expect(resourceAt(ctx, composition.custodian?.reference, "Organization").name).toBe("Good Health Clinic");
  });

  test("the document id keys the Composition", () => {
    const { header } = parse([]);
    expect(compositionKey(header)).toBe("Composition|urn:oid:2.16.840.1.113883.19.5.99999.1|TT988");
  });

  test("lists section entries and renders the narrative as plain text", () => {
    const ctx = makeTestContext();
    const { header, sections } = parse([problemsSection()]);
    const [problems] = sections;
    if (!problems) throw new Error("No section parsed");

    const composition = mapComposition(
      header,
      [{ section: problems, entries: ["urn:uuid:condition-1"], sections: [] }],
      ctx,
      { fallbackDate: FALLBACK_DATE },
    );

    expect(composition.section).toEqual([
      {
        title: "Problems",
        code: { coding: [{ system: "http://loinc.org", code: "11450-4" }] },
        text: { status: "generated", div: '<div xmlns="http://www.w3.org/1999/xhtml">No known problems</div>' },
        entry: [{ reference: "urn:uuid:condition-1" }],
      },
    ]);
  });

  test("escapes markup characters in the narrative", () => {
    const ctx = makeTestContext();
    const { header, sections } = parse([problemsSection("<paragraph>BMI &lt; 25 &amp; stable</paragraph>")]);
    const composition = mapComposition(header, unmapped(sections), ctx, { fallbackDate: FALLBACK_DATE });

    expect(composition.section?.[0]?.text?.div).toBe(
      '<div xmlns="http://www.w3.org/1999/xhtml">BMI &lt; 25 &amp; stable</div>',
    );
  });

  test.each([
    ["NI", "nilknown", "Nil Known"],
    ["NASK", "notasked", "Not Asked"],
    ["MSK", "withheld", "Information Withheld"],
    ["UNK", "unavailable", "Unavailable"],
  ])("an empty section with nullFlavor %s gets emptyReason %s", (nullFlavor, code, display) => {
    const ctx = makeTestContext();
    const { header, sections } = parse([allergiesSection(nullFlavor)]);
    const composition = mapComposition(header, unmapped(sections), ctx, { fallbackDate: FALLBACK_DATE });

    expect(composition.section?.[0]?.emptyReason).toEqual({
      coding: [{ system: EMPTY_REASON_SYSTEM, code, display }],
    });
  });

  test("an empty section without narrative is unavailable", () => {
    const ctx = makeTestContext();
    const { header, sections } = parse([allergiesSection()]);
    const composition = mapComposition(header, unmapped(sections), ctx, { fallbackDate: FALLBACK_DATE });

    expect(composition.section?.[0]?.emptyReason?.coding?.[0]?.code).toBe("unavailable");
  });

  test("an empty section with narrative has no emptyReason", () => {
    const ctx = makeTestContext();
    const { header, sections } = parse([problemsSection()]);
    const composition = mapComposition(header, unmapped(sections), ctx, { fallbackDate: FALLBACK_DATE });

    expect(composition.section?.[0]?.emptyReason).toBeUndefined();
  });

  test("falls back to the assembly time when the document time is unusable", () => {
    const ctx = makeTestContext();
    const { header } = parse([]);
    const composition = mapComposition({ ...header, effectiveTime: "2020-03-01" }, [], ctx, {
      fallbackDate: FALLBACK_DATE,
    });

    expect(composition.date).toBe(FALLBACK_DATE);
    expect(ctx.log.list()).toContainEqual({
      category: "Downgrade",
      code: "composition-date-defaulted",
      message: "Document effectiveTime could not be converted; assembly time used",
      path: "/ClinicalDocument",
      resourceType: "Composition",
    });
  });

  test("a header without a usable author gets a display-only author", () => {
    const ctx = makeTestContext();
    const { header } = parse([]);
    const composition = mapComposition({ ...header, authors: [] }, [], ctx, { fallbackDate: FALLBACK_DATE });

    expect(composition.author).toEqual([{ display: "Unknown Author" }]);
    expect(ctx.log.list()).toContainEqual({
      category: "Downgrade",
      code: "composition-author-defaulted",
      message: "No document author maps to a Practitioner or Device; author recorded by display only",
      path: "/ClinicalDocument",
      resourceType: "Composition",
    });
  });

  test("title falls back to the document type", () => {
    const ctx = makeTestContext();
    const { header } = parse([]);
    const composition = mapComposition({ ...header, title: undefined }, [], ctx, { fallbackDate: FALLBACK_DATE });

    expect(composition.title).toBe("Summarization of Episode Note");
  });

  test("drops a confidentiality code FHIR does not accept", () => {
    const ctx = makeTestContext();
    const { header } = parse([]);
    const composition = mapComposition({ ...header, confidentialityCode: "X" }, [], ctx, {
      fallbackDate: FALLBACK_DATE,
    });

    expect(composition.confidentiality).toBeUndefined();
  });
});
