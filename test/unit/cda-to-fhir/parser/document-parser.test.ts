import { describe, test, expect } from "vitest";
import { DecisionLog } from "../../../../src/cda-to-fhir/decision-log";
import { StructuralRejectionError } from "../../../../src/cda-to-fhir/errors";
import { parseDocument } from "../../../../src/cda-to-fhir/parser/document-parser";
import { normalizeXml } from "../../../../src/cda-to-fhir/xml-normalizer";
import { makeParserContext } from "../helpers";
import { clinicalDocument, problemConcernAct, problemObservation, section } from "../fragments";

const PROBLEMS_SECTION = "2.16.840.1.113883.10.20.22.2.5.1";

function parse(markup: string) {
  const root = normalizeXml(markup, {
    markupPreprocessors: [],
    elementPreprocessors: [],
    log: new DecisionLog(),
  });
  const ctx = makeParserContext();
  return { parsed: parseDocument(root, ctx), ctx };
}

describe("parseDocument", () => {
  test("parses the header", () => {
    const { parsed } = parse(clinicalDocument());
    const { header } = parsed;

    expect(header).toMatchObject({
      path: "/ClinicalDocument",
      id: { root: "2.16.840.1.113883.19.5.99999.1", extension: "TT988" },
      code: { code: "34133-9" },
      title: "Continuity of Care Document",
      effectiveTime: "20200301120000-0500",
      confidentialityCode: "N",
      languageCode: "en-US",
      custodian: { names: ["Good Health Clinic"] },
    });
    expect(header.templateIds.map((templateId) => templateId.root)).toEqual([
      "2.16.840.1.113883.10.20.22.1.1",
      "2.16.840.1.113883.10.20.22.1.2",
    ]);
    expect(header.authors).toHaveLength(1);

    const [patient] = header.recordTargets;
    expect(patient).toMatchObject({
      ids: [{ root: "2.16.840.1.113883.19.5.99999.2", extension: "998991" }],
      names: [{ use: "official", given: ["Eve"], family: "Everywoman" }],
      gender: { kind: "coded", code: "F" },
      birthTime: "19750501",
      telecoms: [{ system: "phone", value: "+1(555)555-2003", use: "home" }],
    });
  });

  test("parses sections with narrative and entries", () => {
    const { parsed } = parse(
      clinicalDocument({
        sections: [
          section({
            templateRoot: PROBLEMS_SECTION,
            code: "11450-4",
            title: "Problems",
            text: '<list><item><content ID="problem1">Pneumonia</content></item></list>',
            entries: [problemConcernAct()],
          }),
        ],
      }),
    );

    expect(parsed.sections).toHaveLength(1);
    const [problems] = parsed.sections;
    expect(problems?.title).toBe("Problems");
    expect(problems?.code?.code).toBe("11450-4");
    expect(problems?.entries).toHaveLength(1);
    expect(problems?.entries[0]?.statement?.schemaId).toBe("problem-concern-act");
    expect(parsed.narrativeIndex.has("problem1")).toBe(true);
    expect(parsed.rejections).toEqual([]);
  });

  test("collects statement rejections, nested ones included", () => {
    const { parsed } = parse(
      clinicalDocument({
        sections: [
          section({
            templateRoot: PROBLEMS_SECTION,
            code: "11450-4",
            title: "Problems",
            entries: [
              problemConcernAct({ statusCode: "completed" }),
              problemConcernAct({
                observations: [problemObservation({ value: '<value xsi:type="PQ" value="1"/>' })],
              }),
            ],
          }),
        ],
      }),
    );

    expect(parsed.rejections.map((rejection) => rejection.ruleId)).toEqual([
      "concern-act.high-required-when-completed",
      "problem-observation.value-type",
    ]);
    const entries = parsed.sections[0]?.entries ?? [];
    expect(entries[0]?.rejections).toHaveLength(1);
    expect(entries[1]?.statement?.entryRelationships).toEqual([]);
  });

  test("a header rule failure rejects the document", () => {
    const markup = clinicalDocument().replace(/<effectiveTime value="20200301120000-0500"\/>\n/, "");
    expect(() => parse(markup)).toThrow(StructuralRejectionError);
    expect(() => parse(markup)).toThrow("[header.effective-time] SHALL contain at least 1 effectiveTime, found 0 at /ClinicalDocument");
  });

  test("nested sections are parsed and their narrative indexed", () => {
    const nested = section({
      templateRoot: "1.2.3.4",
      code: "10164-2",
      title: "History",
      text: '<paragraph ID="hx1">Seasonal allergies</paragraph>',
    });
    const outer = section({ templateRoot: "1.2.3.5", code: "11348-0", title: "Past History", text: "See below" }).replace(
      "</section>",
      `${nested}</section>`,
    );
    const { parsed } = parse(clinicalDocument({ sections: [outer] }));

    expect(parsed.sections[0]?.sections.map((inner) => inner.title)).toEqual(["History"]);
    expect(parsed.narrativeIndex.has("hx1")).toBe(true);
  });
});
