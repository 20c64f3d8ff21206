import { describe, test, expect } from "vitest";
import { DecisionLog } from "../../../../src/cda-to-fhir/decision-log";
import {
  codesOf,
  convertCodedToCodeableConcept,
  convertCodedToCoding,
} from "../../../../src/cda-to-fhir/datatypes/cd-codeableconcept";
import type { CodedValue } from "../../../../src/cda-to-fhir/datatypes/values";
import { parseNarrative } from "../../../../src/cda-to-fhir/parser/narrative";
import { parseFragment } from "../helpers";

function coded(fields: Partial<CodedValue>): CodedValue {
  return { kind: "coded", type: "CD", translations: [], ...fields };
}

describe("convertCodedToCodeableConcept", () => {
  test("maps code, translations and displayName", () => {
    const concept = convertCodedToCodeableConcept(
      coded({
        code: "38341003",
        codeSystem: "2.16.840.1.113883.6.96",
        displayName: "Hypertensive disorder",
        translations: [coded({ code: "I10", codeSystem: "2.16.840.1.113883.6.90", displayName: "Essential hypertension" })],
      }),
      { log: new DecisionLog() },
    );

    expect(concept).toEqual({
      coding: [
        { system: "http://snomed.info/sct", code: "38341003", display: "Hypertensive disorder" },
        { system: "http://hl7.org/fhir/sid/icd-10-cm", code: "I10", display: "Essential hypertension" },
      ],
      text: "Hypertensive disorder",
    });
  });

  test("unknown OIDs become urn:oid systems", () => {
    const concept = convertCodedToCodeableConcept(coded({ code: "X1", codeSystem: "1.2.3.4" }), {
      log: new DecisionLog(),
    });
    expect(concept).toEqual({ coding: [{ system: "urn:oid:1.2.3.4", code: "X1" }] });
  });

  test("fixed value-set codes take the canonical display", () => {
    const concept = convertCodedToCodeableConcept(
      coded({ code: "8480-6", codeSystem: "2.16.840.1.113883.6.1", displayName: "SBP" }),
      { log: new DecisionLog() },
    );
    expect(concept?.coding).toEqual([
      { system: "http://loinc.org", code: "8480-6", display: "Systolic blood pressure" },
    ]);
    expect(concept?.text).toBe("SBP");
  });

  test("resolves originalText references against the narrative", () => {
    const { index } = parseNarrative(
      parseFragment('<text><list><item><content ID="prob1">Essential <b>hypertension</b></content></item></list></text>'),
    );
    const concept = convertCodedToCodeableConcept(
      coded({ code: "38341003", codeSystem: "2.16.840.1.113883.6.96", originalText: { reference: "#prob1" } }),
      { log: new DecisionLog(), narrativeIndex: index },
    );
    expect(concept?.text).toBe("Essential hypertension");
  });

  test("an unresolved reference is recorded and falls back to the coding display", () => {
    const log = new DecisionLog();
    const concept = convertCodedToCodeableConcept(
      coded({ code: "1", codeSystem: "1.2", displayName: "One", originalText: { reference: "#missing" } }),
      { log, path: "/doc/code" },
    );
    expect(concept?.text).toBe("One");
    expect(log.list()).toEqual([
      {
        category: "UnknownConstruct",
        code: "reference-not-found",
        message: 'Narrative reference "#missing" not found',
        path: "/doc/code",
      },
    ]);
  });

  test("originalText alone makes a text-only concept", () => {
    const concept = convertCodedToCodeableConcept(coded({ originalText: { text: "Peanut" } }), {
      log: new DecisionLog(),
    });
    expect(concept).toEqual({ text: "Peanut" });
  });

  test("absent and empty values produce nothing", () => {
    const ctx = { log: new DecisionLog() };
    expect(convertCodedToCodeableConcept({ kind: "absent", declaredType: "CD", nullFlavor: "UNK" }, ctx)).toBeUndefined();
    expect(convertCodedToCodeableConcept(coded({}), ctx)).toBeUndefined();
    expect(convertCodedToCodeableConcept(undefined, ctx)).toBeUndefined();
  });
});

describe("convertCodedToCoding", () => {
  test("returns the primary coding only", () => {
    expect(
      convertCodedToCoding(
        coded({
          code: "F",
          codeSystem: "2.16.840.1.113883.5.1",
          translations: [coded({ code: "female", codeSystem: "1.2" })],
        }),
      ),
    ).toMatchObject({ system: "http://terminology.hl7.org/CodeSystem/v3-AdministrativeGender", code: "F" });
  });
});

describe("codesOf", () => {
  test("lists system and code of every coding", () => {
    expect(
      codesOf(coded({ code: "A", codeSystem: "1.2", translations: [coded({ code: "B" })] })),
    ).toEqual([{ system: "urn:oid:1.2", code: "A" }, { code: "B" }]);
  });
});
