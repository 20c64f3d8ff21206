import { describe, test, expect } from "vitest";
import { selectSchema, validateHeader, validateStatement } from "../../../../src/cda-to-fhir/templates/validator";
import { STATEMENT_SCHEMAS } from "../../../../src/cda-to-fhir/templates/schemas";
import { isTypeCompatible } from "../../../../src/cda-to-fhir/datatypes/type-compatibility";
import { parseFragment } from "../helpers";
import { problemConcernAct, problemObservation, vitalSignObservation } from "../fragments";

function validate(fragment: string, mistagRepairs: string[] = []) {
  const element = parseFragment(fragment);
  const selection = selectSchema(element);
  if (!selection.schema) throw new Error("No schema selected");
  return validateStatement(element, selection.schema, { mistagRepairs });
}

describe("selectSchema", () => {
  test("selects the schema registered for the declared template", () => {
    expect(selectSchema(parseFragment(problemConcernAct())).schema?.id).toBe("problem-concern-act");
  });

  test("the more specific schema wins when several templates are declared", () => {
    const element = parseFragment(`
      <observation classCode="OBS" moodCode="EVN">
        <templateId root="2.16.840.1.113883.10.20.22.4.38" extension="2015-08-01"/>
        <templateId root="2.16.840.1.113883.10.20.22.4.78" extension="2014-06-09"/>
      </observation>`);
    expect(selectSchema(element).schema?.id).toBe("smoking-status-observation");
  });

  test("unknown template roots fall through to a generic statement", () => {
    const element = parseFragment(`
      <observation classCode="OBS" moodCode="EVN">
        <templateId root="1.2.3.999" extension="2020-01-01"/>
      </observation>`);
    expect(selectSchema(element)).toEqual({
      generic: true,
      unknownTemplateIds: [{ root: "1.2.3.999", extension: "2020-01-01" }],
    });
  });

  test("every registered schema has a unique id", () => {
    const ids = STATEMENT_SCHEMAS.map((schema) => schema.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

describe("validateStatement", () => {
  test("a conformant concern act passes", () => {
    expect(validate(problemConcernAct())).toEqual([]);
  });

  test("a completed concern without effectiveTime/high is rejected", () => {
    expect(validate(problemConcernAct({ statusCode: "completed" }))).toEqual([
      {
        ruleId: "concern-act.high-required-when-completed",
        path: "/ClinicalDocument/act/effectiveTime",
        message: "effectiveTime/high required when completed (statusCode=completed)",
        schemaId: "problem-concern-act",
      },
    ]);
  });

  test("a completed concern with effectiveTime/high passes", () => {
    expect(validate(problemConcernAct({ statusCode: "completed", high: "20200301" }))).toEqual([]);
  });

  test("a vital sign with a string value is rejected", () => {
    expect(validate(vitalSignObservation({ value: '<value xsi:type="ST">tall</value>' }))).toEqual([
      {
        ruleId: "vital-sign-observation.value-type",
        path: "/ClinicalDocument/observation/value",
        message: "value SHALL be PQ, found ST",
        schemaId: "vital-sign-observation",
      },
    ]);
  });

  test("compatible coded types satisfy a CD requirement", () => {
    const value = '<value xsi:type="CE" code="233604007" codeSystem="2.16.840.1.113883.6.96"/>';
    expect(validate(problemObservation({ value }))).toEqual([]);
  });

  test("a null-flavored value still has to declare a compatible type", () => {
    expect(validate(problemObservation({ value: '<value xsi:type="CD" nullFlavor="UNK"/>' }))).toEqual([]);
    expect(validate(problemObservation({ value: '<value nullFlavor="UNK"/>' }))[0]?.ruleId).toBe(
      "problem-observation.value-type",
    );
  });

  test("an enabled mistag repair is what the rules see", () => {
    const untyped = vitalSignObservation({ value: '<value value="177" unit="cm"/>' });
    expect(validate(untyped)[0]?.message).toBe("value SHALL be PQ, found untyped value");
    expect(validate(untyped, ["untyped-quantity-value"])).toEqual([]);
  });

  test("a statement of the wrong kind fails only the element-name check", () => {
    const element = parseFragment(`
      <act classCode="ACT" moodCode="EVN">
        <templateId root="2.16.840.1.113883.10.20.22.4.4"/>
      </act>`);
    const selection = selectSchema(element);
    if (!selection.schema) throw new Error("No schema selected");

    expect(validateStatement(element, selection.schema, { mistagRepairs: [] })).toEqual([
      {
        ruleId: "problem-observation.element-name",
        path: "/ClinicalDocument/act",
        message: "template 2.16.840.1.113883.10.20.22.4.4 requires observation, found act",
        schemaId: "problem-observation",
      },
    ]);
  });

  test("a replaced fixed code is rejected", () => {
    const act = problemConcernAct().replace('code="CONC"', 'code="48765-2"');
    expect(validate(act).map((rejection) => rejection.ruleId)).toEqual(["problem-concern-act.code-fixed"]);
  });
});

describe("validateHeader", () => {
  test("a header without recordTarget fails both patient rules", () => {
    const root = parseFragment(`
      <ClinicalDocument>
        <id root="1.2.3"/>
        <code code="34133-9"/>
        <effectiveTime value="20200101"/>
      </ClinicalDocument>`);
    expect(validateHeader(root, { mistagRepairs: [] }).map((rejection) => rejection.ruleId)).toEqual([
      "header.record-target",
      "header.patient-role-id",
    ]);
  });
});

describe("isTypeCompatible", () => {
  test("types in one family are interchangeable", () => {
    expect(isTypeCompatible("CO", "CD")).toBe(true);
    expect(isTypeCompatible("IVL_TS", "TS")).toBe(true);
  });

  test("types from different families are not", () => {
    expect(isTypeCompatible("ST", "CD")).toBe(false);
    expect(isTypeCompatible("REAL", "PQ")).toBe(false);
    expect(isTypeCompatible(undefined, "PQ")).toBe(false);
  });
});
