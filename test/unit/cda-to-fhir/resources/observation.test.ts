import { describe, test, expect } from "vitest";
import {
  convertObservationValue,
  mapObservation,
  mapVitalSignsOrganizer,
  observationStatus,
} from "../../../../src/cda-to-fhir/resources/observation";
import { nameBasedUuid } from "../../../../src/cda-to-fhir/references/reference-registry";
import type { ObservationStatement, OrganizerStatement } from "../../../../src/cda-to-fhir/parser/types";
import { makeTestContext, parseTestStatement, resourceAt, TEST_PATIENT_REFERENCE } from "../helpers";
import { vitalSignObservation, vitalSignsOrganizer } from "../fragments";

const LOINC = "http://loinc.org";
const UCUM = "http://unitsofmeasure.org";
const VITAL_SIGNS_CATEGORY = {
  coding: [
    {
      system: "http://terminology.hl7.org/CodeSystem/observation-category",
      code: "vital-signs",
      display: "Vital Signs",
    },
  ],
};

function parseOrganizer(markup: string): OrganizerStatement {
  const statement = parseTestStatement(markup);
  if (statement.kind !== "organizer") throw new Error(`Expected organizer, got ${statement.kind}`);
  return statement;
}

function parseObservation(markup: string): ObservationStatement {
  const statement = parseTestStatement(markup);
  if (statement.kind !== "observation") throw new Error(`Expected observation, got ${statement.kind}`);
  return statement;
}

const SYSTOLIC = vitalSignObservation({
  id: "c6f88321-67ad-11db-bd13-0800200c9a67",
  code: "8480-6",
  display: "SBP",
  value: '<value xsi:type="PQ" value="120" unit="mm[Hg]"/>',
});
const DIASTOLIC = vitalSignObservation({
  id: "c6f88321-67ad-11db-bd13-0800200c9a68",
  code: "8462-4",
  display: "DBP",
  value: '<value xsi:type="PQ" value="80" unit="mm[Hg]"/>',
});

describe("observationStatus", () => {
  test("maps act status codes", () => {
    expect(observationStatus("completed")).toBe("final");
    expect(observationStatus("active")).toBe("preliminary");
    expect(observationStatus("aborted")).toBe("cancelled");
    expect(observationStatus("nullified")).toBe("entered-in-error");
    expect(observationStatus(undefined)).toBe("final");
    expect(observationStatus("obsolete")).toBe("unknown");
  });
});

describe("mapVitalSignsOrganizer", () => {
  test("maps the panel and its members, panel first", () => {
    const ctx = makeTestContext();
    const references = mapVitalSignsOrganizer(parseOrganizer(vitalSignsOrganizer()), ctx);
    expect(references).toHaveLength(2);

    const [panelReference, heightReference] = references;
    const height = resourceAt(ctx, heightReference, "Observation");
    expect(height).toMatchObject({
      status: "final",
      category: [VITAL_SIGNS_CATEGORY],
      code: { coding: [{ system: LOINC, code: "8302-2", display: "Height" }], text: "Height" },
      subject: { reference: TEST_PATIENT_REFERENCE },
      effectiveDateTime: "2020-01-10T10:30:00-05:00",
      valueQuantity: { value: 177, unit: "cm", system: UCUM, code: "cm" },
    });

    const panel = resourceAt(ctx, panelReference, "Observation");
    expect(panel.code).toEqual({
      coding: [
        {
          system: LOINC,
          code: "85353-1",
          display: "Vital signs, weight, height, head circumference, oxygen saturation and BMI panel",
        },
      ],
    });
    expect(panel.hasMember).toEqual([{ reference: heightReference }]);
  });

  test("folds systolic and diastolic readings into one blood pressure Observation", () => {
    const ctx = makeTestContext();
    const [panelReference, ...members] = mapVitalSignsOrganizer(
      parseOrganizer(vitalSignsOrganizer([vitalSignObservation(), SYSTOLIC, DIASTOLIC])),
      ctx,
    );
    expect(members).toHaveLength(2);

    const bloodPressure = resourceAt(ctx, members[1], "Observation");
    expect(bloodPressure).toEqual({
      resourceType: "Observation",
      id: nameBasedUuid(
        "Observation|urn:uuid:c6f88321-67ad-11db-bd13-0800200c9a67|c6f88321-67ad-11db-bd13-0800200c9a67#85354-9",
      ),
      identifier: [
        { system: "urn:ietf:rfc:3986", value: "urn:uuid:c6f88321-67ad-11db-bd13-0800200c9a67" },
        { system: "urn:ietf:rfc:3986", value: "urn:uuid:c6f88321-67ad-11db-bd13-0800200c9a68" },
      ],
      status: "final",
      category: [VITAL_SIGNS_CATEGORY],
      code: {
        coding: [{ system: LOINC, code: "85354-9", display: "Blood pressure panel with all children optional" }],
      },
      subject: { reference: TEST_PATIENT_REFERENCE },
      effectiveDateTime: "2020-01-10T10:30:00-05:00",
      component: [
        {
          code: { coding: [{ system: LOINC, code: "8480-6", display: "Systolic blood pressure" }], text: "SBP" },
          valueQuantity: { value: 120, unit: "mm[Hg]", system: UCUM, code: "mm[Hg]" },
        },
        {
          code: { coding: [{ system: LOINC, code: "8462-4", display: "Diastolic blood pressure" }], text: "DBP" },
          valueQuantity: { value: 80, unit: "mm[Hg]", system: UCUM, code: "mm[Hg]" },
        },
      ],
    });

    expect(resourceAt(ctx, panelReference, "Observation").hasMember).toEqual(
      members.map((reference) => ({ reference })),
    );
    expect(ctx.log.list()).toContainEqual({
      category: "Normalization",
      code: "blood-pressure-combined",
      message: "Systolic and diastolic readings combined into one blood pressure Observation",
      path: "/ClinicalDocument/organizer/component[2]/observation",
    });
  });

  test("a lone systolic reading stays a separate Observation", () => {
    const ctx = makeTestContext();
    const [, systolic] = mapVitalSignsOrganizer(parseOrganizer(vitalSignsOrganizer([SYSTOLIC])), ctx);

    const observation = resourceAt(ctx, systolic, "Observation");
    expect(observation.code?.coding?.[0]?.code).toBe("8480-6");
    expect(observation.valueQuantity?.value).toBe(120);
    expect(observation.component).toBeUndefined();
  });
});

describe("mapObservation", () => {
  test("maps a result observation with interpretation and reference range", () => {
    const ctx = makeTestContext();
    const reference = mapObservation(
      parseObservation(`<observation classCode="OBS" moodCode="EVN">
        <templateId root="2.16.840.1.113883.10.20.22.4.2" extension="2015-08-01"/>
        <id root="107c2dc0-67a5-11db-bd13-0800200c9a66"/>
        <code code="718-7" codeSystem="2.16.840.1.113883.6.1" displayName="Hemoglobin"/>
        <statusCode code="completed"/>
        <effectiveTime value="20200301"/>
        <value xsi:type="PQ" value="13.2" unit="g/dL"/>
        <interpretationCode code="N" codeSystem="2.16.840.1.113883.5.83"/>
        <referenceRange>
          <observationRange>
            <value xsi:type="IVL_PQ"><low value="12" unit="g/dL"/><high value="16" unit="g/dL"/></value>
          </observationRange>
        </referenceRange>
      </observation>`),
      "laboratory",
      ctx,
    );

    const observation = resourceAt(ctx, reference, "Observation");
    expect(observation).toMatchObject({
      status: "final",
      category: [
        {
          coding: [
            {
              system: "http://terminology.hl7.org/CodeSystem/observation-category",
              code: "laboratory",
              display: "Laboratory",
            },
          ],
        },
      ],
      effectiveDateTime: "2020-03-01",
      valueQuantity: { value: 13.2, unit: "g/dL", system: UCUM, code: "g/dL" },
      interpretation: [
        {
          coding: [
            { system: "http://terminology.hl7.org/CodeSystem/v3-ObservationInterpretation", code: "N", display: "Normal" },
          ],
          text: "Normal",
        },
      ],
      referenceRange: [
        {
          low: { value: 12, unit: "g/dL", system: UCUM, code: "g/dL" },
          high: { value: 16, unit: "g/dL", system: UCUM, code: "g/dL" },
        },
      ],
    });
  });

  test("takes the category from the classification lookup when the template gives none", () => {
    const ctx = makeTestContext({
      classify: { classify: (coding) => (coding.code === "8302-2" ? { observationCategory: "exam" } : undefined) },
    });
    const reference = mapObservation(parseObservation(vitalSignObservation()), undefined, ctx);
    expect(resourceAt(ctx, reference, "Observation").category).toEqual([
      { coding: [{ system: "http://terminology.hl7.org/CodeSystem/observation-category", code: "exam", display: "Exam" }] },
    ]);
  });

  test("ignores a classified category outside the observation-category code system", () => {
    const ctx = makeTestContext({ classify: { classify: () => ({ observationCategory: "chemistry" }) } });
    const reference = mapObservation(parseObservation(vitalSignObservation()), undefined, ctx);

    expect(resourceAt(ctx, reference, "Observation").category).toBeUndefined();
    expect(ctx.log.list()).toContainEqual({
      category: "UnknownConstruct",
      code: "unknown-observation-category",
      message: 'Classified category "chemistry" is not an observation-category code',
      path: "/ClinicalDocument/observation",
    });
  });
});

describe("convertObservationValue", () => {
  const path = "/ClinicalDocument/observation/value";

  test("maps scalar variants", () => {
    const ctx = makeTestContext();
    expect(convertObservationValue({ kind: "string", value: "Former smoker" }, ctx, path)).toEqual({
      valueString: "Former smoker",
    });
    expect(convertObservationValue({ kind: "integer", value: 3 }, ctx, path)).toEqual({ valueInteger: 3 });
    expect(convertObservationValue({ kind: "boolean", value: false }, ctx, path)).toEqual({ valueBoolean: false });
    expect(convertObservationValue({ kind: "real", value: 1.5, rawValue: "1.5" }, ctx, path)).toEqual({
      valueQuantity: { value: 1.5, system: UCUM, code: "1" },
    });
    expect(convertObservationValue({ kind: "instant", raw: "20200301" }, ctx, path)).toEqual({
      valueDateTime: "2020-03-01",
    });
  });

  test("an interval with one bound becomes a quantity with a comparator", () => {
    const ctx = makeTestContext();
    expect(
      convertObservationValue(
        { kind: "quantity-interval", low: { kind: "quantity", value: 5, rawValue: "5", unit: "mg" } },
        ctx,
        path,
      ),
    ).toEqual({ valueQuantity: { value: 5, unit: "mg", system: UCUM, code: "mg", comparator: ">=" } });
  });

  test("a null-flavored value becomes dataAbsentReason", () => {
    const ctx = makeTestContext();
    expect(convertObservationValue({ kind: "absent", declaredType: "PQ", nullFlavor: "ASKU" }, ctx, path)).toEqual({
      dataAbsentReason: {
        coding: [
          {
            system: "http://terminology.hl7.org/CodeSystem/data-absent-reason",
            code: "asked-unknown",
            display: "Asked But Unknown",
          },
        ],
      },
    });
  });

  test("an encapsulated value is carried in the value extension", () => {
    const ctx = makeTestContext();
    expect(
      convertObservationValue(
        { kind: "encapsulated", mediaType: "text/plain", representation: "TXT", content: "hello" },
        ctx,
        path,
      ),
    ).toEqual({
      extension: [
        {
          url: "http://hl7.org/fhir/5.0/StructureDefinition/extension-Observation.value",
          valueAttachment: { contentType: "text/plain", data: "aGVsbG8=" },
        },
      ],
    });
  });

  test("a periodic interval has no counterpart and is dropped", () => {
    const ctx = makeTestContext();
    expect(
      convertObservationValue({ kind: "periodic-interval", institutionSpecified: false }, ctx, path),
    ).toEqual({});
    expect(ctx.log.list()).toEqual([
      {
        category: "Downgrade",
        code: "unsupported-value-type",
        message: "PIVL_TS observation value has no FHIR counterpart",
        path,
      },
    ]);
  });
});
