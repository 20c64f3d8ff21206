import { describe, test, expect } from "vitest";
import { mapImmunizationActivity } from "../../../../src/cda-to-fhir/resources/immunization";
import { nameBasedUuid } from "../../../../src/cda-to-fhir/references/reference-registry";
import type { SubstanceAdministrationStatement } from "../../../../src/cda-to-fhir/parser/types";
import { makeTestContext, parseTestStatement, resourceAt, TEST_PATIENT_REFERENCE } from "../helpers";

interface ImmunizationOptions {
  negated?: boolean;
  effectiveTime?: string;
  extra?: string;
}

function immunizationActivity(options: ImmunizationOptions = {}): string {
  const { negated = false, effectiveTime = '<effectiveTime value="20191015"/>', extra = "" } = options;
  return `<substanceAdministration classCode="SBADM" moodCode="EVN" negationInd="${String(negated)}">
    <templateId root="2.16.840.1.113883.10.20.22.4.52" extension="2015-08-01"/>
    <id root="e6f1ba43-c0ed-4b9b-9f12-f435d8ad8f92"/>
    <statusCode code="completed"/>
    ${effectiveTime}
    <routeCode code="C28161" codeSystem="2.16.840.1.113883.3.26.1.1" displayName="Intramuscular"/>
    <doseQuantity value="0.5" unit="mL"/>
    <consumable>
      <manufacturedProduct classCode="MANU">
        <templateId root="2.16.840.1.113883.10.20.22.4.54" extension="2014-06-09"/>
        <manufacturedMaterial>
          <code code="140" codeSystem="2.16.840.1.113883.12.292" displayName="Influenza, seasonal, injectable"/>
          <lotNumberText>AAJN11K</lotNumberText>
        </manufacturedMaterial>
        <manufacturerOrganization><name>Example Vaccines Inc.</name></manufacturerOrganization>
      </manufacturedProduct>
    </consumable>
    <performer>
      <assignedEntity>
        <id root="2.16.840.1.113883.4.6" extension="2222222222"/>
        <assignedPerson><name><given>Amy</given><family>Shot</family></name></assignedPerson>
      </assignedEntity>
    </performer>
    ${extra}
  </substanceAdministration>`;
}

function parseAdministration(markup: string): SubstanceAdministrationStatement {
  const statement = parseTestStatement(markup);
  if (statement.kind !== "substanceAdministration") {
    throw new Error(`Expected substanceAdministration, got ${statement.kind}`);
  }
  return statement;
}

describe("mapImmunizationActivity", () => {
  test("maps the vaccine, lot, manufacturer, dose and performer", () => {
    const ctx = makeTestContext();
    const reference = mapImmunizationActivity(parseAdministration(immunizationActivity()), ctx);

    const immunization = resourceAt(ctx, reference, "Immunization");
    expect(immunization).toEqual({
      resourceType: "Immunization",
      id: nameBasedUuid(
        "Immunization|urn:uuid:e6f1ba43-c0ed-4b9b-9f12-f435d8ad8f92|e6f1ba43-c0ed-4b9b-9f12-f435d8ad8f92",
      ),
      identifier: [{ system: "urn:ietf:rfc:3986", value: "urn:uuid:e6f1ba43-c0ed-4b9b-9f12-f435d8ad8f92" }],
      status: "completed",
      vaccineCode: {
        coding: [{ system: "http://hl7.org/fhir/sid/cvx", code: "140", display: "Influenza, seasonal, injectable" }],
        text: "Influenza, seasonal, injectable",
      },
      patient: { reference: TEST_PATIENT_REFERENCE },
      occurrenceDateTime: "2019-10-15",
      primarySource: true,
      manufacturer: { reference: `urn:uuid:${nameBasedUuid("Organization|content|Example Vaccines Inc.")}` },
      lotNumber: "AAJN11K",
      route: {
        coding: [{ system: "http://ncimeta.nci.nih.gov", code: "C28161", display: "Intramuscular" }],
        text: "Intramuscular",
      },
      doseQuantity: { value: 0.5, unit: "mL", system: "http://unitsofmeasure.org", code: "mL" },
      performer: [
        {
          actor: {
            reference: `urn:uuid:${nameBasedUuid("Practitioner|http://hl7.org/fhir/sid/us-npi|2222222222")}`,
          },
        },
      ],
    });
  });

  test("a refused immunization is not-done with its refusal reason", () => {
    const ctx = makeTestContext();
    const reference = mapImmunizationActivity(
      parseAdministration(
        immunizationActivity({
          negated: true,
          extra: `<entryRelationship typeCode="RSON">
            <observation classCode="OBS" moodCode="EVN">
              <templateId root="2.16.840.1.113883.10.20.22.4.53"/>
              <code code="PATOBJ" codeSystem="2.16.840.1.113883.5.8" displayName="patient objection"/>
            </observation>
          </entryRelationship>`,
        }),
      ),
      ctx,
    );

    const immunization = resourceAt(ctx, reference, "Immunization");
    expect(immunization.status).toBe("not-done");
    expect(immunization.statusReason).toEqual({
      coding: [
        {
          system: "http://terminology.hl7.org/CodeSystem/v3-ActReason",
          code: "PATOBJ",
          display: "patient objection",
        },
      ],
      text: "patient objection",
    });
  });

  test("skips an immunization without an administration time", () => {
    const ctx = makeTestContext();
    const reference = mapImmunizationActivity(
      parseAdministration(immunizationActivity({ effectiveTime: '<effectiveTime nullFlavor="UNK"/>' })),
      ctx,
    );

    expect(reference).toBeUndefined();
    expect(ctx.log.byCategory("MissingRequiredData")).toEqual([
      {
        category: "MissingRequiredData",
        code: "skipped-resource",
        message: "Immunization activity has no administration time",
        path: "/ClinicalDocument/substanceAdministration",
        resourceType: "Immunization",
      },
    ]);
    expect(ctx.registry.resources().map((resource) => resource.resourceType)).toEqual([]);
  });
});
