import { describe, test, expect } from "vitest";
import { parseStatement } from "../../../../src/cda-to-fhir/parser/statement-parser";
import { makeParserContext, parseFragment, parseTestStatement } from "../helpers";
import {
  allergyObservation,
  author,
  problemConcernAct,
  problemObservation,
  vitalSignObservation,
  vitalSignsOrganizer,
} from "../fragments";

describe("parseStatement", () => {
  test("parses a concern act with its nested observation", () => {
    const statement = parseTestStatement(problemConcernAct({ authors: author() }));
    if (statement.kind !== "act") throw new Error(`Expected act, got ${statement.kind}`);

    expect(statement).toMatchObject({
      schemaId: "problem-concern-act",
      classCode: "ACT",
      moodCode: "EVN",
      negated: false,
      statusCode: "active",
      ids: [{ root: "102ca2a0-8e22-4c5e-9d36-7e0a3b1f0b11" }],
      effectiveTime: { kind: "interval", low: { kind: "instant", raw: "20200101" } },
    });
    expect(statement.authors).toHaveLength(1);
    expect(statement.authors[0]?.time).toBe("20200301120000-0500");
    expect(statement.authors[0]?.assignedAuthor.personNames).toEqual([{ given: ["Henry"], family: "Seven" }]);

    const [relationship] = statement.entryRelationships;
    expect(relationship?.typeCode).toBe("SUBJ");
    expect(relationship?.statement).toMatchObject({
      kind: "observation",
      schemaId: "problem-observation",
      values: [{ kind: "coded", code: "233604007", displayName: "Pneumonia" }],
    });
  });

  test("a rejected nested statement is dropped and collected", () => {
    const ctx = makeParserContext();
    const concern = problemConcernAct({
      observations: [
        problemObservation(),
        problemObservation({ id: "bad-1", value: '<value xsi:type="ST">Pneumonia</value>' }),
      ],
    });
    const statement = parseTestStatement(concern, ctx);

    expect(statement.entryRelationships).toHaveLength(1);
    expect(ctx.rejections.map((rejection) => rejection.ruleId)).toEqual(["problem-observation.value-type"]);
  });

  test("a rejected statement returns its rejections and nothing else", () => {
    const parsed = parseStatement(parseFragment(problemConcernAct({ statusCode: "completed" })), makeParserContext());
    expect(parsed.statement).toBeUndefined();
    expect(parsed.rejections?.map((rejection) => rejection.ruleId)).toEqual([
      "concern-act.high-required-when-completed",
    ]);
  });

  test("negationInd marks the statement negated", () => {
    expect(parseTestStatement(problemObservation({ negated: true })).negated).toBe(true);
  });

  test("an unknown template is parsed generically and recorded", () => {
    const ctx = makeParserContext();
    const statement = parseTestStatement(
      `<observation classCode="OBS" moodCode="EVN">
        <templateId root="1.2.3.999"/>
        <code code="X" codeSystem="1.2.3"/>
        <value xsi:type="INT" value="4"/>
      </observation>`,
      ctx,
    );

    expect(statement.schemaId).toBeUndefined();
    expect(statement).toMatchObject({ kind: "observation", values: [{ kind: "integer", value: 4 }] });
    expect(ctx.log.list()).toEqual([
      {
        category: "UnknownConstruct",
        code: "unknown-template",
        message: "No schema registered for template 1.2.3.999; parsed as generic observation",
        path: "/ClinicalDocument/observation",
      },
    ]);
  });

  test("an undecodable value is skipped and recorded", () => {
    const ctx = makeParserContext();
    const statement = parseTestStatement(
      '<observation classCode="OBS" moodCode="EVN"><value xsi:type="RTO" value="1"/></observation>',
      ctx,
    );
    expect(statement).toMatchObject({ kind: "observation", values: [] });
    expect(ctx.log.byCategory("UnknownConstruct").map((decision) => decision.code)).toEqual(["unknown-datatype"]);
  });

  test("reads the CSM participant of an allergy", () => {
    const statement = parseTestStatement(allergyObservation());
    expect(statement.participants).toEqual([
      {
        typeCode: "CSM",
        role: expect.objectContaining({
          classCode: "MANU",
          playingEntity: expect.objectContaining({
            code: expect.objectContaining({ code: "7980", displayName: "Penicillin G" }),
          }),
        }),
      },
    ]);
  });

  test("parses organizer components in order", () => {
    const statement = parseTestStatement(
      vitalSignsOrganizer([
        vitalSignObservation(),
        vitalSignObservation({ id: "w-1", code: "29463-7", display: "Weight", value: '<value xsi:type="PQ" value="70.5" unit="kg"/>' }),
      ]),
    );
    if (statement.kind !== "organizer") throw new Error(`Expected organizer, got ${statement.kind}`);

    expect(statement.components.map((component) => component.code)).toEqual([
      expect.objectContaining({ code: "8302-2" }),
      expect.objectContaining({ code: "29463-7" }),
    ]);
  });

  test("parses a medication activity with its product and schedule", () => {
    const statement = parseTestStatement(`
      <substanceAdministration classCode="SBADM" moodCode="INT">
        <templateId root="2.16.840.1.113883.10.20.22.4.16" extension="2014-06-09"/>
        <id root="cdbd33f0-6cde-11db-9fe1-0800200c9a66"/>
        <statusCode code="active"/>
        <effectiveTime xsi:type="IVL_TS"><low value="20200101"/></effectiveTime>
        <effectiveTime xsi:type="PIVL_TS" institutionSpecified="true" operator="A"><period value="12" unit="h"/></effectiveTime>
        <repeatNumber value="3"/>
        <routeCode code="C38288" codeSystem="2.16.840.1.113883.3.26.1.1" displayName="Oral"/>
        <doseQuantity value="1"/>
        <consumable>
          <manufacturedProduct classCode="MANU">
            <templateId root="2.16.840.1.113883.10.20.22.4.23" extension="2014-06-09"/>
            <manufacturedMaterial>
              <code code="197361" codeSystem="2.16.840.1.113883.6.88" displayName="Amlodipine 5 MG Oral Tablet"/>
            </manufacturedMaterial>
          </manufacturedProduct>
        </consumable>
      </substanceAdministration>`);
    if (statement.kind !== "substanceAdministration") throw new Error(`Expected substanceAdministration, got ${statement.kind}`);

    expect(statement.effectiveTime).toEqual({ kind: "interval", low: { kind: "instant", raw: "20200101" } });
    expect(statement.effectiveTimes).toEqual([
      {
        kind: "periodic-interval",
        period: { kind: "quantity", value: 12, rawValue: "12", unit: "h" },
        institutionSpecified: true,
      },
    ]);
    expect(statement.repeatNumber).toBe(3);
    expect(statement.doseQuantity).toEqual({ kind: "quantity", value: 1, rawValue: "1" });
    expect(statement.routeCode?.code).toBe("C38288");
    expect(statement.product).toMatchObject({
      schemaId: "medication-information",
      code: { code: "197361", displayName: "Amlodipine 5 MG Oral Tablet" },
    });
  });

  test("a product that breaks its template rejects the medication", () => {
    const parsed = parseStatement(
      parseFragment(`
        <substanceAdministration classCode="SBADM" moodCode="INT">
          <templateId root="2.16.840.1.113883.10.20.22.4.16" extension="2014-06-09"/>
          <id root="cdbd33f0-6cde-11db-9fe1-0800200c9a66"/>
          <statusCode code="active"/>
          <effectiveTime xsi:type="IVL_TS"><low value="20200101"/></effectiveTime>
          <consumable>
            <manufacturedProduct classCode="MANU">
              <templateId root="2.16.840.1.113883.10.20.22.4.23" extension="2014-06-09"/>
              <manufacturedMaterial/>
            </manufacturedProduct>
          </consumable>
        </substanceAdministration>`),
      makeParserContext(),
    );
    expect(parsed.rejections?.map((rejection) => rejection.ruleId)).toEqual([
      "medication-information.material-code",
    ]);
  });
});
