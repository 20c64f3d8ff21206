import { describe, test, expect } from "vitest";
import { DecisionLog } from "../../../src/cda-to-fhir/decision-log";
import { assembleDocumentBundle, createBundleEntry } from "../../../src/cda-to-fhir/fhir-bundle";
import { nameBasedUuid, ReferenceRegistry } from "../../../src/cda-to-fhir/references/reference-registry";

const PATIENT_ID = nameBasedUuid("Patient|content|Eve");
const PATIENT = `urn:uuid:${PATIENT_ID}`;

function composition(extra: Partial<fhir4.Composition> = {}): fhir4.Composition {
  return {
    resourceType: "Composition",
    id: "composition-1",
    status: "final",
    type: { text: "Clinical Document" },
    subject: { reference: PATIENT },
    date: "2020-03-01",
    author: [],
    title: "Clinical Document",
    ...extra,
  };
}

function setup(): { log: DecisionLog; registry: ReferenceRegistry } {
  const log = new DecisionLog();
  const registry = new ReferenceRegistry(log);
  registry.register({ resourceType: "Patient" }, "Patient|content|Eve");
  return { log, registry };
}

describe("createBundleEntry", () => {
  test("the fullUrl is the urn:uuid of the resource id", () => {
    expect(createBundleEntry({ resourceType: "Patient", id: PATIENT_ID })).toEqual({
      fullUrl: PATIENT,
      resource: { resourceType: "Patient", id: PATIENT_ID },
    });
  });

  test("assigns an id to a resource without one", () => {
    const entry = createBundleEntry({ resourceType: "Patient" });
    expect(entry.fullUrl).toBe(`urn:uuid:${entry.resource?.id ?? ""}`);
  });
});

describe("assembleDocumentBundle", () => {
  test("Composition first, then registered resources, then Provenance", () => {
    const { log, registry } = setup();
    const provenance: fhir4.Provenance = {
      resourceType: "Provenance",
      id: "provenance-1",
      target: [{ reference: PATIENT }],
      recorded: "2020-03-01T12:00:00-05:00",
      agent: [],
    };

    const bundle = assembleDocumentBundle(composition(), registry, [provenance], {
      log,
      identifier: { system: "urn:oid:2.16.840.1.113883.19.5", value: "TT988" },
      timestamp: "2020-03-02T00:00:00.000Z",
    });

    expect(bundle).toMatchObject({
      resourceType: "Bundle",
      identifier: { system: "urn:oid:2.16.840.1.113883.19.5", value: "TT988" },
      type: "document",
      timestamp: "2020-03-02T00:00:00.000Z",
    });
    expect(bundle.entry?.map((entry) => entry.fullUrl)).toEqual([
      "urn:uuid:composition-1",
      PATIENT,
      "urn:uuid:provenance-1",
    ]);
    expect(log.byCategory("Downgrade")).toEqual([]);
  });

  test("removes references that do not resolve to an entry", () => {
    const { log, registry } = setup();
    registry.register(
      {
        resourceType: "Condition",
        subject: { reference: PATIENT },
        encounter: { reference: "urn:uuid:missing-encounter" },
        evidence: [{ detail: [{ reference: "urn:uuid:missing-observation" }] }],
      },
      "Condition|content|c",
    );

    const bundle = assembleDocumentBundle(
      composition({ section: [{ title: "Problems", entry: [{ reference: "urn:uuid:missing-condition" }] }] }),
      registry,
      [],
      { log },
    );

    const condition = bundle.entry?.[2]?.resource;
    expect(condition).toEqual({
      resourceType: "Condition",
      id: nameBasedUuid("Condition|content|c"),
      subject: { reference: PATIENT },
      evidence: [{}],
    });
    expect(bundle.entry?.[0]?.resource).toMatchObject({ section: [{ title: "Problems" }] });
    expect(log.byCategory("Downgrade").map((decision) => decision.path)).toEqual([
      "Composition.section.entry",
      "Condition.encounter",
      "Condition.evidence.detail",
    ]);
    expect(log.byCategory("Downgrade")[0]).toEqual({
      category: "Downgrade",
      code: "dangling-reference-removed",
      message: "Reference urn:uuid:missing-condition does not resolve to a bundle entry",
      path: "Composition.section.entry",
    });
  });

  test("a bundle with valid references is left as built", () => {
    const { log, registry } = setup();
    const bundle = assembleDocumentBundle(composition(), registry, [], { log });

    expect(bundle.entry?.[0]?.resource).toEqual(composition());
  });
});
