import { childElements, type CdaElement } from "../../../src/cda/element";
import { DecisionLog } from "../../../src/cda-to-fhir/decision-log";
import { parseDocument } from "../../../src/cda-to-fhir/parser/document-parser";
import { parseStatement, type ParserContext } from "../../../src/cda-to-fhir/parser/statement-parser";
import type { ClinicalStatement, ParsedDocument } from "../../../src/cda-to-fhir/parser/types";
import { ReferenceRegistry } from "../../../src/cda-to-fhir/references/reference-registry";
import type { MappingContext } from "../../../src/cda-to-fhir/resources/mapping-context";
import { normalizeXml } from "../../../src/cda-to-fhir/xml-normalizer";

export const TEST_PATIENT_REFERENCE = "urn:uuid:test-patient";

const NAMESPACES =
  'xmlns="urn:hl7-org:v3" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns:sdtc="urn:hl7-org:sdtc"';

export function makeTestContext(overrides?: Partial<MappingContext>): MappingContext {
  const log = overrides?.log ?? new DecisionLog();
  return {
    registry: new ReferenceRegistry(log),
    log,
    document: { patient: TEST_PATIENT_REFERENCE, authors: [] },
    authored: [],
    ...overrides,
  };
}

export function makeParserContext(overrides?: Partial<ParserContext>): ParserContext {
  return {
    log: new DecisionLog(),
    mistagRepairs: [],
    rejections: [],
    ...overrides,
  };
}

/**
 * Parse a markup fragment and return its first element. The fragment is
 * wrapped in a ClinicalDocument, so paths start with /ClinicalDocument.
 */
export function parseFragment(fragment: string, log: DecisionLog = new DecisionLog()): CdaElement {
  const root = normalizeXml(`<ClinicalDocument ${NAMESPACES}>${fragment}</ClinicalDocument>`, {
    markupPreprocessors: [],
    elementPreprocessors: ["strip-xsi-type-prefix"],
    log,
  });
  const [element] = childElements(root);
  if (!element) throw new Error("Fragment has no element");
  return element;
}

/** Parse a statement fragment; fails the test when it is rejected */
export function parseTestStatement(fragment: string, ctx: ParserContext = makeParserContext()): ClinicalStatement {
  const parsed = parseStatement(parseFragment(fragment), ctx);
  if (!parsed.statement) {
    throw new Error(`Statement rejected: ${parsed.rejections.map((r) => r.ruleId).join(", ")}`);
  }
  return parsed.statement;
}

/** Parse a whole document; statement rejections are left in `rejections` */
export function parseTestDocument(markup: string, ctx: ParserContext = makeParserContext()): ParsedDocument {
  const root = normalizeXml(markup, {
    markupPreprocessors: [],
    elementPreprocessors: ["strip-xsi-type-prefix"],
    log: ctx.log,
  });
  return parseDocument(root, ctx);
}

/** A registered resource of the given type, by its urn:uuid reference */
export function resourceAt<T extends fhir4.FhirResource["resourceType"]>(
  ctx: MappingContext,
  reference: string | undefined,
  resourceType: T,
): Extract<fhir4.FhirResource, { resourceType: T }> {
  const resource = ctx.registry
    .resources()
    .find((candidate): candidate is Extract<fhir4.FhirResource, { resourceType: T }> =>
      candidate.resourceType === resourceType && `urn:uuid:${candidate.id ?? ""}` === reference,
    );
  if (!resource) throw new Error(`No ${resourceType} registered at ${reference ?? "(none)"}`);
  return resource;
}
