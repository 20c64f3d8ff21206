/**
 * C-CDA to FHIR Converter
 *
 * Markup -> element tree -> parsed document -> mapped resources -> document
 * Bundle. The entry points never throw: every outcome is a ConversionResult.
 */

import type { CdaElement } from "../cda/element";
import { DecisionLog, type ConversionDecision } from "./decision-log";
import { convertIIToIdentifier } from "./datatypes/ii-identifier";
import {
  ConversionFault,
  formatRejection,
  MalformedInputError,
  StructuralRejectionError,
  type StructuralRejection,
} from "./errors";
import { assembleDocumentBundle } from "./fhir-bundle";
import { createConverterContext, type ConverterContext } from "./converter-context";
import { parseDocument } from "./parser/document-parser";
import { scopedNarrativeIndex, type NarrativeIndex } from "./parser/narrative";
import type { ParsedDocument, Section } from "./parser/types";
import { HEADER_SCHEMA_ID } from "./templates/validator";
import { ReferenceRegistry, uuidReference } from "./references/reference-registry";
import { mapCarePlan } from "./resources/care-plan";
import { mapComposition, type MappedSection } from "./resources/composition";
import { mapHeaderEncounter } from "./resources/encounter";
import { findBirthSex, mapEntry } from "./resources/entry-mapper";
import type { MappingContext } from "./resources/mapping-context";
import { mapPatient, patientKey } from "./resources/patient";
import { mapProvenances } from "./resources/provenance";
import { mapHeaderInformants } from "./resources/related-person";
import { normalizeXml } from "./xml-normalizer";

export type RejectionReason = "MalformedInput" | "StructuralRejection" | "InternalFault";

export type ConversionResult =
  | {
      status: "converted";
      bundle: fhir4.Bundle;
      decisions: ConversionDecision[];
    }
  | {
      status: "rejected";
      reason: RejectionReason;
      message: string;
      rejections: StructuralRejection[];
      decisions: ConversionDecision[];
    };

// ============================================================================
// Helper Functions
// ============================================================================

function rejected(
  reason: RejectionReason,
  message: string,
  log: DecisionLog,
  rejections: StructuralRejection[] = [],
): ConversionResult {
  return { status: "rejected", reason, message, rejections, decisions: log.list() };
}

function recordRejections(rejections: readonly StructuralRejection[], log: DecisionLog): void {
  for (const rejection of rejections) {
    log.record({
      category: "StructuralRejection",
      code: "statement-rejected",
      message: rejection.message,
      path: rejection.path,
      ruleId: rejection.ruleId,
    });
  }
}

function mapSection(section: Section, ctx: MappingContext, enclosingIndex: NarrativeIndex): MappedSection {
  const narrativeIndex = scopedNarrativeIndex(section.narrativeIndex, enclosingIndex);
  const sectionCtx: MappingContext = {
    ...ctx,
    section: {
      path: section.path,
      ...(section.code && { code: section.code }),
      narrativeIndex,
    },
  };
  const entries = section.entries.flatMap((entry) => (entry.statement ? mapEntry(entry.statement, sectionCtx) : []));
  const sections = section.sections.map((nested) => mapSection(nested, ctx, narrativeIndex));
  return { section, entries: [...new Set(entries)], sections };
}

/**
 * Map a parsed document and assemble its Bundle.
 *
 * Order matters: the Patient reference is fixed first, body sections are
 * mapped before the header encounter (so a duplicate header encounter merges
 * into the body one), and Provenance is built last from everything mapped.
 */
function mapDocument(parsed: ParsedDocument, context: ConverterContext, log: DecisionLog): fhir4.Bundle {
  const { header } = parsed;
  const [patientInfo, ...otherPatients] = header.recordTargets;
  if (!patientInfo) {
    throw new StructuralRejectionError([
      {
        ruleId: "header.record-target",
        path: header.path,
        message: "Document has no recordTarget/patientRole",
        schemaId: HEADER_SCHEMA_ID,
      },
    ]);
  }
  if (otherPatients.length > 0) {
    log.unknownConstruct(
      "additional-record-target",
      `${otherPatients.length} additional recordTarget(s) ignored; only the first becomes the subject`,
      header.path,
    );
  }

  const registry = new ReferenceRegistry(log);
  const ctx: MappingContext = {
    registry,
    log,
    ...(context.classify && { classify: context.classify }),
    document: {
      patient: uuidReference(registry.assignId(patientKey(patientInfo))),
      authors: header.authors,
      ...(header.effectiveTime && { time: header.effectiveTime }),
    },
    authored: [],
  };

  mapPatient(patientInfo, ctx, findBirthSex(parsed.sections));
  mapHeaderInformants(header.informants, ctx);
  const sections = parsed.sections.map((section) => mapSection(section, ctx, parsed.narrativeIndex));
  const encounter = header.encompassingEncounter ? mapHeaderEncounter(header.encompassingEncounter, ctx) : undefined;
  mapCarePlan(header, sections, ctx);

  const timestamp = context.now().toISOString();
  const composition = mapComposition(header, sections, ctx, {
    ...(encounter && { encounter }),
    fallbackDate: timestamp,
  });
  const provenances = mapProvenances(ctx);
  const identifier = convertIIToIdentifier(header.id);

  return assembleDocumentBundle(composition, registry, provenances, {
    log,
    ...(identifier && { identifier }),
    timestamp,
  });
}

function convertTree(root: CdaElement, context: ConverterContext, log: DecisionLog): ConversionResult {
  const { config } = context;
  const parsed = parseDocument(root, {
    log,
    mistagRepairs: config.datatypes.mistagRepairs,
    rejections: [],
  });

  if (parsed.rejections.length > 0) {
    if (config.conformance.onStatementRejection === "reject-document") {
      const [first] = parsed.rejections;
      const message = first ? formatRejection(first) : "Document rejected";
      return rejected("StructuralRejection", message, log, parsed.rejections);
    }
    recordRejections(parsed.rejections, log);
  }

  const bundle = mapDocument(parsed, context, log);
  return { status: "converted", bundle, decisions: log.list() };
}

function classifyFailure(error: unknown, log: DecisionLog): ConversionResult {
  if (error instanceof MalformedInputError) {
    return rejected("MalformedInput", error.message, log);
  }
  if (error instanceof StructuralRejectionError) {
    return rejected("StructuralRejection", error.message, log, error.rejections);
  }
  const cause = error instanceof Error ? error.message : String(error);
  const fault = new ConversionFault(`Internal fault during conversion: ${cause}`, error);
  console.error(`[cda-to-fhir] ${fault.message}`);
  return rejected("InternalFault", fault.message, log);
}

// ============================================================================
// Main Converter Functions
// ============================================================================

/**
 * Convert an already-normalized element tree.
 *
 * @param root - ClinicalDocument element, as produced by normalizeXml()
 */
export function convertDocumentTree(
  root: CdaElement,
  context: ConverterContext = createConverterContext(),
): ConversionResult {
  const log = new DecisionLog(context.config.logging.decisions);
  try {
    return convertTree(root, context, log);
  } catch (error) {
    return classifyFailure(error, log);
  }
}

/**
 * Convert raw C-CDA markup to a FHIR R4 document Bundle.
 *
 * Malformed markup, header rule failures and (under the default policy)
 * statement rule failures reject the document; any other failure is reported
 * as InternalFault.
 */
export function convertCdaDocument(
  markup: string,
  context: ConverterContext = createConverterContext(),
): ConversionResult {
  const log = new DecisionLog(context.config.logging.decisions);
  try {
    const root = normalizeXml(markup, {
      markupPreprocessors: context.config.preprocess.markup,
      elementPreprocessors: context.config.preprocess.element,
      log,
    });
    return convertTree(root, context, log);
  } catch (error) {
    return classifyFailure(error, log);
  }
}

export default convertCdaDocument;
