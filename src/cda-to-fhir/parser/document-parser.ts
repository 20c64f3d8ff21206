/**
 * ClinicalDocument -> ParsedDocument
 *
 * Header first (validated; any failure rejects the document), then the
 * structured body, section by section. Each section's narrative is parsed
 * once and indexed; the document-wide index is the union of the section
 * indexes.
 */

import { attr, child, children, descend, normalizedText, type CdaElement } from "../../cda/element";
import { decodeConcreteCoded, decodeCoded, decodeEffectiveTime, decodeIdentifier, decodeIdentifiers } from "../datatypes/decode";
import { convertADsToAddresses } from "../datatypes/ad-address";
import { convertPNsToHumanNames } from "../datatypes/pn-humanname";
import { convertTELsToContactPoints } from "../datatypes/tel-contactpoint";
import type { CodedValue } from "../datatypes/values";
import { StructuralRejectionError } from "../errors";
import { readTemplateIds } from "../templates/template-ids";
import { validateHeader } from "../templates/validator";
import { parseNarrative, type NarrativeBlock, type NarrativeIndex } from "./narrative";
import {
  parseAssignedEntity,
  parseAuthors,
  parseFacility,
  parseInformants,
  parseOrganization,
  parsePerformers,
} from "./participants";
import { findStatementElement, parseStatement, type ParserContext } from "./statement-parser";
import type {
  DocumentHeader,
  EncompassingEncounter,
  LanguageCommunication,
  LegalAuthenticator,
  ParsedDocument,
  ParsedEntry,
  PatientInfo,
  Section,
  ServiceEvent,
} from "./types";

// ============================================================================
// Header
// ============================================================================

function codedList(parent: CdaElement | undefined, name: string, prefix?: string): CodedValue[] {
  return children(parent, name)
    .filter((element) => element.prefix === prefix)
    .flatMap((element) => {
      const coded = decodeConcreteCoded(element);
      return coded ? [coded] : [];
    });
}

function parseLanguages(patient: CdaElement | undefined): LanguageCommunication[] {
  return children(patient, "languageCommunication").flatMap((communication) => {
    const language = attr(child(communication, "languageCode"), "code");
    if (!language) return [];
    const preference = attr(child(communication, "preferenceInd"), "value");
    return [{ language, ...(preference !== undefined && { preferred: preference === "true" }) }];
  });
}

function parsePatientRole(patientRole: CdaElement): PatientInfo {
  const patient = child(patientRole, "patient");
  const gender = decodeCoded(child(patient, "administrativeGenderCode"));
  const birthTime = attr(child(patient, "birthTime"), "value");
  const deceasedInd = attr(child(patient, "deceasedInd"), "value");
  const deceasedTime = attr(child(patient, "deceasedTime"), "value");
  const maritalStatus = decodeConcreteCoded(child(patient, "maritalStatusCode"));
  const providerOrganization = parseOrganization(child(patientRole, "providerOrganization"));

  return {
    path: patientRole.path,
    ids: decodeIdentifiers(patientRole),
    names: convertPNsToHumanNames(children(patient, "name")),
    addresses: convertADsToAddresses(children(patientRole, "addr")),
    telecoms: convertTELsToContactPoints(children(patientRole, "telecom")),
    ...(gender && { gender }),
    ...(birthTime && { birthTime }),
    ...(deceasedInd !== undefined && { deceased: deceasedInd === "true" }),
    ...(deceasedTime && { deceasedTime }),
    ...(maritalStatus && { maritalStatus }),
    race: [...codedList(patient, "raceCode"), ...codedList(patient, "raceCode", "sdtc")],
    ethnicity: [
      ...codedList(patient, "ethnicGroupCode"),
      ...codedList(patient, "ethnicGroupCode", "sdtc"),
    ],
    languages: parseLanguages(patient),
    ...(providerOrganization && { providerOrganization }),
  };
}

function parseLegalAuthenticator(root: CdaElement): LegalAuthenticator | undefined {
  const legalAuthenticator = child(root, "legalAuthenticator");
  const assignedEntity = child(legalAuthenticator, "assignedEntity");
  if (!assignedEntity) return undefined;
  const time = attr(child(legalAuthenticator, "time"), "value");
  return { ...(time && { time }), assignedEntity: parseAssignedEntity(assignedEntity) };
}

function parseEncompassingEncounter(root: CdaElement): EncompassingEncounter | undefined {
  const encounter = descend(root, "componentOf", "encompassingEncounter");
  if (!encounter) return undefined;

  const code = decodeConcreteCoded(child(encounter, "code"));
  const effectiveTime = decodeEffectiveTime(child(encounter, "effectiveTime"));
  const dischargeDisposition = decodeConcreteCoded(child(encounter, "dischargeDispositionCode"));
  const responsible = descend(encounter, "responsibleParty", "assignedEntity");
  const location = parseFacility(descend(encounter, "location", "healthCareFacility"));

  return {
    path: encounter.path,
    ids: decodeIdentifiers(encounter),
    ...(code && { code }),
    ...(effectiveTime && { effectiveTime }),
    ...(dischargeDisposition && { dischargeDisposition }),
    ...(responsible && { responsibleParty: parseAssignedEntity(responsible) }),
    encounterParticipants: parsePerformers(encounter, "encounterParticipant"),
    ...(location && { location }),
  };
}

function parseServiceEvents(root: CdaElement): ServiceEvent[] {
  return children(root, "documentationOf").flatMap((documentationOf) => {
    const event = child(documentationOf, "serviceEvent");
    if (!event) return [];
    const code = decodeConcreteCoded(child(event, "code"));
    const effectiveTime = decodeEffectiveTime(child(event, "effectiveTime"));
    return [
      {
        path: event.path,
        ...(code && { code }),
        ...(effectiveTime && { effectiveTime }),
        performers: parsePerformers(event),
      },
    ];
  });
}

function parseVersionNumber(root: CdaElement): number | undefined {
  const raw = attr(child(root, "versionNumber"), "value");
  return raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : undefined;
}

function parseHeader(root: CdaElement): DocumentHeader {
  const idElement = child(root, "id");
  const setIdElement = child(root, "setId");
  const versionNumber = parseVersionNumber(root);
  const code = decodeConcreteCoded(child(root, "code"));
  const title = normalizedText(child(root, "title"));
  const effectiveTime = attr(child(root, "effectiveTime"), "value");
  const confidentialityCode = attr(child(root, "confidentialityCode"), "code");
  const languageCode = attr(child(root, "languageCode"), "code");
  const custodian = parseOrganization(
    descend(root, "custodian", "assignedCustodian", "representedCustodianOrganization"),
  );
  const legalAuthenticator = parseLegalAuthenticator(root);
  const encompassingEncounter = parseEncompassingEncounter(root);

  return {
    path: root.path,
    templateIds: readTemplateIds(root),
    ...(idElement && { id: decodeIdentifier(idElement) }),
    ...(setIdElement && { setId: decodeIdentifier(setIdElement) }),
    ...(versionNumber !== undefined && { versionNumber }),
    ...(code && { code }),
    ...(title && { title }),
    ...(effectiveTime && { effectiveTime }),
    ...(confidentialityCode && { confidentialityCode }),
    ...(languageCode && { languageCode }),
    recordTargets: children(root, "recordTarget").flatMap((recordTarget) => {
      const patientRole = child(recordTarget, "patientRole");
      return patientRole ? [parsePatientRole(patientRole)] : [];
    }),
    authors: parseAuthors(root),
    informants: parseInformants(root),
    ...(custodian && { custodian }),
    ...(legalAuthenticator && { legalAuthenticator }),
    serviceEvents: parseServiceEvents(root),
    ...(encompassingEncounter && { encompassingEncounter }),
  };
}

// ============================================================================
// Body
// ============================================================================

const EMPTY_INDEX: NarrativeIndex = new Map();

function parseEntries(section: CdaElement, ctx: ParserContext): ParsedEntry[] {
  return children(section, "entry").flatMap((entry) => {
    const statement = findStatementElement(entry);
    if (!statement) return [];
    const parsed = parseStatement(statement, ctx);
    if (parsed.rejections) ctx.rejections.push(...parsed.rejections);
    return [parsed];
  });
}

function parseSection(section: CdaElement, ctx: ParserContext): Section {
  const code = decodeConcreteCoded(child(section, "code"));
  const title = normalizedText(child(section, "title"));
  const nullFlavor = attr(section, "nullFlavor");
  const textElement = child(section, "text");
  const narrative: { block?: NarrativeBlock; index: NarrativeIndex } = textElement
    ? parseNarrative(textElement)
    : { index: EMPTY_INDEX };

  const entries = parseEntries(section, ctx);
  const sections = children(section, "component").flatMap((component) => {
    const nested = child(component, "section");
    return nested ? [parseSection(nested, ctx)] : [];
  });

  return {
    path: section.path,
    templateIds: readTemplateIds(section),
    ...(code && { code }),
    ...(title && { title }),
    ...(nullFlavor && { nullFlavor }),
    ...(narrative.block && { narrative: narrative.block }),
    narrativeIndex: narrative.index,
    entries,
    sections,
  };
}

function mergeIndexes(sections: readonly Section[], into: Map<string, NarrativeBlock>): void {
  for (const section of sections) {
    for (const [id, block] of section.narrativeIndex) {
      if (!into.has(id)) into.set(id, block);
    }
    mergeIndexes(section.sections, into);
  }
}

// ============================================================================
// Main Parser Function
// ============================================================================

/**
 * @throws StructuralRejectionError when a US Realm Header rule fails
 */
export function parseDocument(root: CdaElement, ctx: ParserContext): ParsedDocument {
  const headerRejections = validateHeader(root, ctx);
  if (headerRejections.length > 0) {
    throw new StructuralRejectionError(headerRejections);
  }

  const header = parseHeader(root);

  const body = descend(root, "component", "structuredBody");
  const sections = children(body, "component").flatMap((component) => {
    const section = child(component, "section");
    return section ? [parseSection(section, ctx)] : [];
  });

  const narrativeIndex = new Map<string, NarrativeBlock>();
  mergeIndexes(sections, narrativeIndex);

  return { header, sections, narrativeIndex, rejections: ctx.rejections };
}
