/**
 * US Realm Header and body sections to FHIR Composition
 */

import { convertIIToIdentifier } from "../datatypes/ii-identifier";
import { convertTSToDateTime } from "../datatypes/ts-datetime";
import { fixedConcept } from "../code-mapping/coding-systems";
import { narrativeText } from "../parser/narrative";
import type { DocumentHeader, Section } from "../parser/types";
import { canonicalKey } from "../references/reference-registry";
import { subjectReference, timeContext, toConcept } from "./common";
import type { MappingContext } from "./mapping-context";
import { authorReferences, mapOrganization, mapPractitioner } from "./participant-resources";

const LIST_EMPTY_REASON_SYSTEM = "http://terminology.hl7.org/CodeSystem/list-empty-reason";
const XHTML_NAMESPACE = "http://www.w3.org/1999/xhtml";
const DEFAULT_TITLE = "Clinical Document";
const UNKNOWN_AUTHOR = "Unknown Author";

/** v3-ConfidentialityClassification codes Composition.confidentiality accepts */
const CONFIDENTIALITY_CODES = ["U", "L", "M", "N", "R", "V"] as const;

const EMPTY_REASON_MAP: Record<string, string> = {
  NI: "nilknown",
  NASK: "notasked",
  MSK: "withheld",
  UNK: "unavailable",
  ASKU: "unavailable",
  NAV: "unavailable",
};

/** A body section together with the resources mapped from its entries */
export interface MappedSection {
  section: Section;
  entries: string[];
  sections: MappedSection[];
}

// ============================================================================
// Helper Functions
// ============================================================================

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Plain-text rendering of the section narrative */
function sectionNarrative(section: Section): fhir4.Narrative | undefined {
  if (!section.narrative) return undefined;
  const text = narrativeText(section.narrative);
  if (!text) return undefined;
  return { status: "generated", div: `<div xmlns="${XHTML_NAMESPACE}">${escapeXml(text)}</div>` };
}

/**
 * Field Mappings:
 * - title          -> title
 * - code           -> code
 * - text           -> text (plain text, status generated)
 * - entry          -> entry (references to resources mapped from the section)
 * - component      -> section
 * - nullFlavor     -> emptyReason, when the section has no entries
 */
function convertSection(mapped: MappedSection, ctx: MappingContext): fhir4.CompositionSection {
  const { section } = mapped;
  const code = toConcept(section.code, ctx, section.path);
  const text = sectionNarrative(section);
  const nested = mapped.sections.map((child) => convertSection(child, ctx));
  const isEmpty = mapped.entries.length === 0 && nested.length === 0;
  const emptyReason =
    isEmpty && (section.nullFlavor !== undefined || !text)
      ? fixedConcept(LIST_EMPTY_REASON_SYSTEM, EMPTY_REASON_MAP[section.nullFlavor ?? ""] ?? "unavailable")
      : undefined;

  return {
    ...(section.title && { title: section.title }),
    ...(code && { code }),
    ...(text && { text }),
    ...(mapped.entries.length > 0 && { entry: mapped.entries.map((reference) => ({ reference })) }),
    ...(emptyReason && { emptyReason }),
    ...(nested.length > 0 && { section: nested }),
  };
}

// ============================================================================
// Main Converter Function
// ============================================================================

/** Registry key of the Composition; also the Bundle identifier source */
export function compositionKey(header: DocumentHeader): string {
  return canonicalKey("Composition", header.id ? [header.id] : [], header.path);
}

export interface CompositionOptions {
  /** Reference to the header encounter, when there is one */
  encounter?: string;
  /** Date used when the document effectiveTime cannot be converted */
  fallbackDate: string;
}

/**
 * Field Mappings:
 * - setId (else id)          -> identifier
 * - languageCode             -> language
 * - code                     -> type
 * - effectiveTime            -> date
 * - author                   -> author (display "Unknown Author" when none maps)
 * - title                    -> title (else type text)
 * - confidentialityCode      -> confidentiality
 * - legalAuthenticator       -> attester (mode legal)
 * - custodian                -> custodian
 * - componentOf              -> encounter
 * - section                  -> section
 *
 * The Composition is not registered: it is always the first Bundle entry.
 */
export function mapComposition(
  header: DocumentHeader,
  sections: readonly MappedSection[],
  ctx: MappingContext,
  options: CompositionOptions,
): fhir4.Composition {
  const time = timeContext(ctx, header.path);
  const type = toConcept(header.code, ctx, header.path) ?? { text: DEFAULT_TITLE };
  const identifier = convertIIToIdentifier(header.setId) ?? convertIIToIdentifier(header.id);
  const author = authorReferences(header.authors, ctx);
  if (author.length === 0) {
    ctx.log.downgrade(
      "composition-author-defaulted",
      "No document author maps to a Practitioner or Device; author recorded by display only",
      header.path,
      "Composition",
    );
    author.push({ display: UNKNOWN_AUTHOR });
  }
  const custodian = mapOrganization(header.custodian, ctx);
  const confidentiality = CONFIDENTIALITY_CODES.find((code) => code === header.confidentialityCode);

  let date = convertTSToDateTime(header.effectiveTime, time);
  if (!date) {
    ctx.log.downgrade(
      "composition-date-defaulted",
      "Document effectiveTime could not be converted; assembly time used",
      header.path,
      "Composition",
    );
    date = options.fallbackDate;
  }

  const legal = header.legalAuthenticator;
  const legalParty = legal ? mapPractitioner(legal.assignedEntity, ctx) : undefined;
  const legalTime = convertTSToDateTime(legal?.time, time);
  const attester: fhir4.CompositionAttester[] = legal
    ? [
        {
          mode: "legal",
          ...(legalTime && { time: legalTime }),
          ...(legalParty && { party: { reference: legalParty } }),
        },
      ]
    : [];

  return {
    resourceType: "Composition",
    id: ctx.registry.assignId(compositionKey(header)),
    ...(header.languageCode && { language: header.languageCode }),
    ...(identifier && { identifier }),
    status: "final",
    type,
    subject: subjectReference(ctx),
    ...(options.encounter && { encounter: { reference: options.encounter } }),
    date,
    author,
    title: header.title ?? type.text ?? type.coding?.[0]?.display ?? DEFAULT_TITLE,
    ...(confidentiality && { confidentiality }),
    ...(attester.length > 0 && { attester }),
    ...(custodian && { custodian: { reference: custodian } }),
    ...(sections.length > 0 && { section: sections.map((section) => convertSection(section, ctx)) }),
  };
}
