/**
 * Helpers shared by the mapping strategies: identity, registration,
 * concept and time conversion with the context's log attached.
 */

import {
  convertCodedToCodeableConcept,
  resolveOriginalText,
  type ConceptContext,
} from "../datatypes/cd-codeableconcept";
import { convertIIsToIdentifiers, isUsableIdentifier } from "../datatypes/ii-identifier";
import { effectiveStart, type EffectiveTime, type TimeContext } from "../datatypes/ts-datetime";
import type { AbsentValue, CodedValue, InstanceIdentifier, NullFlavor } from "../datatypes/values";
import { fixedCoding } from "../code-mapping/coding-systems";
import type { Author, ClinicalStatement } from "../parser/types";
import { canonicalKey } from "../references/reference-registry";
import type { MappingContext } from "./mapping-context";

export const DATA_ABSENT_REASON_SYSTEM = "http://terminology.hl7.org/CodeSystem/data-absent-reason";

export interface StatementIdentity {
  key: string;
  identifier: fhir4.Identifier[];
}

/** Fields a synthesized id is derived from */
export interface IdentitySource {
  path: string;
  ids: readonly InstanceIdentifier[];
  code?: CodedValue | AbsentValue;
  effectiveTime?: EffectiveTime;
  statusCode?: string;
}

// ============================================================================
// Identity
// ============================================================================

/**
 * Canonical key and FHIR identifiers of a statement. Without a usable id the
 * key is synthesized from code + effective time + status, and the synthesis is
 * recorded as a downgrade.
 */
export function statementIdentity(
  resourceType: string,
  source: IdentitySource,
  ctx: MappingContext,
  discriminator = "",
): StatementIdentity {
  const identifier = convertIIsToIdentifiers(source.ids);
  if (source.ids.some(isUsableIdentifier)) {
    return { key: canonicalKey(resourceType, source.ids, "") + discriminator, identifier };
  }

  const code = source.code?.kind === "coded" ? `${source.code.codeSystem ?? ""}#${source.code.code ?? ""}` : "";
  const content = [code, effectiveStart(source.effectiveTime) ?? "", source.statusCode ?? "", discriminator].join("|");
  ctx.log.downgrade(
    "synthesized-id",
    `${resourceType} has no usable id; id derived from code, effective time and status`,
    source.path,
    resourceType,
  );
  return { key: canonicalKey(resourceType, [], content), identifier };
}

/**
 * Register a mapped resource and remember its authors for provenance.
 * Authorship is only recorded for the first registration of a key.
 */
export function registerResource(
  resource: fhir4.FhirResource,
  key: string,
  authors: readonly Author[],
  ctx: MappingContext,
): string {
  const { reference, deduplicated } = ctx.registry.register(resource, key);
  if (!deduplicated && authors.length > 0) {
    ctx.authored.push({ target: reference, authors: [...authors] });
  }
  return reference;
}

export function toReference(reference: string | undefined, display?: string): fhir4.Reference | undefined {
  if (!reference) return undefined;
  return { reference, ...(display && { display }) };
}

/** Patient reference every clinical resource points at */
export function subjectReference(ctx: MappingContext): fhir4.Reference {
  return { reference: ctx.document.patient };
}

// ============================================================================
// Conversion Contexts
// ============================================================================

export function conceptContext(ctx: MappingContext, path: string): ConceptContext {
  return {
    log: ctx.log,
    ...(ctx.section && { narrativeIndex: ctx.section.narrativeIndex }),
    path,
  };
}

export function timeContext(ctx: MappingContext, path: string): TimeContext {
  return { log: ctx.log, path };
}

export function toConcept(
  coded: CodedValue | AbsentValue | undefined,
  ctx: MappingContext,
  path: string,
): fhir4.CodeableConcept | undefined {
  return convertCodedToCodeableConcept(coded, conceptContext(ctx, path));
}

// ============================================================================
// Absent Values
// ============================================================================

const DATA_ABSENT_REASONS: Partial<Record<NullFlavor, string>> = {
  UNK: "unknown",
  ASKU: "asked-unknown",
  NAV: "temp-unknown",
  NASK: "not-asked",
  MSK: "masked",
  NA: "not-applicable",
  NINF: "negative-infinity",
  PINF: "positive-infinity",
};

/** dataAbsentReason for a null flavor; flavors without a counterpart map to "unknown" */
export function dataAbsentReason(nullFlavor: NullFlavor): fhir4.CodeableConcept {
  const code = DATA_ABSENT_REASONS[nullFlavor] ?? "unknown";
  return { coding: [fixedCoding(DATA_ABSENT_REASON_SYSTEM, code)] };
}

function authorTimes(authors: readonly Author[]): string[] {
  return authors
    .map((author) => author.time)
    .filter((time): time is string => time !== undefined)
    .sort();
}

/** Latest author time, else undefined */
export function latestAuthorTime(authors: readonly Author[]): string | undefined {
  return authorTimes(authors).at(-1);
}

export function earliestAuthorTime(authors: readonly Author[]): string | undefined {
  return authorTimes(authors)[0];
}

/** Author with the latest time; an untimed author only when no author has a time */
export function latestAuthor(authors: readonly Author[]): Author | undefined {
  let latest: Author | undefined;
  for (const author of authors) {
    if (!latest) {
      latest = author;
    } else if (author.time !== undefined && (latest.time === undefined || author.time > latest.time)) {
      latest = author;
    }
  }
  return latest;
}

// ============================================================================
// Notes
// ============================================================================

/** Comment Activities nested under a statement, as Annotations */
export function commentNotes(statement: ClinicalStatement, ctx: MappingContext): fhir4.Annotation[] {
  return statement.entryRelationships.flatMap(({ statement: nested }) => {
    if (nested.schemaId !== "comment-activity") return [];
    const text = resolveOriginalText(nested.text, conceptContext(ctx, nested.path));
    return text ? [{ text }] : [];
  });
}
