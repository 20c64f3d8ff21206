/**
 * Call-scoped state handed to every mapping strategy.
 *
 * Strategies never read config or global state; everything they need arrives
 * here. One context (and one registry) per document conversion.
 */

import type { DecisionLog } from "../decision-log";
import type { CodedValue } from "../datatypes/values";
import type { NarrativeIndex } from "../parser/narrative";
import type { Author } from "../parser/types";
import type { ReferenceRegistry } from "../references/reference-registry";

export type AllergyCategory = NonNullable<fhir4.AllergyIntolerance["category"]>[number];

/** What a caller-supplied lookup can say about a code */
export interface CodeClassification {
  allergyCategory?: AllergyCategory;
  /** Code from http://terminology.hl7.org/CodeSystem/observation-category */
  observationCategory?: string;
}

/**
 * Optional caller-supplied classification. Consulted only when the template
 * gives no classification; its absence is always safe.
 */
export interface CodeClassificationLookup {
  classify(coding: fhir4.Coding): CodeClassification | undefined;
}

export interface DocumentContext {
  /** Reference to the Patient built from the first recordTarget */
  patient: string;
  /** Header authors, used when a statement has none of its own */
  authors: Author[];
  /** Raw TS of ClinicalDocument/effectiveTime */
  time?: string;
}

export interface SectionContext {
  path: string;
  code?: CodedValue;
  narrativeIndex: NarrativeIndex;
}

/** A mapped resource whose source statement carried authors */
export interface AuthoredResource {
  target: string;
  authors: Author[];
}

export interface MappingContext {
  registry: ReferenceRegistry;
  log: DecisionLog;
  classify?: CodeClassificationLookup;
  document: DocumentContext;
  section?: SectionContext;
  /** Filled by strategies; Provenance resources are built from it at assembly */
  authored: AuthoredResource[];
}
