/**
 * Allergy Concern Act / Allergy Observation to FHIR AllergyIntolerance
 *
 * The substance comes from the CSM participant's playingEntity. The
 * observation value says what kind of propensity it is; only the value codes
 * listed below carry a type or category.
 */

import { effectiveEnd, effectiveStart, convertTSToDateTime } from "../datatypes/ts-datetime";
import { isCoded, type AbsentValue, type CodedValue } from "../datatypes/values";
import { convertCodedToCoding } from "../datatypes/cd-codeableconcept";
import { SNOMED_SYSTEM, fixedConcept } from "../code-mapping/coding-systems";
import type { ActStatement, ClinicalStatement, ObservationStatement } from "../parser/types";
import {
  commentNotes,
  earliestAuthorTime,
  registerResource,
  statementIdentity,
  subjectReference,
  timeContext,
  toConcept,
} from "./common";
import type { AllergyCategory, MappingContext } from "./mapping-context";
import { recorderReference } from "./participant-resources";
import { informantReference } from "./related-person";

// ============================================================================
// Code Systems
// ============================================================================

const ALLERGY_CLINICAL_SYSTEM = "http://terminology.hl7.org/CodeSystem/allergyintolerance-clinical";
const ALLERGY_VERIFICATION_SYSTEM = "http://terminology.hl7.org/CodeSystem/allergyintolerance-verification";
const ABATEMENT_EXTENSION = "http://hl7.org/fhir/StructureDefinition/allergyintolerance-abatement";

type AllergyType = NonNullable<fhir4.AllergyIntolerance["type"]>;
type ClinicalStatus = "active" | "inactive" | "resolved";
type ReactionSeverity = NonNullable<fhir4.AllergyIntoleranceReaction["severity"]>;
type Criticality = NonNullable<fhir4.AllergyIntolerance["criticality"]>;

interface PropensityCode {
  type?: AllergyType;
  category?: AllergyCategory;
}

/**
 * Allergy and intolerance type value set (SNOMED CT). Codes without a
 * category are generic: they say nothing about the substance.
 */
const PROPENSITY_CODES: Record<string, PropensityCode> = {
  "419199007": { type: "allergy" },
  "420134006": {},
  "418038007": {},
  "416098002": { type: "allergy", category: "medication" },
  "59037007": { type: "intolerance", category: "medication" },
  "419511003": { category: "medication" },
  "414285001": { type: "allergy", category: "food" },
  "235719002": { type: "intolerance", category: "food" },
  "418471000": { category: "food" },
  "426232007": { type: "allergy", category: "environment" },
};

/** Allergy Status Observation values */
const ALLERGY_STATUS_MAP: Record<string, ClinicalStatus> = {
  "55561003": "active",
  "73425007": "inactive",
  "413322009": "resolved",
};

/** Severity Observation values */
const SEVERITY_MAP: Record<string, ReactionSeverity> = {
  "255604002": "mild",
  "6736007": "moderate",
  "24484000": "severe",
  "371923003": "mild",
  "371924009": "moderate",
  "399166001": "severe",
};

/** Criticality Observation values (v3 ObservationValue) */
const CRITICALITY_MAP: Record<string, Criticality> = {
  CRITL: "low",
  CRITH: "high",
  CRITU: "unable-to-assess",
};

// ============================================================================
// Helper Functions
// ============================================================================

function nestedObservations(statement: ObservationStatement, schemaId: string): ObservationStatement[] {
  return statement.entryRelationships.flatMap(({ statement: nested }) =>
    nested.kind === "observation" && nested.schemaId === schemaId ? [nested] : [],
  );
}

function firstCodedValue(observation: ObservationStatement | undefined): CodedValue | undefined {
  return observation?.values.find(isCoded);
}

function propensity(value: CodedValue | undefined): PropensityCode | undefined {
  if (!value?.code) return undefined;
  const system = convertCodedToCoding(value)?.system;
  if (system !== undefined && system !== SNOMED_SYSTEM) return undefined;
  return PROPENSITY_CODES[value.code];
}

/** playingEntity code of the consumable (CSM) participant */
function substanceCode(observation: ObservationStatement): CodedValue | AbsentValue | undefined {
  const consumable = observation.participants.find((participant) => participant.typeCode === "CSM");
  return consumable?.role.playingEntity?.code;
}

function clinicalStatus(observation: ObservationStatement, concern: ActStatement | undefined): ClinicalStatus {
  const status = firstCodedValue(nestedObservations(observation, "allergy-status-observation")[0]);
  const fromObservation = status?.code ? ALLERGY_STATUS_MAP[status.code] : undefined;
  if (fromObservation) return fromObservation;

  switch (concern?.statusCode) {
    case "completed":
      return "resolved";
    case "suspended":
    case "aborted":
      return "inactive";
    default:
      return "active";
  }
}

function severityOf(observation: ObservationStatement): ReactionSeverity | undefined {
  const value = firstCodedValue(nestedObservations(observation, "severity-observation")[0]);
  return value?.code ? SEVERITY_MAP[value.code] : undefined;
}

function mapReactions(
  observation: ObservationStatement,
  ctx: MappingContext,
): fhir4.AllergyIntoleranceReaction[] {
  return nestedObservations(observation, "reaction-observation").flatMap((reaction) => {
    const manifestation = toConcept(firstCodedValue(reaction), ctx, reaction.path);
    if (!manifestation) return [];

    const onset = convertTSToDateTime(effectiveStart(reaction.effectiveTime), timeContext(ctx, reaction.path));
    const severity = severityOf(reaction) ?? severityOf(observation);
    return [
      {
        manifestation: [manifestation],
        ...(onset && { onset }),
        ...(severity && { severity }),
      },
    ];
  });
}

function criticalityOf(observation: ObservationStatement): Criticality | undefined {
  const value = firstCodedValue(nestedObservations(observation, "criticality-observation")[0]);
  return value?.code ? CRITICALITY_MAP[value.code] : undefined;
}

function classifiedCategory(
  code: fhir4.CodeableConcept,
  ctx: MappingContext,
): AllergyCategory | undefined {
  if (!ctx.classify) return undefined;
  for (const coding of code.coding ?? []) {
    const category = ctx.classify.classify(coding)?.allergyCategory;
    if (category) return category;
  }
  return undefined;
}

export function isAllergyObservation(statement: ClinicalStatement): statement is ObservationStatement {
  return statement.kind === "observation" && statement.schemaId === "allergy-observation";
}

// ============================================================================
// Main Converter Functions
// ============================================================================

/**
 * Field Mappings:
 * - id[]                                  -> identifier
 * - participant[CSM]/playingEntity/code   -> code (value when not a generic type)
 * - value                                 -> type, category
 * - Allergy Status / concern status       -> clinicalStatus
 * - negationInd                           -> verificationStatus (refuted / confirmed)
 * - effectiveTime/low                     -> onsetDateTime
 * - effectiveTime/high                    -> extension[allergyintolerance-abatement]
 * - author/time (earliest)                -> recordedDate
 * - author (latest)                       -> recorder
 * - informant                             -> asserter
 * - Criticality Observation               -> criticality
 * - Reaction Observation (+ Severity)     -> reaction[]
 * - Comment Activity                      -> note
 */
export function mapAllergyObservation(
  observation: ObservationStatement,
  concern: ActStatement | undefined,
  ctx: MappingContext,
): string | undefined {
  const value = firstCodedValue(observation);
  const valueKind = propensity(value);
  const substance = substanceCode(observation);

  const code =
    toConcept(substance, ctx, observation.path) ??
    (valueKind === undefined ? toConcept(value, ctx, observation.path) : undefined);
  if (!code) {
    ctx.log.missingRequiredData(
      "AllergyIntolerance",
      "Allergy observation has no substance code and no specific value code",
      observation.path,
    );
    return undefined;
  }

  const time = timeContext(ctx, observation.path);
  const authors = observation.authors.length > 0 ? observation.authors : concern?.authors ?? [];
  const identity = statementIdentity("AllergyIntolerance", observation, ctx);
  const category = valueKind?.category ?? classifiedCategory(code, ctx);
  const onsetDateTime = convertTSToDateTime(effectiveStart(observation.effectiveTime), time);
  const abatement = convertTSToDateTime(effectiveEnd(observation.effectiveTime), time);
  const recordedDate = convertTSToDateTime(earliestAuthorTime(authors), time);
  const recorder = recorderReference(authors, ctx);
  const informants = observation.informants.length > 0 ? observation.informants : concern?.informants ?? [];
  const asserter = informantReference(informants, ctx);
  const criticality = criticalityOf(observation);
  const reaction = mapReactions(observation, ctx);
  const note = commentNotes(observation, ctx);

  const resource: fhir4.AllergyIntolerance = {
    resourceType: "AllergyIntolerance",
    ...(abatement && { extension: [{ url: ABATEMENT_EXTENSION, valueDateTime: abatement }] }),
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    clinicalStatus: fixedConcept(ALLERGY_CLINICAL_SYSTEM, clinicalStatus(observation, concern)),
    verificationStatus: fixedConcept(
      ALLERGY_VERIFICATION_SYSTEM,
      observation.negated ? "refuted" : "confirmed",
    ),
    ...(valueKind?.type && { type: valueKind.type }),
    ...(category && { category: [category] }),
    ...(criticality && { criticality }),
    code,
    patient: subjectReference(ctx),
    ...(onsetDateTime && { onsetDateTime }),
    ...(recordedDate && { recordedDate }),
    ...(recorder && { recorder }),
    ...(asserter && { asserter }),
    ...(note.length > 0 && { note }),
    ...(reaction.length > 0 && { reaction }),
  };

  return registerResource(resource, identity.key, authors, ctx);
}

/** Every SUBJ Allergy Observation of an Allergy Concern Act */
export function mapAllergyConcern(concern: ActStatement, ctx: MappingContext): string[] {
  return concern.entryRelationships.flatMap(({ statement }) => {
    if (!isAllergyObservation(statement)) return [];
    const reference = mapAllergyObservation(statement, concern, ctx);
    return reference ? [reference] : [];
  });
}
