/**
 * Problem Concern Act / Problem Observation to FHIR Condition
 *
 * One Condition per Problem Observation nested in the concern act. The
 * diagnosis code comes from the observation value; an observation without
 * one is skipped rather than mapped to a placeholder.
 */

import { effectiveEnd, effectiveStart, convertTSToDateTime } from "../datatypes/ts-datetime";
import { isCoded, type CodedValue } from "../datatypes/values";
import { fixedConcept } from "../code-mapping/coding-systems";
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
import type { MappingContext } from "./mapping-context";
import { recorderReference } from "./participant-resources";
import { informantReference } from "./related-person";

// ============================================================================
// Code Systems
// ============================================================================

const CONDITION_CLINICAL_SYSTEM = "http://terminology.hl7.org/CodeSystem/condition-clinical";
const CONDITION_VER_STATUS_SYSTEM = "http://terminology.hl7.org/CodeSystem/condition-ver-status";
const CONDITION_CATEGORY_SYSTEM = "http://terminology.hl7.org/CodeSystem/condition-category";

export type ConditionCategory = "problem-list-item" | "encounter-diagnosis";

type ClinicalStatus = "active" | "inactive" | "resolved";

/** Problem Status values (SNOMED CT) */
const PROBLEM_STATUS_MAP: Record<string, ClinicalStatus> = {
  "55561003": "active",
  "73425007": "inactive",
  "413322009": "resolved",
};

// ============================================================================
// Helper Functions
// ============================================================================

function problemStatus(observation: ObservationStatement): ClinicalStatus | undefined {
  for (const relationship of observation.entryRelationships) {
    const statement = relationship.statement;
    if (statement.kind !== "observation" || statement.schemaId !== "problem-status") continue;
    const value = statement.values.find(isCoded);
    const status = value?.code ? PROBLEM_STATUS_MAP[value.code] : undefined;
    if (status) return status;
  }
  return undefined;
}

function clinicalStatus(
  observation: ObservationStatement,
  concern: ActStatement | undefined,
): ClinicalStatus {
  const fromObservation = problemStatus(observation);
  if (fromObservation) return fromObservation;

  const resolved = effectiveEnd(observation.effectiveTime) !== undefined;
  switch (concern?.statusCode) {
    case "completed":
      return resolved ? "resolved" : "active";
    case "suspended":
    case "aborted":
      return "inactive";
    default:
      return resolved ? "resolved" : "active";
  }
}

function diagnosisCode(observation: ObservationStatement): CodedValue | undefined {
  return observation.values.find(isCoded);
}

export function isProblemObservation(statement: ClinicalStatement): statement is ObservationStatement {
  return statement.kind === "observation" && statement.schemaId === "problem-observation";
}

// ============================================================================
// Main Converter Functions
// ============================================================================

/**
 * Field Mappings:
 * - id[]                              -> identifier
 * - value (CD)                        -> code
 * - Problem Status / concern status   -> clinicalStatus
 * - negationInd                       -> verificationStatus (refuted / confirmed)
 * - category argument                 -> category
 * - effectiveTime/low                 -> onsetDateTime
 * - effectiveTime/high                -> abatementDateTime
 * - author/time (earliest)            -> recordedDate
 * - author (latest)                   -> recorder
 * - informant                         -> asserter
 * - Comment Activity                  -> note
 *
 * @returns reference to the Condition, or undefined when it was skipped
 */
export function mapProblemObservation(
  observation: ObservationStatement,
  concern: ActStatement | undefined,
  category: ConditionCategory,
  ctx: MappingContext,
  encounter?: string,
): string | undefined {
  const code = toConcept(diagnosisCode(observation), ctx, observation.path);
  if (!code) {
    ctx.log.missingRequiredData(
      "Condition",
      "Problem observation has no diagnosis code in its value",
      observation.path,
    );
    return undefined;
  }

  const time = timeContext(ctx, observation.path);
  const authors = observation.authors.length > 0 ? observation.authors : concern?.authors ?? [];
  const identity = statementIdentity("Condition", observation, ctx);
  const onsetDateTime = convertTSToDateTime(effectiveStart(observation.effectiveTime), time);
  const abatementDateTime = convertTSToDateTime(effectiveEnd(observation.effectiveTime), time);
  const recordedDate = convertTSToDateTime(earliestAuthorTime(authors), time);
  const recorder = recorderReference(authors, ctx);
  const informants = observation.informants.length > 0 ? observation.informants : concern?.informants ?? [];
  const asserter = informantReference(informants, ctx);
  const note = commentNotes(observation, ctx);

  const resource: fhir4.Condition = {
    resourceType: "Condition",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    clinicalStatus: fixedConcept(CONDITION_CLINICAL_SYSTEM, clinicalStatus(observation, concern)),
    verificationStatus: fixedConcept(
      CONDITION_VER_STATUS_SYSTEM,
      observation.negated ? "refuted" : "confirmed",
    ),
    category: [fixedConcept(CONDITION_CATEGORY_SYSTEM, category)],
    code,
    subject: subjectReference(ctx),
    ...(encounter && { encounter: { reference: encounter } }),
    ...(onsetDateTime && { onsetDateTime }),
    ...(abatementDateTime && { abatementDateTime }),
    ...(recordedDate && { recordedDate }),
    ...(recorder && { recorder }),
    ...(asserter && { asserter }),
    ...(note.length > 0 && { note }),
  };

  return registerResource(resource, identity.key, authors, ctx);
}

/** Every SUBJ Problem Observation of a Problem Concern Act, as Conditions */
export function mapProblemConcern(concern: ActStatement, ctx: MappingContext): string[] {
  return concern.entryRelationships.flatMap((relationship) => {
    if (!isProblemObservation(relationship.statement)) return [];
    const reference = mapProblemObservation(relationship.statement, concern, "problem-list-item", ctx);
    return reference ? [reference] : [];
  });
}
