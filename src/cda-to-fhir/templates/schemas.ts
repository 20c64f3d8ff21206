/**
 * Statement schema registry
 *
 * Maps C-CDA entry template roots to the structural rules a statement claiming
 * that template must satisfy. Rules run in the order listed. Rule ids are
 * "<schema>.<constraint>" and are stable: they are what a rejection cites.
 */

import { TemplateIds } from "./template-ids";
import {
  requireChild,
  requireEntryRelationship,
  requireFixedCode,
  requireHighWhenCompleted,
  requireLowBound,
  requirePath,
  requireValueType,
  type ConformanceRule,
} from "./rules";

export type StatementElementName =
  | "act"
  | "observation"
  | "encounter"
  | "procedure"
  | "substanceAdministration"
  | "organizer"
  | "supply"
  | "manufacturedProduct";

export interface StatementSchema {
  /** Stable kebab-case name, e.g. "problem-concern-act" */
  id: string;
  templateRoot: string;
  /** Template versions (templateId/@extension) this schema was written for */
  extensions?: readonly string[];
  elementNames: readonly StatementElementName[];
  /** Higher wins when several schemas match one element */
  specificity: number;
  rules: readonly ConformanceRule[];
}

const CONCERN_CODE = { code: "CONC", codeSystem: "2.16.840.1.113883.5.6" };
const ALLERGIES_LOINC = { code: "48765-2", codeSystem: "2.16.840.1.113883.6.1" };
const SMOKING_STATUS_LOINC = { code: "72166-2", codeSystem: "2.16.840.1.113883.6.1" };

function ruleIds(schemaId: string) {
  return (constraint: string): string => `${schemaId}.${constraint}`;
}

// ============================================================================
// Problems
// ============================================================================

const problemConcernAct: StatementSchema = (() => {
  const rule = ruleIds("problem-concern-act");
  return {
    id: "problem-concern-act",
    templateRoot: TemplateIds.PROBLEM_CONCERN_ACT,
    extensions: ["2015-08-01"],
    elementNames: ["act"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireFixedCode(rule("code-fixed"), [CONCERN_CODE]),
      requireChild(rule("status-code"), "statusCode"),
      requireLowBound(rule("effective-time-low")),
      requireHighWhenCompleted("concern-act.high-required-when-completed"),
      requireEntryRelationship(rule("problem-observation"), "SUBJ", TemplateIds.PROBLEM_OBSERVATION),
    ],
  };
})();

const problemObservation: StatementSchema = (() => {
  const rule = ruleIds("problem-observation");
  return {
    id: "problem-observation",
    templateRoot: TemplateIds.PROBLEM_OBSERVATION,
    extensions: ["2015-08-01"],
    elementNames: ["observation"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("code"), "code"),
      requireChild(rule("effective-time"), "effectiveTime"),
      requireValueType(rule("value-type"), "CD"),
    ],
  };
})();

const problemStatus: StatementSchema = {
  id: "problem-status",
  templateRoot: TemplateIds.PROBLEM_STATUS,
  elementNames: ["observation"],
  specificity: 10,
  rules: [requireValueType("problem-status.value-type", "CD")],
};

// ============================================================================
// Allergies
// ============================================================================

const allergyConcernAct: StatementSchema = (() => {
  const rule = ruleIds("allergy-concern-act");
  return {
    id: "allergy-concern-act",
    templateRoot: TemplateIds.ALLERGY_CONCERN_ACT,
    extensions: ["2015-08-01"],
    elementNames: ["act"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireFixedCode(rule("code-fixed"), [CONCERN_CODE, ALLERGIES_LOINC]),
      requireChild(rule("status-code"), "statusCode"),
      requireChild(rule("effective-time"), "effectiveTime"),
      requireHighWhenCompleted("concern-act.high-required-when-completed"),
    ],
  };
})();

const allergyObservation: StatementSchema = (() => {
  const rule = ruleIds("allergy-observation");
  return {
    id: "allergy-observation",
    templateRoot: TemplateIds.ALLERGY_OBSERVATION,
    extensions: ["2014-06-09"],
    elementNames: ["observation"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("code"), "code"),
      requireValueType(rule("value-type"), "CD"),
    ],
  };
})();

const reactionObservation: StatementSchema = {
  id: "reaction-observation",
  templateRoot: TemplateIds.REACTION_OBSERVATION,
  extensions: ["2014-06-09"],
  elementNames: ["observation"],
  specificity: 10,
  rules: [requireValueType("reaction-observation.value-type", "CD")],
};

const severityObservation: StatementSchema = {
  id: "severity-observation",
  templateRoot: TemplateIds.SEVERITY_OBSERVATION,
  extensions: ["2014-06-09"],
  elementNames: ["observation"],
  specificity: 10,
  rules: [requireValueType("severity-observation.value-type", "CD")],
};

const allergyStatusObservation: StatementSchema = {
  id: "allergy-status-observation",
  templateRoot: TemplateIds.ALLERGY_STATUS_OBSERVATION,
  elementNames: ["observation"],
  specificity: 10,
  rules: [requireValueType("allergy-status-observation.value-type", "CD")],
};

const criticalityObservation: StatementSchema = {
  id: "criticality-observation",
  templateRoot: TemplateIds.CRITICALITY_OBSERVATION,
  elementNames: ["observation"],
  specificity: 10,
  rules: [requireValueType("criticality-observation.value-type", "CD")],
};

// ============================================================================
// Medications and Immunizations
// ============================================================================

const medicationActivity: StatementSchema = (() => {
  const rule = ruleIds("medication-activity");
  return {
    id: "medication-activity",
    templateRoot: TemplateIds.MEDICATION_ACTIVITY,
    extensions: ["2014-06-09"],
    elementNames: ["substanceAdministration"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("status-code"), "statusCode"),
      requireChild(rule("effective-time"), "effectiveTime"),
      requirePath(rule("consumable"), "consumable", "manufacturedProduct"),
    ],
  };
})();

const immunizationActivity: StatementSchema = (() => {
  const rule = ruleIds("immunization-activity");
  return {
    id: "immunization-activity",
    templateRoot: TemplateIds.IMMUNIZATION_ACTIVITY,
    extensions: ["2015-08-01"],
    elementNames: ["substanceAdministration"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("status-code"), "statusCode"),
      requireChild(rule("effective-time"), "effectiveTime"),
      requirePath(rule("consumable"), "consumable", "manufacturedProduct"),
    ],
  };
})();

const immunizationRefusalReason: StatementSchema = {
  id: "immunization-refusal-reason",
  templateRoot: TemplateIds.IMMUNIZATION_REFUSAL_REASON,
  elementNames: ["observation"],
  specificity: 10,
  rules: [requireChild("immunization-refusal-reason.code", "code")],
};

const medicationDispense: StatementSchema = (() => {
  const rule = ruleIds("medication-dispense");
  return {
    id: "medication-dispense",
    templateRoot: TemplateIds.MEDICATION_DISPENSE,
    extensions: ["2014-06-09"],
    elementNames: ["supply"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("status-code"), "statusCode"),
      requirePath(rule("product"), "product", "manufacturedProduct"),
    ],
  };
})();

const daysSupply: StatementSchema = {
  id: "days-supply",
  templateRoot: TemplateIds.DAYS_SUPPLY,
  extensions: ["2017-08-01"],
  elementNames: ["supply"],
  specificity: 10,
  rules: [requireChild("days-supply.quantity", "quantity")],
};

/** Product templates are validated where the consumable is read */
const medicationInformation: StatementSchema = {
  id: "medication-information",
  templateRoot: TemplateIds.MEDICATION_INFORMATION,
  extensions: ["2014-06-09"],
  elementNames: ["manufacturedProduct"],
  specificity: 10,
  rules: [requirePath("medication-information.material-code", "manufacturedMaterial", "code")],
};

const immunizationMedicationInformation: StatementSchema = {
  id: "immunization-medication-information",
  templateRoot: TemplateIds.IMMUNIZATION_MEDICATION_INFORMATION,
  extensions: ["2014-06-09"],
  elementNames: ["manufacturedProduct"],
  specificity: 10,
  rules: [requirePath("immunization-medication-information.material-code", "manufacturedMaterial", "code")],
};

// ============================================================================
// Procedures, Encounters, Notes
// ============================================================================

const procedureActivityProcedure: StatementSchema = (() => {
  const rule = ruleIds("procedure-activity-procedure");
  return {
    id: "procedure-activity-procedure",
    templateRoot: TemplateIds.PROCEDURE_ACTIVITY_PROCEDURE,
    extensions: ["2014-06-09"],
    elementNames: ["procedure"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("code"), "code"),
      requireChild(rule("status-code"), "statusCode"),
    ],
  };
})();

const encounterActivity: StatementSchema = (() => {
  const rule = ruleIds("encounter-activity");
  return {
    id: "encounter-activity",
    templateRoot: TemplateIds.ENCOUNTER_ACTIVITY,
    extensions: ["2015-08-01"],
    elementNames: ["encounter"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("effective-time"), "effectiveTime"),
    ],
  };
})();

const encounterDiagnosis: StatementSchema = {
  id: "encounter-diagnosis",
  templateRoot: TemplateIds.ENCOUNTER_DIAGNOSIS,
  extensions: ["2015-08-01"],
  elementNames: ["act"],
  specificity: 10,
  rules: [
    requireEntryRelationship(
      "encounter-diagnosis.problem-observation",
      "SUBJ",
      TemplateIds.PROBLEM_OBSERVATION,
    ),
  ],
};

const noteActivity: StatementSchema = {
  id: "note-activity",
  templateRoot: TemplateIds.NOTE_ACTIVITY,
  extensions: ["2016-11-01"],
  elementNames: ["act"],
  specificity: 10,
  rules: [
    requireChild("note-activity.code", "code"),
    requireChild("note-activity.text", "text"),
  ],
};

const commentActivity: StatementSchema = {
  id: "comment-activity",
  templateRoot: TemplateIds.COMMENT_ACTIVITY,
  elementNames: ["act"],
  specificity: 10,
  rules: [],
};

// ============================================================================
// Vital Signs and Results
// ============================================================================

const vitalSignsOrganizer: StatementSchema = (() => {
  const rule = ruleIds("vital-signs-organizer");
  return {
    id: "vital-signs-organizer",
    templateRoot: TemplateIds.VITAL_SIGNS_ORGANIZER,
    extensions: ["2015-08-01"],
    elementNames: ["organizer"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("code"), "code"),
      requireChild(rule("status-code"), "statusCode"),
      requireChild(rule("effective-time"), "effectiveTime"),
      requireChild(rule("component"), "component"),
    ],
  };
})();

const vitalSignObservation: StatementSchema = (() => {
  const rule = ruleIds("vital-sign-observation");
  return {
    id: "vital-sign-observation",
    templateRoot: TemplateIds.VITAL_SIGN_OBSERVATION,
    extensions: ["2014-06-09"],
    elementNames: ["observation"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("code"), "code"),
      requireChild(rule("status-code"), "statusCode"),
      requireChild(rule("effective-time"), "effectiveTime"),
      requireValueType(rule("value-type"), "PQ"),
    ],
  };
})();

const resultOrganizer: StatementSchema = (() => {
  const rule = ruleIds("result-organizer");
  return {
    id: "result-organizer",
    templateRoot: TemplateIds.RESULT_ORGANIZER,
    extensions: ["2015-08-01"],
    elementNames: ["organizer"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("code"), "code"),
      requireChild(rule("status-code"), "statusCode"),
      requireChild(rule("component"), "component"),
    ],
  };
})();

const resultObservation: StatementSchema = (() => {
  const rule = ruleIds("result-observation");
  return {
    id: "result-observation",
    templateRoot: TemplateIds.RESULT_OBSERVATION,
    extensions: ["2015-08-01"],
    elementNames: ["observation"],
    specificity: 10,
    rules: [
      requireChild(rule("id"), "id"),
      requireChild(rule("code"), "code"),
      requireChild(rule("status-code"), "statusCode"),
      requireChild(rule("value"), "value"),
    ],
  };
})();

// ============================================================================
// Social History
// ============================================================================

const socialHistoryObservation: StatementSchema = {
  id: "social-history-observation",
  templateRoot: TemplateIds.SOCIAL_HISTORY_OBSERVATION,
  extensions: ["2015-08-01"],
  elementNames: ["observation"],
  specificity: 10,
  rules: [
    requireChild("social-history-observation.id", "id"),
    requireChild("social-history-observation.code", "code"),
  ],
};

/** Smoking status also claims the social history template; it is more specific */
const smokingStatusObservation: StatementSchema = {
  id: "smoking-status-observation",
  templateRoot: TemplateIds.SMOKING_STATUS_OBSERVATION,
  extensions: ["2014-06-09"],
  elementNames: ["observation"],
  specificity: 20,
  rules: [
    requireFixedCode("smoking-status-observation.code-fixed", [SMOKING_STATUS_LOINC]),
    requireValueType("smoking-status-observation.value-type", "CD"),
  ],
};

const birthSexObservation: StatementSchema = {
  id: "birth-sex-observation",
  templateRoot: TemplateIds.BIRTH_SEX_OBSERVATION,
  extensions: ["2016-06-01"],
  elementNames: ["observation"],
  specificity: 20,
  rules: [requireValueType("birth-sex-observation.value-type", "CD")],
};

// ============================================================================
// Registry
// ============================================================================

export const STATEMENT_SCHEMAS: readonly StatementSchema[] = [
  problemConcernAct,
  problemObservation,
  problemStatus,
  allergyConcernAct,
  allergyObservation,
  reactionObservation,
  severityObservation,
  allergyStatusObservation,
  criticalityObservation,
  medicationActivity,
  immunizationActivity,
  immunizationRefusalReason,
  medicationDispense,
  daysSupply,
  medicationInformation,
  immunizationMedicationInformation,
  procedureActivityProcedure,
  encounterActivity,
  encounterDiagnosis,
  noteActivity,
  commentActivity,
  vitalSignsOrganizer,
  vitalSignObservation,
  resultOrganizer,
  resultObservation,
  socialHistoryObservation,
  smokingStatusObservation,
  birthSexObservation,
];

/** Template roots with a registered schema */
export const KNOWN_TEMPLATE_ROOTS: ReadonlySet<string> = new Set(
  STATEMENT_SCHEMAS.map((schema) => schema.templateRoot),
);
