/**
 * C-CDA R2.1 template identifiers (roots)
 *
 * Entry templates live under 2.16.840.1.113883.10.20.22.4, section templates
 * under 2.16.840.1.113883.10.20.22.2, document templates under
 * 2.16.840.1.113883.10.20.22.1.
 */

import { attr, children, type CdaElement } from "../../cda/element";

const ENTRY = "2.16.840.1.113883.10.20.22.4";
const SECTION = "2.16.840.1.113883.10.20.22.2";
const DOCUMENT = "2.16.840.1.113883.10.20.22.1";

export const TemplateIds = {
  // Documents
  US_REALM_HEADER: `${DOCUMENT}.1`,
  CCD: `${DOCUMENT}.2`,
  CARE_PLAN: `${DOCUMENT}.15`,

  // Entries
  RESULT_ORGANIZER: `${ENTRY}.1`,
  RESULT_OBSERVATION: `${ENTRY}.2`,
  PROBLEM_CONCERN_ACT: `${ENTRY}.3`,
  PROBLEM_OBSERVATION: `${ENTRY}.4`,
  PROBLEM_STATUS: `${ENTRY}.6`,
  ALLERGY_OBSERVATION: `${ENTRY}.7`,
  SEVERITY_OBSERVATION: `${ENTRY}.8`,
  REACTION_OBSERVATION: `${ENTRY}.9`,
  PROCEDURE_ACTIVITY_PROCEDURE: `${ENTRY}.14`,
  MEDICATION_ACTIVITY: `${ENTRY}.16`,
  MEDICATION_DISPENSE: `${ENTRY}.18`,
  MEDICATION_INFORMATION: `${ENTRY}.23`,
  VITAL_SIGNS_ORGANIZER: `${ENTRY}.26`,
  VITAL_SIGN_OBSERVATION: `${ENTRY}.27`,
  ALLERGY_STATUS_OBSERVATION: `${ENTRY}.28`,
  ALLERGY_CONCERN_ACT: `${ENTRY}.30`,
  SOCIAL_HISTORY_OBSERVATION: `${ENTRY}.38`,
  ENCOUNTER_ACTIVITY: `${ENTRY}.49`,
  IMMUNIZATION_ACTIVITY: `${ENTRY}.52`,
  IMMUNIZATION_REFUSAL_REASON: `${ENTRY}.53`,
  IMMUNIZATION_MEDICATION_INFORMATION: `${ENTRY}.54`,
  COMMENT_ACTIVITY: `${ENTRY}.64`,
  SMOKING_STATUS_OBSERVATION: `${ENTRY}.78`,
  ENCOUNTER_DIAGNOSIS: `${ENTRY}.80`,
  AUTHOR_PARTICIPATION: `${ENTRY}.119`,
  CRITICALITY_OBSERVATION: `${ENTRY}.145`,
  BIRTH_SEX_OBSERVATION: `${ENTRY}.200`,
  NOTE_ACTIVITY: `${ENTRY}.202`,
  /** Pharmacy Templates guide, outside the C-CDA entry tree */
  DAYS_SUPPLY: "2.16.840.1.113883.10.20.37.3.10",

  // Sections
  ALLERGIES_SECTION: `${SECTION}.6.1`,
  MEDICATIONS_SECTION: `${SECTION}.1.1`,
  PROBLEM_SECTION: `${SECTION}.5.1`,
  PROCEDURES_SECTION: `${SECTION}.7.1`,
  RESULTS_SECTION: `${SECTION}.3.1`,
  VITAL_SIGNS_SECTION: `${SECTION}.4.1`,
  SOCIAL_HISTORY_SECTION: `${SECTION}.17`,
  IMMUNIZATIONS_SECTION: `${SECTION}.2.1`,
  ENCOUNTERS_SECTION: `${SECTION}.22.1`,
  NOTES_SECTION: `${SECTION}.65`,
  PLAN_OF_TREATMENT_SECTION: `${SECTION}.10`,
} as const;

export interface TemplateId {
  root: string;
  extension?: string;
}

export function readTemplateIds(element: CdaElement | undefined): TemplateId[] {
  return children(element, "templateId").flatMap((templateId) => {
    const root = attr(templateId, "root");
    if (!root) return [];
    const extension = attr(templateId, "extension");
    return [{ root, ...(extension && { extension }) }];
  });
}

export function hasTemplate(templateIds: readonly TemplateId[], root: string): boolean {
  return templateIds.some((templateId) => templateId.root === root);
}

export function elementHasTemplate(element: CdaElement | undefined, root: string): boolean {
  return hasTemplate(readTemplateIds(element), root);
}

/** Display form used in messages: root or root:extension */
export function formatTemplateId(templateId: TemplateId): string {
  return templateId.extension ? `${templateId.root}:${templateId.extension}` : templateId.root;
}
