/**
 * recordTarget/patientRole to FHIR Patient (US Core)
 */

import { convertCodedToCoding } from "../datatypes/cd-codeableconcept";
import { convertIIsToIdentifiers } from "../datatypes/ii-identifier";
import { formatHumanName } from "../datatypes/pn-humanname";
import { convertTSToDate, convertTSToDateTime } from "../datatypes/ts-datetime";
import type { AbsentValue, CodedValue } from "../datatypes/values";
import type { PatientInfo } from "../parser/types";
import { canonicalKey } from "../references/reference-registry";
import { timeContext, toConcept } from "./common";
import type { MappingContext } from "./mapping-context";
import { mapOrganization } from "./participant-resources";

// ============================================================================
// Code Systems
// ============================================================================

const US_CORE_RACE = "http://hl7.org/fhir/us/core/StructureDefinition/us-core-race";
const US_CORE_ETHNICITY = "http://hl7.org/fhir/us/core/StructureDefinition/us-core-ethnicity";
const US_CORE_BIRTH_SEX = "http://hl7.org/fhir/us/core/StructureDefinition/us-core-birthsex";
const BCP_47 = "urn:ietf:bcp:47";

/** OMB minimum categories; anything else in CDC Race & Ethnicity is "detailed" */
const OMB_RACE_CATEGORIES = new Set(["1002-5", "2028-9", "2054-5", "2076-8", "2106-3"]);
const OMB_ETHNICITY_CATEGORIES = new Set(["2135-2", "2186-5"]);

const GENDER_MAP: Record<string, fhir4.Patient["gender"]> = {
  F: "female",
  M: "male",
  UN: "other",
};

const BIRTH_SEX_CODES = new Set(["F", "M", "UNK"]);

// ============================================================================
// Helper Functions
// ============================================================================

function convertGender(gender: CodedValue | AbsentValue | undefined): fhir4.Patient["gender"] {
  if (!gender) return undefined;
  if (gender.kind === "absent") return "unknown";
  return gender.code ? GENDER_MAP[gender.code] ?? "unknown" : undefined;
}

/**
 * US Core race / ethnicity extension: OMB codes as ombCategory, other codes
 * as detailed, display names as text.
 */
function categoryExtension(
  url: string,
  codes: readonly CodedValue[],
  ombCategories: ReadonlySet<string>,
): fhir4.Extension | undefined {
  const parts: fhir4.Extension[] = [];
  for (const coded of codes) {
    const coding = convertCodedToCoding(coded);
    if (!coding?.code) continue;
    parts.push({
      url: ombCategories.has(coding.code) ? "ombCategory" : "detailed",
      valueCoding: coding,
    });
  }
  if (parts.length === 0) return undefined;

  const text = codes
    .map((coded) => coded.displayName ?? coded.originalText?.text)
    .filter((display): display is string => display !== undefined)
    .join(", ");
  if (text) parts.push({ url: "text", valueString: text });

  return { url, extension: parts };
}

function birthSexExtension(birthSex: string | undefined): fhir4.Extension | undefined {
  if (!birthSex || !BIRTH_SEX_CODES.has(birthSex)) return undefined;
  return { url: US_CORE_BIRTH_SEX, valueCode: birthSex };
}

/**
 * Registry key of a recordTarget. Known before the Patient is mapped, so every
 * clinical resource can reference it.
 */
export function patientKey(patient: PatientInfo): string {
  return canonicalKey("Patient", patient.ids, formatHumanName(patient.names[0]) ?? patient.path);
}

// ============================================================================
// Main Converter Function
// ============================================================================

/**
 * Field Mappings:
 * - id[]                        -> identifier
 * - patient/name[]              -> name
 * - administrativeGenderCode    -> gender (nullFlavor -> unknown)
 * - birthTime                   -> birthDate
 * - deceasedTime / deceasedInd  -> deceasedDateTime / deceasedBoolean
 * - addr[] / telecom[]          -> address / telecom
 * - maritalStatusCode           -> maritalStatus
 * - raceCode, sdtc:raceCode     -> extension[us-core-race]
 * - ethnicGroupCode (+ sdtc)    -> extension[us-core-ethnicity]
 * - languageCommunication[]     -> communication
 * - providerOrganization        -> managingOrganization
 * - Birth Sex Observation value -> extension[us-core-birthsex]
 *
 * @param birthSex - code of the social history Birth Sex Observation, if any
 */
export function mapPatient(
  patient: PatientInfo,
  ctx: MappingContext,
  birthSex?: string,
): string {
  const time = timeContext(ctx, patient.path);
  const identifier = convertIIsToIdentifiers(patient.ids);
  const gender = convertGender(patient.gender);
  const birthDate = convertTSToDate(patient.birthTime, time);
  const deceasedDateTime = convertTSToDateTime(patient.deceasedTime, time);
  const maritalStatus = toConcept(patient.maritalStatus, ctx, patient.path);
  const managingOrganization = mapOrganization(patient.providerOrganization, ctx);

  const extension = [
    categoryExtension(US_CORE_RACE, patient.race, OMB_RACE_CATEGORIES),
    categoryExtension(US_CORE_ETHNICITY, patient.ethnicity, OMB_ETHNICITY_CATEGORIES),
    birthSexExtension(birthSex),
  ].filter((ext): ext is fhir4.Extension => ext !== undefined);

  const communication: fhir4.PatientCommunication[] = patient.languages.map((language) => ({
    language: { coding: [{ system: BCP_47, code: language.language }] },
    ...(language.preferred !== undefined && { preferred: language.preferred }),
  }));

  const resource: fhir4.Patient = {
    resourceType: "Patient",
    ...(extension.length > 0 && { extension }),
    ...(identifier.length > 0 && { identifier }),
    ...(patient.names.length > 0 && { name: patient.names }),
    ...(patient.telecoms.length > 0 && { telecom: patient.telecoms }),
    ...(gender && { gender }),
    ...(birthDate && { birthDate }),
    ...(deceasedDateTime
      ? { deceasedDateTime }
      : patient.deceased !== undefined && { deceasedBoolean: patient.deceased }),
    ...(patient.addresses.length > 0 && { address: patient.addresses }),
    ...(maritalStatus && { maritalStatus }),
    ...(communication.length > 0 && { communication }),
    ...(managingOrganization && { managingOrganization: { reference: managingOrganization } }),
  };

  return ctx.registry.register(resource, patientKey(patient)).reference;
}
