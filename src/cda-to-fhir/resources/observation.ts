/**
 * Observation-shaped statements to FHIR Observation
 *
 * Covers vital signs (organizer panel plus members, with systolic/diastolic
 * pairs folded into one blood pressure Observation), result observations and
 * social history. The value is mapped by its datatype variant.
 */

import { convertCodedToCoding, resolveOriginalText } from "../datatypes/cd-codeableconcept";
import { convertEDToAttachment } from "../datatypes/ed-attachment";
import { convertIIsToIdentifiers } from "../datatypes/ii-identifier";
import { convertIVLPQ, convertIVLPQToRange, convertPQToQuantity } from "../datatypes/pq-quantity";
import { convertEffectiveTime, convertIntervalToPeriod, convertTSToDateTime } from "../datatypes/ts-datetime";
import { isCoded, type Value } from "../datatypes/values";
import { LOINC_SYSTEM, fixedConcept, fixedDisplay } from "../code-mapping/coding-systems";
import type { ObservationStatement, OrganizerStatement, ReferenceRange } from "../parser/types";
import {
  commentNotes,
  conceptContext,
  dataAbsentReason,
  registerResource,
  statementIdentity,
  subjectReference,
  timeContext,
  toConcept,
} from "./common";
import type { MappingContext } from "./mapping-context";
import { mapPractitioner } from "./participant-resources";

// ============================================================================
// Code Systems
// ============================================================================

export const OBSERVATION_CATEGORY_SYSTEM = "http://terminology.hl7.org/CodeSystem/observation-category";
const VALUE_EXTENSION = "http://hl7.org/fhir/5.0/StructureDefinition/extension-Observation.value";

const VITAL_SIGNS_PANEL = "85353-1";
const BLOOD_PRESSURE_PANEL = "85354-9";
const SYSTOLIC = "8480-6";
const DIASTOLIC = "8462-4";

export type ObservationCategory = "vital-signs" | "laboratory" | "social-history";

type ObservationStatus = fhir4.Observation["status"];

const STATUS_MAP: Record<string, ObservationStatus> = {
  completed: "final",
  active: "preliminary",
  aborted: "cancelled",
  cancelled: "cancelled",
  nullified: "entered-in-error",
};

/** The value[x] (or dataAbsentReason / extension) part of an Observation or component */
type ObservationValue = Pick<
  fhir4.Observation,
  | "valueQuantity"
  | "valueCodeableConcept"
  | "valueString"
  | "valueBoolean"
  | "valueInteger"
  | "valueRange"
  | "valueDateTime"
  | "valuePeriod"
  | "dataAbsentReason"
  | "extension"
>;

// ============================================================================
// Helper Functions
// ============================================================================

export function observationStatus(statusCode: string | undefined): ObservationStatus {
  if (!statusCode) return "final";
  return STATUS_MAP[statusCode] ?? "unknown";
}

/**
 * value[x] by datatype variant:
 * - PQ -> valueQuantity, IVL_PQ -> valueRange (or a bounded valueQuantity)
 * - CD/CE/CV/CO -> valueCodeableConcept
 * - ST -> valueString, INT -> valueInteger, REAL -> valueQuantity, BL -> valueBoolean
 * - TS -> valueDateTime, IVL_TS -> valuePeriod
 * - ED -> R5 Observation.value extension carrying an Attachment
 * - null-flavored -> dataAbsentReason
 */
export function convertObservationValue(
  value: Value | undefined,
  ctx: MappingContext,
  path: string,
): ObservationValue {
  if (!value) return {};
  const time = timeContext(ctx, path);

  switch (value.kind) {
    case "absent":
      return { dataAbsentReason: dataAbsentReason(value.nullFlavor) };
    case "quantity": {
      const valueQuantity = convertPQToQuantity(value);
      return valueQuantity ? { valueQuantity } : {};
    }
    case "quantity-interval": {
      const converted = convertIVLPQ(value);
      if (converted?.range) return { valueRange: converted.range };
      if (converted?.quantity) return { valueQuantity: converted.quantity };
      return {};
    }
    case "real": {
      const valueQuantity = convertPQToQuantity({ kind: "quantity", value: value.value, rawValue: value.rawValue });
      return valueQuantity ? { valueQuantity } : {};
    }
    case "coded": {
      const valueCodeableConcept = toConcept(value, ctx, path);
      return valueCodeableConcept ? { valueCodeableConcept } : {};
    }
    case "string":
      return { valueString: value.value };
    case "integer":
      return { valueInteger: value.value };
    case "boolean":
      return { valueBoolean: value.value };
    case "instant": {
      const valueDateTime = convertTSToDateTime(value.raw, time);
      return valueDateTime ? { valueDateTime } : {};
    }
    case "interval": {
      const valuePeriod = convertIntervalToPeriod(value, time);
      return valuePeriod ? { valuePeriod } : {};
    }
    case "encapsulated": {
      const valueAttachment = convertEDToAttachment(value, conceptContext(ctx, path));
      return valueAttachment ? { extension: [{ url: VALUE_EXTENSION, valueAttachment }] } : {};
    }
    case "periodic-interval":
      ctx.log.downgrade("unsupported-value-type", "PIVL_TS observation value has no FHIR counterpart", path);
      return {};
  }
}

function convertReferenceRange(
  range: ReferenceRange,
  ctx: MappingContext,
  path: string,
): fhir4.ObservationReferenceRange | undefined {
  const bounds =
    range.value?.kind === "quantity-interval" ? convertIVLPQToRange(range.value) : undefined;
  const text = resolveOriginalText(range.text, conceptContext(ctx, path));
  if (!bounds && !text) return undefined;
  return { ...bounds, ...(text && { text }) };
}

/**
 * Category from the template when there is one, else from the caller's
 * classification of the observation code, else none.
 */
function observationCategory(
  templateCategory: ObservationCategory | undefined,
  observation: ObservationStatement,
  ctx: MappingContext,
): fhir4.CodeableConcept | undefined {
  if (templateCategory) return fixedConcept(OBSERVATION_CATEGORY_SYSTEM, templateCategory);

  const coding = convertCodedToCoding(observation.code);
  const classified = coding && ctx.classify?.classify(coding)?.observationCategory;
  if (!classified) return undefined;
  if (fixedDisplay(OBSERVATION_CATEGORY_SYSTEM, classified) === undefined) {
    ctx.log.unknownConstruct(
      "unknown-observation-category",
      `Classified category "${classified}" is not an observation-category code`,
      observation.path,
    );
    return undefined;
  }
  return fixedConcept(OBSERVATION_CATEGORY_SYSTEM, classified);
}

function loincCode(observation: ObservationStatement): string | undefined {
  const code = observation.code;
  if (!isCoded(code)) return undefined;
  const candidates = [code, ...code.translations];
  return candidates.find((candidate) => convertCodedToCoding(candidate)?.system === LOINC_SYSTEM)?.code;
}

function performerReferences(observation: ObservationStatement, ctx: MappingContext): fhir4.Reference[] {
  return observation.performers.flatMap((performer) => {
    const reference = mapPractitioner(performer.assignedEntity, ctx);
    return reference ? [{ reference }] : [];
  });
}

// ============================================================================
// Main Converter Functions
// ============================================================================

/**
 * Field Mappings:
 * - id[]                -> identifier
 * - statusCode          -> status
 * - template / lookup   -> category
 * - code                -> code
 * - effectiveTime       -> effectiveDateTime / effectivePeriod
 * - performer           -> performer
 * - value               -> value[x] / dataAbsentReason
 * - interpretationCode  -> interpretation
 * - targetSiteCode      -> bodySite
 * - methodCode          -> method
 * - referenceRange      -> referenceRange
 * - Comment Activity    -> note
 *
 * @returns reference to the Observation, or undefined when it has no code
 */
export function mapObservation(
  observation: ObservationStatement,
  templateCategory: ObservationCategory | undefined,
  ctx: MappingContext,
): string | undefined {
  const code = toConcept(observation.code, ctx, observation.path);
  if (!code) {
    ctx.log.missingRequiredData("Observation", "Observation has no code", observation.path);
    return undefined;
  }

  const identity = statementIdentity("Observation", observation, ctx);
  const category = observationCategory(templateCategory, observation, ctx);
  const effective = convertEffectiveTime(observation.effectiveTime, timeContext(ctx, observation.path));
  const value = convertObservationValue(observation.values[0], ctx, observation.path);
  const performer = performerReferences(observation, ctx);
  const note = commentNotes(observation, ctx);
  const bodySite = toConcept(observation.targetSiteCodes[0], ctx, observation.path);
  const method = toConcept(observation.methodCode, ctx, observation.path);

  const interpretation = observation.interpretationCodes.flatMap((interpretationCode) => {
    const concept = toConcept(interpretationCode, ctx, observation.path);
    return concept ? [concept] : [];
  });
  const referenceRange = observation.referenceRanges.flatMap((range) => {
    const converted = convertReferenceRange(range, ctx, observation.path);
    return converted ? [converted] : [];
  });

  const resource: fhir4.Observation = {
    resourceType: "Observation",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: observationStatus(observation.statusCode),
    ...(category && { category: [category] }),
    code,
    subject: subjectReference(ctx),
    ...(effective.dateTime && { effectiveDateTime: effective.dateTime }),
    ...(effective.period && { effectivePeriod: effective.period }),
    ...(performer.length > 0 && { performer }),
    ...value,
    ...(interpretation.length > 0 && { interpretation }),
    ...(note.length > 0 && { note }),
    ...(bodySite && { bodySite }),
    ...(method && { method }),
    ...(referenceRange.length > 0 && { referenceRange }),
  };

  return registerResource(resource, identity.key, observation.authors, ctx);
}

// ============================================================================
// Vital Signs
// ============================================================================

function bloodPressureComponent(
  observation: ObservationStatement,
  ctx: MappingContext,
): fhir4.ObservationComponent | undefined {
  const code = toConcept(observation.code, ctx, observation.path);
  if (!code) return undefined;
  const value = convertObservationValue(observation.values[0], ctx, observation.path);
  return {
    code,
    ...(value.valueQuantity && { valueQuantity: value.valueQuantity }),
    ...(value.dataAbsentReason && { dataAbsentReason: value.dataAbsentReason }),
  };
}

/**
 * Fold a systolic/diastolic pair into one 85354-9 Observation whose
 * components carry the two readings. Identity follows the systolic reading;
 * the identifiers of both readings are kept.
 */
function mapBloodPressure(
  systolic: ObservationStatement,
  diastolic: ObservationStatement,
  ctx: MappingContext,
): string {
  const components = [bloodPressureComponent(systolic, ctx), bloodPressureComponent(diastolic, ctx)].filter(
    (component): component is fhir4.ObservationComponent => component !== undefined,
  );

  const identity = statementIdentity("Observation", systolic, ctx, `#${BLOOD_PRESSURE_PANEL}`);
  const identifier = [...identity.identifier, ...convertIIsToIdentifiers(diastolic.ids)];
  const effective = convertEffectiveTime(systolic.effectiveTime, timeContext(ctx, systolic.path));

  const resource: fhir4.Observation = {
    resourceType: "Observation",
    ...(identifier.length > 0 && { identifier }),
    status: observationStatus(systolic.statusCode),
    category: [fixedConcept(OBSERVATION_CATEGORY_SYSTEM, "vital-signs")],
    code: fixedConcept(LOINC_SYSTEM, BLOOD_PRESSURE_PANEL),
    subject: subjectReference(ctx),
    ...(effective.dateTime && { effectiveDateTime: effective.dateTime }),
    ...(effective.period && { effectivePeriod: effective.period }),
    ...(components.length > 0 && { component: components }),
  };

  ctx.log.normalization(
    "blood-pressure-combined",
    "Systolic and diastolic readings combined into one blood pressure Observation",
    systolic.path,
  );
  return registerResource(resource, identity.key, [...systolic.authors, ...diastolic.authors], ctx);
}

/**
 * Field Mappings:
 * - id[]                 -> identifier
 * - statusCode           -> status
 * - (fixed)              -> code 85353-1, category vital-signs
 * - effectiveTime        -> effectiveDateTime / effectivePeriod
 * - component/observation -> hasMember (each mapped on its own)
 *
 * @returns references to the panel and every member, panel first
 */
export function mapVitalSignsOrganizer(organizer: OrganizerStatement, ctx: MappingContext): string[] {
  const readings = organizer.components.filter(
    (component): component is ObservationStatement => component.kind === "observation",
  );
  const systolic = readings.find((reading) => loincCode(reading) === SYSTOLIC);
  const diastolic = readings.find((reading) => loincCode(reading) === DIASTOLIC);
  const combine = systolic !== undefined && diastolic !== undefined;

  const members: string[] = [];
  for (const reading of readings) {
    if (combine && (reading === systolic || reading === diastolic)) {
      if (reading !== systolic) continue;
      members.push(mapBloodPressure(systolic, diastolic, ctx));
      continue;
    }
    const member = mapObservation(reading, "vital-signs", ctx);
    if (member) members.push(member);
  }

  const identity = statementIdentity("Observation", organizer, ctx);
  const effective = convertEffectiveTime(organizer.effectiveTime, timeContext(ctx, organizer.path));

  const panel: fhir4.Observation = {
    resourceType: "Observation",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: observationStatus(organizer.statusCode),
    category: [fixedConcept(OBSERVATION_CATEGORY_SYSTEM, "vital-signs")],
    code: fixedConcept(LOINC_SYSTEM, VITAL_SIGNS_PANEL),
    subject: subjectReference(ctx),
    ...(effective.dateTime && { effectiveDateTime: effective.dateTime }),
    ...(effective.period && { effectivePeriod: effective.period }),
    ...(members.length > 0 && { hasMember: members.map((reference) => ({ reference })) }),
  };

  const reference = registerResource(panel, identity.key, organizer.authors, ctx);
  return [reference, ...members];
}
