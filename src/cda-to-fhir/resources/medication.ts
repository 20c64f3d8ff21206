/**
 * Medication Activity to FHIR MedicationRequest / MedicationStatement
 *
 * moodCode decides the resource: INT (intended) is a request, EVN (event) is
 * a statement of what the patient takes.
 */

import { convertIVLPQ, convertPQToQuantity } from "../datatypes/pq-quantity";
import {
  convertEffectiveTime,
  convertIntervalToPeriod,
  convertTSToDateTime,
  type EffectiveTime,
} from "../datatypes/ts-datetime";
import type { PeriodicIntervalValue, QuantityIntervalValue, QuantityValue } from "../datatypes/values";
import { resolveOriginalText } from "../datatypes/cd-codeableconcept";
import type { SubstanceAdministrationStatement } from "../parser/types";
import {
  commentNotes,
  conceptContext,
  earliestAuthorTime,
  latestAuthorTime,
  registerResource,
  statementIdentity,
  subjectReference,
  timeContext,
  toConcept,
} from "./common";
import type { MappingContext } from "./mapping-context";
import { recorderReference } from "./participant-resources";
import { informantReference } from "./related-person";

type RequestStatus = fhir4.MedicationRequest["status"];
type StatementStatus = fhir4.MedicationStatement["status"];
type UnitsOfTime = NonNullable<fhir4.TimingRepeat["periodUnit"]>;

const REQUEST_STATUS_MAP: Record<string, RequestStatus> = {
  active: "active",
  completed: "completed",
  aborted: "stopped",
  cancelled: "cancelled",
  suspended: "on-hold",
  held: "on-hold",
  new: "draft",
  nullified: "entered-in-error",
};

const STATEMENT_STATUS_MAP: Record<string, StatementStatus> = {
  active: "active",
  completed: "completed",
  aborted: "stopped",
  cancelled: "stopped",
  suspended: "on-hold",
  held: "on-hold",
  new: "intended",
  nullified: "entered-in-error",
};

/** UCUM time units accepted as Timing.repeat.periodUnit */
const TIMING_UNITS: Record<string, UnitsOfTime> = {
  s: "s",
  min: "min",
  h: "h",
  d: "d",
  wk: "wk",
  mo: "mo",
  a: "a",
};

// ============================================================================
// Helper Functions
// ============================================================================

function periodicInterval(times: readonly EffectiveTime[]): PeriodicIntervalValue | undefined {
  return times.find((time): time is PeriodicIntervalValue => time.kind === "periodic-interval");
}

/**
 * Timing from the PIVL_TS schedule, bounded by the IVL_TS when there is
 * one. A period in a unit Timing cannot express is left out.
 */
function convertTiming(
  administration: SubstanceAdministrationStatement,
  ctx: MappingContext,
): fhir4.Timing | undefined {
  const schedule = periodicInterval([
    ...(administration.effectiveTime ? [administration.effectiveTime] : []),
    ...administration.effectiveTimes,
  ]);
  const bounds =
    administration.effectiveTime?.kind === "interval"
      ? convertIntervalToPeriod(administration.effectiveTime, timeContext(ctx, administration.path))
      : undefined;

  const period = schedule?.period;
  const periodUnit = period?.unit ? TIMING_UNITS[period.unit] : undefined;
  if (period && !periodUnit) {
    ctx.log.downgrade(
      "unsupported-timing-unit",
      `Dosing period unit "${period.unit ?? ""}" has no Timing counterpart; schedule dropped`,
      administration.path,
    );
  }

  const repeat: fhir4.TimingRepeat = {
    ...(bounds && { boundsPeriod: bounds }),
    ...(period && periodUnit && { frequency: 1, period: period.value, periodUnit }),
  };
  return Object.keys(repeat).length > 0 ? { repeat } : undefined;
}

function doseAndRate(
  dose: QuantityValue | QuantityIntervalValue | undefined,
): fhir4.DosageDoseAndRate[] {
  if (!dose) return [];
  if (dose.kind === "quantity") {
    const doseQuantity = convertPQToQuantity(dose);
    return doseQuantity ? [{ doseQuantity }] : [];
  }
  const converted = convertIVLPQ(dose);
  if (converted?.range) return [{ doseRange: converted.range }];
  if (converted?.quantity) return [{ doseQuantity: converted.quantity }];
  return [];
}

/**
 * Field Mappings:
 * - text                      -> text
 * - effectiveTime (PIVL_TS)   -> timing.repeat.period / periodUnit
 * - effectiveTime (IVL_TS)    -> timing.repeat.boundsPeriod
 * - routeCode                 -> route
 * - approachSiteCode          -> site
 * - doseQuantity              -> doseAndRate.doseQuantity / doseRange
 */
export function convertDosage(
  administration: SubstanceAdministrationStatement,
  ctx: MappingContext,
): fhir4.Dosage | undefined {
  const text = resolveOriginalText(administration.text, conceptContext(ctx, administration.path));
  const timing = convertTiming(administration, ctx);
  const route = toConcept(administration.routeCode, ctx, administration.path);
  const site = toConcept(administration.approachSiteCodes[0], ctx, administration.path);
  const doses = doseAndRate(administration.doseQuantity);

  const dosage: fhir4.Dosage = {
    ...(text && { text }),
    ...(timing && { timing }),
    ...(site && { site }),
    ...(route && { route }),
    ...(doses.length > 0 && { doseAndRate: doses }),
  };
  return Object.keys(dosage).length > 0 ? dosage : undefined;
}

function medicationConcept(
  administration: SubstanceAdministrationStatement,
  resourceType: string,
  ctx: MappingContext,
): fhir4.CodeableConcept | undefined {
  const product = administration.product;
  const concept = product ? toConcept(product.code, ctx, product.path) : undefined;
  if (concept) return concept;

  ctx.log.missingRequiredData(resourceType, "Medication activity has no medication code", administration.path);
  return undefined;
}

// ============================================================================
// Main Converter Functions
// ============================================================================

/**
 * Field Mappings:
 * - id[]                                   -> identifier
 * - statusCode                             -> status
 * - moodCode INT                           -> intent "plan"
 * - manufacturedMaterial/code              -> medicationCodeableConcept
 * - author/time (earliest)                 -> authoredOn
 * - author (latest)                        -> requester
 * - repeatNumber                           -> dispenseRequest.numberOfRepeatsAllowed (fills - 1)
 * - dosage fields                          -> dosageInstruction[0]
 */
function mapMedicationRequest(administration: SubstanceAdministrationStatement, ctx: MappingContext): string | undefined {
  const medication = medicationConcept(administration, "MedicationRequest", ctx);
  if (!medication) return undefined;

  const identity = statementIdentity("MedicationRequest", administration, ctx);
  const time = timeContext(ctx, administration.path);
  const authoredOn = convertTSToDateTime(earliestAuthorTime(administration.authors), time);
  const requester = recorderReference(administration.authors, ctx);
  const dosage = convertDosage(administration, ctx);
  const note = commentNotes(administration, ctx);
  const repeats = administration.repeatNumber;

  const resource: fhir4.MedicationRequest = {
    resourceType: "MedicationRequest",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: REQUEST_STATUS_MAP[administration.statusCode ?? ""] ?? "unknown",
    intent: "plan",
    ...(administration.negated && { doNotPerform: true }),
    medicationCodeableConcept: medication,
    subject: subjectReference(ctx),
    ...(authoredOn && { authoredOn }),
    ...(requester && { requester }),
    ...(note.length > 0 && { note }),
    ...(dosage && { dosageInstruction: [dosage] }),
    ...(repeats !== undefined && {
      dispenseRequest: { numberOfRepeatsAllowed: Math.max(repeats - 1, 0) },
    }),
  };

  return registerResource(resource, identity.key, administration.authors, ctx);
}

/**
 * Field Mappings:
 * - id[]                      -> identifier
 * - statusCode / negationInd  -> status (negated -> not-taken)
 * - manufacturedMaterial/code -> medicationCodeableConcept
 * - effectiveTime (IVL_TS)    -> effectiveDateTime / effectivePeriod
 * - author/time (latest)      -> dateAsserted
 * - author (latest)           -> informationSource (else the informant)
 * - dosage fields             -> dosage[0]
 */
function mapMedicationStatement(
  administration: SubstanceAdministrationStatement,
  ctx: MappingContext,
): string | undefined {
  const medication = medicationConcept(administration, "MedicationStatement", ctx);
  if (!medication) return undefined;

  const identity = statementIdentity("MedicationStatement", administration, ctx);
  const time = timeContext(ctx, administration.path);
  const effective = convertEffectiveTime(administration.effectiveTime, time);
  const dateAsserted = convertTSToDateTime(latestAuthorTime(administration.authors), time);
  const informationSource =
    recorderReference(administration.authors, ctx) ?? informantReference(administration.informants, ctx);
  const dosage = convertDosage(administration, ctx);
  const note = commentNotes(administration, ctx);

  const resource: fhir4.MedicationStatement = {
    resourceType: "MedicationStatement",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: administration.negated
      ? "not-taken"
      : STATEMENT_STATUS_MAP[administration.statusCode ?? ""] ?? "unknown",
    medicationCodeableConcept: medication,
    subject: subjectReference(ctx),
    ...(effective.dateTime && { effectiveDateTime: effective.dateTime }),
    ...(effective.period && { effectivePeriod: effective.period }),
    ...(dateAsserted && { dateAsserted }),
    ...(informationSource && { informationSource }),
    ...(note.length > 0 && { note }),
    ...(dosage && { dosage: [dosage] }),
  };

  return registerResource(resource, identity.key, administration.authors, ctx);
}

/** Medication Activity by mood: INT -> MedicationRequest, anything else -> MedicationStatement */
export function mapMedicationActivity(
  administration: SubstanceAdministrationStatement,
  ctx: MappingContext,
): string | undefined {
  return administration.moodCode === "INT"
    ? mapMedicationRequest(administration, ctx)
    : mapMedicationStatement(administration, ctx);
}
