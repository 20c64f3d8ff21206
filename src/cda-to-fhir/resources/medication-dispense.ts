/**
 * Medication Dispense (supply, moodCode EVN) to FHIR MedicationDispense
 *
 * A dispense nested under a Medication Activity points back at the
 * MedicationRequest it fills, and borrows the activity's medication when its
 * own product carries no code.
 */

import { fixedConcept } from "../code-mapping/coding-systems";
import { convertPQToQuantity } from "../datatypes/pq-quantity";
import { convertTSToDateTime, type EffectiveTime, type TimeContext } from "../datatypes/ts-datetime";
import type { ManufacturedProduct, SubstanceAdministrationStatement, SupplyStatement } from "../parser/types";
import { commentNotes, registerResource, statementIdentity, subjectReference, timeContext, toConcept } from "./common";
import type { MappingContext } from "./mapping-context";
import { mapPractitioner } from "./participant-resources";

type DispenseStatus = fhir4.MedicationDispense["status"];

const CATEGORY_SYSTEM = "http://terminology.hl7.org/CodeSystem/medicationdispense-category";
const PERFORMER_FUNCTION_SYSTEM = "http://terminology.hl7.org/CodeSystem/medicationdispense-performer-function";
const ACT_CODE_SYSTEM = "http://terminology.hl7.org/CodeSystem/v3-ActCode";
const DAYS_SUPPLY_SCHEMA = "days-supply";

/** Codes a dispense may carry in supply/code, taken as they are */
const DISPENSE_STATUSES: readonly DispenseStatus[] = [
  "preparation",
  "in-progress",
  "cancelled",
  "on-hold",
  "completed",
  "entered-in-error",
  "stopped",
  "declined",
  "unknown",
];

/** ActStatus, from supply/code or statusCode */
const ACT_STATUS_MAP: Record<string, DispenseStatus> = {
  completed: "completed",
  active: "in-progress",
  aborted: "stopped",
  cancelled: "cancelled",
  held: "on-hold",
  suspended: "on-hold",
  new: "preparation",
  nullified: "entered-in-error",
};

export interface DispenseOptions {
  /** MedicationRequest the dispense fills */
  prescription?: string;
  /** Product of the enclosing Medication Activity */
  parentProduct?: ManufacturedProduct;
}

// ============================================================================
// Helper Functions
// ============================================================================

function isDispenseStatus(code: string): code is DispenseStatus {
  return DISPENSE_STATUSES.some((status) => status === code);
}

function dispenseStatus(supply: SupplyStatement): DispenseStatus {
  const code = supply.code?.kind === "coded" ? supply.code.code : undefined;
  if (code && isDispenseStatus(code)) return code;
  return ACT_STATUS_MAP[code ?? ""] ?? ACT_STATUS_MAP[supply.statusCode ?? ""] ?? "completed";
}

/** A point in time is the hand-over; an interval runs from preparation to hand-over */
function dispenseTiming(
  time: EffectiveTime | undefined,
  ctx: TimeContext,
): { whenPrepared?: string; whenHandedOver?: string } {
  if (time?.kind === "instant") {
    const whenHandedOver = convertTSToDateTime(time.raw, ctx);
    return whenHandedOver ? { whenHandedOver } : {};
  }
  if (time?.kind !== "interval") return {};

  const whenPrepared = time.low?.kind === "instant" ? convertTSToDateTime(time.low.raw, ctx) : undefined;
  const whenHandedOver = time.high?.kind === "instant" ? convertTSToDateTime(time.high.raw, ctx) : undefined;
  return {
    ...(whenPrepared && { whenPrepared }),
    ...(whenHandedOver && { whenHandedOver }),
  };
}

/** repeatNumber 1 is the first fill; any later number a refill */
function dispenseType(repeatNumber: number | undefined): fhir4.CodeableConcept | undefined {
  if (repeatNumber === undefined || repeatNumber < 1) return undefined;
  return fixedConcept(ACT_CODE_SYSTEM, repeatNumber === 1 ? "FF" : "RF");
}

function daysSupply(supply: SupplyStatement): fhir4.Quantity | undefined {
  for (const { statement } of supply.entryRelationships) {
    if (statement.schemaId === DAYS_SUPPLY_SCHEMA && statement.kind === "supply") {
      const quantity = convertPQToQuantity(statement.quantity);
      if (quantity) return quantity;
    }
  }
  return undefined;
}

/** Performing pharmacists check the dispense; authoring ones packaged it */
function dispensePerformers(supply: SupplyStatement, ctx: MappingContext): fhir4.MedicationDispensePerformer[] {
  const checkers = supply.performers.flatMap(({ assignedEntity }) => {
    const actor = assignedEntity.personNames.length > 0 ? mapPractitioner(assignedEntity, ctx) : undefined;
    return actor ? [{ function: fixedConcept(PERFORMER_FUNCTION_SYSTEM, "finalchecker"), actor: { reference: actor } }] : [];
  });
  const packagers = supply.authors.flatMap(({ assignedAuthor }) => {
    const actor = assignedAuthor.personNames.length > 0 ? mapPractitioner(assignedAuthor, ctx) : undefined;
    return actor ? [{ function: fixedConcept(PERFORMER_FUNCTION_SYSTEM, "packager"), actor: { reference: actor } }] : [];
  });
  return [...checkers, ...packagers];
}

function dispensedMedication(
  supply: SupplyStatement,
  parentProduct: ManufacturedProduct | undefined,
  ctx: MappingContext,
): fhir4.CodeableConcept | undefined {
  for (const product of [supply.product, parentProduct]) {
    const concept = product ? toConcept(product.code, ctx, product.path) : undefined;
    if (concept) return concept;
  }
  return undefined;
}

// ============================================================================
// Main Converter Functions
// ============================================================================

/**
 * Field Mappings:
 * - id[]                                    -> identifier
 * - code (dispense status) / statusCode     -> status (completed without hand-over -> unknown)
 * - product/manufacturedMaterial/code       -> medicationCodeableConcept (else the activity's)
 * - performer / author (assignedPerson)     -> performer (finalchecker / packager)
 * - repeatNumber                            -> type (FF first fill, RF refill)
 * - quantity                                -> quantity
 * - Days Supply entryRelationship/quantity  -> daysSupply
 * - effectiveTime (point or high / low)     -> whenHandedOver / whenPrepared
 */
export function mapMedicationDispense(
  supply: SupplyStatement,
  ctx: MappingContext,
  options: DispenseOptions = {},
): string | undefined {
  if (supply.moodCode !== undefined && supply.moodCode !== "EVN") {
    ctx.log.unknownConstruct(
      "unexpected-mood",
      `Medication Dispense has moodCode "${supply.moodCode}"; only EVN is mapped`,
      supply.path,
    );
    return undefined;
  }

  const medication = dispensedMedication(supply, options.parentProduct, ctx);
  if (!medication) {
    ctx.log.missingRequiredData("MedicationDispense", "Medication dispense has no medication code", supply.path);
    return undefined;
  }

  const identity = statementIdentity("MedicationDispense", supply, ctx);
  const timing = dispenseTiming(supply.effectiveTime, timeContext(ctx, supply.path));
  const performer = dispensePerformers(supply, ctx);
  const type = dispenseType(supply.repeatNumber);
  const quantity = convertPQToQuantity(supply.quantity);
  const days = daysSupply(supply);
  const note = commentNotes(supply, ctx);

  let status = dispenseStatus(supply);
  if (status === "completed" && !timing.whenHandedOver) {
    ctx.log.downgrade(
      "dispense-status-unknown",
      "Completed dispense has no hand-over time; status recorded as unknown",
      supply.path,
      "MedicationDispense",
    );
    status = "unknown";
  }

  const resource: fhir4.MedicationDispense = {
    resourceType: "MedicationDispense",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status,
    category: fixedConcept(CATEGORY_SYSTEM, "community"),
    medicationCodeableConcept: medication,
    subject: subjectReference(ctx),
    ...(performer.length > 0 && { performer }),
    ...(options.prescription && { authorizingPrescription: [{ reference: options.prescription }] }),
    ...(type && { type }),
    ...(quantity && { quantity }),
    ...(days && { daysSupply: days }),
    ...timing,
    ...(note.length > 0 && { note }),
  };

  return registerResource(resource, identity.key, supply.authors, ctx);
}

/**
 * Dispenses recorded under a Medication Activity. Only a MedicationRequest
 * can authorize one, so the prescription is linked for intended activities.
 */
export function mapActivityDispenses(
  administration: SubstanceAdministrationStatement,
  primary: string | undefined,
  ctx: MappingContext,
): string[] {
  const prescription = administration.moodCode === "INT" ? primary : undefined;
  return administration.entryRelationships.flatMap(({ statement }) => {
    if (statement.schemaId !== "medication-dispense" || statement.kind !== "supply") return [];
    const reference = mapMedicationDispense(statement, ctx, {
      ...(prescription && { prescription }),
      ...(administration.product && { parentProduct: administration.product }),
    });
    return reference ? [reference] : [];
  });
}
