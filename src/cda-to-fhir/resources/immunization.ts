/**
 * Immunization Activity to FHIR Immunization
 */

import { convertPQToQuantity } from "../datatypes/pq-quantity";
import { convertTSToDateTime, effectiveStart } from "../datatypes/ts-datetime";
import type { SubstanceAdministrationStatement } from "../parser/types";
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
import { mapOrganization, mapPractitioner } from "./participant-resources";

/** Code of the refusal reason (RSON) a negated activity carries */
function refusalReason(
  administration: SubstanceAdministrationStatement,
  ctx: MappingContext,
): fhir4.CodeableConcept | undefined {
  for (const relationship of administration.entryRelationships) {
    if (relationship.typeCode !== "RSON") continue;
    const reason = toConcept(relationship.statement.code, ctx, relationship.statement.path);
    if (reason) return reason;
  }
  return undefined;
}

/**
 * Field Mappings:
 * - id[]                              -> identifier
 * - statusCode / negationInd          -> status (negated -> not-done)
 * - RSON entryRelationship (negated)  -> statusReason
 * - manufacturedMaterial/code         -> vaccineCode
 * - manufacturedMaterial/lotNumberText -> lotNumber
 * - manufacturerOrganization          -> manufacturer
 * - effectiveTime                     -> occurrenceDateTime
 * - author/time (earliest)            -> recorded
 * - routeCode / approachSiteCode      -> route / site
 * - doseQuantity                      -> doseQuantity
 * - performer                         -> performer[].actor
 *
 * primarySource is always true: the document is the source record.
 */
export function mapImmunizationActivity(
  administration: SubstanceAdministrationStatement,
  ctx: MappingContext,
): string | undefined {
  const product = administration.product;
  const vaccineCode = product ? toConcept(product.code, ctx, product.path) : undefined;
  if (!vaccineCode) {
    ctx.log.missingRequiredData("Immunization", "Immunization activity has no vaccine code", administration.path);
    return undefined;
  }

  const time = timeContext(ctx, administration.path);
  const occurrenceDateTime = convertTSToDateTime(effectiveStart(administration.effectiveTime), time);
  if (!occurrenceDateTime) {
    ctx.log.missingRequiredData("Immunization", "Immunization activity has no administration time", administration.path);
    return undefined;
  }

  const identity = statementIdentity("Immunization", administration, ctx);
  const recorded = convertTSToDateTime(earliestAuthorTime(administration.authors), time);
  const manufacturer = mapOrganization(product?.manufacturer, ctx);
  const route = toConcept(administration.routeCode, ctx, administration.path);
  const site = toConcept(administration.approachSiteCodes[0], ctx, administration.path);
  const doseQuantity =
    administration.doseQuantity?.kind === "quantity" ? convertPQToQuantity(administration.doseQuantity) : undefined;
  const note = commentNotes(administration, ctx);
  const statusReason = administration.negated ? refusalReason(administration, ctx) : undefined;

  const performer: fhir4.ImmunizationPerformer[] = administration.performers.flatMap((entry) => {
    const actor = mapPractitioner(entry.assignedEntity, ctx);
    return actor ? [{ actor: { reference: actor } }] : [];
  });

  const resource: fhir4.Immunization = {
    resourceType: "Immunization",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: administration.negated ? "not-done" : "completed",
    ...(statusReason && { statusReason }),
    vaccineCode,
    patient: subjectReference(ctx),
    occurrenceDateTime,
    ...(recorded && { recorded }),
    primarySource: true,
    ...(manufacturer && { manufacturer: { reference: manufacturer } }),
    ...(product?.lotNumber && { lotNumber: product.lotNumber }),
    ...(site && { site }),
    ...(route && { route }),
    ...(doseQuantity && { doseQuantity }),
    ...(performer.length > 0 && { performer }),
    ...(note.length > 0 && { note }),
  };

  return registerResource(resource, identity.key, administration.authors, ctx);
}
