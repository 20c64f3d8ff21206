/**
 * Procedure Activity Procedure to FHIR Procedure
 */

import { convertEffectiveTime } from "../datatypes/ts-datetime";
import type { ProcedureStatement } from "../parser/types";
import {
  commentNotes,
  registerResource,
  statementIdentity,
  subjectReference,
  timeContext,
  toConcept,
} from "./common";
import type { MappingContext } from "./mapping-context";
import { mapOrganization, mapPractitioner, recorderReference } from "./participant-resources";

type ProcedureStatus = fhir4.Procedure["status"];

const STATUS_MAP: Record<string, ProcedureStatus> = {
  completed: "completed",
  active: "in-progress",
  aborted: "stopped",
  cancelled: "not-done",
  suspended: "on-hold",
  held: "on-hold",
  new: "preparation",
  nullified: "entered-in-error",
};

function procedureStatus(procedure: ProcedureStatement): ProcedureStatus {
  if (procedure.negated) return "not-done";
  return STATUS_MAP[procedure.statusCode ?? ""] ?? "unknown";
}

/**
 * Field Mappings:
 * - id[]                    -> identifier
 * - statusCode / negationInd -> status
 * - code                    -> code
 * - effectiveTime           -> performedDateTime / performedPeriod
 * - targetSiteCode[]        -> bodySite
 * - performer               -> performer[].actor (+ onBehalfOf)
 * - author (latest)         -> recorder
 * - Comment Activity        -> note
 */
export function mapProcedureActivity(procedure: ProcedureStatement, ctx: MappingContext): string | undefined {
  const code = toConcept(procedure.code, ctx, procedure.path);
  if (!code) {
    ctx.log.missingRequiredData("Procedure", "Procedure activity has no procedure code", procedure.path);
    return undefined;
  }

  const identity = statementIdentity("Procedure", procedure, ctx);
  const performed = convertEffectiveTime(procedure.effectiveTime, timeContext(ctx, procedure.path));
  const recorder = recorderReference(procedure.authors, ctx);
  const note = commentNotes(procedure, ctx);
  const bodySite = procedure.targetSiteCodes.flatMap((site) => {
    const concept = toConcept(site, ctx, procedure.path);
    return concept ? [concept] : [];
  });

  const performer: fhir4.ProcedurePerformer[] = procedure.performers.flatMap((entry) => {
    const actor = mapPractitioner(entry.assignedEntity, ctx);
    if (!actor) return [];
    const onBehalfOf = mapOrganization(entry.assignedEntity.organization, ctx);
    return [{ actor: { reference: actor }, ...(onBehalfOf && { onBehalfOf: { reference: onBehalfOf } }) }];
  });

  const resource: fhir4.Procedure = {
    resourceType: "Procedure",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: procedureStatus(procedure),
    code,
    subject: subjectReference(ctx),
    ...(performed.dateTime && { performedDateTime: performed.dateTime }),
    ...(performed.period && { performedPeriod: performed.period }),
    ...(recorder && { recorder }),
    ...(performer.length > 0 && { performer }),
    ...(bodySite.length > 0 && { bodySite }),
    ...(note.length > 0 && { note }),
  };

  return registerResource(resource, identity.key, procedure.authors, ctx);
}
