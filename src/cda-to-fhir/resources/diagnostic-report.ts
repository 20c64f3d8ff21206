/**
 * Result Organizer to FHIR DiagnosticReport
 *
 * Member Result Observations become laboratory Observations and are listed in
 * `result`. A report without a code is skipped, its observations are not.
 */

import { convertEffectiveTime } from "../datatypes/ts-datetime";
import { fixedConcept } from "../code-mapping/coding-systems";
import type { ObservationStatement, OrganizerStatement } from "../parser/types";
import {
  registerResource,
  statementIdentity,
  subjectReference,
  timeContext,
  toConcept,
} from "./common";
import type { MappingContext } from "./mapping-context";
import { mapObservation } from "./observation";
import { mapOrganization, mapPractitioner } from "./participant-resources";

const DIAGNOSTIC_SERVICE_SECTION_SYSTEM = "http://terminology.hl7.org/CodeSystem/v2-0074";

type ReportStatus = fhir4.DiagnosticReport["status"];

const STATUS_MAP: Record<string, ReportStatus> = {
  completed: "final",
  active: "partial",
  aborted: "cancelled",
  cancelled: "cancelled",
  nullified: "entered-in-error",
};

/**
 * Field Mappings:
 * - id[]                     -> identifier
 * - statusCode               -> status
 * - (fixed)                  -> category v2-0074 LAB
 * - code                     -> code
 * - effectiveTime            -> effectiveDateTime / effectivePeriod
 * - performer                -> performer (Practitioner, else its Organization)
 * - component/observation    -> result
 *
 * @returns references to the report (when mapped) and every member Observation
 */
export function mapResultOrganizer(organizer: OrganizerStatement, ctx: MappingContext): string[] {
  const results = organizer.components
    .filter((component): component is ObservationStatement => component.kind === "observation")
    .flatMap((observation) => {
      const reference = mapObservation(observation, "laboratory", ctx);
      return reference ? [reference] : [];
    });

  const code = toConcept(organizer.code, ctx, organizer.path);
  if (!code) {
    ctx.log.missingRequiredData("DiagnosticReport", "Result organizer has no code", organizer.path);
    return results;
  }

  const identity = statementIdentity("DiagnosticReport", organizer, ctx);
  const effective = convertEffectiveTime(organizer.effectiveTime, timeContext(ctx, organizer.path));
  const performer: fhir4.Reference[] = organizer.performers.flatMap(({ assignedEntity }) => {
    const reference = mapPractitioner(assignedEntity, ctx) ?? mapOrganization(assignedEntity.organization, ctx);
    return reference ? [{ reference }] : [];
  });

  const resource: fhir4.DiagnosticReport = {
    resourceType: "DiagnosticReport",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: STATUS_MAP[organizer.statusCode ?? ""] ?? "unknown",
    category: [fixedConcept(DIAGNOSTIC_SERVICE_SECTION_SYSTEM, "LAB")],
    code,
    subject: subjectReference(ctx),
    ...(effective.dateTime && { effectiveDateTime: effective.dateTime }),
    ...(effective.period && { effectivePeriod: effective.period }),
    ...(performer.length > 0 && { performer }),
    ...(results.length > 0 && { result: results.map((reference) => ({ reference })) }),
  };

  const reference = registerResource(resource, identity.key, organizer.authors, ctx);
  return [reference, ...results];
}
