/**
 * Encounter Activity and componentOf/encompassingEncounter to FHIR Encounter
 *
 * Body encounters are mapped first. The header encounter then either
 * becomes its own resource or, when a body encounter carries the same id,
 * fills the gaps of that resource.
 */

import { convertIIsToIdentifiers } from "../datatypes/ii-identifier";
import { convertEffectiveTime } from "../datatypes/ts-datetime";
import type { CodedValue, InstanceIdentifier } from "../datatypes/values";
import { fixedCoding, fixedDisplay, oidToUri } from "../code-mapping/coding-systems";
import type { EncompassingEncounter, EncounterStatement, Performer } from "../parser/types";
import { canonicalKey, uuidReference } from "../references/reference-registry";
import { registerResource, statementIdentity, subjectReference, timeContext, toConcept } from "./common";
import { isProblemObservation, mapProblemObservation } from "./condition";
import type { MappingContext } from "./mapping-context";
import { mapPractitioner } from "./participant-resources";

// ============================================================================
// Code Systems
// ============================================================================

const ACT_CODE_SYSTEM = "http://terminology.hl7.org/CodeSystem/v3-ActCode";
const PARTICIPATION_TYPE_SYSTEM = "http://terminology.hl7.org/CodeSystem/v3-ParticipationType";
const DEFAULT_CLASS = "AMB";

type EncounterStatus = fhir4.Encounter["status"];

const STATUS_MAP: Record<string, EncounterStatus> = {
  active: "in-progress",
  completed: "finished",
  aborted: "cancelled",
  cancelled: "cancelled",
  held: "onleave",
  suspended: "onleave",
  new: "planned",
  nullified: "entered-in-error",
};

/** A place an encounter happened, from either participant LOC or healthCareFacility */
interface LocationInfo {
  path: string;
  ids: readonly InstanceIdentifier[];
  name?: string;
  code?: CodedValue;
  address?: fhir4.Address;
}

// ============================================================================
// Helper Functions
// ============================================================================

/** First v3-ActCode coding among the code and its translations */
function encounterClass(code: CodedValue | undefined): fhir4.Coding {
  const candidates = code ? [code, ...code.translations] : [];
  for (const candidate of candidates) {
    if (!candidate.code || oidToUri(candidate.codeSystem) !== ACT_CODE_SYSTEM) continue;
    if (fixedDisplay(ACT_CODE_SYSTEM, candidate.code) !== undefined) {
      return fixedCoding(ACT_CODE_SYSTEM, candidate.code);
    }
  }
  return fixedCoding(ACT_CODE_SYSTEM, DEFAULT_CLASS);
}

function encounterStatus(statusCode: string | undefined, moodCode: string | undefined): EncounterStatus {
  if (statusCode) return STATUS_MAP[statusCode] ?? "unknown";
  return moodCode === "EVN" ? "finished" : "unknown";
}

function mapParticipants(performers: readonly Performer[], ctx: MappingContext): fhir4.EncounterParticipant[] {
  return performers.flatMap((performer) => {
    const individual = mapPractitioner(performer.assignedEntity, ctx);
    if (!individual) return [];
    const typeCode = performer.typeCode;
    const type =
      typeCode && fixedDisplay(PARTICIPATION_TYPE_SYSTEM, typeCode) !== undefined
        ? [{ coding: [fixedCoding(PARTICIPATION_TYPE_SYSTEM, typeCode)] }]
        : undefined;
    return [{ ...(type && { type }), individual: { reference: individual } }];
  });
}

/**
 * Field Mappings:
 * - id[]                  -> identifier
 * - name                  -> name
 * - code                  -> type
 * - addr                  -> address
 */
function mapLocation(location: LocationInfo, ctx: MappingContext): string | undefined {
  const identifier = convertIIsToIdentifiers(location.ids);
  const type = toConcept(location.code, ctx, location.path);
  if (!location.name && !type && identifier.length === 0) return undefined;

  const resource: fhir4.Location = {
    resourceType: "Location",
    ...(identifier.length > 0 && { identifier }),
    ...(location.name && { name: location.name }),
    ...(type && { type: [type] }),
    ...(location.address && { address: location.address }),
  };
  const content = [location.name ?? "", location.address?.text ?? location.address?.line?.join(" ") ?? ""].join("|");
  return ctx.registry.register(resource, canonicalKey("Location", location.ids, content)).reference;
}

function serviceDeliveryLocations(encounter: EncounterStatement): LocationInfo[] {
  return encounter.participants.flatMap((participant) => {
    if (participant.typeCode !== "LOC") return [];
    const role = participant.role;
    return [
      {
        path: encounter.path,
        ids: role.ids,
        ...(role.playingEntity?.names[0] && { name: role.playingEntity.names[0] }),
        ...(role.code && { code: role.code }),
        ...(role.addresses[0] && { address: role.addresses[0] }),
      },
    ];
  });
}

function locationReferences(locations: readonly LocationInfo[], ctx: MappingContext): fhir4.EncounterLocation[] {
  return locations.flatMap((location) => {
    const reference = mapLocation(location, ctx);
    return reference ? [{ location: { reference } }] : [];
  });
}

// ============================================================================
// Main Converter Functions
// ============================================================================

/**
 * Field Mappings:
 * - id[]                          -> identifier
 * - statusCode / moodCode         -> status
 * - code translation (v3-ActCode) -> class (default AMB)
 * - code                          -> type
 * - effectiveTime                 -> period
 * - performer                     -> participant
 * - participant[LOC]              -> location
 * - Encounter Diagnosis           -> diagnosis (Condition, encounter-diagnosis)
 */
export function mapEncounterActivity(encounter: EncounterStatement, ctx: MappingContext): string {
  const identity = statementIdentity("Encounter", encounter, ctx);
  // Diagnoses point back at the encounter, so its reference is needed before registration
  const reference = uuidReference(ctx.registry.assignId(identity.key));
  const code = encounter.code?.kind === "coded" ? encounter.code : undefined;
  const type = toConcept(code, ctx, encounter.path);
  const time = convertEffectiveTime(encounter.effectiveTime, timeContext(ctx, encounter.path));
  const period = time.period ?? (time.dateTime ? { start: time.dateTime } : undefined);
  const participant = mapParticipants(encounter.performers, ctx);
  const location = locationReferences(serviceDeliveryLocations(encounter), ctx);

  const diagnosis: fhir4.EncounterDiagnosis[] = encounter.entryRelationships.flatMap(({ statement }) => {
    if (statement.schemaId !== "encounter-diagnosis") return [];
    return statement.entryRelationships.flatMap(({ statement: problem }) => {
      if (!isProblemObservation(problem)) return [];
      const condition = mapProblemObservation(problem, undefined, "encounter-diagnosis", ctx, reference);
      return condition ? [{ condition: { reference: condition } }] : [];
    });
  });

  const resource: fhir4.Encounter = {
    resourceType: "Encounter",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: encounterStatus(encounter.statusCode, encounter.moodCode),
    class: encounterClass(code),
    ...(type && { type: [type] }),
    subject: subjectReference(ctx),
    ...(participant.length > 0 && { participant }),
    ...(period && { period }),
    ...(diagnosis.length > 0 && { diagnosis }),
    ...(location.length > 0 && { location }),
  };

  return registerResource(resource, identity.key, encounter.authors, ctx);
}

/**
 * Field Mappings:
 * - id[]                      -> identifier
 * - code                      -> class (v3-ActCode) and type
 * - effectiveTime             -> period
 * - encounterParticipant      -> participant
 * - responsibleParty          -> participant (type PPRF)
 * - location/healthCareFacility -> location
 * - dischargeDispositionCode  -> hospitalization.dischargeDisposition
 *
 * A body encounter registered under the same key keeps its own values; only
 * empty participant, location and hospitalization fields are filled in.
 */
export function mapHeaderEncounter(header: EncompassingEncounter, ctx: MappingContext): string {
  const identity = statementIdentity("Encounter", header, ctx);
  const responsible: Performer[] = header.responsibleParty
    ? [{ typeCode: "PPRF", assignedEntity: header.responsibleParty }]
    : [];
  const participant = mapParticipants([...header.encounterParticipants, ...responsible], ctx);
  const location = header.location
    ? locationReferences([{ path: header.path, ids: [], ...header.location }], ctx)
    : [];
  const dischargeDisposition = toConcept(header.dischargeDisposition, ctx, header.path);
  const hospitalization = dischargeDisposition ? { dischargeDisposition } : undefined;

  const existing = ctx.registry.lookup(identity.key);
  const existingReference = ctx.registry.referenceTo("Encounter", identity.key);
  if (existing?.resourceType === "Encounter" && existingReference) {
    if (!existing.participant && participant.length > 0) existing.participant = participant;
    if (!existing.location && location.length > 0) existing.location = location;
    if (!existing.hospitalization && hospitalization) existing.hospitalization = hospitalization;
    ctx.log.normalization(
      "header-encounter-merged",
      `Header encounter merged into body encounter ${existingReference}`,
      header.path,
    );
    return existingReference;
  }

  const type = toConcept(header.code, ctx, header.path);
  const time = convertEffectiveTime(header.effectiveTime, timeContext(ctx, header.path));
  const period = time.period ?? (time.dateTime ? { start: time.dateTime } : undefined);

  const resource: fhir4.Encounter = {
    resourceType: "Encounter",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: "finished",
    class: encounterClass(header.code),
    ...(type && { type: [type] }),
    subject: subjectReference(ctx),
    ...(participant.length > 0 && { participant }),
    ...(period && { period }),
    ...(hospitalization && { hospitalization }),
    ...(location.length > 0 && { location }),
  };

  return ctx.registry.register(resource, identity.key).reference;
}
