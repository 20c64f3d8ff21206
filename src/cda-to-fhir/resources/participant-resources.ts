/**
 * Practitioner, Organization and Device resources from CDA participations.
 *
 * Each entity is registered under its canonical key, so every statement that
 * names the same person or organization converges on one resource. An entity
 * already registered is referenced as it is, without building it again.
 */

import { convertIIsToIdentifiers } from "../datatypes/ii-identifier";
import { formatHumanName } from "../datatypes/pn-humanname";
import type { AssignedEntity, Author, OrganizationInfo } from "../parser/types";
import { canonicalKey } from "../references/reference-registry";
import { latestAuthor, toConcept } from "./common";
import type { MappingContext } from "./mapping-context";

// ============================================================================
// Organization
// ============================================================================

/**
 * Field Mappings:
 * - id[]      -> identifier
 * - name[0]   -> name (further names -> alias)
 * - telecom[] -> telecom
 * - addr[]    -> address
 */
export function mapOrganization(
  organization: OrganizationInfo | undefined,
  ctx: MappingContext,
): string | undefined {
  if (!organization) return undefined;

  const [name, ...aliases] = organization.names;
  const key = canonicalKey("Organization", organization.ids, name ?? "");
  const existing = ctx.registry.referenceTo("Organization", key);
  if (existing) return existing;

  const identifier = convertIIsToIdentifiers(organization.ids);
  if (!name && identifier.length === 0) return undefined;

  const resource: fhir4.Organization = {
    resourceType: "Organization",
    ...(identifier.length > 0 && { identifier }),
    active: true,
    ...(name && { name }),
    ...(aliases.length > 0 && { alias: aliases }),
    ...(organization.telecoms.length > 0 && { telecom: organization.telecoms }),
    ...(organization.addresses.length > 0 && { address: organization.addresses }),
  };

  return ctx.registry.register(resource, key).reference;
}

// ============================================================================
// Practitioner
// ============================================================================

/**
 * Field Mappings:
 * - id[]                -> identifier
 * - assignedPerson/name -> name
 * - telecom[] / addr[]  -> telecom / address
 * - code                -> qualification[0].code
 */
export function mapPractitioner(entity: AssignedEntity, ctx: MappingContext): string | undefined {
  if (entity.device) return undefined;

  const display = formatHumanName(entity.personNames[0]);
  const key = canonicalKey("Practitioner", entity.ids, display ?? "");
  const existing = ctx.registry.referenceTo("Practitioner", key);
  if (existing) return existing;

  const identifier = convertIIsToIdentifiers(entity.ids);
  if (identifier.length === 0 && !display) return undefined;

  const qualification = toConcept(entity.code, ctx, entity.path);
  const resource: fhir4.Practitioner = {
    resourceType: "Practitioner",
    ...(identifier.length > 0 && { identifier }),
    ...(entity.personNames.length > 0 && { name: entity.personNames }),
    ...(entity.telecoms.length > 0 && { telecom: entity.telecoms }),
    ...(entity.addresses.length > 0 && { address: entity.addresses }),
    ...(qualification && { qualification: [{ code: qualification }] }),
  };

  return ctx.registry.register(resource, key).reference;
}

// ============================================================================
// Device
// ============================================================================

/**
 * Authoring software: assignedAuthoringDevice.
 *
 * Field Mappings:
 * - id[]                  -> identifier
 * - manufacturerModelName -> deviceName (model-name)
 * - softwareName          -> deviceName (other)
 */
export function mapAuthoringDevice(entity: AssignedEntity, ctx: MappingContext): string | undefined {
  const device = entity.device;
  if (!device) return undefined;

  const deviceName: fhir4.DeviceDeviceName[] = [
    ...(device.manufacturerModelName
      ? [{ name: device.manufacturerModelName, type: "model-name" as const }]
      : []),
    ...(device.softwareName ? [{ name: device.softwareName, type: "other" as const }] : []),
  ];
  const content = [device.manufacturerModelName ?? "", device.softwareName ?? ""].join("|");
  const key = canonicalKey("Device", entity.ids, content);
  const existing = ctx.registry.referenceTo("Device", key);
  if (existing) return existing;

  const identifier = convertIIsToIdentifiers(entity.ids);
  if (deviceName.length === 0 && identifier.length === 0) return undefined;

  const owner = mapOrganization(entity.organization, ctx);
  const resource: fhir4.Device = {
    resourceType: "Device",
    ...(identifier.length > 0 && { identifier }),
    ...(deviceName.length > 0 && { deviceName }),
    ...(owner && { owner: { reference: owner } }),
  };

  return ctx.registry.register(resource, key).reference;
}

// ============================================================================
// Authors
// ============================================================================

export interface AuthorReferences {
  /** Practitioner or Device */
  who?: string;
  /** Represented organization */
  onBehalfOf?: string;
}

export function mapAuthor(author: Author, ctx: MappingContext): AuthorReferences {
  const entity = author.assignedAuthor;
  const who = entity.device ? mapAuthoringDevice(entity, ctx) : mapPractitioner(entity, ctx);
  const onBehalfOf = mapOrganization(entity.organization, ctx);
  return { ...(who && { who }), ...(onBehalfOf && { onBehalfOf }) };
}

/** References for a resource's author/recorder/asserter field */
export function authorReferences(authors: readonly Author[], ctx: MappingContext): fhir4.Reference[] {
  return authors.flatMap((author) => {
    const { who } = mapAuthor(author, ctx);
    return who ? [{ reference: who }] : [];
  });
}

/** recorder / asserter: the latest author's Practitioner or Device */
export function recorderReference(authors: readonly Author[], ctx: MappingContext): fhir4.Reference | undefined {
  const author = latestAuthor(authors);
  if (!author) return undefined;
  const { who } = mapAuthor(author, ctx);
  return who ? { reference: who } : undefined;
}
