/**
 * Authors, performers, participants and organizations
 *
 * Names, addresses and telecoms are converted to their FHIR shapes here, since
 * no later step needs the CDA form.
 */

import { attr, child, children, descend, normalizedText, type CdaElement } from "../../cda/element";
import { convertADsToAddresses, convertADToAddress } from "../datatypes/ad-address";
import { decodeCoded, decodeConcreteCoded, decodeIdentifiers } from "../datatypes/decode";
import { convertONToString, convertPNsToHumanNames } from "../datatypes/pn-humanname";
import { convertTELsToContactPoints } from "../datatypes/tel-contactpoint";
import type {
  AssignedEntity,
  Author,
  DeviceInfo,
  EncompassingEncounter,
  Informant,
  OrganizationInfo,
  Participant,
  ParticipantRole,
  Performer,
  PlayingDevice,
  PlayingEntity,
  RelatedEntity,
} from "./types";

export function parseOrganization(element: CdaElement | undefined): OrganizationInfo | undefined {
  if (!element || attr(element, "nullFlavor") !== undefined) return undefined;

  const names = children(element, "name").flatMap((name) => {
    const text = convertONToString(name);
    return text ? [text] : [];
  });
  const ids = decodeIdentifiers(element);
  if (names.length === 0 && ids.length === 0) return undefined;

  return {
    path: element.path,
    ids,
    names,
    telecoms: convertTELsToContactPoints(children(element, "telecom")),
    addresses: convertADsToAddresses(children(element, "addr")),
  };
}

function parseDevice(element: CdaElement | undefined): DeviceInfo | undefined {
  if (!element) return undefined;
  const manufacturerModelName = normalizedText(child(element, "manufacturerModelName"));
  const softwareName = normalizedText(child(element, "softwareName"));
  return {
    ...(manufacturerModelName && { manufacturerModelName }),
    ...(softwareName && { softwareName }),
  };
}

/** assignedAuthor and assignedEntity share one shape */
export function parseAssignedEntity(element: CdaElement): AssignedEntity {
  const code = decodeConcreteCoded(child(element, "code"));
  const device = parseDevice(child(element, "assignedAuthoringDevice"));
  const organization = parseOrganization(
    child(element, "representedOrganization") ?? descend(element, "assignedPerson", "asOrganizationPartOf"),
  );

  return {
    path: element.path,
    ids: decodeIdentifiers(element),
    ...(code && { code }),
    addresses: convertADsToAddresses(children(element, "addr")),
    telecoms: convertTELsToContactPoints(children(element, "telecom")),
    personNames: convertPNsToHumanNames(children(child(element, "assignedPerson"), "name")),
    ...(device && { device }),
    ...(organization && { organization }),
  };
}

export function parseAuthors(parent: CdaElement | undefined): Author[] {
  return children(parent, "author").flatMap((author) => {
    const assignedAuthor = child(author, "assignedAuthor");
    if (!assignedAuthor) return [];
    const time = attr(child(author, "time"), "value");
    return [{ ...(time && { time }), assignedAuthor: parseAssignedEntity(assignedAuthor) }];
  });
}

export function parsePerformers(parent: CdaElement | undefined, name = "performer"): Performer[] {
  return children(parent, name).flatMap((performer) => {
    const assignedEntity = child(performer, "assignedEntity");
    if (!assignedEntity) return [];
    const typeCode = attr(performer, "typeCode");
    const functionCode = decodeConcreteCoded(child(performer, "functionCode"));
    return [
      {
        ...(typeCode && { typeCode }),
        ...(functionCode && { functionCode }),
        assignedEntity: parseAssignedEntity(assignedEntity),
      },
    ];
  });
}

function parseRelatedEntity(element: CdaElement): RelatedEntity {
  const classCode = attr(element, "classCode");
  const code = decodeConcreteCoded(child(element, "code"));
  return {
    path: element.path,
    ...(classCode && { classCode }),
    ...(code && { code }),
    addresses: convertADsToAddresses(children(element, "addr")),
    telecoms: convertTELsToContactPoints(children(element, "telecom")),
    personNames: convertPNsToHumanNames(children(child(element, "relatedPerson"), "name")),
  };
}

/** informant: a provider (assignedEntity) or a related person (relatedEntity) */
export function parseInformants(parent: CdaElement | undefined): Informant[] {
  return children(parent, "informant").flatMap((informant): Informant[] => {
    const assignedEntity = child(informant, "assignedEntity");
    if (assignedEntity) return [{ kind: "assigned", entity: parseAssignedEntity(assignedEntity) }];
    const relatedEntity = child(informant, "relatedEntity");
    return relatedEntity ? [{ kind: "related", entity: parseRelatedEntity(relatedEntity) }] : [];
  });
}

function parsePlayingEntity(element: CdaElement | undefined): PlayingEntity | undefined {
  if (!element) return undefined;
  const code = decodeCoded(child(element, "code"));
  const names = children(element, "name").flatMap((name) => {
    const text = convertONToString(name);
    return text ? [text] : [];
  });
  return { ...(code && { code }), names };
}

function parsePlayingDevice(element: CdaElement | undefined): PlayingDevice | undefined {
  if (!element) return undefined;
  const code = decodeConcreteCoded(child(element, "code"));
  const manufacturerModelName = normalizedText(child(element, "manufacturerModelName"));
  return {
    ...(code && { code }),
    ...(manufacturerModelName && { manufacturerModelName }),
  };
}

function parseParticipantRole(element: CdaElement): ParticipantRole {
  const classCode = attr(element, "classCode");
  const code = decodeConcreteCoded(child(element, "code"));
  const playingEntity = parsePlayingEntity(child(element, "playingEntity"));
  const playingDevice = parsePlayingDevice(child(element, "playingDevice"));
  const scopingOrganization = parseOrganization(child(element, "scopingEntity"));

  return {
    ...(classCode && { classCode }),
    ids: decodeIdentifiers(element),
    ...(code && { code }),
    addresses: convertADsToAddresses(children(element, "addr")),
    telecoms: convertTELsToContactPoints(children(element, "telecom")),
    ...(playingEntity && { playingEntity }),
    ...(playingDevice && { playingDevice }),
    ...(scopingOrganization && { scopingOrganization }),
  };
}

export function parseParticipants(parent: CdaElement | undefined): Participant[] {
  return children(parent, "participant").flatMap((participant) => {
    const role = child(participant, "participantRole");
    if (!role) return [];
    const typeCode = attr(participant, "typeCode");
    const functionCode = decodeConcreteCoded(child(participant, "functionCode"));
    return [
      {
        ...(typeCode && { typeCode }),
        ...(functionCode && { functionCode }),
        role: parseParticipantRole(role),
      },
    ];
  });
}

/** Location name/code/address of a healthCareFacility */
export function parseFacility(
  facility: CdaElement | undefined,
): EncompassingEncounter["location"] {
  if (!facility) return undefined;
  const name = convertONToString(descend(facility, "location", "name"));
  const code = decodeConcreteCoded(child(facility, "code"));
  const address = convertADToAddress(descend(facility, "location", "addr"));
  if (!name && !code && !address) return undefined;
  return {
    ...(name && { name }),
    ...(code && { code }),
    ...(address && { address }),
  };
}
