/**
 * Coding System Utilities
 *
 * CDA identifies code systems and identifier namespaces by OID; FHIR uses
 * canonical URIs. Known OIDs are translated through a static table; unknown
 * OIDs pass through as urn:oid: URIs rather than being dropped.
 */

import oidSystems from "./oid-systems.json";
import fixedDisplays from "./fixed-displays.json";

const OID_SYSTEMS: Readonly<Record<string, string>> = oidSystems;
const FIXED_DISPLAYS: Readonly<Record<string, Readonly<Record<string, string>>>> = fixedDisplays;

const OID_PATTERN = /^[0-2](\.(0|[1-9]\d*))+$/;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const UCUM_SYSTEM = "http://unitsofmeasure.org";
export const LOINC_SYSTEM = "http://loinc.org";
export const SNOMED_SYSTEM = "http://snomed.info/sct";

export function isOid(value: string): boolean {
  return OID_PATTERN.test(value);
}

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Translate a code system OID to its canonical URI.
 *
 * - Known OID   -> table entry (e.g. 2.16.840.1.113883.6.1 -> http://loinc.org)
 * - Unknown OID -> urn:oid:<oid>
 * - UUID        -> urn:uuid:<uuid>
 * - Anything else (including http:, https:, urn: URIs) -> unchanged
 */
export function oidToUri(codeSystem: string | undefined): string | undefined {
  if (!codeSystem) return undefined;

  const known = OID_SYSTEMS[codeSystem];
  if (known) return known;

  if (isUuid(codeSystem)) return `urn:uuid:${codeSystem.toLowerCase()}`;
  if (isOid(codeSystem)) return `urn:oid:${codeSystem}`;
  return codeSystem;
}

/** True when the OID is present in the static table */
export function isKnownCodeSystem(codeSystem: string | undefined): boolean {
  return codeSystem !== undefined && OID_SYSTEMS[codeSystem] !== undefined;
}

/**
 * Canonical display text for a code drawn from a fixed FHIR value set.
 * Undefined when the system/code pair is not in the display table.
 */
export function fixedDisplay(system: string, code: string): string | undefined {
  return FIXED_DISPLAYS[system]?.[code];
}

/**
 * Coding for a fixed value-set field (clinicalStatus, category, ...).
 * The display always comes from the table.
 *
 * @throws Error if the code is not in the display table; callers only pass
 * codes from a closed set, so a miss is a programming error
 */
export function fixedCoding(system: string, code: string): fhir4.Coding {
  const display = fixedDisplay(system, code);
  if (display === undefined) {
    throw new Error(`No display registered for ${system}|${code}`);
  }
  return { system, code, display };
}

export function fixedConcept(system: string, code: string): fhir4.CodeableConcept {
  return { coding: [fixedCoding(system, code)] };
}
