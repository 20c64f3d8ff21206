/**
 * CDA PN (person name) to FHIR HumanName
 */

import {
  attr,
  children,
  collapseWhitespace,
  normalizedText,
  textContent,
  type CdaElement,
} from "../../cda/element";

// ============================================================================
// Name Use Mapping (HL7 v3 EntityNameUse)
// ============================================================================

const NAME_USE_MAP: Record<string, fhir4.HumanName["use"]> = {
  L: "official",
  C: "official",
  OR: "official",
  P: "nickname",
  A: "usual",
  ASGN: "usual",
  I: "usual",
  R: "usual",
  SRCH: "usual",
  ANON: "anonymous",
  TMP: "temp",
  OLD: "old",
  BAD: "old",
};

// ============================================================================
// Helper Functions
// ============================================================================

function partTexts(name: CdaElement, partName: string): string[] {
  return children(name, partName).flatMap((part) => {
    const text = normalizedText(part);
    return text ? [text] : [];
  });
}

/** Names written as bare text: <name>Henry Levin</name> */
function looseText(name: CdaElement): string | undefined {
  const text = collapseWhitespace(
    name.children.map((node) => (node.kind === "text" ? node.value : "")).join(""),
  );
  return text.length > 0 ? text : undefined;
}

// ============================================================================
// Main Converter Function
// ============================================================================

/**
 * Field Mappings:
 * - @use       -> use (first mapped code of a space-separated list)
 * - prefix     -> prefix
 * - given      -> given (in order)
 * - family     -> family (first only; FHIR allows one)
 * - suffix     -> suffix
 * - bare text  -> text
 * - validTime  -> period
 */
export function convertPNToHumanName(name: CdaElement | undefined): fhir4.HumanName | undefined {
  if (!name || attr(name, "nullFlavor") !== undefined) return undefined;

  const family = partTexts(name, "family")[0];
  const given = partTexts(name, "given");
  const prefix = partTexts(name, "prefix");
  const suffix = partTexts(name, "suffix");
  const text = looseText(name);

  if (!family && given.length === 0 && prefix.length === 0 && suffix.length === 0 && !text) {
    return undefined;
  }

  const use = (attr(name, "use") ?? "")
    .split(/\s+/)
    .map((code) => NAME_USE_MAP[code])
    .find((mapped) => mapped !== undefined);

  return {
    ...(use && { use }),
    ...(text && { text }),
    ...(family && { family }),
    ...(given.length > 0 && { given }),
    ...(prefix.length > 0 && { prefix }),
    ...(suffix.length > 0 && { suffix }),
  };
}

export function convertPNsToHumanNames(names: readonly CdaElement[]): fhir4.HumanName[] {
  return names.flatMap((name) => {
    const converted = convertPNToHumanName(name);
    return converted ? [converted] : [];
  });
}

/** "Given Family" display for references */
export function formatHumanName(name: fhir4.HumanName | undefined): string | undefined {
  if (!name) return undefined;
  if (name.text) return name.text;
  const parts = [...(name.prefix ?? []), ...(name.given ?? []), name.family, ...(name.suffix ?? [])]
    .filter((part): part is string => typeof part === "string" && part.length > 0);
  return parts.length > 0 ? parts.join(" ") : undefined;
}

/** Organization and place names (ON/EN) are plain text */
export function convertONToString(name: CdaElement | undefined): string | undefined {
  if (!name || attr(name, "nullFlavor") !== undefined) return undefined;
  const text = collapseWhitespace(textContent(name));
  return text.length > 0 ? text : undefined;
}
