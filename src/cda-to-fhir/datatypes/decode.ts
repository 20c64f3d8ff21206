/**
 * Element -> Value decoding
 *
 * Dispatches on the effective type discriminator:
 *   explicit xsi:type, else an enabled mistag repair, else the declared type
 * and produces exactly one Value variant. A null-flavored element short-circuits
 * to an `absent` marker. An unrecognized discriminator is reported as an
 * UnknownConstruct, never guessed at.
 */

import {
  attr,
  child,
  children,
  collapseWhitespace,
  textContent,
  type CdaElement,
} from "../../cda/element";
import type { DecisionLog } from "../decision-log";
import { findMistagRepair, isKnownType } from "./type-compatibility";
import {
  isNullFlavor,
  type AbsentValue,
  type CodedType,
  type CodedValue,
  type EncapsulatedValue,
  type InstanceIdentifier,
  type InstantValue,
  type IntervalValue,
  type OriginalText,
  type PeriodicIntervalValue,
  type QuantityIntervalValue,
  type QuantityValue,
  type Value,
} from "./values";

export interface DatatypeContext {
  log: DecisionLog;
  /** Enabled mistag repair IDs, in config order */
  mistagRepairs: readonly string[];
}

export interface UnknownConstruct {
  path: string;
  discriminator: string | undefined;
  message: string;
}

export type DecodeResult =
  | { value: Value; unknown?: never }
  | { value?: never; unknown: UnknownConstruct };

// ============================================================================
// Effective Type
// ============================================================================

/**
 * The type an element should be decoded as, after applying any enabled
 * mistag repair. Repairs are recorded as normalizations.
 */
export function effectiveType(
  element: CdaElement,
  declaredType: string | undefined,
  ctx: DatatypeContext,
): string | undefined {
  const repair = findMistagRepair(element, ctx.mistagRepairs);
  if (repair) {
    ctx.log.normalization(
      repair.repairId,
      `Value typed ${repair.from ?? "(none)"} read as ${repair.to}`,
      element.path,
    );
    return repair.to;
  }
  return element.xsiType ?? declaredType;
}

function absentValue(element: CdaElement, declaredType: string): AbsentValue | undefined {
  const nullFlavor = attr(element, "nullFlavor");
  if (!isNullFlavor(nullFlavor)) return undefined;
  return { kind: "absent", declaredType, nullFlavor };
}

// ============================================================================
// Main Decode Function
// ============================================================================

/**
 * Decode an element into a Value.
 *
 * @param declaredType - type implied by the element's position (e.g. "CD" for
 *   a code element); used when the element carries no xsi:type
 */
export function decodeValue(
  element: CdaElement,
  declaredType: string | undefined,
  ctx: DatatypeContext,
): DecodeResult {
  const type = effectiveType(element, declaredType, ctx);

  const absent = absentValue(element, type ?? "ANY");
  if (absent && !hasContent(element)) {
    return { value: absent };
  }

  if (!type || !isKnownType(type)) {
    return {
      unknown: {
        path: element.path,
        discriminator: type,
        message: type
          ? `Unrecognized datatype "${type}"`
          : "Value has no datatype discriminator",
      },
    };
  }

  if (absent) {
    return { value: absent };
  }

  switch (type) {
    case "CD":
    case "CE":
    case "CV":
    case "CS":
    case "CO":
      return { value: decodeCodedContent(element, type) };
    case "PQ":
      return quantityOrUnknown(element);
    case "IVL_PQ":
      return { value: decodeQuantityInterval(element) };
    case "TS":
      return { value: decodeInstantContent(element) };
    case "IVL_TS":
    case "SXCM_TS":
    case "EIVL_TS":
      return { value: decodeIntervalContent(element) };
    case "PIVL_TS":
      return { value: decodePeriodicInterval(element) };
    case "ST":
    case "SC":
      return { value: { kind: "string", value: collapseWhitespace(textContent(element)) } };
    case "ED":
      return { value: decodeEncapsulatedContent(element) };
    case "INT":
      return integerOrUnknown(element);
    case "REAL":
      return realOrUnknown(element);
    case "BL":
      return booleanOrUnknown(element);
    default:
      return {
        unknown: {
          path: element.path,
          discriminator: type,
          message: `Datatype "${type}" is not decoded as a value`,
        },
      };
  }
}

/**
 * Whether a null-flavored element still carries content (e.g. a low child).
 * Such an element is checked for a known datatype first, so an unrecognized
 * one is reported as an unknown construct; with a known datatype it is still
 * decoded as `absent`.
 */
function hasContent(element: CdaElement): boolean {
  return (
    attr(element, "value") !== undefined ||
    attr(element, "code") !== undefined ||
    child(element, "low") !== undefined ||
    child(element, "high") !== undefined
  );
}

// ============================================================================
// Coded Values
// ============================================================================

export function decodeOriginalText(element: CdaElement | undefined): OriginalText | undefined {
  if (!element) return undefined;

  const reference = attr(child(element, "reference"), "value");
  const text = collapseWhitespace(
    element.children
      .map((node) => (node.kind === "text" ? node.value : ""))
      .join(""),
  );

  if (!reference && !text) return undefined;
  return {
    ...(text && { text }),
    ...(reference && { reference }),
  };
}

function decodeCodedContent(element: CdaElement, type: CodedType): CodedValue {
  const originalText = decodeOriginalText(child(element, "originalText"));
  const translations = children(element, "translation")
    .filter((translation) => attr(translation, "nullFlavor") === undefined)
    .map((translation) => decodeCodedContent(translation, "CD"));

  return {
    kind: "coded",
    type,
    ...(attr(element, "code") && { code: attr(element, "code") }),
    ...(attr(element, "codeSystem") && { codeSystem: attr(element, "codeSystem") }),
    ...(attr(element, "codeSystemName") && { codeSystemName: attr(element, "codeSystemName") }),
    ...(attr(element, "displayName") && { displayName: attr(element, "displayName") }),
    ...(originalText && { originalText }),
    translations,
    ...(type === "CO" && { ordinal: true }),
  };
}

/**
 * Decode a code-like element (code, value, routeCode, ...) as a coded value.
 * Absent element -> undefined; null-flavored -> absent marker.
 */
export function decodeCoded(
  element: CdaElement | undefined,
  declaredType: CodedType = "CD",
): CodedValue | AbsentValue | undefined {
  if (!element) return undefined;

  const absent = absentValue(element, declaredType);
  if (absent && attr(element, "code") === undefined) return absent;

  const type = element.xsiType;
  const codedType: CodedType =
    type === "CE" || type === "CV" || type === "CS" || type === "CO" || type === "CD"
      ? type
      : declaredType;
  return decodeCodedContent(element, codedType);
}

/** Same as decodeCoded but treats null flavors as absence of a usable code */
export function decodeConcreteCoded(
  element: CdaElement | undefined,
  declaredType: CodedType = "CD",
): CodedValue | undefined {
  const coded = decodeCoded(element, declaredType);
  return coded?.kind === "coded" ? coded : undefined;
}

// ============================================================================
// Quantities
// ============================================================================

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function parseQuantity(element: CdaElement | undefined): QuantityValue | undefined {
  if (!element) return undefined;
  const rawValue = attr(element, "value");
  if (rawValue === undefined || !NUMERIC.test(rawValue)) return undefined;

  const unit = attr(element, "unit");
  return {
    kind: "quantity",
    value: Number(rawValue),
    rawValue,
    ...(unit && { unit }),
  };
}

function quantityOrUnknown(element: CdaElement): DecodeResult {
  const quantity = parseQuantity(element);
  if (quantity) return { value: quantity };
  return {
    unknown: {
      path: element.path,
      discriminator: "PQ",
      message: `Quantity value "${attr(element, "value") ?? ""}" is not numeric`,
    },
  };
}

export function decodeQuantity(element: CdaElement | undefined): QuantityValue | undefined {
  if (!element || attr(element, "nullFlavor") !== undefined) return undefined;
  return parseQuantity(element);
}

function decodeQuantityInterval(element: CdaElement): QuantityIntervalValue {
  const low = decodeQuantity(child(element, "low"));
  const high = decodeQuantity(child(element, "high"));
  return {
    kind: "quantity-interval",
    ...(low && { low }),
    ...(high && { high }),
  };
}

// ============================================================================
// Time
// ============================================================================

function decodeInstantContent(element: CdaElement): InstantValue | AbsentValue {
  const raw = attr(element, "value");
  if (raw === undefined) {
    return { kind: "absent", declaredType: "TS", nullFlavor: "NI" };
  }
  return { kind: "instant", raw };
}

function decodeBound(element: CdaElement | undefined): InstantValue | AbsentValue | undefined {
  if (!element) return undefined;
  const absent = absentValue(element, "TS");
  if (absent) return absent;
  const raw = attr(element, "value");
  return raw === undefined ? undefined : { kind: "instant", raw };
}

function decodeIntervalContent(element: CdaElement): InstantValue | IntervalValue {
  // IVL_TS written as a single point: <effectiveTime value="20200101"/>
  const point = attr(element, "value");
  if (point !== undefined && !child(element, "low") && !child(element, "high")) {
    return { kind: "instant", raw: point };
  }

  const low = decodeBound(child(element, "low"));
  const high = decodeBound(child(element, "high"));
  const centerRaw = attr(child(element, "center"), "value");
  const width = decodeQuantity(child(element, "width"));

  return {
    kind: "interval",
    ...(low && { low }),
    ...(high && { high }),
    ...(centerRaw !== undefined && { center: { kind: "instant" as const, raw: centerRaw } }),
    ...(width && { width }),
  };
}

function decodePeriodicInterval(element: CdaElement): PeriodicIntervalValue {
  const period = decodeQuantity(child(element, "period"));
  return {
    kind: "periodic-interval",
    ...(period && { period }),
    institutionSpecified: attr(element, "institutionSpecified") === "true",
  };
}

/**
 * Decode an effectiveTime-like element, which is a TS or IVL_TS depending on
 * whether it has a value attribute or low/high children.
 */
export function decodeEffectiveTime(
  element: CdaElement | undefined,
): InstantValue | IntervalValue | PeriodicIntervalValue | AbsentValue | undefined {
  if (!element) return undefined;

  if (element.xsiType === "PIVL_TS") return decodePeriodicInterval(element);

  const absent = absentValue(element, "IVL_TS");
  if (absent && !hasContent(element)) return absent;

  const hasBounds =
    child(element, "low") !== undefined ||
    child(element, "high") !== undefined ||
    child(element, "center") !== undefined;
  if (!hasBounds) {
    const raw = attr(element, "value");
    return raw === undefined ? undefined : { kind: "instant", raw };
  }
  return decodeIntervalContent(element);
}

// ============================================================================
// Scalars
// ============================================================================

function integerOrUnknown(element: CdaElement): DecodeResult {
  const raw = attr(element, "value");
  if (raw !== undefined && /^[+-]?\d+$/.test(raw)) {
    return { value: { kind: "integer", value: Number.parseInt(raw, 10) } };
  }
  return {
    unknown: { path: element.path, discriminator: "INT", message: `Integer value "${raw ?? ""}" is not an integer` },
  };
}

function realOrUnknown(element: CdaElement): DecodeResult {
  const raw = attr(element, "value");
  if (raw !== undefined && NUMERIC.test(raw)) {
    return { value: { kind: "real", value: Number(raw), rawValue: raw } };
  }
  return {
    unknown: { path: element.path, discriminator: "REAL", message: `Real value "${raw ?? ""}" is not numeric` },
  };
}

function booleanOrUnknown(element: CdaElement): DecodeResult {
  const raw = attr(element, "value");
  if (raw === "true" || raw === "false") {
    return { value: { kind: "boolean", value: raw === "true" } };
  }
  return {
    unknown: { path: element.path, discriminator: "BL", message: `Boolean value "${raw ?? ""}" is not true/false` },
  };
}

// ============================================================================
// Encapsulated Data
// ============================================================================

function decodeEncapsulatedContent(element: CdaElement): EncapsulatedValue {
  const reference = attr(child(element, "reference"), "value");
  const representation = attr(element, "representation");
  const mediaType = attr(element, "mediaType");
  const inline = element.children
    .map((node) => (node.kind === "text" ? node.value : ""))
    .join("")
    .trim();

  return {
    kind: "encapsulated",
    ...(mediaType && { mediaType }),
    ...((representation === "B64" || representation === "TXT") && { representation }),
    ...(inline && { content: inline }),
    ...(reference && { reference }),
  };
}

export function decodeEncapsulated(element: CdaElement | undefined): EncapsulatedValue | undefined {
  if (!element || attr(element, "nullFlavor") !== undefined) return undefined;
  return decodeEncapsulatedContent(element);
}

// ============================================================================
// Identifiers
// ============================================================================

export function decodeIdentifier(element: CdaElement): InstanceIdentifier {
  const nullFlavor = attr(element, "nullFlavor");
  const root = attr(element, "root");
  const extension = attr(element, "extension");
  const assigningAuthorityName = attr(element, "assigningAuthorityName");

  return {
    ...(root && { root }),
    ...(extension && { extension }),
    ...(assigningAuthorityName && { assigningAuthorityName }),
    ...(isNullFlavor(nullFlavor) && { nullFlavor }),
  };
}

export function decodeIdentifiers(parent: CdaElement | undefined, name = "id"): InstanceIdentifier[] {
  return children(parent, name).map(decodeIdentifier);
}
