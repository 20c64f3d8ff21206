/**
 * Datatype compatibility table and vendor mistag repairs.
 *
 * Structurally identical wire types are grouped into families. A rule that
 * requires one member of a family is satisfied by any other member: CE, CV
 * and CO all satisfy "value SHALL be CD". Types from different families are
 * never interchangeable.
 *
 * Mistag repairs are a closed vocabulary of known vendor errors where the
 * xsi:type is missing or wrong but the value itself is unambiguous. Only the
 * repairs enabled in config are applied, and each one is recorded.
 */

import { attr, type CdaElement } from "../../cda/element";

export type TypeFamily =
  | "coded"
  | "quantity"
  | "quantity-interval"
  | "time"
  | "string"
  | "encapsulated"
  | "integer"
  | "real"
  | "boolean"
  | "identifier";

const TYPE_FAMILIES: Record<string, TypeFamily> = {
  CD: "coded",
  CE: "coded",
  CV: "coded",
  CS: "coded",
  CO: "coded",
  PQ: "quantity",
  IVL_PQ: "quantity-interval",
  TS: "time",
  IVL_TS: "time",
  PIVL_TS: "time",
  EIVL_TS: "time",
  SXCM_TS: "time",
  ST: "string",
  SC: "string",
  ED: "encapsulated",
  INT: "integer",
  REAL: "real",
  BL: "boolean",
  II: "identifier",
};

export function typeFamily(type: string | undefined): TypeFamily | undefined {
  if (!type) return undefined;
  return TYPE_FAMILIES[type];
}

export function isKnownType(type: string | undefined): boolean {
  return typeFamily(type) !== undefined;
}

/**
 * True when a value declared as `actual` satisfies a rule requiring `required`.
 * An unknown type is never compatible with anything.
 */
export function isTypeCompatible(actual: string | undefined, required: string): boolean {
  const actualFamily = typeFamily(actual);
  return actualFamily !== undefined && actualFamily === typeFamily(required);
}

// ============================================================================
// Mistag Repairs
// ============================================================================

/** Returns the corrected type name, or undefined when the repair does not apply */
export type MistagRepairFn = (element: CdaElement) => string | undefined;

export const MISTAG_REPAIRS: Record<string, MistagRepairFn> = {
  "untyped-quantity-value": untypedQuantityValue,
  "untyped-coded-value": untypedCodedValue,
  "real-with-unit-as-quantity": realWithUnitAsQuantity,
  "lowercase-type-name": lowercaseTypeName,
};

export type MistagRepairId = keyof typeof MISTAG_REPAIRS;

/** @throws Error if ID is not registered */
export function getMistagRepair(id: string): MistagRepairFn {
  const repair = MISTAG_REPAIRS[id];
  if (!repair) {
    throw new Error(
      `Unknown mistag repair ID: ${id}. Valid IDs: ${Object.keys(MISTAG_REPAIRS).join(", ")}`,
    );
  }
  return repair;
}

export interface AppliedRepair {
  repairId: string;
  from: string | undefined;
  to: string;
}

/** First enabled repair that applies to the element, if any */
export function findMistagRepair(
  element: CdaElement,
  enabledRepairs: readonly string[],
): AppliedRepair | undefined {
  for (const repairId of enabledRepairs) {
    const to = getMistagRepair(repairId)(element);
    if (to !== undefined && to !== element.xsiType) {
      return { repairId, from: element.xsiType, to };
    }
  }
  return undefined;
}

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** <value value="120" unit="mm[Hg]"/> with no xsi:type */
function untypedQuantityValue(element: CdaElement): string | undefined {
  if (element.xsiType || element.name !== "value") return undefined;
  const value = attr(element, "value");
  if (value === undefined || !NUMERIC.test(value) || attr(element, "unit") === undefined) {
    return undefined;
  }
  return "PQ";
}

/** <value code="..." codeSystem="..."/> with no xsi:type */
function untypedCodedValue(element: CdaElement): string | undefined {
  if (element.xsiType || element.name !== "value") return undefined;
  if (attr(element, "code") === undefined || attr(element, "codeSystem") === undefined) {
    return undefined;
  }
  return "CD";
}

/** xsi:type="REAL" or "INT" on a value that carries a unit */
function realWithUnitAsQuantity(element: CdaElement): string | undefined {
  if (element.xsiType !== "REAL" && element.xsiType !== "INT") return undefined;
  const value = attr(element, "value");
  if (value === undefined || !NUMERIC.test(value) || attr(element, "unit") === undefined) {
    return undefined;
  }
  return "PQ";
}

/** xsi:type="pq" -> "PQ" when the upper-case name is a known type */
function lowercaseTypeName(element: CdaElement): string | undefined {
  if (!element.xsiType) return undefined;
  const upper = element.xsiType.toUpperCase();
  if (upper === element.xsiType || !isKnownType(upper)) return undefined;
  return upper;
}
