/**
 * CDA datatype values
 *
 * Tagged union of every value shape the converter understands. A value either
 * carries concrete content or is an `absent` marker with a null flavor, never
 * both.
 */

export const NULL_FLAVORS = [
  "NI", "INV", "DER", "OTH", "NINF", "PINF", "UNC", "MSK",
  "NA", "UNK", "ASKU", "NAV", "NASK", "NAVU", "QS", "TRC", "NP",
] as const;

export type NullFlavor = (typeof NULL_FLAVORS)[number];

export function isNullFlavor(value: string | undefined): value is NullFlavor {
  return NULL_FLAVORS.some((flavor) => flavor === value);
}

export type CodedType = "CD" | "CE" | "CV" | "CS" | "CO";

/** originalText: inline text, a "#id" reference into the section narrative, or both */
export interface OriginalText {
  text?: string;
  reference?: string;
}

export interface InstantValue {
  kind: "instant";
  /** Timestamp exactly as written, e.g. "20170821112858.251-0500" */
  raw: string;
}

export interface IntervalValue {
  kind: "interval";
  low?: InstantValue | AbsentValue;
  high?: InstantValue | AbsentValue;
  center?: InstantValue;
  width?: QuantityValue;
}

/** PIVL_TS: a repeating schedule, e.g. "every 8 hours" */
export interface PeriodicIntervalValue {
  kind: "periodic-interval";
  period?: QuantityValue;
  institutionSpecified: boolean;
}

export interface CodedValue {
  kind: "coded";
  type: CodedType;
  code?: string;
  codeSystem?: string;
  codeSystemName?: string;
  displayName?: string;
  originalText?: OriginalText;
  translations: CodedValue[];
  /** CO: the code carries an ordering. Advisory only. */
  ordinal?: boolean;
}

export interface QuantityValue {
  kind: "quantity";
  value: number;
  /** Numeric text as written, so precision survives */
  rawValue: string;
  unit?: string;
}

export interface QuantityIntervalValue {
  kind: "quantity-interval";
  low?: QuantityValue;
  high?: QuantityValue;
}

export interface EncapsulatedValue {
  kind: "encapsulated";
  mediaType?: string;
  representation?: "TXT" | "B64";
  content?: string;
  /** "#id" into the narrative, or a URL */
  reference?: string;
}

export interface StringValue {
  kind: "string";
  value: string;
}

export interface IntegerValue {
  kind: "integer";
  value: number;
}

export interface RealValue {
  kind: "real";
  value: number;
  rawValue: string;
}

export interface BooleanValue {
  kind: "boolean";
  value: boolean;
}

/** A conceptually present value that is absent for a stated reason */
export interface AbsentValue {
  kind: "absent";
  /** Datatype the element was declared (or required) to have */
  declaredType: string;
  nullFlavor: NullFlavor;
}

export type Value =
  | InstantValue
  | IntervalValue
  | PeriodicIntervalValue
  | CodedValue
  | QuantityValue
  | QuantityIntervalValue
  | EncapsulatedValue
  | StringValue
  | IntegerValue
  | RealValue
  | BooleanValue
  | AbsentValue;

export type ValueKind = Value["kind"];

export interface InstanceIdentifier {
  root?: string;
  extension?: string;
  assigningAuthorityName?: string;
  nullFlavor?: NullFlavor;
}

export function isAbsent(value: Value | undefined): value is AbsentValue {
  return value?.kind === "absent";
}

export function isCoded(value: Value | undefined): value is CodedValue {
  return value?.kind === "coded";
}
