/**
 * CDA PQ / IVL_PQ to FHIR Quantity / Range
 *
 * Every emitted quantity carries the UCUM system. A unit-less quantity uses
 * the dimensionless unit code "1".
 */

import { UCUM_SYSTEM } from "../code-mapping/coding-systems";
import type { QuantityIntervalValue, QuantityValue } from "./values";

const DIMENSIONLESS = "1";

export function convertPQToQuantity(pq: QuantityValue | undefined): fhir4.Quantity | undefined {
  if (!pq) return undefined;

  const unit = pq.unit && pq.unit !== DIMENSIONLESS ? pq.unit : undefined;
  return {
    value: pq.value,
    ...(unit && { unit }),
    system: UCUM_SYSTEM,
    code: unit ?? DIMENSIONLESS,
  };
}

/**
 * IVL_PQ conversion. Both bounds -> Range; one bound -> Quantity with a
 * comparator (low -> ">=", high -> "<="); no bounds -> undefined.
 */
export function convertIVLPQ(
  interval: QuantityIntervalValue,
): { range: fhir4.Range; quantity?: never } | { range?: never; quantity: fhir4.Quantity } | undefined {
  const low = convertPQToQuantity(interval.low);
  const high = convertPQToQuantity(interval.high);

  if (low && high) {
    return { range: { low, high } };
  }
  if (low) {
    return { quantity: { ...low, comparator: ">=" } };
  }
  if (high) {
    return { quantity: { ...high, comparator: "<=" } };
  }
  return undefined;
}

/** Range from an interval, for fields that only accept Range (referenceRange) */
export function convertIVLPQToRange(interval: QuantityIntervalValue): fhir4.Range | undefined {
  const low = convertPQToQuantity(interval.low);
  const high = convertPQToQuantity(interval.high);
  if (!low && !high) return undefined;
  return {
    ...(low && { low }),
    ...(high && { high }),
  };
}
