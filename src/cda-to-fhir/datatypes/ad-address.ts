/**
 * CDA AD (postal address) to FHIR Address
 */

import { attr, child, children, normalizedText, type CdaElement } from "../../cda/element";
import { decodeEffectiveTime } from "./decode";
import { convertIntervalToPeriod } from "./ts-datetime";

const ADDRESS_USE_MAP: Record<string, fhir4.Address["use"]> = {
  H: "home",
  HP: "home",
  HV: "home",
  WP: "work",
  DIR: "work",
  PUB: "work",
  TMP: "temp",
  OLD: "old",
  BAD: "old",
};

const ADDRESS_TYPE_MAP: Record<string, fhir4.Address["type"]> = {
  PST: "postal",
  PHYS: "physical",
};

function partText(address: CdaElement, partName: string): string | undefined {
  return normalizedText(child(address, partName));
}

function convertUseablePeriod(address: CdaElement): fhir4.Period | undefined {
  const time = decodeEffectiveTime(child(address, "useablePeriod"));
  return time?.kind === "interval" ? convertIntervalToPeriod(time) : undefined;
}

/**
 * Field Mappings:
 * - @use                -> use / type (space-separated codes)
 * - streetAddressLine[] -> line[]
 * - city / state / postalCode / country / county -> same-named fields (county -> district)
 * - useablePeriod       -> period
 */
export function convertADToAddress(address: CdaElement | undefined): fhir4.Address | undefined {
  if (!address || attr(address, "nullFlavor") !== undefined) return undefined;

  const line = children(address, "streetAddressLine").flatMap((part) => {
    const text = normalizedText(part);
    return text ? [text] : [];
  });
  const city = partText(address, "city");
  const district = partText(address, "county");
  const state = partText(address, "state");
  const postalCode = partText(address, "postalCode");
  const country = partText(address, "country");

  if (line.length === 0 && !city && !district && !state && !postalCode && !country) {
    return undefined;
  }

  const useCodes = (attr(address, "use") ?? "").split(/\s+/);
  const use = useCodes.map((code) => ADDRESS_USE_MAP[code]).find((mapped) => mapped !== undefined);
  const type = useCodes.map((code) => ADDRESS_TYPE_MAP[code]).find((mapped) => mapped !== undefined);
  const period = convertUseablePeriod(address);

  return {
    ...(use && { use }),
    ...(type && { type }),
    ...(line.length > 0 && { line }),
    ...(city && { city }),
    ...(district && { district }),
    ...(state && { state }),
    ...(postalCode && { postalCode }),
    ...(country && { country }),
    ...(period && { period }),
  };
}

export function convertADsToAddresses(addresses: readonly CdaElement[]): fhir4.Address[] {
  return addresses.flatMap((address) => {
    const converted = convertADToAddress(address);
    return converted ? [converted] : [];
  });
}
