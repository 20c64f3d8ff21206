/**
 * CDA TEL to FHIR ContactPoint
 *
 * The URL scheme of @value selects the system: tel:, fax:, mailto:, http(s):.
 */

import { attr, type CdaElement } from "../../cda/element";

const SCHEME_SYSTEM_MAP: Record<string, fhir4.ContactPoint["system"]> = {
  tel: "phone",
  fax: "fax",
  mailto: "email",
  http: "url",
  https: "url",
  sms: "sms",
};

const TELECOM_USE_MAP: Record<string, fhir4.ContactPoint["use"]> = {
  H: "home",
  HP: "home",
  HV: "home",
  WP: "work",
  DIR: "work",
  PUB: "work",
  MC: "mobile",
  PG: "mobile",
  TMP: "temp",
  BAD: "old",
};

export function convertTELToContactPoint(
  telecom: CdaElement | undefined,
): fhir4.ContactPoint | undefined {
  if (!telecom || attr(telecom, "nullFlavor") !== undefined) return undefined;

  const raw = attr(telecom, "value");
  if (!raw) return undefined;

  const match = /^([a-z]+):(.*)$/i.exec(raw);
  const scheme = match?.[1]?.toLowerCase();
  const system = scheme ? SCHEME_SYSTEM_MAP[scheme] : undefined;

  // http(s) URLs keep their scheme; other schemes are stripped from the value
  const value = system === "url" || !match || !system ? raw : (match[2] ?? "").trim();
  if (!value) return undefined;

  const use = (attr(telecom, "use") ?? "")
    .split(/\s+/)
    .map((code) => TELECOM_USE_MAP[code])
    .find((mapped) => mapped !== undefined);

  return {
    system: system ?? "other",
    value,
    ...(use && { use }),
  };
}

export function convertTELsToContactPoints(telecoms: readonly CdaElement[]): fhir4.ContactPoint[] {
  return telecoms.flatMap((telecom) => {
    const converted = convertTELToContactPoint(telecom);
    return converted ? [converted] : [];
  });
}
