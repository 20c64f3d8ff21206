/**
 * CDA CD/CE/CV/CO to FHIR CodeableConcept
 *
 * - code/codeSystem/displayName -> coding[0] (fixed value sets use the canonical display)
 * - translation[]               -> coding[1..]
 * - text: originalText (inline or resolved #reference), else displayName,
 *   else the first coding display found
 */

import type { DecisionLog } from "../decision-log";
import { fixedDisplay, oidToUri } from "../code-mapping/coding-systems";
import { resolveTextReference, type NarrativeIndex } from "../parser/narrative";
import type { AbsentValue, CodedValue, OriginalText } from "./values";

export interface ConceptContext {
  log: DecisionLog;
  narrativeIndex?: NarrativeIndex;
  path?: string;
}

/** Codes from a fixed value set take the canonical display over the document's */
function convertToCoding(coded: CodedValue): fhir4.Coding | undefined {
  if (!coded.code) return undefined;
  const system = oidToUri(coded.codeSystem);
  const display = (system && fixedDisplay(system, coded.code)) || coded.displayName;
  return {
    ...(system && { system }),
    code: coded.code,
    ...(display && { display }),
  };
}

/**
 * Resolve originalText to plain text. A reference that does not resolve is
 * recorded and treated as no text.
 */
export function resolveOriginalText(
  originalText: OriginalText | undefined,
  ctx: ConceptContext,
): string | undefined {
  if (!originalText) return undefined;
  if (originalText.text) return originalText.text;
  if (!originalText.reference) return undefined;

  const resolved = resolveTextReference(originalText.reference, ctx.narrativeIndex);
  if (resolved.notFound !== undefined) {
    ctx.log.unknownConstruct(
      "reference-not-found",
      `Narrative reference "#${resolved.notFound}" not found`,
      ctx.path,
    );
    return undefined;
  }
  return resolved.text;
}

export function convertCodedToCodings(coded: CodedValue): fhir4.Coding[] {
  const codings: fhir4.Coding[] = [];
  const primary = convertToCoding(coded);
  if (primary) codings.push(primary);

  for (const translation of coded.translations) {
    const coding = convertToCoding(translation);
    if (coding) codings.push(coding);
  }
  return codings;
}

export function convertCodedToCodeableConcept(
  coded: CodedValue | AbsentValue | undefined,
  ctx: ConceptContext,
): fhir4.CodeableConcept | undefined {
  if (!coded || coded.kind === "absent") return undefined;

  const codings = convertCodedToCodings(coded);
  const text =
    resolveOriginalText(coded.originalText, ctx) ??
    coded.displayName ??
    codings.find((coding) => coding.display)?.display;

  if (codings.length === 0 && !text) return undefined;

  return {
    ...(codings.length > 0 && { coding: codings }),
    ...(text && { text }),
  };
}

/** First coding of a coded value, for fields typed as Coding */
export function convertCodedToCoding(
  coded: CodedValue | AbsentValue | undefined,
): fhir4.Coding | undefined {
  if (!coded || coded.kind === "absent") return undefined;
  return convertToCoding(coded);
}

/** Code + system pair of the primary coding or its first coded translation */
export function codesOf(coded: CodedValue): Array<{ system?: string; code: string }> {
  return convertCodedToCodings(coded).flatMap((coding) =>
    coding.code ? [{ ...(coding.system && { system: coding.system }), code: coding.code }] : [],
  );
}
