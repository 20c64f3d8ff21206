/**
 * Element-level repairs applied while the element tree is being built.
 *
 * Preprocessors are registered by kebab-case IDs and validated at config load
 * time. They compose in the order listed in config. Each modifies the element
 * draft in place, before the element is frozen into the tree, and returns true
 * when it changed something.
 */

import type { DecisionLog } from "./decision-log";
import { isNullFlavor } from "./datatypes/values";

/** Mutable element state handed to preprocessors before the tree is finalized */
export interface ElementDraft {
  name: string;
  prefix?: string;
  attributes: Record<string, string>;
  xsiType?: string;
  path: string;
}

export interface PreprocessorContext {
  log: DecisionLog;
}

export type ElementPreprocessorFn = (
  context: PreprocessorContext,
  element: ElementDraft,
) => boolean;

export const ELEMENT_PREPROCESSORS: Record<string, ElementPreprocessorFn> = {
  "strip-xsi-type-prefix": stripXsiTypePrefix,
  "trim-code-attributes": trimCodeAttributes,
  "uppercase-null-flavor": uppercaseNullFlavor,
};

export type ElementPreprocessorId = keyof typeof ELEMENT_PREPROCESSORS;

/** @throws Error if ID is not registered */
export function getElementPreprocessor(id: string): ElementPreprocessorFn {
  const preprocessor = ELEMENT_PREPROCESSORS[id];
  if (!preprocessor) {
    throw new Error(
      `Unknown preprocessor ID: ${id}. Valid IDs: ${Object.keys(ELEMENT_PREPROCESSORS).join(", ")}`,
    );
  }
  return preprocessor;
}

export function applyElementPreprocessors(
  context: PreprocessorContext,
  element: ElementDraft,
  preprocessors: readonly ElementPreprocessorFn[],
): void {
  for (const preprocessor of preprocessors) {
    preprocessor(context, element);
  }
}

// =============================================================================
// Preprocessor Implementations
// =============================================================================

/**
 * xsi:type="v3:CD" -> "CD". The HL7 namespace prefix on the type name is
 * noise once namespaces have been stripped from element names.
 */
function stripXsiTypePrefix(
  context: PreprocessorContext,
  element: ElementDraft,
): boolean {
  if (!element.xsiType) return false;

  const colon = element.xsiType.indexOf(":");
  if (colon === -1) return false;

  const original = element.xsiType;
  element.xsiType = original.slice(colon + 1);
  context.log.normalization(
    "strip-xsi-type-prefix",
    `xsi:type "${original}" read as "${element.xsiType}"`,
    element.path,
  );
  return true;
}

const CODE_ATTRIBUTES = ["code", "codeSystem", "root", "extension", "value", "unit"];

/** Leading/trailing whitespace inside coded attributes, e.g. code=" 38341003 " */
function trimCodeAttributes(
  context: PreprocessorContext,
  element: ElementDraft,
): boolean {
  let changed = false;

  for (const name of CODE_ATTRIBUTES) {
    const value = element.attributes[name];
    if (value === undefined) continue;
    const trimmed = value.trim();
    if (trimmed !== value) {
      element.attributes[name] = trimmed;
      changed = true;
    }
  }

  if (changed) {
    context.log.normalization(
      "trim-code-attributes",
      `Trimmed whitespace in coded attributes of <${element.name}>`,
      element.path,
    );
  }
  return changed;
}

/** nullFlavor="unk" -> "UNK", only for flavors that exist in upper case */
function uppercaseNullFlavor(
  context: PreprocessorContext,
  element: ElementDraft,
): boolean {
  const nullFlavor = element.attributes.nullFlavor;
  if (nullFlavor === undefined) return false;

  const upper = nullFlavor.toUpperCase();
  if (upper === nullFlavor || !isNullFlavor(upper)) return false;

  element.attributes.nullFlavor = upper;
  context.log.normalization(
    "uppercase-null-flavor",
    `nullFlavor "${nullFlavor}" read as "${upper}"`,
    element.path,
  );
  return true;
}
