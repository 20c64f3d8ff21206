/**
 * Markup-level repairs applied before the XML is parsed.
 *
 * Each preprocessor takes raw markup and returns (possibly modified) markup.
 * They are registered by kebab-case IDs, validated at config load time, and
 * run in the order listed in config. A preprocessor that has nothing to do
 * returns its input unchanged.
 */

import type { DecisionLog } from "./decision-log";

export type MarkupPreprocessorFn = (markup: string) => string;

export const MARKUP_PREPROCESSORS: Record<string, MarkupPreprocessorFn> = {
  "strip-byte-order-mark": stripByteOrderMark,
  "declare-missing-namespaces": declareMissingNamespaces,
};

export type MarkupPreprocessorId = keyof typeof MARKUP_PREPROCESSORS;

/** @throws Error if ID is not registered */
export function getMarkupPreprocessor(id: string): MarkupPreprocessorFn {
  const preprocessor = MARKUP_PREPROCESSORS[id];
  if (!preprocessor) {
    throw new Error(
      `Unknown preprocessor ID: ${id}. Valid IDs: ${Object.keys(MARKUP_PREPROCESSORS).join(", ")}`,
    );
  }
  return preprocessor;
}

/**
 * Run the configured markup preprocessors in order.
 * Each one that changes the markup is recorded as a normalization.
 */
export function preprocessMarkup(
  markup: string,
  preprocessorIds: readonly string[],
  log: DecisionLog,
): string {
  let current = markup;
  for (const id of preprocessorIds) {
    const next = getMarkupPreprocessor(id)(current);
    if (next !== current) {
      log.normalization(id, `Applied markup repair "${id}"`);
      current = next;
    }
  }
  return current;
}

// =============================================================================
// Preprocessor Implementations
// =============================================================================

/** Remove a leading byte order mark and any whitespace before the first tag */
function stripByteOrderMark(markup: string): string {
  return markup.replace(/^\uFEFF/, "").replace(/^\s+(?=<)/, "");
}

const NAMESPACE_DECLARATIONS: Record<string, string> = {
  xsi: "http://www.w3.org/2001/XMLSchema-instance",
  sdtc: "urn:hl7-org:sdtc",
};

/**
 * Some senders use xsi: and sdtc: prefixes without declaring them. Add the
 * declarations to the first ClinicalDocument start tag.
 *
 * Idempotent: a prefix that is already declared is left alone. Empty input and
 * markup without a ClinicalDocument start tag are returned unchanged.
 */
function declareMissingNamespaces(markup: string): string {
  if (markup.trim().length === 0) return markup;

  const startTag = /<ClinicalDocument\b[^>]*>/.exec(markup);
  if (!startTag) return markup;

  const tag = startTag[0];
  const missing: string[] = [];

  for (const [prefix, uri] of Object.entries(NAMESPACE_DECLARATIONS)) {
    const used = new RegExp(`[<\\s]${prefix}:`).test(markup);
    const declared = new RegExp(`xmlns:${prefix}\\s*=`).test(tag);
    if (used && !declared) {
      missing.push(`xmlns:${prefix}="${uri}"`);
    }
  }

  if (missing.length === 0) return markup;

  const selfClosing = tag.endsWith("/>");
  const body = tag.slice(0, selfClosing ? -2 : -1).trimEnd();
  const patched = `${body} ${missing.join(" ")}${selfClosing ? "/>" : ">"}`;

  return (
    markup.slice(0, startTag.index) +
    patched +
    markup.slice(startTag.index + tag.length)
  );
}
