/**
 * CDA element tree
 *
 * Read-only view of a normalized C-CDA document. Produced once by
 * normalizeXml() and never mutated afterwards.
 */

export interface CdaText {
  readonly kind: "text";
  readonly value: string;
}

export interface CdaElement {
  readonly kind: "element";
  /** Local name, namespace prefix removed */
  readonly name: string;
  /** Prefix as written in the source markup (e.g. "sdtc") */
  readonly prefix?: string;
  readonly attributes: Readonly<Record<string, string>>;
  /** Value of xsi:type, if declared */
  readonly xsiType?: string;
  readonly children: readonly CdaNode[];
  /** XPath-like location, e.g. /ClinicalDocument/component/structuredBody/component[2]/section */
  readonly path: string;
}

export type CdaNode = CdaElement | CdaText;

// ============================================================================
// Navigation Helpers
// ============================================================================

export function isElement(node: CdaNode): node is CdaElement {
  return node.kind === "element";
}

export function childElements(element: CdaElement): CdaElement[] {
  return element.children.filter(isElement);
}

/** First child element with the given local name */
export function child(
  element: CdaElement | undefined,
  name: string,
): CdaElement | undefined {
  if (!element) return undefined;
  return element.children.find(
    (node): node is CdaElement => node.kind === "element" && node.name === name,
  );
}

/** All child elements with the given local name, in document order */
export function children(
  element: CdaElement | undefined,
  name: string,
): CdaElement[] {
  if (!element) return [];
  return element.children.filter(
    (node): node is CdaElement => node.kind === "element" && node.name === name,
  );
}

/**
 * Follow a chain of child names, taking the first match at each step.
 * descend(obs, "participant", "participantRole", "playingEntity")
 */
export function descend(
  element: CdaElement | undefined,
  ...names: string[]
): CdaElement | undefined {
  let current = element;
  for (const name of names) {
    current = child(current, name);
    if (!current) return undefined;
  }
  return current;
}

export function attr(
  element: CdaElement | undefined,
  name: string,
): string | undefined {
  if (!element) return undefined;
  const value = element.attributes[name];
  return value === undefined || value === "" ? undefined : value;
}

/** Concatenated text content of the element and its descendants, in document order */
export function textContent(element: CdaElement | undefined): string {
  if (!element) return "";
  let text = "";
  for (const node of element.children) {
    text += node.kind === "text" ? node.value : textContent(node);
  }
  return text;
}

/** Text content with whitespace runs collapsed; undefined when blank */
export function normalizedText(element: CdaElement | undefined): string | undefined {
  const text = collapseWhitespace(textContent(element));
  return text.length > 0 ? text : undefined;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function hasNullFlavor(element: CdaElement | undefined): boolean {
  return attr(element, "nullFlavor") !== undefined;
}
