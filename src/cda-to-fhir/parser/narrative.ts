/**
 * Section narrative (<text>) parsing and ID lookup
 *
 * The narrative is copied into a NarrativeBlock tree once per section, and
 * every ID-tagged node is indexed. Statements refer to narrative through
 * <reference value="#id"/>; those references are resolved against the index,
 * never against the XML tree.
 *
 * Plain-text reconstruction concatenates every text node in document order,
 * including text that follows a child element, then collapses whitespace.
 * <br/> becomes a line break before collapsing and is kept as a single space.
 */

import { attr, collapseWhitespace, type CdaElement } from "../../cda/element";

export interface NarrativeBlock {
  /** Narrative element name: paragraph, list, item, table, tr, td, content, ... */
  tag: string;
  id?: string;
  children: Array<NarrativeBlock | string>;
}

export type NarrativeIndex = ReadonlyMap<string, NarrativeBlock>;

export type TextReferenceResult =
  | { text: string; notFound?: never }
  | { text?: never; notFound: string };

/** Build the narrative tree for a <text> element and index its ID-tagged nodes */
export function parseNarrative(textElement: CdaElement): {
  block: NarrativeBlock;
  index: NarrativeIndex;
} {
  const index = new Map<string, NarrativeBlock>();
  const block = toBlock(textElement, index);
  return { block, index };
}

function toBlock(element: CdaElement, index: Map<string, NarrativeBlock>): NarrativeBlock {
  const id = attr(element, "ID");
  const children: Array<NarrativeBlock | string> = [];

  for (const node of element.children) {
    if (node.kind === "text") {
      children.push(node.value);
    } else {
      children.push(toBlock(node, index));
    }
  }

  const block: NarrativeBlock = { tag: element.name, ...(id && { id }), children };
  // First occurrence wins when a sender reuses an ID
  if (id && !index.has(id)) {
    index.set(id, block);
  }
  return block;
}

/** Elements whose boundaries separate words */
const BLOCK_TAGS = new Set(["paragraph", "item", "td", "th", "tr", "caption"]);

/** Plain text of a narrative node, tail text included, whitespace collapsed */
export function narrativeText(block: NarrativeBlock): string {
  return collapseWhitespace(rawText(block));
}

function rawText(block: NarrativeBlock): string {
  if (block.tag === "br") return "\n";
  let text = "";
  for (const child of block.children) {
    text += typeof child === "string" ? child : rawText(child);
  }
  return BLOCK_TAGS.has(block.tag) ? ` ${text} ` : text;
}

/**
 * Index for resolving references inside one section: the section's own IDs
 * shadow those of the enclosing scope.
 */
export function scopedNarrativeIndex(own: NarrativeIndex, enclosing: NarrativeIndex): NarrativeIndex {
  if (own.size === 0) return enclosing;
  const scoped = new Map(enclosing);
  for (const [id, block] of own) scoped.set(id, block);
  return scoped;
}

/**
 * Resolve "#id" (or "id") to the plain text of the tagged narrative node.
 * A missing or empty node yields notFound rather than an error.
 */
export function resolveTextReference(
  reference: string,
  index: NarrativeIndex | undefined,
): TextReferenceResult {
  const id = reference.startsWith("#") ? reference.slice(1) : reference;
  const block = index?.get(id);
  if (!block) return { notFound: id };

  const text = narrativeText(block);
  return text.length > 0 ? { text } : { notFound: id };
}
