/**
 * XML Normalizer
 *
 * Raw C-CDA markup -> read-only CdaElement tree.
 *
 * Steps:
 * 1. Configured markup repairs (BOM, undeclared namespace prefixes)
 * 2. Well-formedness check; failure is MalformedInput before any parsing
 * 3. Order-preserving parse (narrative mixed content depends on order)
 * 4. Tree build: namespace prefixes split off, xmlns declarations dropped,
 *    xsi:type lifted, configured element repairs applied
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { CdaElement, CdaNode } from "../cda/element";
import type { DecisionLog } from "./decision-log";
import { MalformedInputError, StructuralRejectionError } from "./errors";
import { preprocessMarkup } from "./preprocessor";
import {
  applyElementPreprocessors,
  getElementPreprocessor,
  type ElementDraft,
  type ElementPreprocessorFn,
  type PreprocessorContext,
} from "./preprocessor-registry";

export interface NormalizeOptions {
  markupPreprocessors: readonly string[];
  elementPreprocessors: readonly string[];
  log: DecisionLog;
}

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
});

// ============================================================================
// Main Normalizer Function
// ============================================================================

/**
 * @throws MalformedInputError if the markup is empty or not well-formed
 * @throws StructuralRejectionError if the root element is not ClinicalDocument
 */
export function normalizeXml(markup: string, options: NormalizeOptions): CdaElement {
  const repaired = preprocessMarkup(markup, options.markupPreprocessors, options.log);

  if (repaired.trim().length === 0) {
    throw new MalformedInputError("Document is empty", undefined, undefined);
  }

  const validation = XMLValidator.validate(repaired);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedInputError(
      `Malformed XML at line ${line}, column ${col}: ${msg}`,
      line,
      col,
    );
  }

  const parsed: unknown = parser.parse(repaired);
  const rootNode = asNodeList(parsed).find((node) => elementName(node) !== undefined);
  if (!rootNode) {
    throw new MalformedInputError("Document has no root element", undefined, undefined);
  }

  const context: PreprocessorContext = { log: options.log };
  const preprocessors = options.elementPreprocessors.map(getElementPreprocessor);
  const root = buildElement(rootNode, "", 1, false, context, preprocessors);

  if (root.name !== "ClinicalDocument") {
    throw new StructuralRejectionError([
      {
        ruleId: "document.root-element",
        path: root.path,
        message: `Root element must be ClinicalDocument, found ${root.name}`,
        schemaId: "header",
      },
    ]);
  }

  return root;
}

// ============================================================================
// Tree Building
// ============================================================================

type RawNode = Record<string, unknown>;

function isRawNode(value: unknown): value is RawNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNodeList(value: unknown): RawNode[] {
  return Array.isArray(value) ? value.filter(isRawNode) : [];
}

/** The tag name of a parsed element node, or undefined for text nodes */
function elementName(node: RawNode): string | undefined {
  return Object.keys(node).find(
    (key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY && !key.startsWith("?"),
  );
}

function splitName(qualified: string): { prefix?: string; local: string } {
  const colon = qualified.indexOf(":");
  if (colon === -1) return { local: qualified };
  return { prefix: qualified.slice(0, colon), local: qualified.slice(colon + 1) };
}

function readAttributes(node: RawNode): { attributes: Record<string, string>; xsiType?: string } {
  const attributes: Record<string, string> = {};
  let xsiType: string | undefined;

  const raw = node[ATTRIBUTES_KEY];
  if (!isRawNode(raw)) return { attributes };

  for (const [qualified, value] of Object.entries(raw)) {
    if (typeof value !== "string") continue;
    if (qualified === "xmlns" || qualified.startsWith("xmlns:")) continue;

    const { prefix, local } = splitName(qualified);
    if (local === "type" && prefix === "xsi") {
      xsiType = value;
    } else {
      attributes[local] = value;
    }
  }

  return { attributes, xsiType };
}

function buildElement(
  node: RawNode,
  parentPath: string,
  position: number,
  indexed: boolean,
  context: PreprocessorContext,
  preprocessors: readonly ElementPreprocessorFn[],
): CdaElement {
  const qualified = elementName(node) ?? "";
  const { prefix, local } = splitName(qualified);
  const { attributes, xsiType } = readAttributes(node);

  const draft: ElementDraft = {
    name: local,
    prefix,
    attributes,
    xsiType,
    path: `${parentPath}/${local}${indexed ? `[${position}]` : ""}`,
  };
  applyElementPreprocessors(context, draft, preprocessors);

  const rawChildren = asNodeList(node[qualified]);

  // Siblings sharing a name get a 1-based index in their path
  const nameCounts = new Map<string, number>();
  for (const rawChild of rawChildren) {
    const childName = elementName(rawChild);
    if (childName === undefined) continue;
    const childLocal = splitName(childName).local;
    nameCounts.set(childLocal, (nameCounts.get(childLocal) ?? 0) + 1);
  }

  const seen = new Map<string, number>();
  const builtChildren: CdaNode[] = [];

  for (const rawChild of rawChildren) {
    const childName = elementName(rawChild);
    if (childName === undefined) {
      const text = rawChild[TEXT_KEY];
      if (typeof text === "string" || typeof text === "number") {
        builtChildren.push({ kind: "text", value: String(text) });
      }
      continue;
    }

    const childLocal = splitName(childName).local;
    const childPosition = (seen.get(childLocal) ?? 0) + 1;
    seen.set(childLocal, childPosition);

    builtChildren.push(
      buildElement(
        rawChild,
        draft.path,
        childPosition,
        (nameCounts.get(childLocal) ?? 0) > 1,
        context,
        preprocessors,
      ),
    );
  }

  return {
    kind: "element",
    name: draft.name,
    ...(draft.prefix !== undefined && { prefix: draft.prefix }),
    attributes: draft.attributes,
    ...(draft.xsiType !== undefined && { xsiType: draft.xsiType }),
    children: builtChildren,
    path: draft.path,
  };
}
