/**
 * Clinical Statement Parser
 *
 * Recursive descent over act / observation / encounter / procedure /
 * substanceAdministration / organizer / supply elements. Each statement is
 * dispatched to its schema and validated before it is built; entryRelationship
 * and organizer component children go back through parseStatement.
 *
 * A rejected statement aborts only itself. Rejections of nested statements are
 * collected in the parser context and the enclosing statement is built
 * without them.
 */

import { attr, child, children, childElements, type CdaElement } from "../../cda/element";
import type { DecisionLog } from "../decision-log";
import type { StructuralRejection } from "../errors";
import {
  decodeCoded,
  decodeConcreteCoded,
  decodeEffectiveTime,
  decodeEncapsulated,
  decodeIdentifiers,
  decodeOriginalText,
  decodeQuantity,
  decodeValue,
  type DatatypeContext,
} from "../datatypes/decode";
import type { EffectiveTime } from "../datatypes/ts-datetime";
import type { CodedValue, QuantityIntervalValue, QuantityValue, Value } from "../datatypes/values";
import { readTemplateIds, formatTemplateId } from "../templates/template-ids";
import { selectSchema, validateStatement } from "../templates/validator";
import { convertONToString } from "../datatypes/pn-humanname";
import {
  parseAuthors,
  parseInformants,
  parseOrganization,
  parseParticipants,
  parsePerformers,
} from "./participants";
import type {
  ClinicalStatement,
  EntryRelationship,
  ManufacturedProduct,
  ParsedEntry,
  ReferenceRange,
  StatementKind,
} from "./types";

export interface ParserContext extends DatatypeContext {
  log: DecisionLog;
  /** Sink for rejections of nested statements */
  rejections: StructuralRejection[];
}

export const STATEMENT_ELEMENTS: ReadonlySet<string> = new Set<StatementKind>([
  "act",
  "observation",
  "encounter",
  "procedure",
  "substanceAdministration",
  "organizer",
  "supply",
]);

/** The clinical statement element inside an entry, entryRelationship or component */
export function findStatementElement(container: CdaElement): CdaElement | undefined {
  return childElements(container).find((element) => STATEMENT_ELEMENTS.has(element.name));
}

// ============================================================================
// Helper Functions
// ============================================================================

function codedList(parent: CdaElement, name: string): CodedValue[] {
  return children(parent, name).flatMap((element) => {
    const coded = decodeConcreteCoded(element);
    return coded ? [coded] : [];
  });
}

function parseEffectiveTimes(element: CdaElement): EffectiveTime[] {
  return children(element, "effectiveTime").flatMap((effectiveTime) => {
    const time = decodeEffectiveTime(effectiveTime);
    return time ? [time] : [];
  });
}

function parseInteger(element: CdaElement | undefined): number | undefined {
  const raw = attr(element, "value");
  return raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : undefined;
}

function decodeValues(element: CdaElement, ctx: ParserContext): Value[] {
  return children(element, "value").flatMap((valueElement) => {
    const result = decodeValue(valueElement, undefined, ctx);
    if (result.unknown) {
      ctx.log.unknownConstruct("unknown-datatype", result.unknown.message, result.unknown.path);
      return [];
    }
    return [result.value];
  });
}

function parseReferenceRanges(element: CdaElement, ctx: ParserContext): ReferenceRange[] {
  return children(element, "referenceRange").flatMap((referenceRange) => {
    const range = child(referenceRange, "observationRange");
    if (!range) return [];

    const valueElement = child(range, "value");
    const decoded = valueElement ? decodeValue(valueElement, "IVL_PQ", ctx) : undefined;
    if (decoded?.unknown) {
      ctx.log.unknownConstruct("unknown-datatype", decoded.unknown.message, decoded.unknown.path);
    }
    const text = decodeOriginalText(child(range, "text"));
    if (!decoded?.value && !text) return [];

    return [{ ...(decoded?.value && { value: decoded.value }), ...(text && { text }) }];
  });
}

function parseDose(element: CdaElement | undefined): QuantityValue | QuantityIntervalValue | undefined {
  if (!element || attr(element, "nullFlavor") !== undefined) return undefined;
  if (child(element, "low") || child(element, "high")) {
    const low = decodeQuantity(child(element, "low"));
    const high = decodeQuantity(child(element, "high"));
    if (!low && !high) return undefined;
    return { kind: "quantity-interval", ...(low && { low }), ...(high && { high }) };
  }
  return decodeQuantity(element);
}

// ============================================================================
// Products
// ============================================================================

type ProductResult =
  | { product: ManufacturedProduct | undefined; rejections?: never }
  | { product?: never; rejections: StructuralRejection[] };

/** consumable/manufacturedProduct or product/manufacturedProduct, validated when it declares a template */
function parseProduct(container: CdaElement | undefined, ctx: ParserContext): ProductResult {
  const element = child(container, "manufacturedProduct");
  if (!element) return { product: undefined };

  const selection = selectSchema(element);
  if (selection.schema) {
    const rejections = validateStatement(element, selection.schema, ctx);
    if (rejections.length > 0) return { rejections };
  }

  const material = child(element, "manufacturedMaterial");
  const code = decodeCoded(child(material, "code"));
  const name = convertONToString(child(material, "name"));
  const lotNumber = convertONToString(child(material, "lotNumberText"));
  const manufacturer = parseOrganization(child(element, "manufacturerOrganization"));

  return {
    product: {
      path: element.path,
      ...(selection.schema && { schemaId: selection.schema.id }),
      templateIds: readTemplateIds(element),
      ids: decodeIdentifiers(element),
      ...(code && { code }),
      ...(name && { name }),
      ...(lotNumber && { lotNumber }),
      ...(manufacturer && { manufacturer }),
    },
  };
}

// ============================================================================
// Nested Statements
// ============================================================================

function parseNested(container: CdaElement, ctx: ParserContext): ClinicalStatement | undefined {
  const element = findStatementElement(container);
  if (!element) return undefined;

  const parsed = parseStatement(element, ctx);
  if (parsed.rejections) {
    ctx.rejections.push(...parsed.rejections);
    return undefined;
  }
  return parsed.statement;
}

function parseEntryRelationships(element: CdaElement, ctx: ParserContext): EntryRelationship[] {
  return children(element, "entryRelationship").flatMap((relationship) => {
    const statement = parseNested(relationship, ctx);
    if (!statement) return [];
    const typeCode = attr(relationship, "typeCode");
    return [
      {
        ...(typeCode && { typeCode }),
        inversionInd: attr(relationship, "inversionInd") === "true",
        statement,
      },
    ];
  });
}

// ============================================================================
// Main Parser Function
// ============================================================================

/**
 * Parse one clinical statement element.
 *
 * Steps:
 * 1. Select a schema from the declared templateIds (generic when none is known)
 * 2. Validate; any failed rule returns { rejections } and nothing is built
 * 3. Build the common fields, then the kind-specific ones
 * 4. Recurse into entryRelationship and component children
 */
export function parseStatement(element: CdaElement, ctx: ParserContext): ParsedEntry {
  const selection = selectSchema(element);

  if (selection.schema) {
    const rejections = validateStatement(element, selection.schema, ctx);
    if (rejections.length > 0) return { rejections };
  } else {
    for (const templateId of selection.unknownTemplateIds) {
      ctx.log.unknownConstruct(
        "unknown-template",
        `No schema registered for template ${formatTemplateId(templateId)}; parsed as generic ${element.name}`,
        element.path,
      );
    }
  }

  const [effectiveTime, ...effectiveTimes] = parseEffectiveTimes(element);
  const code = decodeCoded(child(element, "code"));
  const text = decodeOriginalText(child(element, "text"));
  const classCode = attr(element, "classCode");
  const moodCode = attr(element, "moodCode");
  const statusCode = attr(child(element, "statusCode"), "code");

  const base = {
    path: element.path,
    ...(selection.schema && { schemaId: selection.schema.id }),
    ...(classCode && { classCode }),
    ...(moodCode && { moodCode }),
    negated: attr(element, "negationInd") === "true",
    ids: decodeIdentifiers(element),
    templateIds: readTemplateIds(element),
    ...(code && { code }),
    ...(text && { text }),
    ...(statusCode && { statusCode }),
    ...(effectiveTime && { effectiveTime }),
    effectiveTimes,
    entryRelationships: parseEntryRelationships(element, ctx),
    participants: parseParticipants(element),
    authors: parseAuthors(element),
    performers: parsePerformers(element),
    informants: parseInformants(element),
  };

  switch (element.name) {
    case "act": {
      const encapsulatedText = decodeEncapsulated(child(element, "text"));
      return { statement: { kind: "act", ...base, ...(encapsulatedText && { encapsulatedText }) } };
    }

    case "encounter":
      return { statement: { kind: "encounter", ...base } };

    case "observation": {
      const methodCode = decodeConcreteCoded(child(element, "methodCode"));
      return {
        statement: {
          kind: "observation",
          ...base,
          values: decodeValues(element, ctx),
          interpretationCodes: codedList(element, "interpretationCode"),
          referenceRanges: parseReferenceRanges(element, ctx),
          targetSiteCodes: codedList(element, "targetSiteCode"),
          ...(methodCode && { methodCode }),
        },
      };
    }

    case "procedure": {
      const methodCode = decodeConcreteCoded(child(element, "methodCode"));
      return {
        statement: {
          kind: "procedure",
          ...base,
          targetSiteCodes: codedList(element, "targetSiteCode"),
          ...(methodCode && { methodCode }),
        },
      };
    }

    case "substanceAdministration": {
      const product = parseProduct(child(element, "consumable"), ctx);
      if (product.rejections) return { rejections: product.rejections };

      const doseQuantity = parseDose(child(element, "doseQuantity"));
      const routeCode = decodeConcreteCoded(child(element, "routeCode"));
      const repeatNumber = parseInteger(child(element, "repeatNumber"));
      return {
        statement: {
          kind: "substanceAdministration",
          ...base,
          ...(doseQuantity && { doseQuantity }),
          ...(routeCode && { routeCode }),
          approachSiteCodes: codedList(element, "approachSiteCode"),
          ...(repeatNumber !== undefined && { repeatNumber }),
          ...(product.product && { product: product.product }),
        },
      };
    }

    case "organizer": {
      const components = children(element, "component").flatMap((component) => {
        const statement = parseNested(component, ctx);
        return statement ? [statement] : [];
      });
      return { statement: { kind: "organizer", ...base, components } };
    }

    case "supply": {
      const product = parseProduct(child(element, "product"), ctx);
      if (product.rejections) return { rejections: product.rejections };

      const quantity = decodeQuantity(child(element, "quantity"));
      const repeatNumber = parseInteger(child(element, "repeatNumber"));
      return {
        statement: {
          kind: "supply",
          ...base,
          ...(quantity && { quantity }),
          ...(repeatNumber !== undefined && { repeatNumber }),
          ...(product.product && { product: product.product }),
        },
      };
    }

    default:
      return {
        rejections: [
          {
            ruleId: "statement.element-name",
            path: element.path,
            message: `${element.name} is not a clinical statement`,
            schemaId: selection.schema?.id ?? "generic",
          },
        ],
      };
  }
}
