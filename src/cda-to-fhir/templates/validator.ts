/**
 * Template Dispatcher & Conformance Validator
 *
 * Picks the schema for a statement from its declared templateIds and runs the
 * schema's rules. Template roots with no registered schema fall through to a
 * generic statement; they never fail dispatch.
 */

import type { CdaElement } from "../../cda/element";
import type { StructuralRejection } from "../errors";
import { requireChild, requirePath, type ConformanceRule, type ValidationContext } from "./rules";
import { KNOWN_TEMPLATE_ROOTS, STATEMENT_SCHEMAS, type StatementSchema } from "./schemas";
import { readTemplateIds, type TemplateId } from "./template-ids";

export type SchemaSelection =
  | { schema: StatementSchema; generic?: never; unknownTemplateIds?: never }
  | { schema?: never; generic: true; unknownTemplateIds: TemplateId[] };

export const HEADER_SCHEMA_ID = "header";

// ============================================================================
// Schema Selection
// ============================================================================

interface Candidate {
  schema: StatementSchema;
  order: number;
  nameMatches: boolean;
  extensionMatches: boolean;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.nameMatches !== b.nameMatches) return a.nameMatches ? -1 : 1;
  if (a.extensionMatches !== b.extensionMatches) return a.extensionMatches ? -1 : 1;
  if (a.schema.specificity !== b.schema.specificity) {
    return b.schema.specificity - a.schema.specificity;
  }
  return a.order - b.order;
}

/**
 * Select the most specific registered schema for an element.
 *
 * Ranking among schemas whose templateRoot the element declares:
 * 1. element name permitted by the schema
 * 2. declared templateId extension listed by the schema
 * 3. higher specificity
 * 4. registration order
 *
 * A schema is still selected when only its element name disagrees; the
 * element-name check in validateStatement then rejects the statement.
 */
export function selectSchema(
  element: CdaElement,
  schemas: readonly StatementSchema[] = STATEMENT_SCHEMAS,
): SchemaSelection {
  const templateIds = readTemplateIds(element);

  const candidates: Candidate[] = [];
  schemas.forEach((schema, order) => {
    const declared = templateIds.filter((templateId) => templateId.root === schema.templateRoot);
    if (declared.length === 0) return;

    candidates.push({
      schema,
      order,
      nameMatches: schema.elementNames.some((name) => name === element.name),
      extensionMatches: declared.some(
        (templateId) =>
          templateId.extension !== undefined &&
          (schema.extensions ?? []).includes(templateId.extension),
      ),
    });
  });

  const best = candidates.sort(compareCandidates)[0];
  if (best) {
    return { schema: best.schema };
  }

  return {
    generic: true,
    unknownTemplateIds: templateIds.filter((templateId) => !KNOWN_TEMPLATE_ROOTS.has(templateId.root)),
  };
}

// ============================================================================
// Validation
// ============================================================================

function elementNameRule(schema: StatementSchema): ConformanceRule {
  const names = schema.elementNames.join(" or ");
  return {
    id: `${schema.id}.element-name`,
    kind: "semantic",
    description: `SHALL be ${names}`,
    check(element) {
      return schema.elementNames.some((name) => name === element.name)
        ? { passed: true }
        : {
            passed: false,
            path: element.path,
            message: `template ${schema.templateRoot} requires ${names}, found ${element.name}`,
          };
    },
  };
}

function evaluate(
  element: CdaElement,
  rules: readonly ConformanceRule[],
  schemaId: string,
  ctx: ValidationContext,
): StructuralRejection[] {
  const rejections: StructuralRejection[] = [];
  for (const rule of rules) {
    const outcome = rule.check(element, ctx);
    if (!outcome.passed) {
      rejections.push({ ruleId: rule.id, path: outcome.path, message: outcome.message, schemaId });
    }
  }
  return rejections;
}

/**
 * Run every rule of the schema against the element, in order.
 * Returns one rejection per failed rule; an empty array means the statement
 * conforms.
 */
export function validateStatement(
  element: CdaElement,
  schema: StatementSchema,
  ctx: ValidationContext,
): StructuralRejection[] {
  const nameCheck = evaluate(element, [elementNameRule(schema)], schema.id, ctx);
  // A statement of the wrong kind is not checked any further
  if (nameCheck.length > 0) return nameCheck;
  return evaluate(element, schema.rules, schema.id, ctx);
}

// ============================================================================
// Header
// ============================================================================

const HEADER_RULES: readonly ConformanceRule[] = [
  requireChild("header.id", "id"),
  requireChild("header.code", "code"),
  requireChild("header.effective-time", "effectiveTime"),
  requirePath("header.record-target", "recordTarget", "patientRole"),
  requirePath("header.patient-role-id", "recordTarget", "patientRole", "id"),
];

/**
 * US Realm Header checks on the ClinicalDocument element. Any failure rejects
 * the whole document.
 */
export function validateHeader(root: CdaElement, ctx: ValidationContext): StructuralRejection[] {
  return evaluate(root, HEADER_RULES, HEADER_SCHEMA_ID, ctx);
}
