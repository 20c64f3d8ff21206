/**
 * Conformance rule builders
 *
 * Each rule is a named predicate over a statement element. Rules come in two
 * kinds:
 * - "semantic": a wrong value type or a replaced fixed code. Enforced strictly.
 * - "cardinality": presence/count of elements. Counting goes through the type
 *   compatibility table, so a CE where a CD is required still counts.
 *
 * A failing rule of either kind rejects the statement. Rule ids are stable and
 * appear in rejections and decision logs.
 */

import { attr, child, children, descend, type CdaElement } from "../../cda/element";
import { findMistagRepair, isTypeCompatible } from "../datatypes/type-compatibility";
import { elementHasTemplate } from "./template-ids";

export interface ValidationContext {
  /** Enabled mistag repairs; a repaired type is what rules see */
  mistagRepairs: readonly string[];
}

export type RuleOutcome =
  | { passed: true }
  | { passed: false; path: string; message: string };

export interface ConformanceRule {
  id: string;
  kind: "semantic" | "cardinality";
  description: string;
  check(element: CdaElement, ctx: ValidationContext): RuleOutcome;
}

const PASS: RuleOutcome = { passed: true };

function fail(path: string, message: string): RuleOutcome {
  return { passed: false, path, message };
}

/** xsi:type as the validator sees it, after any enabled mistag repair */
export function validatedType(element: CdaElement, ctx: ValidationContext): string | undefined {
  return findMistagRepair(element, ctx.mistagRepairs)?.to ?? element.xsiType;
}

// ============================================================================
// Cardinality Rules
// ============================================================================

/** SHALL contain at least `min` <name> children (null-flavored ones count) */
export function requireChild(id: string, name: string, min = 1): ConformanceRule {
  return {
    id,
    kind: "cardinality",
    description: `SHALL contain at least ${min} ${name}`,
    check(element) {
      const count = children(element, name).length;
      return count >= min
        ? PASS
        : fail(element.path, `SHALL contain at least ${min} ${name}, found ${count}`);
    },
  };
}

/** SHALL contain a child at the given path: requirePath("...", "consumable", "manufacturedProduct") */
export function requirePath(id: string, ...names: string[]): ConformanceRule {
  const location = names.join("/");
  return {
    id,
    kind: "cardinality",
    description: `SHALL contain ${location}`,
    check(element) {
      return descend(element, ...names)
        ? PASS
        : fail(element.path, `SHALL contain ${location}`);
    },
  };
}

/** effectiveTime SHALL carry a low bound (or a point value) */
export function requireLowBound(id: string): ConformanceRule {
  return {
    id,
    kind: "cardinality",
    description: "effectiveTime SHALL contain low",
    check(element) {
      const effectiveTime = child(element, "effectiveTime");
      if (!effectiveTime) return fail(element.path, "SHALL contain effectiveTime");
      if (child(effectiveTime, "low") || attr(effectiveTime, "value") !== undefined) return PASS;
      return fail(effectiveTime.path, "effectiveTime SHALL contain low");
    },
  };
}

/** If statusCode is completed, effectiveTime/high SHALL be present */
export function requireHighWhenCompleted(id: string): ConformanceRule {
  return {
    id,
    kind: "cardinality",
    description: "effectiveTime/high required when completed",
    check(element) {
      if (attr(child(element, "statusCode"), "code") !== "completed") return PASS;
      const effectiveTime = child(element, "effectiveTime");
      if (child(effectiveTime, "high")) return PASS;
      return fail(
        effectiveTime?.path ?? element.path,
        "effectiveTime/high required when completed (statusCode=completed)",
      );
    },
  };
}

/** SHALL contain an entryRelationship of the given type holding the given template */
export function requireEntryRelationship(
  id: string,
  typeCode: string,
  templateRoot: string,
): ConformanceRule {
  return {
    id,
    kind: "cardinality",
    description: `SHALL contain entryRelationship[@typeCode=${typeCode}] with template ${templateRoot}`,
    check(element) {
      const found = children(element, "entryRelationship").some(
        (relationship) =>
          attr(relationship, "typeCode") === typeCode &&
          relationship.children.some(
            (node) => node.kind === "element" && elementHasTemplate(node, templateRoot),
          ),
      );
      return found
        ? PASS
        : fail(
            element.path,
            `SHALL contain entryRelationship[@typeCode=${typeCode}] with template ${templateRoot}`,
          );
    },
  };
}

// ============================================================================
// Semantic Rules
// ============================================================================

export interface FixedCode {
  code: string;
  codeSystem?: string;
}

/** code SHALL equal one of the fixed values; a null flavor does not satisfy it */
export function requireFixedCode(id: string, allowed: readonly FixedCode[]): ConformanceRule {
  const expected = allowed.map((fixed) => fixed.code).join(" or ");
  return {
    id,
    kind: "semantic",
    description: `code SHALL be ${expected}`,
    check(element) {
      const code = child(element, "code");
      if (!code) return fail(element.path, `SHALL contain code ${expected}`);

      const actual = attr(code, "code");
      const codeSystem = attr(code, "codeSystem");
      const matches = allowed.some(
        (fixed) =>
          fixed.code === actual &&
          (fixed.codeSystem === undefined || codeSystem === undefined || fixed.codeSystem === codeSystem),
      );
      return matches
        ? PASS
        : fail(code.path, `code SHALL be ${expected}, found ${actual ?? attr(code, "nullFlavor") ?? "nothing"}`);
    },
  };
}

/**
 * Every <value> SHALL be of a type compatible with `requiredType`, and at
 * least one SHALL be present. A null-flavored value still has to declare a
 * compatible type.
 */
export function requireValueType(id: string, requiredType: string): ConformanceRule {
  return {
    id,
    kind: "semantic",
    description: `value SHALL be ${requiredType}`,
    check(element, ctx) {
      const values = children(element, "value");
      if (values.length === 0) return fail(element.path, `SHALL contain value of type ${requiredType}`);

      for (const value of values) {
        const type = validatedType(value, ctx);
        if (!isTypeCompatible(type, requiredType)) {
          return fail(
            value.path,
            `value SHALL be ${requiredType}, found ${type ?? "untyped value"}`,
          );
        }
      }
      return PASS;
    },
  };
}
