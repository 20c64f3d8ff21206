/**
 * Structured log of recoverable conversion decisions.
 *
 * Every normalization, synthesized id, skipped resource and unknown construct
 * is recorded here so callers can audit what the converter did with a
 * non-conformant document. Correctness never depends on this log.
 */

export type DecisionCategory =
  | "Normalization"
  | "Downgrade"
  | "UnknownConstruct"
  | "MissingRequiredData"
  | "StructuralRejection";

export interface ConversionDecision {
  category: DecisionCategory;
  /** kebab-case decision code, e.g. "synthesized-id" */
  code: string;
  message: string;
  path?: string;
  ruleId?: string;
  resourceType?: string;
}

const WARNING_CATEGORIES: ReadonlySet<DecisionCategory> = new Set([
  "UnknownConstruct",
  "MissingRequiredData",
  "StructuralRejection",
]);

export class DecisionLog {
  private readonly entries: ConversionDecision[] = [];

  constructor(private readonly echoToConsole = false) {}

  record(decision: ConversionDecision): void {
    this.entries.push(decision);

    if (!this.echoToConsole) return;

    const location = decision.path ? ` (${decision.path})` : "";
    const line = `[cda-to-fhir] ${decision.code}: ${decision.message}${location}`;
    if (WARNING_CATEGORIES.has(decision.category)) {
      console.warn(line);
    } else {
      console.info(line);
    }
  }

  normalization(code: string, message: string, path?: string): void {
    this.record({ category: "Normalization", code, message, path });
  }

  unknownConstruct(code: string, message: string, path?: string): void {
    this.record({ category: "UnknownConstruct", code, message, path });
  }

  missingRequiredData(resourceType: string, message: string, path?: string): void {
    this.record({
      category: "MissingRequiredData",
      code: "skipped-resource",
      message,
      path,
      resourceType,
    });
  }

  downgrade(code: string, message: string, path?: string, resourceType?: string): void {
    this.record({ category: "Downgrade", code, message, path, resourceType });
  }

  list(): ConversionDecision[] {
    return [...this.entries];
  }

  byCategory(category: DecisionCategory): ConversionDecision[] {
    return this.entries.filter((entry) => entry.category === category);
  }
}
