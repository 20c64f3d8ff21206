import { readFileSync } from "fs";
import { join } from "path";
import { MARKUP_PREPROCESSORS, type MarkupPreprocessorId } from "./preprocessor";
import { ELEMENT_PREPROCESSORS, type ElementPreprocessorId } from "./preprocessor-registry";
import { MISTAG_REPAIRS, type MistagRepairId } from "./datatypes/type-compatibility";

/**
 * Deployment-level configuration for document repair and conformance policy.
 *
 * Loaded from config/cda-to-fhir.json (or $CDA_TO_FHIR_CONFIG) once per
 * process. Every registry ID is validated at load time so that a typo fails at
 * startup instead of silently disabling a repair.
 */

export type StatementRejectionPolicy = "reject-document" | "skip-statement";

export type CdaToFhirConfig = {
  preprocess: {
    /** Raw-markup repairs, run before parsing */
    markup: MarkupPreprocessorId[];
    /** Per-element repairs, run while the element tree is built */
    element: ElementPreprocessorId[];
  };
  datatypes: {
    /** Enabled entries of the closed mistag vocabulary */
    mistagRepairs: MistagRepairId[];
  };
  conformance: {
    /**
     * What a statement-level StructuralRejection does to the document.
     * Header-level rejections always reject the whole document.
     */
    onStatementRejection: StatementRejectionPolicy;
  };
  logging: {
    /** Echo each recorded decision to the console */
    decisions: boolean;
  };
};

const REJECTION_POLICIES: readonly StatementRejectionPolicy[] = [
  "reject-document",
  "skip-statement",
];

const DEFAULT_CONFIG_PATH = join(process.cwd(), "config", "cda-to-fhir.json");

function getConfigPath(): string {
  return process.env.CDA_TO_FHIR_CONFIG ?? DEFAULT_CONFIG_PATH;
}

let cachedConfig: CdaToFhirConfig | null = null;

/**
 * Returns the CDA-to-FHIR configuration (lazy singleton).
 * Config is loaded once at first call and cached for process lifetime.
 *
 * @throws Error if config file is missing, malformed, or contains unknown IDs
 */
export function cdaToFhirConfig(): CdaToFhirConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(getConfigPath(), "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error reading file";
    throw new Error(
      `Failed to load CDA-to-FHIR config from ${getConfigPath()}: ${message}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error";
    throw new Error(`Failed to parse CDA-to-FHIR config as JSON: ${message}`);
  }

  cachedConfig = parseConfig(parsed);
  return cachedConfig;
}

/**
 * Clears the cached config. Used for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Validate an already-decoded config object.
 * Missing sections take their defaults; present sections must be well formed.
 *
 * @throws Error describing the first problem found
 */
export function parseConfig(parsed: unknown): CdaToFhirConfig {
  if (!isRecord(parsed)) {
    throw new Error(
      `Invalid CDA-to-FHIR config: expected object, got ${describeKind(parsed)}`,
    );
  }

  const preprocess = optionalSection(parsed, "preprocess");
  const datatypes = optionalSection(parsed, "datatypes");
  const conformance = optionalSection(parsed, "conformance");
  const logging = optionalSection(parsed, "logging");

  return {
    preprocess: {
      markup: registeredIds(
        preprocess.markup,
        "preprocess.markup",
        "preprocessor",
        Object.keys(MARKUP_PREPROCESSORS),
      ),
      element: registeredIds(
        preprocess.element,
        "preprocess.element",
        "preprocessor",
        Object.keys(ELEMENT_PREPROCESSORS),
      ),
    },
    datatypes: {
      mistagRepairs: registeredIds(
        datatypes.mistagRepairs,
        "datatypes.mistagRepairs",
        "mistag repair",
        Object.keys(MISTAG_REPAIRS),
      ),
    },
    conformance: {
      onStatementRejection: rejectionPolicy(conformance.onStatementRejection),
    },
    logging: {
      decisions: optionalBoolean(logging.decisions, "logging.decisions"),
    },
  };
}

// ============================================================================
// Validation Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeKind(value: unknown): string {
  if (value === null) return "null";
  return Array.isArray(value) ? "array" : typeof value;
}

function optionalSection(
  config: Record<string, unknown>,
  key: string,
): Record<string, unknown> {
  const section = config[key];
  if (section === undefined) return {};
  if (!isRecord(section)) {
    throw new Error(
      `Invalid CDA-to-FHIR config: "${key}" must be an object, got ${describeKind(section)}`,
    );
  }
  return section;
}

function registeredIds(
  value: unknown,
  location: string,
  label: string,
  validIds: string[],
): string[] {
  if (value === undefined || value === null) return [];

  if (!Array.isArray(value)) {
    throw new Error(
      `Invalid ${label} config for ${location}: expected array of ${label} IDs, got ${describeKind(value)}`,
    );
  }

  const ids: string[] = [];
  for (const id of value) {
    if (typeof id !== "string" || !validIds.includes(id)) {
      throw new Error(
        `Unknown ${label} ID "${String(id)}" in config for ${location}. ` +
          `Valid IDs: ${validIds.join(", ")}`,
      );
    }
    ids.push(id);
  }
  return ids;
}

function rejectionPolicy(value: unknown): StatementRejectionPolicy {
  if (value === undefined) return "reject-document";
  const policy = REJECTION_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new Error(
      `Invalid conformance.onStatementRejection: ${JSON.stringify(value)}. ` +
        `Expected one of: ${REJECTION_POLICIES.join(", ")}`,
    );
  }
  return policy;
}

function optionalBoolean(value: unknown, location: string): boolean {
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    throw new Error(`Invalid ${location}: expected boolean, got ${describeKind(value)}`);
  }
  return value;
}
