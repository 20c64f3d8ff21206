/**
 * FHIR document Bundle assembly.
 *
 * Entry order: Composition, then every registered resource in registration
 * order, then Provenance. After assembly every reference must resolve to an
 * entry fullUrl; those that do not are removed.
 */

import { randomUUID } from "crypto";
import type { DecisionLog } from "./decision-log";
import type { ReferenceRegistry } from "./references/reference-registry";
import { uuidReference } from "./references/reference-registry";

export interface AssemblyOptions {
  log: DecisionLog;
  /** ClinicalDocument/id as a FHIR identifier */
  identifier?: fhir4.Identifier;
  /** Bundle.timestamp; defaults to now */
  timestamp?: string;
}

export function createBundleEntry(resource: fhir4.FhirResource): fhir4.BundleEntry {
  const id = resource.id ?? randomUUID();
  return {
    fullUrl: uuidReference(id),
    resource: resource.id ? resource : { ...resource, id },
  };
}

// ============================================================================
// Dangling Reference Removal
// ============================================================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDanglingReference(value: unknown, targets: ReadonlySet<string>): value is JsonRecord {
  return isRecord(value) && typeof value.reference === "string" && !targets.has(value.reference);
}

/**
 * Remove every Reference under `node` whose target is not in the bundle.
 * A dangling array element is dropped (and an emptied array with it); a
 * dangling single field is deleted.
 */
function pruneReferences(
  node: JsonRecord,
  path: string,
  targets: ReadonlySet<string>,
  log: DecisionLog,
): void {
  for (const [key, value] of Object.entries(node)) {
    const fieldPath = `${path}.${key}`;

    if (Array.isArray(value)) {
      const kept = value.filter((element) => {
        if (!isDanglingReference(element, targets)) return true;
        recordRemoval(element, fieldPath, log);
        return false;
      });
      for (const element of kept) {
        if (isRecord(element)) pruneReferences(element, fieldPath, targets, log);
      }
      if (kept.length === 0 && value.length > 0) {
        delete node[key];
      } else if (kept.length !== value.length) {
        node[key] = kept;
      }
      continue;
    }

    if (isDanglingReference(value, targets)) {
      recordRemoval(value, fieldPath, log);
      delete node[key];
    } else if (isRecord(value)) {
      pruneReferences(value, fieldPath, targets, log);
    }
  }
}

function recordRemoval(reference: JsonRecord, path: string, log: DecisionLog): void {
  log.record({
    category: "Downgrade",
    code: "dangling-reference-removed",
    message: `Reference ${String(reference.reference)} does not resolve to a bundle entry`,
    path,
  });
}

// ============================================================================
// Main Assembly Function
// ============================================================================

export function assembleDocumentBundle(
  composition: fhir4.Composition,
  registry: ReferenceRegistry,
  provenances: readonly fhir4.Provenance[],
  options: AssemblyOptions,
): fhir4.Bundle {
  const entry = [composition, ...registry.resources(), ...provenances].map(createBundleEntry);
  const targets = new Set(entry.flatMap((item) => (item.fullUrl ? [item.fullUrl] : [])));

  for (const item of entry) {
    const resource = item.resource;
    if (isRecord(resource)) {
      pruneReferences(resource, resource.resourceType, targets, options.log);
    }
  }

  return {
    resourceType: "Bundle",
    id: randomUUID(),
    ...(options.identifier && { identifier: options.identifier }),
    type: "document",
    timestamp: options.timestamp ?? new Date().toISOString(),
    entry,
  };
}
