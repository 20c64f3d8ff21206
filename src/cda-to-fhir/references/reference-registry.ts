/**
 * Reference Registry
 *
 * Call-scoped identity service: at most one resource per canonical key per
 * conversion. Resource ids are name-based UUIDs derived from the key, so the
 * same document always yields the same ids and references.
 *
 * Never share an instance between documents: keys are only unique within one
 * document's identifier space.
 */

import { createHash } from "crypto";
import type { DecisionLog } from "../decision-log";
import { isUsableIdentifier } from "../datatypes/ii-identifier";
import { oidToUri } from "../code-mapping/coding-systems";
import type { InstanceIdentifier } from "../datatypes/values";

/** RFC 4122 name-based UUID namespace for canonical keys */
const KEY_NAMESPACE = Buffer.from("8f3c2a5e41d74b6a9e0c5d2b7a1f4e93", "hex");

export interface Registration {
  /** urn:uuid:<id> */
  reference: string;
  /** True when an earlier registration with the same key was returned */
  deduplicated: boolean;
}

/**
 * Canonical key of an entity:
 * - `<type>|<system>|<value>` from the first usable identifier
 * - `<type>|content|<content>` otherwise
 */
export function canonicalKey(
  resourceType: string,
  identifiers: readonly InstanceIdentifier[],
  content: string,
): string {
  const identifier = identifiers.find(isUsableIdentifier);
  if (identifier?.root) {
    const system = oidToUri(identifier.root) ?? identifier.root;
    return `${resourceType}|${system}|${identifier.extension ?? identifier.root}`;
  }
  return `${resourceType}|content|${content}`;
}

/** Version 5 (SHA-1, name-based) UUID */
export function nameBasedUuid(name: string): string {
  const hash = createHash("sha1").update(KEY_NAMESPACE).update(name, "utf8").digest();
  const bytes = hash.subarray(0, 16);
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x50;
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;

  const hex = bytes.toString("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

export function uuidReference(id: string): string {
  return `urn:uuid:${id}`;
}

export class ReferenceRegistry {
  private readonly entries = new Map<string, { resource: fhir4.FhirResource; reference: string }>();

  constructor(private readonly log: DecisionLog) {}

  assignId(key: string): string {
    return nameBasedUuid(key);
  }

  /**
   * Register a resource under a canonical key. The first registration wins
   * and receives the key's id; later ones get the existing reference back.
   */
  register(resource: fhir4.FhirResource, key: string): Registration {
    const existing = this.entries.get(key);
    if (existing) {
      this.log.record({
        category: "Normalization",
        code: "deduplicated",
        message: `${resource.resourceType} merged into ${existing.reference} (${key})`,
        resourceType: resource.resourceType,
      });
      return { reference: existing.reference, deduplicated: true };
    }

    const id = this.assignId(key);
    resource.id = id;
    const reference = uuidReference(id);
    this.entries.set(key, { resource, reference });
    return { reference, deduplicated: false };
  }

  /** Reference to a registered resource; undefined when nothing was registered under the key */
  referenceTo(resourceType: string, key: string): string | undefined {
    const entry = this.entries.get(key);
    return entry?.resource.resourceType === resourceType ? entry.reference : undefined;
  }

  /** The resource registered under a key, for strategies that extend an earlier registration */
  lookup(key: string): fhir4.FhirResource | undefined {
    return this.entries.get(key)?.resource;
  }

  /** Registered resources in insertion order */
  resources(): fhir4.FhirResource[] {
    return [...this.entries.values()].map((entry) => entry.resource);
  }
}
