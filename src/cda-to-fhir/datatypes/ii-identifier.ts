/**
 * CDA II to FHIR Identifier
 *
 * - root + extension -> system = URI of root, value = extension
 * - root only        -> system = urn:ietf:rfc:3986, value = URI of root
 * - null-flavored or empty -> undefined
 *
 * Root to URI: urn:* unchanged, UUID -> urn:uuid:, OID -> table or urn:oid:
 */

import { oidToUri } from "../code-mapping/coding-systems";
import type { InstanceIdentifier } from "./values";

export const URI_IDENTIFIER_SYSTEM = "urn:ietf:rfc:3986";

export function identifierRootToUri(root: string): string {
  return oidToUri(root) ?? root;
}

/** True when the identifier can identify anything (has a root) */
export function isUsableIdentifier(ii: InstanceIdentifier): boolean {
  return ii.nullFlavor === undefined && ii.root !== undefined;
}

export function convertIIToIdentifier(
  ii: InstanceIdentifier | undefined,
): fhir4.Identifier | undefined {
  if (!ii || !isUsableIdentifier(ii) || !ii.root) return undefined;

  if (ii.extension) {
    return {
      system: identifierRootToUri(ii.root),
      value: ii.extension,
      ...(ii.assigningAuthorityName && { assigner: { display: ii.assigningAuthorityName } }),
    };
  }

  return {
    system: URI_IDENTIFIER_SYSTEM,
    value: identifierRootToUri(ii.root),
  };
}

export function convertIIsToIdentifiers(ids: readonly InstanceIdentifier[]): fhir4.Identifier[] {
  return ids.flatMap((ii) => {
    const identifier = convertIIToIdentifier(ii);
    return identifier ? [identifier] : [];
  });
}
