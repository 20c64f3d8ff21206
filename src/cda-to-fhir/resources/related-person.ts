/**
 * Informants to FHIR RelatedPerson
 *
 * A relatedEntity informant (family member, caregiver) becomes a RelatedPerson
 * of the document's patient. One whose class is PAT is the patient, and is
 * referenced as such.
 */

import { formatHumanName } from "../datatypes/pn-humanname";
import type { CodedValue } from "../datatypes/values";
import type { Informant, RelatedEntity } from "../parser/types";
import { canonicalKey } from "../references/reference-registry";
import { subjectReference, toConcept } from "./common";
import type { MappingContext } from "./mapping-context";
import { mapPractitioner } from "./participant-resources";

const ROLE_CODE_OID = "2.16.840.1.113883.5.111";
const PATIENT_CLASS = "PAT";

/** Relationship codes are v3 RoleCode unless the document says otherwise */
function relationshipCode(code: CodedValue): CodedValue {
  return code.codeSystem ? code : { ...code, codeSystem: ROLE_CODE_OID };
}

/**
 * Field Mappings:
 * - code                 -> relationship (v3 RoleCode when no system)
 * - relatedPerson/name   -> name
 * - telecom[] / addr[]   -> telecom / address
 *
 * The same relationship, family name and class converge on one resource.
 */
export function mapRelatedPerson(entity: RelatedEntity, ctx: MappingContext): string | undefined {
  const display = formatHumanName(entity.personNames[0]);
  const relationship = entity.code
    ? toConcept(relationshipCode(entity.code), ctx, entity.path)
    : undefined;
  if (!display && !relationship) {
    ctx.log.missingRequiredData("RelatedPerson", "Informant has neither a name nor a relationship", entity.path);
    return undefined;
  }

  const content = [entity.code?.code ?? "", entity.personNames[0]?.family ?? display ?? "", entity.classCode ?? ""];
  const key = canonicalKey("RelatedPerson", [], content.join("|"));
  const existing = ctx.registry.referenceTo("RelatedPerson", key);
  if (existing) return existing;

  const resource: fhir4.RelatedPerson = {
    resourceType: "RelatedPerson",
    patient: subjectReference(ctx),
    ...(relationship && { relationship: [relationship] }),
    ...(entity.personNames.length > 0 && { name: entity.personNames }),
    ...(entity.telecoms.length > 0 && { telecom: entity.telecoms }),
    ...(entity.addresses.length > 0 && { address: entity.addresses }),
  };

  return ctx.registry.register(resource, key).reference;
}

/** Who supplied a statement's information: the first informant that maps */
export function informantReference(informants: readonly Informant[], ctx: MappingContext): fhir4.Reference | undefined {
  for (const informant of informants) {
    if (informant.kind === "related" && informant.entity.classCode === PATIENT_CLASS) {
      return subjectReference(ctx);
    }
    const reference =
      informant.kind === "related" ? mapRelatedPerson(informant.entity, ctx) : mapPractitioner(informant.entity, ctx);
    if (reference) return { reference };
  }
  return undefined;
}

/** RelatedPersons for the document's own informants */
export function mapHeaderInformants(informants: readonly Informant[], ctx: MappingContext): string[] {
  return informants.flatMap((informant) => {
    if (informant.kind !== "related" || informant.entity.classCode === PATIENT_CLASS) return [];
    const reference = mapRelatedPerson(informant.entity, ctx);
    return reference ? [reference] : [];
  });
}
