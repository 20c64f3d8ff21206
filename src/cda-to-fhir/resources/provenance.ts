/**
 * Statement authorship to FHIR Provenance
 */

import { convertTSToInstant } from "../datatypes/ts-datetime";
import { fixedConcept } from "../code-mapping/coding-systems";
import { nameBasedUuid } from "../references/reference-registry";
import { latestAuthorTime } from "./common";
import type { AuthoredResource, MappingContext } from "./mapping-context";
import { mapAuthor } from "./participant-resources";

const PROVENANCE_PARTICIPANT_TYPE_SYSTEM = "http://terminology.hl7.org/CodeSystem/provenance-participant-type";

/**
 * Field Mappings:
 * - (mapped resource)        -> target
 * - author/time (latest)     -> recorded (else document effectiveTime)
 * - assignedAuthor           -> agent.who (Practitioner or Device)
 * - representedOrganization  -> agent.onBehalfOf
 *
 * recorded must be an instant; when neither the author time nor the document
 * time is that precise, no Provenance is produced.
 */
function mapProvenance(authored: AuthoredResource, ctx: MappingContext): fhir4.Provenance | undefined {
  const agent: fhir4.ProvenanceAgent[] = authored.authors.flatMap((author) => {
    const { who, onBehalfOf } = mapAuthor(author, ctx);
    if (!who) return [];
    return [
      {
        type: fixedConcept(PROVENANCE_PARTICIPANT_TYPE_SYSTEM, "author"),
        who: { reference: who },
        ...(onBehalfOf && { onBehalfOf: { reference: onBehalfOf } }),
      },
    ];
  });
  if (agent.length === 0) return undefined;

  const recorded = convertTSToInstant(latestAuthorTime(authored.authors)) ?? convertTSToInstant(ctx.document.time);
  if (!recorded) {
    ctx.log.missingRequiredData("Provenance", `No instant-precision time to record authorship of ${authored.target}`);
    return undefined;
  }

  return {
    resourceType: "Provenance",
    id: nameBasedUuid(`Provenance|${authored.target}`),
    target: [{ reference: authored.target }],
    recorded,
    agent,
  };
}

/** One Provenance per resource whose source statement carried authors, in mapping order */
export function mapProvenances(ctx: MappingContext): fhir4.Provenance[] {
  return ctx.authored.flatMap((authored) => {
    const provenance = mapProvenance(authored, ctx);
    return provenance ? [provenance] : [];
  });
}
