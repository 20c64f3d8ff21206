/**
 * Note Activity to FHIR DocumentReference
 */

import { convertEDToAttachment } from "../datatypes/ed-attachment";
import { convertEffectiveTime, convertTSToInstant, effectiveStart } from "../datatypes/ts-datetime";
import type { ActStatement } from "../parser/types";
import { latestAuthorTime, registerResource, statementIdentity, subjectReference, timeContext, toConcept } from "./common";
import type { MappingContext } from "./mapping-context";
import { authorReferences } from "./participant-resources";

/**
 * Field Mappings:
 * - id[]                 -> identifier
 * - code                 -> type
 * - effectiveTime        -> date (instant precision only), context.period
 * - author               -> author
 * - text (ED)            -> content[0].attachment
 *
 * A note whose text neither carries content nor resolves through the
 * narrative is skipped.
 */
export function mapNoteActivity(note: ActStatement, ctx: MappingContext): string | undefined {
  const attachment = convertEDToAttachment(note.encapsulatedText, {
    log: ctx.log,
    ...(ctx.section && { narrativeIndex: ctx.section.narrativeIndex }),
    path: note.path,
  });
  if (!attachment) {
    ctx.log.missingRequiredData("DocumentReference", "Note activity has no text content", note.path);
    return undefined;
  }

  const identity = statementIdentity("DocumentReference", note, ctx);
  const type = toConcept(note.code, ctx, note.path);
  const date = convertTSToInstant(effectiveStart(note.effectiveTime) ?? latestAuthorTime(note.authors));
  const time = convertEffectiveTime(note.effectiveTime, timeContext(ctx, note.path));
  const period = time.period ?? (time.dateTime ? { start: time.dateTime } : undefined);
  const author = authorReferences(note.authors, ctx);

  const resource: fhir4.DocumentReference = {
    resourceType: "DocumentReference",
    ...(identity.identifier.length > 0 && { identifier: identity.identifier }),
    status: "current",
    ...(type && { type }),
    subject: subjectReference(ctx),
    ...(date && { date }),
    ...(author.length > 0 && { author }),
    content: [{ attachment }],
    ...(period && { context: { period } }),
  };

  return registerResource(resource, identity.key, note.authors, ctx);
}
