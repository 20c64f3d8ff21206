/**
 * CDA ED (encapsulated data) to FHIR Attachment
 *
 * - TXT content -> base64-encoded data, contentType defaulting to text/plain
 * - B64 content -> data as-is
 * - #reference  -> plain text of the referenced narrative node, encoded
 */

import type { DecisionLog } from "../decision-log";
import { resolveTextReference, type NarrativeIndex } from "../parser/narrative";
import type { EncapsulatedValue } from "./values";

export interface AttachmentContext {
  log: DecisionLog;
  narrativeIndex?: NarrativeIndex;
  path?: string;
}

function toBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

export function convertEDToAttachment(
  ed: EncapsulatedValue | undefined,
  ctx: AttachmentContext,
): fhir4.Attachment | undefined {
  if (!ed) return undefined;

  if (ed.content) {
    const isBase64 = ed.representation === "B64";
    return {
      contentType: ed.mediaType ?? "text/plain",
      data: isBase64 ? ed.content.replace(/\s+/g, "") : toBase64(ed.content),
    };
  }

  if (ed.reference?.startsWith("#")) {
    const resolved = resolveTextReference(ed.reference, ctx.narrativeIndex);
    if (resolved.notFound !== undefined) {
      ctx.log.unknownConstruct(
        "reference-not-found",
        `Narrative reference "#${resolved.notFound}" not found`,
        ctx.path,
      );
      return undefined;
    }
    return { contentType: "text/plain", data: toBase64(resolved.text) };
  }

  if (ed.reference) {
    return { ...(ed.mediaType && { contentType: ed.mediaType }), url: ed.reference };
  }

  return undefined;
}
