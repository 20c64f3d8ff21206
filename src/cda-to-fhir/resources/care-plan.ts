/**
 * Care Plan Document header to FHIR CarePlan
 *
 * The CarePlan gathers what the document plans: the Conditions it addresses
 * and the activities of its Plan of Treatment section.
 */

import { fixedConcept } from "../code-mapping/coding-systems";
import { convertIIToIdentifier } from "../datatypes/ii-identifier";
import {
  convertIntervalToPeriod,
  convertTSToDateTime,
  type EffectiveTime,
  type TimeContext,
} from "../datatypes/ts-datetime";
import type { DocumentHeader } from "../parser/types";
import { canonicalKey, uuidReference } from "../references/reference-registry";
import { hasTemplate, TemplateIds } from "../templates/template-ids";
import { subjectReference, timeContext } from "./common";
import type { MappedSection } from "./composition";
import type { MappingContext } from "./mapping-context";
import { mapAuthor, mapPractitioner } from "./participant-resources";

const CAREPLAN_CATEGORY_SYSTEM = "http://hl7.org/fhir/us/core/CodeSystem/careplan-category";
const PLAN_OF_TREATMENT_LOINC = "18776-5";

export function isCarePlanDocument(header: DocumentHeader): boolean {
  return hasTemplate(header.templateIds, TemplateIds.CARE_PLAN);
}

function isPlanOfTreatment(mapped: MappedSection): boolean {
  const { section } = mapped;
  return (
    hasTemplate(section.templateIds, TemplateIds.PLAN_OF_TREATMENT_SECTION) ||
    section.code?.code === PLAN_OF_TREATMENT_LOINC
  );
}

function allEntries(sections: readonly MappedSection[]): string[] {
  return sections.flatMap((mapped) => [...mapped.entries, ...allEntries(mapped.sections)]);
}

function planEntries(sections: readonly MappedSection[]): string[] {
  return sections.flatMap((mapped) =>
    isPlanOfTreatment(mapped) ? allEntries([mapped]) : planEntries(mapped.sections),
  );
}

function servicePeriod(time: EffectiveTime | undefined, ctx: TimeContext): fhir4.Period | undefined {
  if (time?.kind === "interval") return convertIntervalToPeriod(time, ctx);
  const start = time?.kind === "instant" ? convertTSToDateTime(time.raw, ctx) : undefined;
  return start ? { start } : undefined;
}

/** Header authors, then service event performers, each once */
function contributors(header: DocumentHeader, ctx: MappingContext): string[] {
  const authors = header.authors.flatMap((author) => {
    const { who } = mapAuthor(author, ctx);
    return who ? [who] : [];
  });
  const performers = header.serviceEvents.flatMap((event) =>
    event.performers.flatMap(({ assignedEntity }) => {
      const reference = mapPractitioner(assignedEntity, ctx);
      return reference ? [reference] : [];
    }),
  );
  return [...new Set([...authors, ...performers])];
}

/**
 * Field Mappings:
 * - ClinicalDocument/id                        -> identifier
 * - (fixed)                                    -> status active, intent plan, category assess-plan
 * - documentationOf/serviceEvent/effectiveTime -> period
 * - author[0]                                  -> author
 * - author[] + serviceEvent/performer[]        -> contributor
 * - Conditions mapped from the body            -> addresses
 * - Plan of Treatment section entries          -> activity.reference
 *
 * @returns reference to the CarePlan, or undefined for any other document type
 */
export function mapCarePlan(
  header: DocumentHeader,
  sections: readonly MappedSection[],
  ctx: MappingContext,
): string | undefined {
  if (!isCarePlanDocument(header)) return undefined;

  const identifier = convertIIToIdentifier(header.id);
  const [event] = header.serviceEvents;
  const period = servicePeriod(event?.effectiveTime, timeContext(ctx, event?.path ?? header.path));
  const contributor = contributors(header, ctx);
  const [author] = contributor;

  const types = new Map(
    ctx.registry.resources().map((resource): [string, string] => [uuidReference(resource.id ?? ""), resource.resourceType]),
  );
  const addresses = [...new Set(allEntries(sections))].filter((reference) => types.get(reference) === "Condition");
  const activity = [...new Set(planEntries(sections))];

  const resource: fhir4.CarePlan = {
    resourceType: "CarePlan",
    ...(identifier && { identifier: [identifier] }),
    status: "active",
    intent: "plan",
    category: [fixedConcept(CAREPLAN_CATEGORY_SYSTEM, "assess-plan")],
    subject: subjectReference(ctx),
    ...(period && { period }),
    ...(author && { author: { reference: author } }),
    ...(contributor.length > 0 && { contributor: contributor.map((reference) => ({ reference })) }),
    ...(addresses.length > 0 && { addresses: addresses.map((reference) => ({ reference })) }),
    ...(activity.length > 0 && { activity: activity.map((reference) => ({ reference: { reference } })) }),
  };

  const key = canonicalKey("CarePlan", header.id ? [header.id] : [], "document");
  return ctx.registry.register(resource, key).reference;
}
