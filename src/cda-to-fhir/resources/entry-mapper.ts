/**
 * Section entry routing
 *
 * Every parsed statement is routed by the schema it was validated against.
 * Statements without a schema (generic CDA statements and templates the
 * converter does not know) are recorded and produce nothing.
 */

import type { ClinicalStatement, Section } from "../parser/types";
import { mapAllergyConcern } from "./allergy-intolerance";
import { mapProblemConcern } from "./condition";
import { mapResultOrganizer } from "./diagnostic-report";
import { mapNoteActivity } from "./document-reference";
import { mapEncounterActivity } from "./encounter";
import { mapImmunizationActivity } from "./immunization";
import type { MappingContext } from "./mapping-context";
import { mapMedicationActivity } from "./medication";
import { mapActivityDispenses, mapMedicationDispense } from "./medication-dispense";
import { mapObservation, mapVitalSignsOrganizer } from "./observation";
import { mapProcedureActivity } from "./procedure";

const BIRTH_SEX_SCHEMA = "birth-sex-observation";

function single(reference: string | undefined): string[] {
  return reference ? [reference] : [];
}

/**
 * Map one entry statement.
 *
 * @returns references to every resource the statement produced, primary
 *   resource first
 */
export function mapEntry(statement: ClinicalStatement, ctx: MappingContext): string[] {
  switch (statement.schemaId) {
    case "problem-concern-act":
      return statement.kind === "act" ? mapProblemConcern(statement, ctx) : [];
    case "allergy-concern-act":
      return statement.kind === "act" ? mapAllergyConcern(statement, ctx) : [];
    case "medication-activity": {
      if (statement.kind !== "substanceAdministration") return [];
      const primary = mapMedicationActivity(statement, ctx);
      return [...single(primary), ...mapActivityDispenses(statement, primary, ctx)];
    }
    case "medication-dispense":
      return statement.kind === "supply" ? single(mapMedicationDispense(statement, ctx)) : [];
    case "immunization-activity":
      return statement.kind === "substanceAdministration" ? single(mapImmunizationActivity(statement, ctx)) : [];
    case "procedure-activity-procedure":
      return statement.kind === "procedure" ? single(mapProcedureActivity(statement, ctx)) : [];
    case "encounter-activity":
      return statement.kind === "encounter" ? [mapEncounterActivity(statement, ctx)] : [];
    case "vital-signs-organizer":
      return statement.kind === "organizer" ? mapVitalSignsOrganizer(statement, ctx) : [];
    case "vital-sign-observation":
      return statement.kind === "observation" ? single(mapObservation(statement, "vital-signs", ctx)) : [];
    case "result-organizer":
      return statement.kind === "organizer" ? mapResultOrganizer(statement, ctx) : [];
    case "result-observation":
      return statement.kind === "observation" ? single(mapObservation(statement, "laboratory", ctx)) : [];
    case "social-history-observation":
    case "smoking-status-observation":
      return statement.kind === "observation" ? single(mapObservation(statement, "social-history", ctx)) : [];
    case "note-activity":
      return statement.kind === "act" ? single(mapNoteActivity(statement, ctx)) : [];
    case BIRTH_SEX_SCHEMA:
      // Carried on the Patient
      return [];
    default:
      ctx.log.unknownConstruct(
        "unmapped-statement",
        `No mapping for ${statement.kind}${statement.schemaId ? ` (${statement.schemaId})` : ""}`,
        statement.path,
      );
      return [];
  }
}

/**
 * Code of the first Birth Sex Observation in the body, searched depth-first.
 * A null-flavored value yields its null flavor (e.g. "UNK").
 */
export function findBirthSex(sections: readonly Section[]): string | undefined {
  for (const section of sections) {
    for (const entry of section.entries) {
      const statement = entry.statement;
      if (statement?.schemaId !== BIRTH_SEX_SCHEMA || statement.kind !== "observation") continue;
      const value = statement.values[0];
      if (value?.kind === "coded" && value.code) return value.code;
      if (value?.kind === "absent") return value.nullFlavor;
    }
    const nested = findBirthSex(section.sections);
    if (nested) return nested;
  }
  return undefined;
}
