export {
  convertCdaDocument,
  convertDocumentTree,
  type ConversionResult,
  type RejectionReason,
} from "./cda-to-fhir/converter";
export { createConverterContext, type ConverterContext } from "./cda-to-fhir/converter-context";
export {
  cdaToFhirConfig,
  clearConfigCache,
  parseConfig,
  type CdaToFhirConfig,
  type StatementRejectionPolicy,
} from "./cda-to-fhir/config";
export { normalizeXml, type NormalizeOptions } from "./cda-to-fhir/xml-normalizer";
export { DecisionLog, type ConversionDecision, type DecisionCategory } from "./cda-to-fhir/decision-log";
export {
  ConversionFault,
  MalformedInputError,
  StructuralRejectionError,
  type StructuralRejection,
} from "./cda-to-fhir/errors";
export type {
  AllergyCategory,
  CodeClassification,
  CodeClassificationLookup,
} from "./cda-to-fhir/resources/mapping-context";
export type { CdaElement, CdaNode, CdaText } from "./cda/element";
