/**
 * Parsed C-CDA document model
 *
 * Produced once per document by parseDocument() and read-only afterwards.
 * Nothing here points back into the XML tree: narrative references resolve
 * through a NarrativeIndex, and every value is already decoded.
 */

import type { StructuralRejection } from "../errors";
import type { EffectiveTime } from "../datatypes/ts-datetime";
import type {
  AbsentValue,
  CodedValue,
  EncapsulatedValue,
  InstanceIdentifier,
  OriginalText,
  QuantityIntervalValue,
  QuantityValue,
  Value,
} from "../datatypes/values";
import type { TemplateId } from "../templates/template-ids";
import type { NarrativeBlock, NarrativeIndex } from "./narrative";

// ============================================================================
// Participations
// ============================================================================

export interface OrganizationInfo {
  path: string;
  ids: InstanceIdentifier[];
  names: string[];
  telecoms: fhir4.ContactPoint[];
  addresses: fhir4.Address[];
}

export interface DeviceInfo {
  manufacturerModelName?: string;
  softwareName?: string;
}

/** assignedAuthor / assignedEntity */
export interface AssignedEntity {
  path: string;
  ids: InstanceIdentifier[];
  code?: CodedValue;
  addresses: fhir4.Address[];
  telecoms: fhir4.ContactPoint[];
  /** assignedPerson names */
  personNames: fhir4.HumanName[];
  /** Set when the author is software rather than a person */
  device?: DeviceInfo;
  organization?: OrganizationInfo;
}

export interface Author {
  /** Raw TS value of author/time */
  time?: string;
  assignedAuthor: AssignedEntity;
}

export interface Performer {
  typeCode?: string;
  functionCode?: CodedValue;
  assignedEntity: AssignedEntity;
}

export interface PlayingEntity {
  code?: CodedValue | AbsentValue;
  names: string[];
}

export interface PlayingDevice {
  code?: CodedValue;
  manufacturerModelName?: string;
}

export interface ParticipantRole {
  classCode?: string;
  ids: InstanceIdentifier[];
  code?: CodedValue;
  addresses: fhir4.Address[];
  telecoms: fhir4.ContactPoint[];
  playingEntity?: PlayingEntity;
  playingDevice?: PlayingDevice;
  scopingOrganization?: OrganizationInfo;
}

export interface Participant {
  typeCode?: string;
  functionCode?: CodedValue;
  role: ParticipantRole;
}

/** informant/relatedEntity: a family member, caregiver or the patient */
export interface RelatedEntity {
  path: string;
  /** Role class, e.g. PRS (personal relationship) or PAT (the patient) */
  classCode?: string;
  /** Relationship, usually from v3 RoleCode */
  code?: CodedValue;
  addresses: fhir4.Address[];
  telecoms: fhir4.ContactPoint[];
  personNames: fhir4.HumanName[];
}

export type Informant =
  | { kind: "assigned"; entity: AssignedEntity }
  | { kind: "related"; entity: RelatedEntity };

// ============================================================================
// Clinical Statements
// ============================================================================

export interface EntryRelationship {
  typeCode?: string;
  inversionInd: boolean;
  statement: ClinicalStatement;
}

interface StatementBase {
  path: string;
  /** Registered schema the statement was validated against; undefined for generic statements */
  schemaId?: string;
  classCode?: string;
  moodCode?: string;
  negated: boolean;
  ids: InstanceIdentifier[];
  templateIds: TemplateId[];
  code?: CodedValue | AbsentValue;
  text?: OriginalText;
  statusCode?: string;
  effectiveTime?: EffectiveTime;
  /** effectiveTime elements after the first (e.g. a medication's PIVL_TS schedule) */
  effectiveTimes: EffectiveTime[];
  entryRelationships: EntryRelationship[];
  participants: Participant[];
  authors: Author[];
  performers: Performer[];
  informants: Informant[];
}

export interface ReferenceRange {
  value?: Value;
  text?: OriginalText;
}

export interface ActStatement extends StatementBase {
  kind: "act";
  /** text read as ED: inline content with its media type, or a narrative reference */
  encapsulatedText?: EncapsulatedValue;
}

export interface ObservationStatement extends StatementBase {
  kind: "observation";
  values: Value[];
  interpretationCodes: CodedValue[];
  referenceRanges: ReferenceRange[];
  targetSiteCodes: CodedValue[];
  methodCode?: CodedValue;
}

export interface EncounterStatement extends StatementBase {
  kind: "encounter";
}

export interface ProcedureStatement extends StatementBase {
  kind: "procedure";
  targetSiteCodes: CodedValue[];
  methodCode?: CodedValue;
}

/** consumable/manufacturedProduct or product/manufacturedProduct */
export interface ManufacturedProduct {
  path: string;
  schemaId?: string;
  templateIds: TemplateId[];
  ids: InstanceIdentifier[];
  code?: CodedValue | AbsentValue;
  name?: string;
  lotNumber?: string;
  manufacturer?: OrganizationInfo;
}

export interface SubstanceAdministrationStatement extends StatementBase {
  kind: "substanceAdministration";
  doseQuantity?: QuantityValue | QuantityIntervalValue;
  routeCode?: CodedValue;
  approachSiteCodes: CodedValue[];
  repeatNumber?: number;
  product?: ManufacturedProduct;
}

export interface OrganizerStatement extends StatementBase {
  kind: "organizer";
  components: ClinicalStatement[];
}

export interface SupplyStatement extends StatementBase {
  kind: "supply";
  quantity?: QuantityValue;
  repeatNumber?: number;
  product?: ManufacturedProduct;
}

export type ClinicalStatement =
  | ActStatement
  | ObservationStatement
  | EncounterStatement
  | ProcedureStatement
  | SubstanceAdministrationStatement
  | OrganizerStatement
  | SupplyStatement;

export type StatementKind = ClinicalStatement["kind"];

/** Outcome of parsing one statement element */
export type ParsedEntry =
  | { statement: ClinicalStatement; rejections?: never }
  | { statement?: never; rejections: StructuralRejection[] };

// ============================================================================
// Document
// ============================================================================

export interface LanguageCommunication {
  language: string;
  preferred?: boolean;
}

export interface PatientInfo {
  path: string;
  ids: InstanceIdentifier[];
  names: fhir4.HumanName[];
  addresses: fhir4.Address[];
  telecoms: fhir4.ContactPoint[];
  gender?: CodedValue | AbsentValue;
  birthTime?: string;
  deceased?: boolean;
  deceasedTime?: string;
  maritalStatus?: CodedValue;
  /** raceCode followed by sdtc:raceCode */
  race: CodedValue[];
  /** ethnicGroupCode followed by sdtc:ethnicGroupCode */
  ethnicity: CodedValue[];
  languages: LanguageCommunication[];
  providerOrganization?: OrganizationInfo;
}

export interface LegalAuthenticator {
  time?: string;
  assignedEntity: AssignedEntity;
}

export interface EncompassingEncounter {
  path: string;
  ids: InstanceIdentifier[];
  code?: CodedValue;
  effectiveTime?: EffectiveTime;
  dischargeDisposition?: CodedValue;
  responsibleParty?: AssignedEntity;
  encounterParticipants: Performer[];
  location?: {
    name?: string;
    code?: CodedValue;
    address?: fhir4.Address;
  };
}

/** documentationOf/serviceEvent: the care the document summarizes */
export interface ServiceEvent {
  path: string;
  code?: CodedValue;
  effectiveTime?: EffectiveTime;
  performers: Performer[];
}

export interface DocumentHeader {
  path: string;
  templateIds: TemplateId[];
  id?: InstanceIdentifier;
  setId?: InstanceIdentifier;
  versionNumber?: number;
  code?: CodedValue;
  title?: string;
  /** Raw TS value of ClinicalDocument/effectiveTime */
  effectiveTime?: string;
  confidentialityCode?: string;
  languageCode?: string;
  recordTargets: PatientInfo[];
  authors: Author[];
  informants: Informant[];
  custodian?: OrganizationInfo;
  legalAuthenticator?: LegalAuthenticator;
  serviceEvents: ServiceEvent[];
  encompassingEncounter?: EncompassingEncounter;
}

export interface Section {
  path: string;
  templateIds: TemplateId[];
  code?: CodedValue;
  title?: string;
  /** Section-level nullFlavor, e.g. NI for "no information" */
  nullFlavor?: string;
  narrative?: NarrativeBlock;
  narrativeIndex: NarrativeIndex;
  entries: ParsedEntry[];
  sections: Section[];
}

export interface ParsedDocument {
  header: DocumentHeader;
  sections: Section[];
  /** Every ID-tagged narrative node in the document; first occurrence wins */
  narrativeIndex: NarrativeIndex;
  /** Every statement-level rejection, nested ones included, in document order */
  rejections: StructuralRejection[];
}
