/**
 * C-CDA markup builders for tests. Each builder returns a conformant fragment
 * by default; options replace the parts a test is about.
 */

const LOINC = "2.16.840.1.113883.6.1";
const SNOMED = "2.16.840.1.113883.6.96";

export const AUTHOR_NPI = "1234567890";

export function author(time = "20200301120000-0500", npi = AUTHOR_NPI): string {
  return `<author>
    <templateId root="2.16.840.1.113883.10.20.22.4.119"/>
    <time value="${time}"/>
    <assignedAuthor>
      <id root="2.16.840.1.113883.4.6" extension="${npi}"/>
      <assignedPerson><name><given>Henry</given><family>Seven</family></name></assignedPerson>
      <representedOrganization>
        <id root="2.16.840.1.113883.19.5"/>
        <name>Good Health Clinic</name>
      </representedOrganization>
    </assignedAuthor>
  </author>`;
}

function effectiveTime(low: string | undefined, high: string | undefined): string {
  return `<effectiveTime>${low ? `<low value="${low}"/>` : ""}${high ? `<high value="${high}"/>` : ""}</effectiveTime>`;
}

// ============================================================================
// Problems
// ============================================================================

export interface ProblemObservationOptions {
  id?: string;
  value?: string;
  low?: string;
  high?: string;
  negated?: boolean;
  status?: string;
  extra?: string;
}

export function problemObservation(options: ProblemObservationOptions = {}): string {
  const {
    id = "ab1791b0-5c71-11db-b0de-0800200c9a66",
    value = `<value xsi:type="CD" code="233604007" codeSystem="${SNOMED}" displayName="Pneumonia"/>`,
    low = "20200101",
    high,
    negated = false,
    status,
    extra = "",
  } = options;
  const problemStatus = status
    ? `<entryRelationship typeCode="REFR">
        <observation classCode="OBS" moodCode="EVN">
          <templateId root="2.16.840.1.113883.10.20.22.4.6"/>
          <code code="33999-4" codeSystem="${LOINC}"/>
          <value xsi:type="CD" code="${status}" codeSystem="${SNOMED}"/>
        </observation>
      </entryRelationship>`
    : "";
  return `<observation classCode="OBS" moodCode="EVN"${negated ? ' negationInd="true"' : ""}>
    <templateId root="2.16.840.1.113883.10.20.22.4.4" extension="2015-08-01"/>
    <id root="${id}"/>
    <code code="55607006" codeSystem="${SNOMED}" displayName="Problem"/>
    <statusCode code="completed"/>
    ${effectiveTime(low, high)}
    ${value}
    ${problemStatus}
    ${extra}
  </observation>`;
}

export interface ConcernActOptions {
  statusCode?: string;
  low?: string;
  high?: string;
  observations?: string[];
  authors?: string;
}

export function problemConcernAct(options: ConcernActOptions = {}): string {
  const { statusCode = "active", low = "20200101", high, observations = [problemObservation()], authors = "" } = options;
  return `<act classCode="ACT" moodCode="EVN">
    <templateId root="2.16.840.1.113883.10.20.22.4.3" extension="2015-08-01"/>
    <id root="102ca2a0-8e22-4c5e-9d36-7e0a3b1f0b11"/>
    <code code="CONC" codeSystem="2.16.840.1.113883.5.6"/>
    <statusCode code="${statusCode}"/>
    ${effectiveTime(low, high)}
    ${authors}
    ${observations.map((observation) => `<entryRelationship typeCode="SUBJ">${observation}</entryRelationship>`).join("")}
  </act>`;
}

// ============================================================================
// Allergies
// ============================================================================

export interface AllergyObservationOptions {
  id?: string;
  valueCode?: string;
  /** Replaces the whole value element; valueCode is then ignored */
  value?: string;
  substance?: string;
  high?: string;
  reaction?: boolean;
  extra?: string;
}

export const PENICILLIN = `<code code="7980" codeSystem="2.16.840.1.113883.6.88" displayName="Penicillin G"/>`;

export function allergyObservation(options: AllergyObservationOptions = {}): string {
  const {
    id = "4adc1020-7b14-11db-9fe1-0800200c9a66",
    valueCode = "416098002",
    value = `<value xsi:type="CD" code="${valueCode}" codeSystem="${SNOMED}"/>`,
    substance = PENICILLIN,
    high,
    reaction = false,
    extra = "",
  } = options;
  const reactionMarkup = reaction
    ? `<entryRelationship typeCode="MFST" inversionInd="true">
        <observation classCode="OBS" moodCode="EVN">
          <templateId root="2.16.840.1.113883.10.20.22.4.9" extension="2014-06-09"/>
          <id root="4adc1020-7b14-11db-9fe1-0800200c9a64"/>
          <code code="ASSERTION" codeSystem="2.16.840.1.113883.5.4"/>
          <statusCode code="completed"/>
          <effectiveTime><low value="20200105"/></effectiveTime>
          <value xsi:type="CD" code="247472004" codeSystem="${SNOMED}" displayName="Hives"/>
          <entryRelationship typeCode="SUBJ" inversionInd="true">
            <observation classCode="OBS" moodCode="EVN">
              <templateId root="2.16.840.1.113883.10.20.22.4.8" extension="2014-06-09"/>
              <code code="SEV" codeSystem="2.16.840.1.113883.5.4"/>
              <value xsi:type="CD" code="6736007" codeSystem="${SNOMED}" displayName="Moderate"/>
            </observation>
          </entryRelationship>
        </observation>
      </entryRelationship>`
    : "";
  return `<observation classCode="OBS" moodCode="EVN">
    <templateId root="2.16.840.1.113883.10.20.22.4.7" extension="2014-06-09"/>
    <id root="${id}"/>
    <code code="ASSERTION" codeSystem="2.16.840.1.113883.5.4"/>
    <statusCode code="completed"/>
    ${effectiveTime("20200105", high)}
    ${value}
    <participant typeCode="CSM">
      <participantRole classCode="MANU">
        <playingEntity classCode="MMAT">${substance}</playingEntity>
      </participantRole>
    </participant>
    ${reactionMarkup}
    ${extra}
  </observation>`;
}

export function allergyConcernAct(options: ConcernActOptions = {}): string {
  const { statusCode = "active", low = "20200105", high, observations = [allergyObservation()], authors = "" } = options;
  return `<act classCode="ACT" moodCode="EVN">
    <templateId root="2.16.840.1.113883.10.20.22.4.30" extension="2015-08-01"/>
    <id root="36e3e930-7b14-11db-9fe1-0800200c9a66"/>
    <code code="CONC" codeSystem="2.16.840.1.113883.5.6"/>
    <statusCode code="${statusCode}"/>
    ${effectiveTime(low, high)}
    ${authors}
    ${observations.map((observation) => `<entryRelationship typeCode="SUBJ">${observation}</entryRelationship>`).join("")}
  </act>`;
}

// ============================================================================
// Vital Signs
// ============================================================================

export interface VitalSignOptions {
  id?: string;
  code?: string;
  display?: string;
  value?: string;
}

export function vitalSignObservation(options: VitalSignOptions = {}): string {
  const {
    id = "c6f88321-67ad-11db-bd13-0800200c9a66",
    code = "8302-2",
    display = "Height",
    value = '<value xsi:type="PQ" value="177" unit="cm"/>',
  } = options;
  return `<observation classCode="OBS" moodCode="EVN">
    <templateId root="2.16.840.1.113883.10.20.22.4.27" extension="2014-06-09"/>
    <id root="${id}"/>
    <code code="${code}" codeSystem="${LOINC}" displayName="${display}"/>
    <statusCode code="completed"/>
    <effectiveTime value="20200110103000-0500"/>
    ${value}
  </observation>`;
}

export function vitalSignsOrganizer(components: string[] = [vitalSignObservation()]): string {
  return `<organizer classCode="CLUSTER" moodCode="EVN">
    <templateId root="2.16.840.1.113883.10.20.22.4.26" extension="2015-08-01"/>
    <id root="c6f88320-67ad-11db-bd13-0800200c9a66"/>
    <code code="46680005" codeSystem="${SNOMED}" displayName="Vital signs"/>
    <statusCode code="completed"/>
    <effectiveTime value="20200110103000-0500"/>
    ${components.map((component) => `<component>${component}</component>`).join("")}
  </organizer>`;
}

// ============================================================================
// Documents
// ============================================================================

export interface SectionOptions {
  templateRoot: string;
  code: string;
  title: string;
  text?: string;
  entries?: string[];
  nullFlavor?: string;
}

export function section(options: SectionOptions): string {
  const { templateRoot, code, title, text, entries = [], nullFlavor } = options;
  return `<component>
    <section${nullFlavor ? ` nullFlavor="${nullFlavor}"` : ""}>
      <templateId root="${templateRoot}" extension="2015-08-01"/>
      <code code="${code}" codeSystem="${LOINC}"/>
      <title>${title}</title>
      ${text === undefined ? "" : `<text>${text}</text>`}
      ${entries.map((entry) => `<entry>${entry}</entry>`).join("")}
    </section>
  </component>`;
}

export interface DocumentOptions {
  sections?: string[];
  header?: string;
  patientId?: string;
  /** Extra markup inside recordTarget/patientRole/patient */
  patient?: string;
  /** Header author markup; an empty string leaves the author out */
  authors?: string;
}

export function clinicalDocument(options: DocumentOptions = {}): string {
  const { sections = [], header = "", patientId = "998991", patient = "", authors = author() } = options;
  return `<?xml version="1.0" encoding="UTF-8"?>
<ClinicalDocument xmlns="urn:hl7-org:v3" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns:sdtc="urn:hl7-org:sdtc">
  <realmCode code="US"/>
  <templateId root="2.16.840.1.113883.10.20.22.1.1" extension="2015-08-01"/>
  <templateId root="2.16.840.1.113883.10.20.22.1.2" extension="2015-08-01"/>
  <id root="2.16.840.1.113883.19.5.99999.1" extension="TT988"/>
  <code code="34133-9" codeSystem="${LOINC}" displayName="Summarization of Episode Note"/>
  <title>Continuity of Care Document</title>
  <effectiveTime value="20200301120000-0500"/>
  <confidentialityCode code="N" codeSystem="2.16.840.1.113883.5.25"/>
  <languageCode code="en-US"/>
  <recordTarget>
    <patientRole>
      <id root="2.16.840.1.113883.19.5.99999.2" extension="${patientId}"/>
      <addr use="HP"><streetAddressLine>1357 Amber Drive</streetAddressLine><city>Beaverton</city><state>OR</state><postalCode>97867</postalCode></addr>
      <telecom use="HP" value="tel:+1(555)555-2003"/>
      <patient>
        <name use="L"><given>Eve</given><family>Everywoman</family></name>
        <administrativeGenderCode code="F" codeSystem="2.16.840.1.113883.5.1"/>
        <birthTime value="19750501"/>
        ${patient}
      </patient>
    </patientRole>
  </recordTarget>
  ${authors}
  <custodian>
    <assignedCustodian>
      <representedCustodianOrganization>
        <id root="2.16.840.1.113883.19.5"/>
        <name>Good Health Clinic</name>
      </representedCustodianOrganization>
    </assignedCustodian>
  </custodian>
  ${header}
  <component>
    <structuredBody>
      ${sections.join("\n")}
    </structuredBody>
  </component>
</ClinicalDocument>`;
}
