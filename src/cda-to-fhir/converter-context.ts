/**
 * ConverterContext: everything a conversion needs from outside the document.
 *
 * Config is injected here so the converter never reads the global singleton
 * itself, and tests can supply alternative configs without env-var overrides.
 * Registry and decision log are not part of it: they are created per call.
 */

import type { CdaToFhirConfig } from "./config";
import { cdaToFhirConfig } from "./config";
import type { CodeClassificationLookup } from "./resources/mapping-context";

export interface ConverterContext {
  /** Loaded CDA-to-FHIR config */
  config: CdaToFhirConfig;

  /**
   * Optional classification of codes the templates leave unclassified
   * (observation category, allergy category). Never required.
   */
  classify?: CodeClassificationLookup;

  /** Clock for Bundle.timestamp and the Composition date fallback */
  now: () => Date;
}

/**
 * Construct a ConverterContext wired with production defaults:
 *   - config:   loaded via cdaToFhirConfig() (cached singleton)
 *   - classify: none
 *   - now:      system clock
 */
export function createConverterContext(overrides?: Partial<ConverterContext>): ConverterContext {
  return {
    config: overrides?.config ?? cdaToFhirConfig(),
    now: () => new Date(),
    ...overrides,
  };
}
