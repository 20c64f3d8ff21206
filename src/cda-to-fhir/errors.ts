/**
 * Document-level failures.
 *
 * Statement-level problems travel as result values; these errors are thrown
 * only when the whole document has to be rejected.
 */

export interface StructuralRejection {
  ruleId: string;
  path: string;
  message: string;
  /** Schema whose rule failed; "header" for document-level rules */
  schemaId: string;
}

export class MalformedInputError extends Error {
  constructor(
    message: string,
    public readonly line: number | undefined,
    public readonly column: number | undefined,
  ) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class StructuralRejectionError extends Error {
  constructor(public readonly rejections: StructuralRejection[]) {
    super(formatRejections(rejections));
    this.name = "StructuralRejectionError";
  }
}

export class ConversionFault extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "ConversionFault";
  }
}

export function formatRejection(rejection: StructuralRejection): string {
  return `[${rejection.ruleId}] ${rejection.message} at ${rejection.path}`;
}

function formatRejections(rejections: StructuralRejection[]): string {
  const [first, ...rest] = rejections;
  if (!first) return "Document rejected";
  const suffix = rest.length > 0 ? ` (and ${rest.length} more)` : "";
  return `${formatRejection(first)}${suffix}`;
}
