/**
 * Error types raised while mapping and reconciling congress records.
 *
 * - MalformedDocumentError aborts the whole run
 * - MappingError subclasses abort a single document
 * - ReferenceNotFoundError and DuplicateTermError are handled by callers
 */

export class CongressIngestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedDocumentError extends CongressIngestError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Malformed XML in ${path}: ${reason}`);
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Base class for failures that make one document unusable.
 */
export class MappingError extends CongressIngestError {}

export class MissingRequiredAttributeError extends MappingError {
  readonly attribute: string;
  readonly element: string;

  constructor(attribute: string, element: string) {
    super(`Missing required attribute "${attribute}" on ${element}`);
    this.attribute = attribute;
    this.element = element;
  }
}

export class MissingRequiredElementError extends MappingError {
  readonly element: string;

  constructor(element: string) {
    super(`Missing required element ${element}`);
    this.element = element;
  }
}

export class InvalidAttributeValueError extends MappingError {
  readonly attribute: string;
  readonly value: string;

  constructor(attribute: string, value: string, detail?: string) {
    super(
      `Invalid value "${value}" for ${attribute}${detail ? ` (${detail})` : ""}`
    );
    this.attribute = attribute;
    this.value = value;
  }
}

export type ReferenceKind = "person" | "term" | "committee" | "bill";

export class ReferenceNotFoundError extends CongressIngestError {
  readonly kind: ReferenceKind;
  readonly key: string;

  constructor(kind: ReferenceKind, key: string) {
    super(`Could not find ${kind} ${key}`);
    this.kind = kind;
    this.key = key;
  }
}

export class DuplicateTermError extends CongressIngestError {
  readonly termType: string;
  readonly termName: string;

  constructor(termType: string, termName: string) {
    super(`Duplicated term ${termName} (${termType})`);
    this.termType = termType;
    this.termName = termName;
  }
}
