import { isValid, parseISO } from "date-fns";
import { InvalidAttributeValueError } from "../errors";

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse a bill XML datetime attribute ("2009-01-06" or
 * "2009-01-06T10:00:00-05:00").
 *
 * @param attribute - Attribute name, reported when the value is rejected
 */
export function parseXmlDateTime(value: string, attribute: string): Date {
  const trimmed = value.trim();
  if (!ISO_DATE_REGEX.test(trimmed)) {
    throw new InvalidAttributeValueError(attribute, value, "expected ISO date");
  }
  const parsed = parseISO(trimmed);
  if (!isValid(parsed)) {
    throw new InvalidAttributeValueError(attribute, value, "invalid date");
  }
  return parsed;
}

/**
 * Same as parseXmlDateTime, but absent or blank values yield null.
 */
export function parseOptionalXmlDateTime(
  value: string | undefined,
  attribute: string
): Date | null {
  if (value === undefined || value.trim() === "") {
    return null;
  }
  return parseXmlDateTime(value, attribute);
}

export function sameInstant(a: Date | null, b: Date | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.getTime() === b.getTime();
}
