/**
 * Declarative XML attribute → field mapping.
 *
 * A schema lists, per attribute, the target field, whether the attribute is
 * required, and a typed coercion. Coercions are bound when the schema is
 * built, so mapping a record is a straight walk over the rules.
 *
 * Entity mappers subclass AttributeMapper and override process() to layer
 * element-specific extraction on top of the generic attribute pass.
 */

import {
  InvalidAttributeValueError,
  MissingRequiredAttributeError,
} from "./errors";
import { attr, describeElement, type XmlElement } from "./xml";

export type Coercion<V> = (value: string, attribute: string) => V;

type AttributeRule<T> = {
  attribute: string;
  field: keyof T & string;
  required: boolean;
  assign: (target: T, raw: string) => void;
};

export class AttributeSchema<T> {
  readonly rules: readonly AttributeRule<T>[];

  private constructor(rules: readonly AttributeRule<T>[]) {
    this.rules = rules;
  }

  static for<T>(): AttributeSchema<T> {
    return new AttributeSchema<T>([]);
  }

  required<K extends keyof T & string>(
    attribute: string,
    field: K,
    coerce: Coercion<T[K]>
  ): AttributeSchema<T> {
    return this.with(attribute, field, coerce, true);
  }

  optional<K extends keyof T & string>(
    attribute: string,
    field: K,
    coerce: Coercion<T[K]>
  ): AttributeSchema<T> {
    return this.with(attribute, field, coerce, false);
  }

  private with<K extends keyof T & string>(
    attribute: string,
    field: K,
    coerce: Coercion<T[K]>,
    required: boolean
  ): AttributeSchema<T> {
    const rule: AttributeRule<T> = {
      attribute,
      field,
      required,
      assign: (target, raw) => {
        target[field] = coerce(raw, attribute);
      },
    };
    return new AttributeSchema<T>([...this.rules, rule]);
  }
}

// Coercions

export const asTrimmedString: Coercion<string> = (value) => value.trim();

const INTEGER_REGEX = /^[+-]?\d+$/;

export const asInteger: Coercion<number> = (value, attribute) => {
  const trimmed = value.trim();
  if (!INTEGER_REGEX.test(trimmed)) {
    throw new InvalidAttributeValueError(attribute, value, "expected integer");
  }
  return Number.parseInt(trimmed, 10);
};

/**
 * Coercion through a code table lookup (e.g. billTypeByXmlCode).
 */
export function asCode<V>(
  lookup: (code: string) => V | undefined,
  label: string
): Coercion<V> {
  return (value, attribute) => {
    const resolved = lookup(value);
    if (resolved === undefined) {
      throw new InvalidAttributeValueError(attribute, value, `unknown ${label}`);
    }
    return resolved;
  };
}

export class AttributeMapper<T> {
  protected readonly schema: AttributeSchema<T>;

  constructor(schema: AttributeSchema<T>) {
    this.schema = schema;
  }

  /**
   * Copy the schema's attributes from element onto target.
   *
   * A required attribute that is absent or blank raises
   * MissingRequiredAttributeError for the first such attribute in schema
   * order. Optional attributes that are absent leave the target untouched.
   */
  process(target: T, element: XmlElement): T {
    for (const rule of this.schema.rules) {
      const raw = attr(element, rule.attribute);
      if (raw === undefined || (rule.required && raw.trim() === "")) {
        if (rule.required) {
          throw new MissingRequiredAttributeError(
            rule.attribute,
            describeElement(element)
          );
        }
        continue;
      }
      rule.assign(target, raw);
    }
    return target;
  }

  describe(element: XmlElement): string {
    return describeElement(element);
  }
}
