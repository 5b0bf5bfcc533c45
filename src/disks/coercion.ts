import lodash from "lodash";
import type { CoercedValue, DiskAttributes, ValueType } from "../models.js";

const { mapKeys, mapValues } = lodash;

export const DEFAULT_VALUE_TYPE: ValueType = "str";

/**
 * First run of decimal digits in `raw`, or "0" when there is none.
 */
export function extractNumber(raw: string): string {
  const match = /\d+/.exec(raw);
  return match ? match[0] : "0";
}

/**
 * Convert a raw attribute value to its declared type. Numeric types read the
 * first digit run only, so "More than 1000 days" is 1000 and "38.5 C" is 38.
 * A value without digits becomes 0, which is indistinguishable from a reported
 * zero.
 */
export function coerceValue(raw: string, valueType: ValueType): CoercedValue {
  switch (valueType) {
    case "int":
      return parseInt(extractNumber(raw), 10);
    case "float":
      return parseFloat(extractNumber(raw));
    case "str":
      return raw;
  }
}

/**
 * Lowercase every attribute name and coerce each value with the type declared
 * for that name. Attributes without a declared type stay strings.
 */
export function coerceAttributes(
  attributes: DiskAttributes,
  valueTypes: Readonly<Partial<Record<string, ValueType>>>,
): Record<string, CoercedValue> {
  const lowered = mapKeys(attributes, (_value, key) => key.toLowerCase());
  return mapValues(lowered, (value, key) => {
    const declared = Object.hasOwn(valueTypes, key) ? valueTypes[key] : undefined;
    return coerceValue(value, declared ?? DEFAULT_VALUE_TYPE);
  });
}
