/**
 * Value validators - per-cell type checks for the closed DataType set
 * Plus the string codec used by schema front-ends (`int`, `bool`, `string`, `date(<format>)`).
 */

import { format as formatDate, isValid, parse } from "date-fns";
import type { DataType } from "../../types/schema.js";
import { SchemaParseError } from "../../utils/errors.js";

export type ValueCheck = { ok: true } | { ok: false; message: string };

const INT_PATTERN = /^[+-]?\d+$/;

// Fixed reference date so parsing never depends on the wall clock
const REFERENCE_DATE = new Date(2000, 0, 1);

const VALID: ValueCheck = { ok: true };

function invalid(message: string): ValueCheck {
  return { ok: false, message };
}

export function validateInt(raw: string): ValueCheck {
  return INT_PATTERN.test(raw)
    ? VALID
    : invalid(`Illegal value for type 'int': '${raw}'`);
}

export function validateBool(raw: string): ValueCheck {
  return raw === "true" || raw === "false"
    ? VALID
    : invalid(`Illegal value for type 'bool': '${raw}'`);
}

export function validateString(_raw: string): ValueCheck {
  return VALID;
}

/**
 * Date check against a date-fns format, e.g. `yyyy-MM-dd`
 * The cell must format back to itself, so `2020-1-5` fails `yyyy-MM-dd`.
 */
export function validateDate(format: string, raw: string): ValueCheck {
  const parsed = parse(raw, format, REFERENCE_DATE);
  return isValid(parsed) && formatDate(parsed, format) === raw
    ? VALID
    : invalid(`Illegal value for type 'date(${format})': '${raw}'`);
}

/**
 * Validator for one data type, for building pipelines once per column
 */
export function valueValidatorFor(type: DataType): (raw: string) => ValueCheck {
  switch (type.kind) {
    case "int":
      return validateInt;
    case "bool":
      return validateBool;
    case "string":
      return validateString;
    case "date": {
      const { format } = type;
      return (raw) => validateDate(format, raw);
    }
  }
}

export function validateValue(type: DataType, raw: string): ValueCheck {
  return valueValidatorFor(type)(raw);
}

export function dataTypeEquals(a: DataType, b: DataType): boolean {
  if (a.kind === "date" && b.kind === "date") {
    return a.format === b.format;
  }
  return a.kind === b.kind;
}

export function formatDataType(type: DataType): string {
  return type.kind === "date" ? `date(${type.format})` : type.kind;
}

/**
 * Parse a type string from a schema source
 *
 * @throws SchemaParseError for anything outside the closed set
 */
export function parseDataType(typeString: string): DataType {
  switch (typeString) {
    case "int":
    case "bool":
    case "string":
      return { kind: typeString };
    default:
      if (typeString.startsWith("date(") && typeString.endsWith(")")) {
        const format = typeString.slice("date(".length, -")".length);
        if (format !== "") {
          return { kind: "date", format };
        }
      }
      throw new SchemaParseError(`Couldn't match type: '${typeString}'`, {
        type: typeString,
      });
  }
}
