import type { TypedValueField, VariableMap } from "../contracts.js";
import { ValueMapperError, errorMessage } from "../errors.js";
import { isRecord } from "../util/guards.js";

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const JSON_DATA_FORMAT = "application/json";

/**
 * A variable value together with its engine type. Decoded variables are handed to
 * handlers as TypedValue; handlers may also pass TypedValue in when a plain JS value
 * would map to the wrong engine type (e.g. a small number that must be a Long).
 */
export class TypedValue {
  constructor(
    readonly type: string,
    readonly value: unknown,
    readonly valueInfo: Record<string, unknown> = {}
  ) {}
}

export type VariableInput = Record<string, unknown>;

function parseJson(name: string, raw: unknown): unknown {
  if (typeof raw !== "string") return raw;
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ValueMapperError(`variable_not_json:${name}`, { cause: err });
  }
}

function parseEngineDate(name: string, raw: unknown): Date | null {
  if (raw === null) return null;
  if (typeof raw !== "string") throw new ValueMapperError(`variable_not_date:${name}`);
  // engine offsets come as +0200; Date.parse only takes +02:00
  const parsed = new Date(raw.replace(/([+-]\d{2})(\d{2})$/, "$1:$2"));
  if (Number.isNaN(parsed.getTime())) throw new ValueMapperError(`variable_not_date:${name}`);
  return parsed;
}

export function formatEngineDate(date: Date): string {
  return date.toISOString().replace(/Z$/, "+0000");
}

export function decodeVariable(name: string, field: TypedValueField): TypedValue {
  const valueInfo = isRecord(field.valueInfo) ? field.valueInfo : {};

  switch (field.type) {
    case "Date":
      return new TypedValue(field.type, parseEngineDate(name, field.value), valueInfo);
    case "Json":
      return new TypedValue(field.type, parseJson(name, field.value), valueInfo);
    case "Object":
      if (valueInfo.serializationDataFormat === JSON_DATA_FORMAT) {
        return new TypedValue(field.type, parseJson(name, field.value), valueInfo);
      }
      return new TypedValue(field.type, field.value, valueInfo);
    case "Null":
      return new TypedValue(field.type, null, valueInfo);
    case "String":
    case "Boolean":
    case "Short":
    case "Integer":
    case "Long":
    case "Double":
    case "Bytes":
    case "File":
    case "Xml":
      return new TypedValue(field.type, field.value, valueInfo);
    default:
      throw new ValueMapperError(`variable_type_unknown:${name}:${field.type}`);
  }
}

export function decodeVariables(variables: VariableMap): Map<string, TypedValue> {
  const decoded = new Map<string, TypedValue>();
  for (const [name, field] of Object.entries(variables)) {
    decoded.set(name, decodeVariable(name, field));
  }
  return decoded;
}

function encodeNumber(name: string, value: number): TypedValueField {
  if (!Number.isFinite(value)) throw new ValueMapperError(`variable_not_finite:${name}`);
  if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
    return { type: "Integer", value };
  }
  // Long values past 2^53 have already lost precision in JSON.parse; the type is kept.
  if (Number.isInteger(value)) return { type: "Long", value };
  return { type: "Double", value };
}

function encodeTyped(typed: TypedValue): TypedValueField {
  let value = typed.value;
  if (value instanceof Date) {
    value = formatEngineDate(value);
  } else if ((typed.type === "Json" || typed.type === "Object") && typeof value !== "string") {
    value = JSON.stringify(value);
  }
  const field: TypedValueField = { type: typed.type, value };
  if (Object.keys(typed.valueInfo).length > 0) field.valueInfo = typed.valueInfo;
  return field;
}

export function encodeVariable(name: string, value: unknown): TypedValueField {
  if (value instanceof TypedValue) return encodeTyped(value);
  if (value === null || value === undefined) return { type: "Null", value: null };
  if (value instanceof Date) return { type: "Date", value: formatEngineDate(value) };

  switch (typeof value) {
    case "string":
      return { type: "String", value };
    case "boolean":
      return { type: "Boolean", value };
    case "number":
      return encodeNumber(name, value);
    case "object":
      try {
        return { type: "Json", value: JSON.stringify(value) };
      } catch (err) {
        throw new ValueMapperError(`variable_not_serializable:${name}:${errorMessage(err)}`, {
          cause: err,
        });
      }
    default:
      throw new ValueMapperError(`variable_type_unsupported:${name}:${typeof value}`);
  }
}

export function encodeVariables(variables: VariableInput | undefined): VariableMap | undefined {
  if (!variables) return undefined;
  const encoded: VariableMap = {};
  for (const [name, value] of Object.entries(variables)) {
    encoded[name] = encodeVariable(name, value);
  }
  return encoded;
}
