import {
  EnumValue,
  PropertySchema,
  ReturnType,
  SchemaError,
} from "@armory/capability-contract";
import { z, ZodTypeAny } from "zod";

export interface TypeDescription {
  property: PropertySchema;
  required: boolean;
  hasDefault: boolean;
  defaultValue?: unknown;
}

function unsupported(parameter: string, declared: ZodTypeAny, where: string) {
  const typeName = declared.constructor.name;
  return new SchemaError(
    `Parameter "${parameter}" has no schema mapping for ${typeName} at ${where}`,
    parameter,
    typeName
  );
}

function enumProperty(
  values: EnumValue[],
  parameter: string,
  declared: ZodTypeAny,
  where: string
): PropertySchema {
  if (values.length > 0 && values.every((v) => typeof v === "string")) {
    return { type: "string", enum: values };
  }
  if (values.length > 0 && values.every((v) => Number.isInteger(v))) {
    return { type: "integer", enum: values };
  }
  throw unsupported(parameter, declared, where);
}

function nativeEnumValues(values: z.EnumLike): EnumValue[] {
  // numeric members also appear as reverse-mapped keys
  return Object.keys(values)
    .filter((key) => typeof values[values[key]] !== "number")
    .map((key) => values[key]);
}

function literalProperty(
  value: unknown,
  parameter: string,
  declared: ZodTypeAny,
  where: string
): PropertySchema {
  switch (typeof value) {
    case "string":
      return { type: "string", enum: [value] };
    case "boolean":
      return { type: "boolean", enum: [value] };
    case "number":
      return {
        type: Number.isInteger(value) ? "integer" : "number",
        enum: [value],
      };
    default:
      throw unsupported(parameter, declared, where);
  }
}

function toProperty(
  declared: ZodTypeAny,
  parameter: string,
  where: string
): PropertySchema {
  if (declared instanceof z.ZodString) {
    return { type: "string" };
  }
  if (declared instanceof z.ZodNumber) {
    return { type: declared.isInt ? "integer" : "number" };
  }
  if (declared instanceof z.ZodBoolean) {
    return { type: "boolean" };
  }
  if (declared instanceof z.ZodEnum) {
    const options: string[] = declared.options;
    return enumProperty([...options], parameter, declared, where);
  }
  if (declared instanceof z.ZodNativeEnum) {
    const values: z.EnumLike = declared.enum;
    return enumProperty(nativeEnumValues(values), parameter, declared, where);
  }
  if (declared instanceof z.ZodLiteral) {
    const value: unknown = declared.value;
    return literalProperty(value, parameter, declared, where);
  }
  if (declared instanceof z.ZodArray) {
    const element: ZodTypeAny = declared.element;
    return {
      type: "array",
      items: describeType(element, parameter, `${where}[]`).property,
    };
  }
  if (declared instanceof z.ZodTuple) {
    const items: ZodTypeAny[] = declared.items;
    const rest: ZodTypeAny | null = declared._def.rest;
    const property: PropertySchema = {
      type: "array",
      prefixItems: items.map(
        (item, i) => describeType(item, parameter, `${where}[${i}]`).property
      ),
    };
    if (rest) {
      property.items = describeType(rest, parameter, `${where}[]`).property;
    }
    return property;
  }
  if (declared instanceof z.ZodObject) {
    const shape: z.ZodRawShape = declared.shape;
    const properties: [string, PropertySchema][] = [];
    const required: string[] = [];
    for (const [key, value] of Object.entries(shape)) {
      const nested = describeType(value, parameter, `${where}.${key}`);
      properties.push([key, nested.property]);
      if (nested.required) {
        required.push(key);
      }
    }
    return {
      type: "object",
      properties: Object.fromEntries(properties),
      required,
    };
  }
  if (declared instanceof z.ZodRecord) {
    const valueType: ZodTypeAny = declared.valueSchema;
    return {
      type: "object",
      additionalProperties: describeType(valueType, parameter, `${where}{}`)
        .property,
    };
  }

  throw unsupported(parameter, declared, where);
}

/**
 * Maps a declared zod type onto the fixed schema type table. Optional and
 * defaulted wrappers make the value not required; a nullable value is still
 * required. Refinements and transforms are described by their input type.
 */
export function describeType(
  declared: ZodTypeAny,
  parameter: string,
  where: string = parameter
): TypeDescription {
  let current = declared;
  let description = declared.description;
  let required = true;
  let hasDefault = false;
  let defaultValue: unknown;

  for (;;) {
    if (current instanceof z.ZodOptional) {
      required = false;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      // null is a value; the key itself must still be sent
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      required = false;
      if (!hasDefault) {
        hasDefault = true;
        defaultValue = current._def.defaultValue();
      }
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      break;
    }
    description ??= current.description;
  }

  const property = toProperty(current, parameter, where);
  if (description) {
    property.description = description;
  }
  if (hasDefault) {
    property.default = defaultValue;
  }

  return { property, required, hasDefault, defaultValue };
}

export function describeReturnType(
  declared: ZodTypeAny | undefined,
  capability: string
): ReturnType | undefined {
  if (!declared) {
    return undefined;
  }
  let current = declared;
  while (current instanceof z.ZodPromise) {
    current = current.unwrap();
  }
  if (
    current instanceof z.ZodVoid ||
    current instanceof z.ZodUndefined ||
    current instanceof z.ZodNull
  ) {
    return "null";
  }
  return describeType(current, "return", `${capability}:return`).property.type;
}
