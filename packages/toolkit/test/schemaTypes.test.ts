import { SchemaError } from "@armory/capability-contract";
import { z } from "zod";
import { describeReturnType, describeType } from "../src/schemaTypes";
import { thrown } from "./fixtures";

enum Unit {
  Celsius = "C",
  Fahrenheit = "F",
}

enum Level {
  Low,
  High,
}

describe("describeType", () => {
  it.each([
    ["string", z.string(), { type: "string" }],
    ["number", z.number(), { type: "number" }],
    ["integer", z.number().int(), { type: "integer" }],
    ["boolean", z.boolean(), { type: "boolean" }],
    [
      "array",
      z.array(z.string()),
      { type: "array", items: { type: "string" } },
    ],
    [
      "tuple",
      z.tuple([z.string(), z.number()]),
      { type: "array", prefixItems: [{ type: "string" }, { type: "number" }] },
    ],
    [
      "record",
      z.record(z.boolean()),
      { type: "object", additionalProperties: { type: "boolean" } },
    ],
    [
      "enum",
      z.enum(["celsius", "fahrenheit"]),
      { type: "string", enum: ["celsius", "fahrenheit"] },
    ],
    [
      "string native enum",
      z.nativeEnum(Unit),
      { type: "string", enum: ["C", "F"] },
    ],
    [
      "numeric native enum",
      z.nativeEnum(Level),
      { type: "integer", enum: [0, 1] },
    ],
    ["literal", z.literal("metric"), { type: "string", enum: ["metric"] }],
    ["refinement", z.string().refine((s) => s.length > 0), { type: "string" }],
    ["transform", z.string().transform(Number), { type: "string" }],
  ])("should map %s", (_label, declared, expected) => {
    const described = describeType(declared, "p");

    expect(described.property).toEqual(expected);
    expect(described.required).toBe(true);
  });

  it("should describe nested objects in key order", () => {
    const described = describeType(
      z.object({ x: z.number(), y: z.string().optional(), z: z.boolean() }),
      "point"
    );

    expect(described.property).toEqual({
      type: "object",
      properties: {
        x: { type: "number" },
        y: { type: "string" },
        z: { type: "boolean" },
      },
      required: ["x", "z"],
    });
    expect(Object.keys(described.property.properties ?? {})).toEqual([
      "x",
      "y",
      "z",
    ]);
  });

  it("should treat only optional values as not required", () => {
    expect(describeType(z.string().optional(), "p")).toMatchObject({
      property: { type: "string" },
      required: false,
      hasDefault: false,
    });
    expect(describeType(z.number().int().nullish(), "p")).toMatchObject({
      property: { type: "integer" },
      required: false,
    });
  });

  it("should keep nullable values required", () => {
    expect(describeType(z.number().int().nullable(), "p")).toMatchObject({
      property: { type: "integer" },
      required: true,
    });
    expect(
      describeType(z.string().nullable().default(null), "p")
    ).toMatchObject({ required: false, hasDefault: true, defaultValue: null });
  });

  it("should record defaults", () => {
    const described = describeType(z.number().default(3), "p");

    expect(described.property).toEqual({ type: "number", default: 3 });
    expect(described.required).toBe(false);
    expect(described.hasDefault).toBe(true);
    expect(described.defaultValue).toBe(3);
  });

  it("should keep descriptions from either side of a wrapper", () => {
    expect(describeType(z.string().describe("City"), "p").property).toEqual({
      type: "string",
      description: "City",
    });
    expect(
      describeType(z.string().optional().describe("Outer"), "p").property
    ).toEqual({ type: "string", description: "Outer" });
  });

  it.each([
    ["any", z.any(), "ZodAny"],
    ["unknown", z.unknown(), "ZodUnknown"],
    ["union", z.union([z.string(), z.number()]), "ZodUnion"],
    ["date", z.date(), "ZodDate"],
  ])("should refuse %s", (_label, declared, typeName) => {
    const error = thrown(() => describeType(declared, "p"));

    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({ parameter: "p", declaredType: typeName });
  });

  it("should refuse unmappable element types", () => {
    const error = thrown(() => describeType(z.array(z.any()), "tags"));

    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({ parameter: "tags", declaredType: "ZodAny" });
    expect(error).toHaveProperty(
      "message",
      'Parameter "tags" has no schema mapping for ZodAny at tags[]'
    );
  });
});

describe("describeReturnType", () => {
  it("should map void-like and promised results", () => {
    expect(describeReturnType(undefined, "c")).toBeUndefined();
    expect(describeReturnType(z.void(), "c")).toBe("null");
    expect(describeReturnType(z.promise(z.void()), "c")).toBe("null");
    expect(describeReturnType(z.promise(z.string()), "c")).toBe("string");
    expect(describeReturnType(z.number().int(), "c")).toBe("integer");
  });
});
