export type {
  Capability,
  CapabilityKind,
  CapabilitySchema,
  EnumValue,
  ParameterSpec,
  PropertySchema,
  ReturnType,
  SchemaType,
} from "./capability";
export * from "./errors";
export * from "./toolCall";
export * from "./toolRef";
