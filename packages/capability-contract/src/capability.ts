export type CapabilityKind = "action" | "observation";

/**
 * Types a parameter may carry on the wire. Anything else is rejected at
 * registration.
 */
export type SchemaType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "array"
  | "object";

export type ReturnType = SchemaType | "null";

export type EnumValue = string | number | boolean;

export interface PropertySchema {
  type: SchemaType;
  description?: string;
  enum?: EnumValue[];
  items?: PropertySchema;
  prefixItems?: PropertySchema[];
  properties?: Record<string, PropertySchema>;
  required?: string[];
  additionalProperties?: PropertySchema;
  default?: unknown;
}

export interface ParameterSpec {
  name: string;
  type: SchemaType;
  required: boolean;
  description?: string;
  hasDefault: boolean;
  default?: unknown;
  /** JSON property schema emitted for this parameter */
  property: PropertySchema;
}

export interface CapabilitySchema {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, PropertySchema>;
    required: string[];
  };
}

export interface Capability {
  readonly name: string;
  readonly kind: CapabilityKind;
  readonly mutating: boolean;
  readonly description: string;
  readonly parameters: readonly ParameterSpec[];
  readonly returnType?: ReturnType;
  /** Object the capability is invoked through */
  readonly owner: object;
}
