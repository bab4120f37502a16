export { AgentUtils } from "./agentUtils";
export {
  Action,
  BaseCapability,
  isAction,
  isObservation,
  Observation,
} from "./capability";
export type { Binding } from "./capability";
export { renamedName } from "./collisions";
export type { CollisionPolicy } from "./collisions";
export { parseDoc } from "./doc";
export { coerceValue, dispatch, validateArguments } from "./dispatcher";
export type { UseOptions } from "./dispatcher";
export { action, observation } from "./marker";
export type {
  Arguments,
  CapabilityMarker,
  Handler,
  MarkerOptions,
} from "./marker";
export { MultiTool } from "./multiTool";
export type { MultiToolOptions, Resolution } from "./multiTool";
export { registerCapabilities } from "./registry";
export { buildSchema, describeCapabilities } from "./schemaBuilder";
export { describeType } from "./schemaTypes";
export { Tool } from "./tool";
export type {
  AddActionOptions,
  MergeOptions,
  SchemaOptions,
  ToolOptions,
} from "./tool";
export {
  tool,
  toolFromClass,
  toolFromFunction,
  toolFromObject,
} from "./wrappers";
export type { ClassToolConstructor, ToolClass, WrapOptions } from "./wrappers";
