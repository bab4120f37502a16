export { ToolRuntime } from "./toolRuntime";
export type { ToolRuntimeOptions } from "./toolRuntime";
