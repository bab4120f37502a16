import {
  ArmoryError,
  CapabilitySchema,
  ParsedToolCall,
  ToolCallOutcome,
  ToolCallSchema,
  ToolRef,
  ToolRefSchema,
  ValidationError,
} from "@armory/capability-contract";
import { ExtraArgumentMode, loadConfig, logger } from "@armory/common";
import { Tool } from "@armory/toolkit";

export interface ToolRuntimeOptions {
  /** Defaults to ARMORY_EXTRA_ARGUMENTS */
  extraArguments?: ExtraArgumentMode;
  /** Package the tool is published from, reported by `ref()` */
  module?: string;
  version?: string;
}

/**
 * Bridges an agent loop and a tool: hands out the schemas, takes the call
 * object the model produced, and reports back an outcome the loop can feed
 * to the model again.
 */
export class ToolRuntime {
  private readonly extraArguments: ExtraArgumentMode;

  constructor(
    public readonly tool: Tool,
    private readonly options: ToolRuntimeOptions = {}
  ) {
    this.extraArguments =
      options.extraArguments ?? loadConfig().extraArguments;
  }

  schema(): CapabilitySchema[] {
    return this.tool.jsonSchema();
  }

  /** Reference an agent can use to name the tool behind this runtime. */
  ref(): ToolRef {
    return ToolRefSchema.parse({
      module: this.options.module ?? "local",
      name: this.tool.name,
      version: this.options.version,
    });
  }

  receiveCall = async (raw: unknown): Promise<ToolCallOutcome> => {
    const parsed = ToolCallSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn("Invalid tool call", {
        class: this.constructor.name,
        method: "receiveCall",
        issues: parsed.error.issues,
      });
      return this.failure(
        new ValidationError(
          "Tool call must look like { tool: string, parameters?: object }",
          parsed.error.issues.map((issue) => ({
            path: issue.path,
            message: issue.message,
          }))
        )
      );
    }

    return this.run(parsed.data);
  };

  private async run(call: ParsedToolCall): Promise<ToolCallOutcome> {
    const { tool: name, parameters } = call;
    logger.info(`Runtime received call to ${name}`, {
      class: this.constructor.name,
      method: "receiveCall",
      tool: this.tool.name,
      capability: name,
    });

    try {
      const result: unknown = await this.tool.use(name, parameters, {
        extraArguments: this.extraArguments,
      });
      return { status: "success", tool: name, result };
    } catch (err) {
      if (err instanceof ArmoryError) {
        return this.failure(err, name);
      }
      throw err;
    }
  }

  private failure(error: ArmoryError, tool?: string): ToolCallOutcome {
    return {
      status: "error",
      tool,
      error: {
        code: error.code,
        name: error.name,
        message: error.message,
        data: error instanceof ValidationError ? error.issues : undefined,
      },
    };
  }
}
