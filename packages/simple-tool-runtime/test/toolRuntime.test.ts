import { ToolCall } from "@armory/capability-contract";
import { action, observation, Tool } from "@armory/toolkit";
import { z } from "zod";
import { ToolRuntime } from "../src";

class Workbench extends Tool {
  constructor() {
    super({
      capabilities: [
        action(Workbench.prototype.add, {
          doc: "Add two integers",
          parameters: { a: z.number().int(), b: z.number().int() },
        }),
        action(Workbench.prototype.explode, { doc: "Always fails" }),
        observation(Workbench.prototype.later, { doc: "Resolves later" }),
      ],
    });
  }

  add({ a, b }: { a: number; b: number }): number {
    return a + b;
  }

  explode(): never {
    throw new Error("disk full");
  }

  later(): Promise<string> {
    return Promise.resolve("done");
  }
}

describe("ToolRuntime", () => {
  let runtime: ToolRuntime;

  beforeEach(() => {
    runtime = new ToolRuntime(new Workbench(), { extraArguments: "reject" });
  });

  it("should hand out the tool's schemas", () => {
    expect(runtime.schema()).toEqual(runtime.tool.jsonSchema());
    expect(runtime.schema().map((s) => s.name)).toEqual([
      "add",
      "explode",
      "later",
    ]);
  });

  it("should name the tool it serves", () => {
    const published = new ToolRuntime(new Workbench(), {
      extraArguments: "reject",
      module: "@armory/workbench",
      version: "1.0.0",
    });

    expect(runtime.ref()).toEqual({ module: "local", name: "Workbench" });
    expect(published.ref()).toEqual({
      module: "@armory/workbench",
      name: "Workbench",
      version: "1.0.0",
    });
  });

  it("should dispatch a call and report its result", async () => {
    const call: ToolCall = { tool: "add", parameters: { a: 1, b: "2" } };

    await expect(runtime.receiveCall(call)).resolves.toEqual({
      status: "success",
      tool: "add",
      result: 3,
    });
  });

  it("should await results that are promises", async () => {
    await expect(runtime.receiveCall({ tool: "later" })).resolves.toEqual({
      status: "success",
      tool: "later",
      result: "done",
    });
  });

  it("should report a call that is not shaped like one", async () => {
    const outcome = await runtime.receiveCall({ name: "add" });

    expect(outcome).toEqual({
      status: "error",
      error: {
        code: -32602,
        name: "ValidationError",
        message:
          "Tool call must look like { tool: string, parameters?: object }",
        data: [{ path: ["tool"], message: "Required" }],
      },
    });
  });

  it("should report unknown capabilities", async () => {
    const outcome = await runtime.receiveCall({ tool: "subtract" });

    expect(outcome).toEqual({
      status: "error",
      tool: "subtract",
      error: {
        code: -32601,
        name: "NotFoundError",
        message: 'Capability "subtract" not found on tool "Workbench"',
      },
    });
  });

  it("should report invalid arguments with their paths", async () => {
    const outcome = await runtime.receiveCall({
      tool: "add",
      parameters: { a: 1 },
    });

    expect(outcome).toEqual({
      status: "error",
      tool: "add",
      error: {
        code: -32602,
        name: "ValidationError",
        message: 'Missing required argument(s) for "add": b',
        data: [{ path: ["b"], message: "Required" }],
      },
    });
  });

  it("should report failures inside the capability", async () => {
    const outcome = await runtime.receiveCall({ tool: "explode" });

    expect(outcome).toEqual({
      status: "error",
      tool: "explode",
      error: {
        code: -32000,
        name: "ExecutionError",
        message: 'Capability "explode" failed: disk full',
      },
    });
  });

  it("should apply the configured extra argument mode", async () => {
    const call: ToolCall = { tool: "add", parameters: { a: 1, b: 2, c: 3 } };
    const lenient = new ToolRuntime(new Workbench(), {
      extraArguments: "ignore",
    });

    await expect(lenient.receiveCall(call)).resolves.toEqual({
      status: "success",
      tool: "add",
      result: 3,
    });
    await expect(runtime.receiveCall(call)).resolves.toMatchObject({
      status: "error",
      error: { code: -32602, data: [{ path: ["c"] }] },
    });
  });
});
