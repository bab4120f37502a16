import "dotenv/config";
import { cleanup, logger } from "@armory/common";
import { ToolRuntime } from "@armory/simple-tool-runtime";
import { AgentUtils, describeCapabilities, MultiTool } from "@armory/toolkit";
import { Calculator } from "./calculator";
import { Chat } from "./chat";
import { WeatherLogger } from "./weatherLogger";

// Usage: index.ts '{"tool":"add","parameters":{"a":2,"b":7}}'
(async () => {
  const tools = new MultiTool([
    new Calculator(),
    new Chat(),
    new WeatherLogger(),
    new AgentUtils(),
  ]);
  const runtime = new ToolRuntime(tools, {
    module: "@armory/example-tools",
    version: "0.1.0",
  });

  try {
    const call = process.argv[2];
    if (!call) {
      logger.info("Available capabilities", {
        ref: runtime.ref(),
        listing: describeCapabilities(tools.capabilities()),
        schema: runtime.schema(),
      });
      return;
    }
    const outcome = await runtime.receiveCall(JSON.parse(call));
    logger.info("Call finished", { outcome });
  } finally {
    tools.close();
    await cleanup();
  }
})().catch((err) => {
  logger.error("Example runtime failed", { error: String(err) });
  process.exitCode = 1;
});
