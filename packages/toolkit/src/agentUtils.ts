import { z } from "zod";
import { action } from "./marker";
import { Tool } from "./tool";

/** Common capabilities most agents want next to their domain tools. */
export class AgentUtils extends Tool {
  constructor() {
    super({
      description: "Common tool utilities for agents",
      capabilities: [
        action(AgentUtils.prototype.result, {
          doc: `Return a result to the user
            @param value - Value to return`,
          parameters: { value: z.string() },
          returns: z.string(),
        }),
        action(AgentUtils.prototype.wait, {
          doc: `Wait for a certain amount of time
            @param seconds - Seconds to wait`,
          parameters: { seconds: z.number().int().nonnegative() },
          returns: z.promise(z.void()),
        }),
      ],
    });
  }

  result({ value }: { value: string }): string {
    return value;
  }

  wait({ seconds }: { seconds: number }): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
  }
}
