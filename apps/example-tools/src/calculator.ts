import { action, Tool } from "@armory/toolkit";
import { z } from "zod";

export class Calculator extends Tool {
  constructor() {
    super({
      description: "Integer arithmetic",
      capabilities: [
        action(Calculator.prototype.add, {
          doc: `Add two integers.
            @param a - First addend
            @param b - Second addend`,
          parameters: { a: z.number().int(), b: z.number().int() },
          returns: z.number().int(),
        }),
      ],
    });
  }

  add({ a, b }: { a: number; b: number }): number {
    return a + b;
  }
}
