import { z } from "zod";

/** Where a tool lives: its package, its name and an optional version. */
export const ToolRefSchema = z.object({
  module: z.string().min(1),
  name: z.string().min(1),
  version: z.string().min(1).optional(),
});

export type ToolRef = z.infer<typeof ToolRefSchema>;
