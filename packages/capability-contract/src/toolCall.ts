import { z } from "zod";

// Call object an agent produces after reading the schemas
export const ToolCallSchema = z.object({
  tool: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
});

export type ToolCall = z.input<typeof ToolCallSchema>;
export type ParsedToolCall = z.infer<typeof ToolCallSchema>;

const ErrorSchema = z.object({
  code: z.number(),
  name: z.string(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const ToolCallOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    tool: z.string(),
    result: z.unknown(),
  }),
  z.object({
    status: z.literal("error"),
    tool: z.string().optional(),
    error: ErrorSchema,
  }),
]);

export type ToolCallOutcome = z.infer<typeof ToolCallOutcomeSchema>;
