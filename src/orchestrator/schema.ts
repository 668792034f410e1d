import { z } from "zod";

const stepRefSchema = z
  .string()
  .min(1)
  .max(200)
  .regex(/^[^#]/, { message: "step names may not start with '#'" });

export const successPolicySchema = z
  .object({
    output_mappings: z.record(z.string().min(1)).optional(),
    next: stepRefSchema.optional()
  })
  .strict();

export const failurePolicySchema = z
  .object({
    action: z.enum(["stop", "retry", "continue"]),
    max_retries: z.number().int().min(1).optional(),
    continue_on_max_retries: z.boolean().optional(),
    next: stepRefSchema.optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.action === "retry" && value.max_retries === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["max_retries"],
        message: "max_retries is required when action is retry"
      });
    }
  });

export const stepDefinitionSchema = z
  .object({
    operation: z.string().min(1),
    step_name: stepRefSchema.optional(),
    inputs: z.record(z.unknown()).optional(),
    on_success: successPolicySchema.optional(),
    on_failure: failurePolicySchema.optional()
  })
  .strict();

export const chainDefinitionSchema = z
  .object({
    chain_name: z.string().min(1).optional(),
    steps: z.array(stepDefinitionSchema).min(1, { message: "chain must declare at least one step" })
  })
  .strict();

export type ChainDefinitionInput = z.infer<typeof chainDefinitionSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
