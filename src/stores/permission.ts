import { z } from "zod";

export const PermissionDecisionSchema = z.object({
  decision: z.enum(["approved", "denied"]),
  comment: z.string().optional().default(""),
});

export type PermissionDecision = z.infer<typeof PermissionDecisionSchema>;
export type PermissionDecisionInput = z.input<typeof PermissionDecisionSchema>;

// Permission requests are answered with a JSON payload in the plain answer field.
export function encodePermissionAnswer(decision: PermissionDecisionInput): string {
  return JSON.stringify({ decision: decision.decision, comment: decision.comment ?? "" });
}

export function parsePermissionAnswer(answer: string): PermissionDecision | null {
  let raw: unknown;
  try {
    raw = JSON.parse(answer);
  } catch {
    return null;
  }
  const parsed = PermissionDecisionSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
