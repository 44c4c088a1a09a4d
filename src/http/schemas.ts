import { z } from "zod";

const optionalText = z.string().nullish();

export const AskBodySchema = z
  .object({
    question: z.string(),
    context: optionalText,
    agent: optionalText,
    task: optionalText,
    request_type: z.enum(["question", "permission"]).nullish(),
    command: optionalText,
  })
  .superRefine((body, ctx) => {
    if (body.request_type === "permission" && !body.command) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["command"], message: "missing" });
    }
  });

export type AskBody = z.infer<typeof AskBodySchema>;

export const AnswerBodySchema = z.object({
  id: z.string(),
  answer: z.string(),
});

export type AnswerBody = z.infer<typeof AnswerBodySchema>;

export type BodyValidation<T> = { ok: true; value: T } | { ok: false; error: string };

function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.map(String).join(".") || "body";
  const missing =
    (issue.code === z.ZodIssueCode.invalid_type && (issue.received === "undefined" || issue.received === "null")) ||
    (issue.code === z.ZodIssueCode.custom && issue.message === "missing");
  return `${missing ? "missing" : "invalid"} ${field}`;
}

export function validateBody<S extends z.ZodTypeAny>(schema: S, body: unknown): BodyValidation<z.infer<S>> {
  const parsed = schema.safeParse(body);
  if (parsed.success) return { ok: true, value: parsed.data };
  const first = parsed.error.issues[0];
  return { ok: false, error: first ? describeIssue(first) : "invalid request body" };
}
