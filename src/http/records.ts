import { z } from "zod";
import type { AgentRequest } from "../stores/interfaces";

export const AgentRequestRecordSchema = z.object({
  id: z.string(),
  question: z.string(),
  context: z.string().nullable(),
  agent: z.string().nullable(),
  task: z.string().nullable(),
  request_type: z.enum(["question", "permission"]),
  command: z.string().nullable(),
  status: z.enum(["pending", "answered"]),
  answer: z.string().nullable(),
  created_at: z.number(),
  answered_at: z.number().nullable(),
});

/** Wire shape of a request, shared by the broker and its clients. Timestamps are epoch seconds. */
export type AgentRequestRecord = z.infer<typeof AgentRequestRecordSchema>;

export function toRecord(request: AgentRequest): AgentRequestRecord {
  return {
    id: request.id,
    question: request.question,
    context: request.context,
    agent: request.agent,
    task: request.task,
    request_type: request.requestType,
    command: request.command,
    status: request.status,
    answer: request.answer,
    created_at: request.createdAt / 1_000,
    answered_at: request.answeredAt === null ? null : request.answeredAt / 1_000,
  };
}
