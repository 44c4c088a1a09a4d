export type RequestType = "question" | "permission";

export type RequestStatus = "pending" | "answered";

export type AgentRequest = {
  id: string;
  question: string;
  context: string | null;
  agent: string | null;
  task: string | null;
  requestType: RequestType;
  command: string | null;
  status: RequestStatus;
  answer: string | null;
  createdAt: number;
  answeredAt: number | null;
};

export type CreateRequestInput = {
  question: string;
  context?: string | null;
  agent?: string | null;
  task?: string | null;
  requestType?: RequestType;
  command?: string | null;
};

export type CreateResult =
  | { status: "created"; request: AgentRequest }
  | { status: "rejected"; reason: "capacity" }
  | { status: "invalid"; field: "command" };

export type RequestStoreStats = {
  total: number;
  pending: number;
  answered: number;
};

/**
 * Authoritative state for agent requests.
 *
 * Every method is synchronous: each call runs to completion on the event loop
 * and is the critical section for the whole map. Implementations must not
 * await inside an operation. An id is never issued twice by the same store,
 * even after its request has been evicted.
 */
export interface RequestStore {
  create(input: CreateRequestInput): CreateResult;
  get(id: string): AgentRequest | null;
  pending(): AgentRequest[];
  answer(id: string, text: string): boolean;
  hasPending(): boolean;
  stats(): RequestStoreStats;
}
