import crypto from "node:crypto";
import type { AgentRequest, CreateRequestInput, CreateResult, RequestStore, RequestStoreStats } from "./interfaces";
import { DEFAULT_REQUEST_LIMITS, isValidRequestId, truncate, truncateOptional, type RequestLimits } from "./limits";

const MAX_ID_ATTEMPTS = 16;

export type MemoryRequestStoreOptions = {
  now?: () => number;
  generateId?: () => string;
  limits?: Partial<RequestLimits>;
};

export function generateRequestId(): string {
  return crypto.randomBytes(6).toString("hex");
}

/**
 * In-memory request map. State lives only for the lifetime of the broker
 * process; answered requests are evicted after the retention window, pending
 * ones stay until someone answers them.
 */
export class MemoryRequestStore implements RequestStore {
  private readonly requests = new Map<string, AgentRequest>();
  // Outlives eviction so an id is never handed out twice by one store.
  private readonly issuedIds = new Set<string>();
  private readonly now: () => number;
  private readonly generateId: () => string;
  readonly limits: RequestLimits;

  constructor(options: MemoryRequestStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? generateRequestId;
    this.limits = { ...DEFAULT_REQUEST_LIMITS, ...options.limits };
  }

  create(input: CreateRequestInput): CreateResult {
    const requestType = input.requestType ?? "question";
    const command = truncateOptional(input.command, this.limits.maxCommandLength);
    if (requestType === "permission" && !command) {
      return { status: "invalid", field: "command" };
    }

    this.evictStale();
    if (this.countPending() >= this.limits.maxPendingRequests) {
      return { status: "rejected", reason: "capacity" };
    }

    const request: AgentRequest = {
      id: this.allocateId(),
      question: truncate(input.question, this.limits.maxQuestionLength),
      context: truncateOptional(input.context, this.limits.maxContextLength),
      agent: truncateOptional(input.agent, this.limits.maxAgentLength),
      task: truncateOptional(input.task, this.limits.maxTaskLength),
      requestType,
      command,
      status: "pending",
      answer: null,
      createdAt: this.now(),
      answeredAt: null,
    };
    this.requests.set(request.id, request);
    return { status: "created", request: { ...request } };
  }

  get(id: string): AgentRequest | null {
    if (!isValidRequestId(id)) return null;
    const request = this.requests.get(id);
    return request ? { ...request } : null;
  }

  pending(): AgentRequest[] {
    const output: AgentRequest[] = [];
    for (const request of this.requests.values()) {
      if (request.status === "pending") output.push({ ...request });
    }
    return output;
  }

  answer(id: string, text: string): boolean {
    if (!isValidRequestId(id)) return false;
    const request = this.requests.get(id);
    if (!request || request.status !== "pending") return false;
    request.status = "answered";
    request.answer = truncate(text, this.limits.maxAnswerLength);
    request.answeredAt = this.now();
    return true;
  }

  hasPending(): boolean {
    for (const request of this.requests.values()) {
      if (request.status === "pending") return true;
    }
    return false;
  }

  stats(): RequestStoreStats {
    const pending = this.countPending();
    return { total: this.requests.size, pending, answered: this.requests.size - pending };
  }

  private countPending(): number {
    let count = 0;
    for (const request of this.requests.values()) {
      if (request.status === "pending") count += 1;
    }
    return count;
  }

  private allocateId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const id = this.generateId();
      if (this.issuedIds.has(id)) continue;
      this.issuedIds.add(id);
      return id;
    }
    throw new Error(`Unable to allocate a unique request id after ${MAX_ID_ATTEMPTS} attempts`);
  }

  private evictStale(): void {
    const cutoff = this.now() - this.limits.answeredRetentionMs;
    for (const [id, request] of this.requests) {
      if (request.status === "answered" && request.answeredAt !== null && request.answeredAt < cutoff) {
        this.requests.delete(id);
      }
    }
  }
}
