import type { AgentRequestRecord } from "../http/records";
import { parsePermissionAnswer } from "../stores/permission";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_DENIED = 2;

export type CliOutcome = {
  exitCode: number;
  stdout?: string;
  stderr?: string;
};

export function timeoutOutcome(): CliOutcome {
  return { exitCode: EXIT_FAILURE, stderr: "nudge: timed out waiting for answer" };
}

export function unreachableOutcome(message: string): CliOutcome {
  return { exitCode: EXIT_FAILURE, stderr: `nudge: failed to reach broker: ${message}` };
}

/** Maps an answered request onto what the waiting caller prints and exits with. */
export function answeredOutcome(record: AgentRequestRecord): CliOutcome {
  const answer = record.answer ?? "";
  if (record.request_type !== "permission") {
    return { exitCode: EXIT_OK, stdout: answer };
  }

  const decision = parsePermissionAnswer(answer);
  if (!decision) {
    return { exitCode: EXIT_FAILURE, stderr: `nudge: unrecognized permission answer: ${answer}` };
  }
  if (decision.decision === "approved") {
    return {
      exitCode: EXIT_OK,
      stdout: decision.comment ? `approved: ${decision.comment}` : "approved",
    };
  }
  return {
    exitCode: EXIT_DENIED,
    stderr: decision.comment ? `nudge: denied: ${decision.comment}` : "nudge: denied",
  };
}

export function formatPendingLine(record: AgentRequestRecord, nowMs: number): string {
  const agent = record.agent || "unknown";
  const ageSeconds = Math.max(0, Math.floor(nowMs / 1_000 - record.created_at));
  const kind = record.request_type === "permission" ? ` [permission: ${record.command ?? ""}]` : "";
  return `  [${agent}] (${ageSeconds}s ago) ${record.question}${kind}`;
}
