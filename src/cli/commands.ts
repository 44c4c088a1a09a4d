import type { Logger } from "../config/logger";
import type { AskPayload, BrokerClient } from "../client/brokerClient";
import { BrokerBackpressureError, ClientTimeoutError } from "../client/errors";
import {
  EXIT_FAILURE,
  EXIT_OK,
  answeredOutcome,
  formatPendingLine,
  timeoutOutcome,
  unreachableOutcome,
  type CliOutcome,
} from "./outcome";

export const USAGE = `Usage: nudge <command> [options]

Commands:
  ask <question>                       Ask a human and wait for the answer
  permit <question> --command=<cmd>    Ask a human to approve or deny a command
  status                               List pending requests
  shutdown                             Stop the running broker

Options:
  --context=<text>   Extra context shown with the question
  --agent=<name>     Name of the asking agent
  --task=<text>      What the agent is working on
  --timeout=<secs>   Seconds to wait for an answer
  --port=<port>      Broker port`;

export type CliDeps = {
  logger: Logger;
  defaultPort: number;
  defaultTimeoutSeconds: number;
  pollIntervalMs: number;
  createClient: (port: number) => BrokerClient;
  ensureBroker: (port: number) => Promise<boolean>;
  isBrokerRunning: (port: number) => Promise<boolean>;
  announce?: (line: string) => void;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export function flag(argv: string[], name: string, fallback?: string): string | undefined {
  const prefix = `--${name}=`;
  const row = argv.find((entry) => entry.startsWith(prefix));
  if (!row) return fallback;
  return row.slice(prefix.length);
}

function positionals(argv: string[]): string[] {
  return argv.filter((entry) => !entry.startsWith("--"));
}

function parseBoundedInt(raw: string | undefined, fallback: number, min: number, max: number): number | null {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) return null;
  return value;
}

function failure(message: string): CliOutcome {
  return { exitCode: EXIT_FAILURE, stderr: `nudge: ${message}` };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runAsk(kind: "ask" | "permit", args: string[], port: number, deps: CliDeps): Promise<CliOutcome> {
  const [question] = positionals(args);
  if (!question) return failure(`${kind} requires a question`);

  const timeoutSeconds = parseBoundedInt(flag(args, "timeout"), deps.defaultTimeoutSeconds, 1, 86_400);
  if (timeoutSeconds === null) return failure("--timeout must be a whole number of seconds");

  const payload: AskPayload = { question };
  const context = flag(args, "context");
  const agent = flag(args, "agent");
  const task = flag(args, "task");
  if (context) payload.context = context;
  if (agent) payload.agent = agent;
  if (task) payload.task = task;
  if (kind === "permit") {
    const command = flag(args, "command");
    if (!command) return failure("permit requires --command=<cmd>");
    payload.request_type = "permission";
    payload.command = command;
  }

  if (!(await deps.ensureBroker(port))) return unreachableOutcome(`no broker listening on port ${port}`);
  const client = deps.createClient(port);

  let id: string;
  try {
    id = await client.ask(payload);
  } catch (error) {
    if (error instanceof BrokerBackpressureError) return failure(`broker is busy: ${error.message}`);
    return unreachableOutcome(messageOf(error));
  }
  deps.logger.info("nudge_cli_waiting", { requestId: id, timeoutSeconds });
  deps.announce?.(`nudge: respond at ${client.baseUrl}`);

  try {
    const record = await client.waitForAnswer(id, {
      timeoutMs: timeoutSeconds * 1_000,
      pollIntervalMs: deps.pollIntervalMs,
      now: deps.now,
      sleep: deps.sleep,
    });
    return answeredOutcome(record);
  } catch (error) {
    if (error instanceof ClientTimeoutError) return timeoutOutcome();
    return unreachableOutcome(messageOf(error));
  }
}

async function runStatus(port: number, deps: CliDeps): Promise<CliOutcome> {
  if (!(await deps.isBrokerRunning(port))) {
    return { exitCode: EXIT_OK, stdout: "No nudge broker running." };
  }
  try {
    const pending = await deps.createClient(port).pending();
    if (!pending.length) return { exitCode: EXIT_OK, stdout: "No pending requests." };
    const nowMs = (deps.now ?? Date.now)();
    return { exitCode: EXIT_OK, stdout: pending.map((record) => formatPendingLine(record, nowMs)).join("\n") };
  } catch (error) {
    return unreachableOutcome(messageOf(error));
  }
}

async function runShutdown(port: number, deps: CliDeps): Promise<CliOutcome> {
  if (!(await deps.isBrokerRunning(port))) {
    return { exitCode: EXIT_OK, stdout: "No nudge broker running." };
  }
  try {
    await deps.createClient(port).shutdown();
    return { exitCode: EXIT_OK, stdout: "nudge: broker shutting down" };
  } catch (error) {
    // The broker may exit before the response arrives.
    deps.logger.debug("nudge_cli_shutdown_response_lost", { message: messageOf(error) });
    return { exitCode: EXIT_OK, stdout: "nudge: broker shutting down" };
  }
}

export async function runCli(argv: string[], deps: CliDeps): Promise<CliOutcome> {
  const [command, ...args] = argv;
  const port = parseBoundedInt(flag(args, "port"), deps.defaultPort, 1, 65_535);
  if (port === null) return failure("--port must be between 1 and 65535");

  switch (command) {
    case "ask":
    case "permit":
      return runAsk(command, args, port, deps);
    case "status":
      return runStatus(port, deps);
    case "shutdown":
      return runShutdown(port, deps);
    case undefined:
    case "help":
    case "--help":
      return { exitCode: command === undefined ? EXIT_FAILURE : EXIT_OK, stdout: USAGE };
    default:
      return { exitCode: EXIT_FAILURE, stderr: `nudge: unknown command "${command}"\n${USAGE}` };
  }
}
