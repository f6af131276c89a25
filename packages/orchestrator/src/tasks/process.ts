import { spawn } from "node:child_process";
import Ajv, { type Schema, type ValidateFunction } from "ajv";
import { TaskExecutionError } from "./types";

const STDERR_TAIL_BYTES = 4096;

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandOutcome {
  stdout: string;
  stderrTail: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export function runProcess(spec: CommandSpec): Promise<CommandOutcome> {
  return new Promise((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"]
    });
    const stdout: Buffer[] = [];
    let stderr = "";
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = (stderr + chunk.toString("utf8")).slice(-STDERR_TAIL_BYTES);
    });
    child.once("error", reject);
    child.once("close", (exitCode, signal) => {
      resolve({ stdout: Buffer.concat(stdout).toString("utf8"), stderrTail: stderr, exitCode, signal });
    });
  });
}

export function lastJsonLine(stdout: string): unknown {
  const lines = stdout.split(/\r?\n/).filter(line => line.trim().length > 0);
  const last = lines[lines.length - 1];
  if (last === undefined) {
    throw new Error("no output");
  }
  try {
    return JSON.parse(last);
  } catch {
    throw new Error(`last output line is not JSON: ${last.slice(0, 200)}`);
  }
}

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export function compileOutputSchema<T>(schema: Schema): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/**
 * Runs the command and returns its validated last stdout line. Spawn
 * failures, non-zero exits and invalid output raise TaskExecutionError.
 */
export async function runJsonCommand<T>(taskName: string, spec: CommandSpec, validate: ValidateFunction<T>): Promise<T> {
  let outcome: CommandOutcome;
  try {
    outcome = await runProcess(spec);
  } catch (error) {
    throw new TaskExecutionError(taskName, `could not start ${spec.command}`, { cause: error });
  }
  if (outcome.exitCode !== 0) {
    const reason = outcome.signal ? `killed by ${outcome.signal}` : `exit code ${outcome.exitCode}`;
    throw new TaskExecutionError(taskName, reason, { exitCode: outcome.exitCode, stderrTail: outcome.stderrTail });
  }
  let parsed: unknown;
  try {
    parsed = lastJsonLine(outcome.stdout);
  } catch (error) {
    throw new TaskExecutionError(taskName, error instanceof Error ? error.message : String(error), {
      exitCode: 0,
      stderrTail: outcome.stderrTail
    });
  }
  if (!validate(parsed)) {
    const details = (validate.errors ?? []).map(err => `${err.instancePath || "."} ${err.message ?? "invalid"}`).join("; ");
    throw new TaskExecutionError(taskName, `invalid result: ${details}`, { exitCode: 0, stderrTail: outcome.stderrTail });
  }
  return parsed;
}
