import { contentHash, type TaskMetadata, type TaskResult } from "@joulegate/shared";
import { compileOutputSchema, runJsonCommand, type CommandSpec } from "./process";
import type { Task } from "./types";

/** Last stdout line of a command task. `hash` and `meta` are accepted aliases. */
interface CommandTaskOutput {
  ok: boolean;
  delta: number;
  loss?: number;
  contentHash?: string;
  hash?: string;
  metadata?: TaskMetadata;
  meta?: TaskMetadata;
}

const validateOutput = compileOutputSchema<CommandTaskOutput>({
  type: "object",
  required: ["ok", "delta"],
  properties: {
    ok: { type: "boolean" },
    delta: { type: "number", minimum: 0 },
    loss: { type: "number" },
    contentHash: { type: "string" },
    hash: { type: "string" },
    metadata: { type: "object" },
    meta: { type: "object" }
  }
});

export interface CommandTaskOptions extends CommandSpec {
  name: string;
  estimatedCostJoules: number;
}

/**
 * Runs an external job to completion. No timeout: an admitted job is never
 * interrupted.
 */
export class CommandTask implements Task {
  readonly kind = "command";
  readonly name: string;
  readonly estimatedCostJoules: number;

  constructor(private readonly options: CommandTaskOptions) {
    this.name = options.name;
    this.estimatedCostJoules = options.estimatedCostJoules;
  }

  async run(): Promise<TaskResult> {
    const output = await runJsonCommand(this.name, this.options, validateOutput);
    return {
      ok: output.ok,
      delta: output.delta,
      loss: output.loss ?? 0,
      contentHash: output.contentHash ?? output.hash ?? contentHash(JSON.stringify(output)),
      metadata: output.metadata ?? output.meta ?? {}
    };
  }
}
