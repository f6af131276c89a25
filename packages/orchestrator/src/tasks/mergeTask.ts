import path from "node:path";
import type { TaskMetadata, TaskResult } from "@joulegate/shared";
import { isInsideDirectory } from "../merge/baseStore";
import type { MergeGate } from "../merge/gate";
import { compileOutputSchema, runJsonCommand, type CommandSpec } from "./process";
import { TaskExecutionError, type Task } from "./types";

/** Last stdout line of a trainer run. */
interface TrainerOutput {
  candidate: string;
  candidateId?: string;
  delta: number;
  secondaryGain?: number | null;
  loss?: number;
  metadata?: TaskMetadata;
}

const validateOutput = compileOutputSchema<TrainerOutput>({
  type: "object",
  required: ["candidate", "delta"],
  properties: {
    candidate: { type: "string", minLength: 1 },
    candidateId: { type: "string", minLength: 1 },
    delta: { type: "number" },
    secondaryGain: { type: ["number", "null"] },
    loss: { type: "number" },
    metadata: { type: "object" }
  }
});

export interface MergeTaskOptions extends CommandSpec {
  name: string;
  estimatedCostJoules: number;
  gate: MergeGate;
  /** Candidates must resolve to a path strictly inside this directory. */
  candidatesDir: string;
}

/**
 * Trains a candidate with an external command, then hands it to the merge
 * gate. `ok` reports whether the candidate was promoted.
 */
export class MergeTask implements Task {
  readonly kind = "merge";
  readonly name: string;
  readonly estimatedCostJoules: number;

  constructor(private readonly options: MergeTaskOptions) {
    this.name = options.name;
    this.estimatedCostJoules = options.estimatedCostJoules;
  }

  async run(): Promise<TaskResult> {
    const output = await runJsonCommand(this.name, this.options, validateOutput);
    const candidatePath = path.resolve(this.options.cwd ?? process.cwd(), output.candidate);
    if (!isInsideDirectory(this.options.candidatesDir, candidatePath)) {
      throw new TaskExecutionError(
        this.name,
        `candidate ${candidatePath} is outside the candidates directory ${path.resolve(this.options.candidatesDir)}`,
        { exitCode: 0 }
      );
    }
    const candidateId = output.candidateId ?? path.basename(candidatePath);
    const decision = await this.options.gate.evaluate({
      id: candidateId,
      path: candidatePath,
      delta: output.delta,
      secondaryGain: output.secondaryGain
    });
    return {
      ok: decision.accepted,
      delta: Math.max(0, output.delta),
      loss: output.loss ?? 0,
      contentHash: decision.decisionHash,
      metadata: {
        ...output.metadata,
        candidateId,
        merge: { ...decision }
      }
    };
  }
}
