import type { TaskConfig } from "@joulegate/shared";
import type { MergeGate } from "../merge/gate";
import type { PolicyEntry } from "../scheduler/policy";
import { CommandTask } from "./commandTask";
import { MergeTask } from "./mergeTask";
import type { Task } from "./types";

export interface TaskFactoryContext {
  gate: MergeGate;
  /** Exposed to merge commands as JOULEGATE_BASE_DIR and JOULEGATE_CANDIDATES_DIR. */
  mergeDirs: { baseDir: string; candidatesDir: string };
}

export function createTask(config: TaskConfig, context: TaskFactoryContext): Task {
  const spec = {
    name: config.name,
    estimatedCostJoules: config.estimatedCostJoules,
    command: config.command,
    args: [...config.args],
    cwd: config.cwd,
    env: config.env ? { ...config.env } : undefined
  };
  switch (config.kind) {
    case "command":
      return new CommandTask(spec);
    case "merge": {
      const { baseDir, candidatesDir } = context.mergeDirs;
      const dirs = { JOULEGATE_BASE_DIR: baseDir, JOULEGATE_CANDIDATES_DIR: candidatesDir };
      return new MergeTask({ ...spec, env: { ...dirs, ...spec.env }, gate: context.gate, candidatesDir });
    }
  }
}

/** Policy entries for the configured tasks. */
export function createTasks(configs: readonly TaskConfig[], context: TaskFactoryContext): PolicyEntry[] {
  return configs.map(config => ({ minBudgetJoules: config.minBudgetJoules, task: createTask(config, context) }));
}
