export { TaskExecutionError, type Task, type TaskKind } from "./types";
export { InlineTask, defineTask, type TaskFn } from "./inlineTask";
export { CommandTask, type CommandTaskOptions } from "./commandTask";
export { MergeTask, type MergeTaskOptions } from "./mergeTask";
export { createTask, createTasks, type TaskFactoryContext } from "./factory";
export { runProcess, lastJsonLine, type CommandSpec, type CommandOutcome } from "./process";
