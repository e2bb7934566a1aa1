export { Controller, type ControllerOptions } from "./controller.js";
export { createExecutor, type Executor, type ExecutorOptions, type OperationCommand } from "./executor.js";
