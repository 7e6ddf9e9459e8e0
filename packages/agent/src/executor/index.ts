export { WorkerPool, PoolAbortError, type PoolJob, type SubmitOptions } from './worker-pool.js';
export {
  ToolRegistry,
  TOOL_NAME_SUFFIX,
  type ToolDefinition,
  type ToolHandler,
  type ToolInvoker,
} from './tool-registry.js';
export { TaskExecutor, dispatchOrder, type TaskExecutorConfig, type RunOptions } from './task-executor.js';
