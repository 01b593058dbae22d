/**
 * Toolchain Services Index
 */

export { ChildProcessToolRunner, runChecked } from './tool-runner';
export type { ToolRunner, ToolRunOptions, ToolResult, ChildProcessToolRunnerConfig } from './tool-runner';
export { parseDiagnostics, hasErrors } from './diagnostics';
