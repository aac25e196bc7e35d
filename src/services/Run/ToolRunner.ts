import type { Result } from "~shared/utils/Result";

export type ToolOutput = { stdout: string; stderr: string };

export type ToolError =
  | { type: "TOOL_FAILED"; command: string; exitCode?: number; message: string }
  | { type: "TOOL_ABORTED"; command: string; message: string };

/** 執行外部程式（批次處理工具、orbitviz） */
export interface ToolRunner {
  run(
    command: string,
    args: readonly string[],
    options?: { cwd?: string; signal?: AbortSignal }
  ): Promise<Result<ToolOutput, ToolError>>;
}
