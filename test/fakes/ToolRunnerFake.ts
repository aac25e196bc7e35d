import { type Result, err, ok } from "~shared/utils/Result";

import type { ToolError, ToolOutput, ToolRunner } from "@/services/Run/ToolRunner";

export type ToolCall = { command: string; args: string[] };

export class ToolRunnerFake implements ToolRunner {
  readonly calls: ToolCall[] = [];
  private readonly failures = new Set<number>();
  private onRun?: (call: ToolCall) => Promise<void> | void;

  /** 第 n 次呼叫（從 0 起算）回傳失敗 */
  failCall(n: number) {
    this.failures.add(n);
  }

  setOnRun(fn: (call: ToolCall) => Promise<void> | void) {
    this.onRun = fn;
  }

  async run(
    command: string,
    args: readonly string[],
    options?: { signal?: AbortSignal }
  ): Promise<Result<ToolOutput, ToolError>> {
    const call = { command, args: [...args] };
    const n = this.calls.length;
    this.calls.push(call);
    await this.onRun?.(call);
    if (options?.signal?.aborted) {
      return err({ type: "TOOL_ABORTED", command, message: "aborted" });
    }
    if (this.failures.has(n)) {
      return err({ type: "TOOL_FAILED", command, exitCode: 1, message: "boom" });
    }
    return ok({ stdout: "", stderr: "" });
  }
}
