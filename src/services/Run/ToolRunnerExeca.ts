import { execa } from "execa";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { ToolError, ToolOutput, ToolRunner } from "./ToolRunner";

export class ToolRunnerExeca implements ToolRunner {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.extend("ToolRunner");
  }

  async run(
    command: string,
    args: readonly string[],
    options?: { cwd?: string; signal?: AbortSignal }
  ): Promise<Result<ToolOutput, ToolError>> {
    const commandLine = [command, ...args].join(" ");
    this.logger.debug({ event: "exec" })`執行命令: ${commandLine}`;

    const result = await execa(command, args, {
      cwd: options?.cwd,
      signal: options?.signal,
      reject: false,
    });

    if (result.isCanceled) {
      return err({
        type: "TOOL_ABORTED",
        command: commandLine,
        message: `已中止: ${command}`,
      });
    }
    if (result.failed) {
      const stderrTail = result.stderr.split("\n").slice(-10).join("\n");
      return err({
        type: "TOOL_FAILED",
        command: commandLine,
        exitCode: result.exitCode,
        message: `${command} 執行失敗 (exit ${result.exitCode}): ${stderrTail}`,
      });
    }
    return ok({ stdout: result.stdout, stderr: result.stderr });
  }
}
