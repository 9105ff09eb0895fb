import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Runs an external tool and resolves with its stdout. */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<string>;
}

export class ExecFileRunner implements CommandRunner {
  constructor(private timeoutMs: number) {}

  async run(command: string, args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(command, args, {
      timeout: this.timeoutMs,
      encoding: "utf-8",
      maxBuffer: 4 * 1024 * 1024,
      windowsHide: true,
    });
    return stdout;
  }
}
