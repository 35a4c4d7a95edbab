import { execFile } from "node:child_process";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export class CommandExecutionError extends Error {
  readonly command: string;
  readonly args: readonly string[];

  constructor(message: string, command: string, args: readonly string[]) {
    super(message);
    this.name = "CommandExecutionError";
    this.command = command;
    this.args = args;
  }
}

export type CommandOptions = {
  cwd?: string;
};

/**
 * Runs an external program to completion.
 *
 * Resolves for every process that exits on its own, whatever its exit code; rejects with
 * {@link CommandExecutionError} when the program cannot be started or is killed.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

export class ExecCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        [...args],
        {
          encoding: "utf8",
          maxBuffer: 1024 * 1024 * 64,
          ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
        },
        (error, stdout, stderr) => {
          if (error === null) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }

          if (typeof error.code === "number") {
            resolve({ exitCode: error.code, stdout, stderr });
            return;
          }

          reject(new CommandExecutionError(error.message, command, args));
        },
      );
    });
  }
}
