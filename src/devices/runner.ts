/**
 * Process execution seam for the Xcode toolchain
 */
import execa from 'execa';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved */
  all: string;
}

export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

/**
 * Runs commands with execa. Non-zero exits resolve; callers decide what a failure means.
 */
export class ExecaRunner implements CommandRunner {
  constructor(private readonly cwd?: string) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    const result = await execa(command, args, { cwd: this.cwd, reject: false, all: true });
    return {
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : 1,
      stdout: result.stdout,
      stderr: result.stderr,
      all: result.all ?? `${result.stdout}\n${result.stderr}`,
    };
  }
}
