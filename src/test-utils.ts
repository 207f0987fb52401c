import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { ProcessRunner, RunningProcess } from './process-runner';
import type { ProcessCommand } from './types';

/**
 * Records every command instead of launching it. Exit codes are looked up by
 * program name and default to 0.
 */
export class RecordingProcessRunner implements ProcessRunner {
  readonly commands: ProcessCommand[] = [];
  private exitCodes: Map<string, number>;

  constructor(exitCodes: Record<string, number> = {}) {
    this.exitCodes = new Map(Object.entries(exitCodes));
  }

  async run(command: ProcessCommand): Promise<number> {
    this.commands.push(command);
    return this.exitCodeFor(command.program);
  }

  start(command: ProcessCommand): RunningProcess {
    this.commands.push(command);
    const exitCode = this.exitCodeFor(command.program);
    return {
      command,
      wait: async () => exitCode,
    };
  }

  programs(): string[] {
    return this.commands.map(c => c.program);
  }

  private exitCodeFor(program: string): number {
    return this.exitCodes.get(program) ?? 0;
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'wp-lamp-'));
}
