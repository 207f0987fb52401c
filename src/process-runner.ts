import { spawn, type ChildProcess } from 'child_process';
import { constants } from 'os';
import type { ProcessCommand } from './types';

export interface RunningProcess {
  readonly command: ProcessCommand;
  /**
   * Resolves with the exit code once the process has terminated
   */
  wait(): Promise<number>;
}

/**
 * Launches the external programs the entrypoint hands work to. Output of the
 * launched program goes to the entrypoint's own stdout and stderr.
 */
export interface ProcessRunner {
  run(command: ProcessCommand): Promise<number>;
  start(command: ProcessCommand): RunningProcess;
}

export class ChildProcessRunner implements ProcessRunner {
  private baseEnv: NodeJS.ProcessEnv;

  constructor(baseEnv: NodeJS.ProcessEnv = process.env) {
    this.baseEnv = baseEnv;
  }

  async run(command: ProcessCommand): Promise<number> {
    return this.start(command).wait();
  }

  start(command: ProcessCommand): RunningProcess {
    const child = spawn(command.program, command.args, {
      cwd: command.cwd,
      env: { ...this.baseEnv, ...command.env },
      stdio: 'inherit',
    });
    const exit = waitForExit(child, command.program);
    // A spawn failure is reported by wait(), however late it is called
    void exit.catch(() => undefined);

    return {
      command,
      wait: () => exit,
    };
  }
}

function waitForExit(child: ChildProcess, program: string): Promise<number> {
  return new Promise((resolve, reject) => {
    child.once('error', error => {
      reject(new Error(`Failed to start ${program}: ${error.message}`));
    });
    child.once('close', (code, signal) => {
      if (code !== null) {
        resolve(code);
      } else {
        // Killed by a signal: report it the way a shell does
        console.error(`⚠️  ${program} terminated by ${signal ?? 'unknown signal'}`);
        resolve(128 + signalNumber(signal));
      }
    });
  });
}

function signalNumber(signal: NodeJS.Signals | null): number {
  const match = Object.entries(constants.signals).find(([name]) => name === signal);
  return match ? match[1] : 0;
}
