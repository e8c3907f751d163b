import { spawn } from 'node:child_process';

export interface ProcessResult {
  /** null when the process could not be started or was killed. */
  exitCode: number | null;
  /** stdout and stderr, interleaved in arrival order. */
  output: string;
}

export interface ProcessOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: ProcessOptions): Promise<ProcessResult>;
}

const MAX_CAPTURED_OUTPUT = 64_000;

/**
 * Spawns with an argv array (no shell) and never rejects: spawn errors and
 * timeouts come back as a null exit code with the reason in `output`.
 */
export const spawnProcessRunner: ProcessRunner = {
  run(command, args, options = {}) {
    return new Promise((resolve) => {
      let output = '';
      let settled = false;
      const append = (data: Buffer) => {
        if (output.length < MAX_CAPTURED_OUTPUT) {
          output += data.toString();
        }
      };
      const settle = (result: ProcessResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const proc = spawn(command, args, {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      proc.stdout.on('data', append);
      proc.stderr.on('data', append);

      proc.on('error', (err) => {
        settle({ exitCode: null, output: `${output}Failed to start ${command}: ${err.message}` });
      });

      proc.on('close', (code, signal) => {
        settle({
          exitCode: code,
          output: signal ? `${output}Terminated by ${signal}` : output,
        });
      });
    });
  },
};
