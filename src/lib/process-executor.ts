import { spawn } from 'child_process';
import type { ProcessExecutor } from '../types.js';
import { CommandExecutionError } from './errors.js';

/**
 * Runs a command without a shell and resolves with its stdout.
 *
 * The exit status is ignored: nmcli and netsh exit non-zero on an ordinary
 * failed join, and callers decide success from the output text. Only a
 * failure to start the process rejects.
 */
export class ChildProcessExecutor implements ProcessExecutor {
  run(command: string, args: readonly string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, [...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
      const stdout: Buffer[] = [];
      let stderr = '';
      let failed = false;

      proc.stdout.on('data', (data: Buffer) => { stdout.push(data); });
      proc.stderr.on('data', (data: Buffer) => { stderr += data.toString('utf-8'); });

      proc.on('close', (code) => {
        // Already rejected by the error handler
        if (failed) return;
        if (code !== 0) {
          console.warn(`${command} exited with code ${code}`, { args: redact(args), stderr: stderr.trim() });
        }
        // Buffer#toString substitutes U+FFFD for invalid sequences
        resolve(Buffer.concat(stdout).toString('utf-8'));
      });

      proc.on('error', (err) => {
        failed = true;
        reject(new CommandExecutionError(command, args, err));
      });
    });
  }
}

// Keep passwords out of the log
function redact(args: readonly string[]): string[] {
  return args.map((arg, i) => (args[i - 1] === 'password' ? '***' : arg));
}
