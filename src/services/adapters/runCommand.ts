import { spawn } from 'node:child_process';
import { ExternalToolError } from '../../errors';
import { debugQcLog } from '../../utils/debugQc';

export type CommandResult = { stdout: string; stderr: string };

/**
 * Run an external tool to completion. Rejects with ExternalToolError on a
 * non-zero exit or when the executable cannot be started.
 */
export function runCommand(command: string, args: readonly string[], debug = false): Promise<CommandResult> {
  debugQcLog('exec', { command, args }, debug);

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new ExternalToolError(command, code, stderr));
      }
    });

    child.on('error', (error) => {
      reject(new ExternalToolError(command, null, `failed to start: ${error.message}`));
    });
  });
}
