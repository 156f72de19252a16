import { spawn } from 'child_process';
import logger from '../../utils/logger';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Stream the command's output to this process's terminal instead of capturing it */
  inheritOutput?: boolean;
  env?: NodeJS.ProcessEnv;
}

/** Runs a system command to completion; rejects only when it cannot be started */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    logger.debug('run command', { command: formatCommand(command, args) });

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        env: options.env ?? { ...process.env, LC_ALL: 'C' },
        stdio: options.inheritOutput ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.once('error', reject);
      child.once('close', (code, signal) => {
        const exitCode = code ?? (signal ? 128 : 1);
        logger.debug('command finished', { command: formatCommand(command, args), exitCode });
        resolve({ exitCode, stdout, stderr });
      });
    });
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}
