/**
 * In-process CommandRunner for tests
 * Records every call and answers from scripted results keyed by command line.
 */

import type { CommandResult, CommandRunner, RunOptions } from '../core/system/command-runner';
import { formatCommand } from '../core/system/command-runner';

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Responder = CommandResult | ((call: RecordedCall) => CommandResult);

export function result(exitCode: number, stdout = '', stderr = ''): CommandResult {
  return { exitCode, stdout, stderr };
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Array<{ matcher: string | RegExp; responses: Responder[] }> = [];

  constructor(private readonly fallback: CommandResult = result(0)) {}

  /**
   * Queues responses for a command line (exact text or pattern); the last one repeats.
   * The first matching rule wins.
   */
  on(matcher: string | RegExp, ...responses: Responder[]): this {
    this.rules.push({ matcher, responses });
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args, options };
    this.calls.push(call);

    const line = formatCommand(command, args);
    const queue = this.rules.find(({ matcher }) =>
      typeof matcher === 'string' ? matcher === line : matcher.test(line)
    )?.responses;
    if (!queue || queue.length === 0) {
      return this.fallback;
    }
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next === undefined) {
      return this.fallback;
    }
    return typeof next === 'function' ? next(call) : next;
  }

  commandLines(): string[] {
    return this.calls.map((call) => formatCommand(call.command, call.args));
  }
}
