import type { CommandRunner, RunOptions, RunResult } from '../../src/utils/command-runner.js';

export type RecordedCall = {
  command: string;
  args: string[];
  options: RunOptions;
};

type Responder = RunResult | ((call: RecordedCall) => RunResult);

export const ok = (stdout = ''): RunResult => ({ exitCode: 0, stdout, stderr: '' });
export const fail = (exitCode = 1): RunResult => ({ exitCode, stdout: '', stderr: '' });

/**
 * Records every invocation. Responses are keyed by "command arg1 arg2";
 * anything unmatched exits 0 with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly tools: Set<string>;
  private readonly responses = new Map<string, Responder>();

  constructor(tools: string[] = []) {
    this.tools = new Set(tools);
  }

  respond(commandLine: string, responder: Responder): this {
    this.responses.set(commandLine, responder);
    return this;
  }

  has(command: string): boolean {
    return this.tools.has(command);
  }

  run(command: string, args: string[], options: RunOptions = {}): RunResult {
    const call = { command, args, options };
    this.calls.push(call);
    const responder = this.responses.get([command, ...args].join(' '));
    if (!responder) {
      return ok();
    }
    return typeof responder === 'function' ? responder(call) : responder;
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}
