/**
 * In-process stand-in for executeCommand, for tests that must not spawn tools.
 */

import { LineSplitter, type CommandOptions, type CommandResult, type CommandRunner } from './command.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: CommandOptions;
}

export type FakeResponse = Partial<CommandResult>;

export type FakeHandler = (call: RecordedCall) => FakeResponse | Promise<FakeResponse>;

export interface FakeRunner {
  run: CommandRunner;
  calls: RecordedCall[];
}

/**
 * Build a CommandRunner whose behaviour is decided by `handler`. The stdout
 * and stderr of the response are fed to the line callbacks before resolving.
 */
export function createFakeRunner(handler: FakeHandler): FakeRunner {
  const calls: RecordedCall[] = [];

  const run: CommandRunner = async (command, args, options = {}) => {
    const call: RecordedCall = { command, args: [...args], options };
    calls.push(call);

    const response = await handler(call);
    const result: CommandResult = {
      exitCode: 0,
      stdout: '',
      stderr: '',
      duration: 0,
      timedOut: false,
      aborted: false,
      ...response,
    };

    if (options.onStdoutLine) {
      const splitter = new LineSplitter(options.onStdoutLine);
      splitter.push(result.stdout);
      splitter.flush();
    }
    if (options.onStderrLine) {
      const splitter = new LineSplitter(options.onStderrLine);
      splitter.push(result.stderr);
      splitter.flush();
    }

    return result;
  };

  return { run, calls };
}

/**
 * Resolves once the signal aborts, the way a killed process would
 */
export function waitForAbort(signal: AbortSignal | undefined): Promise<FakeResponse> {
  return new Promise(resolve => {
    const done = () => resolve({ exitCode: 255, aborted: true });
    if (!signal) return;
    if (signal.aborted) {
      done();
      return;
    }
    signal.addEventListener('abort', done, { once: true });
  });
}
