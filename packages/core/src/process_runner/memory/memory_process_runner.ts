/**
 * MemoryProcessRunner - scripted ExecCommand for unit tests
 *
 * Responses are matched by command and argument prefix, most recently
 * added rule first. Unmatched calls fail with exit code 1 so a missing
 * script shows up as a failed command rather than a hang.
 *
 * @module process_runner/memory
 */

import type { ExecCommand, ExecOptions, ExecResult } from '../process_runner.types';

export type RecordedCall = {
  command: string;
  args: string[];
  options: ExecOptions | undefined;
};

type Responder = ExecResult | ((call: RecordedCall) => ExecResult);

type Rule = {
  command: string;
  argsPrefix: string[];
  responder: Responder;
  once: boolean;
  used: boolean;
};

export class MemoryProcessRunner {
  private rules: Rule[] = [];
  private calls: RecordedCall[] = [];

  /** The function to inject wherever an `ExecCommand` is expected */
  readonly execCommand: ExecCommand = async (command, args, options) => {
    const call: RecordedCall = { command, args: [...args], options };
    this.calls.push(call);

    const rule = this.findRule(command, args);
    if (!rule) {
      return { exitCode: 1, stdout: '', stderr: `unscripted command: ${command} ${args.join(' ')}` };
    }

    rule.used = true;
    return typeof rule.responder === 'function' ? rule.responder(call) : { ...rule.responder };
  };

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /** Answer every call whose args start with `argsPrefix` */
  on(command: string, argsPrefix: string[], responder: Responder): this {
    this.rules.unshift({ command, argsPrefix, responder, once: false, used: false });
    return this;
  }

  /** Answer only the next matching call */
  once(command: string, argsPrefix: string[], responder: Responder): this {
    this.rules.unshift({ command, argsPrefix, responder, once: true, used: false });
    return this;
  }

  getCalls(): RecordedCall[] {
    return [...this.calls];
  }

  clear(): void {
    this.rules = [];
    this.calls = [];
  }

  private findRule(command: string, args: string[]): Rule | undefined {
    return this.rules.find((rule) =>
      rule.command === command &&
      !(rule.once && rule.used) &&
      rule.argsPrefix.every((arg, index) => args[index] === arg)
    );
  }
}

export function ok(stdout: string = ''): ExecResult {
  return { exitCode: 0, stdout, stderr: '' };
}

export function fail(stderr: string, exitCode: number = 128, stdout: string = ''): ExecResult {
  return { exitCode, stdout, stderr };
}
