import type { CommandResultEnvelope } from '@remote-exec/protocol';

/** Result string reported when the peer sent none */
export const NO_RESULT = 'None';

export interface CommandOutput {
  readonly kind: string;
  readonly text: string;
}

export interface CommandResultInit {
  success?: boolean;
  result?: string;
  output?: readonly CommandOutput[];
  timedOut?: boolean;
  sourceId?: string;
  destId?: string;
}

/**
 * Outcome of one command. Failures are data; callers that want exceptions
 * pass `raiseOnFailure` to send().
 */
export class CommandResult {
  readonly success: boolean;
  readonly result: string;
  readonly output: readonly CommandOutput[];
  readonly timedOut: boolean;
  readonly sourceId?: string;
  readonly destId?: string;

  constructor(init: CommandResultInit = {}) {
    this.success = init.success ?? false;
    this.result = init.result ?? NO_RESULT;
    this.output = Object.freeze((init.output ?? []).map((entry) => Object.freeze({ ...entry })));
    this.timedOut = init.timedOut ?? false;
    this.sourceId = init.sourceId;
    this.destId = init.destId;
    Object.freeze(this);
  }

  static fromEnvelope(envelope: CommandResultEnvelope): CommandResult {
    const { data } = envelope;
    return new CommandResult({
      success: data.success,
      result: data.result,
      output: (data.output ?? []).map((entry) => ({ kind: entry.type, text: entry.output })),
      sourceId: envelope.source,
      destId: envelope.dest,
    });
  }

  /** The result of a command whose reply never arrived. */
  static timeout(): CommandResult {
    return new CommandResult({ timedOut: true });
  }

  /** Output lines when successful, otherwise the result string. */
  toString(): string {
    if (!this.success) return this.result;
    return this.output.map((entry) => `${entry.kind}: ${entry.text}`).join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      success: this.success,
      result: this.result,
      output: this.output.map((entry) => ({ type: entry.kind, output: entry.text })),
      timedOut: this.timedOut,
    };
  }
}
