import { describe, it, expect } from 'vitest';
import type { CommandResultEnvelope } from '@remote-exec/protocol';
import { CommandResult, NO_RESULT } from './command-result.js';

function envelope(data: CommandResultEnvelope['data']): CommandResultEnvelope {
  return { type: 'command_result', version: 1, magic: 'ue_py', source: 'peer', dest: 'local', data };
}

describe('CommandResult', () => {
  it('renders an empty string for a successful result without output', () => {
    const result = CommandResult.fromEnvelope(envelope({ success: true, result: '3', output: [] }));
    expect(result.success).toBe(true);
    expect(result.result).toBe('3');
    expect(result.toString()).toBe('');
  });

  it('renders output lines as kind: text', () => {
    const result = CommandResult.fromEnvelope(envelope({ success: true, output: [{ type: 'Log', output: 'hello' }] }));
    expect(result.toString()).toBe('Log: hello');
  });

  it('joins several output lines with newlines', () => {
    const result = CommandResult.fromEnvelope(
      envelope({
        success: true,
        output: [
          { type: 'Info', output: 'one' },
          { type: 'Warning', output: 'two' },
        ],
      })
    );
    expect(result.toString()).toBe('Info: one\nWarning: two');
  });

  it('renders the result string when unsuccessful', () => {
    const result = CommandResult.fromEnvelope(
      envelope({ success: false, result: "NameError: name 'x' is not defined", output: [{ type: 'Error', output: 'x' }] })
    );
    expect(result.toString()).toBe("NameError: name 'x' is not defined");
  });

  it('fills in defaults for missing fields', () => {
    const result = CommandResult.fromEnvelope(envelope({}));
    expect(result.success).toBe(false);
    expect(result.result).toBe(NO_RESULT);
    expect(result.output).toEqual([]);
    expect(result.timedOut).toBe(false);
    expect(result.sourceId).toBe('peer');
    expect(result.destId).toBe('local');
  });

  it('marks a missing reply as a timed out failure', () => {
    const result = CommandResult.timeout();
    expect(result.success).toBe(false);
    expect(result.timedOut).toBe(true);
    expect(result.toString()).toBe('None');
  });

  it('is immutable', () => {
    const result = new CommandResult({ success: true, output: [{ kind: 'Log', text: 'a' }] });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.output)).toBe(true);
  });

  it('serializes back to the wire field names', () => {
    const result = new CommandResult({ success: true, result: '3', output: [{ kind: 'Log', text: 'a' }] });
    expect(JSON.parse(JSON.stringify(result))).toEqual({
      success: true,
      result: '3',
      output: [{ type: 'Log', output: 'a' }],
      timedOut: false,
    });
  });
});
