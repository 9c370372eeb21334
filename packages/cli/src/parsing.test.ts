import { describe, expect, it } from 'vitest';
import { EXIT_USAGE_ERROR } from './constants.js';
import { parseRunInput, validateCommandOptions } from './parsing.js';
import { createCapturedIo } from './test-support.js';

const config = {
  commandName: 'history',
  usage: 'Usage: test',
  allowedOptions: ['run'],
  flagOptions: ['json'],
};

describe('validateCommandOptions', () => {
  it('reads inline values, next-argument values and flags', () => {
    const captured = createCapturedIo();

    const result = validateCommandOptions(['--run', 'run-1', '--json'], config, captured.io);
    const inline = validateCommandOptions(['--run=run-2'], config, captured.io);

    expect(result).toEqual({ ok: true, options: new Map([['run', 'run-1'], ['json', 'true']]), positionals: [] });
    expect(inline).toEqual({ ok: true, options: new Map([['run', 'run-2']]), positionals: [] });
    expect(captured.stderr).toEqual([]);
  });

  it('rejects a bare double dash', () => {
    const captured = createCapturedIo();

    const result = validateCommandOptions(['--'], config, captured.io);

    expect(result).toEqual({ ok: false, exitCode: EXIT_USAGE_ERROR });
    expect(captured.stderr).toEqual(['Option name cannot be empty.', 'Usage: test']);
  });

  it.each([
    { args: ['--run', 'a', '--run', 'b'], message: 'Option "--run" cannot be provided more than once.' },
    { args: ['--run'], message: 'Option "--run" requires a value.' },
    { args: ['--run='], message: 'Option "--run" requires a value.' },
    { args: ['--run', '--json'], message: 'Option "--run" requires a value.' },
    { args: ['--limit', '5'], message: 'Unknown option for "history": --limit' },
    { args: ['extra'], message: 'Unexpected positional arguments for "history": extra' },
  ])('reports $args as a usage error', ({ args, message }) => {
    const captured = createCapturedIo();

    expect(validateCommandOptions(args, config, captured.io)).toEqual({ ok: false, exitCode: EXIT_USAGE_ERROR });
    expect(captured.stderr).toEqual([message, 'Usage: test']);
  });

  it('requires the declared positionals', () => {
    const captured = createCapturedIo();

    const result = validateCommandOptions([], { ...config, positionalCount: 1 }, captured.io);

    expect(result).toEqual({ ok: false, exitCode: EXIT_USAGE_ERROR });
    expect(captured.stderr[0]).toBe('Missing required positional argument for "history".');
  });
});

describe('parseRunInput', () => {
  it('accepts JSON objects and single-quoted JSON', () => {
    expect(parseRunInput('{"expression": "2 + 3"}')).toEqual({ ok: true, value: { expression: '2 + 3' } });
    expect(parseRunInput("{'expression': '4 * 5'}")).toEqual({ ok: true, value: { expression: '4 * 5' } });
  });

  it('rejects values that are not objects', () => {
    expect(parseRunInput('[1, 2]')).toEqual({ ok: false, message: 'Run input must be a JSON object.' });
  });
});
