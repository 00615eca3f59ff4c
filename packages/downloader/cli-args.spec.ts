import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './cli-args.js';
import { CliUsageError } from './errors.js';

describe('parseCliArgs', () => {
  it('should default to listing 10 episodes', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'run', episodeLimit: 10 });
  });

  it('should accept the episode count in every supported spelling', () => {
    expect(parseCliArgs(['-n', '2'])).toEqual({ kind: 'run', episodeLimit: 2 });
    expect(parseCliArgs(['--n', '25'])).toEqual({ kind: 'run', episodeLimit: 25 });
    expect(parseCliArgs(['-n=3'])).toEqual({ kind: 'run', episodeLimit: 3 });
    expect(parseCliArgs(['--n=4'])).toEqual({ kind: 'run', episodeLimit: 4 });
    expect(parseCliArgs(['-n7'])).toEqual({ kind: 'run', episodeLimit: 7 });
  });

  it('should let the last -n win', () => {
    expect(parseCliArgs(['-n', '2', '-n', '5'])).toEqual({ kind: 'run', episodeLimit: 5 });
  });

  it('should recognise version and help flags', () => {
    expect(parseCliArgs(['-v'])).toEqual({ kind: 'version' });
    expect(parseCliArgs(['--version'])).toEqual({ kind: 'version' });
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-n', '3', '--help'])).toEqual({ kind: 'help' });
  });

  it('should reject a missing or non-positive episode count', () => {
    expect(() => parseCliArgs(['-n'])).toThrow('Option -n requires a value');
    expect(() => parseCliArgs(['--n='])).toThrow('Option --n requires a value');
    expect(() => parseCliArgs(['-n', '0'])).toThrow('Invalid value for -n: "0" (expected a positive integer)');
    expect(() => parseCliArgs(['-n', 'ten'])).toThrow('Invalid value for -n: "ten" (expected a positive integer)');
    expect(() => parseCliArgs(['-n', '-3'])).toThrow('Invalid value for -n: "-3" (expected a positive integer)');
  });

  it('should reject unknown options and stray arguments', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseCliArgs(['doctor'])).toThrow('Unexpected argument: doctor');
  });
});
