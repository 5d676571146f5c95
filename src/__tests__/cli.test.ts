import { describe, it, expect } from 'vitest';
import { parseCommand } from '../cli.js';

describe('parseCommand', () => {
  it('defaults to service mode', () => {
    expect(parseCommand([])).toEqual({ kind: 'service' });
    expect(parseCommand(['--verbose'])).toEqual({ kind: 'service' });
  });

  it('parses a single job run', () => {
    expect(parseCommand(['--run=backfill'])).toEqual({ kind: 'run', job: 'backfill' });
  });

  it('rejects unknown jobs', () => {
    expect(() => parseCommand(['--run=digest'])).toThrow(
      'Unknown job "digest". Expected one of: continuous, backfill, recovery, taxonomy'
    );
  });

  it('parses a reset with and without a cursor', () => {
    expect(parseCommand(['--reset=continuous'])).toEqual({ kind: 'reset', job: 'continuous', cursor: null });
    expect(parseCommand(['--reset=backfill:4200'])).toEqual({ kind: 'reset', job: 'backfill', cursor: 4200 });
  });

  it('rejects a malformed reset cursor', () => {
    expect(() => parseCommand(['--reset=backfill:abc'])).toThrow(
      '--reset cursor expects a non-negative integer, got "abc"'
    );
  });

  it('parses proposal commands', () => {
    expect(parseCommand(['--proposals'])).toEqual({ kind: 'proposals' });
    expect(parseCommand(['--apply-proposal=7'])).toEqual({ kind: 'apply-proposal', id: 7 });
    expect(parseCommand(['--reject-proposal=8'])).toEqual({ kind: 'reject-proposal', id: 8 });
  });

  it('parses the agent run listing with an optional limit', () => {
    expect(parseCommand(['--agent-runs'])).toEqual({ kind: 'agent-runs', limit: 10 });
    expect(parseCommand(['--agent-runs=3'])).toEqual({ kind: 'agent-runs', limit: 3 });
    expect(() => parseCommand(['--agent-runs=all'])).toThrow('--agent-runs expects a non-negative integer, got "all"');
  });

  it('rejects a missing proposal id', () => {
    expect(() => parseCommand(['--apply-proposal'])).toThrow('--apply-proposal expects a non-negative integer, got ""');
  });

  it('uses the first recognized flag', () => {
    expect(parseCommand(['--status', '--run=continuous'])).toEqual({ kind: 'status' });
  });
});
