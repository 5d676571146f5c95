/**
 * Command line parsing
 */

import { JOB_NAMES, type JobName } from './types/index.js';

export type Command =
  | { kind: 'service' }
  | { kind: 'run'; job: JobName }
  | { kind: 'status' }
  | { kind: 'reset'; job: JobName; cursor: number | null }
  | { kind: 'proposals' }
  | { kind: 'agent-runs'; limit: number }
  | { kind: 'apply-proposal'; id: number }
  | { kind: 'reject-proposal'; id: number };

const DEFAULT_RUN_LIMIT = 10;

export const USAGE = `Usage:
  node dist/index.js --service                 Run the scheduler (default)
  node dist/index.js --run=<job>               Run one job once and exit
  node dist/index.js --status                  Print job progress and story counts
  node dist/index.js --reset=<job>[:cursor]    Reset a job's progress
  node dist/index.js --proposals               List tag proposals awaiting approval
  node dist/index.js --agent-runs[=<limit>]    List recent taxonomy agent runs (default ${DEFAULT_RUN_LIMIT})
  node dist/index.js --apply-proposal=<id>     Apply a tag proposal
  node dist/index.js --reject-proposal=<id>    Reject a tag proposal

Jobs: ${JOB_NAMES.join(', ')}`;

function parseJob(value: string): JobName {
  const job = JOB_NAMES.find((name) => name === value);
  if (!job) {
    throw new Error(`Unknown job "${value}". Expected one of: ${JOB_NAMES.join(', ')}`);
  }
  return job;
}

function parseId(flag: string, value: string): number {
  const id = Number(value);
  if (value.trim() === '' || !Number.isInteger(id) || id < 0) {
    throw new Error(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return id;
}

/**
 * First recognized flag wins; no flag means service mode
 */
export function parseCommand(args: string[]): Command {
  for (const arg of args) {
    const [flag = '', value = ''] = arg.split('=', 2);

    switch (flag) {
      case '--service':
        return { kind: 'service' };
      case '--status':
        return { kind: 'status' };
      case '--proposals':
        return { kind: 'proposals' };
      case '--agent-runs':
        return { kind: 'agent-runs', limit: value === '' ? DEFAULT_RUN_LIMIT : parseId(flag, value) };
      case '--run':
        return { kind: 'run', job: parseJob(value) };
      case '--reset': {
        const [job = '', cursor] = value.split(':', 2);
        return {
          kind: 'reset',
          job: parseJob(job),
          cursor: cursor === undefined || cursor === '' ? null : parseId('--reset cursor', cursor),
        };
      }
      case '--apply-proposal':
        return { kind: 'apply-proposal', id: parseId(flag, value) };
      case '--reject-proposal':
        return { kind: 'reject-proposal', id: parseId(flag, value) };
    }
  }

  return { kind: 'service' };
}
