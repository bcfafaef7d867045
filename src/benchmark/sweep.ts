import type { Invocation, OptionSet } from '../types/index.js';

export const PROFILER_COMMAND = 'simpleperf stat';

/** Hardware/software counters recorded for every sweep run, in emission order. */
export const COUNTER_EVENTS = [
    'cpu-cycles',
    'instructions',
    'task-clock',
    'cpu-clock',
    'context-switches',
    'stalled-cycles-frontend',
    'stalled-cycles-backend',
    'cache-misses',
    'cache-references',
    'L1-dcache-loads',
    'L1-dcache-load-misses',
    'LLC-loads',
    'LLC-load-misses',
    'branch-misses',
    'branch-loads',
    'branch-load-misses',
    'major-faults',
    'minor-faults',
    'page-faults',
] as const;

export type CounterEvent = (typeof COUNTER_EVENTS)[number];

export const FIRST_TEST_MODE = 1;
export const LAST_TEST_MODE = 11;

/** Workload test modes visited by a sweep: 1 through 11, ascending. */
export const SWEEP_TEST_MODES: readonly number[] = Array.from(
    { length: LAST_TEST_MODE - FIRST_TEST_MODE + 1 },
    (_, i) => FIRST_TEST_MODE + i,
);

export function counterFlags(events: readonly string[] = COUNTER_EVENTS): string[] {
    return events.map((event) => `-e ${event}`);
}

export function buildSweepInvocation(remoteArtifactPath: string, testMode: number, options: OptionSet): Invocation {
    return [PROFILER_COMMAND, ...counterFlags(), remoteArtifactPath, `--test ${testMode}`, ...options];
}

export function buildSweepInvocations(remoteArtifactPath: string, options: OptionSet): Invocation[] {
    return SWEEP_TEST_MODES.map((mode) => buildSweepInvocation(remoteArtifactPath, mode, options));
}
