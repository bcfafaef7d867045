import type { BenchmarkConfig, Invocation, OptionSet } from '../types/index.js';

export const DEFAULT_SIZE = 1024;

/**
 * Flags for the remote binary. `--size` is always present; `--check` only
 * when result verification is requested.
 */
export function buildOptions(config: BenchmarkConfig): OptionSet {
    const options = [`--size ${config.size}`];
    if (config.check) {
        options.push('--check');
    }
    return options;
}

/** Plain run: the artifact followed by its options. */
export function buildInvocation(remoteArtifactPath: string, options: OptionSet): Invocation {
    return [remoteArtifactPath, ...options];
}
