import { buildInvocation, buildOptions, DEFAULT_SIZE } from '../../src/benchmark/options.js';

describe('buildOptions', () => {
    test('should always emit a single --size token', () => {
        expect(buildOptions({ size: 1024, check: false, debugSweep: false })).toEqual(['--size 1024']);
        expect(buildOptions({ size: 64, check: false, debugSweep: true })).toEqual(['--size 64']);
    });

    test('should append --check exactly once when verification is requested', () => {
        const options = buildOptions({ size: 512, check: true, debugSweep: false });
        expect(options).toEqual(['--size 512', '--check']);
        expect(options.filter((o) => o === '--check')).toHaveLength(1);
    });

    test('should leave --check out when verification is off', () => {
        expect(buildOptions({ size: 2048, check: false, debugSweep: false })).not.toContain('--check');
    });

    test('should default size to 1024', () => {
        expect(DEFAULT_SIZE).toBe(1024);
    });
});

describe('buildInvocation', () => {
    test('should put the artifact first and the options after it', () => {
        expect(buildInvocation('/data/local/tmp/MatrixMultiplication', ['--size 512', '--check'])).toEqual([
            '/data/local/tmp/MatrixMultiplication',
            '--size 512',
            '--check',
        ]);
    });
});
