import fs from 'fs';
import os from 'os';
import path from 'path';
import { Writable } from 'stream';
import { ExecutionError, TransferError } from '../../src/bridge/BridgeError.js';
import { SimulatedDeviceBridge } from '../../src/bridge/SimulatedDeviceBridge.js';

function collectingSink() {
    const chunks: string[] = [];
    const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk.toString('utf-8'));
            callback();
        },
    });
    return { sink, text: () => chunks.join('') };
}

describe('SimulatedDeviceBridge', () => {
    test('should report its version and devices', async () => {
        const bridge = new SimulatedDeviceBridge({ devices: ['sim-1', 'sim-2'], version: 'sim 2.0' });

        await expect(bridge.version()).resolves.toBe('sim 2.0');
        await expect(bridge.devices()).resolves.toEqual(['sim-1', 'sim-2']);
    });

    test('should default to no devices', async () => {
        await expect(new SimulatedDeviceBridge().devices()).resolves.toEqual([]);
    });

    test('should hand out copies of the device list', async () => {
        const bridge = new SimulatedDeviceBridge({ devices: ['sim-1'] });
        const first = await bridge.devices();
        first.push('sim-9');
        await expect(bridge.devices()).resolves.toEqual(['sim-1']);
    });

    test('should record pushes and resolve directory destinations', async () => {
        const bridge = new SimulatedDeviceBridge({ devices: ['sim-1'], fileExists: () => true });
        const session = bridge.setDevice('sim-1');

        await session.push('output/bench', '/data/local/tmp/');
        await session.push('output/data.bin', '/sdcard/input.bin');

        expect(bridge.pushes).toEqual([
            { target: 'sim-1', localPath: 'output/bench', remotePath: '/data/local/tmp/' },
            { target: 'sim-1', localPath: 'output/data.bin', remotePath: '/sdcard/input.bin' },
        ]);
        expect([...bridge.files]).toEqual(['/data/local/tmp/bench', '/sdcard/input.bin']);
    });

    test('should refuse to push a local file that does not exist', async () => {
        const bridge = new SimulatedDeviceBridge({ devices: ['sim-1'] });
        const missing = path.join(os.tmpdir(), 'devbench-missing', 'bench');

        const err = await bridge.setDevice('sim-1').push(missing, '/data/local/tmp/').catch((e: unknown) => e);

        expect(err).toBeInstanceOf(TransferError);
        expect(err).toMatchObject({ localPath: missing, message: `Local file not found: ${missing}` });
        expect(bridge.pushes).toHaveLength(0);
        expect(bridge.files.size).toBe(0);
    });

    test('should push a local file found on disk', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'devbench-sim-'));
        const artifact = path.join(dir, 'bench');
        fs.writeFileSync(artifact, 'binary');
        try {
            const bridge = new SimulatedDeviceBridge({ devices: ['sim-1'] });
            await bridge.setDevice('sim-1').push(artifact, '/data/local/tmp/');
            expect([...bridge.files]).toEqual(['/data/local/tmp/bench']);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    test('should consult the fileExists option', async () => {
        const seen: string[] = [];
        const bridge = new SimulatedDeviceBridge({
            devices: ['sim-1'],
            fileExists: (localPath) => {
                seen.push(localPath);
                return localPath === 'output/bench';
            },
        });
        const session = bridge.setDevice('sim-1');

        await session.push('output/bench', '/data/local/tmp/');
        await expect(session.push('output/other', '/data/local/tmp/')).rejects.toBeInstanceOf(TransferError);
        expect(seen).toEqual(['output/bench', 'output/other']);
    });

    test('should stream responder output and return its exit code', async () => {
        const { sink, text } = collectingSink();
        const bridge = new SimulatedDeviceBridge({
            devices: ['sim-1'],
            output: sink,
            responder: (tokens, target) => ({ output: `${target}:${tokens.join('|')}\n`, exitCode: 7 }),
        });

        const result = await bridge.setDevice('sim-1').shell(['echo', 'hi there']);

        expect(result).toEqual({ exitCode: 7 });
        expect(text()).toBe('sim-1:echo|hi there\n');
        expect(bridge.commands).toEqual([{ target: 'sim-1', tokens: ['echo', 'hi there'] }]);
    });

    test('should address commands to the most recent binding', async () => {
        const bridge = new SimulatedDeviceBridge({ devices: ['sim-1', 'sim-2'] });
        await bridge.setDevice('sim-1').shell(['true']);
        await bridge.setDevice('sim-2').shell(['true']);

        expect(bridge.getDevice()).toBe('sim-2');
        expect(bridge.commands.map((c) => c.target)).toEqual(['sim-1', 'sim-2']);
    });

    test('should inject a push fault', async () => {
        const bridge = new SimulatedDeviceBridge({ devices: ['sim-1'], pushFault: 'usb reset' });

        await expect(bridge.setDevice('sim-1').push('a', '/b')).rejects.toThrow(TransferError);
        await expect(bridge.setDevice('sim-1').push('a', '/b')).rejects.toThrow('usb reset');
        expect(bridge.pushes).toHaveLength(0);
    });

    test('should fail only the configured shell call', async () => {
        const bridge = new SimulatedDeviceBridge({ devices: ['sim-1'], shellFaultAt: 1 });
        const session = bridge.setDevice('sim-1');

        await expect(session.shell(['first'])).resolves.toEqual({ exitCode: 0 });
        await expect(session.shell(['second'])).rejects.toBeInstanceOf(ExecutionError);
        await expect(session.shell(['third'])).resolves.toEqual({ exitCode: 0 });
        expect(bridge.commands.map((c) => c.tokens[0])).toEqual(['first', 'third']);
    });
});
