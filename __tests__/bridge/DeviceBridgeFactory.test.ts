import { Writable } from 'stream';
import { AdbDeviceBridge } from '../../src/bridge/AdbDeviceBridge.js';
import { createDeviceBridge } from '../../src/bridge/DeviceBridgeFactory.js';
import { SimulatedDeviceBridge } from '../../src/bridge/SimulatedDeviceBridge.js';
import { silentLogger } from '../helpers/silentLogger.js';

describe('createDeviceBridge', () => {
    test('should build an adb bridge for the adb kind', () => {
        const bridge = createDeviceBridge(
            { bridge: 'adb', adbPath: 'adb', simulatedDevices: [] },
            silentLogger(),
        );
        expect(bridge).toBeInstanceOf(AdbDeviceBridge);
        expect(bridge.getDevice()).toBeNull();
    });

    test('should build a simulated bridge that echoes commands', async () => {
        const chunks: string[] = [];
        const output = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                chunks.push(chunk.toString('utf-8'));
                callback();
            },
        });

        const bridge = createDeviceBridge(
            { bridge: 'simulated', adbPath: 'adb', simulatedDevices: ['emulator-5554', 'emulator-5556'] },
            silentLogger(),
            output,
        );

        expect(bridge).toBeInstanceOf(SimulatedDeviceBridge);
        await expect(bridge.devices()).resolves.toEqual(['emulator-5554', 'emulator-5556']);
        const result = await bridge.setDevice('emulator-5554').shell(['chmod', '777', '/data/local/tmp/bench']);
        expect(result).toEqual({ exitCode: 0 });
        expect(chunks.join('')).toBe('[emulator-5554] $ chmod 777 /data/local/tmp/bench\n');
    });
});
