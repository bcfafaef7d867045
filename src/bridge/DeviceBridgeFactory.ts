import type { Writable } from 'stream';
import type winston from 'winston';
import { AdbDeviceBridgeBuilder } from './AdbDeviceBridge.js';
import { SimulatedDeviceBridge } from './SimulatedDeviceBridge.js';
import type { DeviceBridge } from './DeviceBridge.js';
import type { HarnessConfig } from '../types/index.js';

/**
 * Creates the bridge selected by `config.bridge`. The simulated bridge echoes
 * each command line to `output` and reports success.
 */
export function createDeviceBridge(
    config: Pick<HarnessConfig, 'bridge' | 'adbPath' | 'simulatedDevices'>,
    logger: winston.Logger,
    output: Writable = process.stdout,
): DeviceBridge {
    switch (config.bridge) {
        case 'adb':
            return new AdbDeviceBridgeBuilder()
                .withAdbPath(config.adbPath)
                .withOutput(output)
                .withLogger(logger)
                .build();
        case 'simulated':
            return new SimulatedDeviceBridge({
                devices: [...config.simulatedDevices],
                output,
                responder: (tokens, target) => ({ output: `[${target}] $ ${tokens.join(' ')}\n`, exitCode: 0 }),
            });
    }
}
