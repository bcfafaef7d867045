export * from './types/index.js';
export type { DeviceBridge, DeviceSession } from './bridge/DeviceBridge.js';
export { BridgeError, DiscoveryEmptyError, ExecutionError, TransferError } from './bridge/BridgeError.js';
export type { BridgeErrorCode } from './bridge/BridgeError.js';
export { AdbDeviceBridge, AdbDeviceBridgeBuilder, parseDeviceList } from './bridge/AdbDeviceBridge.js';
export { SimulatedDeviceBridge } from './bridge/SimulatedDeviceBridge.js';
export type { SimulatedDeviceBridgeOptions, SimulatedShellReply, SimulatedShellResponder } from './bridge/SimulatedDeviceBridge.js';
export { createDeviceBridge } from './bridge/DeviceBridgeFactory.js';
export { BenchmarkOrchestrator, planInvocations, remoteArtifactPath } from './benchmark/BenchmarkOrchestrator.js';
export type { OrchestratorConfig } from './benchmark/BenchmarkOrchestrator.js';
export { buildInvocation, buildOptions, DEFAULT_SIZE } from './benchmark/options.js';
export { COUNTER_EVENTS, PROFILER_COMMAND, SWEEP_TEST_MODES, buildSweepInvocation, buildSweepInvocations, counterFlags } from './benchmark/sweep.js';
export type { CounterEvent } from './benchmark/sweep.js';
export { ConfigError } from './config/ConfigError.js';
export { defaultConfig, loadConfigFile, parseArgs, resolveConfig } from './config/HarnessConfig.js';
export { createLogger } from './utils/logger.js';
