export * from './protocol/types';
export * from './protocol/errors';
export * from './protocol/presets';
export * from './protocol/validation';

export { createDeviceServer } from './device/server';
export type { DeviceServer, DeviceServerOptions } from './device/server';
export { CameraService } from './device/modules/camera/CameraService';
export { SimulatedTransmitter } from './device/modules/camera/SimulatedTransmitter';
export type { CameraControl, StreamTransmitter } from './device/modules/camera/types';
export { ServiceAdvertiser } from './device/advertiser';

export { createConsoleServer } from './console/server';
export type { ConsoleServer } from './console/server';
export { DeviceClient, createDeviceClient } from './console/modules/fleet/DeviceClient';
export type { DeviceApi, DeviceApiFactory } from './console/modules/fleet/DeviceClient';
export { DeviceRegistry } from './console/modules/fleet/DeviceRegistry';
export { DiscoveryService } from './console/modules/fleet/DiscoveryService';
export { BonjourBrowser } from './console/modules/fleet/ServiceBrowser';
export type { ServiceBrowser } from './console/modules/fleet/ServiceBrowser';
export { CommandOrchestrator } from './console/modules/fleet/CommandOrchestrator';
export { ProfileStore } from './console/modules/fleet/ProfileStore';
export { TelemetrySubscriber } from './console/modules/fleet/TelemetrySubscriber';
export * from './console/modules/fleet/types';

export { loadDeviceConfig, loadConsoleConfig } from './utils/config';
export type { DeviceConfig, ConsoleConfig } from './utils/config';
