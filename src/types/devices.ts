/**
 * Device inventory interfaces
 */

export type DeviceCondition = 'ok' | 'maintenance' | 'missing';

export const DEVICE_CONDITIONS: readonly DeviceCondition[] = ['ok', 'maintenance', 'missing'];

export interface Device {
  id: string;
  address: string;
  hostname: string;
  brand: string;
  os: string;
  condition: DeviceCondition;
}

export interface InventorySource {
  listDevices(): Promise<Device[]>;
}
