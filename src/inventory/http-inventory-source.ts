/**
 * Inventory source backed by an HTTP endpoint returning device records
 */

import axios, { AxiosInstance } from 'axios';
import { Device, InventorySource, Logger } from '../types';
import { logger as rootLogger } from '../utils/logger';
import { parseDeviceList } from './device-validator';

export interface HttpInventoryOptions {
  url: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  logger?: Logger;
  client?: InventoryHttpClient;
}

export type InventoryHttpClient = Pick<AxiosInstance, 'get'>;

export class HttpInventorySource implements InventorySource {
  private client: InventoryHttpClient;
  private url: string;
  private logger: Logger;

  constructor(options: HttpInventoryOptions) {
    this.url = options.url;
    this.logger = options.logger ?? rootLogger.child('HttpInventory');
    this.client = options.client ?? axios.create({
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'Accept': 'application/json',
        ...options.headers
      }
    });
  }

  async listDevices(): Promise<Device[]> {
    const response = await this.client.get<unknown>(this.url);
    const payload = this.unwrap(response.data);
    const devices = parseDeviceList(payload, this.logger);

    this.logger.debug(`Fetched ${devices.length} devices from ${this.url}`);
    return devices;
  }

  /**
   * Accept either a bare array or an `{ data: [...] }` envelope
   */
  private unwrap(body: unknown): unknown {
    if (typeof body === 'object' && body !== null && !Array.isArray(body) && 'data' in body) {
      return body.data;
    }
    return body;
  }
}
