/**
 * Inventory source backed by a JSON file, re-read on every cycle
 */

import * as fs from 'fs/promises';
import { Device, InventorySource, Logger } from '../types';
import { logger as rootLogger } from '../utils/logger';
import { parseDeviceList } from './device-validator';

export class FileInventorySource implements InventorySource {
  private filePath: string;
  private logger: Logger;

  constructor(filePath: string, logger?: Logger) {
    this.filePath = filePath;
    this.logger = logger ?? rootLogger.child('FileInventory');
  }

  async listDevices(): Promise<Device[]> {
    const content = await fs.readFile(this.filePath, 'utf-8');
    return parseDeviceList(JSON.parse(content), this.logger);
  }
}
