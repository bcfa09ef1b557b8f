/**
 * Messaging-gateway notifier delivering alert text to chat groups over HTTP
 */

import axios, { AxiosInstance } from 'axios';
import { Logger, Notifier, RecipientContext } from '../types';
import { errorMessage } from '../error-handling';
import { logger as rootLogger } from '../utils/logger';

export const SEND_GROUP_MESSAGE_PATH = '/send_message_group';

const GATEWAY_ERROR_STATUSES = ['1001', '1003'];

export interface GatewayNotifierOptions {
  url: string;
  apiKey: string;
  senderKey: string;
  timeoutMs?: number;
  logger?: Logger;
  client?: GatewayHttpClient;
}

export type GatewayHttpClient = Pick<AxiosInstance, 'post'>;

export interface GatewayMessagePayload {
  api_key: string;
  number_key: string;
  group_id: string;
  message: string;
}

/**
 * The gateway answers HTTP 200 with an error status in the body for rejected sends
 */
export function isGatewayError(body: unknown): boolean {
  if (typeof body !== 'object' || body === null) {
    return false;
  }
  if ('status' in body && GATEWAY_ERROR_STATUSES.includes(String(body.status))) {
    return true;
  }
  return 'ack' in body && body.ack === 'fatal_error';
}

function gatewayMessage(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return 'unknown gateway error';
}

export class GatewayNotificationService implements Notifier {
  private client: GatewayHttpClient;
  private apiKey: string;
  private senderKey: string;
  private logger: Logger;

  constructor(options: GatewayNotifierOptions) {
    this.apiKey = options.apiKey;
    this.senderKey = options.senderKey;
    this.logger = options.logger ?? rootLogger.child('Notifier');
    this.client = options.client ?? axios.create({
      baseURL: options.url,
      headers: {
        'Content-Type': 'application/json'
      },
      timeout: options.timeoutMs ?? 30000
    });
  }

  /**
   * Broadcast `message` to every recipient. Succeeds if at least one delivery did.
   */
  async send(context: RecipientContext, message: string): Promise<boolean> {
    if (context.recipients.length === 0) {
      this.logger.warn(`No recipients configured for ${context.kind} message about ${context.address}`);
      return false;
    }

    let delivered = 0;
    for (const recipient of context.recipients) {
      if (await this.sendToGroup(recipient, message)) {
        delivered++;
      }
    }

    const failed = context.recipients.length - delivered;
    this.logger.info(`Broadcast ${context.kind} message for ${context.address}: ${delivered} delivered, ${failed} failed`);
    return delivered > 0;
  }

  /**
   * Send one message to one group
   */
  private async sendToGroup(groupId: string, message: string): Promise<boolean> {
    const payload: GatewayMessagePayload = {
      api_key: this.apiKey,
      number_key: this.senderKey,
      group_id: groupId,
      message
    };

    try {
      const response = await this.client.post<unknown>(SEND_GROUP_MESSAGE_PATH, payload);
      if (isGatewayError(response.data)) {
        this.logger.error(`Gateway rejected message to ${groupId}: ${gatewayMessage(response.data)}`);
        return false;
      }

      this.logger.debug(`Message delivered to ${groupId} (${message.length} chars)`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to send message to ${groupId}: ${errorMessage(error)}`);
      return false;
    }
  }
}
