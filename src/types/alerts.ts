/**
 * Alert and notification interfaces
 */

import { TimeoutRecord } from './tracking';

export interface RecipientContext {
  kind: 'timeout' | 'recovery';
  address: string;
  recipients: string[];
}

export interface Notifier {
  send(context: RecipientContext, message: string): Promise<boolean>;
}

export interface AlertEvent {
  kind: 'timeout' | 'recovery';
  record: TimeoutRecord;
  message: string;
  delivered: boolean;
  timestamp: Date;
}
