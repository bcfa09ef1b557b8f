/**
 * Bounded-concurrency worker pool running one probe per device
 */

import { Device, Logger, ProbeFunction, ProbeOutcome, ProbeResult, CycleStatistics } from '../types';
import { ConfigurationError, errorMessage } from '../error-handling';
import { logger as rootLogger } from '../utils/logger';
import { icmpProbe } from './probe';

export interface DispatchOptions {
  logger?: Logger;
  clock?: () => Date;
}

const defaultLogger = rootLogger.child('Dispatcher');

/**
 * Run one probe under its deadline. Never rejects.
 * At the deadline the probe is aborted and keeps its worker slot until it settles,
 * for at most one further timeout period.
 */
async function runProbe(probe: ProbeFunction, address: string, timeoutMs: number, logger: Logger): Promise<ProbeOutcome> {
  const controller = new AbortController();
  const running: Promise<ProbeOutcome> = Promise.resolve()
    .then(() => probe(address, timeoutMs, controller.signal))
    .catch((error: unknown): ProbeOutcome => {
      if (!controller.signal.aborted) {
        logger.warn(`Probe for ${address} failed internally: ${errorMessage(error)}`);
      }
      return { success: false, reason: 'internal error' };
    });

  const first = await raceTimer(running, timeoutMs);
  if (first !== 'expired') {
    return first;
  }

  controller.abort();
  const settled = await raceTimer(running, timeoutMs);
  if (settled === 'expired') {
    logger.warn(`Probe for ${address} ignored its deadline, releasing its slot`);
  }
  return { success: false, reason: 'timeout' };
}

async function raceTimer<T>(task: Promise<T>, ms: number): Promise<T | 'expired'> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<'expired'>(resolve => {
    timer = setTimeout(() => resolve('expired'), ms);
  });
  try {
    return await Promise.race([task, expired]);
  } finally {
    clearTimeout(timer);
  }
}

function toResult(device: Device, outcome: ProbeOutcome, timestamp: Date): ProbeResult {
  return {
    timestamp,
    device_id: device.id,
    address: device.address,
    hostname: device.hostname,
    success: outcome.success,
    latency_ms: outcome.success ? outcome.latency_ms : null,
    error_message: outcome.success ? null : outcome.reason
  };
}

/**
 * Probe every device with at most `concurrencyLimit` probes in flight.
 * Resolves once all results are in, in device order.
 */
export async function dispatch(
  devices: Device[],
  concurrencyLimit: number,
  perProbeTimeoutMs: number,
  probe: ProbeFunction = icmpProbe,
  options: DispatchOptions = {}
): Promise<ProbeResult[]> {
  if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
    throw new ConfigurationError('Concurrency limit must be a positive integer', { concurrencyLimit });
  }
  if (!Number.isFinite(perProbeTimeoutMs) || perProbeTimeoutMs <= 0) {
    throw new ConfigurationError('Per-probe timeout must be a positive number of milliseconds', { perProbeTimeoutMs });
  }

  const logger = options.logger ?? defaultLogger;
  const clock = options.clock ?? (() => new Date());
  const results: ProbeResult[] = new Array<ProbeResult>(devices.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < devices.length) {
      const index = next++;
      const device = devices[index];
      if (device === undefined) {
        continue;
      }
      const outcome = await runProbe(probe, device.address, perProbeTimeoutMs, logger);
      results[index] = toResult(device, outcome, clock());
    }
  };

  const workerCount = Math.min(concurrencyLimit, devices.length);
  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  logger.debug(`Dispatched ${devices.length} probes with ${workerCount} workers`);
  return results;
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Aggregate statistics for one cycle's results
 */
export function computeStatistics(results: ProbeResult[]): CycleStatistics {
  const latencies: number[] = [];
  for (const result of results) {
    if (result.success && result.latency_ms !== null) {
      latencies.push(result.latency_ms);
    }
  }

  const total = results.length;
  const successful = results.filter(r => r.success).length;

  return {
    total,
    successful,
    failed: total - successful,
    success_rate: total === 0 ? 0 : round((successful / total) * 100),
    average_latency_ms: latencies.length === 0
      ? null
      : round(latencies.reduce((sum, value) => sum + value, 0) / latencies.length),
    min_latency_ms: latencies.length === 0 ? null : Math.min(...latencies),
    max_latency_ms: latencies.length === 0 ? null : Math.max(...latencies)
  };
}
