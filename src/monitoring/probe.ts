/**
 * Single ICMP echo probe backed by the system `ping` binary
 */

import { spawn } from 'child_process';
import { isIP } from 'net';
import { ProbeOutcome } from '../types';
import { ConfigurationError, ErrorCategory, ErrorSeverity, MonitorError } from '../error-handling';

export interface PingCommand {
  command: string;
  args: string[];
}

const UNREACHABLE_PATTERN =
  /unreachable|unknown host|name or service not known|could not find host|no route to host|transmit failed|general failure/i;

const LATENCY_PATTERN = /time[=<]\s*([\d.]+)\s*ms/i;

/**
 * Command line sending exactly one echo request
 */
export function buildPingCommand(address: string, timeoutMs: number, platform: NodeJS.Platform = process.platform): PingCommand {
  if (platform === 'win32') {
    return { command: 'ping', args: ['-n', '1', '-w', String(Math.ceil(timeoutMs)), address] };
  }

  const timeoutSeconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  const args = ['-c', '1', '-W', String(timeoutSeconds), address];
  if (isIP(address) === 6 && platform !== 'linux') {
    return { command: 'ping6', args };
  }
  return { command: 'ping', args };
}

/**
 * Round-trip time in milliseconds from a reply line, if any
 */
export function parseLatency(output: string): number | null {
  const match = output.match(LATENCY_PATTERN);
  if (!match || match[1] === undefined) {
    return null;
  }

  const latency = parseFloat(match[1]);
  return Number.isFinite(latency) ? latency : null;
}

/**
 * Map a finished ping process to a probe outcome
 */
export function classifyPingOutput(exitCode: number | null, stdout: string, stderr: string): ProbeOutcome {
  const output = `${stdout}\n${stderr}`;

  // Windows reports "Destination host unreachable" replies with exit code 0
  if (UNREACHABLE_PATTERN.test(output)) {
    return { success: false, reason: 'unreachable' };
  }

  const latency = parseLatency(stdout);
  if (exitCode === 0 && latency !== null) {
    return { success: true, latency_ms: latency };
  }

  if (exitCode !== null && exitCode > 1) {
    return { success: false, reason: 'unreachable' };
  }

  return { success: false, reason: 'timeout' };
}

/**
 * Send one ICMP echo to `address`. Network-level failures resolve as failed outcomes;
 * only a broken call contract or a missing ping binary rejects.
 * Aborting `signal` kills the ping process and resolves a timeout.
 */
export function icmpProbe(address: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
  if (typeof address !== 'string') {
    return Promise.reject(new ConfigurationError('Probe address must be a string', { address }));
  }
  if (typeof timeoutMs !== 'number' || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return Promise.reject(new ConfigurationError('Probe timeout must be a positive finite number of milliseconds', { timeoutMs }));
  }
  if (isIP(address.trim()) === 0) {
    return Promise.resolve({ success: false, reason: 'invalid address' });
  }
  if (signal?.aborted) {
    return Promise.resolve({ success: false, reason: 'timeout' });
  }

  const { command, args } = buildPingCommand(address.trim(), timeoutMs);

  return new Promise((resolve, reject) => {
    let settled = false;
    let stdout = '';
    let stderr = '';

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const finish = (outcome: ProbeOutcome): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', killAndTimeout);
      resolve(outcome);
    };

    const killAndTimeout = (): void => {
      if (!child.killed) {
        child.kill('SIGKILL');
      }
      finish({ success: false, reason: 'timeout' });
    };

    // The ping binary enforces its own deadline in whole seconds; this one is exact
    const timer = setTimeout(killAndTimeout, timeoutMs);
    signal?.addEventListener('abort', killAndTimeout, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      finish(classifyPingOutput(code, stdout, stderr));
    });

    child.on('error', (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', killAndTimeout);
      reject(new MonitorError(
        `Ping process error: ${error.message}`,
        ErrorCategory.PROBE,
        ErrorSeverity.HIGH,
        'Probe',
        address,
        { command, args }
      ));
    });
  });
}
