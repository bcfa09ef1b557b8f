/**
 * End-to-end tests: the application wired from a config file, polling a file inventory
 * with an in-process probe and notifier, inspected through the HTTP API
 */

import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ReachabilityMonitorApp } from '../app';
import { TIMEOUT_STATE_FILENAME } from '../storage/timeout-state-file';
import { APIResponse, Notifier, ProbeFunction, RecipientContext } from '../types';

interface SentMessage {
  context: RecipientContext;
  message: string;
}

class RecordingNotifier implements Notifier {
  sent: SentMessage[] = [];

  async send(context: RecipientContext, message: string): Promise<boolean> {
    this.sent.push({ context, message });
    return true;
  }
}

async function waitFor(predicate: () => boolean, timeoutMs: number = 8000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 25));
  }
}

describe('End-to-End Integration Tests', () => {
  let dir: string;
  let app: ReachabilityMonitorApp;
  let notifier: RecordingNotifier;
  let down: Set<string>;
  let http: AxiosInstance;

  const probe: ProbeFunction = async (address) => (
    down.has(address)
      ? { success: false, reason: 'timeout' }
      : { success: true, latency_ms: 4.2 }
  );

  async function writeConfig(overrides: Record<string, unknown> = {}): Promise<string> {
    const configPath = path.join(dir, 'config.json');
    const config = {
      polling: { interval_seconds: 1, probe_timeout_ms: 500, max_concurrency: 4 },
      storage: { output_dir: path.join(dir, 'results'), retention_days: 30 },
      alerts: { enabled: true, threshold: 2, cooldown_minutes: 60, recovery_notices: true },
      inventory: { source: 'file', file: path.join(dir, 'devices.json') },
      notifier: { recipients: ['ops-group'] },
      api: { port: 0, host: '127.0.0.1' },
      ...overrides
    };
    await fs.writeFile(configPath, JSON.stringify(config), 'utf-8');
    return configPath;
  }

  async function startApp(configPath: string): Promise<void> {
    app = new ReachabilityMonitorApp({ configPath, env: {}, probe, notifier });
    await app.initialize();
    await app.start();
    http = axios.create({
      baseURL: `http://127.0.0.1:${app.getApiPort()}`,
      validateStatus: () => true
    });
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'reachability-e2e-'));
    notifier = new RecordingNotifier();
    down = new Set(['10.0.0.2']);
    await fs.writeFile(path.join(dir, 'devices.json'), JSON.stringify([
      { id: 1, address: '10.0.0.1', hostname: 'switch-1', brand: 'acme', condition: 'ok' },
      { id: 2, address: '10.0.0.2', hostname: 'switch-2', brand: 'acme', condition: 'ok' },
      { id: 3, address: '10.0.0.3', hostname: 'switch-3', condition: 'missing' }
    ]), 'utf-8');
  });

  afterEach(async () => {
    await app.stop();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should poll, persist, track and alert end to end', async () => {
    await startApp(await writeConfig());

    await waitFor(() => notifier.sent.length >= 1);

    expect(notifier.sent[0].context).toEqual({ kind: 'timeout', address: '10.0.0.2', recipients: ['ops-group'] });
    expect(notifier.sent[0].message.split('\n')[0]).toBe('DEVICE TIMEOUT ALERT');

    const devices = await http.get<APIResponse<Array<{ address: string; consecutive_timeouts: number }>>>('/api/timeouts/devices');
    expect(devices.status).toBe(200);
    expect(devices.data.data?.map(record => record.address)).toEqual(['10.0.0.2']);
    expect(devices.data.data?.[0].consecutive_timeouts).toBeGreaterThanOrEqual(2);

    const latest = await http.get<APIResponse<Array<{ address: string; success: boolean }>>>('/api/results/latest?limit=10');
    expect(latest.status).toBe(200);
    const addresses = new Set(latest.data.data?.map(result => result.address));
    expect(addresses).toEqual(new Set(['10.0.0.1', '10.0.0.2']));
    expect(latest.data.data?.filter(result => result.address === '10.0.0.1').every(result => result.success)).toBe(true);

    const stateFile = await fs.readFile(path.join(dir, 'results', TIMEOUT_STATE_FILENAME), 'utf-8');
    expect(stateFile).toContain('10.0.0.2');
    expect(stateFile).not.toContain('10.0.0.1');
  });

  it('should send a recovery notice once an alerted device answers again', async () => {
    await startApp(await writeConfig());

    await waitFor(() => notifier.sent.length >= 1);
    down.clear();
    await waitFor(() => notifier.sent.some(sent => sent.context.kind === 'recovery'));

    const recovery = notifier.sent.find(sent => sent.context.kind === 'recovery');
    expect(recovery?.context.address).toBe('10.0.0.2');
    expect(recovery?.message.split('\n')[0]).toBe('DEVICE RECOVERED');

    await waitFor(() => app.getStatus().scheduler?.last_summary?.statistics.failed === 0);
    const summary = await http.get<APIResponse<{ total_timeout_devices: number }>>('/api/timeouts/summary');
    expect(summary.data.data?.total_timeout_devices).toBe(0);
  });

  it('should keep polling after the inventory becomes unreadable', async () => {
    await startApp(await writeConfig());
    await waitFor(() => (app.getStatus().scheduler?.cycle_count ?? 0) >= 1 && app.getStatus().scheduler?.last_summary !== null);

    await fs.rm(path.join(dir, 'devices.json'));
    const before = app.getStatus().scheduler?.cycle_count ?? 0;
    await waitFor(() => (app.getStatus().scheduler?.cycle_count ?? 0) >= before + 1);

    const health = await http.get<APIResponse<{ scheduler_state: string; active_errors: number }>>('/api/health');
    expect(health.status).toBe(200);
    expect(health.data.data?.scheduler_state).toBe('running');
    expect(app.getStatus().running).toBe(true);
  });

  it('should answer 503 on timeout routes when tracking is disabled', async () => {
    await startApp(await writeConfig({ tracking: { enabled: false } }));

    const response = await http.get<APIResponse>('/api/timeouts/summary');
    expect(response.status).toBe(503);
    expect(response.data.error).toBe('Timeout tracking is disabled');
    expect(app.getStatus().components.tracker).toBe(false);
  });
});
