/**
 * Express API server exposing service control, stored results and timeout tracking.
 * A WebSocket channel on the same port pushes cycle summaries and alerts.
 */

import express, { NextFunction, Request, Response } from 'express';
import { createServer, Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { AlertEvent, APIResponse, CycleSummary, Logger } from '../types';
import { ErrorHandler, errorMessage } from '../error-handling';
import { CycleScheduler } from '../monitoring/cycle-scheduler';
import { TimeoutTracker } from '../monitoring/timeout-tracker';
import { ResultStore } from '../storage/result-store';
import { TimeoutAnalyticsStore } from '../storage/timeout-analytics';

export interface APIServerConfig {
  port: number;
  host: string;
  enableCors?: boolean;
}

export interface APIServerDependencies {
  scheduler: CycleScheduler;
  store: ResultStore;
  tracker: TimeoutTracker | null;
  analytics: TimeoutAnalyticsStore | null;
  errorHandler: ErrorHandler;
  logger: Logger;
}

export type RealtimeMessageType = 'connected' | 'cycle' | 'alert' | 'pong' | 'error';

/**
 * Rejected request input, answered with HTTP 400
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * A request the service cannot satisfy in its current state, answered with the given status
 */
export class ServiceStateError extends Error {
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'ServiceStateError';
    this.status = status;
  }
}

const DEFAULT_RANGE_MS = 60 * 60 * 1000;

function queryValue(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function parsePositiveInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new BadRequestError(`${name} must be a positive integer`);
  }
  return parsed;
}

export function parseTimestamp(value: string | undefined, name: string): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new BadRequestError(`${name} must be an ISO 8601 timestamp`);
  }
  return parsed;
}

/**
 * `YYYY-MM-DD` as local midnight
 */
export function parseCalendarDate(value: string | undefined, name: string): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new BadRequestError(`${name} must be a date in YYYY-MM-DD format`);
  }
  const date = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  if (date.getMonth() !== Number(match[2]) - 1) {
    throw new BadRequestError(`${name} is not a valid calendar date`);
  }
  return date;
}

type RouteHandler<T> = (req: Request) => Promise<T> | T;

export class APIServer {
  private app: express.Application;
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private scheduler: CycleScheduler;
  private store: ResultStore;
  private tracker: TimeoutTracker | null;
  private analytics: TimeoutAnalyticsStore | null;
  private errorHandler: ErrorHandler;
  private logger: Logger;
  private config: APIServerConfig;
  private startTime: Date;

  constructor(dependencies: APIServerDependencies, config: APIServerConfig) {
    this.app = express();
    this.scheduler = dependencies.scheduler;
    this.store = dependencies.store;
    this.tracker = dependencies.tracker;
    this.analytics = dependencies.analytics;
    this.errorHandler = dependencies.errorHandler;
    this.logger = dependencies.logger;
    this.config = config;
    this.startTime = new Date();

    this.setupMiddleware();
    this.setupRoutes();

    this.scheduler.on('cycle:complete', (summary: CycleSummary) => this.broadcast('cycle', summary));
    this.scheduler.on('alert', (event: AlertEvent) => this.broadcast('alert', event));
  }

  getApp(): express.Application {
    return this.app;
  }

  /**
   * Port actually bound, useful when configured with port 0
   */
  getPort(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  private setupMiddleware(): void {
    if (this.config.enableCors) {
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        res.header('Access-Control-Allow-Origin', '*');
        res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');

        if (req.method === 'OPTIONS') {
          res.sendStatus(200);
          return;
        }
        next();
      });
    }

    this.app.use(express.json({ limit: '1mb' }));

    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.debug(`${req.method} ${req.path} - ${req.ip}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', this.route(() => this.getHealth()));

    // Service control
    this.app.get('/api/service/status', this.route(() => this.getServiceStatus()));
    this.app.post('/api/service/start', this.route(() => this.scheduler.start()));
    this.app.post('/api/service/stop', this.route(() => this.scheduler.stop()));
    this.app.post('/api/service/cycle', this.route(() => this.runCycle()));

    // Stored results
    this.app.get('/api/results/latest', this.route(req =>
      this.store.latest(parsePositiveInteger(queryValue(req, 'limit'), 'limit'))
    ));
    this.app.get('/api/results/partitions', this.route(() => this.store.listPartitions()));
    this.app.post('/api/results/rebuild', this.route(req =>
      this.store.rebuild(parseCalendarDate(queryValue(req, 'date'), 'date'))
    ));
    this.app.get('/api/results', this.route(req => this.getResultRange(req)));

    // Timeout tracking
    this.app.get('/api/timeouts/summary', this.route(() => this.requireTracker().summary()));
    this.app.get('/api/timeouts/devices', this.route(req =>
      this.requireTracker().list(parsePositiveInteger(queryValue(req, 'min_consecutive'), 'min_consecutive'))
    ));
    this.app.get('/api/timeouts/critical', this.route(req =>
      this.requireTracker().critical(parsePositiveInteger(queryValue(req, 'threshold'), 'threshold'))
    ));
    this.app.get('/api/timeouts/report', this.route(() => this.requireTracker().report()));
    this.app.post('/api/timeouts/reset', this.route(async () => ({
      cleared: await this.requireTracker().reset()
    })));

    // Failing-device count over time
    this.app.get('/api/timeouts/analytics', this.route(req =>
      this.requireAnalytics().recent(parsePositiveInteger(queryValue(req, 'hours'), 'hours'))
    ));
    this.app.get('/api/timeouts/analytics/multi-day', this.route(req =>
      this.requireAnalytics().multiDay(parsePositiveInteger(queryValue(req, 'days'), 'days'))
    ));
    this.app.get('/api/timeouts/analytics/summary', this.route(req =>
      this.requireAnalytics().summary(parsePositiveInteger(queryValue(req, 'hours'), 'hours'))
    ));

    // 404 handler - only for API routes
    this.app.use('/api/*', (_req: Request, res: Response) => {
      this.send(res, 404, { success: false, error: 'API endpoint not found', timestamp: new Date() });
    });

    // Error handling middleware
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      this.logger.error('API Error:', err);
      this.send(res, 500, { success: false, error: 'Internal server error', timestamp: new Date() });
    });
  }

  /**
   * Wrap a handler so its value, or its failure, goes out in the response envelope
   */
  private route<T>(handler: RouteHandler<T>): (req: Request, res: Response) => void {
    return (req: Request, res: Response) => {
      Promise.resolve()
        .then(() => handler(req))
        .then(data => {
          this.send(res, 200, { success: true, data, timestamp: new Date() });
        })
        .catch((error: unknown) => {
          if (error instanceof BadRequestError) {
            this.send(res, 400, { success: false, error: error.message, timestamp: new Date() });
            return;
          }
          if (error instanceof ServiceStateError) {
            this.send(res, error.status, { success: false, error: error.message, timestamp: new Date() });
            return;
          }
          this.logger.error(`${req.method} ${req.path} failed: ${errorMessage(error)}`);
          this.errorHandler.handleError(error, { component: 'APIServer', details: { path: req.path } });
          this.send(res, 500, { success: false, error: errorMessage(error), timestamp: new Date() });
        });
    };
  }

  private send<T>(res: Response, status: number, body: APIResponse<T>): void {
    res.status(status).json(body);
  }

  private getHealth(): Record<string, unknown> {
    const health = this.errorHandler.getSystemHealth();
    const stats = this.errorHandler.getErrorStatistics();
    return {
      status: health.overall_status,
      uptime_seconds: Math.floor((Date.now() - this.startTime.getTime()) / 1000),
      scheduler_state: this.scheduler.status().state,
      components: health.component_health,
      active_errors: health.active_errors.length,
      errors_by_category: stats.errors_by_category
    };
  }

  private async getServiceStatus(): Promise<Record<string, unknown>> {
    return {
      scheduler: this.scheduler.status(),
      tracking_enabled: this.tracker !== null,
      store: await this.store.statistics(),
      output_dir: this.store.getOutputDir()
    };
  }

  private async runCycle(): Promise<CycleSummary> {
    const summary = await this.scheduler.runOnce();
    if (!summary) {
      throw new ServiceStateError('A polling cycle is already running or did not complete', 409);
    }
    return summary;
  }

  private getResultRange(req: Request): Promise<unknown> {
    const end = parseTimestamp(queryValue(req, 'end'), 'end') ?? new Date();
    const start = parseTimestamp(queryValue(req, 'start'), 'start') ?? new Date(end.getTime() - DEFAULT_RANGE_MS);
    if (start.getTime() > end.getTime()) {
      throw new BadRequestError('start must not be after end');
    }
    return this.store.range({ start, end }, queryValue(req, 'address'));
  }

  private requireTracker(): TimeoutTracker {
    if (!this.tracker) {
      throw new ServiceStateError('Timeout tracking is disabled', 503);
    }
    return this.tracker;
  }

  private requireAnalytics(): TimeoutAnalyticsStore {
    if (!this.analytics) {
      throw new ServiceStateError('Timeout tracking is disabled', 503);
    }
    return this.analytics;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);
      this.server = server;

      this.wss = new WebSocketServer({ server });
      this.setupWebSocketHandlers(this.wss);

      server.once('error', (error: Error) => {
        this.logger.error('Server error:', error);
        reject(error);
      });

      server.listen(this.config.port, this.config.host, () => {
        this.logger.info(`API server started on ${this.config.host}:${this.getPort() ?? this.config.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (this.wss) {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close();
      this.wss = null;
    }

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('API server stopped');
        resolve();
      });
      server.closeAllConnections();
    });
  }

  private setupWebSocketHandlers(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('WebSocket client connected');

      ws.on('message', (message) => {
        this.handleWebSocketMessage(ws, message.toString());
      });

      ws.on('close', () => {
        this.logger.debug('WebSocket client disconnected');
      });

      this.sendMessage(ws, 'connected', { scheduler_state: this.scheduler.status().state });
    });
  }

  private handleWebSocketMessage(ws: WebSocket, raw: string): void {
    let type: unknown;
    try {
      const parsed: unknown = JSON.parse(raw);
      type = typeof parsed === 'object' && parsed !== null && 'type' in parsed ? parsed.type : undefined;
    } catch (error) {
      this.logger.debug(`Invalid WebSocket message: ${errorMessage(error)}`);
      this.sendMessage(ws, 'error', { message: 'Invalid message format' });
      return;
    }

    if (type === 'ping') {
      this.sendMessage(ws, 'pong', null);
    } else {
      this.sendMessage(ws, 'error', { message: 'Unknown message type' });
    }
  }

  private sendMessage(ws: WebSocket, type: RealtimeMessageType, data: unknown): void {
    ws.send(JSON.stringify({ type, data, timestamp: new Date() }));
  }

  /**
   * Push a message to every connected client
   */
  broadcast(type: RealtimeMessageType, data: unknown): void {
    if (!this.wss) {
      return;
    }

    const message = JSON.stringify({ type, data, timestamp: new Date() });
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    }
  }
}
