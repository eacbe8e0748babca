/**
 * Scan Server - HTTP front end for the detection engine.
 *
 * Provides:
 * - POST /api/scan for scanning in-memory files
 * - GET /api/catalog with the loaded rule counts
 * - GET /health for health checks
 *
 * Every scan runs under a wall-clock budget. A scan that exceeds it is
 * answered with a FAIL verdict (fail closed), never with a PASS.
 */

import type { Server } from 'http';
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';

import type { ResolvedConfig } from '../config/loader.js';
import { ScanCoordinator } from '../scanner/scan-coordinator.js';
import { ConfigurationError, ScanTimeoutError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { ScanVerdict } from '../shared/types.js';

const logger = createLogger('server');

// ─── Configuration ───────────────────────────────────────────

export interface ScanServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  /** Budget applied to every scan request. */
  maxScanTimeMs: number;
  /** Maximum accepted request body, in body-parser notation. */
  bodyLimit: string;
  /** Clock used for the scan budget. Default: performance.now */
  now?: () => number;
}

export const DEFAULT_SERVER_CONFIG: ScanServerConfig = {
  port: 3848,
  host: '127.0.0.1',
  corsOrigins: ['*'],
  maxScanTimeMs: 5000,
  bodyLimit: '5mb',
};

export const scanRequestSchema = z.object({
  files: z.array(
    z.object({
      path: z.string().min(1),
      content: z.string(),
    })
  ),
});

export type ScanRequest = z.infer<typeof scanRequestSchema>;

function httpStatusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

// ─── Scan Server Class ───────────────────────────────────────

export class ScanServer {
  private readonly app: express.Application;
  private readonly config: ScanServerConfig;
  private readonly scanConfig: ResolvedConfig;
  private server?: Server;
  private startedAt = 0;
  private requestCount = 0;
  private scanCount = 0;
  private isShuttingDown = false;

  constructor(scanConfig: ResolvedConfig, config: Partial<ScanServerConfig> = {}) {
    this.scanConfig = scanConfig;
    this.config = {
      ...DEFAULT_SERVER_CONFIG,
      maxScanTimeMs: scanConfig.maxScanTimeMs ?? DEFAULT_SERVER_CONFIG.maxScanTimeMs,
      ...config,
    };

    if (!Number.isInteger(this.config.maxScanTimeMs) || this.config.maxScanTimeMs <= 0) {
      throw new ConfigurationError(
        `Scan budget must be a positive integer of milliseconds, got ${this.config.maxScanTimeMs}`
      );
    }

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /** The express application, for mounting or in-process use. */
  getApp(): express.Application {
    return this.app;
  }

  // ─── Middleware ────────────────────────────────────────────

  private setupMiddleware(): void {
    this.app.use(cors({ origin: this.config.corsOrigins }));
    this.app.use(express.json({ limit: this.config.bodyLimit }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.requestCount++;
      logger.debug({ method: req.method, path: req.path }, 'Request');
      next();
    });
  }

  // ─── Routes ────────────────────────────────────────────────

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      if (this.isShuttingDown) {
        res.status(503).json({ status: 'shutting_down' });
        return;
      }
      res.json({
        status: 'ok',
        uptime: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
        requests: this.requestCount,
        scans: this.scanCount,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get('/api/catalog', (_req, res) => {
      res.json({
        ...this.scanConfig.catalog.getCounts(),
        sources: this.scanConfig.sources,
      });
    });

    this.app.post('/api/scan', (req, res) => {
      const parsed = scanRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          error: 'Invalid scan request',
          issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
        return;
      }

      this.scanCount++;
      try {
        const result = ScanCoordinator.scanEntries(this.scanConfig.catalog, parsed.data.files, {
          entropy: this.scanConfig.entropy,
          display: this.scanConfig.display,
          maxScanTimeMs: this.config.maxScanTimeMs,
          now: this.config.now,
        });
        res.json(result);
      } catch (error) {
        if (error instanceof ScanTimeoutError) {
          logger.warn({ budgetMs: error.budgetMs, files: parsed.data.files.length }, 'Scan aborted');
          res.json({
            filesScanned: 0,
            findings: [],
            skipped: [],
            verdict: ScanVerdict.FAIL,
            aborted: true,
            error: error.message,
          });
          return;
        }
        logger.error({ error: errorMessage(error) }, 'Scan failed');
        res.status(500).json({ verdict: ScanVerdict.FAIL, error: 'Scan failed' });
      }
    });

    // Body parsing errors (malformed JSON, oversized payloads)
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = httpStatusOf(error);
      if (status >= 500) {
        logger.error({ error: errorMessage(error) }, 'Unhandled request error');
      }
      res.status(status).json({
        verdict: ScanVerdict.FAIL,
        error: status >= 500 ? 'Internal error' : errorMessage(error),
      });
    });
  }

  // ─── Lifecycle ─────────────────────────────────────────────

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        this.startedAt = Date.now();
        logger.info({ host: this.config.host, port: this.getPort() }, 'Scan server started');
        resolve();
      });
      this.server = server;
    });
  }

  /**
   * Stops accepting connections. Idle keep-alive sockets are dropped right
   * away; busy ones close once their response is sent.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.isShuttingDown = true;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    this.server = undefined;
    this.isShuttingDown = false;
    logger.info('Scan server stopped');
  }

  isRunning(): boolean {
    return this.server !== undefined && !this.isShuttingDown;
  }

  /** The bound port (the OS-assigned one when configured with port 0). */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}

export default ScanServer;
