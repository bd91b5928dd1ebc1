/**
 * SECURITY API
 *
 * Read-only HTTP surface for operators:
 * - GET /api/health                       coordinator queue, store and memory state
 * - GET /metrics                          Prometheus exposition
 * - GET /api/stats/:guildId               guild-wide trust/risk stats
 * - GET /api/profile/:guildId/:userId     per-user report
 */

import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import type { SecurityCoordinator } from '../core/SecurityCoordinator';
import type { SecurityReporter } from '../monitoring/SecurityReporter';
import type { MetricsService } from '../services/MetricsService';
import { toError } from '../domain/errors/SecurityErrors';
import { getMemoryStats } from '../utils/MemoryManager';
import { createLogger } from '../services/Logger';

const logger = createLogger('SecurityAPI');

export class SecurityAPI {
  readonly app: Express;
  private server: Server | null = null;

  constructor(
    private readonly coordinator: SecurityCoordinator,
    private readonly reporter: SecurityReporter,
    private readonly metrics: MetricsService,
    private readonly clock: () => number = () => Date.now()
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());

    this.app.use((req, _res, next) => {
      logger.http(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (_req, res) => {
      res.json({ status: 'ok', uptime: process.uptime(), memory: getMemoryStats(), ...this.coordinator.getStats() });
    });

    this.app.get('/metrics', this.getMetrics.bind(this));
    this.app.get('/api/stats/:guildId', this.getStats.bind(this));
    this.app.get('/api/profile/:guildId/:userId', this.getProfile.bind(this));

    // 404 handler
    this.app.use((_req, res) => {
      res.status(404).json({ error: 'Not found' });
    });
  }

  private async getMetrics(_req: Request, res: Response): Promise<void> {
    try {
      res.set('Content-Type', this.metrics.getRegistry().contentType);
      res.send(await this.metrics.getMetrics());
    } catch (error) {
      logger.error('Metrics export failed', error);
      res.status(500).json({ error: 'Metrics unavailable' });
    }
  }

  /**
   * GET /api/stats/:guildId?windowMs=86400000
   */
  private async getStats(req: Request, res: Response): Promise<void> {
    const windowParam = typeof req.query.windowMs === 'string' ? Number(req.query.windowMs) : undefined;
    if (windowParam !== undefined && !(Number.isFinite(windowParam) && windowParam > 0)) {
      res.status(400).json({ error: 'windowMs must be a positive number' });
      return;
    }

    try {
      res.json(await this.reporter.getStats(req.params.guildId, this.clock(), windowParam));
    } catch (error) {
      logger.error('Stats request failed', error);
      res.status(503).json({ error: toError(error).message });
    }
  }

  private async getProfile(req: Request, res: Response): Promise<void> {
    const { guildId, userId } = req.params;
    try {
      const report = await this.reporter.getUserReport(userId, guildId, this.clock());
      if (!report) {
        res.status(404).json({ error: 'Profile not found' });
        return;
      }
      res.json(report);
    } catch (error) {
      logger.error(`Profile request failed for ${guildId}:${userId}`, error);
      res.status(503).json({ error: toError(error).message });
    }
  }

  /**
   * Resolves with the bound port (useful with port 0).
   */
  start(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        logger.info(`🌐 Security API listening on port ${bound}`);
        resolve(bound);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
