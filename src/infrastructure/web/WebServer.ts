import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import path from 'path';
import { WebSocketServer, WebSocket, RawData } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import { BuildJob, isJobStatus, isTerminal } from '../../core/entities/BuildJob.js';
import { toProgressMessage, ProgressMessage } from '../../core/entities/ProgressEvent.js';
import { isMacAddress } from '../../core/discovery/answerPatch.js';
import { errorMessage } from '../../core/errors.js';
import type { JobService } from '../../application/services/JobService.js';
import type { InstallerDataService } from '../../application/services/InstallerDataService.js';
import { DiscoveryRegistry, DiscoveryReportSchema } from '../../application/services/DiscoveryRegistry.js';
import type { ProgressChannel } from '../progress/ProgressChannel.js';

export const PROGRESS_WS_PATH = '/api/ws/iso';

/** WebSocket close codes */
const CLOSE_NORMAL = 1000;
const CLOSE_GOING_AWAY = 1001;
const CLOSE_POLICY_VIOLATION = 1008;

const WatchRequestSchema = z.object({ jobId: z.string().min(1) });

const FetchAnswerSchema = z.object({
  network_interfaces: z.array(z.object({ mac: z.string() })).default([]),
});

export interface WebServerDependencies {
  jobService: JobService;
  installerData: InstallerDataService;
  channel: ProgressChannel;
  discoveryRegistry: DiscoveryRegistry;
  debugLog?: (message: string) => void;
}

/**
 * Public view of a job; the config is reduced to what a viewer needs
 */
function serializeJob(job: BuildJob) {
  return {
    id: job.id,
    status: job.status,
    progress: job.progress,
    statusMessage: job.statusMessage,
    fqdn: job.config.identity.fqdn,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString(),
    completed_at: job.completedAt?.toISOString(),
    error: job.errorDetail,
  };
}

function snapshotMessage(job: BuildJob): ProgressMessage {
  return {
    data: {
      type: job.status === 'failed' ? 'error' : 'status',
      status: job.status,
      progress: job.progress,
      message: job.errorDetail ?? job.statusMessage,
    },
  };
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private debugLog: (message: string) => void;

  constructor(
    private deps: WebServerDependencies,
    private port: number = 33008,
    private host: string = '0.0.0.0'
  ) {
    this.debugLog = deps.debugLog ?? (() => {});
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  getApp(): Express {
    return this.app;
  }

  /**
   * Port actually bound (differs from the configured one when that was 0)
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '64kb' }));
  }

  private setupRoutes(): void {
    const { jobService, installerData, discoveryRegistry } = this.deps;

    // API: Installer form choices
    this.app.get('/api/installer/data', (req: Request, res: Response) => {
      try {
        res.json({ installerSettings: installerData.getInstallerSettings() });
      } catch (error) {
        res.status(500).json({ status: false, error: errorMessage(error) });
      }
    });

    // API: Submit a configuration and start an ISO build
    this.app.post('/api/installer/iso', (req: Request, res: Response) => {
      try {
        const result = jobService.createJob(req.body);
        if (result.status) {
          res.status(201).json({ status: true, jobId: result.jobId });
        } else if (result.reason === 'capacity') {
          res.status(429).json({ status: false, error: result.error });
        } else {
          res.status(400).json({ status: false, error: result.error, fieldErrors: result.fieldErrors });
        }
      } catch (error) {
        console.error('[WebServer] Error creating job:', error);
        res.status(500).json({ status: false, error: errorMessage(error) });
      }
    });

    // API: Rendered answer file
    this.app.get('/api/answer-file/:jobId', async (req: Request, res: Response) => {
      try {
        const answer = await jobService.getAnswerFile(req.params.jobId);
        if (answer === null) {
          res.status(404).json({ status: false, error: 'Answer file not found' });
          return;
        }
        res.type('text/plain').send(answer);
      } catch (error) {
        res.status(500).json({ status: false, error: errorMessage(error) });
      }
    });

    // API: Answer file fetched by a booting installer, pinned to its NIC
    this.app.post('/api/answer-file/:jobId', async (req: Request, res: Response) => {
      try {
        const parsed = FetchAnswerSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
          res.status(400).json({ status: false, error: 'Invalid installer system information' });
          return;
        }
        const mac = parsed.data.network_interfaces[0]?.mac;
        if (mac !== undefined && !isMacAddress(mac)) {
          res.status(400).json({ status: false, error: `Invalid MAC address: ${mac}` });
          return;
        }

        const answer = await jobService.getPatchedAnswerFile(req.params.jobId, mac);
        if (answer === null) {
          res.status(404).json({ status: false, error: 'Answer file not found' });
          return;
        }
        res.type('text/plain').send(answer);
      } catch (error) {
        res.status(500).json({ status: false, error: errorMessage(error) });
      }
    });

    // API: Download the built image
    this.app.get('/api/iso/:jobId', async (req: Request, res: Response) => {
      try {
        const artifact = await jobService.getImage(req.params.jobId);
        if (!artifact) {
          res.status(404).json({ status: false, error: 'ISO not found' });
          return;
        }
        res.setHeader('X-Checksum-Sha256', artifact.sha256);
        res.download(artifact.imagePath, path.basename(artifact.imagePath), (error) => {
          if (error) {
            console.error(`[WebServer] Error sending ISO for job ${req.params.jobId}:`, error);
            if (!res.headersSent) {
              res.status(500).json({ status: false, error: 'Failed to send ISO' });
            }
          }
        });
      } catch (error) {
        res.status(500).json({ status: false, error: errorMessage(error) });
      }
    });

    // API: Delete a job with its artifacts (cancels it if still building)
    this.app.delete('/api/delete-iso/:jobId', async (req: Request, res: Response) => {
      try {
        const deleted = await jobService.deleteJob(req.params.jobId);
        if (!deleted) {
          res.status(404).json({ status: false, error: 'Job not found' });
          return;
        }
        res.json({ status: true });
      } catch (error) {
        res.status(500).json({ status: false, error: errorMessage(error) });
      }
    });

    // API: Get all jobs
    this.app.get('/api/jobs', (req: Request, res: Response) => {
      try {
        const status = typeof req.query.status === 'string' ? req.query.status : undefined;
        if (status !== undefined && !isJobStatus(status)) {
          res.status(400).json({ success: false, error: `Unknown status: ${status}` });
          return;
        }
        const jobs = status ? jobService.getJobsByStatus(status) : jobService.getAllJobs();
        res.json({ success: true, data: jobs.map(serializeJob) });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Get job by ID
    this.app.get('/api/jobs/:jobId', (req: Request, res: Response) => {
      try {
        const job = jobService.getJob(req.params.jobId);
        if (!job) {
          res.status(404).json({ success: false, error: 'Job not found' });
          return;
        }
        res.json({ success: true, data: serializeJob(job) });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Cancel job
    this.app.post('/api/jobs/:jobId/cancel', (req: Request, res: Response) => {
      try {
        const job = jobService.getJob(req.params.jobId);
        if (!job) {
          res.status(404).json({ success: false, error: 'Job not found' });
          return;
        }
        if (isTerminal(job.status)) {
          res.status(409).json({ success: false, error: `Job already ${job.status}` });
          return;
        }
        jobService.cancelJob(job.id);
        res.json({ success: true, message: 'Job cancelled' });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Get statistics
    this.app.get('/api/stats', (req: Request, res: Response) => {
      try {
        res.json({ success: true, data: jobService.getStatistics() });
      } catch (error) {
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    // API: Discovery agent callback
    this.app.post('/api/device_discovery', (req: Request, res: Response) => {
      try {
        const parsed = DiscoveryReportSchema.safeParse(req.body);
        if (!parsed.success) {
          res.status(400).json({
            status: false,
            error: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
          });
          return;
        }
        discoveryRegistry.record(parsed.data.disk, parsed.data.mgmt_nic, req.ip);
        res.status(200).json({ status: true });
      } catch (error) {
        res.status(500).json({ status: false, error: errorMessage(error) });
      }
    });

    this.app.get('/api/device_discovery', (req: Request, res: Response) => {
      res.json({
        success: true,
        data: discoveryRegistry.list().map((report) => ({
          disk: report.disk,
          mgmt_nic: report.mgmtNic,
          received_at: report.receivedAt.toISOString(),
          remote_address: report.remoteAddress,
        })),
      });
    });
  }

  /**
   * Malformed JSON bodies and anything else thrown by middleware
   */
  private setupErrorHandler(): void {
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const isParseError = error instanceof SyntaxError;
      if (!isParseError) {
        console.error('[WebServer] Unhandled error:', error);
      }
      res
        .status(isParseError ? 400 : 500)
        .json({ status: false, error: isParseError ? 'Malformed JSON body' : errorMessage(error) });
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer, path: PROGRESS_WS_PATH });

    this.wss.on('connection', (ws: WebSocket) => {
      this.debugLog('[WebServer] New progress WebSocket client connected');
      this.clients.add(ws);

      ws.once('message', (data: RawData) => {
        this.handleWatchRequest(ws, data);
      });

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });
    });
  }

  /**
   * First message names the job; the socket then streams that job's events
   * and is closed by the server once the job is terminal. A viewer leaving
   * early does not affect the build.
   */
  private handleWatchRequest(ws: WebSocket, data: RawData): void {
    let jobId: string;
    try {
      const parsed = WatchRequestSchema.safeParse(JSON.parse(data.toString()));
      if (!parsed.success) {
        ws.close(CLOSE_POLICY_VIOLATION, 'Expected {"jobId": "..."}');
        return;
      }
      jobId = parsed.data.jobId;
    } catch {
      ws.close(CLOSE_POLICY_VIOLATION, 'Malformed JSON');
      return;
    }

    const job = this.deps.jobService.getJob(jobId);
    if (!job) {
      ws.close(CLOSE_POLICY_VIOLATION, 'Unknown job');
      return;
    }

    const subscription = this.deps.channel.subscribe(jobId);
    ws.on('close', () => subscription.close());

    // A closed channel replays the closing event; a snapshot would repeat it
    if (!this.deps.channel.isClosed(jobId)) {
      ws.send(JSON.stringify(snapshotMessage(job)));
      if (isTerminal(job.status)) {
        subscription.close();
        ws.close(CLOSE_NORMAL, 'Job finished');
        return;
      }
    }

    const pump = async () => {
      for await (const event of subscription) {
        if (ws.readyState !== WebSocket.OPEN) break;
        ws.send(JSON.stringify(toProgressMessage(event)));
      }
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(CLOSE_NORMAL, 'Job finished');
      }
    };

    pump().catch((error) => {
      console.error(`[WebServer] Error streaming progress for job ${jobId}:`, error);
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.port, this.host, () => {
          console.error(`[WebServer] API available at http://${this.host}:${this.getPort()}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close(CLOSE_GOING_AWAY, 'Server shutting down');
      });
      this.clients.clear();

      // Close WebSocket server
      if (this.wss) {
        this.wss.close(() => {
          this.debugLog('[WebServer] WebSocket server closed');
        });
      }

      // Close HTTP server
      if (this.httpServer) {
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          resolve();
        });
        this.httpServer.closeAllConnections();
      } else {
        resolve();
      }
    });
  }
}
