import { Config } from '../config.js';
import type { IImageBuilder } from '../core/interfaces/IImageBuilder.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../infrastructure/database/repositories/JobRepository.js';
import { AssistantImageBuilder } from '../infrastructure/iso/AssistantImageBuilder.js';
import { SimulatedImageBuilder } from '../infrastructure/iso/SimulatedImageBuilder.js';
import { ProgressChannel } from '../infrastructure/progress/ProgressChannel.js';
import { JobQueue } from '../infrastructure/queue/JobQueue.js';
import { FileArtifactStore } from '../infrastructure/storage/FileArtifactStore.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { BuildWorker } from '../application/services/BuildWorker.js';
import { DiscoveryRegistry } from '../application/services/DiscoveryRegistry.js';
import { InstallerDataService } from '../application/services/InstallerDataService.js';
import { JobService } from '../application/services/JobService.js';
import { errorMessage } from '../core/errors.js';

const RETENTION_SWEEP_INTERVAL_MS = 60 * 60 * 1000;

export interface ServerOverrides {
  /** Replaces the builder chosen by config.builder.mode */
  builder?: IImageBuilder;
  installerOptionsFile?: string;
}

/**
 * Composition root: wires persistence, queue, worker and the HTTP surface
 */
export class ProvisioningServer {
  private dbConnection: DatabaseConnection;
  private jobQueue: JobQueue;
  private jobService: JobService;
  private webServer: WebServer;
  private retentionTimer: NodeJS.Timeout | null = null;
  private debugLog: (message: string) => void;

  constructor(
    private config: Config,
    overrides: ServerOverrides = {}
  ) {
    // Initialize debug logger
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    // Initialize database
    this.dbConnection = new DatabaseConnection(config.storage.databaseFile, config.storage.dataDir);
    const jobRepo = new JobRepository(this.dbConnection.getDatabase());

    // Initialize infrastructure
    const store = new FileArtifactStore(config.storage.artifactsDir);
    const builder = overrides.builder ?? this.createBuilder();
    const channel = new ProgressChannel();
    const worker = new BuildWorker(store, builder, this.debugLog);

    this.jobQueue = new JobQueue(
      worker.handle,
      channel,
      {
        maxConcurrentBuilds: config.jobQueue.maxConcurrentBuilds,
        maxActiveJobs: config.jobQueue.maxActiveJobs,
        stallTimeoutMs: config.jobQueue.stallTimeoutMs,
      },
      jobRepo
    );

    // Initialize services
    const installerData = new InstallerDataService(overrides.installerOptionsFile);
    this.jobService = new JobService(this.jobQueue, store, installerData);

    this.webServer = new WebServer(
      {
        jobService: this.jobService,
        installerData,
        channel,
        discoveryRegistry: new DiscoveryRegistry(),
        debugLog: this.debugLog,
      },
      config.server.port,
      config.server.host
    );
  }

  private createBuilder(): IImageBuilder {
    const { builder } = this.config;
    if (builder.mode === 'assistant') {
      return new AssistantImageBuilder({
        command: builder.command,
        baseIsoPath: builder.baseIsoPath,
        extraArgs: builder.extraArgs,
      });
    }
    return new SimulatedImageBuilder({ stepMs: builder.simulatedStepMs });
  }

  getPort(): number {
    return this.webServer.getPort();
  }

  getJobService(): JobService {
    return this.jobService;
  }

  /**
   * Print database statistics
   */
  printStats() {
    const stats = this.dbConnection.getStatistics();
    const byStatus = Object.entries(stats.jobStats)
      .map(([status, count]) => `${count} ${status}`)
      .join(', ');
    console.error(
      `📋 Job Statistics: ${stats.totalJobs} total${byStatus ? ` (${byStatus})` : ''}, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  private async sweepRetention(): Promise<void> {
    try {
      await this.jobService.clearOldJobs(this.config.jobQueue.retentionHours);
    } catch (error) {
      console.error(`⚠️ Retention sweep failed: ${errorMessage(error)}`);
    }
  }

  async start() {
    this.debugLog(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);

    await this.sweepRetention();
    this.retentionTimer = setInterval(() => {
      this.sweepRetention().catch((error) => console.error('⚠️ Retention sweep failed:', error));
    }, RETENTION_SWEEP_INTERVAL_MS);
    this.retentionTimer.unref();

    await this.webServer.start();
    console.error(`\n✅ ISO provisioning server running on port ${this.getPort()}`);
  }

  /**
   * Graceful shutdown. Builds still running are failed; they are not resumed on restart.
   */
  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');

    if (this.retentionTimer) {
      clearInterval(this.retentionTimer);
      this.retentionTimer = null;
    }

    this.jobQueue.shutdown();
    await this.webServer.stop();
    this.dbConnection.close();
  }
}
