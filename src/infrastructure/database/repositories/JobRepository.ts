import Database from 'better-sqlite3';
import { z } from 'zod';
import { BuildJob, isJobStatus } from '../../../core/entities/BuildJob.js';
import { DEFAULT_MAC_FILTER, InstallerConfig } from '../../../core/entities/InstallerConfig.js';
import { errorMessage } from '../../../core/errors.js';
import { IJobRepository } from '../../../core/interfaces/IJobRepository.js';

interface JobRow {
  id: string;
  status: string;
  progress: number;
  status_message: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  artifact_ref: string | null;
  error_detail: string | null;
  config: string;
}

// Stored configs were validated on the way in; this only guards against a
// hand-edited or older database.
const StoredConfigSchema = z.object({
  identity: z.object({
    fqdn: z.string(),
    email: z.string(),
    country: z.string(),
    timezone: z.string(),
    keyboardLayout: z.string(),
    rootPasswordHash: z.string(),
  }),
  network: z.discriminatedUnion('source', [
    z.object({
      source: z.literal('dhcp'),
      cidr: z.null(),
      gateway: z.null(),
      dns: z.null(),
      macFilter: z.string().default(DEFAULT_MAC_FILTER),
    }),
    z.object({
      source: z.literal('static'),
      cidr: z.string(),
      gateway: z.string(),
      dns: z.array(z.string()),
      macFilter: z.string(),
    }),
  ]),
  disk: z.object({
    filesystem: z.enum(['ext4', 'xfs', 'zfs', 'btrfs']),
    raid: z.string().optional(),
    diskList: z.array(z.string()),
  }),
});

function parseConfig(text: string): InstallerConfig {
  return StoredConfigSchema.parse(JSON.parse(text));
}

function toJob(row: JobRow): BuildJob {
  return {
    id: row.id,
    status: isJobStatus(row.status) ? row.status : 'failed',
    progress: row.progress,
    statusMessage: row.status_message,
    createdAt: new Date(row.created_at),
    startedAt: row.started_at ? new Date(row.started_at) : undefined,
    completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
    artifactRef: row.artifact_ref ?? undefined,
    errorDetail: row.error_detail ?? undefined,
    config: parseConfig(row.config),
  };
}

/**
 * SQLite implementation of job repository
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: BuildJob): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO build_jobs (id, status, progress, status_message, created_at, started_at, completed_at, artifact_ref, error_detail, config)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      job.id,
      job.status,
      job.progress,
      job.statusMessage,
      job.createdAt.toISOString(),
      job.startedAt ? job.startedAt.toISOString() : null,
      job.completedAt ? job.completedAt.toISOString() : null,
      job.artifactRef ?? null,
      job.errorDetail ?? null,
      JSON.stringify(job.config)
    );
  }

  loadJob(jobId: string): BuildJob | null {
    const row = this.db
      .prepare<[string], JobRow>('SELECT * FROM build_jobs WHERE id = ?')
      .get(jobId);

    return row ? toJob(row) : null;
  }

  getAllJobs(): BuildJob[] {
    const rows = this.db
      .prepare<[], JobRow>('SELECT * FROM build_jobs ORDER BY created_at DESC')
      .all();

    const jobs: BuildJob[] = [];
    for (const row of rows) {
      try {
        jobs.push(toJob(row));
      } catch (error) {
        console.error(`[JobRepository] ✗ Skipping unreadable job ${row.id}: ${errorMessage(error)}`);
      }
    }
    return jobs;
  }

  deleteJob(jobId: string): boolean {
    const result = this.db.prepare('DELETE FROM build_jobs WHERE id = ?').run(jobId);
    return result.changes > 0;
  }

  findRetiredBefore(cutoff: Date): string[] {
    const rows = this.db
      .prepare<[string], { id: string }>(
        `SELECT id FROM build_jobs
         WHERE completed_at IS NOT NULL AND completed_at < ?
           AND status IN ('complete', 'failed', 'cancelled')`
      )
      .all(cutoff.toISOString());

    return rows.map((row) => row.id);
  }
}
