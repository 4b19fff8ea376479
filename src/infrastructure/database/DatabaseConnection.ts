import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

const DEFAULT_DATA_DIR = path.resolve(__dirname, '../../../data');

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * @param dbFile - file name inside dataDir, or ':memory:'
   */
  constructor(dbFile: string = 'jobs.db', dataDir: string = DEFAULT_DATA_DIR) {
    this.dbPath = dbFile === IN_MEMORY ? IN_MEMORY : path.resolve(dataDir, dbFile);

    if (this.dbPath !== IN_MEMORY) {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS build_jobs (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        progress INTEGER DEFAULT 0,
        status_message TEXT NOT NULL DEFAULT '',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        started_at TIMESTAMP,
        completed_at TIMESTAMP,
        artifact_ref TEXT,
        error_detail TEXT,
        config TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_build_job_status ON build_jobs(status);
      CREATE INDEX IF NOT EXISTS idx_build_job_completed ON build_jobs(completed_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalJobs: number;
    databaseSize: number;
    jobStats: Record<string, number>;
  } {
    const rows = this.db
      .prepare<[], { status: string; count: number }>(
        'SELECT status, COUNT(*) as count FROM build_jobs GROUP BY status'
      )
      .all();

    const jobStats: Record<string, number> = {};
    let totalJobs = 0;
    for (const row of rows) {
      jobStats[row.status] = row.count;
      totalJobs += row.count;
    }

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return { totalJobs, databaseSize, jobStats };
  }
}
