import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { isRenderJobStatus, type RenderJobStatus } from '../../core/entities/RenderJob.js';

export const IN_MEMORY_DATABASE = ':memory:';

export interface HistoryStatistics {
  totalJobs: number;
  jobsByStatus: Record<RenderJobStatus, number>;
  framesRendered: number;
  framesSkipped: number;
  databaseSize: number;
}

interface StatusCountRow {
  status: string;
  count: number;
}

interface FrameCountRow {
  completed: number | null;
  skipped: number | null;
}

/**
 * Render history database connection
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY_DATABASE) {
      this.dbPath = dbPath;
    } else {
      this.dbPath = path.resolve(dbPath);
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (dbPath !== IN_MEMORY_DATABASE) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS render_jobs (
        id TEXT PRIMARY KEY,
        hip_path TEXT NOT NULL,
        out_node TEXT NOT NULL,
        range_start INTEGER,
        range_end INTEGER,
        range_step INTEGER,
        skip_existing INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL,
        command_line TEXT NOT NULL,
        created_at TEXT NOT NULL,
        finished_at TEXT,
        finish_reason TEXT,
        error TEXT,
        total_frames INTEGER NOT NULL DEFAULT 0,
        frames_completed INTEGER NOT NULL DEFAULT 0,
        frames_skipped INTEGER NOT NULL DEFAULT 0,
        average_frame_seconds REAL NOT NULL DEFAULT 0,
        elapsed_seconds REAL NOT NULL DEFAULT 0,
        last_image TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_render_jobs_status ON render_jobs(status);
      CREATE INDEX IF NOT EXISTS idx_render_jobs_created ON render_jobs(created_at);

      CREATE TABLE IF NOT EXISTS render_frames (
        job_id TEXT NOT NULL,
        frame_number INTEGER NOT NULL,
        sequence_index INTEGER,
        status TEXT NOT NULL,
        duration_seconds REAL,
        progress_percent INTEGER,
        started_at TEXT,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (job_id, frame_number),
        FOREIGN KEY (job_id) REFERENCES render_jobs(id) ON DELETE CASCADE
      );
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

  getStatistics(): HistoryStatistics {
    const jobsByStatus: HistoryStatistics['jobsByStatus'] = {
      running: 0,
      completed: 0,
      canceled: 0,
      killed: 0,
      failed: 0,
    };

    let totalJobs = 0;
    const rows = this.db
      .prepare<[], StatusCountRow>('SELECT status, COUNT(*) AS count FROM render_jobs GROUP BY status')
      .all();
    for (const row of rows) {
      totalJobs += row.count;
      if (isRenderJobStatus(row.status)) {
        jobsByStatus[row.status] = row.count;
      }
    }

    const frames = this.db
      .prepare<[], FrameCountRow>(`
        SELECT
          SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) AS completed,
          SUM(CASE WHEN status = 'skipped' THEN 1 ELSE 0 END) AS skipped
        FROM render_frames
      `)
      .get();

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY_DATABASE && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalJobs,
      jobsByStatus,
      framesRendered: frames?.completed ?? 0,
      framesSkipped: frames?.skipped ?? 0,
      databaseSize,
    };
  }
}
