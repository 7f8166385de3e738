import { type Queryable } from "../../db";
import { KeyedLock } from "../../utils/keyedLock";
import { DuplicateJobError, InvalidJobTransitionError, JobNotFoundError } from "./jobs.errors";
import { applyJobUpdate } from "./jobStateMachine";
import { type Job, type JobRow, type JobStatus, type JobUpdate, isJobStatus } from "./jobs.types";

const JOB_COLUMNS = `id, status, filename, file_hash, total_units, processed_units,
  error_message, created_at, updated_at`;

const UNIQUE_VIOLATION = "23505";

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

function mapJobRow(row: JobRow): Job {
  if (!isJobStatus(row.status)) {
    throw new Error(`unknown_job_status:${row.status}`);
  }
  return {
    id: row.id,
    status: row.status,
    filename: row.filename,
    fileHash: row.file_hash,
    totalUnits: Number(row.total_units),
    processedUnits: Number(row.processed_units),
    errorMessage: row.error_message,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

/**
 * Durable job registry backed by PostgreSQL. Writes for one job id are
 * serialized in-process; each write is a single compare-and-set statement.
 */
export class JobStore {
  private readonly db: Queryable;
  private readonly writes = new KeyedLock();
  private readonly now: () => Date;

  constructor(db: Queryable, options: { now?: () => Date } = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
  }

  async create(id: string, filename: string, fileHash: string | null = null): Promise<Job> {
    return this.writes.run(id, async () => {
      if (await this.idTaken(id)) {
        throw new DuplicateJobError(id);
      }
      const timestamp = this.now().toISOString();
      try {
        const res = await this.db.query<JobRow>(
          `insert into jobs
           (id, status, filename, file_hash, total_units, processed_units, error_message, created_at, updated_at)
           values ($1, 'pending', $2, $3, 0, 0, null, $4, $5)
           returning ${JOB_COLUMNS}`,
          [id, filename, fileHash, timestamp, timestamp]
        );
        return mapJobRow(res.rows[0]);
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new DuplicateJobError(id);
        }
        throw err;
      }
    });
  }

  async update(id: string, update: JobUpdate): Promise<Job> {
    return this.writes.run(id, async () => {
      const current = await this.get(id);
      const next = applyJobUpdate(current, update);
      const updatedAt = this.nextUpdatedAt(current.updatedAt);
      const res = await this.db.query<JobRow>(
        `update jobs
         set status = $2,
             total_units = $3,
             processed_units = $4,
             error_message = $5,
             updated_at = $6
         where id = $1 and status = $7 and processed_units = $8 and deleted_at is null
         returning ${JOB_COLUMNS}`,
        [
          id,
          next.status,
          next.totalUnits,
          next.processedUnits,
          next.errorMessage,
          updatedAt.toISOString(),
          current.status,
          current.processedUnits,
        ]
      );
      const row = res.rows[0];
      if (!row) {
        const latest = await this.find(id);
        if (!latest) {
          throw new JobNotFoundError(id);
        }
        throw new InvalidJobTransitionError(id, latest.status, "job changed by a concurrent writer");
      }
      return mapJobRow(row);
    });
  }

  async get(id: string): Promise<Job> {
    const job = await this.find(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  async find(id: string): Promise<Job | null> {
    const res = await this.db.query<JobRow>(
      `select ${JOB_COLUMNS} from jobs where id = $1 and deleted_at is null`,
      [id]
    );
    return res.rows[0] ? mapJobRow(res.rows[0]) : null;
  }

  async list(status?: JobStatus): Promise<Job[]> {
    const res = status
      ? await this.db.query<JobRow>(
          `select ${JOB_COLUMNS} from jobs
           where status = $1 and deleted_at is null
           order by created_at desc, seq desc`,
          [status]
        )
      : await this.db.query<JobRow>(
          `select ${JOB_COLUMNS} from jobs where deleted_at is null order by created_at desc, seq desc`
        );
    return res.rows.map(mapJobRow);
  }

  /** Terminal jobs created strictly before `cutoff`, oldest first. */
  async listTerminalCreatedBefore(cutoff: Date): Promise<Job[]> {
    const res = await this.db.query<JobRow>(
      `select ${JOB_COLUMNS} from jobs
       where status in ('completed', 'failed') and created_at < $1 and deleted_at is null
       order by created_at asc, seq asc`,
      [cutoff.toISOString()]
    );
    return res.rows.map(mapJobRow);
  }

  /**
   * Idempotent: returns false when there was nothing to delete. The row stays
   * behind as a tombstone so the id cannot be created again.
   */
  async delete(id: string): Promise<boolean> {
    return this.writes.run(id, async () => {
      const res = await this.db.query<{ id: string }>(
        "update jobs set deleted_at = $2 where id = $1 and deleted_at is null returning id",
        [id, this.now().toISOString()]
      );
      return res.rows.length > 0;
    });
  }

  /** True for live and deleted ids alike. */
  private async idTaken(id: string): Promise<boolean> {
    const res = await this.db.query<{ id: string }>("select id from jobs where id = $1", [id]);
    return res.rows.length > 0;
  }

  private nextUpdatedAt(previous: Date): Date {
    const now = this.now();
    return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
  }
}
