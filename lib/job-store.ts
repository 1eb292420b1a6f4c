import { randomUUID } from "node:crypto";
import { configuredSecrets } from "@/lib/env";
import { errorMessage, redactSecrets } from "@/lib/pipeline/errors";

// --- Types ---

export type JobStatus = "pending" | "processing" | "completed" | "failed";

export interface Job {
  id: string;
  status: JobStatus;
  /** 0-100 */
  progress: number;
  current_step: string | null;
  /** Ebook id, set once completed. */
  result_id: string | null;
  /** Set once failed. */
  error: string | null;
  created_at: string;
  updated_at: string;
}

export type JobPatch = Partial<Pick<Job, "status" | "progress" | "current_step" | "result_id" | "error">>;

/** Runs the work for a job and resolves with the created ebook's id. */
export type JobExecutor = (job: Job, update: (patch: JobPatch) => void) => Promise<string>;

export type JobListener = (job: Job) => void;

const STATUS_RANK: Record<JobStatus, number> = {
  pending: 0,
  processing: 1,
  completed: 2,
  failed: 2,
};

export function isTerminal(status: JobStatus): boolean {
  return status === "completed" || status === "failed";
}

export interface JobStoreOptions {
  now?: () => Date;
  /** Values removed from failure messages. */
  secrets?: () => readonly string[];
  /** Finished jobs older than this are dropped. */
  retentionMs?: number;
}

// --- Store ---

export class JobStore {
  private jobs = new Map<string, Job>();
  private listeners = new Set<JobListener>();
  private readonly now: () => Date;
  private readonly secrets: () => readonly string[];
  private readonly retentionMs: number;

  constructor(options: JobStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.secrets = options.secrets ?? configuredSecrets;
    this.retentionMs = options.retentionMs ?? 60 * 60 * 1000;
  }

  create(): Job {
    this.prune();
    const timestamp = this.now().toISOString();
    const job: Job = {
      id: randomUUID(),
      status: "pending",
      progress: 0,
      current_step: null,
      result_id: null,
      error: null,
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.jobs.set(job.id, job);
    this.notify(job);
    return job;
  }

  /**
   * Apply a patch. Unknown ids are ignored, as is any patch to a finished
   * job or one that would move the status backwards.
   */
  update(id: string, patch: JobPatch): void {
    const job = this.jobs.get(id);
    if (!job || isTerminal(job.status)) return;
    if (patch.status && STATUS_RANK[patch.status] < STATUS_RANK[job.status]) return;

    Object.assign(job, patch, { updated_at: this.now().toISOString() });
    this.notify(job);
  }

  /** A snapshot of the job, or undefined when it is unknown. */
  get(id: string): Job | undefined {
    const job = this.jobs.get(id);
    return job ? { ...job } : undefined;
  }

  delete(id: string): boolean {
    return this.jobs.delete(id);
  }

  subscribe(fn: JobListener): void {
    this.listeners.add(fn);
  }

  unsubscribe(fn: JobListener): void {
    this.listeners.delete(fn);
  }

  /**
   * Move the job to processing and run the executor. Failures are recorded
   * on the job with credentials redacted; this never rejects.
   */
  async run(id: string, executor: JobExecutor): Promise<void> {
    const job = this.jobs.get(id);
    if (!job) return;

    this.update(id, { status: "processing" });
    try {
      const ebookId = await executor({ ...job }, (patch) => this.update(id, patch));
      this.update(id, { status: "completed", progress: 100, result_id: ebookId });
      console.log(`[job ${id}] completed: ebook ${ebookId}`);
    } catch (err) {
      const message = redactSecrets(errorMessage(err), this.secrets()) || "Unknown error";
      console.error(`[job ${id}] failed: ${message}`);
      this.update(id, { status: "failed", current_step: "Failed", error: message });
    }
  }

  private notify(job: Job) {
    const snapshot = { ...job };
    for (const fn of this.listeners) {
      try {
        fn(snapshot);
      } catch (err) {
        // listener errors should not break the store
        console.warn(`[job ${job.id}] listener failed: ${errorMessage(err)}`);
      }
    }
  }

  private prune() {
    const cutoff = this.now().getTime() - this.retentionMs;
    for (const [id, job] of this.jobs) {
      if (isTerminal(job.status) && Date.parse(job.updated_at) < cutoff) {
        this.jobs.delete(id);
      }
    }
  }
}

// --- Singleton ---

const globalForJobs = globalThis as unknown as { __jobStore?: JobStore };
export const jobStore = globalForJobs.__jobStore ?? new JobStore();
globalForJobs.__jobStore = jobStore;
