import { subDays } from "date-fns";
import type { AlertEngine } from "../alerts/alertEngine";
import type { MetricsAggregator } from "../analytics/metricsAggregator";
import type { PredictionLedger } from "../ml/predictionLedger";

export type JobName = "metrics_recompute" | "alert_evaluation" | "prediction_archival";

export interface ScheduledJob {
  name: JobName;
  intervalMinutes: number;
  /** Returns a one-line summary for the log. */
  run: () => Promise<string>;
}

export type JobHealth = "healthy" | "warning" | "error" | "stale";

export interface JobStatus {
  name: JobName;
  intervalMinutes: number;
  running: boolean;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  freshnessMinutes: number | null;
  status: JobHealth;
}

export interface JobRunResult {
  name: JobName;
  success: boolean;
  skipped: boolean;
  summary?: string;
  error?: string;
}

interface JobState {
  job: ScheduledJob;
  timer: NodeJS.Timeout | null;
  running: boolean;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
}

export interface JobDependencies {
  metrics: MetricsAggregator;
  alerts: AlertEngine;
  ledger: PredictionLedger;
}

export interface JobSettings {
  metricsWindowDays: number;
  metricsIntervalMinutes: number;
  alertsIntervalMinutes: number;
  archiveIntervalHours: number;
  predictionRetentionDays: number;
}

export function createDefaultJobs(deps: JobDependencies, settings: JobSettings): ScheduledJob[] {
  return [
    {
      name: "metrics_recompute",
      intervalMinutes: settings.metricsIntervalMinutes,
      run: async () => {
        const end = new Date();
        const result = await deps.metrics.recompute(subDays(end, settings.metricsWindowDays), end);
        return `${result.dashboardMetrics} dashboard metrics, ${result.customerMetrics} customers, ${result.timeseriesPoints} series points`;
      },
    },
    {
      name: "alert_evaluation",
      intervalMinutes: settings.alertsIntervalMinutes,
      run: async () => {
        const result = await deps.alerts.evaluate();
        return `${result.created} created, ${result.resolved} resolved`;
      },
    },
    {
      name: "prediction_archival",
      intervalMinutes: settings.archiveIntervalHours * 60,
      run: async () => {
        const archived = await deps.ledger.archiveSuperseded(subDays(new Date(), settings.predictionRetentionDays));
        return `${archived} predictions archived`;
      },
    },
  ];
}

/**
 * Runs the periodic batch jobs in-process. Each job has its own interval and
 * never overlaps with itself; a tick that arrives while the previous run is
 * still going is skipped.
 */
export class JobScheduler {
  private isRunning = false;
  private readonly jobs = new Map<JobName, JobState>();
  private readonly MAX_CONSECUTIVE_FAILURES = 5;
  // Freshness is judged in multiples of the job's own interval.
  private readonly FRESHNESS_WARNING_INTERVALS = 2;
  private readonly FRESHNESS_STALE_INTERVALS = 4;

  constructor(jobs: readonly ScheduledJob[]) {
    for (const job of jobs) {
      this.jobs.set(job.name, {
        job,
        timer: null,
        running: false,
        lastRunAt: null,
        lastSuccessAt: null,
        lastError: null,
        consecutiveFailures: 0,
      });
    }
  }

  start(): void {
    if (this.isRunning) {
      console.log("[JobScheduler] Already running");
      return;
    }

    this.isRunning = true;
    for (const state of this.jobs.values()) {
      state.timer = setInterval(() => {
        this.runNow(state.job.name).catch(console.error);
      }, state.job.intervalMinutes * 60000);
    }
    console.log(`[JobScheduler] Started ${this.jobs.size} jobs`);
  }

  stop(): void {
    for (const state of this.jobs.values()) {
      if (state.timer) {
        clearInterval(state.timer);
        state.timer = null;
      }
    }
    this.isRunning = false;
    console.log("[JobScheduler] Stopped");
  }

  async runNow(name: JobName): Promise<JobRunResult> {
    const state = this.jobs.get(name);
    if (!state) {
      return { name, success: false, skipped: true, error: `Unknown job: ${name}` };
    }
    if (state.running) {
      console.log(`[JobScheduler] ${name} still running, skipping`);
      return { name, success: false, skipped: true };
    }

    state.running = true;
    state.lastRunAt = new Date();
    try {
      const summary = await state.job.run();
      state.lastSuccessAt = new Date();
      state.lastError = null;
      state.consecutiveFailures = 0;
      console.log(`[JobScheduler] ${name} completed: ${summary}`);
      return { name, success: true, skipped: false, summary };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      state.lastError = message;
      state.consecutiveFailures++;
      console.error(`[JobScheduler] ${name} failed (${state.consecutiveFailures} in a row):`, error);
      return { name, success: false, skipped: false, error: message };
    } finally {
      state.running = false;
    }
  }

  getJobStatus(now: Date = new Date()): JobStatus[] {
    return Array.from(this.jobs.values()).map((state) => {
      const { job } = state;
      let status: JobHealth = "healthy";
      let freshnessMinutes: number | null = null;

      if (state.lastSuccessAt) {
        freshnessMinutes = Math.floor((now.getTime() - state.lastSuccessAt.getTime()) / 60000);
        if (freshnessMinutes > job.intervalMinutes * this.FRESHNESS_STALE_INTERVALS) {
          status = "stale";
        } else if (freshnessMinutes > job.intervalMinutes * this.FRESHNESS_WARNING_INTERVALS) {
          status = "warning";
        }
      } else {
        status = "stale";
      }

      if (state.consecutiveFailures >= this.MAX_CONSECUTIVE_FAILURES) {
        status = "error";
      } else if (state.consecutiveFailures > 0) {
        status = "warning";
      }

      return {
        name: job.name,
        intervalMinutes: job.intervalMinutes,
        running: state.running,
        lastRunAt: state.lastRunAt,
        lastSuccessAt: state.lastSuccessAt,
        lastError: state.lastError,
        consecutiveFailures: state.consecutiveFailures,
        freshnessMinutes,
        status,
      };
    });
  }

  get running(): boolean {
    return this.isRunning;
  }
}
