import type { FastifyBaseLogger } from "fastify";
import { nanoid } from "nanoid";
import type {
  AcceleratorResponse,
  AcceleratorStopReport,
  ConfigurationPayload,
  PoolSnapshot,
  ProcessJob,
  ProcessResult,
  StartStrictness,
  StopPolicy,
  TaskState,
} from "@accelfleet/shared";
import {
  CancelledError,
  ConfigurationError,
  PoolClosedError,
  PoolStartError,
  errorMessage,
  toError,
  type MemberFailure,
} from "../errors.js";
import type { ProcessOptions } from "./accelerator.js";

/** What the pool needs from an accelerator. */
export interface PoolMember {
  readonly name: string;
  start(payload: ConfigurationPayload): Promise<unknown>;
  process(job: ProcessJob, options?: ProcessOptions): Promise<ProcessResult>;
  stop(policy?: StopPolicy): Promise<AcceleratorStopReport>;
}

interface OutcomeBase {
  taskId: string;
  seq: number;
}

export type TaskOutcome =
  | (OutcomeBase & {
      status: "done";
      member: number;
      result: Record<string, unknown>;
      diagnostics: AcceleratorResponse;
    })
  | (OutcomeBase & { status: "failed"; member: number | null; error: Error })
  | (OutcomeBase & { status: "cancelled"; member: number | null });

export interface TaskHandle {
  readonly id: string;
  /** Submission index within the pool. */
  readonly seq: number;
  readonly state: TaskState;
  readonly member: number | null;
  /** Settles once the task is done, failed or cancelled; never rejects. */
  readonly outcome: Promise<TaskOutcome>;
  /**
   * Queued tasks are removed; running tasks get an abort signal. Returns
   * false when the task has already settled.
   */
  cancel(): boolean;
}

export interface SubmitOptions {
  timeoutMs?: number | null;
}

export interface PoolStartOptions {
  strictness?: StartStrictness;
}

export interface PoolStartReport {
  size: number;
  active: number[];
  failures: MemberFailure[];
}

export interface PoolStopOptions {
  policy?: StopPolicy;
  /** Abort queued and running tasks instead of draining them. */
  cancel?: boolean;
}

export interface PoolStopReport {
  members: AcceleratorStopReport[];
}

export interface AcceleratorPoolConfig<M extends PoolMember> {
  size: number;
  createMember: (index: number) => M;
  startStrictness?: StartStrictness;
  defaultTimeoutMs?: number | null;
  log: FastifyBaseLogger;
}

interface MemberSlot<M> {
  index: number;
  member: M;
  active: boolean;
  busy: boolean;
  completed: number;
  failed: number;
}

class PoolTask implements TaskHandle {
  readonly id = nanoid(12);
  readonly outcome: Promise<TaskOutcome>;
  readonly controller = new AbortController();
  state: TaskState = "queued";
  member: number | null = null;

  private resolveOutcome: (outcome: TaskOutcome) => void = () => {};

  constructor(
    readonly seq: number,
    readonly job: ProcessJob,
    readonly timeoutMs: number | null,
    private onCancel: (task: PoolTask) => boolean,
  ) {
    this.outcome = new Promise((resolve) => {
      this.resolveOutcome = resolve;
    });
  }

  cancel(): boolean {
    return this.onCancel(this);
  }

  get settled(): boolean {
    return this.state === "done" || this.state === "failed" || this.state === "cancelled";
  }

  settle(outcome: TaskOutcome): void {
    if (this.settled) return;
    this.state = outcome.status;
    this.resolveOutcome(outcome);
  }
}

/**
 * Fixed set of accelerators processing jobs concurrently. Jobs queue in
 * submission order and go to the next idle member, round-robin. Every
 * submitted task settles to done, failed or cancelled.
 */
export class AcceleratorPool<M extends PoolMember = PoolMember> {
  readonly size: number;

  private slots: MemberSlot<M>[];
  private log: FastifyBaseLogger;
  private strictness: StartStrictness;
  private defaultTimeoutMs: number | null;

  private pending: PoolTask[] = [];
  private inFlight = new Map<string, PoolTask>();
  private drainWaiters: Array<() => void> = [];
  private cursor = 0;
  private nextSeq = 0;
  private started = false;
  private closed = false;
  private starting: Promise<PoolStartReport> | null = null;
  private stopping: Promise<PoolStopReport> | null = null;

  constructor(config: AcceleratorPoolConfig<M>) {
    if (!Number.isInteger(config.size) || config.size < 1) {
      throw new ConfigurationError(`Pool size must be a positive integer, got ${config.size}`);
    }
    this.size = config.size;
    this.log = config.log;
    this.strictness = config.startStrictness ?? "strict";
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? null;
    this.slots = Array.from({ length: config.size }, (_, index) => ({
      index,
      member: config.createMember(index),
      active: true,
      busy: false,
      completed: 0,
      failed: 0,
    }));
  }

  get members(): readonly M[] {
    return this.slots.map((s) => s.member);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Starts every member concurrently with the same configuration. Once
   * started, each call sends its configuration to the active members;
   * calls run one after another in call order.
   */
  start(payload: ConfigurationPayload = {}, options: PoolStartOptions = {}): Promise<PoolStartReport> {
    if (this.closed) return Promise.reject(new PoolClosedError());
    const strictness = options.strictness ?? this.strictness;
    const run = () => this.startMembers(payload, strictness);
    const next = this.starting ? this.starting.then(run, run) : run();
    this.starting = next;
    return next;
  }

  submit(job: ProcessJob, options: SubmitOptions = {}): TaskHandle {
    if (this.closed) throw new PoolClosedError();

    const timeoutMs = options.timeoutMs === undefined ? this.defaultTimeoutMs : options.timeoutMs;
    const task = new PoolTask(this.nextSeq++, job, timeoutMs, (t) => this.cancelTask(t));
    this.pending.push(task);
    this.dispatch();
    return task;
  }

  /** Submits all jobs and resolves with their outcomes in submission order. */
  map(jobs: ProcessJob[], options: SubmitOptions = {}): Promise<TaskOutcome[]> {
    const handles = jobs.map((job) => this.submit(job, options));
    return Promise.all(handles.map((h) => h.outcome));
  }

  /**
   * Closes submission, drains (or cancels) outstanding tasks, then stops
   * every member. Later calls return the first call's report.
   */
  stop(options: PoolStopOptions = {}): Promise<PoolStopReport> {
    this.stopping ??= this.shutdown(options);
    return this.stopping;
  }

  snapshot(): PoolSnapshot {
    return {
      size: this.size,
      started: this.started,
      closed: this.closed,
      queued: this.pending.length,
      running: this.inFlight.size,
      members: this.slots.map((s) => ({
        index: s.index,
        name: s.member.name,
        active: s.active,
        busy: s.busy,
        completed: s.completed,
        failed: s.failed,
      })),
    };
  }

  private async startMembers(
    payload: ConfigurationPayload,
    strictness: StartStrictness,
  ): Promise<PoolStartReport> {
    if (this.closed) throw new PoolClosedError();

    const targets = this.slots.filter((s) => s.active);
    this.log.info(
      { size: this.size, members: targets.length, strictness },
      this.started ? "Reconfiguring accelerator pool" : "Starting accelerator pool",
    );
    const results = await Promise.allSettled(targets.map((s) => s.member.start(payload)));

    const failures: MemberFailure[] = [];
    results.forEach((r, i) => {
      if (r.status === "rejected") failures.push({ index: targets[i].index, error: toError(r.reason) });
    });

    if (this.closed) throw new PoolClosedError();

    if (failures.length > 0 && (strictness === "strict" || failures.length === targets.length)) {
      const error = new PoolStartError(failures, this.size);
      this.log.error({ err: error }, "Accelerator pool failed to start, stopping all members");
      await this.stop({ cancel: true });
      throw error;
    }

    if (failures.length > 0) {
      for (const failure of failures) {
        this.slots[failure.index].active = false;
      }
      this.log.warn(
        { failed: failures.map((f) => f.index), size: this.size },
        "Continuing with the pool members that started",
      );
      const stops = await Promise.allSettled(
        failures.map((f) => this.slots[f.index].member.stop()),
      );
      stops.forEach((s, i) => {
        if (s.status === "rejected") {
          this.log.warn(
            { err: s.reason, member: failures[i].index },
            "Failed to stop pool member that did not start",
          );
        }
      });
    }

    this.started = true;
    this.dispatch();

    const active = this.slots.filter((s) => s.active).map((s) => s.index);
    this.log.info({ active }, "Accelerator pool started");
    return { size: this.size, active, failures };
  }

  private dispatch(): void {
    if (!this.started) return;
    while (this.pending.length > 0) {
      const slot = this.nextIdleSlot();
      if (!slot) return;
      const task = this.pending.shift();
      if (!task) return;
      this.run(slot, task);
    }
  }

  /** Next active, idle member after the last assigned one. */
  private nextIdleSlot(): MemberSlot<M> | null {
    const n = this.slots.length;
    for (let i = 0; i < n; i++) {
      const slot = this.slots[(this.cursor + i) % n];
      if (slot.active && !slot.busy) {
        this.cursor = (slot.index + 1) % n;
        return slot;
      }
    }
    return null;
  }

  private run(slot: MemberSlot<M>, task: PoolTask): void {
    slot.busy = true;
    task.member = slot.index;
    task.state = "assigned";
    this.inFlight.set(task.id, task);

    const execute = async (): Promise<TaskOutcome> => {
      task.state = "running";
      try {
        const { result, diagnostics } = await slot.member.process(task.job, {
          timeoutMs: task.timeoutMs,
          signal: task.controller.signal,
        });
        slot.completed++;
        return { status: "done", taskId: task.id, seq: task.seq, member: slot.index, result, diagnostics };
      } catch (err) {
        if (err instanceof CancelledError) {
          return { status: "cancelled", taskId: task.id, seq: task.seq, member: slot.index };
        }
        slot.failed++;
        this.log.warn(
          { taskId: task.id, member: slot.index, err: errorMessage(err) },
          "Pool task failed",
        );
        return { status: "failed", taskId: task.id, seq: task.seq, member: slot.index, error: toError(err) };
      }
    };

    execute()
      .then((outcome) => {
        slot.busy = false;
        this.inFlight.delete(task.id);
        task.settle(outcome);
        this.dispatch();
        this.checkDrained();
      })
      .catch((err: unknown) => {
        this.log.error({ err, taskId: task.id }, "Pool dispatcher error");
      });
  }

  private cancelTask(task: PoolTask): boolean {
    if (task.state === "queued") {
      const index = this.pending.indexOf(task);
      if (index >= 0) this.pending.splice(index, 1);
      task.settle({ status: "cancelled", taskId: task.id, seq: task.seq, member: null });
      this.checkDrained();
      return true;
    }
    if (task.state === "assigned" || task.state === "running") {
      task.controller.abort();
      return true;
    }
    return false;
  }

  private async shutdown(options: PoolStopOptions): Promise<PoolStopReport> {
    this.closed = true;
    const cancel = options.cancel ?? false;

    // Queued work can only drain once the members are up.
    if (cancel || !this.started) {
      for (const task of this.pending.splice(0)) {
        task.settle({ status: "cancelled", taskId: task.id, seq: task.seq, member: null });
      }
    }
    if (cancel) {
      for (const task of this.inFlight.values()) task.controller.abort();
    }

    this.log.info(
      { queued: this.pending.length, running: this.inFlight.size, cancel },
      "Stopping accelerator pool",
    );
    await this.drained();

    const results = await Promise.allSettled(
      this.slots.map((s) => s.member.stop(options.policy)),
    );
    const members = results.map((r, index): AcceleratorStopReport => {
      if (r.status === "fulfilled") return r.value;
      this.log.warn({ err: r.reason, member: index }, "Pool member failed to stop");
      return {
        accelerator: this.slots[index].member.name,
        session: "failed",
        host: {
          policy: options.policy ?? "terminate",
          action: "failed",
          instanceId: null,
          warning: errorMessage(r.reason),
        },
      };
    });

    this.log.info({ members: members.length }, "Accelerator pool stopped");
    return { members };
  }

  private drained(): Promise<void> {
    if (this.pending.length === 0 && this.inFlight.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  private checkDrained(): void {
    if (this.pending.length > 0 || this.inFlight.size > 0) return;
    for (const resolve of this.drainWaiters.splice(0)) resolve();
  }
}
