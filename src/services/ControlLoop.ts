import type { ControlEvent } from "../models/controlEvent";
import type { EventSink } from "../models/gateways";
import { describeError } from "../lib/errors";
import type { LogFn } from "../lib/log";
import { SentryUtils } from "../lib/sentry";
import type { ControlCore, ParameterSource } from "./ControlCore";

/**
 * Timer facility used to schedule cycles; the adapter passes its managed timers
 */
export interface LoopScheduler<H> {
	schedule(callback: () => void, delayMs: number): H;
	cancel(handle: H): void;
}

export interface ControlLoopOptions<H> {
	core: ControlCore;
	parameters: ParameterSource;
	sink: EventSink;
	log: LogFn;
	scheduler: LoopScheduler<H>;
	/** Current time in ms, defaults to Date.now */
	clock?: () => number;
}

/**
 * Drives {@link ControlCore} every update interval. At most one cycle runs at a time;
 * a tick that arrives while a cycle is in flight is skipped.
 */
export class ControlLoop<H> {
	private readonly core: ControlCore;
	private readonly parameters: ParameterSource;
	private readonly sink: EventSink;
	private readonly log: LogFn;
	private readonly scheduler: LoopScheduler<H>;
	private readonly clock: () => number;

	private running = false;
	private handle: { value: H } | null = null;
	private inFlight: Promise<void> | null = null;
	private scheduled: Promise<void> = Promise.resolve();

	constructor(options: ControlLoopOptions<H>) {
		this.core = options.core;
		this.parameters = options.parameters;
		this.sink = options.sink;
		this.log = options.log;
		this.scheduler = options.scheduler;
		this.clock = options.clock ?? Date.now;
	}

	isRunning(): boolean {
		return this.running;
	}

	/**
	 * Run a cycle now and keep running one every update interval
	 */
	async start(): Promise<void> {
		if (this.running) {
			this.log("warn", "[Loop] Control loop already running");
			return;
		}
		this.running = true;
		this.log("info", "[Loop] Control loop started");
		await this.publishEvent("startup", "Temperature controller started");
		this.scheduled = this.runScheduledCycle();
	}

	/**
	 * Run one cycle unless another one is still in flight
	 *
	 * @returns False when the tick was skipped
	 */
	async tick(): Promise<boolean> {
		if (this.inFlight) {
			this.log("debug", "[Loop] Previous cycle still running, tick skipped");
			return false;
		}
		this.inFlight = this.runGuarded();
		try {
			await this.inFlight;
		} finally {
			this.inFlight = null;
		}
		return true;
	}

	/**
	 * Resolves once the cycle started by the scheduler (or {@link ControlLoop.start}) has finished
	 */
	async waitForCycle(): Promise<void> {
		await this.scheduled;
	}

	/**
	 * Stop scheduling and wait for the current cycle. Relays keep their last commanded state.
	 */
	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.handle) {
			this.scheduler.cancel(this.handle.value);
			this.handle = null;
		}
		if (this.inFlight) {
			await this.inFlight;
		}
		await this.publishEvent("shutdown", "Temperature controller stopped");
		this.log("info", "[Loop] Control loop stopped");
	}

	private async runScheduledCycle(): Promise<void> {
		const startedAt = this.clock();
		await this.tick();
		this.scheduleNext(startedAt);
	}

	private scheduleNext(startedAt: number): void {
		if (!this.running) {
			return;
		}
		const intervalMs = this.parameters.snapshot().updateInterval * 1000;
		const delayMs = Math.max(0, startedAt + intervalMs - this.clock());
		this.handle = {
			value: this.scheduler.schedule(() => {
				this.handle = null;
				this.scheduled = this.runScheduledCycle();
			}, delayMs),
		};
	}

	private async runGuarded(): Promise<void> {
		try {
			await SentryUtils.startSpanAsync("control cycle", "control.cycle", () => this.core.runCycle());
		} catch (error) {
			this.log("error", `[Loop] Error in control loop: ${describeError(error)}`);
			if (error instanceof Error) {
				SentryUtils.captureException(error);
			}
			await this.publishEvent("error", `Control loop error: ${describeError(error)}`);
		}
	}

	private async publishEvent(kind: ControlEvent["kind"], description: string): Promise<void> {
		try {
			await this.sink.publishEvent({ kind, description, timestamp: this.clock() });
		} catch (error) {
			this.log("error", `[Loop] Publishing ${kind} event failed: ${describeError(error)}`);
		}
	}
}
