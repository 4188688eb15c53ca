import { DEFAULT_PARAMETERS, type ControlParameters } from "../models/controlParameters";
import type { ControlEvent } from "../models/controlEvent";
import type { ActuatorGateway, EventSink, SensorGateway } from "../models/gateways";
import type { RelayName, SystemState, TankId } from "../models/systemState";
import type { LogFn, LogLevel } from "../lib/log";
import type { ParameterSource } from "./ControlCore";
import type { LoopScheduler } from "./ControlLoop";

export interface LogLine {
	level: LogLevel;
	message: string;
}

export function createLogRecorder(): { log: LogFn; lines: LogLine[] } {
	const lines: LogLine[] = [];
	return {
		lines,
		log: (level, message) => {
			lines.push({ level, message });
		},
	};
}

export class FakeParameters implements ParameterSource {
	current: Readonly<ControlParameters>;

	constructor(overrides: Partial<ControlParameters> = {}) {
		this.current = Object.freeze({ ...DEFAULT_PARAMETERS, ...overrides });
	}

	set(overrides: Partial<ControlParameters>): void {
		this.current = Object.freeze({ ...this.current, ...overrides });
	}

	snapshot(): Readonly<ControlParameters> {
		return this.current;
	}
}

export type SensorBehaviour = number | null | Error | "hang";

export class FakeSensors implements SensorGateway {
	values: Record<TankId, SensorBehaviour>;
	reads = 0;

	constructor(temperature: SensorBehaviour = 60) {
		this.values = { 1: temperature, 2: temperature, 3: temperature };
	}

	setAll(temperature: SensorBehaviour): void {
		this.values = { 1: temperature, 2: temperature, 3: temperature };
	}

	async read(tank: TankId): Promise<number | null> {
		this.reads++;
		const value = this.values[tank];
		if (value === "hang") {
			return await new Promise<number | null>(() => undefined);
		}
		if (value instanceof Error) {
			throw value;
		}
		return value;
	}
}

export class FakeActuators implements ActuatorGateway {
	writes: Array<[RelayName, boolean]> = [];
	failing = new Set<RelayName>();

	async set(relay: RelayName, on: boolean): Promise<void> {
		if (this.failing.has(relay)) {
			throw new Error("relay offline");
		}
		this.writes.push([relay, on]);
	}
}

export class RecordingSink implements EventSink {
	states: SystemState[] = [];
	events: ControlEvent[] = [];

	async publish(state: SystemState): Promise<void> {
		this.states.push(state);
	}

	async publishEvent(event: ControlEvent): Promise<void> {
		this.events.push(event);
	}

	kinds(): string[] {
		return this.events.map(event => event.kind);
	}
}

interface ScheduledTask {
	id: number;
	callback: () => void;
	delayMs: number;
}

/**
 * Scheduler that only fires when the test says so
 */
export class ManualScheduler implements LoopScheduler<number> {
	pending: ScheduledTask[] = [];
	cancelled: number[] = [];
	private nextId = 1;

	schedule(callback: () => void, delayMs: number): number {
		const id = this.nextId++;
		this.pending.push({ id, callback, delayMs });
		return id;
	}

	cancel(handle: number): void {
		this.cancelled.push(handle);
		this.pending = this.pending.filter(task => task.id !== handle);
	}

	fireNext(): void {
		const task = this.pending.shift();
		if (!task) {
			throw new Error("nothing scheduled");
		}
		task.callback();
	}
}
