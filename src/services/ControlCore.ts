import type { ControlParameters } from "../models/controlParameters";
import type { ControlEvent, ControlEventKind } from "../models/controlEvent";
import type { ActuatorGateway, EventSink, SensorGateway } from "../models/gateways";
import type { RelayName, SystemState, TankReading } from "../models/systemState";
import { ActuatorWriteError, describeError } from "../lib/errors";
import type { LogFn } from "../lib/log";
import { SentryUtils } from "../lib/sentry";
import { HysteresisController } from "./HysteresisController";
import { PumpDelayStateMachine } from "./PumpDelayStateMachine";
import { SafetyGuard, type SafetyTripReason, type SafetyVerdict } from "./SafetyGuard";
import { TemperatureSampler, calculateAverage } from "./TemperatureSampler";

/**
 * Anything that hands out a consistent parameter snapshot
 */
export interface ParameterSource {
	snapshot(): Readonly<ControlParameters>;
}

export interface ControlCoreOptions {
	parameters: ParameterSource;
	sensors: SensorGateway;
	actuators: ActuatorGateway;
	sink: EventSink;
	log: LogFn;
	/** Current time in ms, defaults to Date.now */
	clock?: () => number;
}

interface ModeFlags {
	manualOverride: boolean;
	heatingSystemEnabled: boolean;
}

const RECOVERY_EVENT: Record<SafetyTripReason, { kind: ControlEventKind; description: string }> = {
	sensor_failure: { kind: "sensor_recovered", description: "Temperature readings available again" },
	safety_trip: { kind: "safety_cleared", description: "Temperature back below the safety ceiling" },
};

/**
 * One control cycle: sample, decide, enforce the safety ceiling, run the pump delay,
 * switch relays and publish. Heating and pump state live here and are only changed by
 * {@link ControlCore.runCycle}; callers influence it through the parameter source.
 */
export class ControlCore {
	private readonly parameters: ParameterSource;
	private readonly actuators: ActuatorGateway;
	private readonly sink: EventSink;
	private readonly log: LogFn;
	private readonly clock: () => number;

	private readonly sampler: TemperatureSampler;
	private readonly hysteresis = new HysteresisController();
	private readonly safetyGuard = new SafetyGuard();
	private readonly pump = new PumpDelayStateMachine();

	private heatingActive = false;
	private pumpActive = false;
	/** Last value each relay was successfully switched to; undefined forces a write */
	private readonly applied: Record<RelayName, boolean | undefined> = { heating: undefined, pump: undefined };
	private activeTrip: SafetyTripReason | null = null;
	private lastMode: ModeFlags | undefined;
	private lastState: SystemState | undefined;

	constructor(options: ControlCoreOptions) {
		this.parameters = options.parameters;
		this.actuators = options.actuators;
		this.sink = options.sink;
		this.log = options.log;
		this.clock = options.clock ?? Date.now;
		this.sampler = new TemperatureSampler(options.sensors, options.log);
	}

	/**
	 * State published by the most recent cycle
	 */
	getState(): SystemState | undefined {
		return this.lastState;
	}

	/**
	 * Run a single control cycle
	 *
	 * @returns The state that was published
	 */
	async runCycle(): Promise<SystemState> {
		const parameters = this.parameters.snapshot();
		const readings = await this.sampler.sample(parameters.sensorTimeout * 1000);
		const now = this.clock();
		const averageTemperature = calculateAverage(readings);
		const events: ControlEvent[] = [];
		const event = (kind: ControlEventKind, description: string, data?: ControlEvent["data"]): void => {
			events.push({ kind, description, timestamp: now, data });
		};

		this.trackMode(parameters, event);

		const previousHeating = this.heatingActive;
		const previousPump = this.pumpActive;
		const verdict = this.safetyGuard.evaluate(averageTemperature, parameters.maxTemperature);
		const heating = verdict.tripped ? false : this.decideHeating(parameters, averageTemperature);
		this.trackSafety(verdict, event);

		let pumpActive: boolean;
		if (parameters.manualOverride) {
			this.pump.syncManual(heating);
			pumpActive = parameters.manualPump;
		} else {
			pumpActive = this.pump.advance(heating, now, parameters.pumpDelay * 1000);
		}
		this.heatingActive = heating;

		if (heating && !previousHeating) {
			this.log(
				"info",
				`[Control] Heating activated at ${formatTemperature(averageTemperature)} (band ${this.hysteresis.describeBand(parameters)})`,
			);
			event("heating_on", "Heating activated", { averageTemperature, setpoint: parameters.setpoint });
		} else if (!heating && previousHeating) {
			const delayNote = parameters.manualOverride
				? "pump follows manual setting"
				: `pump will stop in ${parameters.pumpDelay} seconds`;
			this.log("info", `[Control] Heating deactivated, ${delayNote}`);
			event("heating_off", `Heating deactivated, ${delayNote}`, {
				averageTemperature,
				setpoint: parameters.setpoint,
			});
		}

		// heating first; the pump only stops once the heating relay is confirmed off
		await this.applyRelay("heating", heating, event);
		if (!pumpActive && this.applied.heating !== false) {
			this.log("warn", "[Control] Heating relay not confirmed off, keeping circulation pump running");
			pumpActive = true;
		}
		this.pumpActive = pumpActive;

		if (!pumpActive && previousPump) {
			this.log("info", "[Control] Circulation pump deactivated");
			event("pump_off", "Circulation pump deactivated");
		}
		await this.applyRelay("pump", pumpActive, event);

		const pumpTimer = this.pump.state;
		const state: SystemState = {
			timestamp: now,
			heatingActive: heating,
			pumpActive,
			averageTemperature,
			readings,
			availableSensors: countAvailable(readings),
			pumpTimer,
			pumpShutoffDeadline:
				!parameters.manualOverride && pumpTimer.phase === "pendingShutoff" ? pumpTimer.deadline : null,
			manualOverride: parameters.manualOverride,
			heatingSystemEnabled: parameters.heatingSystemEnabled,
			safetyTripped: verdict.tripped,
			setpoint: parameters.setpoint,
			hysteresis: parameters.hysteresis,
			maxTemperature: parameters.maxTemperature,
		};

		for (const pending of events) {
			await this.publishEvent(pending);
		}
		try {
			await this.sink.publish(state);
		} catch (error) {
			this.log("error", `[Control] Publishing state failed: ${describeError(error)}`);
		}

		this.lastState = state;
		return state;
	}

	private decideHeating(parameters: Readonly<ControlParameters>, averageTemperature: number | null): boolean {
		if (parameters.manualOverride) {
			return parameters.manualHeating;
		}
		if (!parameters.heatingSystemEnabled || averageTemperature === null) {
			return false;
		}
		return this.hysteresis.decide(this.heatingActive, averageTemperature, parameters);
	}

	private trackMode(
		parameters: Readonly<ControlParameters>,
		event: (kind: ControlEventKind, description: string) => void,
	): void {
		const mode: ModeFlags = {
			manualOverride: parameters.manualOverride,
			heatingSystemEnabled: parameters.heatingSystemEnabled,
		};
		const previous = this.lastMode;
		this.lastMode = mode;
		if (!previous) {
			return;
		}
		if (previous.manualOverride !== mode.manualOverride) {
			const description = mode.manualOverride ? "Manual override enabled" : "Automatic control resumed";
			this.log("warn", `[Control] ${description}`);
			event("mode_change", description);
		}
		if (previous.heatingSystemEnabled !== mode.heatingSystemEnabled) {
			const description = mode.heatingSystemEnabled ? "Heating system enabled" : "Heating system disabled";
			this.log("info", `[Control] ${description}`);
			event("mode_change", description);
		}
	}

	private trackSafety(verdict: SafetyVerdict, event: (kind: ControlEventKind, description: string) => void): void {
		const reason = verdict.tripped ? verdict.reason : null;
		if (this.activeTrip !== null && this.activeTrip !== reason) {
			const recovery = RECOVERY_EVENT[this.activeTrip];
			this.log("info", `[Control] ${recovery.description}`);
			event(recovery.kind, recovery.description);
		}
		if (verdict.tripped) {
			if (verdict.reason !== this.activeTrip) {
				this.log("warn", `[Control] ${verdict.description}`);
				event(verdict.reason, verdict.description);
			} else {
				this.log("debug", `[Control] ${verdict.description}`);
			}
		}
		this.activeTrip = reason;
	}

	private async applyRelay(
		relay: RelayName,
		target: boolean,
		event: (kind: ControlEventKind, description: string, data?: ControlEvent["data"]) => void,
	): Promise<void> {
		if (this.applied[relay] === target) {
			return;
		}
		try {
			await this.actuators.set(relay, target);
			this.applied[relay] = target;
			this.log("debug", `[Control] Relay ${relay} set to ${target ? "ON" : "OFF"}`);
		} catch (error) {
			const failure = error instanceof ActuatorWriteError ? error : new ActuatorWriteError(relay, target, error);
			this.applied[relay] = undefined;
			this.log("error", `[Control] ${failure.message}, retrying next cycle`);
			SentryUtils.captureException(failure, { relay: { relay, target } }, "warning");
			event("actuator_failure", failure.message, { relay, target });
		}
	}

	private async publishEvent(event: ControlEvent): Promise<void> {
		try {
			await this.sink.publishEvent(event);
		} catch (error) {
			this.log("error", `[Control] Publishing ${event.kind} event failed: ${describeError(error)}`);
		}
	}
}

function countAvailable(readings: TankReading[]): number {
	return readings.filter(reading => reading.temperature !== null).length;
}

function formatTemperature(value: number | null): string {
	return value === null ? "n/a" : `${value.toFixed(1)}°C`;
}
