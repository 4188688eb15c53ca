import type { ControlEvent, ControlEventKind } from "../models/controlEvent";
import type { EventSink } from "../models/gateways";
import type { SystemState } from "../models/systemState";
import type { LogFn, LogLevel } from "../lib/log";
import { SentryUtils } from "../lib/sentry";
import type { EventHistoryService } from "./EventHistoryService";

const EVENT_LEVEL: Record<ControlEventKind, LogLevel> = {
	sensor_failure: "warn",
	sensor_recovered: "info",
	safety_trip: "warn",
	safety_cleared: "info",
	mode_change: "info",
	heating_on: "info",
	heating_off: "info",
	pump_off: "info",
	actuator_failure: "error",
	startup: "info",
	shutdown: "info",
	error: "error",
};

const SENTRY_LEVEL = { debug: "debug", info: "info", warn: "warning", error: "error" } as const;

export interface OwnStateWriter {
	setStateAsync(id: string, state: ioBroker.StateValue, ack: boolean): Promise<unknown>;
}

/**
 * Round for display states; the JSON snapshot keeps full precision
 *
 * @param value Temperature or null
 * @returns Value with two decimals or null
 */
function round(value: number | null): number | null {
	return value === null ? null : Math.round(value * 100) / 100;
}

/**
 * Publishes control states and events as states of this adapter instance
 */
export class StateEventSink implements EventSink {
	/**
	 * @param adapter The ioBroker adapter instance
	 * @param history Event history that is mirrored into events.history
	 * @param log Logging callback
	 */
	constructor(
		private readonly adapter: OwnStateWriter,
		private readonly history: EventHistoryService,
		private readonly log: LogFn,
	) {}

	async publish(state: SystemState): Promise<void> {
		const updates: Array<[string, ioBroker.StateValue]> = [
			["status.heating", state.heatingActive],
			["status.pump", state.pumpActive],
			["status.averageTemperature", round(state.averageTemperature)],
			["status.availableSensors", state.availableSensors],
			["status.pumpPhase", state.pumpTimer.phase],
			["status.pumpShutoffDeadline", state.pumpShutoffDeadline],
			["status.manualOverride", state.manualOverride],
			["status.heatingSystemEnabled", state.heatingSystemEnabled],
			["status.safetyTripped", state.safetyTripped],
			["status.lastUpdate", state.timestamp],
			["status.json", JSON.stringify(state)],
			...state.readings.map((reading): [string, ioBroker.StateValue] => [
				`status.tank${reading.tank}`,
				round(reading.temperature),
			]),
		];
		await Promise.all(updates.map(([id, value]) => this.adapter.setStateAsync(id, value, true)));
	}

	async publishEvent(event: ControlEvent): Promise<void> {
		this.history.record(event);
		const level = EVENT_LEVEL[event.kind];
		this.log("debug", `[Events] ${event.kind}: ${event.description}`);

		SentryUtils.addBreadcrumb(event.description, event.kind, SENTRY_LEVEL[level], event.data);
		if (event.kind === "safety_trip" || event.kind === "sensor_failure") {
			SentryUtils.captureMessage(event.description, "warning");
		}

		await this.adapter.setStateAsync("events.last", JSON.stringify(event), true);
		await this.adapter.setStateAsync("events.history", this.history.toJSON(), true);
	}
}
