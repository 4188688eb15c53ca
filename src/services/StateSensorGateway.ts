import { TANK_IDS, type TankId } from "../models/systemState";
import type { SensorGateway } from "../models/gateways";
import type { LogFn } from "../lib/log";

export type TankSensorIds = Record<TankId, string>;

/**
 * The part of the adapter instance used to read sensor states
 */
export interface ForeignStateReader {
	getForeignStateAsync(id: string): Promise<ioBroker.State | null | undefined>;
	getForeignObjectAsync(id: string): Promise<unknown>;
}

/**
 * Accept numbers and numeric strings; blank strings and other types are no reading
 *
 * @param value State value
 * @returns Finite temperature or null
 */
function parseTemperature(value: ioBroker.StateValue): number | null {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
}

/**
 * Reads tank temperatures from foreign ioBroker states (e.g. a 1-wire adapter)
 */
export class StateSensorGateway implements SensorGateway {
	/**
	 * @param adapter The ioBroker adapter instance
	 * @param sensorIds Temperature state id per tank
	 * @param log Logging callback
	 * @param maxAgeMs Readings older than this are unavailable; 0 accepts any age
	 * @param clock Current time in ms
	 */
	constructor(
		private readonly adapter: ForeignStateReader,
		private readonly sensorIds: TankSensorIds,
		private readonly log: LogFn,
		private readonly maxAgeMs = 0,
		private readonly clock: () => number = Date.now,
	) {}

	/**
	 * Get the current temperature of a tank
	 *
	 * @param tank Tank number
	 * @returns Temperature in °C or null if unavailable
	 */
	async read(tank: TankId): Promise<number | null> {
		const stateId = this.sensorIds[tank];
		if (!stateId) {
			return null;
		}

		const state = await this.adapter.getForeignStateAsync(stateId);
		if (!state || state.val === null || state.val === undefined) {
			this.log("debug", `[Sensors] State ${stateId} is not available or has no value`);
			return null;
		}

		const temperature = parseTemperature(state.val);
		if (temperature === null) {
			this.log("warn", `[Sensors] State ${stateId} contains invalid temperature value: ${String(state.val)}`);
			return null;
		}

		if (this.maxAgeMs > 0 && this.clock() - state.ts > this.maxAgeMs) {
			this.log("warn", `[Sensors] State ${stateId} was last updated ${new Date(state.ts).toISOString()}, ignoring it`);
			return null;
		}

		return temperature;
	}

	/**
	 * Check which configured sensor states exist
	 *
	 * @returns Tanks with an existing sensor state
	 */
	async discover(): Promise<TankId[]> {
		const found: TankId[] = [];
		for (const tank of TANK_IDS) {
			const stateId = this.sensorIds[tank];
			if (!stateId) {
				this.log("warn", `[Sensors] No temperature state configured for tank ${tank}`);
				continue;
			}
			try {
				const object = await this.adapter.getForeignObjectAsync(stateId);
				if (object) {
					found.push(tank);
				} else {
					this.log("warn", `[Sensors] Temperature state ${stateId} for tank ${tank} does not exist`);
				}
			} catch (error) {
				this.log("error", `[Sensors] Error validating state ${stateId}: ${String(error)}`);
			}
		}

		if (found.length === 0) {
			this.log("error", "[Sensors] No temperature sensors found, heating stays off until readings arrive");
		} else if (found.length < TANK_IDS.length) {
			this.log("warn", `[Sensors] Only ${found.length} of ${TANK_IDS.length} expected sensors found`);
		} else {
			this.log("info", `[Sensors] Discovered ${found.length} temperature sensors`);
		}
		return found;
	}
}
