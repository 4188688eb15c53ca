import { TANK_IDS, type TankId, type TankReading } from "../models/systemState";
import type { SensorGateway } from "../models/gateways";
import { SensorTimeoutError, describeError } from "../lib/errors";
import type { LogFn } from "../lib/log";

/**
 * Reject when a promise does not settle in time
 *
 * @param promise Operation to bound
 * @param timeoutMs Upper bound in ms
 * @param onTimeout Error to reject with
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
		void promise.then(
			value => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			},
		);
	});
}

/**
 * Arithmetic mean of the available readings
 *
 * @param readings Readings of one cycle
 * @returns Average in °C, or null when no sensor answered
 */
export function calculateAverage(readings: TankReading[]): number | null {
	const valid = readings.flatMap(reading => (reading.temperature === null ? [] : [reading.temperature]));
	if (valid.length === 0) {
		return null;
	}
	return valid.reduce((sum, temperature) => sum + temperature, 0) / valid.length;
}

/**
 * Reads all tank sensors in parallel, each bounded by the sensor timeout.
 * A failing sensor is reported as unavailable for the cycle.
 */
export class TemperatureSampler {
	/**
	 * @param gateway Sensor source
	 * @param log Logging callback
	 */
	constructor(
		private readonly gateway: SensorGateway,
		private readonly log: LogFn,
	) {}

	/**
	 * Read every tank once
	 *
	 * @param timeoutMs Upper bound for each sensor read
	 * @returns One reading per tank, in tank order
	 */
	async sample(timeoutMs: number): Promise<TankReading[]> {
		return await Promise.all(TANK_IDS.map(async tank => ({ tank, temperature: await this.readTank(tank, timeoutMs) })));
	}

	private async readTank(tank: TankId, timeoutMs: number): Promise<number | null> {
		try {
			const value = await withTimeout(
				this.gateway.read(tank),
				timeoutMs,
				() => new SensorTimeoutError(tank, timeoutMs),
			);
			if (value === null) {
				this.log("debug", `[Sampler] Tank ${tank} has no reading`);
				return null;
			}
			if (!Number.isFinite(value)) {
				this.log("warn", `[Sampler] Tank ${tank} returned invalid temperature ${value}`);
				return null;
			}
			return value;
		} catch (error) {
			this.log("warn", `[Sampler] Reading tank ${tank} failed: ${describeError(error)}`);
			return null;
		}
	}
}
