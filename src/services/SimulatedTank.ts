import { TANK_IDS, type RelayName, type TankId } from "../models/systemState";
import type { ActuatorGateway, SensorGateway } from "../models/gateways";
import type { LogFn } from "../lib/log";

const HEATING_RATE_PER_MINUTE = 0.5;
const COOLING_RATE_PER_MINUTE = 0.1;
const MAX_SIMULATED_TEMPERATURE = 85;
const MIN_SIMULATED_TEMPERATURE = 20;
const NOISE_AMPLITUDE = 0.2;

/**
 * Stand-in for the tank hardware during development: three temperatures that rise
 * while the heating relay is on and slowly cool otherwise.
 */
export class SimulatedTank implements SensorGateway, ActuatorGateway {
	private readonly temperatures: Record<TankId, number> = { 1: 58.5, 2: 59.0, 3: 58.8 };
	private readonly relays: Record<RelayName, boolean> = { heating: false, pump: false };
	private lastUpdate: number;

	/**
	 * @param log Logging callback
	 * @param clock Current time in ms
	 * @param random Source of noise in [0, 1)
	 */
	constructor(
		private readonly log: LogFn,
		private readonly clock: () => number = Date.now,
		private readonly random: () => number = Math.random,
	) {
		this.lastUpdate = clock();
		this.log("info", "[Simulation] Simulated tank hardware initialized (development mode)");
	}

	async read(tank: TankId): Promise<number | null> {
		this.updateSimulation();
		const temperature = this.temperatures[tank] + (this.random() * 2 - 1) * NOISE_AMPLITUDE;
		this.temperatures[tank] = temperature;
		this.log("debug", `[Simulation] Temperature tank ${tank} = ${temperature.toFixed(2)}°C`);
		return temperature;
	}

	async set(relay: RelayName, on: boolean): Promise<void> {
		this.updateSimulation();
		this.relays[relay] = on;
		this.log("info", `[Simulation] Relay ${relay} set to ${on ? "ON" : "OFF"}`);
	}

	relayState(relay: RelayName): boolean {
		return this.relays[relay];
	}

	private updateSimulation(): void {
		const now = this.clock();
		const minutes = (now - this.lastUpdate) / 60_000;
		this.lastUpdate = now;

		for (const tank of TANK_IDS) {
			const current = this.temperatures[tank];
			this.temperatures[tank] = this.relays.heating
				? Math.min(current + HEATING_RATE_PER_MINUTE * minutes, MAX_SIMULATED_TEMPERATURE)
				: Math.max(current - COOLING_RATE_PER_MINUTE * minutes, MIN_SIMULATED_TEMPERATURE);
		}
	}
}
