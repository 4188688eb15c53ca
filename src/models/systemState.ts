export const TANK_IDS = [1, 2, 3] as const;

export type TankId = (typeof TANK_IDS)[number];

/**
 * Temperature of one tank for one cycle, null when the sensor was unavailable
 */
export interface TankReading {
	tank: TankId;
	temperature: number | null;
}

export type PumpTimer = { phase: "idle" } | { phase: "running" } | { phase: "pendingShutoff"; deadline: number };

export type RelayName = "heating" | "pump";

/**
 * Snapshot published after every control cycle
 */
export interface SystemState {
	/** Unix timestamp in ms of the cycle */
	timestamp: number;
	heatingActive: boolean;
	pumpActive: boolean;
	/** Mean of the available readings, null when no sensor answered */
	averageTemperature: number | null;
	readings: TankReading[];
	availableSensors: number;
	pumpTimer: PumpTimer;
	/** Deadline of a pending pump shutoff, null otherwise */
	pumpShutoffDeadline: number | null;
	manualOverride: boolean;
	heatingSystemEnabled: boolean;
	/** Heating is held off by the safety ceiling or missing sensor data */
	safetyTripped: boolean;
	setpoint: number;
	hysteresis: number;
	maxTemperature: number;
}
