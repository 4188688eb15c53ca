/**
 * Control parameters read by the control loop at the start of every cycle
 */
export interface ControlParameters {
	/** Target average tank temperature in °C */
	setpoint: number;
	/** Dead band around the setpoint in °C */
	hysteresis: number;
	/** Safety ceiling in °C, heating is never allowed at or above it */
	maxTemperature: number;
	/** Pump run-on after heating stops, in seconds */
	pumpDelay: number;
	/** Time between two control cycles, in seconds */
	updateInterval: number;
	/** Upper bound for a single sensor read, in seconds */
	sensorTimeout: number;
	/** Operator controls the relays directly */
	manualOverride: boolean;
	/** Heating relay target while manual override is active */
	manualHeating: boolean;
	/** Pump relay target while manual override is active */
	manualPump: boolean;
	/** Master switch for automatic heating */
	heatingSystemEnabled: boolean;
}

export type ManualParameterKey = "manualOverride" | "manualHeating" | "manualPump";

/**
 * Parameters that may be changed without manual override authorization
 */
export type TunableParameters = Omit<ControlParameters, ManualParameterKey>;

/**
 * Request to change the manual override flags as one unit
 */
export interface ManualRequest {
	override: boolean;
	heating: boolean;
	pump: boolean;
}

export const DEFAULT_PARAMETERS: Readonly<ControlParameters> = Object.freeze({
	setpoint: 60,
	hysteresis: 2,
	maxTemperature: 85,
	pumpDelay: 60,
	updateInterval: 5,
	sensorTimeout: 30,
	manualOverride: false,
	manualHeating: false,
	manualPump: false,
	heatingSystemEnabled: true,
});

export const TUNABLE_KEYS = [
	"setpoint",
	"hysteresis",
	"maxTemperature",
	"pumpDelay",
	"updateInterval",
	"sensorTimeout",
	"heatingSystemEnabled",
] as const satisfies ReadonlyArray<keyof TunableParameters>;

export const PARAMETER_KEYS = [...TUNABLE_KEYS, "manualOverride", "manualHeating", "manualPump"] as const satisfies ReadonlyArray<
	keyof ControlParameters
>;
