export const CONTROL_EVENT_KINDS = [
	"sensor_failure",
	"sensor_recovered",
	"safety_trip",
	"safety_cleared",
	"mode_change",
	"heating_on",
	"heating_off",
	"pump_off",
	"actuator_failure",
	"startup",
	"shutdown",
	"error",
] as const;

export type ControlEventKind = (typeof CONTROL_EVENT_KINDS)[number];

/**
 * Discrete occurrence reported next to the periodic state
 */
export interface ControlEvent {
	kind: ControlEventKind;
	description: string;
	/** Unix timestamp in ms */
	timestamp: number;
	data?: Record<string, string | number | boolean | null>;
}
