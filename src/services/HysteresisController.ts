import type { ControlParameters } from "../models/controlParameters";

export type HysteresisBand = Pick<ControlParameters, "setpoint" | "hysteresis">;

/**
 * Two-point heating decision with a dead band around the setpoint
 */
export class HysteresisController {
	/**
	 * Determine heating activation based on the temperature difference to the setpoint.
	 * Values exactly on a band edge do not trigger a change.
	 *
	 * @param average Current average tank temperature
	 * @param band Setpoint and hysteresis of this cycle
	 * @returns True to activate, false to deactivate, null for no change
	 */
	shouldActivateHeating(average: number, band: HysteresisBand): boolean | null {
		if (average < band.setpoint - band.hysteresis) {
			return true;
		}
		if (average > band.setpoint + band.hysteresis) {
			return false;
		}
		return null;
	}

	/**
	 * Next heating state given the previous one
	 *
	 * @param heatingActive Heating state of the previous cycle
	 * @param average Current average tank temperature
	 * @param band Setpoint and hysteresis of this cycle
	 * @returns Heating state for this cycle
	 */
	decide(heatingActive: boolean, average: number, band: HysteresisBand): boolean {
		return this.shouldActivateHeating(average, band) ?? heatingActive;
	}

	/**
	 * Human readable band for log output
	 *
	 * @param band Setpoint and hysteresis
	 * @returns Description such as "58-62°C"
	 */
	describeBand(band: HysteresisBand): string {
		return `${band.setpoint - band.hysteresis}-${band.setpoint + band.hysteresis}°C`;
	}
}
