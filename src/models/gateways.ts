import type { ControlEvent } from "./controlEvent";
import type { RelayName, SystemState, TankId } from "./systemState";

/**
 * Source of tank temperatures
 */
export interface SensorGateway {
	/**
	 * @returns Temperature in °C, or null when the sensor has no usable value
	 */
	read(tank: TankId): Promise<number | null>;
}

/**
 * Switches the heating and pump relays; rejects when the write did not succeed
 */
export interface ActuatorGateway {
	set(relay: RelayName, on: boolean): Promise<void>;
}

/**
 * Consumer of published states and discrete events (persistence, live view)
 */
export interface EventSink {
	publish(state: SystemState): Promise<void>;
	publishEvent(event: ControlEvent): Promise<void>;
}
