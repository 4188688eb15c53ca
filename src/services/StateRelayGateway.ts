import type { ActuatorGateway } from "../models/gateways";
import type { RelayName } from "../models/systemState";
import { ActuatorWriteError } from "../lib/errors";
import type { LogFn } from "../lib/log";

export type RelayStateIds = Record<RelayName, string>;

export interface ForeignStateWriter {
	setForeignStateAsync(id: string, state: boolean, ack: boolean): Promise<unknown>;
}

/**
 * Switches relays by writing foreign ioBroker states (e.g. Unipi relay outputs)
 */
export class StateRelayGateway implements ActuatorGateway {
	/**
	 * @param adapter The ioBroker adapter instance
	 * @param relayIds Switch state id per relay
	 * @param log Logging callback
	 */
	constructor(
		private readonly adapter: ForeignStateWriter,
		private readonly relayIds: RelayStateIds,
		private readonly log: LogFn,
	) {}

	async set(relay: RelayName, on: boolean): Promise<void> {
		const stateId = this.relayIds[relay];
		if (!stateId) {
			throw new ActuatorWriteError(relay, on, new Error("no relay state configured"));
		}
		try {
			await this.adapter.setForeignStateAsync(stateId, on, false);
		} catch (error) {
			throw new ActuatorWriteError(relay, on, error);
		}
		this.log("info", `[Relays] Relay ${relay} (${stateId}) set to ${on ? "ON" : "OFF"}`);
	}
}
