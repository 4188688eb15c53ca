import type { PumpTimer } from "../models/systemState";

/**
 * Keeps the circulation pump running for the configured delay after heating stops,
 * so residual heat is carried away from the heating unit.
 *
 * idle -> running (heating on) -> pendingShutoff(deadline) (heating off) -> idle (deadline reached)
 */
export class PumpDelayStateMachine {
	private timer: PumpTimer = { phase: "idle" };

	get state(): PumpTimer {
		return this.timer;
	}

	get pumpActive(): boolean {
		return this.timer.phase !== "idle";
	}

	/**
	 * Advance the machine for one cycle
	 *
	 * @param heatingActive Heating decision of this cycle
	 * @param now Current time in ms
	 * @param pumpDelayMs Run-on after heating stops, in ms
	 * @returns Whether the pump must run this cycle
	 */
	advance(heatingActive: boolean, now: number, pumpDelayMs: number): boolean {
		if (heatingActive) {
			this.timer = { phase: "running" };
			return true;
		}
		if (this.timer.phase === "running") {
			this.timer = { phase: "pendingShutoff", deadline: now + pumpDelayMs };
		}
		if (this.timer.phase === "pendingShutoff" && now >= this.timer.deadline) {
			this.timer = { phase: "idle" };
		}
		return this.pumpActive;
	}

	/**
	 * Follow the heating relay without any delay while an operator controls the relays.
	 * Leaving manual mode with heating on then still starts the normal run-on.
	 *
	 * @param heatingActive Heating state commanded in manual mode
	 */
	syncManual(heatingActive: boolean): void {
		this.timer = heatingActive ? { phase: "running" } : { phase: "idle" };
	}
}
