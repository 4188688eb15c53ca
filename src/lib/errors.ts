import type { RelayName, TankId } from "../models/systemState";

/**
 * Outcome of an operation that can be rejected without throwing
 */
export type Result<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Raised when a parameter update is out of range; the store keeps its previous values
 */
export class InvalidConfigurationError extends Error {
	/**
	 * @param issues One entry per rejected field
	 */
	constructor(public readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "InvalidConfigurationError";
	}
}

export class UnauthorizedManualChangeError extends Error {
	constructor() {
		super("Manual override change rejected: missing or wrong super admin password");
		this.name = "UnauthorizedManualChangeError";
	}
}

export class ActuatorWriteError extends Error {
	/**
	 * @param relay Relay that could not be switched
	 * @param target State that was requested
	 * @param cause Underlying failure
	 */
	constructor(
		public readonly relay: RelayName,
		public readonly target: boolean,
		cause?: unknown,
	) {
		super(`Setting ${relay} relay ${target ? "ON" : "OFF"} failed: ${describeError(cause)}`, { cause });
		this.name = "ActuatorWriteError";
	}
}

export class SensorTimeoutError extends Error {
	constructor(
		public readonly tank: TankId,
		public readonly timeoutMs: number,
	) {
		super(`Sensor of tank ${tank} did not answer within ${timeoutMs} ms`);
		this.name = "SensorTimeoutError";
	}
}

/**
 * Turn anything thrown into a log-friendly message
 *
 * @param error Value caught from a rejected promise or throw
 * @returns Error message or string representation
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
