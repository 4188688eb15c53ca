import type { z } from "zod";
import {
	DEFAULT_PARAMETERS,
	PARAMETER_KEYS,
	type ControlParameters,
	type ManualRequest,
	type TunableParameters,
} from "../models/controlParameters";
import { InvalidConfigurationError, UnauthorizedManualChangeError, type Result } from "../lib/errors";
import type { LogFn } from "../lib/log";
import { controlParametersSchema, formatIssues, settingsPatchSchema } from "../lib/schemas";
import type { ManualOverrideAuthorizer } from "./ManualOverrideAuthorizer";

export type ConfigListener = (parameters: Readonly<ControlParameters>, previous: Readonly<ControlParameters>) => void;

const BOOLEAN_KEYS = new Set<string>(["manualOverride", "manualHeating", "manualPump", "heatingSystemEnabled"]);

/**
 * Normalize values coming from admin forms or states, which may carry numbers and booleans as strings
 *
 * @param key Parameter name
 * @param value Raw value
 * @returns Value in the type the schema expects, if it can be read as such
 */
function coerceRawValue(key: string, value: unknown): unknown {
	if (typeof value !== "string") {
		return value;
	}
	if (BOOLEAN_KEYS.has(key)) {
		if (value === "true") {
			return true;
		}
		if (value === "false") {
			return false;
		}
		return value;
	}
	return value.trim() === "" ? value : Number(value);
}

/**
 * Build control parameters from untrusted input. Invalid fields fall back to their defaults.
 *
 * @param raw Adapter configuration merged with persisted settings
 * @param log Logging callback
 * @returns Complete and valid parameters
 */
export function parametersFromRaw(raw: Partial<Record<keyof ControlParameters, unknown>>, log: LogFn): ControlParameters {
	const candidate: Record<string, unknown> = {};
	for (const key of PARAMETER_KEYS) {
		const value = raw[key];
		if (value === undefined || value === null) {
			candidate[key] = DEFAULT_PARAMETERS[key];
			continue;
		}
		const fieldSchema: z.ZodTypeAny = controlParametersSchema.shape[key];
		const parsed = fieldSchema.safeParse(coerceRawValue(key, value));
		if (parsed.success) {
			candidate[key] = parsed.data;
		} else {
			log(
				"warn",
				`[Config] Ignoring ${key}=${JSON.stringify(value)} (${formatIssues(parsed.error).join("; ")}), using default ${String(DEFAULT_PARAMETERS[key])}`,
			);
			candidate[key] = DEFAULT_PARAMETERS[key];
		}
	}
	return controlParametersSchema.parse(candidate);
}

/**
 * Holds the control parameters. Every change replaces the frozen parameter object,
 * so a snapshot taken by the control loop is never a mix of old and new values.
 */
export class ConfigStore {
	private current: Readonly<ControlParameters>;
	private readonly listeners: ConfigListener[] = [];

	/**
	 * @param initial Starting parameters, must already be in range
	 * @param authorizer Checks manual override credentials
	 * @param log Logging callback
	 */
	constructor(
		initial: ControlParameters,
		private readonly authorizer: ManualOverrideAuthorizer,
		private readonly log: LogFn,
	) {
		const parsed = controlParametersSchema.safeParse(initial);
		if (!parsed.success) {
			throw new InvalidConfigurationError(formatIssues(parsed.error));
		}
		this.current = Object.freeze({ ...parsed.data });
		this.warnOnDegradedBand(this.current);
	}

	snapshot(): Readonly<ControlParameters> {
		return this.current;
	}

	/**
	 * Validate and apply a set of parameter changes as one unit.
	 * Out-of-range values reject the whole patch.
	 *
	 * @param patch Fields to change
	 * @returns New snapshot, or the validation error with the store unchanged
	 */
	update(patch: Partial<TunableParameters>): Result<Readonly<ControlParameters>, InvalidConfigurationError> {
		return this.applyPatch(patch);
	}

	/**
	 * Same as {@link ConfigStore.update} for untyped input such as state values or messages.
	 * Numbers and booleans sent as strings are accepted; unknown fields reject the patch.
	 *
	 * @param raw Object with the fields to change
	 * @returns New snapshot, or the validation error with the store unchanged
	 */
	updateFromRaw(raw: unknown): Result<Readonly<ControlParameters>, InvalidConfigurationError> {
		if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
			return this.reject(["Settings must be an object"]);
		}
		const coerced: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(raw)) {
			coerced[key] = coerceRawValue(key, value);
		}
		return this.applyPatch(coerced);
	}

	private applyPatch(patch: unknown): Result<Readonly<ControlParameters>, InvalidConfigurationError> {
		const parsedPatch = settingsPatchSchema.safeParse(patch);
		if (!parsedPatch.success) {
			return this.reject(formatIssues(parsedPatch.error));
		}
		const merged = controlParametersSchema.safeParse({ ...this.current, ...parsedPatch.data });
		if (!merged.success) {
			return this.reject(formatIssues(merged.error));
		}

		this.commit(merged.data);
		this.log("info", `[Config] Settings updated: ${JSON.stringify(parsedPatch.data)}`);
		this.warnOnDegradedBand(this.current);
		return { ok: true, value: this.current };
	}

	/**
	 * Set all manual override flags together, or none of them
	 *
	 * @param request Desired override, heating and pump flags
	 * @param credential Super admin password supplied with the request
	 * @returns New snapshot, or the authorization error with the store unchanged
	 */
	applyManual(
		request: ManualRequest,
		credential: string | undefined,
	): Result<Readonly<ControlParameters>, UnauthorizedManualChangeError> {
		if (!this.authorizer.isAuthorized(credential)) {
			const error = new UnauthorizedManualChangeError();
			this.log("warn", `[Config] ${error.message}`);
			return { ok: false, error };
		}

		this.commit({
			...this.current,
			manualOverride: request.override,
			manualHeating: request.heating,
			manualPump: request.pump,
		});
		this.log("warn", `[Config] Manual override ${request.override ? "enabled" : "disabled"} by super admin`);
		if (request.override) {
			this.log("info", `[Config] Manual controls: heating=${request.heating}, pump=${request.pump}`);
		}
		return { ok: true, value: this.current };
	}

	/**
	 * Register a listener called after every successful change
	 *
	 * @param listener Receives the new and the previous snapshot
	 * @returns Function removing the listener
	 */
	onChange(listener: ConfigListener): () => void {
		this.listeners.push(listener);
		return () => {
			const index = this.listeners.indexOf(listener);
			if (index >= 0) {
				this.listeners.splice(index, 1);
			}
		};
	}

	private reject(issues: string[]): Result<Readonly<ControlParameters>, InvalidConfigurationError> {
		const error = new InvalidConfigurationError(issues);
		this.log("warn", `[Config] ${error.message}`);
		return { ok: false, error };
	}

	private commit(next: ControlParameters): void {
		const previous = this.current;
		this.current = Object.freeze({ ...next });
		for (const listener of [...this.listeners]) {
			try {
				listener(this.current, previous);
			} catch (error) {
				this.log("error", `[Config] Change listener failed: ${String(error)}`);
			}
		}
	}

	private warnOnDegradedBand(parameters: Readonly<ControlParameters>): void {
		const lower = parameters.setpoint - parameters.hysteresis;
		const upper = parameters.setpoint + parameters.hysteresis;
		if (lower <= 0 || upper >= parameters.maxTemperature) {
			this.log("warn", `[Config] Hysteresis band ${lower}-${upper}°C is not inside 0-${parameters.maxTemperature}°C`);
		}
	}
}
