import { z } from "zod";
import type { ControlParameters } from "../models/controlParameters";
import { CONTROL_EVENT_KINDS } from "../models/controlEvent";

export const controlParametersSchema = z.object({
	setpoint: z.number().min(5, "Setpoint must be between 5-85°C").max(85, "Setpoint must be between 5-85°C"),
	hysteresis: z
		.number()
		.min(0.5, "Hysteresis must be between 0.5-10°C")
		.max(10, "Hysteresis must be between 0.5-10°C"),
	maxTemperature: z
		.number()
		.min(60, "Max temperature must be between 60-95°C")
		.max(95, "Max temperature must be between 60-95°C"),
	pumpDelay: z
		.number()
		.int("Pump delay must be a whole number of seconds")
		.min(0, "Pump delay must be between 0-300 seconds")
		.max(300, "Pump delay must be between 0-300 seconds"),
	updateInterval: z
		.number()
		.int("Update interval must be a whole number of seconds")
		.min(1, "Update interval must be between 1-60 seconds")
		.max(60, "Update interval must be between 1-60 seconds"),
	sensorTimeout: z
		.number()
		.int("Sensor timeout must be a whole number of seconds")
		.min(5, "Sensor timeout must be between 5-120 seconds")
		.max(120, "Sensor timeout must be between 5-120 seconds"),
	manualOverride: z.boolean(),
	manualHeating: z.boolean(),
	manualPump: z.boolean(),
	heatingSystemEnabled: z.boolean(),
}) satisfies z.ZodType<ControlParameters>;

export const settingsPatchSchema = controlParametersSchema
	.omit({ manualOverride: true, manualHeating: true, manualPump: true })
	.partial()
	.strict();

export const manualMessageSchema = z.object({
	override: z.boolean(),
	heating: z.boolean(),
	pump: z.boolean(),
	password: z.string().optional(),
});

export const eventQuerySchema = z.object({
	limit: z.number().int().min(1).max(1000).optional(),
	kind: z.enum(CONTROL_EVENT_KINDS).optional(),
});

export const controlEventSchema = z.object({
	kind: z.enum(CONTROL_EVENT_KINDS),
	description: z.string(),
	timestamp: z.number(),
	data: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

/**
 * Flatten zod issues into "field: message" lines
 *
 * @param error Failed parse result
 * @returns One line per issue
 */
export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}
