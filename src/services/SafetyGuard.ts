export type SafetyTripReason = "sensor_failure" | "safety_trip";

export type SafetyVerdict = { tripped: false } | { tripped: true; reason: SafetyTripReason; description: string };

/**
 * Safety ceiling applied after every heating decision, in every mode
 */
export class SafetyGuard {
	/**
	 * Decide whether heating must be held off this cycle
	 *
	 * @param average Average tank temperature, null when no sensor answered
	 * @param maxTemperature Safety ceiling in °C
	 * @returns Verdict with the reason when heating has to be forced off
	 */
	evaluate(average: number | null, maxTemperature: number): SafetyVerdict {
		if (average === null) {
			return {
				tripped: true,
				reason: "sensor_failure",
				description: "No valid temperature reading, heating disabled",
			};
		}
		if (average >= maxTemperature) {
			return {
				tripped: true,
				reason: "safety_trip",
				description: `Temperature ${average.toFixed(1)}°C exceeds maximum ${maxTemperature}°C, heating disabled`,
			};
		}
		return { tripped: false };
	}
}
