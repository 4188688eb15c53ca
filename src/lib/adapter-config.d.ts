// Augment the globally declared type ioBroker.AdapterConfig
declare global {
	namespace ioBroker {
		interface AdapterConfig {
			setpoint: number;
			hysteresis: number;
			maxTemperature: number;
			pumpDelay: number;
			updateInterval: number;
			sensorTimeout: number;
			heatingSystemEnabled: boolean;
			tankSensor1: string;
			tankSensor2: string;
			tankSensor3: string;
			sensorMaxAge: number;
			heatingRelay: string;
			pumpRelay: string;
			superAdminPassword: string;
			useSimulation: boolean;
			eventHistorySize: number;
			sentryDsn: string;
		}
	}
}

// this is required so the above AdapterConfig is found by TypeScript / type checking
export {};
