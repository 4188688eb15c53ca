/*
 * Created with @iobroker/create-adapter
 */

// The adapter-core module gives you access to the core ioBroker functions
// you need to create an adapter
import * as utils from "@iobroker/adapter-core";
import {
	TUNABLE_KEYS,
	type ControlParameters,
	type ManualParameterKey,
} from "./models/controlParameters";
import type { ActuatorGateway, SensorGateway } from "./models/gateways";
import { describeError } from "./lib/errors";
import type { LogFn } from "./lib/log";
import { eventQuerySchema, formatIssues, manualMessageSchema } from "./lib/schemas";
import { SentryUtils } from "./lib/sentry";
import { ConfigStore, parametersFromRaw } from "./services/ConfigStore";
import { ControlCore } from "./services/ControlCore";
import { ControlLoop } from "./services/ControlLoop";
import { EventHistoryService } from "./services/EventHistoryService";
import { ManualOverrideAuthorizer } from "./services/ManualOverrideAuthorizer";
import { SimulatedTank } from "./services/SimulatedTank";
import { StateEventSink } from "./services/StateEventSink";
import { StateRelayGateway } from "./services/StateRelayGateway";
import { StateSensorGateway } from "./services/StateSensorGateway";

const MANUAL_STATES: ReadonlyArray<[ManualParameterKey, string]> = [
	["manualOverride", "manual.override"],
	["manualHeating", "manual.heating"],
	["manualPump", "manual.pump"],
];

interface StateDefinition {
	id: string;
	common: ioBroker.StateCommon;
}

const SETTINGS_STATES: StateDefinition[] = [
	{
		id: "settings.setpoint",
		common: { type: "number", name: "Target average temperature", role: "level.temperature", unit: "°C", min: 5, max: 85, read: true, write: true },
	},
	{
		id: "settings.hysteresis",
		common: { type: "number", name: "Hysteresis around the setpoint", role: "level", unit: "°C", min: 0.5, max: 10, read: true, write: true },
	},
	{
		id: "settings.maxTemperature",
		common: { type: "number", name: "Safety ceiling", role: "level.temperature", unit: "°C", min: 60, max: 95, read: true, write: true },
	},
	{
		id: "settings.pumpDelay",
		common: { type: "number", name: "Pump run-on after heating", role: "level", unit: "s", min: 0, max: 300, read: true, write: true },
	},
	{
		id: "settings.updateInterval",
		common: { type: "number", name: "Control cycle interval", role: "level", unit: "s", min: 1, max: 60, read: true, write: true },
	},
	{
		id: "settings.sensorTimeout",
		common: { type: "number", name: "Sensor read timeout", role: "level", unit: "s", min: 5, max: 120, read: true, write: true },
	},
	{
		id: "settings.heatingSystemEnabled",
		common: { type: "boolean", name: "Automatic heating enabled", role: "switch.enable", read: true, write: true },
	},
];

const STATUS_STATES: StateDefinition[] = [
	{ id: "manual.override", common: { type: "boolean", name: "Manual override active", role: "indicator", read: true, write: false } },
	{ id: "manual.heating", common: { type: "boolean", name: "Manual heating request", role: "indicator", read: true, write: false } },
	{ id: "manual.pump", common: { type: "boolean", name: "Manual pump request", role: "indicator", read: true, write: false } },
	{ id: "status.heating", common: { type: "boolean", name: "Heating active", role: "indicator.working", read: true, write: false } },
	{ id: "status.pump", common: { type: "boolean", name: "Circulation pump active", role: "indicator.working", read: true, write: false } },
	{ id: "status.averageTemperature", common: { type: "number", name: "Average tank temperature", role: "value.temperature", unit: "°C", read: true, write: false } },
	{ id: "status.tank1", common: { type: "number", name: "Temperature tank 1", role: "value.temperature", unit: "°C", read: true, write: false } },
	{ id: "status.tank2", common: { type: "number", name: "Temperature tank 2", role: "value.temperature", unit: "°C", read: true, write: false } },
	{ id: "status.tank3", common: { type: "number", name: "Temperature tank 3", role: "value.temperature", unit: "°C", read: true, write: false } },
	{ id: "status.availableSensors", common: { type: "number", name: "Sensors with a valid reading", role: "value", read: true, write: false } },
	{ id: "status.pumpPhase", common: { type: "string", name: "Pump delay phase", role: "text", read: true, write: false } },
	{ id: "status.pumpShutoffDeadline", common: { type: "number", name: "Pending pump shutoff", role: "value.time", read: true, write: false } },
	{ id: "status.manualOverride", common: { type: "boolean", name: "Manual override (safety warning)", role: "indicator.alarm", read: true, write: false } },
	{ id: "status.heatingSystemEnabled", common: { type: "boolean", name: "Heating system enabled", role: "indicator", read: true, write: false } },
	{ id: "status.safetyTripped", common: { type: "boolean", name: "Heating held off by safety limit", role: "indicator.alarm", read: true, write: false } },
	{ id: "status.lastUpdate", common: { type: "number", name: "Last control cycle", role: "value.time", read: true, write: false } },
	{ id: "status.json", common: { type: "string", name: "Complete system state (JSON)", role: "json", read: true, write: false } },
	{ id: "events.last", common: { type: "string", name: "Last control event (JSON)", role: "json", read: true, write: false } },
	{ id: "events.history", common: { type: "string", name: "Recent control events (JSON)", role: "json", read: true, write: false } },
];

class Tankheating extends utils.Adapter {
	configStore: ConfigStore | undefined;
	controlCore: ControlCore | undefined;
	controlLoop: ControlLoop<ioBroker.Timeout | undefined> | undefined;
	eventHistory: EventHistoryService | undefined;

	private readonly writeLog: LogFn = (level, message) => {
		this.log[level](message);
	};

	public constructor(options: Partial<utils.AdapterOptions> = {}) {
		super({
			...options,
			name: "tankheating",
		});
		this.on("ready", this.onReady.bind(this));
		this.on("stateChange", this.onStateChange.bind(this));
		this.on("message", this.onMessage.bind(this));
		this.on("unload", this.onUnload.bind(this));
	}

	/**
	 * Is called when databases are connected and adapter received configuration.
	 */
	async onReady(): Promise<void> {
		SentryUtils.init(this.config.sentryDsn || "", this.version ?? "0.0.0", this.namespace);

		await this.initStates();

		const initial = parametersFromRaw(
			{ ...this.nativeParameters(), ...(await this.readPersistedParameters()) },
			this.writeLog,
		);
		const authorizer = new ManualOverrideAuthorizer(this.config.superAdminPassword || "");
		if (!authorizer.isEnabled()) {
			this.log.info("No super admin password configured, manual override is locked");
		}
		const configStore = new ConfigStore(initial, authorizer, this.writeLog);
		configStore.onChange((parameters, previous) => this.onParametersChanged(parameters, previous));
		this.configStore = configStore;
		await this.mirrorParameters(initial);

		const eventHistory = new EventHistoryService(this.writeLog, this.config.eventHistorySize || 100);
		await this.loadEventHistory(eventHistory);
		this.eventHistory = eventHistory;

		const sink = new StateEventSink(this, eventHistory, this.writeLog);
		const { sensors, actuators } = await this.createGateways();

		const controlCore = new ControlCore({
			parameters: configStore,
			sensors,
			actuators,
			sink,
			log: this.writeLog,
		});
		this.controlCore = controlCore;
		this.controlLoop = new ControlLoop({
			core: controlCore,
			parameters: configStore,
			sink,
			log: this.writeLog,
			scheduler: {
				schedule: (callback, delayMs) => this.setTimeout(callback, delayMs),
				cancel: handle => this.clearTimeout(handle),
			},
		});

		this.subscribeStates("settings.*");
		await this.controlLoop.start();
	}

	private nativeParameters(): Partial<Record<keyof ControlParameters, unknown>> {
		return {
			setpoint: this.config.setpoint,
			hysteresis: this.config.hysteresis,
			maxTemperature: this.config.maxTemperature,
			pumpDelay: this.config.pumpDelay,
			updateInterval: this.config.updateInterval,
			sensorTimeout: this.config.sensorTimeout,
			heatingSystemEnabled: this.config.heatingSystemEnabled,
		};
	}

	/**
	 * Settings changed at runtime and the last manual override survive restarts in states
	 *
	 * @returns Values found in the settings and manual states
	 */
	private async readPersistedParameters(): Promise<Partial<Record<keyof ControlParameters, unknown>>> {
		const persisted: Partial<Record<keyof ControlParameters, unknown>> = {};
		for (const key of TUNABLE_KEYS) {
			const state = await this.getStateAsync(`settings.${key}`);
			if (state != undefined && state.val != null) {
				persisted[key] = state.val;
			}
		}
		for (const [key, stateId] of MANUAL_STATES) {
			const state = await this.getStateAsync(stateId);
			if (state != undefined && state.val != null) {
				persisted[key] = state.val;
			}
		}
		return persisted;
	}

	private async createGateways(): Promise<{ sensors: SensorGateway; actuators: ActuatorGateway }> {
		if (this.config.useSimulation) {
			this.log.warn("Using SIMULATED tank hardware (development mode)");
			const tank = new SimulatedTank(this.writeLog);
			await this.setStateAsync("info.connection", true, true);
			return { sensors: tank, actuators: tank };
		}

		const sensors = new StateSensorGateway(
			this,
			{ 1: this.config.tankSensor1, 2: this.config.tankSensor2, 3: this.config.tankSensor3 },
			this.writeLog,
			(this.config.sensorMaxAge || 0) * 1000,
		);
		const found = await sensors.discover();
		if (!this.config.heatingRelay || !this.config.pumpRelay) {
			this.log.error("Heating or pump relay state is not configured, relay writes will fail");
		}
		await this.setStateAsync("info.connection", found.length > 0, true);

		const actuators = new StateRelayGateway(
			this,
			{ heating: this.config.heatingRelay, pump: this.config.pumpRelay },
			this.writeLog,
		);
		return { sensors, actuators };
	}

	private async loadEventHistory(eventHistory: EventHistoryService): Promise<void> {
		const historyState = await this.getStateAsync("events.history");
		if (historyState && typeof historyState.val === "string" && historyState.val) {
			eventHistory.load(historyState.val);
		}
	}

	private onParametersChanged(parameters: Readonly<ControlParameters>, previous: Readonly<ControlParameters>): void {
		SentryUtils.setContext("control_parameters", { ...parameters });
		void this.mirrorParameters(parameters);

		const modeChanged =
			parameters.manualOverride !== previous.manualOverride ||
			parameters.manualHeating !== previous.manualHeating ||
			parameters.manualPump !== previous.manualPump ||
			parameters.heatingSystemEnabled !== previous.heatingSystemEnabled;
		if (modeChanged && this.controlLoop?.isRunning()) {
			// react right away instead of waiting for the next interval
			void this.controlLoop.tick();
		}
	}

	/**
	 * Write the current parameters into the settings and manual states
	 *
	 * @param parameters Parameters to show
	 */
	private async mirrorParameters(parameters: Readonly<ControlParameters>): Promise<void> {
		try {
			for (const key of TUNABLE_KEYS) {
				await this.setStateAsync(`settings.${key}`, parameters[key], true);
			}
			for (const [key, stateId] of MANUAL_STATES) {
				await this.setStateAsync(stateId, parameters[key], true);
			}
		} catch (error) {
			this.log.error(`Failed to write settings states: ${describeError(error)}`);
		}
	}

	/**
	 * Is called if a subscribed state changes
	 *
	 * @param id state id
	 * @param state new state value
	 */
	async onStateChange(id: string, state: ioBroker.State | null | undefined): Promise<void> {
		if (!state || state.ack || !this.configStore) {
			return;
		}
		const prefix = `${this.namespace}.settings.`;
		const key = TUNABLE_KEYS.find(candidate => `${prefix}${candidate}` === id);
		if (!key) {
			return;
		}

		const result = this.configStore.updateFromRaw({ [key]: state.val });
		if (!result.ok) {
			this.log.warn(`Rejected ${key}=${String(state.val)}: ${result.error.issues.join("; ")}`);
			await this.setStateAsync(`settings.${key}`, this.configStore.snapshot()[key], true);
		}
	}

	/**
	 * Handles sendTo commands: updateSettings, setManual, getStatus and getEvents
	 *
	 * @param obj message from another adapter or a script
	 */
	onMessage(obj: ioBroker.Message): void {
		if (typeof obj !== "object" || !obj.callback) {
			return;
		}
		this.sendTo(obj.from, obj.command, this.handleCommand(obj.command, obj.message), obj.callback);
	}

	private handleCommand(command: string, message: unknown): Record<string, unknown> {
		if (!this.configStore || !this.controlCore || !this.eventHistory) {
			return { error: "Adapter is not ready yet" };
		}

		switch (command) {
			case "updateSettings": {
				const result = this.configStore.updateFromRaw(message);
				return result.ok
					? { success: true, settings: result.value }
					: { error: result.error.message, issues: result.error.issues };
			}
			case "setManual": {
				const parsed = manualMessageSchema.safeParse(message);
				if (!parsed.success) {
					return { error: formatIssues(parsed.error).join("; ") };
				}
				const { override, heating, pump, password } = parsed.data;
				const result = this.configStore.applyManual({ override, heating, pump }, password);
				return result.ok ? { success: true, settings: result.value } : { error: result.error.message };
			}
			case "getStatus":
				return {
					success: true,
					state: this.controlCore.getState() ?? null,
					settings: this.configStore.snapshot(),
				};
			case "getEvents": {
				const parsed = eventQuerySchema.safeParse(message ?? {});
				if (!parsed.success) {
					return { error: formatIssues(parsed.error).join("; ") };
				}
				return { success: true, events: this.eventHistory.getRecent(parsed.data.limit ?? 50, parsed.data.kind) };
			}
			default:
				return { error: `Unknown command ${command}` };
		}
	}

	private async initStates(): Promise<void> {
		for (const definition of SETTINGS_STATES) {
			await this.setObjectNotExistsAsync(definition.id, {
				type: "state",
				common: definition.common,
				native: {},
			});
		}
		for (const definition of STATUS_STATES) {
			await this.setObjectNotExistsAsync(definition.id, {
				type: "state",
				common: definition.common,
				native: {},
			});
		}
	}

	/**
	 * Is called when adapter shuts down - callback has to be called under any circumstances!
	 * Relays are left as they were last commanded.
	 *
	 * @param callback callback function to be called when cleanup is done
	 */
	onUnload(callback: () => void): void {
		void this.shutdown().finally(callback);
	}

	private async shutdown(): Promise<void> {
		try {
			await this.controlLoop?.stop();
			await SentryUtils.close();
		} catch (error) {
			this.log.error(`Error during shutdown: ${describeError(error)}`);
		}
	}
}

if (require.main !== module) {
	// Export the constructor in compact mode
	module.exports = (options: Partial<utils.AdapterOptions> | undefined) => new Tankheating(options);
} else {
	// otherwise start the instance directly
	(() => new Tankheating())();
}
