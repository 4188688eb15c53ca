import { expect } from "chai";
import { ControlCore } from "./ControlCore";
import { FakeActuators, FakeParameters, FakeSensors, RecordingSink, createLogRecorder, type LogLine } from "./testFakes";

describe("ControlCore", () => {
	let parameters: FakeParameters;
	let sensors: FakeSensors;
	let actuators: FakeActuators;
	let sink: RecordingSink;
	let lines: LogLine[];
	let now: number;
	let core: ControlCore;

	beforeEach(() => {
		parameters = new FakeParameters({ setpoint: 60, hysteresis: 2, maxTemperature: 85, pumpDelay: 60 });
		sensors = new FakeSensors(60);
		actuators = new FakeActuators();
		sink = new RecordingSink();
		const recorder = createLogRecorder();
		lines = recorder.lines;
		now = 0;
		core = new ControlCore({ parameters, sensors, actuators, sink, log: recorder.log, clock: () => now });
	});

	describe("hysteresis", () => {
		it("should switch heating on below the band", async () => {
			sensors.setAll(57);

			const state = await core.runCycle();

			expect(state.heatingActive).to.be.true;
			expect(state.pumpActive).to.be.true;
			expect(state.averageTemperature).to.equal(57);
			expect(state.pumpTimer).to.deep.equal({ phase: "running" });
			expect(actuators.writes).to.deep.equal([
				["heating", true],
				["pump", true],
			]);
			expect(sink.kinds()).to.deep.equal(["heating_on"]);
		});

		it("should switch heating off above the band and start the pump run-on", async () => {
			sensors.setAll(57);
			await core.runCycle();
			actuators.writes = [];

			now = 1_000;
			sensors.setAll(63);
			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(state.pumpActive).to.be.true;
			expect(state.pumpTimer).to.deep.equal({ phase: "pendingShutoff", deadline: 61_000 });
			expect(state.pumpShutoffDeadline).to.equal(61_000);
			expect(actuators.writes).to.deep.equal([["heating", false]]);
			expect(sink.events[1]).to.deep.equal({
				kind: "heating_off",
				description: "Heating deactivated, pump will stop in 60 seconds",
				timestamp: 1_000,
				data: { averageTemperature: 63, setpoint: 60 },
			});
		});

		it("should keep heating unchanged inside the dead band", async () => {
			sensors.setAll(57);
			await core.runCycle();
			for (const temperature of [58, 59, 60.5, 62]) {
				sensors.setAll(temperature);
				expect((await core.runCycle()).heatingActive).to.be.true;
			}

			sensors.setAll(63);
			await core.runCycle();
			for (const temperature of [62, 61, 59.5, 58]) {
				sensors.setAll(temperature);
				expect((await core.runCycle()).heatingActive).to.be.false;
			}
		});

		it("should publish a state every cycle even without changes", async () => {
			await core.runCycle();
			await core.runCycle();
			await core.runCycle();
			expect(sink.states).to.have.length(3);
			expect(core.getState()).to.equal(sink.states[2]);
		});

		it("should only write relays when their target changes", async () => {
			sensors.setAll(60);
			await core.runCycle();
			await core.runCycle();
			expect(actuators.writes).to.deep.equal([
				["heating", false],
				["pump", false],
			]);
		});
	});

	describe("pump delay", () => {
		it("should keep the pump on for the configured delay after heating stops", async () => {
			sensors.setAll(57);
			await core.runCycle();

			sensors.setAll(63);
			expect((await core.runCycle()).pumpActive).to.be.true;

			now = 30_000;
			expect((await core.runCycle()).pumpActive).to.be.true;
			now = 59_999;
			expect((await core.runCycle()).pumpActive).to.be.true;
			now = 60_000;
			const state = await core.runCycle();

			expect(state.pumpActive).to.be.false;
			expect(state.pumpTimer).to.deep.equal({ phase: "idle" });
			expect(state.pumpShutoffDeadline).to.be.null;
			expect(actuators.writes).to.deep.equal([
				["heating", true],
				["pump", true],
				["heating", false],
				["pump", false],
			]);
			expect(sink.kinds()).to.deep.equal(["heating_on", "heating_off", "pump_off"]);
		});

		it("should run the pump on after the heating system is disabled", async () => {
			sensors.setAll(57);
			await core.runCycle();

			now = 5_000;
			parameters.set({ heatingSystemEnabled: false });
			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(state.heatingSystemEnabled).to.be.false;
			expect(state.pumpShutoffDeadline).to.equal(65_000);
			expect(sink.kinds()).to.deep.equal(["heating_on", "mode_change", "heating_off"]);
			expect(sink.events[1].description).to.equal("Heating system disabled");
		});
	});

	describe("safety ceiling", () => {
		it("should force heating off at the maximum even in manual mode", async () => {
			parameters.set({ manualOverride: true, manualHeating: true, manualPump: true });
			sensors.setAll(86);

			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(state.pumpActive).to.be.true;
			expect(state.safetyTripped).to.be.true;
			expect(state.manualOverride).to.be.true;
			expect(actuators.writes).to.deep.equal([
				["heating", false],
				["pump", true],
			]);
			expect(sink.events).to.deep.equal([
				{
					kind: "safety_trip",
					description: "Temperature 86.0°C exceeds maximum 85°C, heating disabled",
					timestamp: 0,
					data: undefined,
				},
			]);
		});

		it("should switch running heating off when the ceiling is reached", async () => {
			parameters.set({ setpoint: 84, hysteresis: 2 });
			sensors.setAll(80);
			await core.runCycle();

			sensors.setAll(85);
			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(sink.kinds()).to.deep.equal(["heating_on", "safety_trip", "heating_off"]);
		});

		it("should report a trip once and its end once", async () => {
			sensors.setAll(90);
			await core.runCycle();
			await core.runCycle();
			sensors.setAll(70);
			await core.runCycle();
			await core.runCycle();

			expect(sink.kinds()).to.deep.equal(["safety_trip", "safety_cleared"]);
		});

		it("should fail safe when no sensor answers", async () => {
			sensors.setAll(57);
			await core.runCycle();

			sensors.setAll(null);
			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(state.averageTemperature).to.be.null;
			expect(state.availableSensors).to.equal(0);
			expect(state.safetyTripped).to.be.true;
			expect(sink.kinds()).to.deep.equal(["heating_on", "sensor_failure", "heating_off"]);
			expect(lines).to.deep.include({
				level: "warn",
				message: "[Control] No valid temperature reading, heating disabled",
			});
		});

		it("should resume control when a sensor comes back", async () => {
			sensors.setAll(new Error("bus error"));
			await core.runCycle();

			sensors.values = { 1: null, 2: 57, 3: null };
			const state = await core.runCycle();

			expect(state.heatingActive).to.be.true;
			expect(state.availableSensors).to.equal(1);
			expect(sink.kinds()).to.deep.equal(["sensor_failure", "sensor_recovered", "heating_on"]);
		});
	});

	describe("degraded sensors", () => {
		it("should average the remaining reading when two sensors are unavailable", async () => {
			sensors.values = { 1: null, 2: 58, 3: new Error("timeout") };

			const state = await core.runCycle();

			expect(state.averageTemperature).to.equal(58);
			expect(state.availableSensors).to.equal(1);
			expect(state.readings).to.deep.equal([
				{ tank: 1, temperature: null },
				{ tank: 2, temperature: 58 },
				{ tank: 3, temperature: null },
			]);
			// 58 is the lower band edge, which does not switch
			expect(state.heatingActive).to.be.false;

			sensors.values = { 1: null, 2: 57.9, 3: null };
			expect((await core.runCycle()).heatingActive).to.be.true;
		});
	});

	describe("manual override", () => {
		it("should apply manual relay targets without pump delay", async () => {
			sensors.setAll(57);
			await core.runCycle();

			parameters.set({ manualOverride: true, manualHeating: false, manualPump: false });
			now = 1_000;
			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(state.pumpActive).to.be.false;
			expect(state.pumpShutoffDeadline).to.be.null;
			expect(sink.kinds()).to.deep.equal(["heating_on", "mode_change", "heating_off", "pump_off"]);
			expect(sink.events[1].description).to.equal("Manual override enabled");
			expect(sink.events[2].description).to.equal("Heating deactivated, pump follows manual setting");
		});

		it("should run the pump alone when requested", async () => {
			parameters.set({ manualOverride: true, manualHeating: false, manualPump: true });
			sensors.setAll(70);

			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(state.pumpActive).to.be.true;
			expect(actuators.writes).to.deep.equal([
				["heating", false],
				["pump", true],
			]);
		});

		it("should start the pump run-on when automatic control resumes", async () => {
			parameters.set({ manualOverride: true, manualHeating: true, manualPump: true });
			sensors.setAll(70);
			await core.runCycle();

			parameters.set({ manualOverride: false });
			now = 2_000;
			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(state.pumpActive).to.be.true;
			expect(state.pumpShutoffDeadline).to.equal(62_000);
			expect(sink.kinds()).to.deep.equal(["heating_on", "mode_change", "heating_off"]);
			expect(sink.events[1]).to.deep.equal({
				kind: "mode_change",
				description: "Automatic control resumed",
				timestamp: 2_000,
				data: undefined,
			});
		});
	});

	describe("actuator failures", () => {
		it("should report a failed write and retry it next cycle", async () => {
			sensors.setAll(57);
			actuators.failing.add("heating");

			const state = await core.runCycle();

			expect(state.heatingActive).to.be.true;
			expect(actuators.writes).to.deep.equal([["pump", true]]);
			expect(sink.events[1]).to.deep.equal({
				kind: "actuator_failure",
				description: "Setting heating relay ON failed: relay offline",
				timestamp: 0,
				data: { relay: "heating", target: true },
			});
			expect(lines).to.deep.include({
				level: "error",
				message: "[Control] Setting heating relay ON failed: relay offline, retrying next cycle",
			});

			actuators.failing.clear();
			await core.runCycle();

			expect(actuators.writes).to.deep.equal([
				["pump", true],
				["heating", true],
			]);
		});

		it("should keep the pump running until the heating relay is confirmed off", async () => {
			sensors.setAll(57);
			await core.runCycle();
			actuators.failing.add("heating");

			now = 1_000;
			sensors.setAll(63);
			await core.runCycle();
			now = 61_000;
			const held = await core.runCycle();

			expect(held.heatingActive).to.be.false;
			expect(held.pumpActive).to.be.true;
			expect(actuators.writes).to.deep.equal([
				["heating", true],
				["pump", true],
			]);
			expect(lines).to.deep.include({
				level: "warn",
				message: "[Control] Heating relay not confirmed off, keeping circulation pump running",
			});

			actuators.failing.clear();
			now = 62_000;
			const released = await core.runCycle();

			expect(released.pumpActive).to.be.false;
			expect(actuators.writes).to.deep.equal([
				["heating", true],
				["pump", true],
				["heating", false],
				["pump", false],
			]);
			expect(sink.kinds()).to.include("pump_off");
		});

		it("should keep publishing when the sink fails", async () => {
			sink.publish = async () => {
				throw new Error("state db down");
			};

			const state = await core.runCycle();

			expect(state.heatingActive).to.be.false;
			expect(lines).to.deep.include({ level: "error", message: "[Control] Publishing state failed: state db down" });
		});
	});
});
