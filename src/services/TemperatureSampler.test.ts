import { expect } from "chai";
import { TemperatureSampler, calculateAverage, withTimeout } from "./TemperatureSampler";
import { FakeSensors, createLogRecorder } from "./testFakes";

describe("TemperatureSampler", () => {
	describe("calculateAverage", () => {
		it("should average all available readings", () => {
			const average = calculateAverage([
				{ tank: 1, temperature: 58 },
				{ tank: 2, temperature: 60 },
				{ tank: 3, temperature: 62 },
			]);
			expect(average).to.equal(60);
		});

		it("should skip unavailable tanks", () => {
			const average = calculateAverage([
				{ tank: 1, temperature: null },
				{ tank: 2, temperature: 58 },
				{ tank: 3, temperature: null },
			]);
			expect(average).to.equal(58);
		});

		it("should return null without readings", () => {
			expect(
				calculateAverage([
					{ tank: 1, temperature: null },
					{ tank: 2, temperature: null },
					{ tank: 3, temperature: null },
				]),
			).to.be.null;
			expect(calculateAverage([])).to.be.null;
		});
	});

	describe("withTimeout", () => {
		it("should resolve with the value when in time", async () => {
			expect(await withTimeout(Promise.resolve(5), 50, () => new Error("late"))).to.equal(5);
		});

		it("should reject when the promise does not settle", async () => {
			let caught: unknown;
			try {
				await withTimeout(new Promise<number>(() => undefined), 10, () => new Error("late"));
			} catch (error) {
				caught = error;
			}
			expect(caught).to.be.instanceOf(Error).with.property("message", "late");
		});
	});

	describe("sample", () => {
		it("should return one reading per tank in tank order", async () => {
			const sensors = new FakeSensors();
			sensors.values = { 1: 55.5, 2: 60, 3: 64.5 };
			const sampler = new TemperatureSampler(sensors, createLogRecorder().log);

			expect(await sampler.sample(1000)).to.deep.equal([
				{ tank: 1, temperature: 55.5 },
				{ tank: 2, temperature: 60 },
				{ tank: 3, temperature: 64.5 },
			]);
			expect(sensors.reads).to.equal(3);
		});

		it("should mark failing, invalid and missing sensors unavailable", async () => {
			const sensors = new FakeSensors();
			sensors.values = { 1: new Error("bus error"), 2: Number.NaN, 3: null };
			const { log, lines } = createLogRecorder();
			const sampler = new TemperatureSampler(sensors, log);

			expect(await sampler.sample(1000)).to.deep.equal([
				{ tank: 1, temperature: null },
				{ tank: 2, temperature: null },
				{ tank: 3, temperature: null },
			]);
			expect(lines).to.deep.include({ level: "warn", message: "[Sampler] Reading tank 1 failed: bus error" });
			expect(lines).to.deep.include({ level: "warn", message: "[Sampler] Tank 2 returned invalid temperature NaN" });
			expect(lines).to.deep.include({ level: "debug", message: "[Sampler] Tank 3 has no reading" });
		});

		it("should give up on a sensor that does not answer in time", async () => {
			const sensors = new FakeSensors();
			sensors.values = { 1: 58, 2: "hang", 3: 62 };
			const { log, lines } = createLogRecorder();
			const sampler = new TemperatureSampler(sensors, log);

			const readings = await sampler.sample(20);

			expect(readings).to.deep.equal([
				{ tank: 1, temperature: 58 },
				{ tank: 2, temperature: null },
				{ tank: 3, temperature: 62 },
			]);
			expect(calculateAverage(readings)).to.equal(60);
			expect(lines).to.deep.include({
				level: "warn",
				message: "[Sampler] Reading tank 2 failed: Sensor of tank 2 did not answer within 20 ms",
			});
		});
	});
});
