import { expect } from "chai";
import { PumpDelayStateMachine } from "./PumpDelayStateMachine";

describe("PumpDelayStateMachine", () => {
	let machine: PumpDelayStateMachine;

	beforeEach(() => {
		machine = new PumpDelayStateMachine();
	});

	it("should start idle with the pump off", () => {
		expect(machine.state).to.deep.equal({ phase: "idle" });
		expect(machine.pumpActive).to.be.false;
	});

	it("should stay idle while heating is off", () => {
		expect(machine.advance(false, 1000, 60_000)).to.be.false;
		expect(machine.state).to.deep.equal({ phase: "idle" });
	});

	it("should run the pump while heating", () => {
		expect(machine.advance(true, 0, 60_000)).to.be.true;
		expect(machine.state).to.deep.equal({ phase: "running" });
	});

	it("should keep the pump on until the deadline after heating stops", () => {
		machine.advance(true, 0, 60_000);
		expect(machine.advance(false, 10_000, 60_000)).to.be.true;
		expect(machine.state).to.deep.equal({ phase: "pendingShutoff", deadline: 70_000 });

		expect(machine.advance(false, 69_999, 60_000)).to.be.true;
		expect(machine.advance(false, 70_000, 60_000)).to.be.false;
		expect(machine.state).to.deep.equal({ phase: "idle" });
	});

	it("should not move the deadline on later cycles", () => {
		machine.advance(true, 0, 60_000);
		machine.advance(false, 0, 60_000);
		machine.advance(false, 30_000, 120_000);
		expect(machine.state).to.deep.equal({ phase: "pendingShutoff", deadline: 60_000 });
	});

	it("should cancel a pending shutoff when heating resumes", () => {
		machine.advance(true, 0, 60_000);
		machine.advance(false, 5_000, 60_000);
		expect(machine.advance(true, 20_000, 60_000)).to.be.true;
		expect(machine.state).to.deep.equal({ phase: "running" });
	});

	it("should stop the pump in the same cycle with a zero delay", () => {
		machine.advance(true, 0, 0);
		expect(machine.advance(false, 5_000, 0)).to.be.false;
		expect(machine.state).to.deep.equal({ phase: "idle" });
	});

	describe("syncManual", () => {
		it("should follow the manual heating flag", () => {
			machine.syncManual(true);
			expect(machine.state).to.deep.equal({ phase: "running" });
			machine.syncManual(false);
			expect(machine.state).to.deep.equal({ phase: "idle" });
		});

		it("should start the run-on when automatic control resumes with heating off", () => {
			machine.syncManual(true);
			expect(machine.advance(false, 1_000, 60_000)).to.be.true;
			expect(machine.state).to.deep.equal({ phase: "pendingShutoff", deadline: 61_000 });
		});
	});
});
