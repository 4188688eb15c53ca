/**
 * Bounded in-memory log of control events, persisted as JSON in a state
 */

import { z } from "zod";
import type { ControlEvent, ControlEventKind } from "../models/controlEvent";
import { controlEventSchema } from "../lib/schemas";
import type { LogFn } from "../lib/log";

const historySchema = z.array(controlEventSchema);

export class EventHistoryService {
	/** Oldest first */
	private events: ControlEvent[] = [];

	/**
	 * @param log Logging callback
	 * @param maxEvents Number of events kept, older ones are dropped
	 */
	constructor(
		private readonly log: LogFn,
		private readonly maxEvents = 100,
	) {}

	get size(): number {
		return this.events.length;
	}

	record(event: ControlEvent): void {
		this.events.push(event);
		if (this.events.length > this.maxEvents) {
			this.events.splice(0, this.events.length - this.maxEvents);
		}
	}

	/**
	 * Most recent events, newest first
	 *
	 * @param limit Maximum number of events returned
	 * @param kind Only events of this kind
	 * @returns Matching events
	 */
	getRecent(limit = 50, kind?: ControlEventKind): ControlEvent[] {
		if (limit <= 0) {
			return [];
		}
		const matching = kind ? this.events.filter(event => event.kind === kind) : this.events;
		return matching.slice(-limit).reverse();
	}

	toJSON(): string {
		return JSON.stringify(this.events);
	}

	/**
	 * Restore events saved by {@link EventHistoryService.toJSON}
	 *
	 * @param json Stored history
	 */
	load(json: string): void {
		let raw: unknown;
		try {
			raw = JSON.parse(json);
		} catch (error) {
			this.log("warn", `[History] Stored event history is not valid JSON, starting fresh: ${String(error)}`);
			return;
		}
		const parsed = historySchema.safeParse(raw);
		if (!parsed.success) {
			this.log("warn", "[History] Stored event history has an unexpected format, starting fresh");
			return;
		}
		this.events = parsed.data.slice(-this.maxEvents);
		this.log("info", `[History] Loaded ${this.events.length} events`);
	}
}
