import { describe, expect, test } from "vitest";
import { type GateOptions, StatusGate } from "./gate";
import type { AnnouncementEvent, RawStatus } from "./types";

function at(seconds: number, reachable: boolean): RawStatus {
	return { timestamp: new Date(seconds * 1000), reachable };
}

function feed(
	gate: StatusGate,
	observations: Array<[seconds: number, reachable: boolean]>
): Array<AnnouncementEvent | null> {
	return observations.map(([seconds, reachable]) => gate.observe(at(seconds, reachable)));
}

function gate(stableThreshold: number, rateLimitSeconds: number): StatusGate {
	const options: GateOptions = { stableThreshold, rateLimitMs: rateLimitSeconds * 1000 };
	return new StatusGate(options);
}

describe("StatusGate", () => {
	test("announces the first stable state from unknown", () => {
		const g = gate(2, 300);

		expect(g.observe(at(0, true))).toBeNull();
		expect(g.observe(at(60, true))).toEqual({
			newState: "online",
			observedAt: new Date(60_000),
			detail: undefined,
		});
		expect(g.snapshot()).toEqual({
			announced: "online",
			pending: "online",
			pendingCount: 2,
			lastAnnouncedAt: new Date(60_000),
		});
	});

	test("bootstraps with exactly one event for a run of online observations", () => {
		const events = feed(gate(3, 0), [
			[0, true],
			[1, true],
			[2, true],
			[3, true],
			[4, true],
		]).filter((e) => e !== null);

		expect(events).toHaveLength(1);
		expect(events[0]?.newState).toBe("online");
		expect(events[0]?.observedAt).toEqual(new Date(2000));
	});

	test("stays quiet in steady state", () => {
		const g = gate(1, 0);
		expect(g.observe(at(0, false))?.newState).toBe("offline");

		for (let i = 1; i <= 50; i++) {
			expect(g.observe(at(i, false))).toBeNull();
		}
		expect(g.snapshot().pendingCount).toBe(51);
	});

	test("absorbs flapping that never reaches the threshold", () => {
		const events = feed(gate(3, 0), [
			[0, true],
			[1, false],
			[2, true],
			[3, false],
			[4, true],
		]);

		expect(events).toEqual([null, null, null, null, null]);
	});

	test("ignores a flap that heals before the threshold", () => {
		const g = gate(2, 0);
		feed(g, [
			[0, true],
			[1, true],
		]);

		expect(g.observe(at(2, false))).toBeNull();
		expect(g.observe(at(3, true))).toBeNull();
		expect(g.observe(at(4, true))).toBeNull();
		expect(g.snapshot()).toMatchObject({ announced: "online", pending: "online", pendingCount: 2 });
	});

	test("requires fresh stability for the opposite state after an announcement", () => {
		const g = gate(3, 0);
		feed(g, [
			[0, true],
			[1, true],
			[2, true],
		]);

		expect(g.observe(at(3, false))).toBeNull();
		expect(g.observe(at(4, false))).toBeNull();
		expect(g.observe(at(5, false))?.newState).toBe("offline");
	});

	test("threshold 1 announces on the first observation of a new state", () => {
		const events = feed(gate(1, 0), [
			[0, true],
			[1, false],
			[2, true],
		]);

		expect(events.map((e) => e?.newState ?? null)).toEqual(["online", "offline", "online"]);
	});

	test("rate limits a second transition and fires once the window elapses", () => {
		const g = gate(1, 100);

		expect(g.observe(at(0, true))?.newState).toBe("online");
		expect(g.observe(at(10, false))).toBeNull();
		expect(g.observe(at(50, false))).toBeNull();
		expect(g.observe(at(100, false))).toEqual({
			newState: "offline",
			observedAt: new Date(100_000),
			detail: undefined,
		});
	});

	test("drops a rate-limited transition that reverts before the window elapses", () => {
		const g = gate(1, 100);

		expect(g.observe(at(0, true))?.newState).toBe("online");
		expect(g.observe(at(10, false))).toBeNull();
		expect(g.observe(at(20, true))).toBeNull();
		expect(g.observe(at(200, true))).toBeNull();
		expect(g.snapshot().lastAnnouncedAt).toEqual(new Date(0));
	});

	test("follows the offline-then-online timeline", () => {
		const g = gate(2, 100);

		expect(g.observe(at(0, false))).toBeNull();
		expect(g.observe(at(10, false))).toEqual({
			newState: "offline",
			observedAt: new Date(10_000),
			detail: undefined,
		});
		expect(g.observe(at(20, true))).toBeNull();
		expect(g.observe(at(30, true))).toBeNull();
		expect(g.snapshot()).toMatchObject({ announced: "offline", pending: "online", pendingCount: 2 });
		expect(g.observe(at(120, true))).toEqual({
			newState: "online",
			observedAt: new Date(120_000),
			detail: undefined,
		});
		expect(g.snapshot().pendingCount).toBe(3);
	});

	test("rate limit 0 never holds an announcement back", () => {
		const g = gate(1, 0);

		expect(g.observe(at(5, true))?.newState).toBe("online");
		expect(g.observe(at(5, false))?.newState).toBe("offline");
		// out-of-order timestamps are taken as given
		expect(g.observe(at(1, true))?.newState).toBe("online");
	});

	test("an earlier timestamp than the last announcement stays inside the rate limit", () => {
		const g = gate(1, 100);

		expect(g.observe(at(500, true))?.newState).toBe("online");
		expect(g.observe(at(400, false))).toBeNull();
	});

	test("carries the probe detail on the event", () => {
		const g = gate(1, 0);
		const detail = { edition: "java" as const, playersOnline: 4, playersMax: 20, version: "1.21.1" };

		expect(g.observe({ timestamp: new Date(0), reachable: true, detail })?.detail).toEqual(detail);
	});

	test("only announces after threshold agreeing observations that differ from the announced state", () => {
		const threshold = 3;
		const length = 8;

		for (let bits = 0; bits < 2 ** length; bits++) {
			const sequence = Array.from({ length }, (_, i) => ((bits >> i) & 1) === 1);
			const g = gate(threshold, 0);
			let announced: boolean | null = null;

			sequence.forEach((reachable, i) => {
				const event = g.observe(at(i, reachable));
				const window = sequence.slice(Math.max(0, i - threshold + 1), i + 1);
				const stable = window.length === threshold && window.every((r) => r === reachable);

				if (event) {
					expect(stable).toBe(true);
					expect(reachable).not.toBe(announced);
					expect(event.newState).toBe(reachable ? "online" : "offline");
					announced = reachable;
				} else {
					expect(stable && reachable !== announced).toBe(false);
				}
			});
		}
	});
});

