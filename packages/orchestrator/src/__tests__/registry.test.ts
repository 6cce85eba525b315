import {
	AlreadyRegisteredError,
	ConflictingUnitError,
	type LogEntry,
	Logger,
	MissingDependencyError,
	UnitNameMismatchError,
} from "@switchyard/core";
import { describe, expect, it } from "vitest";
import { StaticConfigProvider, type SwitchyardConfig } from "../config";
import { UnitRegistry } from "../registry";
import { traceUnit } from "./helpers";

function createRegistry(config: SwitchyardConfig = {}) {
	const lines: LogEntry[] = [];
	const logger = new Logger("debug", {}, (line) => {
		lines.push(JSON.parse(line) as LogEntry);
	});
	const registry = new UnitRegistry({ config: new StaticConfigProvider(config), logger });
	return { registry, lines };
}

describe("UnitRegistry.register", () => {
	it("catalogues an enabled unit with derived metadata", () => {
		const { registry } = createRegistry({
			units: { csrf: { category: "security", priority: 20, dependencies: ["session"], conflicts: ["legacy"] } },
		});

		expect(registry.register("csrf", traceUnit("csrf", 99)).ok).toBe(true);

		const meta = registry.metadata("csrf")!;
		expect(meta.category).toBe("security");
		expect(meta.priority).toBe(20);
		expect([...meta.dependencies]).toEqual(["session"]);
		expect([...meta.conflicts]).toEqual(["legacy"]);
		expect(meta.sequence).toBe(0);
		expect(registry.has("csrf")).toBe(true);
		expect(registry.count()).toBe(1);
	});

	it("falls back to basic category and the unit's own priority", () => {
		const { registry, lines } = createRegistry();
		registry.register("request-id", traceUnit("request-id", 30));

		expect(registry.categoryOf("request-id")).toBe("basic");
		expect(registry.priorityOf("request-id")).toBe(30);
		expect(lines.some((l) => l.msg === "middleware has no category, defaulting")).toBe(true);
	});

	it("rejects a duplicate name", () => {
		const { registry } = createRegistry();
		registry.register("a", traceUnit("a", 1));

		const result = registry.register("a", traceUnit("a", 2));
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(AlreadyRegisteredError);
			expect(result.error.message).toBe('middleware "a" already registered');
		}
		expect(registry.priorityOf("a")).toBe(1);
	});

	it("rejects a name that differs from the unit's own", () => {
		const { registry } = createRegistry();

		const result = registry.register("cors", traceUnit("cors-v2", 1));

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(UnitNameMismatchError);
			expect(result.error.code).toBe("NAME_MISMATCH");
			expect(result.error.message).toBe('cannot register middleware "cors-v2" under the name "cors"');
		}
		expect(registry.count()).toBe(0);
		expect(registry.getOrdered("basic")).toEqual([]);
	});

	it("accepts a disabled unit without cataloguing it", () => {
		const { registry, lines } = createRegistry({ units: { debug: { enabled: false } } });

		expect(registry.register("debug", traceUnit("debug", 5)).ok).toBe(true);
		expect(registry.get("debug")).toBeUndefined();
		expect(registry.list()).toEqual([]);
		expect(registry.count()).toBe(0);
		expect(registry.getOrdered("basic")).toEqual([]);
		expect(registry.isDisabled("debug")).toBe(true);
		expect(registry.listDisabled()).toEqual(["debug"]);
		expect(lines.find((l) => l.msg === "middleware disabled by config")?.name).toBe("debug");
	});

	it("rejects re-registering a disabled name", () => {
		const { registry } = createRegistry({ units: { debug: { enabled: false } } });
		registry.register("debug", traceUnit("debug", 5));

		expect(registry.register("debug", traceUnit("debug", 5)).ok).toBe(false);
	});

	it("enables every unit in development", () => {
		const { registry } = createRegistry({ environment: "development", units: { debug: { enabled: false } } });
		registry.register("debug", traceUnit("debug", 5));

		expect(registry.has("debug")).toBe(true);
	});
});

describe("UnitRegistry lookups", () => {
	it("lists names sorted", () => {
		const { registry } = createRegistry();
		registry.register("zeta", traceUnit("zeta", 1));
		registry.register("alpha", traceUnit("alpha", 2));

		expect(registry.list()).toEqual(["alpha", "zeta"]);
	});

	it("remove purges every index", () => {
		const { registry } = createRegistry();
		registry.register("a", traceUnit("a", 1));

		expect(registry.remove("a")).toBe(true);
		expect(registry.has("a")).toBe(false);
		expect(registry.metadata("a")).toBeUndefined();
		expect(registry.getOrdered("basic")).toEqual([]);
		expect(registry.remove("a")).toBe(false);
		expect(registry.register("a", traceUnit("a", 1)).ok).toBe(true);
	});

	it("remove clears a disabled mark", () => {
		const { registry } = createRegistry({ units: { a: { enabled: false } } });
		registry.register("a", traceUnit("a", 1));

		expect(registry.remove("a")).toBe(true);
		expect(registry.isDisabled("a")).toBe(false);
	});

	it("clear empties the registry", () => {
		const { registry } = createRegistry({ units: { b: { enabled: false } } });
		registry.register("a", traceUnit("a", 1));
		registry.register("b", traceUnit("b", 1));

		registry.clear();
		expect(registry.count()).toBe(0);
		expect(registry.listDisabled()).toEqual([]);
	});
});

describe("UnitRegistry.getOrdered", () => {
	it("sorts by priority then registration order", () => {
		const { registry } = createRegistry();
		registry.register("late", traceUnit("late", 20));
		registry.register("tie-1", traceUnit("tie-1", 10));
		registry.register("early", traceUnit("early", 5));
		registry.register("tie-2", traceUnit("tie-2", 10));

		expect(registry.getOrdered("basic").map((u) => u.name)).toEqual(["early", "tie-1", "tie-2", "late"]);
	});

	it("only returns units of the requested category", () => {
		const { registry } = createRegistry({ units: { auth: { category: "auth" } } });
		registry.register("auth", traceUnit("auth", 1));
		registry.register("basic", traceUnit("basic", 2));

		expect(registry.getOrdered("auth").map((u) => u.name)).toEqual(["auth"]);
		expect(registry.getOrdered("logging")).toEqual([]);
	});
});

describe("UnitRegistry.validateDependencies", () => {
	it("passes when every dependency is registered", () => {
		const { registry } = createRegistry({ units: { csrf: { dependencies: ["session"] } } });
		registry.register("session", traceUnit("session", 1));
		registry.register("csrf", traceUnit("csrf", 2));

		expect(registry.validateDependencies().ok).toBe(true);
	});

	it("reports a missing dependency", () => {
		const { registry } = createRegistry({ units: { csrf: { dependencies: ["session"] } } });
		registry.register("csrf", traceUnit("csrf", 2));

		const result = registry.validateDependencies();
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(MissingDependencyError);
			expect(result.error.message).toBe('middleware "csrf" requires missing dependency "session"');
		}
	});

	it("reports a registered conflict", () => {
		const { registry } = createRegistry({ units: { a: { conflicts: ["b"] } } });
		registry.register("a", traceUnit("a", 1));
		registry.register("b", traceUnit("b", 2));

		const result = registry.validateDependencies();
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(ConflictingUnitError);
	});

	it("checks dependencies before conflicts", () => {
		const { registry } = createRegistry({ units: { a: { conflicts: ["b"] }, b: { dependencies: ["missing"] } } });
		registry.register("a", traceUnit("a", 1));
		registry.register("b", traceUnit("b", 2));

		const result = registry.validateDependencies();
		if (!result.ok) expect(result.error).toBeInstanceOf(MissingDependencyError);
		expect(result.ok).toBe(false);
	});
});
