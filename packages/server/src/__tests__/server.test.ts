import { ChainResponse, defineUnit, type LogEntry, Logger } from "@switchyard/core";
import { StaticConfigProvider } from "@switchyard/orchestrator";
import { describe, expect, it } from "vitest";
import { SwitchyardServer } from "../server";

const auditUnit = defineUnit({
	name: "audit",
	async process(_ctx, _req, next) {
		return next();
	},
});

describe("SwitchyardServer", () => {
	it("registers the built-in units with their default categories", () => {
		const server = new SwitchyardServer();

		expect(server.registry.list()).toEqual([
			"recovery",
			"request-id",
			"request-logging",
			"security-headers",
			"timeout",
		]);
		expect(server.registry.categoryOf("security-headers")).toBe("security");
		expect(server.registry.priorityOf("request-logging")).toBe(90);
	});

	it("can start without built-in units", () => {
		const server = new SwitchyardServer({ builtins: false });

		expect(server.registry.count()).toBe(0);
	});

	it("drops cached path chains when a unit is registered", () => {
		const server = new SwitchyardServer();
		server.orchestrator.getChainForPath("api", "/api/forms");
		expect(server.orchestrator.getCacheStats().cacheSize).toBe(1);

		const registered = server.register(auditUnit);

		expect(registered.ok).toBe(true);
		expect(server.orchestrator.getCacheStats().cacheSize).toBe(0);
	});

	it("rejects a duplicate unit and keeps the cache", () => {
		const server = new SwitchyardServer();
		server.orchestrator.getChainForPath("api", "/api/forms");

		const duplicate = defineUnit({ name: "recovery", process: async () => ChainResponse.empty() });

		const registered = server.register(duplicate);

		expect(registered.ok).toBe(false);
		if (!registered.ok) expect(registered.error.code).toBe("ALREADY_REGISTERED");
		expect(server.orchestrator.getCacheStats().cacheSize).toBe(1);
	});

	it("refuses to start on an invalid configuration", async () => {
		const lines: LogEntry[] = [];
		const logger = new Logger("debug", {}, (line) => {
			lines.push(JSON.parse(line) as LogEntry);
		});
		const server = new SwitchyardServer({
			logger,
			config: new StaticConfigProvider({ units: { "request-logging": { dependencies: ["auth"] } } }),
		});

		const started = await server.start();

		expect(started.ok).toBe(false);
		if (!started.ok) {
			expect(started.error.code).toBe("MISSING_DEPENDENCY");
			expect(started.error.message).toBe('middleware "request-logging" requires missing dependency "auth"');
		}
		expect(server.isRunning).toBe(false);
		expect(lines.find((entry) => entry.level === "error")).toMatchObject({
			msg: "configuration invalid, not starting",
			code: "MISSING_DEPENDENCY",
		});
	});

	it("is not running after listen fails", async () => {
		const server = new SwitchyardServer({ port: -1 });

		await expect(server.start()).rejects.toThrow(RangeError);
		expect(server.isRunning).toBe(false);
		await expect(server.stop()).resolves.toBeUndefined();
	});

	it("treats stop as a no-op when not running", async () => {
		const server = new SwitchyardServer({ port: 8123 });

		await expect(server.stop()).resolves.toBeUndefined();
		expect(server.isRunning).toBe(false);
		expect(server.port).toBe(8123);
	});
});
