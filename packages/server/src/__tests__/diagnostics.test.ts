import { createRequest } from "@switchyard/core";
import {
	Orchestrator,
	StaticConfigProvider,
	UnitDefaultsConfigProvider,
	UnitRegistry,
} from "@switchyard/orchestrator";
import { beforeEach, describe, expect, it } from "vitest";
import { createDiagnosticsHandler, type DiagnosticsHandler } from "../diagnostics";
import { MetricsRegistry } from "../metrics";
import { BUILTIN_UNIT_DEFAULTS, registerBuiltinUnits } from "../units";

describe("createDiagnosticsHandler", () => {
	let orchestrator: Orchestrator;
	let metrics: MetricsRegistry;
	let handle: DiagnosticsHandler;

	beforeEach(() => {
		const config = new UnitDefaultsConfigProvider(new StaticConfigProvider(), BUILTIN_UNIT_DEFAULTS);
		const registry = new UnitRegistry({ config });
		const registered = registerBuiltinUnits(registry);
		if (!registered.ok) throw registered.error;
		orchestrator = new Orchestrator({ registry, config });
		metrics = new MetricsRegistry();
		handle = createDiagnosticsHandler({ orchestrator, metrics });
	});

	it("ignores other paths and methods", () => {
		expect(handle(createRequest({ url: "/api/forms" }))).toBeUndefined();
		expect(handle(createRequest({ method: "POST", url: "/_switchyard/stats" }))).toBeUndefined();
	});

	it("serves cache stats with sorted keys", () => {
		const res = handle(createRequest({ url: "/_switchyard/stats" }));

		expect(res?.status).toBe(200);
		expect(res?.contentType).toBe("application/json");
		expect(res?.text()).toBe('{"buildTimes":{},"cacheSize":0,"registeredChains":0}');
	});

	it("serves build times per chain type", () => {
		orchestrator.getChainForPath("api", "/api/forms");

		const res = handle(createRequest({ url: "/_switchyard/performance" }));

		expect(JSON.parse(res?.text() ?? "")).toEqual(Object.fromEntries(orchestrator.getChainPerformance()));
		expect(Object.keys(JSON.parse(res?.text() ?? ""))).toEqual(["api"]);
	});

	it("serves chain info for a known type", () => {
		const res = handle(createRequest({ url: "/_switchyard/chains/static" }));

		expect(res?.status).toBe(200);
		expect(JSON.parse(res?.text() ?? "")).toEqual(orchestrator.getChainInfo("static"));
	});

	it("answers 404 for an unknown chain type", () => {
		const res = handle(createRequest({ url: "/_switchyard/chains/mobile" }));

		expect(res?.status).toBe(404);
		expect(res?.text()).toBe('{"code":"NOT_FOUND","error":"unknown chain type \\"mobile\\""}');
	});

	it("refreshes orchestrator gauges before exposing metrics", () => {
		orchestrator.getChainForPath("web", "/forms/signup");

		const res = handle(createRequest({ url: "/metrics" }));

		expect(res?.contentType).toBe("text/plain; version=0.0.4; charset=utf-8");
		const lines = res?.text().split("\n") ?? [];
		expect(lines).toContain("switchyard_chain_cache_size 1");
		expect(lines).toContain(`switchyard_chain_build_ms{chain="web"} ${orchestrator.getChainPerformance().get("web")}`);
	});
});
