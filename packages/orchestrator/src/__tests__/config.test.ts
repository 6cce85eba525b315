import { describe, expect, it } from "vitest";
import { StaticConfigProvider, UnitDefaultsConfigProvider } from "../config";

describe("StaticConfigProvider", () => {
	it("enables units by default", () => {
		expect(new StaticConfigProvider().isEnabled("anything")).toBe(true);
	});

	it("honours a unit's enabled flag", () => {
		const provider = new StaticConfigProvider({ units: { debug: { enabled: false } } });

		expect(provider.isEnabled("debug")).toBe(false);
	});

	it("falls back to defaults.enabled", () => {
		const provider = new StaticConfigProvider({ defaults: { enabled: false }, units: { on: { enabled: true } } });

		expect(provider.isEnabled("other")).toBe(false);
		expect(provider.isEnabled("on")).toBe(true);
	});

	it("enables everything in development", () => {
		const provider = new StaticConfigProvider({
			environment: "development",
			defaults: { enabled: false },
			units: { debug: { enabled: false } },
		});

		expect(provider.isEnabled("debug")).toBe(true);
		expect(provider.isEnabled("other")).toBe(true);
	});

	it("returns unit config without the enabled flag", () => {
		const provider = new StaticConfigProvider({ units: { csrf: { enabled: true, priority: 20, paths: ["/x"] } } });

		expect(provider.getUnitConfig("csrf")).toEqual({ priority: 20, paths: ["/x"] });
		expect(provider.getUnitConfig("unknown")).toEqual({});
	});

	it("fills chain config defaults", () => {
		const provider = new StaticConfigProvider({ chains: { api: { units: ["cors"] } } });

		expect(provider.getChainConfig("api")).toEqual({ enabled: true, units: ["cors"], paths: [], settings: {} });
		expect(provider.getChainConfig("static")).toEqual({ enabled: true, units: [], paths: [], settings: {} });
	});
});

describe("UnitDefaultsConfigProvider", () => {
	const base = new StaticConfigProvider({ units: { recovery: { priority: 5 }, debug: { enabled: false } } });
	const provider = new UnitDefaultsConfigProvider(base, {
		recovery: { category: "basic", priority: 10 },
		"security-headers": { category: "security" },
	});

	it("fills fields the base leaves unset", () => {
		expect(provider.getUnitConfig("recovery")).toEqual({ category: "basic", priority: 5 });
		expect(provider.getUnitConfig("security-headers")).toEqual({ category: "security" });
		expect(provider.getUnitConfig("other")).toEqual({});
	});

	it("delegates enablement and chain config", () => {
		expect(provider.isEnabled("debug")).toBe(false);
		expect(provider.getChainConfig("api").enabled).toBe(true);
	});
});
