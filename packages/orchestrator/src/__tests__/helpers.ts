import { defineUnit, type MiddlewareUnit } from "@switchyard/core";
import { StaticConfigProvider, type SwitchyardConfig } from "../config";
import { Orchestrator } from "../orchestrator";
import { UnitRegistry } from "../registry";

/** A unit that records its name in `trace` and continues. */
export function traceUnit(name: string, priority: number, trace: string[] = []): MiddlewareUnit {
	return defineUnit({
		name,
		priority,
		async process(_ctx, _req, next) {
			trace.push(name);
			return next();
		},
	});
}

/** Registry and orchestrator over a static config with the given units registered. */
export function setup(config: SwitchyardConfig, units: Array<[string, number]>) {
	const provider = new StaticConfigProvider(config);
	const registry = new UnitRegistry({ config: provider });
	for (const [name, priority] of units) {
		const registered = registry.register(name, traceUnit(name, priority));
		if (!registered.ok) throw registered.error;
	}
	const orchestrator = new Orchestrator({ registry, config: provider });
	return { provider, registry, orchestrator };
}
