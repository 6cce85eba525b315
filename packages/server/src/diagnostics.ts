// ---------------------------------------------------------------------------
// Diagnostics routes: read-only views of orchestrator state
// ---------------------------------------------------------------------------

import { API_ERROR_CODES, type ChainRequest, ChainResponse, isChainType } from "@switchyard/core";
import type { Orchestrator } from "@switchyard/orchestrator";
import stableStringify from "fast-json-stable-stringify";
import type { MetricsRegistry } from "./metrics";

/** Path prefix shared by the JSON diagnostics routes. */
export const DIAGNOSTICS_PREFIX = "/_switchyard";

/** Answers a diagnostics request, or returns undefined for any other path. */
export type DiagnosticsHandler = (request: ChainRequest) => ChainResponse | undefined;

export interface DiagnosticsOptions {
	orchestrator: Orchestrator;
	metrics: MetricsRegistry;
}

/** JSON response whose keys are serialised in sorted order. */
function stableJson(body: unknown, status = 200): ChainResponse {
	return new ChainResponse(status, stableStringify(body), { "Content-Type": "application/json" });
}

/** Copy orchestrator state into the gauges exposed on /metrics. */
export function refreshOrchestratorGauges(orchestrator: Orchestrator, metrics: MetricsRegistry): void {
	metrics.chainCacheSize.set({}, orchestrator.getCacheStats().cacheSize);
	for (const [chain, ms] of orchestrator.getChainPerformance()) {
		metrics.chainBuildMs.set({ chain }, ms);
	}
}

/**
 * Build the handler for `GET /_switchyard/stats`, `GET /_switchyard/performance`,
 * `GET /_switchyard/chains/<type>` and `GET /metrics`.
 */
export function createDiagnosticsHandler({ orchestrator, metrics }: DiagnosticsOptions): DiagnosticsHandler {
	return (request) => {
		if (request.method !== "GET") return undefined;
		const { path } = request;

		if (path === "/metrics") {
			refreshOrchestratorGauges(orchestrator, metrics);
			return ChainResponse.text(metrics.expose()).setContentType("text/plain; version=0.0.4; charset=utf-8");
		}

		if (path === `${DIAGNOSTICS_PREFIX}/stats`) {
			return stableJson(orchestrator.getCacheStats());
		}

		if (path === `${DIAGNOSTICS_PREFIX}/performance`) {
			return stableJson(Object.fromEntries(orchestrator.getChainPerformance()));
		}

		const chainPrefix = `${DIAGNOSTICS_PREFIX}/chains/`;
		if (path.startsWith(chainPrefix)) {
			const type = path.slice(chainPrefix.length);
			if (!isChainType(type)) {
				return stableJson({ error: `unknown chain type "${type}"`, code: API_ERROR_CODES.NOT_FOUND }, 404);
			}
			return stableJson(orchestrator.getChainInfo(type));
		}

		return undefined;
	};
}
