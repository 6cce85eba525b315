import { describe, expect, it } from "vitest";
import { Counter, Gauge, Histogram, MetricsRegistry } from "../metrics";

describe("Counter", () => {
	it("increments and exposes values", () => {
		const c = new Counter("requests_total", "Requests");
		c.inc({ chain: "api", status: "200" });
		c.inc({ chain: "api", status: "200" });
		c.inc({ chain: "web", status: "404" });

		expect(c.expose()).toBe(
			[
				"# HELP requests_total Requests",
				"# TYPE requests_total counter",
				'requests_total{chain="api",status="200"} 2',
				'requests_total{chain="web",status="404"} 1',
			].join("\n"),
		);
	});

	it("increments by a custom amount", () => {
		const c = new Counter("bulk", "Bulk");
		c.inc({}, 5);

		expect(c.expose().split("\n")[2]).toBe("bulk 5");
	});
});

describe("Gauge", () => {
	it("keeps the last value set", () => {
		const g = new Gauge("cache_size", "Cache size");
		g.set({}, 10);
		g.set({}, 4);

		expect(g.expose().split("\n").slice(2)).toEqual(["cache_size 4"]);
	});

	it("exposes in Prometheus format", () => {
		const g = new Gauge("build_ms", "Build time");
		g.set({ chain: "api" }, 1.5);

		expect(g.expose()).toBe('# HELP build_ms Build time\n# TYPE build_ms gauge\nbuild_ms{chain="api"} 1.5');
	});
});

describe("Histogram", () => {
	it("observes values and distributes to buckets", () => {
		const h = new Histogram("latency_ms", "Latency", [100, 10, 50, 500]);

		h.observe({}, 5); // <= 10, <= 50, <= 100, <= 500, +Inf
		h.observe({}, 25); // <= 50, <= 100, <= 500, +Inf
		h.observe({}, 75); // <= 100, <= 500, +Inf
		h.observe({}, 200); // <= 500, +Inf

		expect(h.buckets).toEqual([10, 50, 100, 500]);
		expect(h.expose().split("\n")).toEqual([
			"# HELP latency_ms Latency",
			"# TYPE latency_ms histogram",
			'latency_ms_bucket{le="10"} 1',
			'latency_ms_bucket{le="50"} 2',
			'latency_ms_bucket{le="100"} 3',
			'latency_ms_bucket{le="500"} 4',
			'latency_ms_bucket{le="+Inf"} 4',
			"latency_ms_sum 305",
			"latency_ms_count 4",
		]);
	});

	it("merges labels with the le label", () => {
		const h = new Histogram("dur", "Duration", [10]);
		h.observe({ chain: "web" }, 20);

		expect(h.expose().split("\n").slice(2)).toEqual([
			'dur_bucket{chain="web",le="10"} 0',
			'dur_bucket{chain="web",le="+Inf"} 1',
			'dur_sum{chain="web"} 20',
			'dur_count{chain="web"} 1',
		]);
	});
});

describe("MetricsRegistry", () => {
	it("exposes all metrics in a single payload", () => {
		const m = new MetricsRegistry();
		m.requestsTotal.inc({ chain: "api", status: "200" });
		const output = m.expose();

		expect(output).toContain("# TYPE switchyard_requests_total counter");
		expect(output).toContain("# TYPE switchyard_request_duration_ms histogram");
		expect(output).toContain("# TYPE switchyard_chain_cache_size gauge");
		expect(output).toContain("# TYPE switchyard_chain_build_ms gauge");
		expect(output.endsWith("\n")).toBe(true);
	});
});
