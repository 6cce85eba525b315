// ---------------------------------------------------------------------------
// Prometheus-compatible metrics
// ---------------------------------------------------------------------------

/** Label set for a metric observation. */
export type Labels = Record<string, string>;

// ---------------------------------------------------------------------------
// Counter
// ---------------------------------------------------------------------------

/**
 * Monotonically increasing counter.
 *
 * @example
 * ```ts
 * const requests = new Counter("switchyard_requests_total", "Requests handled");
 * requests.inc({ chain: "api", status: "200" });
 * ```
 */
export class Counter {
	private readonly values = new Map<string, number>();

	constructor(
		readonly name: string,
		readonly help: string,
	) {}

	/** Increment the counter by `n` (default 1). */
	inc(labels: Labels = {}, n = 1): void {
		const key = labelKey(labels);
		this.values.set(key, (this.values.get(key) ?? 0) + n);
	}

	/** Serialise to Prometheus text exposition format. */
	expose(): string {
		return exposeValues(this.name, this.help, "counter", this.values);
	}
}

// ---------------------------------------------------------------------------
// Gauge
// ---------------------------------------------------------------------------

/** Gauge holding the last value set for each label set. */
export class Gauge {
	private readonly values = new Map<string, number>();

	constructor(
		readonly name: string,
		readonly help: string,
	) {}

	/** Set to an absolute value. */
	set(labels: Labels = {}, value = 0): void {
		this.values.set(labelKey(labels), value);
	}

	expose(): string {
		return exposeValues(this.name, this.help, "gauge", this.values);
	}
}

// ---------------------------------------------------------------------------
// Histogram
// ---------------------------------------------------------------------------

/** Internal per-label-set histogram state. */
interface HistogramBucket {
	bucketCounts: number[];
	sum: number;
	count: number;
}

/**
 * Histogram with configurable buckets.
 *
 * @example
 * ```ts
 * const latency = new Histogram("switchyard_request_duration_ms", "Request duration", [5, 50, 500]);
 * latency.observe({ chain: "web" }, 42);
 * ```
 */
export class Histogram {
	private readonly data = new Map<string, HistogramBucket>();
	readonly buckets: readonly number[];

	constructor(
		readonly name: string,
		readonly help: string,
		buckets: number[],
	) {
		this.buckets = [...buckets].sort((a, b) => a - b);
	}

	/** Record an observation. */
	observe(labels: Labels = {}, value = 0): void {
		const key = labelKey(labels);
		let bucket = this.data.get(key);
		if (!bucket) {
			bucket = { bucketCounts: new Array<number>(this.buckets.length + 1).fill(0), sum: 0, count: 0 };
			this.data.set(key, bucket);
		}
		bucket.sum += value;
		bucket.count += 1;
		const counts = bucket.bucketCounts;
		this.buckets.forEach((le, i) => {
			if (value <= le) counts[i] = (counts[i] ?? 0) + 1;
		});
		// +Inf bucket (last element)
		counts[this.buckets.length] = (counts[this.buckets.length] ?? 0) + 1;
	}

	expose(): string {
		const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];

		for (const [key, bucket] of this.data) {
			const open = key === "" ? "{" : `${key.slice(0, -1)},`;
			this.buckets.forEach((le, i) => {
				lines.push(`${this.name}_bucket${open}le="${le}"} ${bucket.bucketCounts[i] ?? 0}`);
			});
			lines.push(`${this.name}_bucket${open}le="+Inf"} ${bucket.bucketCounts[this.buckets.length] ?? 0}`);
			lines.push(`${this.name}_sum${key} ${bucket.sum}`);
			lines.push(`${this.name}_count${key} ${bucket.count}`);
		}

		return lines.join("\n");
	}
}

// ---------------------------------------------------------------------------
// Metrics Registry
// ---------------------------------------------------------------------------

/**
 * Metrics recorded by the HTTP adapter, plus a single `expose()` that
 * returns the complete Prometheus text exposition payload.
 */
export class MetricsRegistry {
	readonly requestsTotal = new Counter("switchyard_requests_total", "Requests handled, by chain type and status");

	readonly requestDuration = new Histogram(
		"switchyard_request_duration_ms",
		"Request duration through the chain in milliseconds",
		[1, 5, 10, 50, 100, 500, 1000, 5000],
	);

	readonly chainCacheSize = new Gauge("switchyard_chain_cache_size", "Number of cached path chains");

	readonly chainBuildMs = new Gauge("switchyard_chain_build_ms", "Last chain build duration in milliseconds");

	/** Return the full Prometheus text exposition payload. */
	expose(): string {
		const sections = [
			this.requestsTotal.expose(),
			this.requestDuration.expose(),
			this.chainCacheSize.expose(),
			this.chainBuildMs.expose(),
		];
		return `${sections.join("\n\n")}\n`;
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a Prometheus-format label key string like `{status="200"}`. */
function labelKey(labels: Labels): string {
	const entries = Object.entries(labels);
	if (entries.length === 0) return "";
	const parts = entries.map(([k, v]) => `${k}="${v}"`).join(",");
	return `{${parts}}`;
}

function exposeValues(name: string, help: string, type: string, values: Map<string, number>): string {
	const lines = [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
	for (const [key, val] of values) {
		lines.push(`${name}${key} ${val}`);
	}
	return lines.join("\n");
}
