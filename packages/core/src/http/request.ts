// ---------------------------------------------------------------------------
// ChainRequest: framework-agnostic request value
// ---------------------------------------------------------------------------

const DEFAULT_BASE_URL = "http://localhost";
const decoder = new TextDecoder();
const encoder = new TextEncoder();

/** Request data as seen by every unit in a chain. Transports convert into this shape. */
export interface ChainRequest {
	readonly method: string;
	readonly url: URL;
	readonly path: string;
	readonly query: URLSearchParams;
	readonly headers: Headers;
	readonly body: Uint8Array;
	readonly contentType: string;
	readonly contentLength: number;
	readonly remoteAddress: string;
	readonly userAgent: string;
	readonly referer: string;
	readonly host: string;
	readonly isSecure: boolean;
	readonly requestId: string;
	readonly timestamp: Date;

	/** Decode the body as UTF-8. */
	text(): string;
	/** Parse the body as JSON. Throws a SyntaxError on malformed input. */
	json(): unknown;
	cookie(name: string): string | undefined;
	cookies(): Map<string, string>;
	param(name: string): string | undefined;
	params(): Record<string, string>;
	/** `X-Real-IP`, then the first `X-Forwarded-For` hop, then the socket address. */
	realIp(): string;
	isAjax(): boolean;
	isWebSocket(): boolean;
	isJson(): boolean;
	accepts(contentType: string): boolean;
	/** Read a per-request value set by an earlier unit. */
	get(key: string): unknown;
	/** Store a per-request value for later units. */
	set(key: string, value: unknown): void;
	/** Copy of this request with a rewritten path (query string kept). */
	withPath(path: string): ChainRequest;
}

/** Input accepted by {@link createRequest}. */
export interface ChainRequestInit {
	/** HTTP method (default GET). */
	method?: string;
	/** Absolute URL or a path, resolved against `http://localhost`. */
	url: string | URL;
	headers?: Headers | Record<string, string>;
	body?: Uint8Array | string;
	params?: Record<string, string>;
	remoteAddress?: string;
	secure?: boolean;
	/** Falls back to the `X-Request-ID` header. */
	requestId?: string;
	timestamp?: Date;
}

/** Build a {@link ChainRequest} from plain data. */
export function createRequest(init: ChainRequestInit): ChainRequest {
	return new MemoryRequest(init, new Map());
}

class MemoryRequest implements ChainRequest {
	readonly method: string;
	readonly url: URL;
	readonly headers: Headers;
	readonly body: Uint8Array;
	readonly remoteAddress: string;
	readonly isSecure: boolean;
	readonly requestId: string;
	readonly timestamp: Date;

	private readonly routeParams: Record<string, string>;
	private readonly values: Map<string, unknown>;
	private parsedCookies?: Map<string, string>;

	constructor(
		private readonly init: ChainRequestInit,
		values: Map<string, unknown>,
	) {
		this.method = (init.method ?? "GET").toUpperCase();
		this.url = new URL(init.url, DEFAULT_BASE_URL);
		this.headers = new Headers(init.headers);
		this.body = typeof init.body === "string" ? encoder.encode(init.body) : (init.body ?? new Uint8Array());
		this.remoteAddress = init.remoteAddress ?? "";
		this.isSecure = init.secure ?? this.url.protocol === "https:";
		this.requestId = init.requestId ?? this.headers.get("x-request-id") ?? "";
		this.timestamp = init.timestamp ?? new Date();
		this.routeParams = { ...init.params };
		this.values = values;
	}

	get path(): string {
		return this.url.pathname;
	}

	get query(): URLSearchParams {
		return this.url.searchParams;
	}

	get contentType(): string {
		return this.headers.get("content-type") ?? "";
	}

	get contentLength(): number {
		const declared = Number.parseInt(this.headers.get("content-length") ?? "", 10);
		return Number.isNaN(declared) ? this.body.byteLength : declared;
	}

	get userAgent(): string {
		return this.headers.get("user-agent") ?? "";
	}

	get referer(): string {
		return this.headers.get("referer") ?? "";
	}

	get host(): string {
		return this.headers.get("host") ?? this.url.host;
	}

	text(): string {
		return decoder.decode(this.body);
	}

	json(): unknown {
		return JSON.parse(this.text());
	}

	cookie(name: string): string | undefined {
		return this.cookies().get(name);
	}

	cookies(): Map<string, string> {
		if (!this.parsedCookies) {
			this.parsedCookies = parseCookieHeader(this.headers.get("cookie") ?? "");
		}
		return new Map(this.parsedCookies);
	}

	param(name: string): string | undefined {
		return this.routeParams[name];
	}

	params(): Record<string, string> {
		return { ...this.routeParams };
	}

	realIp(): string {
		const realIp = this.headers.get("x-real-ip");
		if (realIp) return realIp.trim();
		const forwarded = this.headers.get("x-forwarded-for");
		if (forwarded) {
			const first = forwarded.split(",")[0]?.trim();
			if (first) return first;
		}
		return this.remoteAddress;
	}

	isAjax(): boolean {
		return this.headers.get("x-requested-with")?.toLowerCase() === "xmlhttprequest";
	}

	isWebSocket(): boolean {
		return this.headers.get("upgrade")?.toLowerCase() === "websocket";
	}

	isJson(): boolean {
		return this.contentType.toLowerCase().includes("application/json");
	}

	accepts(contentType: string): boolean {
		const accept = this.headers.get("accept");
		if (!accept) return true;
		const wanted = contentType.toLowerCase();
		const wildcard = `${wanted.split("/")[0]}/*`;
		return accept
			.split(",")
			.map((part) => part.split(";")[0]?.trim().toLowerCase())
			.some((type) => type === wanted || type === wildcard || type === "*/*");
	}

	get(key: string): unknown {
		return this.values.get(key);
	}

	set(key: string, value: unknown): void {
		this.values.set(key, value);
	}

	withPath(path: string): ChainRequest {
		const url = new URL(this.url);
		url.pathname = path;
		return new MemoryRequest(
			{
				...this.init,
				url,
				headers: new Headers(this.headers),
				body: this.body,
				requestId: this.requestId,
				timestamp: this.timestamp,
			},
			new Map(this.values),
		);
	}
}

/** Parse a `Cookie` header into name → value pairs. Malformed pairs are skipped. */
export function parseCookieHeader(header: string): Map<string, string> {
	const cookies = new Map<string, string>();
	for (const pair of header.split(";")) {
		const eq = pair.indexOf("=");
		if (eq <= 0) continue;
		const name = pair.slice(0, eq).trim();
		if (!name || cookies.has(name)) continue;
		cookies.set(name, safeDecode(pair.slice(eq + 1).trim()));
	}
	return cookies;
}

function safeDecode(value: string): string {
	try {
		return decodeURIComponent(value);
	} catch {
		return value;
	}
}
