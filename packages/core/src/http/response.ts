// ---------------------------------------------------------------------------
// ChainResponse: framework-agnostic response value
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Attributes for {@link ChainResponse.setCookie}. */
export interface CookieOptions {
	path?: string;
	domain?: string;
	/** Lifetime in seconds. */
	maxAge?: number;
	expires?: Date;
	httpOnly?: boolean;
	secure?: boolean;
	sameSite?: "Strict" | "Lax" | "None";
}

/**
 * Mutable response produced by a terminal handler and passed back up the
 * chain. Units may replace it or adjust it on the way out.
 *
 * @example
 * ```ts
 * const res = ChainResponse.json({ ok: true }).setHeader("X-Trace", "abc");
 * ```
 */
export class ChainResponse {
	readonly headers: Headers;
	private statusCode: number;
	private payload: Uint8Array;
	private failure?: Error;

	constructor(status = 200, body?: Uint8Array | string, headers?: Headers | Record<string, string>) {
		this.statusCode = status;
		this.headers = new Headers(headers);
		this.payload = toBytes(body);
	}

	// -----------------------------------------------------------------------
	// Factories
	// -----------------------------------------------------------------------

	/** JSON body with `Content-Type: application/json`. */
	static json(body: unknown, status = 200): ChainResponse {
		return new ChainResponse(status, JSON.stringify(body), { "Content-Type": "application/json" });
	}

	/** Plain-text body. */
	static text(body: string, status = 200): ChainResponse {
		return new ChainResponse(status, body, { "Content-Type": "text/plain; charset=utf-8" });
	}

	/** HTML body. */
	static html(body: string, status = 200): ChainResponse {
		return new ChainResponse(status, body, { "Content-Type": "text/html; charset=utf-8" });
	}

	/** Bodyless response. */
	static empty(status = 204): ChainResponse {
		return new ChainResponse(status);
	}

	/** Redirect to `location` (default 302). */
	static redirect(location: string, status = 302): ChainResponse {
		return new ChainResponse(status).setLocation(location);
	}

	/** JSON `{ error, code? }` body carrying the originating error. */
	static fromError(status: number, error: Error, code?: string): ChainResponse {
		const body: Record<string, string> = { error: error.message };
		if (code) body.code = code;
		return ChainResponse.json(body, status).setError(error);
	}

	// -----------------------------------------------------------------------
	// Accessors
	// -----------------------------------------------------------------------

	get status(): number {
		return this.statusCode;
	}

	setStatus(status: number): this {
		this.statusCode = status;
		return this;
	}

	setHeader(name: string, value: string): this {
		this.headers.set(name, value);
		return this;
	}

	/** Add a header value without overwriting existing ones. */
	appendHeader(name: string, value: string): this {
		this.headers.append(name, value);
		return this;
	}

	get body(): Uint8Array {
		return this.payload;
	}

	setBody(body: Uint8Array | string): this {
		this.payload = toBytes(body);
		return this;
	}

	/** Decode the body as UTF-8. */
	text(): string {
		return decoder.decode(this.payload);
	}

	get contentType(): string {
		return this.headers.get("content-type") ?? "";
	}

	setContentType(contentType: string): this {
		return this.setHeader("Content-Type", contentType);
	}

	get contentLength(): number {
		return this.payload.byteLength;
	}

	get location(): string {
		return this.headers.get("location") ?? "";
	}

	setLocation(location: string): this {
		return this.setHeader("Location", location);
	}

	/** Append a serialised `Set-Cookie` header. */
	setCookie(name: string, value: string, options: CookieOptions = {}): this {
		return this.appendHeader("Set-Cookie", serializeCookie(name, value, options));
	}

	/** Every `Set-Cookie` value queued on this response. */
	cookies(): string[] {
		return this.headers.getSetCookie();
	}

	get error(): Error | undefined {
		return this.failure;
	}

	setError(error: Error): this {
		this.failure = error;
		return this;
	}

	get requestId(): string {
		return this.headers.get("x-request-id") ?? "";
	}

	setRequestId(id: string): this {
		return this.setHeader("X-Request-ID", id);
	}

	// -----------------------------------------------------------------------
	// Predicates
	// -----------------------------------------------------------------------

	isError(): boolean {
		return this.failure !== undefined || this.statusCode >= 400;
	}

	isRedirect(): boolean {
		return this.statusCode >= 300 && this.statusCode < 400 && this.location !== "";
	}

	isJson(): boolean {
		return this.contentType.includes("application/json");
	}

	isHtml(): boolean {
		return this.contentType.includes("text/html");
	}

	isText(): boolean {
		return this.contentType.startsWith("text/");
	}

	/** Independent copy: headers and body are duplicated, the error is shared. */
	clone(): ChainResponse {
		const copy = new ChainResponse(this.statusCode, this.payload.slice(), new Headers(this.headers));
		if (this.failure) copy.setError(this.failure);
		return copy;
	}
}

function toBytes(body: Uint8Array | string | undefined): Uint8Array {
	if (body === undefined) return new Uint8Array();
	return typeof body === "string" ? encoder.encode(body) : body;
}

/** Serialise a cookie into a `Set-Cookie` header value. */
export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
	const parts = [`${name}=${encodeURIComponent(value)}`];
	if (options.maxAge !== undefined) parts.push(`Max-Age=${Math.floor(options.maxAge)}`);
	if (options.expires) parts.push(`Expires=${options.expires.toUTCString()}`);
	if (options.domain) parts.push(`Domain=${options.domain}`);
	if (options.path) parts.push(`Path=${options.path}`);
	if (options.httpOnly) parts.push("HttpOnly");
	if (options.secure) parts.push("Secure");
	if (options.sameSite) parts.push(`SameSite=${options.sameSite}`);
	return parts.join("; ");
}
