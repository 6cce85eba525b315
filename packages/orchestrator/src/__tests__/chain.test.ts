import {
	ChainResponse,
	createExecutionContext,
	createRequest,
	defineUnit,
	NextCalledTwiceError,
} from "@switchyard/core";
import { describe, expect, it } from "vitest";
import { Chain } from "../chain";
import { traceUnit } from "./helpers";

const ok = () => ChainResponse.text("done");

describe("Chain.process", () => {
	it("runs units in list order, then the terminal", async () => {
		const trace: string[] = [];
		const chain = new Chain([traceUnit("a", 1, trace), traceUnit("b", 2, trace)]);

		const res = await chain.process(createExecutionContext(), createRequest({ url: "/" }), () => {
			trace.push("terminal");
			return ok();
		});

		expect(trace).toEqual(["a", "b", "terminal"]);
		expect(res.text()).toBe("done");
	});

	it("answers 404 when no terminal is given", async () => {
		const res = await new Chain().process(createExecutionContext(), createRequest({ url: "/missing" }));

		expect(res.status).toBe(404);
		expect(res.text()).toBe('{"error":"Not found"}');
	});

	it("lets a unit short-circuit", async () => {
		const trace: string[] = [];
		const gate = defineUnit({
			name: "gate",
			async process() {
				return ChainResponse.text("stop", 403);
			},
		});
		const chain = new Chain([gate, traceUnit("after", 2, trace)]);

		const res = await chain.process(createExecutionContext(), createRequest({ url: "/" }), ok);

		expect(res.status).toBe(403);
		expect(trace).toEqual([]);
	});

	it("passes a replacement request downstream", async () => {
		const rewrite = defineUnit({
			name: "rewrite",
			async process(_ctx, req, next) {
				return next(req.withPath("/rewritten"));
			},
		});
		const chain = new Chain([rewrite]);

		const res = await chain.process(createExecutionContext(), createRequest({ url: "/original" }), (_ctx, req) =>
			ChainResponse.text(req.path),
		);

		expect(res.text()).toBe("/rewritten");
	});

	it("lets units post-process the response", async () => {
		const tag = defineUnit({
			name: "tag",
			async process(_ctx, _req, next) {
				const res = await next();
				return res.setHeader("X-Tag", "yes");
			},
		});

		const res = await new Chain([tag]).process(createExecutionContext(), createRequest({ url: "/" }), ok);

		expect(res.headers.get("X-Tag")).toBe("yes");
	});

	it("rejects a second call to next", async () => {
		const twice = defineUnit({
			name: "twice",
			async process(_ctx, _req, next) {
				await next();
				return next();
			},
		});

		const run = new Chain([twice]).process(createExecutionContext(), createRequest({ url: "/" }), ok);

		await expect(run).rejects.toBeInstanceOf(NextCalledTwiceError);
		await expect(run).rejects.toThrow('middleware "twice" called next() multiple times');
	});

	it("propagates a unit's error", async () => {
		const boom = defineUnit({
			name: "boom",
			async process() {
				throw new Error("kaput");
			},
		});

		await expect(
			new Chain([boom]).process(createExecutionContext(), createRequest({ url: "/" }), ok),
		).rejects.toThrow("kaput");
	});

	it("is unaffected by list changes during execution", async () => {
		const trace: string[] = [];
		const chain = new Chain();
		const mutator = defineUnit({
			name: "mutator",
			async process(_ctx, _req, next) {
				chain.add(traceUnit("added", 9, trace));
				return next();
			},
		});
		chain.add(mutator);

		await chain.process(createExecutionContext(), createRequest({ url: "/" }), ok);

		expect(trace).toEqual([]);
		expect(chain.names()).toEqual(["mutator", "added"]);
	});
});

describe("Chain list operations", () => {
	it("add appends without sorting", () => {
		const chain = new Chain().add(traceUnit("b", 2), traceUnit("a", 1));

		expect(chain.names()).toEqual(["b", "a"]);
		expect(chain.length).toBe(2);
	});

	it("insert at 0 prepends", () => {
		const chain = new Chain([traceUnit("a", 1)]).insert(0, traceUnit("first", 1));

		expect(chain.names()).toEqual(["first", "a"]);
	});

	it("insert in the middle", () => {
		const chain = new Chain([traceUnit("a", 1), traceUnit("c", 3)]).insert(1, traceUnit("b", 2));

		expect(chain.names()).toEqual(["a", "b", "c"]);
	});

	it("insert at -1 or out of range appends", () => {
		const chain = new Chain([traceUnit("a", 1)]);
		chain.insert(-1, traceUnit("b", 2));
		chain.insert(42, traceUnit("c", 3));

		expect(chain.names()).toEqual(["a", "b", "c"]);
	});

	it("remove, get and has", () => {
		const chain = new Chain([traceUnit("a", 1), traceUnit("b", 2)]);

		expect(chain.get("b")?.priority).toBe(2);
		expect(chain.remove("a")).toBe(true);
		expect(chain.remove("a")).toBe(false);
		expect(chain.has("a")).toBe(false);
		expect(chain.names()).toEqual(["b"]);
	});

	it("list returns a copy", () => {
		const chain = new Chain([traceUnit("a", 1)]);
		chain.list().pop();

		expect(chain.length).toBe(1);
	});

	it("clear empties the chain and returns it", () => {
		const chain = new Chain([traceUnit("a", 1)]);

		expect(chain.clear()).toBe(chain);
		expect(chain.length).toBe(0);
		expect(chain.clear().add(traceUnit("b", 2)).names()).toEqual(["b"]);
	});
});
