// ---------------------------------------------------------------------------
// Chain: ordered list of middleware units
// ---------------------------------------------------------------------------

import {
	type ChainRequest,
	ChainResponse,
	type ExecutionContext,
	type MiddlewareUnit,
	type NextHandler,
	NextCalledTwiceError,
	type TerminalHandler,
} from "@switchyard/core";

/** Terminal used when `process` is called without one. */
export const notFoundTerminal: TerminalHandler = () =>
	ChainResponse.json({ error: "Not found" }, 404);

/**
 * An ordered, mutable sequence of unit references.
 *
 * `add` and `insert` never re-sort; ordering is the builder's job. Running a
 * chain never touches the unit list, so one chain may serve many requests
 * at once.
 */
export class Chain {
	private units: MiddlewareUnit[];

	constructor(units: Iterable<MiddlewareUnit> = []) {
		this.units = [...units];
	}

	/**
	 * Run the units in order, then `terminal` if every unit calls `next`.
	 *
	 * Each unit's continuation may be invoked at most once; a second call
	 * rejects with {@link NextCalledTwiceError}.
	 */
	process(
		ctx: ExecutionContext,
		request: ChainRequest,
		terminal: TerminalHandler = notFoundTerminal,
	): Promise<ChainResponse> {
		const units = [...this.units];

		const dispatch = async (index: number, req: ChainRequest): Promise<ChainResponse> => {
			const unit = units[index];
			if (!unit) return terminal(ctx, req);

			let called = false;
			const next: NextHandler = (replacement) => {
				if (called) return Promise.reject(new NextCalledTwiceError(unit.name));
				called = true;
				return dispatch(index + 1, replacement ?? req);
			};
			return unit.process(ctx, req, next);
		};

		return dispatch(0, request);
	}

	/** Append units to the end. */
	add(...units: MiddlewareUnit[]): this {
		this.units.push(...units);
		return this;
	}

	/**
	 * Insert units at `position`. 0 is the front; -1 or any position outside
	 * the list appends.
	 */
	insert(position: number, ...units: MiddlewareUnit[]): this {
		if (position < 0 || position >= this.units.length) {
			this.units.push(...units);
		} else {
			this.units.splice(position, 0, ...units);
		}
		return this;
	}

	/** Remove the first unit named `name`. */
	remove(name: string): boolean {
		const index = this.units.findIndex((unit) => unit.name === name);
		if (index === -1) return false;
		this.units.splice(index, 1);
		return true;
	}

	get(name: string): MiddlewareUnit | undefined {
		return this.units.find((unit) => unit.name === name);
	}

	has(name: string): boolean {
		return this.units.some((unit) => unit.name === name);
	}

	/** A copy of the unit list. */
	list(): MiddlewareUnit[] {
		return [...this.units];
	}

	names(): string[] {
		return this.units.map((unit) => unit.name);
	}

	clear(): this {
		this.units = [];
		return this;
	}

	get length(): number {
		return this.units.length;
	}
}
