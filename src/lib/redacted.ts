const NodeInspectSymbol: unique symbol = Symbol.for("nodejs.util.inspect.custom");

const unwrap: unique symbol = Symbol("redacted.value");

/**
 * A value that prints as `<redacted>` when logged, inspected or serialised.
 */
export interface Redacted<out A = string> {
	readonly [unwrap]: () => A;
	toString(): string;
	toJSON(): string;
	[NodeInspectSymbol](): string;
}

export const make = <A>(value: A): Redacted<A> => ({
	[unwrap]: () => value,
	toString() {
		return "<redacted>";
	},
	toJSON() {
		return "<redacted>";
	},
	[NodeInspectSymbol]() {
		return "<redacted>";
	},
});

export const value = <A>(self: Redacted<A>): A => self[unwrap]();
