import { toString } from "uint8arrays"

export class DuplicateKeyError extends Error {
	public readonly name = "DuplicateKeyError"

	constructor(public readonly key: Uint8Array) {
		super(`duplicate key ${toString(key, "hex")}`)
	}
}

/**
 * Thrown when an operation needs the contents of a pruned subtree.
 * Retrying with a less-pruned tree can succeed.
 */
export class PrunedError extends Error {
	public readonly name = "PrunedError"

	constructor(
		public readonly operation: string,
		public readonly key: Uint8Array | null,
		public readonly depth: number | null,
	) {
		const position = depth === null ? "" : ` at depth ${depth}`
		const target = key === null ? "" : ` for key ${toString(key, "hex")}`
		super(`${operation}: reached a pruned subtree${position}${target}`)
	}
}

/** Two views make inconsistent claims about the same position. */
export class ConflictError extends Error {
	public readonly name = "ConflictError"

	constructor(
		public readonly depth: number,
		reason: string,
	) {
		super(`conflict at depth ${depth}: ${reason}`)
	}
}
