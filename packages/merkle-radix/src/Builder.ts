import { LeafNode, Leaf, Node } from "./interface.js"
import { NodeFactory } from "./nodes.js"
import { DuplicateKeyError } from "./errors.js"
import { debug } from "./format.js"
import { assert, compareKeys, equalKeys, getBit } from "./utils.js"

export class Builder {
	public static fromEntries(nodes: NodeFactory, entries: Iterable<[Uint8Array, Leaf]>): Node {
		const builder = new Builder(nodes)
		for (const [key, value] of entries) {
			builder.set(key, value)
		}

		return builder.finalize()
	}

	private readonly log = debug("merkle-radix:builder")
	private leaves: LeafNode[] = []

	public constructor(public readonly nodes: NodeFactory) {}

	public set(key: Uint8Array, value: Leaf): void {
		if (value instanceof Uint8Array) {
			this.leaves.push(this.nodes.leaf(key, value))
		} else {
			this.leaves.push(this.nodes.hashLeaf(key, value.hash))
		}
	}

	/**
	 * Sorts the collected leaves and builds the canonical tree.
	 * Throws DuplicateKeyError if any key was set twice.
	 */
	public finalize(): Node {
		const leaves = this.leaves
		this.leaves = []

		leaves.sort((a, b) => compareKeys(a.key, b.key))
		for (let i = 1; i < leaves.length; i++) {
			if (equalKeys(leaves[i - 1].key, leaves[i].key)) {
				throw new DuplicateKeyError(leaves[i].key)
			}
		}

		const root = buildSubtree(this.nodes, leaves, 0)
		this.log("built %d leaves into %n", leaves.length, root)
		return root
	}
}

type Frame = { start: number; end: number; depth: number; expanded: boolean }

export type Partition<T, R> = {
	key: (item: T) => Uint8Array
	empty: () => R
	single: (item: T) => R
	join: (left: R, right: R) => R
}

/**
 * Folds `items`, which must be sorted by key, free of duplicates, and agree
 * on their first `depth` bits, into a binary partition by key bit.
 */
export function partition<T, R>(items: readonly T[], depth: number, maxDepth: number, fold: Partition<T, R>): R {
	const stack: Frame[] = [{ start: 0, end: items.length, depth, expanded: false }]
	const results: R[] = []

	for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
		const { start, end } = frame
		if (frame.expanded) {
			const right = results.pop()
			const left = results.pop()
			assert(left !== undefined && right !== undefined, "internal error: build stack underflow")
			results.push(fold.join(left, right))
		} else if (end === start) {
			results.push(fold.empty())
		} else if (end - start === 1) {
			results.push(fold.single(items[start]))
		} else {
			assert(frame.depth < maxDepth, "internal error: items share every key bit")

			// sorted input puts every 0-bit key before every 1-bit key
			let split = start
			while (split < end && getBit(fold.key(items[split]), frame.depth) === 0) {
				split++
			}

			stack.push({ start, end, depth: frame.depth, expanded: true })
			stack.push({ start: split, end, depth: frame.depth + 1, expanded: false })
			stack.push({ start, end: split, depth: frame.depth + 1, expanded: false })
		}
	}

	assert(results.length === 1, "internal error: unbalanced build stack")
	return results[0]
}

/** Builds the canonical subtree for sorted `leaves` located at `depth`. */
export const buildSubtree = (nodes: NodeFactory, leaves: readonly LeafNode[], depth: number): Node =>
	partition<LeafNode, Node>(leaves, depth, nodes.metadata.K * 8, {
		key: (leaf) => leaf.key,
		empty: () => nodes.empty(),
		single: (leaf) => leaf,
		join: (left, right) => nodes.inner(left, right),
	})
