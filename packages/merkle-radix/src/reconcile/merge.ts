import { equals } from "uint8arrays"

import { InnerNode, Node, NodeKind } from "../interface.js"
import { NodeFactory } from "../nodes.js"
import { ConflictError } from "../errors.js"
import { debug } from "../format.js"
import { computeHash } from "../proof.js"
import { assert } from "../utils.js"

const log = debug("merkle-radix:merge")

type Frame =
	| { type: "visit"; a: Node; b: Node; depth: number }
	| { type: "join"; a: InnerNode; b: InnerNode }

/**
 * Combines two views of the same tree into one that holds everything either
 * of them holds. Throws ConflictError if the views disagree anywhere.
 */
export function merge(nodes: NodeFactory, a: Node, b: Node): Node {
	if (!equals(a.hash, b.hash)) {
		throw new ConflictError(0, "root hashes differ")
	}

	log("merging %n and %n", a, b)

	const stack: Frame[] = [{ type: "visit", a, b, depth: 0 }]
	const results: Node[] = []

	for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
		if (frame.type === "join") {
			const right = results.pop()
			const left = results.pop()
			assert(left !== undefined && right !== undefined, "internal error: merge stack underflow")
			if (left === frame.a.left && right === frame.a.right) {
				results.push(frame.a)
			} else if (left === frame.b.left && right === frame.b.right) {
				results.push(frame.b)
			} else {
				results.push(nodes.inner(left, right))
			}

			continue
		}

		const { a, b, depth } = frame
		if (a === b) {
			results.push(a)
		} else if (!equals(a.hash, b.hash)) {
			throw new ConflictError(depth, "subtree hashes differ")
		} else if (a.kind === NodeKind.Pruned) {
			results.push(b)
		} else if (b.kind === NodeKind.Pruned) {
			results.push(a)
		} else if (a.kind === NodeKind.Empty && b.kind === NodeKind.Empty) {
			results.push(a)
		} else if (a.kind === NodeKind.Leaf && b.kind === NodeKind.Leaf) {
			if (!equals(a.key, b.key) || !equals(a.valueHash, b.valueHash)) {
				throw new ConflictError(depth, "leaves differ")
			}

			results.push(a.value === undefined ? b : a)
		} else if (a.kind === NodeKind.Inner && b.kind === NodeKind.Inner) {
			stack.push({ type: "join", a, b })
			stack.push({ type: "visit", a: a.right, b: b.right, depth: depth + 1 })
			stack.push({ type: "visit", a: a.left, b: b.left, depth: depth + 1 })
		} else {
			throw new ConflictError(depth, `cannot merge ${NodeKind[a.kind]} with ${NodeKind[b.kind]}`)
		}
	}

	assert(results.length === 1, "internal error: unbalanced merge stack")
	const [root] = results

	// the merged contents must recompute to the common root hash
	if (!equals(computeHash(nodes, root), a.hash)) {
		throw new ConflictError(0, "merged root hash differs from the inputs")
	}

	return root
}
