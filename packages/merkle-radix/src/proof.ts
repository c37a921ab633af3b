import { equals } from "uint8arrays"

import { InnerNode, Lookup, Node, NodeKind } from "./interface.js"
import { NodeFactory } from "./nodes.js"
import { ConflictError } from "./errors.js"
import { get } from "./operations/read.js"
import { prune } from "./reconcile/prune.js"
import { assert, signalInvalidType } from "./utils.js"

type Frame = { type: "visit"; node: Node; depth: number } | { type: "join"; node: InnerNode; depth: number }

/**
 * Recomputes the hash of `root` from its contents, without trusting any
 * stored hash except those of Pruned nodes. Throws ConflictError where a
 * stored hash disagrees with the recomputed one.
 */
export function computeHash(nodes: NodeFactory, root: Node): Uint8Array {
	const stack: Frame[] = [{ type: "visit", node: root, depth: 0 }]
	const results: Node[] = []

	const check = (node: Node, computed: Node, depth: number) => {
		if (!equals(node.hash, computed.hash)) {
			throw new ConflictError(depth, `${NodeKind[node.kind]} hash does not match its contents`)
		}

		results.push(computed)
	}

	for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
		const { node, depth } = frame
		if (frame.type === "join") {
			const right = results.pop()
			const left = results.pop()
			assert(left !== undefined && right !== undefined, "internal error: proof stack underflow")
			check(node, nodes.inner(left, right), depth)
			continue
		}

		switch (node.kind) {
			case NodeKind.Empty:
				check(node, nodes.empty(), depth)
				break
			case NodeKind.Leaf:
				if (node.value !== undefined && !equals(nodes.hashValue(node.value), node.valueHash)) {
					throw new ConflictError(depth, "leaf value does not match its value hash")
				}

				check(node, nodes.hashLeaf(node.key, node.valueHash), depth)
				break
			case NodeKind.Inner:
				stack.push({ type: "join", node, depth })
				stack.push({ type: "visit", node: node.right, depth: depth + 1 })
				stack.push({ type: "visit", node: node.left, depth: depth + 1 })
				break
			case NodeKind.Pruned:
				results.push(node)
				break
			default:
				signalInvalidType(node)
		}
	}

	assert(results.length === 1, "internal error: unbalanced proof stack")
	return results[0].hash
}

/** A proof for `keys` is the tree pruned to their paths. */
export const prove = (nodes: NodeFactory, root: Node, keys: Iterable<Uint8Array>): Node => prune(nodes, root, keys)

/**
 * Checks that `proof` commits to `rootHash` and answers a lookup of `key`
 * from the proof alone. Throws PrunedError if the proof doesn't cover `key`.
 */
export function verify(nodes: NodeFactory, rootHash: Uint8Array, proof: Node, key: Uint8Array): Lookup {
	if (!equals(computeHash(nodes, proof), rootHash)) {
		throw new ConflictError(0, "proof does not match the root hash")
	}

	return get(proof, key)
}
