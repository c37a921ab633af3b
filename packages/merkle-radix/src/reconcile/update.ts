import { equals } from "uint8arrays"

import { Node, NodeKind, Patch } from "../interface.js"
import { NodeFactory } from "../nodes.js"
import { ConflictError, PrunedError } from "../errors.js"
import { debug } from "../format.js"
import { insert, remove } from "../operations/write.js"
import { assert, getBit, hasPrefix, setBit, signalInvalidType } from "../utils.js"

const log = debug("merkle-radix:update")

type Frame =
	| { type: "visit"; base: Node; patch: Patch; depth: number; prefix: Uint8Array }
	| { type: "join"; base: Node }

/**
 * Applies `patch` onto `base`, walking both in lock step. Empty patch
 * positions leave the base alone. Pruned patch nodes must match the base
 * hash at their position.
 */
export function update(nodes: NodeFactory, base: Node, patch: Patch): Node {
	const maxDepth = nodes.metadata.K * 8
	const stack: Frame[] = [{ type: "visit", base, patch, depth: 0, prefix: new Uint8Array(nodes.metadata.K) }]
	const results: Node[] = []

	for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
		if (frame.type === "join") {
			const right = results.pop()
			const left = results.pop()
			assert(left !== undefined && right !== undefined, "internal error: update stack underflow")
			const { base } = frame
			if (base.kind === NodeKind.Inner && left === base.left && right === base.right) {
				results.push(base)
			} else {
				results.push(nodes.branch(left, right))
			}

			continue
		}

		const { base, patch, depth, prefix } = frame
		switch (patch.kind) {
			case NodeKind.Empty:
				results.push(base)
				break
			case NodeKind.Leaf:
				if (!hasPrefix(patch.key, prefix, depth)) {
					throw new ConflictError(depth, "patch leaf is on the wrong side of its parent")
				}

				results.push(insert(nodes, base, patch, depth))
				break
			case "tombstone":
				if (!hasPrefix(patch.key, prefix, depth)) {
					throw new ConflictError(depth, "patch tombstone is on the wrong side of its parent")
				}

				results.push(remove(nodes, base, patch.key, depth))
				break
			case NodeKind.Pruned:
				if (!equals(patch.hash, base.hash)) {
					throw new ConflictError(depth, "pruned patch node does not match the base")
				}

				results.push(base)
				break
			case NodeKind.Inner:
			case "branch": {
				if (patch.kind === NodeKind.Inner && equals(patch.hash, base.hash)) {
					results.push(base)
					break
				} else if (depth >= maxDepth) {
					throw new ConflictError(depth, "patch is deeper than the key width")
				}

				const [left, right] = split(nodes, base, depth)
				stack.push({ type: "join", base })
				stack.push({ type: "visit", base: right, patch: patch.right, depth: depth + 1, prefix: setBit(prefix, depth) })
				stack.push({ type: "visit", base: left, patch: patch.left, depth: depth + 1, prefix })
				break
			}
			default:
				signalInvalidType(patch)
		}
	}

	assert(results.length === 1, "internal error: unbalanced update stack")
	const [root] = results
	log("updated %n into %n", base, root)
	return root
}

/** The two children `base` would have as an Inner node at `depth`. */
function split(nodes: NodeFactory, base: Node, depth: number): [left: Node, right: Node] {
	switch (base.kind) {
		case NodeKind.Empty:
			return [base, base]
		case NodeKind.Leaf:
			return getBit(base.key, depth) === 0 ? [base, nodes.empty()] : [nodes.empty(), base]
		case NodeKind.Inner:
			return [base.left, base.right]
		case NodeKind.Pruned:
			throw new PrunedError("update", null, depth)
		default:
			signalInvalidType(base)
	}
}
