import { InnerNode, Node, NodeKind } from "../interface.js"
import { NodeFactory } from "../nodes.js"
import { PrunedError } from "../errors.js"
import { assert, compareKeys, equalKeys, getBit, signalInvalidType } from "../utils.js"

type Frame =
	| { type: "visit"; node: Node; depth: number; start: number; end: number }
	| { type: "join"; node: InnerNode }

/**
 * Restricts `root` to the paths leading to `keys`. Everything off those paths
 * is summarized: Inner subtrees become Pruned and leaves lose their values.
 * The root hash is unchanged.
 */
export function prune(nodes: NodeFactory, root: Node, keys: Iterable<Uint8Array>): Node {
	const targets = Array.from(keys).sort(compareKeys)
	const stack: Frame[] = [{ type: "visit", node: root, depth: 0, start: 0, end: targets.length }]
	const results: Node[] = []

	for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
		if (frame.type === "join") {
			const right = results.pop()
			const left = results.pop()
			assert(left !== undefined && right !== undefined, "internal error: prune stack underflow")
			const { node } = frame
			results.push(left === node.left && right === node.right ? node : nodes.inner(left, right))
			continue
		}

		const { node, depth, start, end } = frame
		if (start === end) {
			results.push(nodes.summarize(node))
			continue
		}

		switch (node.kind) {
			case NodeKind.Empty:
				results.push(node)
				break
			case NodeKind.Leaf: {
				let requested = false
				for (let i = start; i < end && !requested; i++) {
					requested = equalKeys(targets[i], node.key)
				}

				results.push(requested ? node : nodes.strip(node))
				break
			}
			case NodeKind.Inner: {
				let split = start
				while (split < end && getBit(targets[split], depth) === 0) {
					split++
				}

				stack.push({ type: "join", node })
				stack.push({ type: "visit", node: node.right, depth: depth + 1, start: split, end })
				stack.push({ type: "visit", node: node.left, depth: depth + 1, start, end: split })
				break
			}
			case NodeKind.Pruned:
				throw new PrunedError("prune", targets[start], depth)
			default:
				signalInvalidType(node)
		}
	}

	assert(results.length === 1, "internal error: unbalanced prune stack")
	return results[0]
}
