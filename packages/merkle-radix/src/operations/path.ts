import { EmptyNode, InnerNode, LeafNode, Node, NodeKind, PrunedNode } from "../interface.js"
import { NodeFactory } from "../nodes.js"
import { getBit } from "../utils.js"

export type Step = { parent: InnerNode; bit: 0 | 1 }

export type Terminal = EmptyNode | LeafNode | PrunedNode

/**
 * Follows the bits of `key` from `root` (which sits at `depth`) until the
 * first node that isn't Inner, recording every Inner on the way.
 */
export function descend(root: Node, key: Uint8Array, depth = 0): { path: Step[]; node: Terminal; depth: number } {
	const path: Step[] = []

	let node = root
	let d = depth
	while (node.kind === NodeKind.Inner) {
		const bit = getBit(key, d)
		path.push({ parent: node, bit })
		node = bit === 0 ? node.left : node.right
		d++
	}

	return { path, node, depth: d }
}

/**
 * Rebuilds the ancestors in `path` bottom-up around a replacement for the
 * node at its end. Siblings are shared by reference.
 */
export function rebuild(nodes: NodeFactory, path: readonly Step[], replacement: Node): Node {
	let node = replacement
	for (let i = path.length - 1; i >= 0; i--) {
		const { parent, bit } = path[i]
		node = bit === 0 ? nodes.branch(node, parent.right) : nodes.branch(parent.left, node)
	}

	return node
}
