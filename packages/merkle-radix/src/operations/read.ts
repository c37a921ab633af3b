import { LeafNode, Lookup, Node, NodeKind } from "../interface.js"
import { PrunedError } from "../errors.js"
import { equalKeys, getBit, signalInvalidType } from "../utils.js"

import { descend } from "./path.js"

const found = (leaf: LeafNode): Lookup => ({
	found: true,
	key: leaf.key,
	valueHash: leaf.valueHash,
	value: leaf.value ?? null,
})

export function get(root: Node, key: Uint8Array): Lookup {
	const { node, depth } = descend(root, key)
	switch (node.kind) {
		case NodeKind.Empty:
			return { found: false, witness: node }
		case NodeKind.Leaf:
			return equalKeys(node.key, key) ? found(node) : { found: false, witness: node }
		case NodeKind.Pruned:
			throw new PrunedError("get", key, depth)
		default:
			signalInvalidType(node)
	}
}

export const has = (root: Node, key: Uint8Array): boolean => get(root, key).found

const isAvailable = (node: Node) => node.kind === NodeKind.Leaf || node.kind === NodeKind.Inner

/**
 * Finds the leaf nearest to `key` by XOR distance: follow the key's bits,
 * taking the sibling wherever the indicated branch is Empty or Pruned.
 */
export function closest(root: Node, key: Uint8Array): Lookup {
	let node = root
	let depth = 0
	while (node.kind === NodeKind.Inner) {
		const bit = getBit(key, depth)
		const [near, far] = bit === 0 ? [node.left, node.right] : [node.right, node.left]
		if (isAvailable(near)) {
			node = near
		} else if (isAvailable(far)) {
			node = far
		} else {
			throw new PrunedError("closest", key, depth)
		}

		depth++
	}

	switch (node.kind) {
		case NodeKind.Empty:
			return { found: false, witness: node }
		case NodeKind.Leaf:
			return found(node)
		case NodeKind.Pruned:
			throw new PrunedError("closest", key, depth)
		default:
			signalInvalidType(node)
	}
}
