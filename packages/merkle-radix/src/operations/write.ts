import { equals } from "uint8arrays"

import { LeafNode, Node, NodeKind } from "../interface.js"
import { NodeFactory } from "../nodes.js"
import { buildSubtree } from "../Builder.js"
import { PrunedError } from "../errors.js"
import { compareKeys, equalKeys, signalInvalidType } from "../utils.js"

import { descend, rebuild } from "./path.js"

/**
 * Inserts `leaf` into the subtree `root` located at `depth`, returning the
 * new subtree. Returns `root` itself when nothing changes.
 */
export function insert(nodes: NodeFactory, root: Node, leaf: LeafNode, depth = 0): Node {
	const { path, node, depth: d } = descend(root, leaf.key, depth)

	switch (node.kind) {
		case NodeKind.Empty:
			return rebuild(nodes, path, leaf)
		case NodeKind.Leaf:
			if (equalKeys(node.key, leaf.key)) {
				if (equals(node.valueHash, leaf.valueHash) && (leaf.value === undefined || node.value !== undefined)) {
					return root
				}

				return rebuild(nodes, path, leaf)
			} else {
				// the two keys agree on every bit above d; split them from there
				const pair = compareKeys(node.key, leaf.key) < 0 ? [node, leaf] : [leaf, node]
				return rebuild(nodes, path, buildSubtree(nodes, pair, d))
			}
		case NodeKind.Pruned:
			throw new PrunedError("put", leaf.key, d)
		default:
			signalInvalidType(node)
	}
}

/**
 * Removes `key` from the subtree `root` located at `depth`. Returns `root`
 * itself when the key is absent.
 */
export function remove(nodes: NodeFactory, root: Node, key: Uint8Array, depth = 0): Node {
	const { path, node, depth: d } = descend(root, key, depth)

	switch (node.kind) {
		case NodeKind.Empty:
			return root
		case NodeKind.Leaf:
			return equalKeys(node.key, key) ? rebuild(nodes, path, nodes.empty()) : root
		case NodeKind.Pruned:
			throw new PrunedError("remove", key, d)
		default:
			signalInvalidType(node)
	}
}
