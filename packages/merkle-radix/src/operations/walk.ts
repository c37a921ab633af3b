import { equals } from "uint8arrays"

import { Entry, LeafNode, Node, NodeKind } from "../interface.js"
import { NodeFactory } from "../nodes.js"
import { DIGEST_LENGTH } from "../constants.js"
import { PrunedError } from "../errors.js"
import { assert, hasPrefix, setBit, signalInvalidType } from "../utils.js"

type Position = { node: Node; depth: number }

/**
 * Yields every leaf under `root` in key order, with its depth.
 * Throws PrunedError on reaching a Pruned subtree.
 */
function* walkLeaves(root: Node, operation: string): IterableIterator<{ leaf: LeafNode; depth: number }> {
	const stack: Position[] = [{ node: root, depth: 0 }]
	for (let position = stack.pop(); position !== undefined; position = stack.pop()) {
		const { node, depth } = position
		switch (node.kind) {
			case NodeKind.Empty:
				break
			case NodeKind.Leaf:
				yield { leaf: node, depth }
				break
			case NodeKind.Inner:
				stack.push({ node: node.right, depth: depth + 1 })
				stack.push({ node: node.left, depth: depth + 1 })
				break
			case NodeKind.Pruned:
				throw new PrunedError(operation, null, depth)
			default:
				signalInvalidType(node)
		}
	}
}

export function* leaves(root: Node): IterableIterator<LeafNode> {
	for (const { leaf } of walkLeaves(root, "leaves")) {
		yield leaf
	}
}

export function* keys(root: Node): IterableIterator<Uint8Array> {
	for (const { leaf } of walkLeaves(root, "keys")) {
		yield leaf.key
	}
}

/** Throws PrunedError on a hash-only leaf, since its value isn't held. */
export function* entries(root: Node): IterableIterator<Entry> {
	for (const { leaf, depth } of walkLeaves(root, "entries")) {
		if (leaf.value === undefined) {
			throw new PrunedError("entries", leaf.key, depth)
		}

		yield [leaf.key, leaf.value]
	}
}

export function count(root: Node): number {
	let n = 0
	for (const _ of walkLeaves(root, "count")) {
		n++
	}

	return n
}

/**
 * Checks the structural invariants of `root` and recomputes every hash it can.
 * Pruned subtrees are taken on trust. Returns the number of leaves held.
 */
export function validate(nodes: NodeFactory, root: Node): number {
	const maxDepth = nodes.metadata.K * 8
	const stack: (Position & { prefix: Uint8Array })[] = [
		{ node: root, depth: 0, prefix: new Uint8Array(nodes.metadata.K) },
	]

	let n = 0
	for (let position = stack.pop(); position !== undefined; position = stack.pop()) {
		const { node, depth, prefix } = position
		switch (node.kind) {
			case NodeKind.Empty:
				assert(equals(node.hash, nodes.empty().hash), `invalid empty hash at depth ${depth}`)
				break
			case NodeKind.Leaf: {
				const { key, valueHash, value, hash } = node
				assert(key.byteLength === nodes.metadata.K, `invalid key length at depth ${depth}`)
				assert(hasPrefix(key, prefix, depth), `leaf on the wrong side at depth ${depth}`)
				assert(equals(hash, nodes.hashLeaf(key, valueHash).hash), `invalid leaf hash at depth ${depth}`)
				assert(value === undefined || equals(valueHash, nodes.hashValue(value)), `invalid value at depth ${depth}`)
				n++
				break
			}
			case NodeKind.Inner: {
				const { left, right } = node
				assert(depth < maxDepth, `inner node below the last key bit at depth ${depth}`)
				assert(
					!(left.kind === NodeKind.Empty && (right.kind === NodeKind.Empty || right.kind === NodeKind.Leaf)),
					`inner node with fewer than two items at depth ${depth}`,
				)
				assert(
					!(right.kind === NodeKind.Empty && left.kind === NodeKind.Leaf),
					`inner node with fewer than two items at depth ${depth}`,
				)
				assert(equals(node.hash, nodes.inner(left, right).hash), `invalid inner hash at depth ${depth}`)
				stack.push({ node: right, depth: depth + 1, prefix: setBit(prefix, depth) })
				stack.push({ node: left, depth: depth + 1, prefix })
				break
			}
			case NodeKind.Pruned:
				assert(node.hash.byteLength === DIGEST_LENGTH, `invalid pruned hash at depth ${depth}`)
				break
			default:
				signalInvalidType(node)
		}
	}

	return n
}
