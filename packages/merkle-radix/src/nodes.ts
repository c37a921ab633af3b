import { sha256 } from "@noble/hashes/sha256"
import { blake3 } from "@noble/hashes/blake3"

import { EmptyNode, HashAlgorithm, InnerNode, LeafNode, Metadata, Node, NodeKind, PrunedNode } from "./interface.js"
import { DIGEST_LENGTH, EMPTY_TAG, INNER_TAG, LEAF_TAG } from "./constants.js"
import { checkDigest, checkKey, signalInvalidType } from "./utils.js"

export type HashFunction = (data: Uint8Array) => Uint8Array

export function getHashFunction(algorithm: HashAlgorithm): HashFunction {
	switch (algorithm) {
		case HashAlgorithm.SHA256:
			return (data) => sha256(data)
		case HashAlgorithm.BLAKE3:
			return (data) => blake3(data, { dkLen: DIGEST_LENGTH })
		default:
			throw new RangeError(`unsupported hash algorithm ${algorithm}`)
	}
}

/**
 * NodeFactory owns the canonical encodings. Every node it returns carries
 * its hash, computed once here:
 *
 *   Empty   H(0x00)
 *   Leaf    H(key ‖ valueHash ‖ 0x01)
 *   Inner   H(left.hash ‖ right.hash ‖ 0x02)
 *   Pruned  the stored hash
 *
 * Keys are exactly K bytes and digests exactly 32 bytes, so the trailing
 * tag alone separates the variants.
 */
export class NodeFactory {
	private readonly H: HashFunction
	readonly #empty: EmptyNode

	public constructor(public readonly metadata: Metadata) {
		this.H = getHashFunction(metadata.hash)
		this.#empty = { kind: NodeKind.Empty, hash: this.H(new Uint8Array([EMPTY_TAG])) }
	}

	public hashValue(value: Uint8Array): Uint8Array {
		return this.H(value)
	}

	public empty(): EmptyNode {
		return this.#empty
	}

	public leaf(key: Uint8Array, value: Uint8Array): LeafNode {
		checkKey(key, this.metadata)
		const valueHash = this.H(value)
		return { kind: NodeKind.Leaf, key, valueHash, value, hash: this.encodeLeaf(key, valueHash) }
	}

	public hashLeaf(key: Uint8Array, valueHash: Uint8Array): LeafNode {
		checkKey(key, this.metadata)
		checkDigest(valueHash)
		return { kind: NodeKind.Leaf, key, valueHash, hash: this.encodeLeaf(key, valueHash) }
	}

	/** Drops the local value of a leaf. The hash is unchanged. */
	public strip(leaf: LeafNode): LeafNode {
		if (leaf.value === undefined) {
			return leaf
		}

		return { kind: NodeKind.Leaf, key: leaf.key, valueHash: leaf.valueHash, hash: leaf.hash }
	}

	/** Raw Inner constructor; callers are responsible for the shape invariant. */
	public inner(left: Node, right: Node): InnerNode {
		const data = new Uint8Array(DIGEST_LENGTH * 2 + 1)
		data.set(left.hash, 0)
		data.set(right.hash, DIGEST_LENGTH)
		data[DIGEST_LENGTH * 2] = INNER_TAG
		return { kind: NodeKind.Inner, left, right, hash: this.H(data) }
	}

	/**
	 * Inner constructor that applies postfix compression: a subtree holding
	 * fewer than two items collapses into its only Leaf, or into Empty.
	 */
	public branch(left: Node, right: Node): Node {
		if (left.kind === NodeKind.Empty && (right.kind === NodeKind.Empty || right.kind === NodeKind.Leaf)) {
			return right
		} else if (right.kind === NodeKind.Empty && left.kind === NodeKind.Leaf) {
			return left
		} else {
			return this.inner(left, right)
		}
	}

	public pruned(hash: Uint8Array): PrunedNode {
		checkDigest(hash)
		return { kind: NodeKind.Pruned, hash }
	}

	/** The least informative node with the same hash as `node`. */
	public summarize(node: Node): Node {
		switch (node.kind) {
			case NodeKind.Empty:
				return node
			case NodeKind.Leaf:
				return this.strip(node)
			case NodeKind.Inner:
				return this.pruned(node.hash)
			case NodeKind.Pruned:
				return node
			default:
				signalInvalidType(node)
		}
	}

	private encodeLeaf(key: Uint8Array, valueHash: Uint8Array): Uint8Array {
		const data = new Uint8Array(key.byteLength + DIGEST_LENGTH + 1)
		data.set(key, 0)
		data.set(valueHash, key.byteLength)
		data[key.byteLength + DIGEST_LENGTH] = LEAF_TAG
		return this.H(data)
	}
}
