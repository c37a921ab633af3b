import { Entry, Lookup, Metadata, Node } from "./interface.js"
import { NodeFactory } from "./nodes.js"
import { debug } from "./format.js"
import { checkDigest, checkKey, getMetadata } from "./utils.js"
import { closest, get } from "./operations/read.js"
import { count, entries, keys, validate } from "./operations/walk.js"
import { prune } from "./reconcile/prune.js"
import { computeHash, verify } from "./proof.js"

/**
 * Queries over immutable roots. Every method takes the root it works on;
 * nothing is stored between calls.
 */
export class ReadOnlyTrie {
	protected readonly log = debug("merkle-radix:trie")

	public readonly metadata: Metadata
	public readonly nodes: NodeFactory

	constructor(init: Partial<Metadata> = {}) {
		this.metadata = getMetadata(init)
		this.nodes = new NodeFactory(this.metadata)
	}

	public empty(): Node {
		return this.nodes.empty()
	}

	public get(root: Node, key: Uint8Array): Lookup {
		checkKey(key, this.metadata)
		return get(root, key)
	}

	public has(root: Node, key: Uint8Array): boolean {
		return this.get(root, key).found
	}

	/** The leaf nearest to `key` by XOR distance. */
	public closest(root: Node, key: Uint8Array): Lookup {
		checkKey(key, this.metadata)
		return closest(root, key)
	}

	public keys(root: Node): IterableIterator<Uint8Array> {
		return keys(root)
	}

	public entries(root: Node): IterableIterator<Entry> {
		return entries(root)
	}

	public count(root: Node): number {
		return count(root)
	}

	public prune(root: Node, keys: Iterable<Uint8Array>): Node {
		const targets = Array.from(keys)
		for (const key of targets) {
			checkKey(key, this.metadata)
		}

		const result = prune(this.nodes, root, targets)
		this.log("pruned %n to %d keys", root, targets.length)
		return result
	}

	/** A proof for `keys` is `root` pruned to their paths. */
	public prove(root: Node, keys: Iterable<Uint8Array>): Node {
		return this.prune(root, keys)
	}

	public verify(rootHash: Uint8Array, proof: Node, key: Uint8Array): Lookup {
		checkDigest(rootHash)
		checkKey(key, this.metadata)
		return verify(this.nodes, rootHash, proof, key)
	}

	/** Recomputes the root hash from the tree's contents. */
	public computeHash(root: Node): Uint8Array {
		return computeHash(this.nodes, root)
	}

	/** Checks the tree's structural invariants and returns the number of leaves held. */
	public validate(root: Node): number {
		return validate(this.nodes, root)
	}
}
