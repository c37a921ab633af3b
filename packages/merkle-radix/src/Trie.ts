import { Leaf, Node, Patch } from "./interface.js"
import { ReadOnlyTrie } from "./ReadOnlyTrie.js"
import { Builder } from "./Builder.js"
import { createPatch } from "./patch.js"
import { insert, remove } from "./operations/write.js"
import { merge } from "./reconcile/merge.js"
import { update } from "./reconcile/update.js"
import { checkKey } from "./utils.js"

/**
 * Persistent operations: each returns a new root and leaves its inputs
 * untouched. Unchanged subtrees are shared by reference.
 */
export class Trie extends ReadOnlyTrie {
	public build(entries: Iterable<[Uint8Array, Leaf]>): Node {
		return Builder.fromEntries(this.nodes, entries)
	}

	public put(root: Node, key: Uint8Array, value: Uint8Array): Node {
		this.log("put(%k, %h)", key, value)
		return insert(this.nodes, root, this.nodes.leaf(key, value))
	}

	public putValueHash(root: Node, key: Uint8Array, valueHash: Uint8Array): Node {
		this.log("putValueHash(%k, %h)", key, valueHash)
		return insert(this.nodes, root, this.nodes.hashLeaf(key, valueHash))
	}

	public remove(root: Node, key: Uint8Array): Node {
		this.log("remove(%k)", key)
		checkKey(key, this.metadata)
		return remove(this.nodes, root, key)
	}

	public merge(a: Node, b: Node): Node {
		return merge(this.nodes, a, b)
	}

	public update(base: Node, patch: Patch): Node {
		return update(this.nodes, base, patch)
	}

	public createPatch(changes: Iterable<[key: Uint8Array, value: Leaf | null]>): Patch {
		return createPatch(this.nodes, changes)
	}
}
