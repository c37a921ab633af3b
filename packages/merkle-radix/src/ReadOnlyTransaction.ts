import { Entry, Lookup, Node, ReadOnlyTransaction } from "./interface.js"
import { Trie } from "./Trie.js"
import { PrunedError } from "./errors.js"

export class ReadOnlyTransactionImpl implements ReadOnlyTransaction {
	constructor(
		protected readonly trie: Trie,
		protected root: Node,
	) {}

	public getRoot(): Node {
		return this.root
	}

	/**
	 * Returns the value stored at `key`, or null if there is none.
	 * Throws PrunedError if only the value's hash is held.
	 */
	public get(key: Uint8Array): Uint8Array | null {
		const result = this.trie.get(this.root, key)
		if (!result.found) {
			return null
		} else if (result.value === null) {
			throw new PrunedError("get", key, null)
		}

		return result.value
	}

	public has(key: Uint8Array): boolean {
		return this.trie.has(this.root, key)
	}

	public lookup(key: Uint8Array): Lookup {
		return this.trie.get(this.root, key)
	}

	public closest(key: Uint8Array): Lookup {
		return this.trie.closest(this.root, key)
	}

	public prove(keys: Iterable<Uint8Array>): Node {
		return this.trie.prove(this.root, keys)
	}

	public keys(): IterableIterator<Uint8Array> {
		return this.trie.keys(this.root)
	}

	public entries(): IterableIterator<Entry> {
		return this.trie.entries(this.root)
	}
}
