import { Node, Patch, ReadWriteTransaction } from "./interface.js"
import { ReadOnlyTransactionImpl } from "./ReadOnlyTransaction.js"

/**
 * Each write swaps in a new root. The previous roots stay valid,
 * so a caller can discard the transaction without undoing anything.
 */
export class ReadWriteTransactionImpl extends ReadOnlyTransactionImpl implements ReadWriteTransaction {
	public set(key: Uint8Array, value: Uint8Array): void {
		this.root = this.trie.put(this.root, key, value)
	}

	public setValueHash(key: Uint8Array, valueHash: Uint8Array): void {
		this.root = this.trie.putValueHash(this.root, key, valueHash)
	}

	public delete(key: Uint8Array): void {
		this.root = this.trie.remove(this.root, key)
	}

	/** Merges another view of the same tree into this one. */
	public merge(view: Node): void {
		this.root = this.trie.merge(this.root, view)
	}

	public update(patch: Patch): void {
		this.root = this.trie.update(this.root, patch)
	}
}
