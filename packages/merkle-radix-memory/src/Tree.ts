import PQueue from "p-queue"
import debug from "debug"

import {
	Awaitable,
	Builder,
	Leaf,
	Metadata,
	Node,
	ReadOnlyTransaction,
	ReadOnlyTransactionImpl,
	ReadWriteTransaction,
	ReadWriteTransactionImpl,
	Tree as ITree,
	Trie,
} from "merkle-radix"

export class Tree implements ITree {
	public static async fromEntries(
		init: Partial<Metadata>,
		entries: Iterable<[Uint8Array, Leaf]> | AsyncIterable<[Uint8Array, Leaf]>,
	): Promise<Tree> {
		const tree = new Tree(init)

		await tree.#queue.add(async () => {
			const builder = new Builder(tree.#trie.nodes)
			for await (const [key, value] of entries) {
				builder.set(key, value)
			}

			tree.#root = builder.finalize()
		})

		return tree
	}

	/** Opens a tree on an existing root, which may be a partial (pruned) view. */
	public static fromRoot(init: Partial<Metadata>, root: Node): Tree {
		const tree = new Tree(init)
		tree.#root = root
		return tree
	}

	public readonly metadata: Metadata
	private readonly log = debug("merkle-radix:tree")

	#queue = new PQueue({ concurrency: 1 })
	#open = true
	#trie: Trie
	#root: Node

	public constructor(init: Partial<Metadata> = {}) {
		this.#trie = new Trie(init)
		this.metadata = this.#trie.metadata
		this.#root = this.#trie.empty()
	}

	public async close(): Promise<void> {
		this.#open = false
		await this.#queue.onIdle()
		this.#root = this.#trie.empty()
	}

	public clear(): void {
		if (this.#open === false) {
			throw new Error("tree closed")
		}

		this.#root = this.#trie.empty()
	}

	/** Reads see the root as of the start of the callback, whatever writes land meanwhile. */
	public async read<T>(callback: (txn: ReadOnlyTransaction) => Awaitable<T>): Promise<T> {
		if (this.#open === false) {
			throw new Error("tree closed")
		}

		return await callback(new ReadOnlyTransactionImpl(this.#trie, this.#root))
	}

	/**
	 * Writes run one at a time. The new root is published only if the
	 * callback returns without throwing.
	 */
	public async write<T>(callback: (txn: ReadWriteTransaction) => Awaitable<T>): Promise<T> {
		if (this.#open === false) {
			throw new Error("tree closed")
		}

		const results: T[] = []
		await this.#queue.add(async () => {
			const txn = new ReadWriteTransactionImpl(this.#trie, this.#root)
			results.push(await callback(txn))
			this.#root = txn.getRoot()
			this.log("committed root %h", this.#root.hash)
		})

		if (results.length === 0) {
			throw new Error("failed to commit transaction")
		}

		return results[0]
	}
}
