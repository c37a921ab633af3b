export enum HashAlgorithm {
	SHA256 = 0,
	BLAKE3 = 1,
}

export interface Metadata {
	/** key width in bytes */
	readonly K: number
	readonly hash: HashAlgorithm
}

export enum NodeKind {
	Empty = 0,
	Leaf = 1,
	Inner = 2,
	Pruned = 3,
}

export type EmptyNode = {
	readonly kind: NodeKind.Empty
	readonly hash: Uint8Array
}

/**
 * A leaf commits to `key` and `valueHash`. A "full" leaf also carries the
 * value itself, which is local data and never part of the hash.
 */
export type LeafNode = {
	readonly kind: NodeKind.Leaf
	readonly key: Uint8Array
	readonly valueHash: Uint8Array
	readonly value?: Uint8Array
	readonly hash: Uint8Array
}

export type InnerNode = {
	readonly kind: NodeKind.Inner
	readonly left: Node
	readonly right: Node
	readonly hash: Uint8Array
}

/** Hash-only stand-in for an Inner subtree that isn't held locally. */
export type PrunedNode = {
	readonly kind: NodeKind.Pruned
	readonly hash: Uint8Array
}

export type Node = EmptyNode | LeafNode | InnerNode | PrunedNode

export type Entry = [key: Uint8Array, value: Uint8Array]

/** A value to insert: either the value bytes or just their hash. */
export type Leaf = Uint8Array | { hash: Uint8Array }

export type Found = {
	found: true
	key: Uint8Array
	valueHash: Uint8Array
	/** null when only the value hash is held locally */
	value: Uint8Array | null
}

export type NotFound = {
	found: false
	/** the node at which the search ended; recomputes into the root together with the path above it */
	witness: EmptyNode | LeafNode
}

export type Lookup = Found | NotFound

/** Deletion marker, only meaningful inside a patch. */
export type Tombstone = {
	readonly kind: "tombstone"
	readonly key: Uint8Array
}

export type PatchBranch = {
	readonly kind: "branch"
	readonly left: Patch
	readonly right: Patch
}

export type Patch = Node | Tombstone | PatchBranch

export type Awaitable<T> = Promise<T> | T

export interface ReadOnlyTransaction {
	getRoot(): Node

	get(key: Uint8Array): Uint8Array | null
	has(key: Uint8Array): boolean
	lookup(key: Uint8Array): Lookup
	closest(key: Uint8Array): Lookup
	prove(keys: Iterable<Uint8Array>): Node

	keys(): IterableIterator<Uint8Array>
	entries(): IterableIterator<Entry>
}

export interface ReadWriteTransaction extends ReadOnlyTransaction {
	set(key: Uint8Array, value: Uint8Array): void
	setValueHash(key: Uint8Array, valueHash: Uint8Array): void
	delete(key: Uint8Array): void
	merge(view: Node): void
	update(patch: Patch): void
}

export interface Tree {
	metadata: Metadata

	read<T>(callback: (txn: ReadOnlyTransaction) => Awaitable<T>): Promise<T>
	write<T>(callback: (txn: ReadWriteTransaction) => Awaitable<T>): Promise<T>

	close(): Awaitable<void>
	clear(): Awaitable<void>
}
