import { Leaf, LeafNode, Patch, Tombstone } from "./interface.js"
import { NodeFactory } from "./nodes.js"
import { DuplicateKeyError } from "./errors.js"
import { partition } from "./Builder.js"
import { checkKey, compareKeys, equalKeys } from "./utils.js"

/**
 * Builds a sparse patch for `update` from a set of changes. A `null` value
 * deletes its key. Positions with no changes are Empty.
 */
export function createPatch(nodes: NodeFactory, changes: Iterable<[key: Uint8Array, value: Leaf | null]>): Patch {
	const items: (LeafNode | Tombstone)[] = []
	for (const [key, value] of changes) {
		if (value === null) {
			checkKey(key, nodes.metadata)
			items.push({ kind: "tombstone", key })
		} else if (value instanceof Uint8Array) {
			items.push(nodes.leaf(key, value))
		} else {
			items.push(nodes.hashLeaf(key, value.hash))
		}
	}

	items.sort((a, b) => compareKeys(a.key, b.key))
	for (let i = 1; i < items.length; i++) {
		if (equalKeys(items[i - 1].key, items[i].key)) {
			throw new DuplicateKeyError(items[i].key)
		}
	}

	return partition<LeafNode | Tombstone, Patch>(items, 0, nodes.metadata.K * 8, {
		key: (item) => item.key,
		empty: () => nodes.empty(),
		single: (item) => item,
		join: (left, right) => ({ kind: "branch", left, right }),
	})
}
