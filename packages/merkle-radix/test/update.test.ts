import test from "ava"

import { ConflictError, DuplicateKeyError, Node, NodeKind, Patch, PrunedError, Trie } from "merkle-radix"

import { bytes, byteKey, getKey, getValue, iota, smallTrie } from "./utils.js"

const trie = smallTrie()
const { nodes } = trie

const root = trie.build([
	[byteKey(0x00), bytes(1)],
	[byteKey(0x40), bytes(2)],
	[byteKey(0x80), bytes(3)],
])

test("update applies insertions and deletions", (t) => {
	const patch = trie.createPatch([
		[byteKey(0xc0), bytes(4)],
		[byteKey(0x00), null],
	])

	const expected = trie.build([
		[byteKey(0x40), bytes(2)],
		[byteKey(0x80), bytes(3)],
		[byteKey(0xc0), bytes(4)],
	])

	t.deepEqual(trie.update(root, patch), expected)
})

test("createPatch lays changes out by key bits", (t) => {
	const patch = trie.createPatch([
		[byteKey(0xc0), bytes(4)],
		[byteKey(0x00), null],
	])

	t.deepEqual(patch, {
		kind: "branch",
		left: { kind: "tombstone", key: byteKey(0x00) },
		right: nodes.leaf(byteKey(0xc0), bytes(4)),
	})

	t.is(trie.createPatch([]), nodes.empty())
	t.throws(
		() =>
			trie.createPatch([
				[byteKey(0x01), bytes(1)],
				[byteKey(0x01), null],
			]),
		{ instanceOf: DuplicateKeyError },
	)
})

test("empty and matching patches leave the base unchanged", (t) => {
	t.is(trie.update(root, nodes.empty()), root)
	t.is(trie.update(root, nodes.pruned(root.hash)), root)
	t.is(trie.update(root, root), root)
})

test("pruned patch nodes must match the base", (t) => {
	const patch: Patch = { kind: "branch", left: nodes.pruned(new Uint8Array(32)), right: nodes.empty() }
	const error = t.throws(() => trie.update(root, patch), { instanceOf: ConflictError })
	t.is(error?.depth, 1)
})

test("patch leaves must sit on the side their key selects", (t) => {
	const patch: Patch = { kind: "branch", left: nodes.leaf(byteKey(0x80), bytes(9)), right: nodes.empty() }
	const error = t.throws(() => trie.update(root, patch), { instanceOf: ConflictError })
	t.is(error?.depth, 1)
})

test("update can write beside a pruned subtree", (t) => {
	const view = trie.prune(root, [byteKey(0x80)])
	const updated = trie.update(view, trie.createPatch([[byteKey(0xc0), bytes(4)]]))
	t.deepEqual(updated.hash, trie.put(root, byteKey(0xc0), bytes(4)).hash)
})

test("update throws when it must open a pruned subtree", (t) => {
	const view = trie.prune(root, [byteKey(0x80)])
	const patch = trie.createPatch([
		[byteKey(0x10), bytes(5)],
		[byteKey(0x30), bytes(6)],
	])

	const error = t.throws(() => trie.update(view, patch), { instanceOf: PrunedError })
	t.is(error?.operation, "update")
	t.is(error?.depth, 1)
})

test("update splits an existing leaf to make room", (t) => {
	const base = trie.build([[byteKey(0x00), bytes(1)]])
	const patch = trie.createPatch([
		[byteKey(0x20), bytes(2)],
		[byteKey(0x80), bytes(3)],
	])

	const expected = trie.build([
		[byteKey(0x00), bytes(1)],
		[byteKey(0x20), bytes(2)],
		[byteKey(0x80), bytes(3)],
	])

	const updated = trie.update(base, patch)
	t.deepEqual(updated, expected)
	t.is(updated.kind, NodeKind.Inner)
})

test("patch entries may carry only a value hash", (t) => {
	const valueHash = nodes.hashValue(bytes(4))
	const updated = trie.update(root, trie.createPatch([[byteKey(0xc0), { hash: valueHash }]]))

	t.deepEqual(updated, trie.putValueHash(root, byteKey(0xc0), valueHash))
	t.deepEqual(trie.get(updated, byteKey(0xc0)), { found: true, key: byteKey(0xc0), valueHash, value: null })
	t.deepEqual(updated.hash, trie.put(root, byteKey(0xc0), bytes(4)).hash)

	const mixed = trie.update(
		root,
		trie.createPatch([
			[byteKey(0x20), { hash: nodes.hashValue(bytes(5)) }],
			[byteKey(0xc0), bytes(4)],
		]),
	)

	const expected = trie.put(trie.put(root, byteKey(0x20), bytes(5)), byteKey(0xc0), bytes(4))
	t.deepEqual(mixed.hash, expected.hash)
	t.deepEqual(trie.get(mixed, byteKey(0x20)), {
		found: true,
		key: byteKey(0x20),
		valueHash: nodes.hashValue(bytes(5)),
		value: null,
	})
})

test("update matches the equivalent sequence of puts and removes", (t) => {
	const trie = new Trie()
	const base = trie.build(iota(100))

	const changes: [Uint8Array, Uint8Array | null][] = []
	for (let i = 0; i < 10; i++) {
		changes.push([getKey(i * 7), null])
	}

	for (let i = 100; i < 120; i++) {
		changes.push([getKey(i), getValue(i)])
	}

	changes.push([getKey(3), bytes(0xff)])

	let expected: Node = base
	for (const [key, value] of changes) {
		expected = value === null ? trie.remove(expected, key) : trie.put(expected, key, value)
	}

	const updated = trie.update(base, trie.createPatch(changes))
	t.deepEqual(updated.hash, expected.hash)
	t.is(trie.validate(updated), 110)
})
