import test from "ava"

import { fromString } from "uint8arrays"
import { sha256 } from "@noble/hashes/sha256"

import { ConflictError, PrunedError, Trie } from "merkle-radix"
import { Tree } from "merkle-radix-memory"

const key = (name: string) => sha256(fromString(name))

test("get/set/delete", async (t) => {
	const tree = new Tree()

	await tree.write((txn) => {
		txn.set(key("a"), fromString("foo"))
		txn.set(key("b"), fromString("bar"))
		txn.set(key("c"), fromString("baz"))
	})

	await tree.read((txn) => t.deepEqual(txn.get(key("b")), fromString("bar")))

	await tree.write((txn) => txn.delete(key("b")))

	await tree.read((txn) => {
		t.is(txn.get(key("b")), null)
		t.false(txn.has(key("b")))
		t.true(txn.has(key("a")))
	})
})

test("a failed write publishes nothing", async (t) => {
	const tree = new Tree()
	await tree.write((txn) => txn.set(key("a"), fromString("foo")))

	await t.throwsAsync(
		() =>
			tree.write((txn) => {
				txn.set(key("b"), fromString("bar"))
				throw new Error("bad")
			}),
		{ message: "bad" },
	)

	await tree.read((txn) => {
		t.deepEqual(txn.get(key("a")), fromString("foo"))
		t.is(txn.get(key("b")), null)
	})
})

test("writes run one at a time", async (t) => {
	const tree = new Tree()
	const names = ["a", "b", "c", "d", "e", "f"]
	await Promise.all(
		names.map((name) =>
			tree.write(async (txn) => {
				await new Promise((resolve) => setTimeout(resolve, 1))
				txn.set(key(name), fromString(name))
			}),
		),
	)

	const count = await tree.read((txn) => Array.from(txn.keys()).length)
	t.is(count, names.length)
})

test("write returns the callback result", async (t) => {
	const tree = new Tree()
	const result = await tree.write((txn) => {
		txn.set(key("a"), fromString("foo"))
		return txn.getRoot().hash
	})

	const root = await tree.read((txn) => txn.getRoot())
	t.deepEqual(result, root.hash)
})

test("fromEntries builds the same root as a sequence of writes", async (t) => {
	const entries = ["a", "b", "c"].map((name): [Uint8Array, Uint8Array] => [key(name), fromString(name)])
	const built = await Tree.fromEntries({}, entries)

	const tree = new Tree()
	await tree.write((txn) => {
		for (const [k, v] of entries) {
			txn.set(k, v)
		}
	})

	const [a, b] = await Promise.all([built.read((txn) => txn.getRoot()), tree.read((txn) => txn.getRoot())])
	t.deepEqual(a.hash, b.hash)
})

test("merge a proof into a partial view", async (t) => {
	const trie = new Trie()
	const full = trie.build(["a", "b", "c", "d"].map((name): [Uint8Array, Uint8Array] => [key(name), fromString(name)]))

	const tree = Tree.fromRoot({}, trie.prove(full, [key("a")]))
	await tree.read((txn) => t.throws(() => txn.get(key("b")), { instanceOf: PrunedError }))

	await tree.write((txn) => txn.merge(trie.prove(full, [key("b")])))
	await tree.read((txn) => {
		t.deepEqual(txn.get(key("a")), fromString("a"))
		t.deepEqual(txn.get(key("b")), fromString("b"))
	})

	const other = trie.put(full, key("e"), fromString("e"))
	await t.throwsAsync(() => tree.write((txn) => txn.merge(other)), { instanceOf: ConflictError })
})

test("update applies a patch", async (t) => {
	const trie = new Trie()
	const tree = await Tree.fromEntries({}, [
		[key("a"), fromString("a")],
		[key("b"), fromString("b")],
	])

	await tree.write((txn) =>
		txn.update(
			trie.createPatch([
				[key("a"), null],
				[key("c"), fromString("c")],
			]),
		),
	)

	await tree.read((txn) => {
		t.is(txn.get(key("a")), null)
		t.deepEqual(txn.get(key("b")), fromString("b"))
		t.deepEqual(txn.get(key("c")), fromString("c"))
	})
})

test("setValueHash stores a hash-only entry", async (t) => {
	const trie = new Trie()
	const tree = new Tree()
	await tree.write((txn) => txn.setValueHash(key("a"), trie.nodes.hashValue(fromString("foo"))))

	await tree.read((txn) => {
		t.true(txn.has(key("a")))
		t.throws(() => txn.get(key("a")), { instanceOf: PrunedError })
		t.deepEqual(txn.lookup(key("a")), {
			found: true,
			key: key("a"),
			valueHash: sha256(fromString("foo")),
			value: null,
		})
	})
})

test("closed trees reject reads and writes", async (t) => {
	const tree = new Tree()
	await tree.close()
	await t.throwsAsync(() => tree.read((txn) => txn.getRoot()), { message: "tree closed" })
	await t.throwsAsync(() => tree.write((txn) => txn.getRoot()), { message: "tree closed" })
	t.throws(() => tree.clear(), { message: "tree closed" })
})

test("clear resets the tree", async (t) => {
	const tree = await Tree.fromEntries({}, [[key("a"), fromString("a")]])
	tree.clear()
	await tree.read((txn) => {
		t.deepEqual(txn.getRoot(), new Trie().empty())
		t.is(txn.get(key("a")), null)
	})
})
