import Prando from "prando"
import { sha256 } from "@noble/hashes/sha256"

import { Trie } from "merkle-radix"

const encodeIndex = (i: number) => {
	const buffer = new ArrayBuffer(4)
	new DataView(buffer).setUint32(0, i)
	return new Uint8Array(buffer)
}

/** 32-byte test key: the hash of a counter. */
export const getKey = (i: number): Uint8Array => sha256(encodeIndex(i))

export const getValue = (i: number): Uint8Array => encodeIndex(i)

export function* iota(count: number): IterableIterator<[Uint8Array, Uint8Array]> {
	for (let i = 0; i < count; i++) {
		yield [getKey(i), getValue(i)]
	}
}

/** Deterministic Fisher-Yates shuffle. */
export function shuffle<T>(items: readonly T[], seed: number): T[] {
	const rng = new Prando.default(seed)
	const result = items.slice()
	for (let i = result.length - 1; i > 0; i--) {
		const j = rng.nextInt(0, i)
		const temp = result[i]
		result[i] = result[j]
		result[j] = temp
	}

	return result
}

/** Single-byte keys make hand-drawn trees easy to check. */
export const byteKey = (byte: number) => new Uint8Array([byte])

export const bytes = (...values: number[]) => new Uint8Array(values)

export const smallTrie = () => new Trie({ K: 1 })
