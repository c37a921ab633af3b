import { compare, equals } from "uint8arrays"

import type { Metadata } from "./interface.js"
import { DEFAULT_METADATA, DIGEST_LENGTH } from "./constants.js"

export function assert(condition: unknown, message?: string, ...args: unknown[]): asserts condition {
	if (!condition) {
		if (args.length > 0) {
			console.error(...args)
		}

		throw new Error(message ?? "Internal error")
	}
}

export function signalInvalidType(value: never): never {
	console.error(value)
	throw new TypeError("internal error: unexpected node variant")
}

export function getMetadata(init: Partial<Metadata> = {}): Metadata {
	const { K = DEFAULT_METADATA.K, hash = DEFAULT_METADATA.hash } = init
	if (!Number.isInteger(K) || K < 1 || K > 255) {
		throw new RangeError(`metadata.K must be an integer in 1..255, got ${K}`)
	}

	return { K, hash }
}

export function checkKey(key: Uint8Array, metadata: Metadata): void {
	if (!(key instanceof Uint8Array)) {
		throw new TypeError("key must be a Uint8Array")
	} else if (key.byteLength !== metadata.K) {
		throw new RangeError(`key must be exactly ${metadata.K} bytes, got ${key.byteLength}`)
	}
}

export function checkDigest(hash: Uint8Array): void {
	if (!(hash instanceof Uint8Array)) {
		throw new TypeError("hash must be a Uint8Array")
	} else if (hash.byteLength !== DIGEST_LENGTH) {
		throw new RangeError(`hash must be exactly ${DIGEST_LENGTH} bytes, got ${hash.byteLength}`)
	}
}

/** Returns bit `depth` of `key`, most significant bit first. */
export function getBit(key: Uint8Array, depth: number): 0 | 1 {
	return (key[depth >> 3] >> (7 - (depth & 7))) & 1 ? 1 : 0
}

export const compareKeys = (a: Uint8Array, b: Uint8Array): number => compare(a, b)

export const equalKeys = (a: Uint8Array, b: Uint8Array): boolean => equals(a, b)

/** Whether the first `depth` bits of `key` equal those of `prefix`. */
export function hasPrefix(key: Uint8Array, prefix: Uint8Array, depth: number): boolean {
	for (let i = 0; i < depth; i++) {
		if (getBit(key, i) !== getBit(prefix, i)) {
			return false
		}
	}

	return true
}

/** Returns a copy of `prefix` with bit `depth` set. */
export function setBit(prefix: Uint8Array, depth: number): Uint8Array {
	const result = prefix.slice()
	result[depth >> 3] |= 0x80 >> (depth & 7)
	return result
}
