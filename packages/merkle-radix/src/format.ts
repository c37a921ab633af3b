import debug from "debug"
import { toString } from "uint8arrays"

import { Node, NodeKind } from "./interface.js"

const hex = (bytes: Uint8Array, length = bytes.byteLength) => toString(bytes.subarray(0, length), "hex")

export const formatKey = (key: Uint8Array | null) => (key ? hex(key) : "null")

export function formatNode(node: Node | null): string {
	if (node === null) {
		return "null"
	}

	switch (node.kind) {
		case NodeKind.Empty:
			return "{ empty }"
		case NodeKind.Leaf:
			return `{ leaf ${hex(node.key)} | ${hex(node.hash, 4)}${node.value === undefined ? "" : " +value"} }`
		case NodeKind.Inner:
			return `{ inner | ${hex(node.hash, 4)} }`
		case NodeKind.Pruned:
			return `{ pruned | ${hex(node.hash, 4)} }`
	}
}

debug.formatters.h = (bytes: Uint8Array) => toString(bytes, "hex")
debug.formatters.k = formatKey
debug.formatters.n = formatNode

export { debug }
