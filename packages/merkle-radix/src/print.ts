import { toString } from "uint8arrays"

import { Node, NodeKind } from "./interface.js"
import { signalInvalidType } from "./utils.js"

/**
 * Pretty-print the tree structure to a utf-8 stream, one node per line.
 * Consume with a TextDecoderStream or iterable sink.
 */
export async function* printTree(root: Node, options: { hashSize?: number } = {}): AsyncIterableIterator<Uint8Array> {
	const hashSize = options.hashSize ?? 4
	const hash = ({ hash }: Node) => (hashSize > 0 ? ` ${toString(hash.subarray(0, hashSize), "hex")}` : "")
	const encoder = new TextEncoder()

	function label(node: Node): string {
		switch (node.kind) {
			case NodeKind.Empty:
				return "empty"
			case NodeKind.Leaf:
				return `leaf ${toString(node.key, "hex")}${hash(node)}`
			case NodeKind.Inner:
				return `inner${hash(node)}`
			case NodeKind.Pruned:
				return `pruned${hash(node)}`
			default:
				signalInvalidType(node)
		}
	}

	const stack: { node: Node; prefix: string; bullet: string }[] = [{ node: root, prefix: "", bullet: "" }]
	for (let line = stack.pop(); line !== undefined; line = stack.pop()) {
		const { node, prefix, bullet } = line
		yield encoder.encode(`${prefix}${bullet}${label(node)}\n`)

		if (node.kind === NodeKind.Inner) {
			const indent = prefix + (bullet === "├─ " ? "│  " : bullet === "└─ " ? "   " : "")
			stack.push({ node: node.right, prefix: indent, bullet: "└─ " })
			stack.push({ node: node.left, prefix: indent, bullet: "├─ " })
		}
	}
}
