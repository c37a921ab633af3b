export * from "./interface.js"
export * from "./constants.js"
export * from "./errors.js"

export { NodeFactory, getHashFunction } from "./nodes.js"
export type { HashFunction } from "./nodes.js"
export { Builder } from "./Builder.js"
export { ReadOnlyTrie } from "./ReadOnlyTrie.js"
export { Trie } from "./Trie.js"
export { createPatch } from "./patch.js"
export { computeHash, prove, verify } from "./proof.js"

export { printTree } from "./print.js"
export { formatNode, formatKey } from "./format.js"
export { equalKeys, compareKeys, getBit, getMetadata } from "./utils.js"

export { ReadOnlyTransactionImpl } from "./ReadOnlyTransaction.js"
export { ReadWriteTransactionImpl } from "./ReadWriteTransaction.js"
