import { HashAlgorithm, Metadata } from "./interface.js"

export const DIGEST_LENGTH = 32

export const DEFAULT_K = 32
export const DEFAULT_METADATA: Metadata = { K: DEFAULT_K, hash: HashAlgorithm.SHA256 }

// trailing domain separation tags
export const EMPTY_TAG = 0x00
export const LEAF_TAG = 0x01
export const INNER_TAG = 0x02
