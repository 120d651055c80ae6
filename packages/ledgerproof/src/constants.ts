export const DIGEST_SIZE = 32

export const ZERO_DIGEST = new Uint8Array(DIGEST_SIZE)

export const MAX_UINT32 = 0xffffffff

export const PLAIN_ENTRY_TAG = 0x00
export const NODE_PREFIX = 0x01
export const REFERENCE_ENTRY_TAG = 0x02

export const DEFAULT_DATABASE = "defaultdb"
