export * from "./interface.js"
export * from "./constants.js"
export * from "./errors.js"

export * from "./encoding.js"
export * from "./header.js"
export * from "./merkle.js"
export * from "./linear.js"
export * from "./dual.js"
export * from "./verify.js"

export * from "./signature.js"
export * from "./MemoryStateStore.js"
export * from "./StateCache.js"
export * from "./Client.js"

export { logger } from "./logger.js"
export { formatBytes, formatState } from "./format.js"
export { assert, equalDigests, isDigest, isTxId, Writer } from "./utils.js"
