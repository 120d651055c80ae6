import { sha256 } from "@noble/hashes/sha256"

import type { Digest, EntrySpec } from "./interface.js"
import { PLAIN_ENTRY_TAG, REFERENCE_ENTRY_TAG } from "./constants.js"
import { Writer } from "./utils.js"

export const digest = (bytes: Uint8Array): Digest => sha256(bytes)

export function encodePlain(key: Uint8Array, value: Uint8Array): Uint8Array {
	return new Writer().uint8(PLAIN_ENTRY_TAG).field(key).field(value).finish()
}

export function encodeReference(key: Uint8Array, referredKey: Uint8Array, atTx: number): Uint8Array {
	return new Writer().uint8(REFERENCE_ENTRY_TAG).field(key).field(referredKey).uint64(atTx).finish()
}

/** The key under which a sorted-set member is stored; its value is empty. */
export function encodeZAddKey(set: Uint8Array, score: number, key: Uint8Array, atTx: number): Uint8Array {
	return new Writer().field(set).float64(score).field(key).uint64(atTx).finish()
}

export function encodeEntry(entry: EntrySpec): Uint8Array {
	switch (entry.type) {
		case "plain":
			return encodePlain(entry.key, entry.value)
		case "reference":
			return encodeReference(entry.key, entry.referredKey, entry.atTx)
	}
}

export const entryDigest = (entry: EntrySpec): Digest => digest(encodeEntry(entry))

export const plainEntry = (key: Uint8Array, value: Uint8Array): EntrySpec => ({ type: "plain", key, value })

export const referenceEntry = (key: Uint8Array, referredKey: Uint8Array, atTx: number): EntrySpec => ({
	type: "reference",
	key,
	referredKey,
	atTx,
})

export const zaddEntry = (set: Uint8Array, score: number, key: Uint8Array, atTx: number): EntrySpec =>
	plainEntry(encodeZAddKey(set, score, key, atTx), new Uint8Array([]))
