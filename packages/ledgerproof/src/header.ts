import { sha256 } from "@noble/hashes/sha256"

import type { Digest, TxMetadata } from "./interface.js"
import { MAX_UINT32 } from "./constants.js"
import { assertProof } from "./errors.js"
import { Writer, isDigest, isTxId } from "./utils.js"

export function assertMetadata(metadata: TxMetadata | undefined, label: string): asserts metadata is TxMetadata {
	assertProof(metadata !== undefined && metadata !== null, `missing ${label} metadata`)
	assertProof(isTxId(metadata.id) && metadata.id > 0, `invalid ${label} metadata id`)
	assertProof(isTxId(metadata.ts), `invalid ${label} metadata timestamp`)
	assertProof(isTxId(metadata.nentries) && metadata.nentries <= MAX_UINT32, `invalid ${label} metadata entry count`)
	assertProof(isTxId(metadata.blTxId) && metadata.blTxId < metadata.id, `invalid ${label} metadata blTxId`)
	assertProof(isDigest(metadata.prevAlh), `invalid ${label} metadata prevAlh`)
	assertProof(isDigest(metadata.eH), `invalid ${label} metadata eH`)
	assertProof(isDigest(metadata.blRoot), `invalid ${label} metadata blRoot`)
}

/**
 * H(ts ‖ nentries ‖ eH ‖ blTxId ‖ blRoot): everything a transaction commits to
 * apart from its id and its predecessor.
 */
export function innerHash({ ts, nentries, eH, blTxId, blRoot }: TxMetadata): Digest {
	const bytes = new Writer().uint64(ts).uint32(nentries).bytes(eH).uint64(blTxId).bytes(blRoot).finish()
	return sha256(bytes)
}

/** Fold one transaction into the accumulated linear hash. */
export function accumulate(id: number, prevAlh: Digest, inner: Digest): Digest {
	return sha256(new Writer().uint64(id).bytes(prevAlh).bytes(inner).finish())
}

export const alh = (metadata: TxMetadata): Digest => accumulate(metadata.id, metadata.prevAlh, innerHash(metadata))
