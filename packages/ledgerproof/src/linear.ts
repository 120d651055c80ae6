import type { Digest, LinearProof } from "./interface.js"
import { assertProof } from "./errors.js"
import { accumulate } from "./header.js"
import { equalDigests, isDigest, isTxId } from "./utils.js"

/**
 * Recompute the accumulated linear hash from `sourceTxId` to `targetTxId`.
 * `terms[0]` is the source alh and every following term is the inner hash of the next transaction.
 */
export function verifyLinearProof(
	proof: LinearProof,
	sourceTxId: number,
	targetTxId: number,
	sourceAlh: Digest,
	targetAlh: Digest,
): boolean {
	assertProof(proof !== undefined && proof !== null, "missing linear proof")
	assertProof(isTxId(proof.sourceTxId) && isTxId(proof.targetTxId), "invalid linear proof ids")
	assertProof(Array.isArray(proof.terms) && proof.terms.every(isDigest), "invalid linear proof terms")

	if (proof.sourceTxId !== sourceTxId || proof.targetTxId !== targetTxId) {
		return false
	}

	if (sourceTxId === 0 || sourceTxId > targetTxId) {
		return false
	}

	if (proof.terms.length !== targetTxId - sourceTxId + 1 || !equalDigests(proof.terms[0], sourceAlh)) {
		return false
	}

	let calculated = proof.terms[0]
	for (let i = 1; i < proof.terms.length; i++) {
		calculated = accumulate(sourceTxId + i, calculated, proof.terms[i])
	}

	return equalDigests(calculated, targetAlh)
}
