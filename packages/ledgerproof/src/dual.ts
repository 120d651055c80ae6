import type { Digest, DualProof, TxMetadata } from "./interface.js"
import { assertProof } from "./errors.js"
import { alh, assertMetadata } from "./header.js"
import { verifyConsistency, verifyInclusion, verifyLastInclusion } from "./merkle.js"
import { verifyLinearProof } from "./linear.js"
import { equalDigests, isDigest, isTxId } from "./utils.js"

/**
 * Verify that the state at `targetTxId` is an append-only extension of the state at `sourceTxId`.
 *
 * The binary linking tree committed to by each transaction header (blTxId, blRoot) gives the
 * structural part: the source alh is a leaf of the target's linking tree and the source's
 * linking tree is a prefix of it. The linear proof covers the transactions after the target's
 * linking tree up to the target itself.
 */
export function verifyDualProof(
	proof: DualProof,
	sourceTxId: number,
	targetTxId: number,
	sourceAlh: Digest,
	targetAlh: Digest,
): boolean {
	assertProof(proof !== undefined && proof !== null, "missing dual proof")
	assertMetadata(proof.sourceTxMetadata, "source")
	assertMetadata(proof.targetTxMetadata, "target")
	assertProof(isTxId(sourceTxId) && sourceTxId > 0, "source transaction id must be positive")
	assertProof(isTxId(targetTxId) && sourceTxId <= targetTxId, "source transaction is newer than target")
	assertProof(isDigest(proof.targetBlTxAlh), "invalid target linking tree alh")

	const source: TxMetadata = proof.sourceTxMetadata
	const target: TxMetadata = proof.targetTxMetadata

	if (source.id !== sourceTxId || target.id !== targetTxId) {
		return false
	}

	if (!equalDigests(alh(source), sourceAlh) || !equalDigests(alh(target), targetAlh)) {
		return false
	}

	if (sourceTxId < target.blTxId) {
		const inclusionProof = { leafIndex: sourceTxId - 1, treeSize: target.blTxId, auditPath: proof.inclusionProof }
		if (!verifyInclusion(inclusionProof, sourceAlh, target.blRoot)) {
			return false
		}
	}

	if (source.blTxId > target.blTxId) {
		return false
	}

	if (source.blTxId > 0) {
		const consistent = verifyConsistency(
			proof.consistencyProof,
			source.blTxId,
			target.blTxId,
			source.blRoot,
			target.blRoot,
		)

		if (!consistent) {
			return false
		}
	}

	if (target.blTxId > 0) {
		if (!verifyLastInclusion(proof.lastInclusionProof, target.blTxId, proof.targetBlTxAlh, target.blRoot)) {
			return false
		}
	}

	if (sourceTxId < target.blTxId) {
		return verifyLinearProof(proof.linearProof, target.blTxId, targetTxId, proof.targetBlTxAlh, targetAlh)
	} else {
		return verifyLinearProof(proof.linearProof, sourceTxId, targetTxId, sourceAlh, targetAlh)
	}
}
