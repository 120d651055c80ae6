import type { Digest, DualProof, InclusionProof, TrustState, TxMetadata, VerifiableTx } from "./interface.js"
import { Stage, TamperDetectedError, assertProof } from "./errors.js"
import { alh, assertMetadata } from "./header.js"
import { verifyDualProof } from "./dual.js"
import { verifyInclusion } from "./merkle.js"
import { isTxId } from "./utils.js"

/**
 * Which side of a dual proof the trusted state sits on.
 * `metadata` is the header of the transaction the response is about.
 */
export type Direction = {
	metadata: TxMetadata
	sourceTxId: number
	sourceAlh: Digest
	targetTxId: number
	targetAlh: Digest
}

/**
 * The trusted state is normally at or behind the response transaction (source = trusted).
 * When another call has already moved the anchor past it, the roles swap and the
 * response transaction becomes the source.
 */
export function resolveDirection(state: TrustState, txId: number, dualProof: DualProof): Direction {
	assertProof(dualProof !== undefined && dualProof !== null, "missing dual proof")
	assertProof(isTxId(txId) && txId > 0, "invalid transaction id")
	assertMetadata(dualProof.sourceTxMetadata, "source")
	assertMetadata(dualProof.targetTxMetadata, "target")

	if (state.txId <= txId) {
		const metadata = dualProof.targetTxMetadata
		return { metadata, sourceTxId: state.txId, sourceAlh: state.txHash, targetTxId: txId, targetAlh: alh(metadata) }
	} else {
		const metadata = dualProof.sourceTxMetadata
		return { metadata, sourceTxId: txId, sourceAlh: alh(metadata), targetTxId: state.txId, targetAlh: state.txHash }
	}
}

/**
 * Check the header of the response transaction before trusting anything it commits to.
 * A header claiming a different transaction id than the one the entry lives in is tampering.
 */
export function checkMetadata(direction: Direction, txId: number): void {
	if (direction.metadata.id !== txId) {
		throw new TamperDetectedError(
			`transaction metadata ${direction.metadata.id} does not match transaction ${txId}`,
			Stage.DigestRecomputed,
		)
	}
}

export function checkInclusion(proof: InclusionProof, leafDigest: Digest, { metadata }: Direction): void {
	if (!verifyInclusion(proof, leafDigest, metadata.eH)) {
		throw new TamperDetectedError(`entry is not included in transaction ${metadata.id}`, Stage.InclusionVerified)
	}
}

/**
 * Run the dual proof between the trusted state and the response transaction.
 * An empty anchor (txId 0) has nothing to extend, so the first state is trusted on first use.
 */
export function checkDual(state: TrustState, direction: Direction, dualProof: DualProof): void {
	if (state.txId === 0) {
		return
	}

	const { sourceTxId, targetTxId, sourceAlh, targetAlh } = direction
	if (!verifyDualProof(dualProof, sourceTxId, targetTxId, sourceAlh, targetAlh)) {
		throw new TamperDetectedError(
			`transaction ${targetTxId} is not an append-only extension of transaction ${sourceTxId}`,
			Stage.DualVerified,
		)
	}
}

/** The state a successful verification advances to. */
export function nextState(database: string, direction: Direction, verifiableTx: VerifiableTx): TrustState {
	const state: TrustState = { database, txId: direction.targetTxId, txHash: direction.targetAlh }
	if (verifiableTx.signature !== undefined && verifiableTx.signature.byteLength > 0) {
		state.signature = verifiableTx.signature
	}

	return state
}
