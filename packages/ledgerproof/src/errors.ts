/**
 * Stages of a verified operation, in the order they are reached.
 * Errors raised during verification record the stage that failed.
 */
export enum Stage {
	AnchorLoaded = "ANCHOR_LOADED",
	RequestSent = "REQUEST_SENT",
	DigestRecomputed = "DIGEST_RECOMPUTED",
	InclusionVerified = "INCLUSION_VERIFIED",
	DualVerified = "DUAL_VERIFIED",
	AnchorAdvanced = "ANCHOR_ADVANCED",
}

/**
 * The server returned data or proofs that do not match what the client recomputed.
 * Indicates server misbehaviour or an active attack; never retried.
 */
export class TamperDetectedError extends Error {
	public readonly name = "TamperDetectedError"

	constructor(
		message: string,
		public readonly stage: Stage,
	) {
		super(message)
	}
}

/** A proof is structurally invalid (index out of range, missing or mis-sized fields). */
export class MalformedProofError extends Error {
	public readonly name = "MalformedProofError"
}

/** A public key is configured and a state's signature is missing or does not verify. */
export class SignatureInvalidError extends Error {
	public readonly name = "SignatureInvalidError"
}

export function assertProof(condition: unknown, message: string): asserts condition {
	if (!condition) {
		throw new MalformedProofError(message)
	}
}
