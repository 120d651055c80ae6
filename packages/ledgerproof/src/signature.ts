import { createPublicKey, verify, type KeyObject } from "node:crypto"
import { fromString } from "uint8arrays"

import type { TrustState } from "./interface.js"
import { logger } from "./logger.js"
import { Writer } from "./utils.js"

const log = logger("ledgerproof:signature")

/** The bytes a server signs for a state: len(database) ‖ database ‖ txId ‖ txHash. */
export function encodeState({ database, txId, txHash }: Pick<TrustState, "database" | "txId" | "txHash">): Uint8Array {
	return new Writer().field(fromString(database, "utf8")).uint64(txId).bytes(txHash).finish()
}

/** Parse a PEM-encoded (SPKI) ECDSA public key. Throws on invalid input. */
export function loadPublicKey(pem: string): KeyObject {
	const key = createPublicKey(pem)
	if (key.asymmetricKeyType !== "ec") {
		throw new TypeError(`expected an EC public key, got ${key.asymmetricKeyType}`)
	}

	return key
}

/** Check a DER-encoded ECDSA/SHA-256 signature over the encoded state. */
export function verifyStateSignature(publicKey: KeyObject, state: TrustState): boolean {
	if (state.signature === undefined || state.signature.byteLength === 0) {
		return false
	}

	try {
		return verify("sha256", encodeState(state), publicKey, state.signature)
	} catch (err) {
		log("signature verification failed for %t: %O", state, err)
		return false
	}
}
