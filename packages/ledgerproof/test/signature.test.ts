import test from "ava"
import { generateKeyPairSync, sign } from "node:crypto"

import { encodeState, loadPublicKey, verifyStateSignature, type TrustState } from "ledgerproof"

const state: TrustState = { database: "db", txId: 1, txHash: new Uint8Array(32).fill(7) }

test("signed state layout", (t) => {
	const expected = new Uint8Array(46)
	expected.set([0, 0, 0, 2, 0x64, 0x62, 0, 0, 0, 0, 0, 0, 0, 1])
	expected.fill(7, 14)
	t.deepEqual(encodeState(state), expected)
})

test("verify a state signature", (t) => {
	const { privateKey, publicKey } = generateKeyPairSync("ec", { namedCurve: "P-256" })
	const key = loadPublicKey(publicKey.export({ type: "spki", format: "pem" }).toString())
	const signature = new Uint8Array(sign("sha256", encodeState(state), privateKey))

	t.true(verifyStateSignature(key, { ...state, signature }))
	t.false(verifyStateSignature(key, state))
	t.false(verifyStateSignature(key, { ...state, signature: new Uint8Array([]) }))
	t.false(verifyStateSignature(key, { ...state, txId: 2, signature }))
	t.false(verifyStateSignature(key, { ...state, database: "dc", signature }))
	t.false(verifyStateSignature(key, { ...state, signature: new Uint8Array([1, 2, 3]) }))
})

test("only EC public keys are accepted", (t) => {
	const { publicKey } = generateKeyPairSync("ed25519")
	const pem = publicKey.export({ type: "spki", format: "pem" }).toString()
	t.throws(() => loadPublicKey(pem), { instanceOf: TypeError, message: "expected an EC public key, got ed25519" })
	t.throws(() => loadPublicKey("not a key"))
})
