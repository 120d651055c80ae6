import { generateKeyPairSync, type KeyObject } from "node:crypto"

import { fromString } from "uint8arrays"

import type {
	DualProof,
	LedgerService,
	VerifiableEntry,
	VerifiableTx,
	VerifiableTxEntries,
	VerifiableWrite,
} from "ledgerproof"

import { MemoryLedger } from "./ledger.js"

export const DATABASE = "defaultdb"

export const encode = (value: string) => fromString(value, "utf8")

/** Copy `bytes` with one bit flipped. */
export function flipBit(bytes: Uint8Array, bit = 0): Uint8Array {
	const copy = new Uint8Array(bytes)
	copy[Math.floor(bit / 8)] ^= 1 << bit % 8
	return copy
}

export function generateKeys(): { privateKey: KeyObject; publicKey: string } {
	const { privateKey, publicKey } = generateKeyPairSync("ec", { namedCurve: "P-256" })
	return { privateKey, publicKey: publicKey.export({ type: "spki", format: "pem" }).toString() }
}

/** Commit one transaction per [key, value] pair. */
export function seed(ledger: MemoryLedger, entries: [key: string, value: string][], database = DATABASE) {
	for (const [key, value] of entries) {
		ledger.commit(database, [{ type: "plain", key: encode(key), value: encode(value) }])
	}
}

/** Copy a response with its dual proof rewritten. */
export function mapDualProof<T extends { verifiableTx: VerifiableTx }>(
	response: T,
	map: (proof: DualProof) => DualProof,
): T {
	const { verifiableTx } = response
	return { ...response, verifiableTx: { ...verifiableTx, dualProof: map(verifiableTx.dualProof) } }
}

export interface Interceptors {
	get?: (response: VerifiableEntry) => VerifiableEntry
	write?: (response: VerifiableWrite) => VerifiableWrite
	txById?: (response: VerifiableTxEntries) => VerifiableTxEntries
}

/** A service that rewrites the ledger's responses before the client sees them. */
export function intercept(ledger: MemoryLedger, interceptors: Interceptors): LedgerService {
	const {
		get = (response: VerifiableEntry) => response,
		write = (response: VerifiableWrite) => response,
		txById = (response: VerifiableTxEntries) => response,
	} = interceptors

	return {
		identity: ledger.identity,
		currentState: (database) => ledger.currentState(database),
		verifiableGet: async (database, request) => get(await ledger.verifiableGet(database, request)),
		verifiableSet: async (database, request) => write(await ledger.verifiableSet(database, request)),
		verifiableSetReference: async (database, request) => write(await ledger.verifiableSetReference(database, request)),
		verifiableZAdd: async (database, request) => write(await ledger.verifiableZAdd(database, request)),
		verifiableTxById: async (database, request) => txById(await ledger.verifiableTxById(database, request)),
	}
}
