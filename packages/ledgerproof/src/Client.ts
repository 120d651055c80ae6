import type {
	Digest,
	EntrySpec,
	InclusionProof,
	LedgerService,
	StateStore,
	TrustState,
	TxMetadata,
	VerifiableTx,
	VerifiedEntry,
	VerifiedTx,
	VerifiedWrite,
} from "./interface.js"
import { DEFAULT_DATABASE } from "./constants.js"
import { entryDigest, plainEntry, referenceEntry, zaddEntry } from "./encoding.js"
import { SignatureInvalidError, Stage, TamperDetectedError, assertProof } from "./errors.js"
import { logger } from "./logger.js"
import { computeRoot } from "./merkle.js"
import { MemoryStateStore } from "./MemoryStateStore.js"
import { StateCache } from "./StateCache.js"
import { equalDigests } from "./utils.js"
import { type Direction, checkDual, checkInclusion, checkMetadata, nextState, resolveDirection } from "./verify.js"

export interface ClientOptions {
	database?: string
	/** Namespace for cached states; defaults to the service's identity */
	serverIdentity?: string
	/** PEM-encoded ECDSA public key used to check server-signed states */
	publicKey?: string
	store?: StateStore
}

export interface GetOptions {
	atTx?: number
	sinceTx?: number
	atRevision?: number
}

/**
 * LedgerClient wraps a LedgerService with client-side verification.
 * Each verified call loads the trusted state, makes one request proving against it,
 * recomputes digests locally, checks the inclusion and dual proofs, and only then
 * advances the trusted state. Any failure leaves the cache untouched.
 */
export class LedgerClient {
	public readonly cache: StateCache

	private readonly log = logger("ledgerproof:client")

	#database: string

	public constructor(
		private readonly service: LedgerService,
		options: ClientOptions = {},
	) {
		const { database = DEFAULT_DATABASE, serverIdentity = service.identity, publicKey, store } = options
		this.#database = database
		this.cache = new StateCache(store ?? new MemoryStateStore(), { serverIdentity, publicKey })
	}

	public get database(): string {
		return this.#database
	}

	/** Switch the database later calls verify against. Each database keeps its own trusted state. */
	public useDatabase(database: string): void {
		this.log("switching from %s to %s", this.#database, database)
		this.#database = database
	}

	public loadPublicKey(pem: string): void {
		this.cache.loadPublicKey(pem)
	}

	public getState(): Promise<TrustState> {
		return this.cache.get(this.#database)
	}

	public setState(state: TrustState): Promise<boolean> {
		return this.cache.set(this.#database, state)
	}

	/**
	 * Fetch the server's current state. If nothing is trusted yet for this
	 * database, the state becomes the trust anchor (trust on first use).
	 * Resolves to the trusted state, which only verified calls move after that.
	 */
	public async currentState(): Promise<TrustState> {
		const database = this.#database
		const state = await this.service.currentState(database)
		if (state.database !== database) {
			throw new TamperDetectedError(`server returned a state for ${state.database}`, Stage.RequestSent)
		} else if (!this.cache.verifySignature(state)) {
			throw new SignatureInvalidError(`invalid signature for state ${database}@${state.txId}`)
		}

		const trusted = await this.cache.get(database)
		if (trusted.txId === 0 && state.txId > 0) {
			this.log("bootstrapping %s from %t", database, state)
			await this.cache.set(database, state)
		}

		return await this.cache.get(database)
	}

	public async verifiedGet(key: Uint8Array, options: GetOptions = {}): Promise<VerifiedEntry> {
		const database = this.#database
		const state = await this.cache.get(database)
		this.log("%s: verifiedGet(%h) against %t", Stage.AnchorLoaded, key, state)

		const request = { ...options, key, proveSinceTx: state.txId }
		const { entry, inclusionProof, verifiableTx } = await this.service.verifiableGet(database, request)
		this.log("verifiedGet(%h): received entry in transaction %d", key, entry.tx)

		const { referencedBy } = entry

		let stored: EntrySpec
		let txId: number
		if (referencedBy === undefined || referencedBy.key.byteLength === 0) {
			stored = plainEntry(key, entry.value)
			txId = entry.tx
		} else {
			stored = referenceEntry(key, entry.key, referencedBy.atTx)
			txId = referencedBy.tx
		}

		if (options.atTx !== undefined && options.atTx > 0 && txId !== options.atTx) {
			throw new TamperDetectedError(`requested transaction ${options.atTx}, got ${txId}`, Stage.RequestSent)
		}

		const metadata = await this.verifyEntry(database, state, txId, entryDigest(stored), inclusionProof, verifiableTx)

		// a plain digest covers the requested key, a reference digest covers the referred key
		const result: VerifiedEntry = {
			key: referencedBy !== undefined && referencedBy.key.byteLength > 0 ? entry.key : key,
			value: entry.value,
			transactionId: txId,
			timestamp: metadata.ts,
			verified: true,
		}

		if (referencedBy !== undefined && referencedBy.key.byteLength > 0) {
			result.referencedKey = referencedBy.key
		}

		return result
	}

	public verifiedGetAt(key: Uint8Array, atTx: number): Promise<VerifiedEntry> {
		return this.verifiedGet(key, { atTx })
	}

	public verifiedGetSince(key: Uint8Array, sinceTx: number): Promise<VerifiedEntry> {
		return this.verifiedGet(key, { sinceTx })
	}

	public verifiedGetAtRevision(key: Uint8Array, atRevision: number): Promise<VerifiedEntry> {
		return this.verifiedGet(key, { atRevision })
	}

	public async verifiedSet(key: Uint8Array, value: Uint8Array): Promise<VerifiedWrite> {
		const database = this.#database
		const state = await this.cache.get(database)
		this.log("%s: verifiedSet(%h, %h) against %t", Stage.AnchorLoaded, key, value, state)

		const response = await this.service.verifiableSet(database, { key, value, proveSinceTx: state.txId })
		const leaf = entryDigest(plainEntry(key, value))
		return await this.verifyWrite(database, state, leaf, response)
	}

	/** Write `key` as a reference to `referredKey` as of `atTx` (0 for its latest value). */
	public async verifiedSetReference(referredKey: Uint8Array, key: Uint8Array, atTx = 0): Promise<VerifiedWrite> {
		const database = this.#database
		const state = await this.cache.get(database)
		this.log("%s: verifiedSetReference(%h -> %h @ %d) against %t", Stage.AnchorLoaded, key, referredKey, atTx, state)

		const request = { key, referredKey, atTx, proveSinceTx: state.txId }
		const response = await this.service.verifiableSetReference(database, request)
		const leaf = entryDigest(referenceEntry(key, referredKey, atTx))
		return await this.verifyWrite(database, state, leaf, response)
	}

	public async verifiedZAdd(set: Uint8Array, score: number, key: Uint8Array, atTx = 0): Promise<VerifiedWrite> {
		const database = this.#database
		const state = await this.cache.get(database)
		this.log("%s: verifiedZAdd(%h, %d, %h) against %t", Stage.AnchorLoaded, set, score, key, state)

		const request = { set, score, key, atTx, proveSinceTx: state.txId }
		const response = await this.service.verifiableZAdd(database, request)
		const leaf = entryDigest(zaddEntry(set, score, key, atTx))
		return await this.verifyWrite(database, state, leaf, response)
	}

	public async verifiedTxById(txId: number): Promise<VerifiedTx> {
		const database = this.#database
		const state = await this.cache.get(database)
		this.log("%s: verifiedTxById(%d) against %t", Stage.AnchorLoaded, txId, state)

		const { tx, entries, verifiableTx } = await this.service.verifiableTxById(database, {
			tx: txId,
			proveSinceTx: state.txId,
		})

		if (tx !== txId) {
			throw new TamperDetectedError(`requested transaction ${txId}, got ${tx}`, Stage.RequestSent)
		}

		assertProof(Array.isArray(entries), "missing transaction entries")
		const leaves = entries.map(entryDigest)

		const metadata = await this.verifyTransaction(database, state, txId, verifiableTx, (direction) => {
			const { nentries, eH } = direction.metadata
			if (nentries !== leaves.length || !equalDigests(computeRoot(leaves), eH)) {
				throw new TamperDetectedError(`entries do not match transaction ${txId}`, Stage.InclusionVerified)
			}
		})

		return { transactionId: txId, timestamp: metadata.ts, entries, verified: true }
	}

	public async close(): Promise<void> {
		await this.cache.close()
	}

	private async verifyWrite(
		database: string,
		state: TrustState,
		leaf: Digest,
		response: { tx: number; inclusionProof: InclusionProof; verifiableTx: VerifiableTx },
	): Promise<VerifiedWrite> {
		const { tx, inclusionProof, verifiableTx } = response
		const metadata = await this.verifyEntry(database, state, tx, leaf, inclusionProof, verifiableTx)
		return { transactionId: tx, timestamp: metadata.ts, verified: true }
	}

	private verifyEntry(
		database: string,
		state: TrustState,
		txId: number,
		leaf: Digest,
		inclusionProof: InclusionProof,
		verifiableTx: VerifiableTx,
	): Promise<TxMetadata> {
		return this.verifyTransaction(database, state, txId, verifiableTx, (direction) =>
			checkInclusion(inclusionProof, leaf, direction),
		)
	}

	private async verifyTransaction(
		database: string,
		state: TrustState,
		txId: number,
		verifiableTx: VerifiableTx,
		checkEntries: (direction: Direction) => void,
	): Promise<TxMetadata> {
		assertProof(verifiableTx !== undefined && verifiableTx !== null, "missing verifiable transaction")

		const direction = resolveDirection(state, txId, verifiableTx.dualProof)
		checkMetadata(direction, txId)
		this.log("%s: digest recomputed for transaction %d", Stage.DigestRecomputed, txId)

		checkEntries(direction)
		this.log("%s: transaction %d", Stage.InclusionVerified, txId)

		checkDual(state, direction, verifiableTx.dualProof)
		this.log("%s: %d -> %d", Stage.DualVerified, direction.sourceTxId, direction.targetTxId)

		const next = nextState(database, direction, verifiableTx)
		if (!this.cache.verifySignature(next)) {
			throw new SignatureInvalidError(`invalid signature for state ${database}@${next.txId}`)
		}

		if (await this.cache.set(database, next)) {
			this.log("%s: %t", Stage.AnchorAdvanced, next)
		}

		return direction.metadata
	}
}
