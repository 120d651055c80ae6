import PQueue from "p-queue"
import type { KeyObject } from "node:crypto"

import type { StateStore, TrustState } from "./interface.js"
import { DIGEST_SIZE } from "./constants.js"
import { SignatureInvalidError } from "./errors.js"
import { logger } from "./logger.js"
import { loadPublicKey, verifyStateSignature } from "./signature.js"
import { isDigest, isTxId } from "./utils.js"

export interface StateCacheOptions {
	serverIdentity: string
	/** PEM-encoded public key; when present every accepted state must carry a valid signature */
	publicKey?: string
}

export const emptyState = (database: string): TrustState => ({
	database,
	txId: 0,
	txHash: new Uint8Array(DIGEST_SIZE),
})

/**
 * StateCache holds the highest verified state per database for one server.
 * Reads and writes share a single queue, so the monotonic check in `set`
 * and the write that follows it happen atomically.
 */
export class StateCache {
	public readonly serverIdentity: string

	private readonly log = logger("ledgerproof:cache")

	#queue = new PQueue({ concurrency: 1 })
	#publicKey: KeyObject | null = null
	#open = true

	public constructor(
		private readonly store: StateStore,
		options: StateCacheOptions,
	) {
		this.serverIdentity = options.serverIdentity
		if (options.publicKey !== undefined) {
			this.loadPublicKey(options.publicKey)
		}
	}

	public get hasPublicKey(): boolean {
		return this.#publicKey !== null
	}

	public loadPublicKey(pem: string): void {
		this.#publicKey = loadPublicKey(pem)
		this.log("loaded public key for %s", this.serverIdentity)
	}

	/**
	 * Check a state's signature against the configured public key.
	 * Always passes when no key is configured.
	 */
	public verifySignature(state: TrustState): boolean {
		return this.#publicKey === null || verifyStateSignature(this.#publicKey, state)
	}

	public async get(database: string): Promise<TrustState> {
		this.assertOpen()
		return await this.#queue.add(
			async () => {
				const state = await this.store.get(this.serverIdentity, database)
				return state ?? emptyState(database)
			},
			{ throwOnTimeout: true },
		)
	}

	/**
	 * Offer a newer state. Resolves to false, leaving the stored state in place,
	 * when the stored txId is already at or beyond the offered one.
	 */
	public async set(database: string, state: TrustState): Promise<boolean> {
		this.assertOpen()

		if (state.database !== database) {
			throw new Error(`state belongs to database ${state.database}, not ${database}`)
		} else if (!isTxId(state.txId) || state.txId === 0 || !isDigest(state.txHash)) {
			throw new TypeError("invalid trust state")
		} else if (!this.verifySignature(state)) {
			throw new SignatureInvalidError(`invalid signature for state ${database}@${state.txId}`)
		}

		return await this.#queue.add(
			async () => {
				const current = await this.store.get(this.serverIdentity, database)
				if (current !== null && state.txId <= current.txId) {
					this.log("rejected stale state %t (current %t)", state, current)
					return false
				}

				await this.store.set(this.serverIdentity, database, state)
				this.log("advanced %t", state)
				return true
			},
			{ throwOnTimeout: true },
		)
	}

	public async close(): Promise<void> {
		this.#open = false
		await this.#queue.onIdle()
		await this.store.close()
	}

	private assertOpen() {
		if (this.#open === false) {
			throw new Error("state cache closed")
		}
	}
}
