import type { StateStore, TrustState } from "./interface.js"

function copyState({ database, txId, txHash, signature }: TrustState): TrustState {
	const state: TrustState = { database, txId, txHash: new Uint8Array(txHash) }
	if (signature !== undefined) {
		state.signature = new Uint8Array(signature)
	}

	return state
}

/** Process-lifetime state store. States are copied in and out. */
export class MemoryStateStore implements StateStore {
	#states = new Map<string, TrustState>()

	private static getKey(server: string, database: string) {
		return JSON.stringify([server, database])
	}

	public get(server: string, database: string): TrustState | null {
		const state = this.#states.get(MemoryStateStore.getKey(server, database))
		return state === undefined ? null : copyState(state)
	}

	public set(server: string, database: string, state: TrustState): void {
		this.#states.set(MemoryStateStore.getKey(server, database), copyState(state))
	}

	public close(): void {
		this.#states.clear()
	}
}
