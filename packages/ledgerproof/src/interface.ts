export type Awaitable<T> = Promise<T> | T

/** 32-byte SHA-256 output */
export type Digest = Uint8Array

export type PlainEntry = { type: "plain"; key: Uint8Array; value: Uint8Array }
export type ReferenceEntry = { type: "reference"; key: Uint8Array; referredKey: Uint8Array; atTx: number }

export type EntrySpec = PlainEntry | ReferenceEntry

export type TxMetadata = {
	id: number
	prevAlh: Digest
	ts: number
	nentries: number
	eH: Digest
	blTxId: number
	blRoot: Digest
}

export type InclusionProof = { leafIndex: number; treeSize: number; auditPath: Digest[] }

export type LinearProof = { sourceTxId: number; targetTxId: number; terms: Digest[] }

export type DualProof = {
	sourceTxMetadata: TxMetadata
	targetTxMetadata: TxMetadata
	/** source alh inside the target's binary linking tree */
	inclusionProof: Digest[]
	/** source linking tree to target linking tree */
	consistencyProof: Digest[]
	targetBlTxAlh: Digest
	/** targetBlTxAlh as the last leaf of the target linking tree */
	lastInclusionProof: Digest[]
	linearProof: LinearProof
}

export type TrustState = {
	database: string
	txId: number
	txHash: Digest
	signature?: Uint8Array
}

export type VerifiableTx = { dualProof: DualProof; signature?: Uint8Array }

export type VerifiableEntry = {
	entry: {
		key: Uint8Array
		value: Uint8Array
		tx: number
		referencedBy?: { key: Uint8Array; tx: number; atTx: number }
	}
	inclusionProof: InclusionProof
	verifiableTx: VerifiableTx
}

export type VerifiableWrite = { tx: number; inclusionProof: InclusionProof; verifiableTx: VerifiableTx }

export type VerifiableTxEntries = { tx: number; entries: EntrySpec[]; verifiableTx: VerifiableTx }

export type GetRequest = {
	key: Uint8Array
	atTx?: number
	sinceTx?: number
	atRevision?: number
	proveSinceTx: number
}

export type SetRequest = { key: Uint8Array; value: Uint8Array; proveSinceTx: number }

export type ReferenceRequest = { key: Uint8Array; referredKey: Uint8Array; atTx: number; proveSinceTx: number }

export type ZAddRequest = { set: Uint8Array; score: number; key: Uint8Array; atTx: number; proveSinceTx: number }

export type TxByIdRequest = { tx: number; proveSinceTx: number }

/**
 * The RPC surface a transport adapter provides. Implementations reject with their
 * own transport errors; the client propagates them unchanged.
 */
export interface LedgerService {
	readonly identity: string

	currentState(database: string): Promise<TrustState>
	verifiableGet(database: string, request: GetRequest): Promise<VerifiableEntry>
	verifiableSet(database: string, request: SetRequest): Promise<VerifiableWrite>
	verifiableSetReference(database: string, request: ReferenceRequest): Promise<VerifiableWrite>
	verifiableZAdd(database: string, request: ZAddRequest): Promise<VerifiableWrite>
	verifiableTxById(database: string, request: TxByIdRequest): Promise<VerifiableTxEntries>
}

/** Backing storage for trust anchors, keyed by server identity and database name. */
export interface StateStore {
	get(server: string, database: string): Awaitable<TrustState | null>
	set(server: string, database: string, state: TrustState): Awaitable<void>
	close(): Awaitable<void>
}

export type VerifiedEntry = {
	key: Uint8Array
	value: Uint8Array
	transactionId: number
	timestamp: number
	verified: boolean
	referencedKey?: Uint8Array
}

export type VerifiedWrite = { transactionId: number; timestamp: number; verified: boolean }

export type VerifiedTx = { transactionId: number; timestamp: number; entries: EntrySpec[]; verified: boolean }
