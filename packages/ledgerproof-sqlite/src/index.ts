import type * as sqlite from "better-sqlite3"
import Database from "better-sqlite3"

import { type StateStore, type TrustState, isDigest, logger } from "ledgerproof"

type StateRecord = { tx_id: number; tx_hash: Uint8Array; signature: Uint8Array | null }

/**
 * Persistent trust-anchor storage. States are keyed by (server, database)
 * so trust survives process restarts without leaking between servers.
 */
export class SqliteStateStore implements StateStore {
	private readonly db: sqlite.Database
	private readonly log = logger("ledgerproof:sqlite")
	private readonly statements: {
		select: sqlite.Statement<{ server: string; database: string }>
		upsert: sqlite.Statement<{
			server: string
			database: string
			tx_id: number
			tx_hash: Uint8Array
			signature: Uint8Array | null
		}>
	}

	constructor(path: string | null = null) {
		this.db = new Database(path ?? ":memory:")

		this.db.exec(
			`CREATE TABLE IF NOT EXISTS states (
				server TEXT NOT NULL,
				database TEXT NOT NULL,
				tx_id INTEGER NOT NULL,
				tx_hash BLOB NOT NULL,
				signature BLOB,
				PRIMARY KEY (server, database)
			)`,
		)

		this.statements = {
			select: this.db.prepare(
				`SELECT tx_id, tx_hash, signature FROM states WHERE server = :server AND database = :database`,
			),
			upsert: this.db.prepare(
				`INSERT INTO states (server, database, tx_id, tx_hash, signature)
				VALUES (:server, :database, :tx_id, :tx_hash, :signature)
				ON CONFLICT (server, database) DO UPDATE SET
					tx_id = excluded.tx_id, tx_hash = excluded.tx_hash, signature = excluded.signature`,
			),
		}
	}

	public get(server: string, database: string): TrustState | null {
		const row = this.statements.select.get({ server, database }) as StateRecord | undefined
		if (row === undefined) {
			return null
		}

		const txHash = new Uint8Array(row.tx_hash)
		if (!isDigest(txHash)) {
			throw new Error(`corrupt state record for ${server}/${database}`)
		}

		const state: TrustState = { database, txId: row.tx_id, txHash }
		if (row.signature !== null) {
			state.signature = new Uint8Array(row.signature)
		}

		return state
	}

	public set(server: string, database: string, { txId, txHash, signature }: TrustState): void {
		this.log("set %s/%s to %d", server, database, txId)
		this.statements.upsert.run({ server, database, tx_id: txId, tx_hash: txHash, signature: signature ?? null })
	}

	public close(): void {
		this.db.close()
	}
}
