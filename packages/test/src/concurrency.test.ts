import test from "ava"
import { setTimeout } from "node:timers/promises"

import { LedgerClient } from "ledgerproof"

import { MemoryLedger } from "./ledger.js"
import { DATABASE, encode, seed } from "./utils.js"

const range = (start: number, end: number) => Array.from({ length: end - start }, (_, i) => start + i)

test("concurrent writes never move the anchor backwards", async (t) => {
	const ledger = new MemoryLedger({ latency: () => Math.floor(Math.random() * 8) })
	seed(ledger, [["a", "1"]])

	const client = new LedgerClient(ledger)
	await client.setState(ledger.getState(DATABASE, 1))

	const observed: number[] = []
	let done = false
	const poll = async () => {
		while (!done) {
			observed.push((await client.getState()).txId)
			await setTimeout(1)
		}
	}

	const polling = poll()

	const writes = Array.from({ length: 20 }, (_, i) => client.verifiedSet(encode(`key-${i}`), encode(`value-${i}`)))
	const reads = Array.from({ length: 5 }, () => client.verifiedGet(encode("a")))
	const results = await Promise.all(writes)
	await Promise.all(reads)

	done = true
	await polling

	t.deepEqual(results.map(({ transactionId }) => transactionId).sort((a, b) => a - b), range(2, 22))
	for (let i = 1; i < observed.length; i++) {
		t.true(observed[i - 1] <= observed[i], `observed ${observed[i - 1]} before ${observed[i]}`)
	}

	const state = await client.getState()
	t.is(state.txId, 21)
	t.deepEqual(state.txHash, ledger.getLog(DATABASE).getAlh(21))
})
