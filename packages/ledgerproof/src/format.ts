import debug from "debug"
import { toString } from "uint8arrays"

import type { TrustState } from "./interface.js"

export const formatBytes = (bytes: Uint8Array | null | undefined) => (bytes ? toString(bytes, "hex") : "null")

export const formatState = (state: TrustState | null) =>
	state ? `{ ${state.database}@${state.txId} | ${toString(state.txHash, "hex")} }` : "null"

debug.formatters.h = formatBytes
debug.formatters.t = formatState

export { debug }
