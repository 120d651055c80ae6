import { equals } from "uint8arrays"

import type { Digest } from "./interface.js"
import { DIGEST_SIZE, MAX_UINT32 } from "./constants.js"

export function assert(condition: unknown, message?: string): asserts condition {
	if (!condition) {
		throw new Error(message ?? "Internal error")
	}
}

export const isDigest = (value: unknown): value is Digest =>
	value instanceof Uint8Array && value.byteLength === DIGEST_SIZE

export const isTxId = (value: unknown): value is number =>
	typeof value === "number" && Number.isSafeInteger(value) && value >= 0

export function equalDigests(a: Digest, b: Digest): boolean {
	return a.byteLength === DIGEST_SIZE && equals(a, b)
}

/**
 * Writer accumulates big-endian length-prefixed fields into a single buffer.
 * Every integer is written with a fixed width so concatenated fields stay unambiguous.
 */
export class Writer {
	private readonly chunks: Uint8Array[] = []
	private length = 0

	public uint8(value: number): this {
		return this.push(new Uint8Array([value]))
	}

	public uint32(value: number): this {
		assert(Number.isInteger(value) && value >= 0 && value <= MAX_UINT32, "expected a 32-bit unsigned integer")
		const buffer = new ArrayBuffer(4)
		new DataView(buffer).setUint32(0, value)
		return this.push(new Uint8Array(buffer))
	}

	public uint64(value: number): this {
		assert(Number.isSafeInteger(value) && value >= 0, "expected a non-negative safe integer")
		const buffer = new ArrayBuffer(8)
		new DataView(buffer).setBigUint64(0, BigInt(value))
		return this.push(new Uint8Array(buffer))
	}

	public float64(value: number): this {
		const buffer = new ArrayBuffer(8)
		new DataView(buffer).setFloat64(0, value)
		return this.push(new Uint8Array(buffer))
	}

	public bytes(value: Uint8Array): this {
		return this.push(value)
	}

	/** write a u32 length prefix followed by the bytes */
	public field(value: Uint8Array): this {
		return this.uint32(value.byteLength).push(value)
	}

	public finish(): Uint8Array {
		const result = new Uint8Array(new ArrayBuffer(this.length))
		let offset = 0
		for (const chunk of this.chunks) {
			result.set(chunk, offset)
			offset += chunk.byteLength
		}

		return result
	}

	private push(chunk: Uint8Array): this {
		this.chunks.push(chunk)
		this.length += chunk.byteLength
		return this
	}
}
