import { sha256 } from "@noble/hashes/sha256"

import type { Digest, InclusionProof } from "./interface.js"
import { NODE_PREFIX, ZERO_DIGEST } from "./constants.js"
import { assertProof } from "./errors.js"
import { equalDigests, isDigest } from "./utils.js"

// Leaves are entry digests or alh values. Neither encoding can start with NODE_PREFIX
// and be exactly 65 bytes long, so the leaf and node preimages stay disjoint.

export function hashNode(left: Digest, right: Digest): Digest {
	const hash = sha256.create()
	hash.update(new Uint8Array([NODE_PREFIX]))
	hash.update(left)
	hash.update(right)
	return hash.digest()
}

/** Largest power of two strictly less than n, for n > 1. */
export function split(n: number): number {
	let k = 1
	while (k * 2 < n) {
		k *= 2
	}

	return k
}

const isOdd = (n: number) => n % 2 === 1
const isPowerOfTwo = (n: number) => n > 0 && split(n + 1) === n
const half = (n: number) => Math.floor(n / 2)

/**
 * Merkle Tree Hash over an ordered list of leaves.
 * The empty tree hashes to the zero digest.
 */
export function computeRoot(leaves: Digest[]): Digest {
	if (leaves.length === 0) {
		return ZERO_DIGEST
	} else if (leaves.length === 1) {
		return leaves[0]
	}

	const k = split(leaves.length)
	return hashNode(computeRoot(leaves.slice(0, k)), computeRoot(leaves.slice(k)))
}

function assertInclusionProof({ leafIndex, treeSize, auditPath }: InclusionProof) {
	assertProof(Number.isSafeInteger(treeSize) && treeSize > 0, "tree size must be a positive integer")
	assertProof(Number.isSafeInteger(leafIndex) && leafIndex >= 0, "leaf index must be a non-negative integer")
	assertProof(leafIndex < treeSize, "leaf index out of range")
	assertProof(Array.isArray(auditPath) && auditPath.every(isDigest), "invalid audit path")
}

/**
 * Walk the audit path from the leaf to the root.
 * Returns null if the path does not fit the tree shape.
 */
export function evaluateInclusion(proof: InclusionProof, leafDigest: Digest): Digest | null {
	assertInclusionProof(proof)
	assertProof(isDigest(leafDigest), "invalid leaf digest")

	let fn = proof.leafIndex
	let sn = proof.treeSize - 1
	let r = leafDigest

	for (const p of proof.auditPath) {
		if (sn === 0) {
			return null
		}

		if (isOdd(fn) || fn === sn) {
			r = hashNode(p, r)
			if (!isOdd(fn)) {
				while (!isOdd(fn) && fn !== 0) {
					fn = half(fn)
					sn = half(sn)
				}
			}
		} else {
			r = hashNode(r, p)
		}

		fn = half(fn)
		sn = half(sn)
	}

	return sn === 0 ? r : null
}

export function verifyInclusion(proof: InclusionProof, leafDigest: Digest, expectedRoot: Digest): boolean {
	const root = evaluateInclusion(proof, leafDigest)
	return root !== null && equalDigests(root, expectedRoot)
}

/** Inclusion of the rightmost leaf of a tree. */
export function verifyLastInclusion(auditPath: Digest[], treeSize: number, leafDigest: Digest, root: Digest): boolean {
	return verifyInclusion({ leafIndex: treeSize - 1, treeSize, auditPath }, leafDigest, root)
}

/**
 * Check that the tree of size `firstSize` with root `firstRoot` is a prefix
 * of the tree of size `secondSize` with root `secondRoot`.
 */
export function verifyConsistency(
	path: Digest[],
	firstSize: number,
	secondSize: number,
	firstRoot: Digest,
	secondRoot: Digest,
): boolean {
	assertProof(Number.isSafeInteger(firstSize) && firstSize > 0, "first tree size must be a positive integer")
	assertProof(Number.isSafeInteger(secondSize) && secondSize >= firstSize, "second tree is smaller than the first")
	assertProof(Array.isArray(path) && path.every(isDigest), "invalid consistency path")
	assertProof(isDigest(firstRoot) && isDigest(secondRoot), "invalid tree root")

	if (firstSize === secondSize) {
		return path.length === 0 && equalDigests(firstRoot, secondRoot)
	}

	// the first root is itself a node of the second tree when firstSize is a power of two
	const terms = isPowerOfTwo(firstSize) ? [firstRoot, ...path] : path
	if (terms.length === 0) {
		return false
	}

	let fn = firstSize - 1
	let sn = secondSize - 1
	while (isOdd(fn)) {
		fn = half(fn)
		sn = half(sn)
	}

	let fr = terms[0]
	let sr = terms[0]
	for (const c of terms.slice(1)) {
		if (sn === 0) {
			return false
		}

		if (isOdd(fn) || fn === sn) {
			fr = hashNode(c, fr)
			sr = hashNode(c, sr)
			if (!isOdd(fn)) {
				while (!isOdd(fn) && fn !== 0) {
					fn = half(fn)
					sn = half(sn)
				}
			}
		} else {
			sr = hashNode(sr, c)
		}

		fn = half(fn)
		sn = half(sn)
	}

	return sn === 0 && equalDigests(fr, firstRoot) && equalDigests(sr, secondRoot)
}
