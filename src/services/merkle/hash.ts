/**
 * This module provides the hashing capability the tree is built on.
 * Pure implementations use `ethers` for keccak256 / sha256, plus a 64-bit
 * FNV-1a digest for demonstrations.
 *
 * The tree logic only ever calls `hashBlock` and `concatenateHash`, so
 * swapping the algorithm never touches padding or reduction.
 *
 * @module MerkleService/Hash
 * @since 0.3.0
 */

import { Context, Effect, Layer } from "effect";
import {
  concat,
  getBytes,
  hexlify,
  keccak256 as ethersKeccak256,
  sha256 as ethersSha256,
  toUtf8Bytes,
} from "ethers";
import {
  type Block,
  type Digest,
  type HashAlgorithm,
  makeDigest,
} from "../../entities/merkle_root";
import type { PositiveInt } from "../../entities/primitives";
import { MerkleConfig } from "./config";

// ============================================================================
// PURE IMPLEMENTATIONS
// ============================================================================

export const digestFromBytes = (bytes: Uint8Array): Digest =>
  makeDigest(hexlify(bytes));

/**
 * Canonical byte representation of a digest (big-endian)
 */
export const digestToBytes = (digest: Digest): Uint8Array =>
  getBytes(`0x${digest}`);

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

/**
 * 64-bit FNV-1a. Not collision resistant, not preimage resistant:
 * only for demonstrations and tests.
 * @internal
 */
const fnv1a64Pure = (data: Uint8Array): Digest => {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of data) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return makeDigest(hash.toString(16).padStart(16, "0"));
};

const hashFunctions: Record<
  HashAlgorithm,
  { readonly width: PositiveInt; readonly fn: (data: Uint8Array) => Digest }
> = {
  keccak256: { width: 32, fn: (data) => makeDigest(ethersKeccak256(data)) },
  sha256: { width: 32, fn: (data) => makeDigest(ethersSha256(data)) },
  fnv1a64: { width: 8, fn: fnv1a64Pure },
};

// ============================================================================
// CAPABILITY: HASHING SERVICE
// ============================================================================

/**
 * HashingService capability — fixed-width digests for leaves and branches
 *
 * All operations are deterministic and side-effect free.
 *
 * @category Capabilities
 * @since 0.3.0
 */
export class HashingService extends Context.Tag(
  "@services/merkle/HashingService"
)<
  HashingService,
  {
    readonly algorithm: HashAlgorithm;
    /** digest width in bytes */
    readonly digestWidth: PositiveInt;
    readonly hash: (data: Uint8Array) => Digest;
    readonly hashBlock: (block: Block) => Digest;
    /**
     * hash(bytes(left) || bytes(right)); swapping the arguments changes the result
     */
    readonly concatenateHash: (left: Digest, right: Digest) => Digest;
  }
>() {}

/**
 * Build a HashingService for a fixed algorithm
 *
 * @category Constructors
 * @since 0.3.0
 */
export const makeHashingService = (algorithm: HashAlgorithm) => {
  const { width, fn } = hashFunctions[algorithm];

  return HashingService.of({
    algorithm,
    digestWidth: width,
    hash: fn,
    hashBlock: (block) => fn(toUtf8Bytes(block)),
    concatenateHash: (left, right) =>
      fn(getBytes(concat([digestToBytes(left), digestToBytes(right)]))),
  });
};

/**
 * Live implementation of HashingService, algorithm taken from MerkleConfig
 *
 * @category Services
 * @since 0.3.0
 */
export const HashingServiceLive = Layer.effect(
  HashingService,
  Effect.map(MerkleConfig, (config) => makeHashingService(config.algorithm))
);
