/**
 * Merkle Root — Pure Model & Schema
 *
 * This module contains:
 * - Entity schemas (Digest, Block, DigestLayer, RootSummary)
 * - Configuration schema shared by the hashing and padding capabilities
 * - Tagged errors raised by the root computation
 * - No side effects, no async logic, no logging
 *
 */

import { Chunk, Schema } from "effect";
import * as Primitives from "./primitives";

// ============================================================================
// DIGESTS & BLOCKS
// ============================================================================

/**
 * Lowercase hex without `0x`, whole bytes only.
 * The width is decided by the hash algorithm, never by the tree.
 */
export const DigestSchema = Schema.String.pipe(
  Schema.pattern(/^(?:[a-f0-9]{2})+$/),
  Schema.brand("Digest")
);

export type Digest = typeof DigestSchema.Type;

export const BlockSchema = Schema.String;

export type Block = typeof BlockSchema.Type;

/**
 * One horizontal level of the implicit tree
 */
export const DigestLayerSchema = Schema.NonEmptyChunk(DigestSchema);

export type DigestLayer = typeof DigestLayerSchema.Type;

// ============================================================================
// CONFIGURATION
// ============================================================================

export const HashAlgorithmSchema = Schema.Literal(
  "keccak256",
  "sha256",
  "fnv1a64"
);

export type HashAlgorithm = typeof HashAlgorithmSchema.Type;

/**
 * What to do when there are no blocks at all:
 * - fail: raise `EmptyInputError`
 * - filler: build a one-leaf tree out of the filler value
 */
export const EmptyInputPolicySchema = Schema.Literal("fail", "filler");

export type EmptyInputPolicy = typeof EmptyInputPolicySchema.Type;

export const MerkleSettingsSchema = Schema.Struct({
  algorithm: HashAlgorithmSchema,
  filler: BlockSchema,
  emptyInput: EmptyInputPolicySchema,
});

export type MerkleSettings = typeof MerkleSettingsSchema.Type;

export const defaultMerkleSettings: MerkleSettings = MerkleSettingsSchema.make({
  algorithm: "keccak256",
  filler: "",
  emptyInput: "fail",
});

// ============================================================================
// SUMMARY
// ============================================================================

export const RootSummarySchema = Schema.Struct({
  root: DigestSchema,
  algorithm: HashAlgorithmSchema,
  // blocks supplied by the caller, before padding
  blockCount: Primitives.NonNegativeIntSchema,
  leafCount: Primitives.PositiveIntSchema,
  rounds: Primitives.NonNegativeIntSchema,
});

export type RootSummary = typeof RootSummarySchema.Type;

// ============================================================================
// ERRORS
// ============================================================================

export class EmptyInputError extends Schema.TaggedError<EmptyInputError>()(
  "EmptyInputError",
  {
    message: Schema.String,
  }
) {}

export class MalformedLayerError extends Schema.TaggedError<MalformedLayerError>()(
  "MalformedLayerError",
  {
    message: Schema.String,
    length: Primitives.NonNegativeIntSchema,
  }
) {}

export type MerkleRootError = EmptyInputError | MalformedLayerError;

// ============================================================================
// CONSTRUCTORS
// ============================================================================

/**
 * Create a digest from its hex text, with or without a `0x` prefix
 */
export const makeDigest = (hex: string): Digest =>
  DigestSchema.make(
    (hex.startsWith("0x") ? hex.slice(2) : hex).toLowerCase()
  );

/**
 * Create a root summary
 */
export const makeRootSummary = (props: RootSummary): RootSummary =>
  RootSummarySchema.make({ ...props });

/**
 * Create a layer from its digests, left to right
 */
export const makeDigestLayer = (
  first: Digest,
  ...rest: ReadonlyArray<Digest>
): DigestLayer => Chunk.make(first, ...rest);
