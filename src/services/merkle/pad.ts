import { Chunk, Context, Effect, Either, Layer } from "effect";
import {
  type Block,
  EmptyInputError,
  type MerkleSettings,
} from "../../entities/merkle_root";
import { MerkleConfig } from "./config";

// ============================================================================
// CAPABILITY: MERKLE PAD
// ============================================================================

/**
 * MerklePad capability — balances the base layer to a power-of-two length
 *
 * @category Capabilities
 * @since 0.3.0
 */
export class MerklePad extends Context.Tag("@services/merkle/MerklePad")<
  MerklePad,
  {
    readonly pad: (
      blocks: Chunk.Chunk<Block>
    ) => Either.Either<Chunk.NonEmptyChunk<Block>, EmptyInputError>;
  }
>() {}

export const isPowerOfTwo = (n: number): boolean =>
  Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;

/**
 * Smallest power of two >= n (1 for n <= 1)
 */
export const nextPowerOfTwo = (n: number): number => {
  let size = 1;
  while (size < n) size *= 2;
  return size;
};

/**
 * Pure implementation of pad
 * Fillers are appended after the caller's blocks; a power-of-two input
 * comes back as the same chunk.
 * @internal
 */
export const padPure = (
  blocks: Chunk.Chunk<Block>,
  settings: Pick<MerkleSettings, "filler" | "emptyInput">
): Either.Either<Chunk.NonEmptyChunk<Block>, EmptyInputError> => {
  if (!Chunk.isNonEmpty(blocks))
    return settings.emptyInput === "filler"
      ? Either.right(Chunk.of(settings.filler))
      : Either.left(
          new EmptyInputError({
            message: "Cannot compute a Merkle root without any blocks",
          })
        );

  let padded = blocks;
  while (!isPowerOfTwo(Chunk.size(padded)))
    padded = Chunk.append(padded, settings.filler);

  return Either.right(padded);
};

/**
 * Live implementation of MerklePad
 *
 * @category Services
 * @since 0.3.0
 */
export const MerklePadLive = Layer.effect(
  MerklePad,
  Effect.gen(function* () {
    const config = yield* MerkleConfig;

    return MerklePad.of({
      pad: (blocks) => padPure(blocks, config),
    });
  })
);
