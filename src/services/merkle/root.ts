import { Chunk, Context, Effect, Layer } from "effect";
import {
  type Block,
  type Digest,
  type DigestLayer,
  type MerkleRootError,
  type RootSummary,
  makeRootSummary,
} from "../../entities/merkle_root";
import { HashingService } from "./hash";
import { MerklePad } from "./pad";
import { LayerReducer } from "./reduce";
import { Tokenizer } from "./tokenize";

// ============================================================================
// CAPABILITY: MERKLE ROOT
// ============================================================================

/**
 * MerkleRoot capability — computes the root digest of a block sequence
 *
 * @category Capabilities
 * @since 0.3.0
 */
export class MerkleRoot extends Context.Tag("@services/merkle/MerkleRoot")<
  MerkleRoot,
  {
    readonly calcRoot: (
      blocks: Chunk.Chunk<Block>
    ) => Effect.Effect<Digest, MerkleRootError>;
    readonly calcRootFromText: (
      input: string
    ) => Effect.Effect<Digest, MerkleRootError>;
    readonly summarize: (
      blocks: Chunk.Chunk<Block>
    ) => Effect.Effect<RootSummary, MerkleRootError>;
  }
>() {}

/**
 * Implementation of summarize
 * pad -> hash leaves -> reduce until a single digest is left
 * @internal
 */
const summarizeWith = (
  blocks: Chunk.Chunk<Block>,
  padder: Context.Tag.Service<MerklePad>,
  reducer: Context.Tag.Service<LayerReducer>,
  hashing: Context.Tag.Service<HashingService>
) =>
  Effect.gen(function* () {
    const padded = yield* padder.pad(blocks);

    let currentLayer: DigestLayer = Chunk.map(padded, (block) =>
      hashing.hashBlock(block)
    );
    let rounds = 0;

    while (Chunk.size(currentLayer) > 1) {
      currentLayer = yield* reducer.reduce(currentLayer);
      rounds++;
    }

    const summary = makeRootSummary({
      root: Chunk.headNonEmpty(currentLayer),
      algorithm: hashing.algorithm,
      blockCount: Chunk.size(blocks),
      leafCount: Chunk.size(padded),
      rounds,
    });

    yield* Effect.logDebug("Computed Merkle root").pipe(
      Effect.annotateLogs({
        blocks: summary.blockCount,
        leaves: summary.leafCount,
        rounds: summary.rounds,
        root: summary.root,
      })
    );

    return summary;
  }).pipe(Effect.withLogSpan("merkle-root"));

/**
 * Live implementation of MerkleRoot
 *
 * @category Services
 * @since 0.3.0
 */
export const MerkleRootLive = Layer.effect(
  MerkleRoot,
  Effect.gen(function* () {
    const padder = yield* MerklePad;
    const reducer = yield* LayerReducer;
    const hashing = yield* HashingService;
    const tokenizer = yield* Tokenizer;

    const summarize = (blocks: Chunk.Chunk<Block>) =>
      summarizeWith(blocks, padder, reducer, hashing);
    const calcRoot = (blocks: Chunk.Chunk<Block>) =>
      Effect.map(summarize(blocks), (summary) => summary.root);

    return MerkleRoot.of({
      calcRoot,
      calcRootFromText: (input) => calcRoot(tokenizer.tokenize(input)),
      summarize,
    });
  })
);
