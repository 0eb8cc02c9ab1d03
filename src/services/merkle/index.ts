export { MerkleConfig, MerkleConfigLive, makeMerkleConfigLayer } from "./config";
export { HashingService, HashingServiceLive, makeHashingService } from "./hash";
export { MerklePad, MerklePadLive } from "./pad";
export { LayerReducer, LayerReducerLive } from "./reduce";
export { Tokenizer, WhitespaceTokenizerLive } from "./tokenize";
export { MerkleRoot, MerkleRootLive } from "./root";
export { MerkleDisplayService, MerkleDisplayServiceLive } from "./display";

/**
 * Merkle Service — Effect-Based Capabilities
 *
 * Capabilities:
 * - MerklePad — balances the base layer with filler blocks
 * - LayerReducer — hashes adjacent pairs into the next layer
 * - MerkleRoot — computes the root of a block sequence
 * - MerkleDisplayService — formats and logs root summaries
 *
 * Dependencies:
 * - HashingService and MerklePad require MerkleConfig
 * - LayerReducer requires HashingService
 *
 * @module MerkleService
 * @since 0.3.0
 */

import { Layer } from "effect";
import type { MerkleSettings } from "../../entities/merkle_root";
import { MerkleConfigLive, makeMerkleConfigLayer } from "./config";
import { HashingServiceLive } from "./hash";
import { MerklePadLive } from "./pad";
import { LayerReducerLive } from "./reduce";
import { WhitespaceTokenizerLive } from "./tokenize";
import { MerkleRootLive } from "./root";
import { MerkleDisplayServiceLive } from "./display";

/**
 * All Merkle service layers combined for convenience
 *
 * Requires: HashingService, MerkleConfig
 *
 * @category Services
 * @since 0.3.0
 */
export const MerkleServiceLive = MerkleRootLive.pipe(
  Layer.provideMerge(
    Layer.mergeAll(MerklePadLive, LayerReducerLive, WhitespaceTokenizerLive)
  ),
  Layer.merge(MerkleDisplayServiceLive)
);

/**
 * Merkle services with hashing and settings read from the environment
 *
 * @category Services
 * @since 0.3.0
 */
export const MerkleLive = MerkleServiceLive.pipe(
  Layer.provideMerge(HashingServiceLive),
  Layer.provideMerge(MerkleConfigLive)
);

/**
 * Merkle services with fixed settings (defaults plus overrides)
 *
 * @category Services
 * @since 0.3.0
 */
export const makeMerkleLayer = (overrides: Partial<MerkleSettings> = {}) =>
  MerkleServiceLive.pipe(
    Layer.provideMerge(HashingServiceLive),
    Layer.provideMerge(makeMerkleConfigLayer(overrides))
  );
