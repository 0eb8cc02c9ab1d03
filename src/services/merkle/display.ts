/**
 * Merkle Root Display Capability
 *
 * Compact summaries of a root computation for debugging and inspection.
 *
 * @module MerkleService/Display
 * @since 0.3.0
 */

import { Context, Effect, Layer } from "effect";
import * as Merkle from "../../entities/merkle_root";

const DIGEST_PREVIEW_LENGTH = 16;

export const shortenDigest = (digest: Merkle.Digest): string =>
  digest.length > DIGEST_PREVIEW_LENGTH
    ? `${digest.substring(0, DIGEST_PREVIEW_LENGTH)}...`
    : digest;

/**
 * Single-line representation.
 * Format: "Root(digest=..., blocks=N, leaves=M, rounds=R, algorithm=A)"
 */
const formatSummary = (summary: Merkle.RootSummary): string =>
  `Root(digest=${shortenDigest(summary.root)}, blocks=${summary.blockCount}, ` +
  `leaves=${summary.leafCount}, rounds=${summary.rounds}, algorithm=${summary.algorithm})`;

/**
 * Log the shape of the implicit tree and its root.
 */
const displaySummary = (summary: Merkle.RootSummary): Effect.Effect<void> =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Merkle Root Statistics");
    yield* Effect.logInfo(`Hash algorithm:            ${summary.algorithm}`);
    yield* Effect.logInfo(`Number of blocks:          ${summary.blockCount}`);
    yield* Effect.logInfo(
      `Padding blocks:            ${summary.leafCount - summary.blockCount}`
    );
    yield* Effect.logInfo(`Number of leaves:          ${summary.leafCount}`);
    yield* Effect.logInfo(`Reduction rounds:          ${summary.rounds}`);
    yield* Effect.logInfo(`Merkle root:               ${summary.root}`);
    yield* Effect.logInfo("=".repeat(70));
  });

/**
 * MerkleDisplayService — summary formatting and logging
 *
 * @category Capabilities
 * @since 0.3.0
 */
export class MerkleDisplayService extends Context.Tag(
  "@services/merkle/MerkleDisplayService"
)<
  MerkleDisplayService,
  {
    readonly formatSummary: (summary: Merkle.RootSummary) => string;
    readonly displaySummary: (summary: Merkle.RootSummary) => Effect.Effect<void>;
  }
>() {}

/**
 * Live implementation of MerkleDisplayService
 *
 * @category Services
 * @since 0.3.0
 */
export const MerkleDisplayServiceLive = Layer.succeed(
  MerkleDisplayService,
  MerkleDisplayService.of({
    formatSummary,
    displaySummary,
  })
);
