/**
 * Merkle Configuration
 *
 * Settings that are part of the protocol rather than of the tree algorithm:
 * which hash to use, which block pads the base layer, and whether an empty
 * input is an error.
 *
 * Environment:
 * - MERKLE_HASH_ALGORITHM — keccak256 | sha256 | fnv1a64 (default keccak256)
 * - MERKLE_FILLER — padding block (default "")
 * - MERKLE_EMPTY_INPUT — fail | filler (default fail)
 *
 * @module MerkleService/Config
 * @since 0.3.0
 */

import { Config, Context, Effect, Layer } from "effect";
import {
  type MerkleSettings,
  MerkleSettingsSchema,
  defaultMerkleSettings,
} from "../../entities/merkle_root";

// ============================================================================
// CAPABILITY: MERKLE CONFIG
// ============================================================================

/**
 * MerkleConfig capability — protocol settings for root computation
 *
 * @category Capabilities
 * @since 0.3.0
 */
export class MerkleConfig extends Context.Tag("@services/merkle/MerkleConfig")<
  MerkleConfig,
  MerkleSettings
>() {}

/**
 * Settings read from the environment
 *
 * @category Config
 * @since 0.3.0
 */
export const merkleSettingsConfig: Config.Config<MerkleSettings> = Config.all({
  algorithm: Config.literal(
    "keccak256",
    "sha256",
    "fnv1a64"
  )("MERKLE_HASH_ALGORITHM").pipe(
    Config.withDefault(defaultMerkleSettings.algorithm)
  ),
  filler: Config.string("MERKLE_FILLER").pipe(
    Config.withDefault(defaultMerkleSettings.filler)
  ),
  emptyInput: Config.literal("fail", "filler")("MERKLE_EMPTY_INPUT").pipe(
    Config.withDefault(defaultMerkleSettings.emptyInput)
  ),
});

/**
 * Live implementation of MerkleConfig, backed by the current ConfigProvider
 *
 * @category Services
 * @since 0.3.0
 */
export const MerkleConfigLive = Layer.effect(
  MerkleConfig,
  Effect.gen(function* () {
    const settings = yield* merkleSettingsConfig;
    yield* Effect.logDebug("Loaded Merkle settings").pipe(
      Effect.annotateLogs({
        algorithm: settings.algorithm,
        emptyInput: settings.emptyInput,
      })
    );
    return MerkleConfig.of(settings);
  })
);

/**
 * Fixed settings: defaults plus the given overrides
 *
 * @category Services
 * @since 0.3.0
 */
export const makeMerkleConfigLayer = (
  overrides: Partial<MerkleSettings> = {}
) =>
  Layer.succeed(
    MerkleConfig,
    MerkleConfig.of(
      MerkleSettingsSchema.make({ ...defaultMerkleSettings, ...overrides })
    )
  );
