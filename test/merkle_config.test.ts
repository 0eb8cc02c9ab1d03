import { assert, describe, it } from "@effect/vitest";
import { Chunk, ConfigProvider, Effect, Either } from "effect";
import * as MerkleService from "../src/services/merkle";
import { MerkleConfig, MerkleConfigLive } from "../src/services/merkle/config";

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)));

describe("MerkleConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.gen(function* () {
      const config = yield* MerkleConfig;
      assert.strictEqual(config.algorithm, "keccak256");
      assert.strictEqual(config.filler, "");
      assert.strictEqual(config.emptyInput, "fail");
    }).pipe(Effect.provide(MerkleConfigLive), withEnv([]))
  );

  it.effect("reads the environment", () =>
    Effect.gen(function* () {
      const config = yield* MerkleConfig;
      assert.strictEqual(config.algorithm, "sha256");
      assert.strictEqual(config.filler, "pad");
      assert.strictEqual(config.emptyInput, "filler");
    }).pipe(
      Effect.provide(MerkleConfigLive),
      withEnv([
        ["MERKLE_HASH_ALGORITHM", "sha256"],
        ["MERKLE_FILLER", "pad"],
        ["MERKLE_EMPTY_INPUT", "filler"],
      ])
    )
  );

  it.effect("rejects an unknown algorithm", () =>
    Effect.gen(function* () {
      const result = yield* MerkleConfig.pipe(
        Effect.provide(MerkleConfigLive),
        Effect.either
      );
      assert.isTrue(Either.isLeft(result));
    }).pipe(withEnv([["MERKLE_HASH_ALGORITHM", "md5"]]))
  );

  it.effect("rejects an unknown empty-input policy", () =>
    Effect.gen(function* () {
      const result = yield* MerkleConfig.pipe(
        Effect.provide(MerkleConfigLive),
        Effect.either
      );
      assert.isTrue(Either.isLeft(result));
    }).pipe(withEnv([["MERKLE_EMPTY_INPUT", "ignore"]]))
  );

  it.effect("MerkleLive wires the environment into root computation", () =>
    Effect.gen(function* () {
      const merkleRoot = yield* MerkleService.MerkleRoot;
      const summary = yield* merkleRoot.summarize(Chunk.empty());

      assert.strictEqual(summary.algorithm, "fnv1a64");
      // lone "" filler leaf: the FNV-1a offset basis
      assert.strictEqual(summary.root, "cbf29ce484222325");
    }).pipe(
      Effect.provide(MerkleService.MerkleLive),
      withEnv([
        ["MERKLE_HASH_ALGORITHM", "fnv1a64"],
        ["MERKLE_EMPTY_INPUT", "filler"],
      ])
    )
  );
});
