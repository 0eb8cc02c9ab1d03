import { assert, describe, it } from "@effect/vitest";
import { Chunk, Effect } from "effect";
import { makeDigestLayer } from "../src/entities/merkle_root";
import {
  HashingServiceLive,
  makeHashingService,
} from "../src/services/merkle/hash";
import {
  LayerReducer,
  LayerReducerLive,
  reducePure,
} from "../src/services/merkle/reduce";
import { makeMerkleConfigLayer } from "../src/services/merkle/config";
import { assertLeft, assertRight } from "./utils/helpers";

const hashing = makeHashingService("fnv1a64");
const [d0, d1, d2, d3, d4, d5] = ["a", "b", "c", "d", "e", "f"].map(
  hashing.hashBlock
);

describe("LayerReducer", () => {
  describe("reducePure", () => {
    it("pairs neighbours left to right", () => {
      const next = assertRight(
        reducePure(makeDigestLayer(d0, d1, d2, d3), hashing.concatenateHash)
      );

      assert.deepStrictEqual(Chunk.toReadonlyArray(next), [
        hashing.concatenateHash(d0, d1),
        hashing.concatenateHash(d2, d3),
      ]);
    });

    it("reduces a pair to its parent", () => {
      const next = assertRight(
        reducePure(makeDigestLayer(d0, d1), hashing.concatenateHash)
      );
      assert.deepStrictEqual(Chunk.toReadonlyArray(next), [
        hashing.concatenateHash(d0, d1),
      ]);
    });

    it("halves any even layer", () => {
      const next = assertRight(
        reducePure(
          makeDigestLayer(d0, d1, d2, d3, d4, d5),
          hashing.concatenateHash
        )
      );
      assert.strictEqual(Chunk.size(next), 3);
      assert.strictEqual(
        Chunk.unsafeGet(next, 2),
        hashing.concatenateHash(d4, d5)
      );
    });

    it("depends on the order of the digests", () => {
      const forward = assertRight(
        reducePure(makeDigestLayer(d0, d1), hashing.concatenateHash)
      );
      const backward = assertRight(
        reducePure(makeDigestLayer(d1, d0), hashing.concatenateHash)
      );
      assert.notStrictEqual(
        Chunk.headNonEmpty(forward),
        Chunk.headNonEmpty(backward)
      );
    });

    it("rejects an odd layer", () => {
      const error = assertLeft(
        reducePure(makeDigestLayer(d0, d1, d2), hashing.concatenateHash)
      );
      assert.strictEqual(error._tag, "MalformedLayerError");
      assert.strictEqual(error.length, 3);
    });

    it("rejects a lone digest", () => {
      const error = assertLeft(
        reducePure(makeDigestLayer(d0), hashing.concatenateHash)
      );
      assert.strictEqual(error.length, 1);
    });
  });

  describe("Live layer", () => {
    it.effect("hashes pairs with the configured algorithm", () =>
      Effect.gen(function* () {
        const reducer = yield* LayerReducer;
        const sha256 = makeHashingService("sha256");
        const left = sha256.hashBlock("left");
        const right = sha256.hashBlock("right");

        const next = assertRight(reducer.reduce(makeDigestLayer(left, right)));
        assert.strictEqual(
          Chunk.headNonEmpty(next),
          sha256.concatenateHash(left, right)
        );
      }).pipe(
        Effect.provide(LayerReducerLive),
        Effect.provide(HashingServiceLive),
        Effect.provide(makeMerkleConfigLayer({ algorithm: "sha256" }))
      )
    );
  });
});
