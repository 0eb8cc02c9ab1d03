import { Chunk, Context, Effect, Either, Layer } from "effect";
import {
  type Digest,
  type DigestLayer,
  MalformedLayerError,
} from "../../entities/merkle_root";
import { HashingService } from "./hash";

// ============================================================================
// CAPABILITY: LAYER REDUCER
// ============================================================================

/**
 * LayerReducer capability — computes the layer above a given one
 *
 * @category Capabilities
 * @since 0.3.0
 */
export class LayerReducer extends Context.Tag("@services/merkle/LayerReducer")<
  LayerReducer,
  {
    readonly reduce: (
      layer: DigestLayer
    ) => Either.Either<DigestLayer, MalformedLayerError>;
  }
>() {}

/**
 * Pure implementation of reduce
 *
 * Digest 2i pairs with digest 2i + 1 and their parent lands at index i.
 * Odd layers (a lone digest included) have no pairing and are rejected
 * instead of having an element dropped or duplicated.
 * @internal
 */
export const reducePure = (
  layer: DigestLayer,
  concatenateHashFn: (left: Digest, right: Digest) => Digest
): Either.Either<DigestLayer, MalformedLayerError> => {
  const size = Chunk.size(layer);

  if (size % 2 !== 0)
    return Either.left(
      new MalformedLayerError({
        message: `Cannot pair a layer of ${size} digests`,
        length: size,
      })
    );

  return Either.right(
    Chunk.makeBy(size / 2, (i) =>
      concatenateHashFn(
        Chunk.unsafeGet(layer, 2 * i),
        Chunk.unsafeGet(layer, 2 * i + 1)
      )
    )
  );
};

/**
 * Live implementation of LayerReducer
 *
 * @category Services
 * @since 0.3.0
 */
export const LayerReducerLive = Layer.effect(
  LayerReducer,
  Effect.gen(function* () {
    const hashing = yield* HashingService;

    return LayerReducer.of({
      reduce: (layer) => reducePure(layer, hashing.concatenateHash),
    });
  })
);
