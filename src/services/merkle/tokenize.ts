import { Chunk, Context, Layer } from "effect";
import type { Block } from "../../entities/merkle_root";

/**
 * Tokenizer capability — splits raw input into ordered blocks
 *
 * @category Capabilities
 * @since 0.3.0
 */
export class Tokenizer extends Context.Tag("@services/merkle/Tokenizer")<
  Tokenizer,
  {
    readonly tokenize: (input: string) => Chunk.Chunk<Block>;
  }
>() {}

/**
 * Whitespace-delimited words; leading, trailing and repeated whitespace
 * never yield empty blocks.
 * @internal
 */
export const tokenizeWords = (input: string): Chunk.Chunk<Block> =>
  Chunk.fromIterable(input.split(/\s+/).filter((word) => word.length > 0));

/**
 * Live implementation of Tokenizer
 *
 * @category Services
 * @since 0.3.0
 */
export const WhitespaceTokenizerLive = Layer.succeed(
  Tokenizer,
  Tokenizer.of({ tokenize: tokenizeWords })
);
