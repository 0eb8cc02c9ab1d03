import { Chunk, Effect, Layer, Logger } from "effect";
import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import * as MerkleService from "../src/services/merkle";

const DEFAULT_SENTENCE = "The quick brown fox jumps over the lazy dog";

const program = Effect.gen(function* () {
  const args = process.argv.slice(2);
  const sentence = args.length > 0 ? args.join(" ") : DEFAULT_SENTENCE;

  yield* Effect.logInfo(
    `${"=".repeat(70)}\nMERKLE ROOT DEMONSTRATION\n${"=".repeat(70)}\n`
  );
  yield* Effect.log(`Input: "${sentence}"`);

  const tokenizer = yield* MerkleService.Tokenizer;
  const merkleRoot = yield* MerkleService.MerkleRoot;
  const display = yield* MerkleService.MerkleDisplayService;

  const blocks = tokenizer.tokenize(sentence);
  const summary = yield* merkleRoot.summarize(blocks);

  yield* Effect.log(display.formatSummary(summary));
  yield* display.displaySummary(summary);

  yield* Effect.log("\nSwapping the first two blocks...");
  const swapped = Chunk.appendAll(
    Chunk.reverse(Chunk.take(blocks, 2)),
    Chunk.drop(blocks, 2)
  );
  const swappedRoot = yield* merkleRoot.calcRoot(swapped);

  yield* Effect.log(`Root after swap: ${swappedRoot}`).pipe(
    Effect.annotateLogs({ changed: swappedRoot !== summary.root })
  );
}).pipe(Effect.withSpan("merkle-root-demo"));

program.pipe(
  Effect.catchTag("EmptyInputError", (error) => Effect.logError(error.message)),
  Effect.orDie,
  Effect.provide(Layer.mergeAll(Logger.structured, MerkleService.MerkleLive)),
  NodeRuntime.runMain
);
