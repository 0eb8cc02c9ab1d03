import * as Either from "effect/Either";
import { assert } from "@effect/vitest";

/**
 * Assert that an Either is Right and return its value.
 * Fails the test if the Either is Left.
 */
export const assertRight = <R, L>(
  either: Either.Either<R, L>,
  message: string = "Expected Right, got Left"
): R =>
  Either.match(either, {
    onLeft: () => assert.fail(message),
    onRight: (value) => value,
  });

/**
 * Assert that an Either is Left and return its error.
 * Fails the test if the Either is Right.
 */
export const assertLeft = <R, L>(
  either: Either.Either<R, L>,
  message: string = "Expected Left, got Right"
): L =>
  Either.match(either, {
    onLeft: (error) => error,
    onRight: () => assert.fail(message),
  });
