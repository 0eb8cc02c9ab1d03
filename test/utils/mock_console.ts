import { Logger, type HashMap } from "effect";
import type * as LogLevel from "effect/LogLevel";

interface LogEntry {
  readonly level: LogLevel.LogLevel;
  readonly message: unknown;
  readonly annotations: HashMap.HashMap<string, unknown>;
  readonly spans: ReadonlyArray<string>;
}

/**
 * Creates a mock logger that captures all log output for testing.
 * Use with Effect.provide(mockLoggerLayer) to capture logs in tests.
 */
export const createMockLogger = () => {
  const logs: LogEntry[] = [];
  const messages: string[] = [];

  const mockLogger = Logger.make<unknown, void>(
    ({ message, logLevel, annotations, spans }) => {
      logs.push({
        level: logLevel,
        message,
        annotations,
        spans: Array.from(spans).map((span) => span.label),
      });

      // single-message logs may arrive wrapped in an array
      const messageStr =
        typeof message === "string" ? message : String(message);
      messages.push(messageStr);
    }
  );

  const mockLoggerLayer = Logger.replace(Logger.defaultLogger, mockLogger);

  return { mockLoggerLayer, logs, messages };
};
