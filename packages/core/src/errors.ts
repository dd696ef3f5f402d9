/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class InvalidArgumentError extends Data.TaggedError("InvalidArgumentError")<{
  readonly message: string;
}> {}

export class VerificationError extends Data.TaggedError("VerificationError")<{
  readonly url: string;
  readonly expected: string;
  readonly actual: string;
  readonly message: string;
}> {
  static mismatch(url: string, expected: string, actual: string): VerificationError {
    return new VerificationError({
      url,
      expected,
      actual,
      message: `Digest mismatch for ${url}: expected ${expected}, got ${actual}`,
    });
  }
}

export class FetchError extends Data.TaggedError("FetchError")<{
  readonly url: string;
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}

export class ArchiveError extends Data.TaggedError("ArchiveError")<{
  readonly archive: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class LabelParseError extends Data.TaggedError("LabelParseError")<{
  readonly source: string;
  readonly message: string;
  readonly line?: number;
  readonly cause?: unknown;
}> {}

export class ImageError extends Data.TaggedError("ImageError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
