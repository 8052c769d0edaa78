import type { PlatformError } from "@effect/platform/Error";
import type { ParseError } from "effect/ParseResult";
import { Data } from "effect";

export class HouseholdFileError extends Data.TaggedError("HouseholdFileError")<{
  readonly path: string;
  readonly message: string;
  readonly cause: PlatformError | ParseError;
}> {}
