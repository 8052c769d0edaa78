import { Cause, Effect } from "effect";
import * as Sentry from "@sentry/node";

const FLUSH_TIMEOUT_MS = 2000;

// Interruption alone (Ctrl-C, runtime shutdown) is not reported
export const reportFailure = (cause: Cause.Cause<unknown>): Effect.Effect<void> =>
  Cause.isInterruptedOnly(cause)
    ? Effect.void
    : Effect.promise(async () => {
        Sentry.captureException(Cause.squash(cause));
        await Sentry.flush(FLUSH_TIMEOUT_MS);
      });
