/**
 * Supervised calls into the optional data validator.
 *
 * The outcome is logged and dropped. The returned promise always
 * resolves, whatever the validator does.
 */

import type { DataValidator } from "@roundfeed/types";
import type { Logger } from "pino";

export type ValidationOutcome = "valid" | "invalid" | "error" | "timeout";

export interface ValidationRequest {
  readonly previousRoundId: number;
  readonly previousAnswer: bigint;
  readonly roundId: number;
  readonly answer: bigint;
}

const TIMED_OUT = Symbol("timeout");

export async function runValidation(
  validator: DataValidator,
  request: ValidationRequest,
  timeoutMs: number,
  logger: Logger,
): Promise<ValidationOutcome> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  const log = logger.child({ roundId: request.roundId });
  try {
    const result = await Promise.race([
      Promise.resolve().then(() =>
        validator.validate(
          request.previousRoundId,
          request.previousAnswer,
          request.roundId,
          request.answer,
        ),
      ),
      deadline,
    ]);

    if (result === TIMED_OUT) {
      log.warn({ timeoutMs }, "validator timed out");
      return "timeout";
    }
    if (!result) {
      log.warn({ answer: request.answer.toString() }, "validator flagged answer");
      return "invalid";
    }
    log.debug("validator accepted answer");
    return "valid";
  } catch (err) {
    log.warn({ err }, "validator failed");
    return "error";
  } finally {
    clearTimeout(timer);
  }
}
