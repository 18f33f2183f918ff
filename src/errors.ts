import { BadRequest, Conflict, NotFound } from "@tsed/exceptions";

/**
 * A raw record is missing its natural key or another required field.
 * The record is rejected; the batch carries on.
 */
export class RecordValidationError extends BadRequest {
  constructor(public readonly tmdbId: number | null, public readonly problems: string[]) {
    super(`Invalid movie record${tmdbId === null ? "" : ` ${tmdbId}`}: ${problems.join("; ")}`);
  }
}

export class MovieNotFoundError extends NotFound {
  constructor(public readonly tmdbId: number) {
    super(`Movie ${tmdbId} not found`);
  }
}

/**
 * Any database error raised while writing one record. The record's transaction
 * has been rolled back by the time this is thrown.
 */
export class ConstraintViolationError extends Conflict {
  constructor(
    public readonly tmdbId: number,
    public readonly sqlState: string | null,
    cause: unknown
  ) {
    super(
      `Movie ${tmdbId} could not be written${sqlState ? ` (SQLSTATE ${sqlState})` : ""}: ${describeError(cause)}`,
      cause
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * SQLSTATE of a postgres error, looking through wrapper errors.
 * node-postgres and PGlite both expose it as `code`.
 */
export function getSqlState(error: unknown): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && typeof current === "object" && current !== null; depth++) {
    if ("code" in current && typeof current.code === "string" && /^[0-9A-Z]{5}$/.test(current.code)) {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return null;
}
