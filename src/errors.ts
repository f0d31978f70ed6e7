export type ErrorCode = "NOT_FOUND" | "DATA_INTEGRITY" | "INVALID_ARGUMENT" | "INTERNAL";

export interface ErrorPayload {
  error: { code: ErrorCode; message: string };
}

export class BattleServiceError extends Error {
  constructor(
    readonly code: Exclude<ErrorCode, "INTERNAL">,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown Pokémon or move name. */
export class NotFoundError extends BattleServiceError {
  constructor(readonly kind: "pokemon" | "move", readonly lookupName: string) {
    super("NOT_FOUND", `${kind === "pokemon" ? "Pokemon" : "Move"} not found: ${lookupName}`);
  }
}

/** Profile or move data that cannot be battled with (missing stats, unknown types). */
export class DataIntegrityError extends BattleServiceError {
  constructor(message: string) {
    super("DATA_INTEGRITY", message);
  }
}

export class InvalidArgumentError extends BattleServiceError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  DATA_INTEGRITY: 422,
  INVALID_ARGUMENT: 400,
  INTERNAL: 500,
};

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof BattleServiceError) {
    return { error: { code: err.code, message: err.message } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { error: { code: "INTERNAL", message: `Battle simulation failed: ${message}` } };
}

export function httpStatusFor(err: unknown): number {
  return err instanceof BattleServiceError ? STATUS_BY_CODE[err.code] : STATUS_BY_CODE.INTERNAL;
}
