export type CodecErrorKind =
  | "CapacityExceeded"
  | "Underflow"
  | "Malformed"
  | "SchemaMismatch"
  | "TrailingData"
  | "ValueOutOfRange";

export class CodecError extends Error {
  constructor(
    readonly kind: CodecErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CodecError";
  }
}

export const isCodecError = (
  e: unknown,
  kind?: CodecErrorKind,
): e is CodecError =>
  e instanceof CodecError && (kind === undefined || e.kind === kind);

export const messageOf = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/* ── guards around @ton/core builder / slice calls ───────── */

/**
 * Runs a builder write. Anything @ton/core throws here means the cell ran
 * out of bits or refs.
 */
export const storing = <T>(what: string, fn: () => T): T => {
  try {
    return fn();
  } catch (e) {
    if (e instanceof CodecError) throw e;
    throw new CodecError(
      "CapacityExceeded",
      `cannot store ${what}: ${messageOf(e)}`,
      { cause: e },
    );
  }
};

// @ton/core reports bad address tags as "Invalid address: <tag>" and anycast
// or non-std forms as "Unsupported address"; everything else a slice throws is
// a read past the end.
const MALFORMED = /^(Invalid address|Unsupported address)/;

export const loading = <T>(what: string, fn: () => T): T => {
  try {
    return fn();
  } catch (e) {
    if (e instanceof CodecError) throw e;
    const msg = messageOf(e);
    throw new CodecError(
      MALFORMED.test(msg) ? "Malformed" : "Underflow",
      `cannot load ${what}: ${msg}`,
      { cause: e },
    );
  }
};
