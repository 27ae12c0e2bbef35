import type { OverloadKey } from "./types.js";

function formatKey(key: OverloadKey | undefined): string {
  return key === undefined ? "<no key>" : String(key);
}

/**
 * Thrown when no overload accepts a call.
 *
 * Deliberately uniform: it never says why individual candidates were
 * rejected.
 */
export class NoMatchingOverloadError extends TypeError {
  constructor(
    readonly functionName: string,
    readonly key: OverloadKey,
    readonly positionalCount: number,
    readonly keywordNames: readonly string[],
  ) {
    const keywords =
      keywordNames.length > 0 ? ` and keyword(s) ${keywordNames.join(", ")}` : "";
    super(
      `Invalid call argument(s) for '${functionName}': no overload accepts ` +
        `${positionalCount} positional argument(s)${keywords}`,
    );
    this.name = "NoMatchingOverloadError";
  }
}

/** Reason codes for rejected registration targets. */
export type MalformedTargetReason = "no-constructor" | "undescribed" | "not-callable";

/** Thrown at registration time when a target cannot be turned into a signature. */
export class MalformedOverloadTargetError extends TypeError {
  constructor(
    readonly targetName: string,
    readonly reason: MalformedTargetReason,
    message: string,
  ) {
    super(message);
    this.name = "MalformedOverloadTargetError";
  }
}

/** Thrown when `finalize` names a key that has no registered overloads. */
export class FinalizeWithoutGroupError extends Error {
  constructor(
    readonly functionName: string,
    readonly key: OverloadKey | undefined,
  ) {
    super(
      `Cannot finalize '${functionName}': no overloads are registered under ${formatKey(key)}`,
    );
    this.name = "FinalizeWithoutGroupError";
  }
}

/** Reason codes for signature descriptors that break an invariant. */
export type InvalidSignatureReason =
  | "duplicate_param"
  | "positional_only_out_of_range"
  | "too_many_defaults"
  | "unknown_annotation"
  | "unknown_keyword_default"
  | "missing_receiver"
  | "empty_union";

/** Thrown when a signature descriptor is internally inconsistent. */
export class InvalidSignatureError extends Error {
  constructor(
    readonly functionName: string,
    readonly paramName: string | undefined,
    readonly reason: InvalidSignatureReason,
    message: string,
  ) {
    super(message);
    this.name = "InvalidSignatureError";
  }
}

/** Thrown when a string type reference names nothing in the type namespace. */
export class UnresolvedTypeError extends Error {
  constructor(readonly typeName: string) {
    super(`Cannot resolve type reference '${typeName}'`);
    this.name = "UnresolvedTypeError";
  }
}

/**
 * Thrown by an implementation to decline a call its signature accepted;
 * dispatch moves on to the next candidate.
 */
export class CandidateRejectedError extends Error {
  constructor(message = "Overload declined the call") {
    super(message);
    this.name = "CandidateRejectedError";
  }
}

/**
 * Errors raised inside an implementation that send dispatch to the next
 * candidate instead of propagating.
 */
export function isRetryableError(error: unknown): boolean {
  return (
    error instanceof CandidateRejectedError ||
    error instanceof TypeError ||
    error instanceof RangeError
  );
}
