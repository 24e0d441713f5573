/**
 * ENCODING ERROR SYSTEM (Effect-TS)
 *
 * Every failure of the bitwise encoding algebra is an input-contract
 * violation. None of them is transient, so `recoverable` is always false:
 * the caller decides whether to skip the episode, log it, or abort.
 *
 * The classes extend `Data.TaggedError`, which makes them real `Error`
 * instances (thrown by the synchronous core) and typed Effect failures
 * (surfaced by `episodeEncoding.effect.ts`) at the same time.
 */

import { Data } from "effect";

/**
 * INVALID WIDTH - value does not fit the declared bit width
 *
 * Raised at construction when `value >= 2^width - 1`, and for widths, values
 * or group sizes that are not usable integers.
 */
export class InvalidWidthError extends Data.TaggedError("InvalidWidthError")<{
  readonly message: string;
  readonly value: bigint | number;
  readonly width: number;
  readonly reason: string;
}> {
  constructor(props: { readonly value: bigint | number; readonly width: number; readonly reason: string }) {
    super({
      ...props,
      message: `Invalid encoding (value ${props.value.toString()}, width ${props.width}): ${props.reason}`,
    });
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      value: this.value.toString(),
      width: this.width,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * INCOMPATIBLE OPERANDS - binary combinator over encodings of differing width
 */
export class IncompatibleOperandsError extends Data.TaggedError("IncompatibleOperandsError")<{
  readonly message: string;
  readonly leftWidth: number;
  readonly rightWidth: number;
}> {
  constructor(props: { readonly leftWidth: number; readonly rightWidth: number }) {
    super({
      ...props,
      message: `Operands are not equally sized (${props.leftWidth} bits vs ${props.rightWidth} bits)`,
    });
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      leftWidth: this.leftWidth,
      rightWidth: this.rightWidth,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * INDEX OUT OF RANGE - collection accessor outside [0, size)
 */
export class IndexOutOfRangeError extends Data.TaggedError("IndexOutOfRangeError")<{
  readonly message: string;
  readonly index: number;
  readonly size: number;
}> {
  constructor(props: { readonly index: number; readonly size: number }) {
    super({
      ...props,
      message: `Index ${props.index} is out of range for a collection of ${props.size} encodings`,
    });
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      index: this.index,
      size: this.size,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * INCOMPATIBLE SIZE - collections (or label/weight rows) of differing length
 */
export class IncompatibleSizeError extends Data.TaggedError("IncompatibleSizeError")<{
  readonly message: string;
  readonly leftSize: number;
  readonly rightSize: number;
  readonly context?: string;
}> {
  constructor(props: { readonly leftSize: number; readonly rightSize: number; readonly context?: string }) {
    super({
      ...props,
      message: `Incompatible sizes${props.context ? ` in ${props.context}` : ""}: ${props.leftSize} vs ${props.rightSize}`,
    });
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      leftSize: this.leftSize,
      rightSize: this.rightSize,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * VALIDATION ERROR - input data failed schema decoding
 *
 * Used by the Effect service for unknown inputs (time windows, episodes,
 * weights, config overrides) and for weights that are not finite numbers.
 */
export class EncodingValidationError extends Data.TaggedError("EncodingValidationError")<{
  readonly message: string;
  readonly field: string;
  readonly issue: string;
}> {
  constructor(props: { readonly field: string; readonly issue: string }) {
    super({
      ...props,
      message: `Validation failed for ${props.field}: ${props.issue}`,
    });
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      field: this.field,
      issue: this.issue,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

export type EncodingError =
  | InvalidWidthError
  | IncompatibleOperandsError
  | IndexOutOfRangeError
  | IncompatibleSizeError
  | EncodingValidationError;

/**
 * Type guard for values thrown by the synchronous core
 */
export const isEncodingError = (error: unknown): error is EncodingError =>
  error instanceof InvalidWidthError ||
  error instanceof IncompatibleOperandsError ||
  error instanceof IndexOutOfRangeError ||
  error instanceof IncompatibleSizeError ||
  error instanceof EncodingValidationError;
