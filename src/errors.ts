/**
 * Error types raised by memcast.
 *
 * Two tiers exist. Compile-time errors describe an incompatible pair of
 * shapes and are raised while a plan is built; they are never cached, so a
 * retry compiles again. Conversion-time errors are raised while a compiled
 * plan runs against real data and abort the copy in progress, leaving the
 * destination partially written.
 */

export type ErrorContext = Readonly<Record<string, unknown>>;

export type ErrorTier = 'compile' | 'convert' | 'encode';

export interface MemcastErrorOptions<C extends string = string> {
  code: C;
  tier: ErrorTier;
  context?: ErrorContext;
  cause?: unknown;
}

export class MemcastError<C extends string = string> extends Error {
  readonly code: C;
  readonly tier: ErrorTier;
  readonly context: ErrorContext;

  constructor(message: string, options: MemcastErrorOptions<C>) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.tier = options.tier;
    this.context = Object.freeze({ ...options.context });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      tier: this.tier,
      message: this.message,
      context: { ...this.context },
      ...(this.cause !== undefined && { cause: serializeCause(this.cause) }),
    };
  }
}

function serializeCause(cause: unknown): unknown {
  if (cause instanceof MemcastError) return cause.toJSON();
  if (cause instanceof Error) return { name: cause.name, message: cause.message };
  return cause;
}

export function isMemcastError(err: unknown): err is MemcastError {
  return err instanceof MemcastError;
}

// ============================================================================
// Compile-time errors
// ============================================================================

export class TypeNotStructError extends MemcastError<'type_not_struct'> {
  constructor(shapeName: string) {
    super(`type not struct: ${shapeName}`, {
      code: 'type_not_struct',
      tier: 'compile',
      context: { shape: shapeName },
    });
  }
}

export class FieldNotFoundError extends MemcastError<'field_not_found'> {
  constructor(field: string, srcType: string, dstType: string) {
    super(`field not found: ${srcType}.${field} has no counterpart in ${dstType}`, {
      code: 'field_not_found',
      tier: 'compile',
      context: { srcField: field, srcType, dstType },
    });
  }
}

export class UnsupportedTypePairError extends MemcastError<'unsupported_pair'> {
  constructor(dstType: string, srcType: string) {
    super(`don't know how to copy ${srcType} into ${dstType}`, {
      code: 'unsupported_pair',
      tier: 'compile',
      context: { srcType, dstType },
    });
  }
}

export class FieldConversionError extends MemcastError<'field_conversion'> {
  constructor(field: string, srcType: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`field ${srcType}.${field}: ${reason}`, {
      code: 'field_conversion',
      tier: 'compile',
      context: { srcField: field, srcType },
      cause,
    });
  }
}

export class CircularReferenceError extends MemcastError<'circular_reference'> {
  constructor(shapeName: string) {
    super(`circular type reference not supported: ${shapeName}`, {
      code: 'circular_reference',
      tier: 'compile',
      context: { shape: shapeName },
    });
  }
}

export class UnexportedFieldError extends MemcastError<'unexported_field'> {
  constructor(shapeName: string, field: string) {
    super(`unexported field in transmutable structure: ${shapeName}.${field}`, {
      code: 'unexported_field',
      tier: 'compile',
      context: { shape: shapeName, field },
    });
  }
}

export class MarshalingShapeError extends MemcastError<'marshaling_shape'> {
  constructor(shapeName: string) {
    super(`transmuting a self-marshaling type: ${shapeName}`, {
      code: 'marshaling_shape',
      tier: 'compile',
      context: { shape: shapeName },
    });
  }
}

export class MissingTagError extends MemcastError<'missing_tag'> {
  constructor(shapeName: string, field: string, tag: string) {
    super(`field ${shapeName}.${field} has no "${tag}" tag`, {
      code: 'missing_tag',
      tier: 'compile',
      context: { shape: shapeName, field, tag },
    });
  }
}

// ============================================================================
// Conversion-time errors
// ============================================================================

export class ClosedEnumError extends MemcastError<'closed_enum'> {
  constructor(value: string, dstType: string) {
    super(`bad value for closed enum: "${value}" is not a member of ${dstType}`, {
      code: 'closed_enum',
      tier: 'convert',
      context: { value, dstType },
    });
  }
}

export class ParseError extends MemcastError<'parse'> {
  constructor(kind: string, input: string, cause?: unknown) {
    super(`invalid ${kind}: "${input}"`, {
      code: 'parse',
      tier: 'convert',
      context: { kind, input },
      cause,
    });
  }
}

export class RequiredValueError extends MemcastError<'required_value'> {
  /** `Struct.Field` of the absent value, once a struct copier has seen it */
  readonly field?: string;
  readonly shapeName: string;

  constructor(shapeName: string, field?: string, cause?: unknown) {
    super(
      field === undefined
        ? `required field has no value: ${shapeName}`
        : `required field ${field} has no value: ${shapeName}`,
      {
        code: 'required_value',
        tier: 'convert',
        context: field === undefined ? { shape: shapeName } : { shape: shapeName, field },
        cause,
      },
    );
    this.field = field;
    this.shapeName = shapeName;
  }
}

export class MapKeyError extends MemcastError<'map_key'> {
  constructor(key: string, reason: 'missing' | 'mismatch', dstType: string) {
    const message = reason === 'missing'
      ? `missing key "${key}" for ${dstType}`
      : `value under key "${key}" cannot be assigned to ${dstType}`;
    super(message, {
      code: 'map_key',
      tier: 'convert',
      context: { key, reason, dstType },
    });
  }
}

export class HeapMismatchError extends MemcastError<'heap_mismatch'> {
  constructor() {
    super('source and destination live in different heaps', {
      code: 'heap_mismatch',
      tier: 'convert',
    });
  }
}

export class EncodeError extends MemcastError<'encode'> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: 'encode', tier: 'encode', context });
  }
}
