export type ScriptErrorCode = 'MISSING_FIELD' | 'INVALID_LINE' | 'UNKNOWN_INLINE_COMMAND' | 'UNSUPPORTED_CONVERSION'

export class ScriptError extends Error {
  public readonly code: ScriptErrorCode

  constructor(code: ScriptErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ScriptError'
    this.code = code
  }
}

/** A required header command is absent from the document. */
export class MissingFieldError extends ScriptError {
  constructor(public readonly field: string) {
    super('MISSING_FIELD', `Could not find ${field}`)
    this.name = 'MissingFieldError'
  }
}

/** A body line does not have the `\cmd{body}` shape, or one of its spans failed to parse. */
export class InvalidLineError extends ScriptError {
  constructor(
    public readonly line: string,
    cause?: unknown
  ) {
    super('INVALID_LINE', `Could not parse line: "${line}"${cause instanceof Error ? ` via: ${cause.message}` : ''}`, {
      cause
    })
    this.name = 'InvalidLineError'
  }
}

export class UnknownInlineCommandError extends ScriptError {
  constructor(
    public readonly command: string,
    public readonly fragment: string
  ) {
    super('UNKNOWN_INLINE_COMMAND', `Unknown inline command \\${command} in span "${fragment}"`)
    this.name = 'UnknownInlineCommandError'
  }
}

export class UnsupportedConversionError extends ScriptError {
  constructor(
    message: string,
    public readonly from?: string,
    public readonly to?: string
  ) {
    super('UNSUPPORTED_CONVERSION', message)
    this.name = 'UnsupportedConversionError'
  }
}
