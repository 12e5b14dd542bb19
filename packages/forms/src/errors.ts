export class FormBuildError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormBuildError'
  }
}

export class UnknownFieldTypeError extends Error {
  constructor(readonly fieldType: string) {
    super(`No config registered for field type "${fieldType}"`)
    this.name = 'UnknownFieldTypeError'
  }
}

/** A field config was handed a state or message it does not recognise. */
export class FieldShapeError extends Error {
  constructor(readonly kind: 'state' | 'message', readonly value: unknown) {
    super(`Field config received an unexpected ${kind}: ${describe(value)}`)
    this.name = 'FieldShapeError'
  }
}

export class ErrorDefDecodeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ErrorDefDecodeError'
  }
}

function describe(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}
