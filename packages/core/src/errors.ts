export type HeraldErrorCode =
  | 'configuration'
  | 'not_implemented'
  | 'template'
  | 'invalid_address'
  | 'invalid_phone_number'
  | 'not_found'
  | 'http_transport'

export class HeraldError extends Error {
  readonly code: HeraldErrorCode

  constructor(code: HeraldErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

// Unknown type names, bad settings, contexts that are not JSON
export class ConfigurationError extends HeraldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options)
  }
}

/**
 * Thrown by a message type to say that a part (text or HTML) does not exist.
 * The pipeline turns it into an omitted part.
 */
export class NotImplementedError extends HeraldError {
  constructor(message = 'Not implemented') {
    super('not_implemented', message)
  }
}

export class TemplateError extends HeraldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('template', message, options)
  }
}

export class InvalidAddressError extends HeraldError {
  constructor(readonly address: string) {
    super('invalid_address', `Invalid e-mail format: ${address}`)
  }
}

export class InvalidPhoneNumberError extends HeraldError {
  constructor(readonly value: string) {
    super('invalid_phone_number', `Invalid phone number: ${value}`)
  }
}

export class NotFoundError extends HeraldError {
  constructor(message = 'Not found', options?: { cause?: unknown }) {
    super('not_found', message, options)
  }
}

export class HttpTransportError extends HeraldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('http_transport', message, options)
  }
}

export function isNotImplemented(e: unknown): e is NotImplementedError {
  return e instanceof NotImplementedError
}

const STATUS_BY_CODE: Record<HeraldErrorCode, number> = {
  configuration: 500,
  not_implemented: 404,
  template: 500,
  invalid_address: 400,
  invalid_phone_number: 400,
  not_found: 404,
  http_transport: 502,
}

export function toErrorResponse(e: unknown): { status: number; body: { error: string; message: string } } {
  if (e instanceof HeraldError) {
    return { status: STATUS_BY_CODE[e.code], body: { error: e.code, message: e.message } }
  }
  return { status: 500, body: { error: 'internal', message: 'Internal Server Error' } }
}
