import { describe, it, expect } from 'vitest'
import { ConfigurationError, InvalidAddressError, NotFoundError, toErrorResponse } from './errors'

describe('toErrorResponse', () => {
  it('maps codes to statuses', () => {
    expect(toErrorResponse(new NotFoundError('No email with id 1'))).toEqual({
      status: 404,
      body: { error: 'not_found', message: 'No email with id 1' },
    })
    expect(toErrorResponse(new InvalidAddressError('<<<')).status).toBe(400)
    expect(toErrorResponse(new ConfigurationError('bad')).status).toBe(500)
  })

  it('hides unknown errors', () => {
    expect(toErrorResponse(new Error('secret detail'))).toEqual({
      status: 500,
      body: { error: 'internal', message: 'Internal Server Error' },
    })
  })

  it('names errors after their class', () => {
    expect(new NotFoundError().name).toBe('NotFoundError')
  })
})
