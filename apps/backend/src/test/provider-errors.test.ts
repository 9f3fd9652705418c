import { describe, expect, it } from 'vitest'
import { AuthError, NotFoundError, RateLimitError, UpstreamError } from '../swarm/errors.js'
import { classifyProviderError } from '../swarm/provider-errors.js'

describe('classifyProviderError', () => {
  it('maps HTTP status fields', () => {
    const unauthorized = Object.assign(new Error('bad key'), { status: 401 })
    const throttled = Object.assign(new Error('slow down'), { statusCode: 429 })

    expect(classifyProviderError(unauthorized)).toBeInstanceOf(AuthError)
    expect(classifyProviderError(throttled)).toBeInstanceOf(RateLimitError)
  })

  it('reads a leading status code from the message', () => {
    const error = classifyProviderError(new Error('429 {"type":"error","error":{"type":"overloaded"}}'))

    expect(error).toBeInstanceOf(RateLimitError)
    expect(error.kind).toBe('RateLimitError')
    expect(error.retryable).toBe(true)
    expect(error.message).toBe('Provider is throttling requests: 429 {"type":"error","error":{"type":"overloaded"}}')
  })

  it('falls back to message patterns', () => {
    expect(classifyProviderError(new Error('authentication_error: invalid x-api-key'))).toBeInstanceOf(AuthError)
    expect(classifyProviderError(new Error('Rate limit reached for requests'))).toBeInstanceOf(RateLimitError)
  })

  it('treats everything else as an upstream failure', () => {
    const error = classifyProviderError(new Error('500 internal server error'))

    expect(error).toBeInstanceOf(UpstreamError)
    expect(error.message).toBe('Provider request failed: 500 internal server error')
    expect(error.retryable).toBe(false)
    expect(classifyProviderError('socket hang up')).toBeInstanceOf(UpstreamError)
  })

  it('passes relay errors through unchanged', () => {
    const original = new NotFoundError('agent', 'Ghost')

    expect(classifyProviderError(original)).toBe(original)
  })
})
