import { describe, it, expect } from 'vitest'
import {
  LocalPersistenceError,
  UpstreamError,
  ValidationError,
  classifyError,
  describeFailure,
  toFailure,
} from '../tool-errors.js'

describe('toFailure', () => {
  it('classifies validation errors', () => {
    expect(toFailure(new ValidationError('bad input'))).toEqual({
      kind: 'validation',
      message: 'bad input',
    })
  })

  it.each([
    { status: 401, kind: 'unauthorized' },
    { status: 403, kind: 'forbidden' },
    { status: 404, kind: 'not_found' },
    { status: 429, kind: 'rate_limited' },
  ])('maps status $status to $kind', ({ status, kind }) => {
    expect(toFailure(new UpstreamError(status, 'reason')).kind).toBe(kind)
  })

  it('keeps status and reason for other upstream errors', () => {
    expect(toFailure(new UpstreamError(500, 'Internal Server Error'))).toEqual({
      kind: 'upstream',
      status: 500,
      reason: 'Internal Server Error',
    })
  })

  it('classifies persistence errors', () => {
    const error = new LocalPersistenceError('/tmp/out.json', new Error('EACCES: permission denied'))
    expect(toFailure(error)).toEqual({
      kind: 'persistence',
      path: '/tmp/out.json',
      reason: 'EACCES: permission denied',
    })
  })

  it('falls back to the error name and message', () => {
    expect(toFailure(new TypeError('x is not a function'))).toEqual({
      kind: 'unknown',
      name: 'TypeError',
      message: 'x is not a function',
    })
  })

  it('handles thrown non-errors', () => {
    expect(toFailure('boom')).toEqual({ kind: 'unknown', name: 'UnknownError', message: 'boom' })
  })
})

describe('describeFailure', () => {
  it('describes authentication failures', () => {
    expect(describeFailure({ kind: 'unauthorized' })).toBe(
      'Error: Invalid API key. Check YNAB_API_KEY environment variable.'
    )
  })

  it('describes forbidden access', () => {
    expect(describeFailure({ kind: 'forbidden' })).toBe(
      "Error: Access forbidden. You don't have permission for this resource."
    )
  })

  it('describes missing resources', () => {
    expect(describeFailure({ kind: 'not_found' })).toBe('Error: Resource not found. Check the ID is correct.')
  })

  it('describes rate limiting', () => {
    expect(describeFailure({ kind: 'rate_limited' })).toBe(
      'Error: Rate limit exceeded. Wait before making more requests.'
    )
  })

  it('describes other upstream errors', () => {
    expect(describeFailure({ kind: 'upstream', status: 502, reason: 'Bad Gateway' })).toBe(
      'Error: YNAB API error 502: Bad Gateway'
    )
  })

  it('names the error type for local failures', () => {
    expect(describeFailure({ kind: 'validation', message: 'Provide a date' })).toBe(
      'Error: ValidationError: Provide a date'
    )
    expect(describeFailure({ kind: 'persistence', path: '/tmp/x.json', reason: 'disk full' })).toBe(
      'Error: LocalPersistenceError: Could not write /tmp/x.json: disk full'
    )
  })
})

describe('classifyError', () => {
  it('classifies and describes in one step', () => {
    expect(classifyError(new UpstreamError(401, 'Unauthorized'))).toBe(
      'Error: Invalid API key. Check YNAB_API_KEY environment variable.'
    )
  })

  it('describes unexpected errors by name', () => {
    expect(classifyError(new RangeError('out of range'))).toBe('Error: RangeError: out of range')
  })
})
