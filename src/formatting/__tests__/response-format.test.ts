import { describe, it, expect, vi } from 'vitest'
import { renderResponse, toJson } from '../response-format.js'

describe('toJson', () => {
  it('indents with two spaces', () => {
    expect(toJson({ a: 1, b: ['x'] })).toBe('{\n  "a": 1,\n  "b": [\n    "x"\n  ]\n}')
  })
})

describe('renderResponse', () => {
  it('renders markdown without building json', () => {
    const json = vi.fn(() => ({ a: 1 }))

    expect(renderResponse('markdown', { markdown: () => '# Title', json })).toBe('# Title')
    expect(json).not.toHaveBeenCalled()
  })

  it('serializes the json rendering', () => {
    expect(renderResponse('json', { markdown: () => '# Title', json: () => [{ id: 'x' }] })).toBe(
      '[\n  {\n    "id": "x"\n  }\n]'
    )
  })
})
