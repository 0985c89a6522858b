import { describe, it, expect } from 'vitest'
import { runTool, toCallToolResult, toolText } from '../tool-context.js'
import { UpstreamError } from '../../errors/tool-errors.js'
import { ok } from '../../shared/result.js'

describe('runTool', () => {
  it('passes successful results through', async () => {
    expect(await runTool('test_tool', async () => ok('done'))).toEqual({ ok: true, value: 'done' })
  })

  it('turns thrown errors into failures', async () => {
    const result = await runTool('test_tool', async () => {
      throw new UpstreamError(403, 'Forbidden')
    })

    expect(result).toEqual({ ok: false, failure: { kind: 'forbidden' } })
  })
})

describe('toCallToolResult', () => {
  it('wraps text content', () => {
    expect(toCallToolResult(ok('# Payees'))).toEqual({ content: [{ type: 'text', text: '# Payees' }] })
  })

  it('flags failures', () => {
    expect(toCallToolResult({ ok: false, failure: { kind: 'not_found' } })).toEqual({
      content: [{ type: 'text', text: 'Error: Resource not found. Check the ID is correct.' }],
      isError: true,
    })
  })
})

describe('toolText', () => {
  it('describes failures', () => {
    expect(toolText({ ok: false, failure: { kind: 'upstream', status: 503, reason: 'Service Unavailable' } })).toBe(
      'Error: YNAB API error 503: Service Unavailable'
    )
  })
})
