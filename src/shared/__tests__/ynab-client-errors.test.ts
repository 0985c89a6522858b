import { describe, it, expect, vi, afterEach } from 'vitest'
import { createYnabClient } from '../ynab-client.js'
import { getPayees } from '../../tools/payee-tools.js'
import { toolText, type ToolContext } from '../../tools/tool-context.js'
import { createResultSpiller } from '../../output/result-spiller.js'

// Runs the real SDK against a stubbed fetch
const contextFor = (response: Response): ToolContext => {
  vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response))
  return {
    client: createYnabClient('test-secret'),
    spiller: createResultSpiller({ outputDir: '/nonexistent/ynab-mcp-test' }),
  }
}

describe('YNAB error responses', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('reports the status of a gateway error page', async () => {
    const context = contextFor(
      new Response('<html>Bad Gateway</html>', {
        status: 502,
        statusText: 'Bad Gateway',
        headers: { 'Content-Type': 'text/html' },
      })
    )

    const result = await getPayees({ budget_id: 'last-used', response_format: 'markdown' }, context)

    expect(toolText(result)).toBe('Error: YNAB API error 502: Bad Gateway')
  })

  it('classifies YNAB error bodies by status', async () => {
    const body = { error: { id: '429', name: 'too_many_requests', detail: 'Too many requests' } }
    const context = contextFor(
      new Response(JSON.stringify(body), {
        status: 429,
        statusText: 'Too Many Requests',
        headers: { 'Content-Type': 'application/json' },
      })
    )

    const result = await getPayees({ budget_id: 'last-used', response_format: 'markdown' }, context)

    expect(toolText(result)).toBe('Error: Rate limit exceeded. Wait before making more requests.')
  })

  it('reads payees from a successful response', async () => {
    const body = {
      data: {
        payees: [{ id: 'p-1', name: 'Grocer', transfer_account_id: null, deleted: false }],
        server_knowledge: 1,
      },
    }
    const context = contextFor(
      new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } })
    )

    const result = await getPayees({ budget_id: 'last-used', response_format: 'markdown' }, context)

    expect(toolText(result)).toBe('# Payees\n\n- **Grocer** (`p-1`)')
  })
})
