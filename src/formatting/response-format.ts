export type ResponseFormat = 'markdown' | 'json'

export const RESPONSE_FORMATS = ['markdown', 'json'] as const satisfies readonly ResponseFormat[]

/**
 * Serializes a structured document the way every tool returns JSON.
 */
export const toJson = (value: unknown): string => JSON.stringify(value, null, 2)

/**
 * Picks the rendering for the requested format. Both renderings are derived
 * from the same entities; markdown is curated, JSON is complete.
 *
 * @example
 * renderResponse(params.response_format, {
 *   markdown: () => renderAccountsMarkdown(accounts),
 *   json: () => accounts.map(transformAccount),
 * })
 */
export const renderResponse = (
  format: ResponseFormat,
  renderings: { markdown: () => string; json: () => unknown }
): string => (format === 'markdown' ? renderings.markdown() : toJson(renderings.json()))

/**
 * Whether hidden or closed entities appear in markdown. JSON always has them.
 */
export interface Visibility {
  includeHidden?: boolean
  includeClosed?: boolean
}
