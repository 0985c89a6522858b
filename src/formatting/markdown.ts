import { toDisplay } from '../money/amount-codec.js'
import type {
  AccountRecord,
  BudgetDetailRecord,
  BudgetSummaryRecord,
  CategoryGroupWithCategoriesRecord,
  CategoryRecord,
  MonthRecord,
  PayeeRecord,
  ScheduledTransactionRecord,
} from '../entities/entity-types.js'
import type { Visibility } from './response-format.js'

const isShownAccount = (account: AccountRecord, visibility: Visibility): boolean =>
  visibility.includeClosed === true || !account.closed

const isShown = (entity: { hidden: boolean }, visibility: Visibility): boolean =>
  visibility.includeHidden === true || !entity.hidden

const yesNo = (value: boolean): string => (value ? 'Yes' : 'No')

/**
 * Groups categories under their group id, keeping API order.
 */
const categoriesByGroup = (categories: CategoryRecord[]): Map<string, CategoryRecord[]> => {
  const groups = new Map<string, CategoryRecord[]>()
  for (const category of categories) {
    const list = groups.get(category.category_group_id) ?? []
    list.push(category)
    groups.set(category.category_group_id, list)
  }
  return groups
}

export const renderBudgetsMarkdown = (
  budgets: BudgetSummaryRecord[],
  includeAccounts: boolean,
  visibility: Visibility = {}
): string => {
  const lines = ['# YNAB Budgets', '']

  for (const budget of budgets) {
    lines.push(`## ${budget.name}`)
    lines.push(`- **ID**: \`${budget.id}\``)
    if (budget.last_modified_on) {
      lines.push(`- **Last Modified**: ${budget.last_modified_on}`)
    }
    const accounts = (budget.accounts ?? []).filter((a) => isShownAccount(a, visibility))
    if (includeAccounts && accounts.length > 0) {
      lines.push('- **Accounts**:')
      for (const account of accounts) {
        lines.push(`  - ${account.name}: ${toDisplay(account.balance)}`)
      }
    }
    lines.push('')
  }

  return lines.join('\n')
}

export const renderBudgetSummaryMarkdown = (
  budget: BudgetDetailRecord,
  visibility: Visibility = {}
): string => {
  const lines = [`# Budget: ${budget.name}`, '']
  lines.push(`**ID**: \`${budget.id}\``)
  if (budget.last_modified_on) {
    lines.push(`**Last Modified**: ${budget.last_modified_on}`)
  }
  lines.push('')

  lines.push('## Accounts')
  for (const account of (budget.accounts ?? []).filter((a) => isShownAccount(a, visibility))) {
    const lock = account.closed ? ' 🔒' : ''
    lines.push(
      `- **${account.name}**${lock}: ${toDisplay(account.balance)} (cleared: ${toDisplay(account.cleared_balance)})`
    )
  }
  lines.push('')

  lines.push('## Category Groups')
  const grouped = categoriesByGroup(budget.categories ?? [])
  for (const group of budget.category_groups ?? []) {
    if (!isShown(group, visibility)) continue
    lines.push(`### ${group.name}`)
    for (const category of grouped.get(group.id) ?? []) {
      if (!isShown(category, visibility)) continue
      lines.push(`  - ${category.name}`)
    }
    lines.push('')
  }

  return lines.join('\n')
}

export const renderAccountsMarkdown = (accounts: AccountRecord[], visibility: Visibility = {}): string => {
  const lines = ['# Accounts', '']

  for (const account of accounts) {
    if (!isShownAccount(account, visibility)) continue
    const status = account.closed ? ' (closed)' : ''
    const onBudget = account.on_budget ? 'on-budget' : 'off-budget'
    lines.push(`## ${account.name}${status}`)
    lines.push(`- **ID**: \`${account.id}\``)
    lines.push(`- **Type**: ${account.type} (${onBudget})`)
    lines.push(`- **Balance**: ${toDisplay(account.balance)}`)
    lines.push(`- **Cleared**: ${toDisplay(account.cleared_balance)}`)
    lines.push(`- **Uncleared**: ${toDisplay(account.uncleared_balance)}`)
    lines.push('')
  }

  return lines.join('\n')
}

export const renderAccountMarkdown = (account: AccountRecord): string =>
  [
    `# ${account.name}`,
    '',
    `**ID**: \`${account.id}\``,
    `**Type**: ${account.type}`,
    `**On Budget**: ${yesNo(account.on_budget)}`,
    `**Closed**: ${yesNo(account.closed)}`,
    '',
    '## Balances',
    `- **Balance**: ${toDisplay(account.balance)}`,
    `- **Cleared**: ${toDisplay(account.cleared_balance)}`,
    `- **Uncleared**: ${toDisplay(account.uncleared_balance)}`,
  ].join('\n')

export const renderCategoriesMarkdown = (
  groups: CategoryGroupWithCategoriesRecord[],
  visibility: Visibility = {}
): string => {
  const lines = ['# Categories', '']

  for (const group of groups) {
    if (!isShown(group, visibility)) continue
    lines.push(`## ${group.name}`)
    for (const category of group.categories) {
      if (!isShown(category, visibility)) continue
      lines.push(`- **${category.name}** (\`${category.id}\`)`)
      lines.push(
        `  - Budgeted: ${toDisplay(category.budgeted)} | Activity: ${toDisplay(category.activity)} | Balance: ${toDisplay(category.balance)}`
      )
    }
    lines.push('')
  }

  return lines.join('\n')
}

export const renderCategoryMarkdown = (category: CategoryRecord): string => {
  const lines = [`# ${category.name}`, '']
  lines.push(`**ID**: \`${category.id}\``)
  lines.push(`**Budgeted**: ${toDisplay(category.budgeted)}`)
  lines.push(`**Activity**: ${toDisplay(category.activity)}`)
  lines.push(`**Balance**: ${toDisplay(category.balance)}`)

  if (category.goal_type) {
    lines.push('')
    lines.push('## Goal')
    lines.push(`- Type: ${category.goal_type}`)
    if (category.goal_target !== undefined && category.goal_target !== null) {
      lines.push(`- Target: ${toDisplay(category.goal_target)}`)
    }
    if (category.goal_overall_left !== undefined && category.goal_overall_left !== null) {
      lines.push(`- Left to fund: ${toDisplay(category.goal_overall_left)}`)
    }
    if (category.goal_percentage_complete !== undefined && category.goal_percentage_complete !== null) {
      lines.push(`- Progress: ${category.goal_percentage_complete}%`)
    }
  }

  return lines.join('\n')
}

export const renderPayeesMarkdown = (payees: PayeeRecord[]): string =>
  ['# Payees', '', ...payees.map((p) => `- **${p.name}** (\`${p.id}\`)`)].join('\n')

export const renderMonthMarkdown = (month: MonthRecord, visibility: Visibility = {}): string => {
  const lines = [`# Budget: ${month.month}`, '']
  lines.push(`**Income**: ${toDisplay(month.income)}`)
  lines.push(`**Budgeted**: ${toDisplay(month.budgeted)}`)
  lines.push(`**Activity**: ${toDisplay(month.activity)}`)
  lines.push(`**To Be Budgeted**: ${toDisplay(month.to_be_budgeted)}`)
  if (month.age_of_money) {
    lines.push(`**Age of Money**: ${month.age_of_money} days`)
  }
  lines.push('')

  lines.push('## Categories')
  for (const category of month.categories) {
    if (!isShown(category, visibility)) continue
    lines.push(`### ${category.name}`)
    lines.push(`- Budgeted: ${toDisplay(category.budgeted)}`)
    lines.push(`- Activity: ${toDisplay(category.activity)}`)
    lines.push(`- Balance: ${toDisplay(category.balance)}`)
    lines.push('')
  }

  return lines.join('\n')
}

export const renderScheduledTransactionsMarkdown = (transactions: ScheduledTransactionRecord[]): string => {
  const lines = ['# Scheduled Transactions', '']

  for (const tx of transactions) {
    lines.push(`## ${tx.payee_name ?? 'Unknown Payee'}`)
    lines.push(`- **ID**: \`${tx.id}\``)
    lines.push(`- **Amount**: ${toDisplay(tx.amount)}`)
    lines.push(`- **Frequency**: ${tx.frequency}`)
    lines.push(`- **Next Date**: ${tx.date_next}`)
    if (tx.memo) {
      lines.push(`- **Memo**: ${tx.memo}`)
    }
    lines.push('')
  }

  return lines.join('\n')
}
