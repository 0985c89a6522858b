import { describe, it, expect } from 'vitest'
import {
  renderAccountMarkdown,
  renderAccountsMarkdown,
  renderBudgetSummaryMarkdown,
  renderBudgetsMarkdown,
  renderCategoriesMarkdown,
  renderCategoryMarkdown,
  renderMonthMarkdown,
  renderPayeesMarkdown,
  renderScheduledTransactionsMarkdown,
} from '../markdown.js'
import {
  createMockAccount,
  createMockBudget,
  createMockCategory,
  createMockCategoryGroup,
  createMockMonth,
  createMockPayee,
  createMockScheduledTransaction,
} from '../../test-utils/fixtures.js'

const checking = createMockAccount({
  id: 'acc-1',
  name: 'Checking',
  balance: 12340,
  cleared_balance: 10000,
  uncleared_balance: 2340,
})

const savings = createMockAccount({
  id: 'acc-2',
  name: 'Old Savings',
  type: 'savings',
  on_budget: false,
  closed: true,
  balance: 0,
})

describe('renderAccountsMarkdown', () => {
  it('renders open accounts', () => {
    expect(renderAccountsMarkdown([checking, savings])).toBe(
      [
        '# Accounts',
        '',
        '## Checking',
        '- **ID**: `acc-1`',
        '- **Type**: checking (on-budget)',
        '- **Balance**: $12.34',
        '- **Cleared**: $10.00',
        '- **Uncleared**: $2.34',
        '',
      ].join('\n')
    )
  })

  it('marks closed accounts when included', () => {
    const text = renderAccountsMarkdown([savings], { includeClosed: true })

    expect(text.split('\n').slice(2, 5)).toEqual([
      '## Old Savings (closed)',
      '- **ID**: `acc-2`',
      '- **Type**: savings (off-budget)',
    ])
  })
})

describe('renderAccountMarkdown', () => {
  it('renders a single account', () => {
    expect(renderAccountMarkdown(checking)).toBe(
      [
        '# Checking',
        '',
        '**ID**: `acc-1`',
        '**Type**: checking',
        '**On Budget**: Yes',
        '**Closed**: No',
        '',
        '## Balances',
        '- **Balance**: $12.34',
        '- **Cleared**: $10.00',
        '- **Uncleared**: $2.34',
      ].join('\n')
    )
  })
})

describe('renderBudgetsMarkdown', () => {
  const budgets = [
    { id: 'b-1', name: 'Household', last_modified_on: '2024-03-15T10:00:00Z', accounts: [checking, savings] },
  ]

  it('lists budgets without accounts', () => {
    expect(renderBudgetsMarkdown(budgets, false)).toBe(
      ['# YNAB Budgets', '', '## Household', '- **ID**: `b-1`', '- **Last Modified**: 2024-03-15T10:00:00Z', ''].join(
        '\n'
      )
    )
  })

  it('lists open account balances when asked', () => {
    expect(renderBudgetsMarkdown(budgets, true).split('\n').slice(5, 8)).toEqual([
      '- **Accounts**:',
      '  - Checking: $12.34',
      '',
    ])
  })
})

describe('renderBudgetSummaryMarkdown', () => {
  const budget = createMockBudget({
    id: 'b-1',
    name: 'Household',
    last_modified_on: null,
    accounts: [checking, savings],
    category_groups: [
      { id: 'g-1', name: 'Bills', hidden: false, deleted: false },
      { id: 'g-2', name: 'Archive', hidden: true, deleted: false },
    ],
    categories: [
      createMockCategory({ name: 'Rent', category_group_id: 'g-1' }),
      createMockCategory({ name: 'Gym', category_group_id: 'g-1', hidden: true }),
      createMockCategory({ name: 'Old', category_group_id: 'g-2' }),
    ],
  })

  it('hides closed accounts and hidden categories by default', () => {
    expect(renderBudgetSummaryMarkdown(budget)).toBe(
      [
        '# Budget: Household',
        '',
        '**ID**: `b-1`',
        '',
        '## Accounts',
        '- **Checking**: $12.34 (cleared: $10.00)',
        '',
        '## Category Groups',
        '### Bills',
        '  - Rent',
        '',
      ].join('\n')
    )
  })

  it('shows everything when asked', () => {
    const text = renderBudgetSummaryMarkdown(budget, { includeHidden: true, includeClosed: true })

    expect(text).toContain('- **Old Savings** 🔒: $0.00 (cleared: $0.00)')
    expect(text).toContain('  - Gym')
    expect(text).toContain('### Archive\n  - Old')
  })
})

describe('renderCategoriesMarkdown', () => {
  it('renders groups with amounts', () => {
    const groups = [
      createMockCategoryGroup({
        name: 'Food',
        categories: [
          createMockCategory({ id: 'cat-1', name: 'Groceries', budgeted: 40000, activity: -12345, balance: 27655 }),
          createMockCategory({ id: 'cat-2', name: 'Hidden', hidden: true }),
        ],
      }),
      createMockCategoryGroup({ name: 'Secret', hidden: true }),
    ]

    expect(renderCategoriesMarkdown(groups)).toBe(
      [
        '# Categories',
        '',
        '## Food',
        '- **Groceries** (`cat-1`)',
        '  - Budgeted: $400.00 | Activity: -$12.35 | Balance: $276.55',
        '',
      ].join('\n')
    )
  })
})

describe('renderCategoryMarkdown', () => {
  it('omits the goal section without a goal', () => {
    const category = createMockCategory({ id: 'cat-1', name: 'Rent', budgeted: 150000, balance: 150000 })

    expect(renderCategoryMarkdown(category)).toBe(
      ['# Rent', '', '**ID**: `cat-1`', '**Budgeted**: $1,500.00', '**Activity**: $0.00', '**Balance**: $1,500.00'].join(
        '\n'
      )
    )
  })

  it('renders goal details', () => {
    const category = createMockCategory({
      goal_type: 'TBD',
      goal_target: 100000,
      goal_overall_left: 25000,
      goal_percentage_complete: 75,
    })

    expect(renderCategoryMarkdown(category).split('\n').slice(-5)).toEqual([
      '## Goal',
      '- Type: TBD',
      '- Target: $100.00',
      '- Left to fund: $25.00',
      '- Progress: 75%',
    ])
  })
})

describe('renderPayeesMarkdown', () => {
  it('lists payees with ids', () => {
    const payees = [createMockPayee({ id: 'p-1', name: 'Grocer' }), createMockPayee({ id: 'p-2', name: 'Landlord' })]

    expect(renderPayeesMarkdown(payees)).toBe(
      ['# Payees', '', '- **Grocer** (`p-1`)', '- **Landlord** (`p-2`)'].join('\n')
    )
  })
})

describe('renderMonthMarkdown', () => {
  const month = createMockMonth({
    month: '2024-03-01',
    income: 500000,
    budgeted: 450000,
    activity: -320000,
    to_be_budgeted: 50000,
    age_of_money: 42,
    categories: [
      createMockCategory({ name: 'Groceries', budgeted: 40000, activity: -35000, balance: 5000 }),
      createMockCategory({ name: 'Hidden', hidden: true }),
    ],
  })

  it('renders totals and visible categories', () => {
    expect(renderMonthMarkdown(month)).toBe(
      [
        '# Budget: 2024-03-01',
        '',
        '**Income**: $500.00',
        '**Budgeted**: $450.00',
        '**Activity**: -$320.00',
        '**To Be Budgeted**: $50.00',
        '**Age of Money**: 42 days',
        '',
        '## Categories',
        '### Groceries',
        '- Budgeted: $40.00',
        '- Activity: -$35.00',
        '- Balance: $5.00',
        '',
      ].join('\n')
    )
  })

  it('includes hidden categories when asked', () => {
    expect(renderMonthMarkdown(month, { includeHidden: true })).toContain('### Hidden')
  })

  it('omits age of money when unknown', () => {
    expect(renderMonthMarkdown(createMockMonth({ age_of_money: null }))).not.toContain('Age of Money')
  })
})

describe('renderScheduledTransactionsMarkdown', () => {
  it('renders each scheduled transaction', () => {
    const transactions = [
      createMockScheduledTransaction({
        id: 'st-1',
        payee_name: 'Landlord',
        amount: -150000,
        frequency: 'monthly',
        date_next: '2024-04-01',
        memo: 'Rent',
      }),
      createMockScheduledTransaction({ id: 'st-2', payee_name: null, amount: 2500, frequency: 'weekly', date_next: '2024-03-22' }),
    ]

    expect(renderScheduledTransactionsMarkdown(transactions)).toBe(
      [
        '# Scheduled Transactions',
        '',
        '## Landlord',
        '- **ID**: `st-1`',
        '- **Amount**: -$1,500.00',
        '- **Frequency**: monthly',
        '- **Next Date**: 2024-04-01',
        '- **Memo**: Rent',
        '',
        '## Unknown Payee',
        '- **ID**: `st-2`',
        '- **Amount**: $2.50',
        '- **Frequency**: weekly',
        '- **Next Date**: 2024-03-22',
        '',
      ].join('\n')
    )
  })
})
