import { transformAccount } from './entity-transformer.js'
import type { BudgetDetailRecord, CurrencyFormatRecord, EntityDocument } from './entity-types.js'

export interface BudgetOverviewGroup {
  id: string
  name: string
  hidden: boolean
  categories: string[]
}

/**
 * Curated view of a full budget: accounts and the category tree by name,
 * without payees, months or transactions.
 */
export interface BudgetOverview {
  id: string
  name: string
  last_modified_on: string | null
  currency_format: CurrencyFormatRecord | null
  accounts: EntityDocument[]
  category_groups: BudgetOverviewGroup[]
}

export const buildBudgetOverview = (budget: BudgetDetailRecord): BudgetOverview => {
  const namesByGroup = new Map<string, string[]>()
  for (const category of budget.categories ?? []) {
    const names = namesByGroup.get(category.category_group_id) ?? []
    names.push(category.name)
    namesByGroup.set(category.category_group_id, names)
  }

  return {
    id: budget.id,
    name: budget.name,
    last_modified_on: budget.last_modified_on ?? null,
    currency_format: budget.currency_format ?? null,
    accounts: (budget.accounts ?? []).map(transformAccount),
    category_groups: (budget.category_groups ?? []).map((group) => ({
      id: group.id,
      name: group.name,
      hidden: group.hidden,
      categories: namesByGroup.get(group.id) ?? [],
    })),
  }
}
