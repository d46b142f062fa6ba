/**
 * Resolution Engine
 *
 * Linear first-match scan over an ordered rule table. Substitute and
 * national rules query neighbouring dates through a holiday-only lookup,
 * which is what bounds the recursion: a holiday-only pass never evaluates
 * a rule that could look further.
 */

import type { LocalDate } from './time-date'
import { type Interval, type DayPredicate, intervalsOverlap } from './predicates'
import { HolidayCategory, type HolidayRule, matchesRule } from './rules'

export { RecursiveLookupError } from './errors'
import { RecursiveLookupError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CategoryFilter = {
  includeSubstitute: boolean
  includeNational: boolean
}

export type ResolvedHoliday = {
  readonly name: string
  readonly category: HolidayCategory
  readonly date: LocalDate
}

export const ALL_CATEGORIES: Readonly<CategoryFilter> = Object.freeze({
  includeSubstitute: true,
  includeNational: true,
})

export const HOLIDAYS_ONLY: Readonly<CategoryFilter> = Object.freeze({
  includeSubstitute: false,
  includeNational: false,
})

// ============================================================================
// Resolution
// ============================================================================

function accepts(filter: CategoryFilter, category: HolidayCategory): boolean {
  if (category === HolidayCategory.SUBSTITUTE) return filter.includeSubstitute
  if (category === HolidayCategory.NATIONAL) return filter.includeNational
  return true
}

function scan(
  rules: readonly HolidayRule[],
  date: LocalDate,
  filter: CategoryFilter,
  nested: boolean
): ResolvedHoliday | null {
  const lookup = (d: LocalDate): boolean => {
    if (nested) {
      throw new RecursiveLookupError(
        `Holiday-only evaluation of ${date} requested a lookup of ${d}; ` +
        'only substitute and national rules may query other dates'
      )
    }
    return scan(rules, d, HOLIDAYS_ONLY, true) !== null
  }

  for (const r of rules) {
    if (!accepts(filter, r.category)) continue
    if (matchesRule(r, date, lookup)) {
      return { name: r.name, category: r.category, date }
    }
  }
  return null
}

export function resolve(
  rules: readonly HolidayRule[],
  date: LocalDate,
  filter: CategoryFilter = ALL_CATEGORIES
): ResolvedHoliday | null {
  return scan(rules, date, filter, false)
}

// ============================================================================
// Table Audit
// ============================================================================

export type RuleOverlap = {
  first: HolidayRule
  second: HolidayRule
  years: Interval
}

function daysCollide(a: DayPredicate, b: DayPredicate): boolean {
  if (a.type === 'fixed' && b.type === 'fixed') return a.day === b.day
  if (a.type === 'nthWeekday' && b.type === 'nthWeekday') {
    return a.week === b.week && a.weekday === b.weekday
  }
  return false
}

/**
 * Pairs of same-category rules that can match the same date. Computed day
 * predicates are opaque and never reported.
 */
export function auditRules(rules: readonly HolidayRule[]): RuleOverlap[] {
  const overlaps: RuleOverlap[] = []
  rules.forEach((a, i) => {
    for (const b of rules.slice(i + 1)) {
      if (a.category !== b.category) continue
      if (!intervalsOverlap(a.year, b.year) || !intervalsOverlap(a.month, b.month)) continue
      if (!daysCollide(a.day, b.day)) continue
      overlaps.push({
        first: a,
        second: b,
        years: { start: Math.max(a.year.start, b.year.start), end: Math.min(a.year.end, b.year.end) },
      })
    }
  })
  return overlaps
}
