/**
 * Holiday Rule
 *
 * A named conjunction of year, month and day predicates, tagged with the
 * category that decides when the resolution engine considers it.
 */

import type { LocalDate } from './time-date'
import { monthOf, yearOf } from './time-date'
import {
  type DayPredicate,
  type HolidayLookup,
  type MonthPredicate,
  type YearPredicate,
  evaluateDay,
  inInterval,
} from './predicates'

// ============================================================================
// Category
// ============================================================================

export const HolidayCategory = {
  /** Fixed, floating or computed observance */
  HOLIDAY: 'holiday',
  /** Weekday off because an observance fell on a Sunday */
  SUBSTITUTE: 'substitute',
  /** Weekday sandwiched between two observances */
  NATIONAL: 'national',
} as const

export type HolidayCategory = (typeof HolidayCategory)[keyof typeof HolidayCategory]

// ============================================================================
// Rule
// ============================================================================

export type HolidayRule = {
  readonly name: string
  readonly category: HolidayCategory
  readonly year: YearPredicate
  readonly month: MonthPredicate
  readonly day: DayPredicate
}

function rule(
  name: string,
  category: HolidayCategory,
  year: YearPredicate,
  month: MonthPredicate,
  day: DayPredicate
): HolidayRule {
  return Object.freeze({ name, category, year, month, day })
}

export function holiday(name: string, year: YearPredicate, month: MonthPredicate, day: DayPredicate): HolidayRule {
  return rule(name, HolidayCategory.HOLIDAY, year, month, day)
}

export function substituteHoliday(name: string, year: YearPredicate, month: MonthPredicate, day: DayPredicate): HolidayRule {
  return rule(name, HolidayCategory.SUBSTITUTE, year, month, day)
}

export function nationalHoliday(name: string, year: YearPredicate, month: MonthPredicate, day: DayPredicate): HolidayRule {
  return rule(name, HolidayCategory.NATIONAL, year, month, day)
}

export function matchesRule(r: HolidayRule, date: LocalDate, lookup: HolidayLookup): boolean {
  if (!inInterval(yearOf(date), r.year)) return false
  if (!inInterval(monthOf(date), r.month)) return false
  return evaluateDay(r.day, date, lookup)
}
