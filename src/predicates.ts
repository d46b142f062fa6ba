/**
 * Predicate Primitives
 *
 * The three independent parts of a holiday rule: a closed year interval,
 * a closed month interval and a day predicate. All are pure.
 */

import {
  type LocalDate,
  type Weekday,
  addDays,
  dayOf,
  dayOfWeek,
  makeDate,
  monthOf,
  weekdayToIndex,
  yearOf,
} from './time-date'

// ============================================================================
// Errors
// ============================================================================

export { InvalidRuleError } from './errors'
import { InvalidRuleError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Closed, inclusive interval. */
export type Interval = {
  readonly start: number
  readonly end: number
}

export type YearPredicate = Interval
export type MonthPredicate = Interval

/**
 * Holiday-only lookup handed to computed predicates. Answers whether a
 * genuine holiday rule matches the given date, ignoring substitute and
 * national rules.
 */
export type HolidayLookup = (date: LocalDate) => boolean

export type DayPredicate =
  | { readonly type: 'fixed'; readonly day: number }
  | { readonly type: 'nthWeekday'; readonly week: number; readonly weekday: Weekday }
  | { readonly type: 'computed'; readonly test: (date: LocalDate, lookup: HolidayLookup) => boolean }

export const MIN_BOUND = Number.MIN_SAFE_INTEGER
export const MAX_BOUND = Number.MAX_SAFE_INTEGER

// ============================================================================
// Interval Builders
// ============================================================================

function interval(start: number, end: number, label: string): Interval {
  if (start > end) {
    throw new InvalidRuleError(`${label} range start ${start} is after end ${end}`)
  }
  return Object.freeze({ start, end })
}

function checkMonth(month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidRuleError(`Month must be 1-12, got ${month}`)
  }
  return month
}

/** `before` and `after` include the boundary value itself. */
export const Year = {
  just: (year: number): YearPredicate => interval(year, year, 'Year'),
  before: (year: number): YearPredicate => interval(MIN_BOUND, year, 'Year'),
  after: (year: number): YearPredicate => interval(year, MAX_BOUND, 'Year'),
  range: (start: number, end: number): YearPredicate => interval(start, end, 'Year'),
  any: (): YearPredicate => interval(MIN_BOUND, MAX_BOUND, 'Year'),
} as const

export const Month = {
  just: (month: number): MonthPredicate => interval(checkMonth(month), month, 'Month'),
  before: (month: number): MonthPredicate => interval(MIN_BOUND, checkMonth(month), 'Month'),
  after: (month: number): MonthPredicate => interval(checkMonth(month), MAX_BOUND, 'Month'),
  range: (start: number, end: number): MonthPredicate =>
    interval(checkMonth(start), checkMonth(end), 'Month'),
  any: (): MonthPredicate => interval(MIN_BOUND, MAX_BOUND, 'Month'),
} as const

export function inInterval(value: number, iv: Interval): boolean {
  return value >= iv.start && value <= iv.end
}

export function intervalsOverlap(a: Interval, b: Interval): boolean {
  return a.start <= b.end && b.start <= a.end
}

// ============================================================================
// Day Builders
// ============================================================================

export const Day = {
  fixed(day: number): DayPredicate {
    if (!Number.isInteger(day) || day < 1 || day > 31) {
      throw new InvalidRuleError(`Day must be 1-31, got ${day}`)
    }
    const predicate: DayPredicate = { type: 'fixed', day }
    return Object.freeze(predicate)
  },
  nthWeekday(week: number, weekday: Weekday): DayPredicate {
    if (!Number.isInteger(week) || week < 1) {
      throw new InvalidRuleError(`Week index must be >= 1, got ${week}`)
    }
    const predicate: DayPredicate = { type: 'nthWeekday', week, weekday }
    return Object.freeze(predicate)
  },
  computed(test: (date: LocalDate, lookup: HolidayLookup) => boolean): DayPredicate {
    const predicate: DayPredicate = { type: 'computed', test }
    return Object.freeze(predicate)
  },
} as const

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Date of the `week`-th `weekday` counted from the 1st of the month.
 * May spill into the following month when `week` is too large.
 */
export function nthWeekdayDate(year: number, month: number, week: number, weekday: Weekday): LocalDate {
  const first = makeDate(year, month, 1)
  const firstIdx = weekdayToIndex(dayOfWeek(first))
  const targetIdx = weekdayToIndex(weekday)
  const offset = targetIdx >= firstIdx
    ? targetIdx - firstIdx
    : weekdayToIndex('sat') - firstIdx + targetIdx + 1
  return addDays(first, 7 * (week - 1) + offset)
}

export function evaluateDay(predicate: DayPredicate, date: LocalDate, lookup: HolidayLookup): boolean {
  switch (predicate.type) {
    case 'fixed':
      return dayOf(date) === predicate.day
    case 'nthWeekday': {
      const target = nthWeekdayDate(yearOf(date), monthOf(date), predicate.week, predicate.weekday)
      return monthOf(date) === monthOf(target) && dayOf(date) === dayOf(target)
    }
    case 'computed':
      return predicate.test(date, lookup)
  }
}
