/**
 * Holiday Calendar
 *
 * Consumer-facing query surface over a rule table: single-date lookups and
 * inclusive day-by-day range scans.
 */

import type { LocalDate } from './time-date'
import { addDays, daysBetween } from './time-date'
import type { HolidayRule } from './rules'
import { JAPANESE_HOLIDAY_RULES } from './japanese-rules'
import {
  type CategoryFilter,
  type ResolvedHoliday,
  ALL_CATEGORIES,
  auditRules,
  resolve,
} from './engine'

// ============================================================================
// Types
// ============================================================================

export type Holiday = {
  readonly name: string
  readonly date: LocalDate
}

export type HolidayLogger = Pick<Console, 'warn'>

export type HolidayCalendarConfig = {
  rules?: readonly HolidayRule[]
  logger?: HolidayLogger
}

export interface HolidayCalendar {
  readonly rules: readonly HolidayRule[]
  isHoliday(date: LocalDate): boolean
  getHoliday(date: LocalDate): Holiday | null
  /** False when end < start */
  existsHoliday(start: LocalDate, end: LocalDate): boolean
  /** Chronological; empty when end < start */
  getHolidays(start: LocalDate, end: LocalDate): Holiday[]
  resolve(date: LocalDate, filter?: CategoryFilter): ResolvedHoliday | null
}

// ============================================================================
// Factory
// ============================================================================

function toHoliday(resolved: ResolvedHoliday): Holiday {
  return Object.freeze({ name: resolved.name, date: resolved.date })
}

export function createHolidayCalendar(config: HolidayCalendarConfig = {}): HolidayCalendar {
  const rules: readonly HolidayRule[] = Object.freeze([...(config.rules ?? JAPANESE_HOLIDAY_RULES)])
  const logger = config.logger ?? console

  for (const overlap of auditRules(rules)) {
    logger.warn(
      `Rules '${overlap.first.name}' and '${overlap.second.name}' (${overlap.first.category}) ` +
      `both match the same dates in years ${overlap.years.start}-${overlap.years.end}; ` +
      `'${overlap.first.name}' wins`
    )
  }

  function getHoliday(date: LocalDate): Holiday | null {
    const resolved = resolve(rules, date, ALL_CATEGORIES)
    return resolved ? toHoliday(resolved) : null
  }

  function* scanRange(start: LocalDate, end: LocalDate): Generator<Holiday> {
    const span = daysBetween(start, end)
    for (let i = 0; i <= span; i++) {
      const h = getHoliday(addDays(start, i))
      if (h) yield h
    }
  }

  return {
    rules,
    isHoliday: (date) => getHoliday(date) !== null,
    getHoliday,
    existsHoliday(start, end) {
      return !scanRange(start, end).next().done
    },
    getHolidays: (start, end) => [...scanRange(start, end)],
    resolve: (date, filter = ALL_CATEGORIES) => resolve(rules, date, filter),
  }
}

// ============================================================================
// Default Calendar
// ============================================================================

const defaultCalendar = createHolidayCalendar()

export function isHoliday(date: LocalDate): boolean {
  return defaultCalendar.isHoliday(date)
}

export function getHoliday(date: LocalDate): Holiday | null {
  return defaultCalendar.getHoliday(date)
}

export function existsHoliday(start: LocalDate, end: LocalDate): boolean {
  return defaultCalendar.existsHoliday(start, end)
}

export function getHolidays(start: LocalDate, end: LocalDate): Holiday[] {
  return defaultCalendar.getHolidays(start, end)
}
