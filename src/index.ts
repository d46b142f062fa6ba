/**
 * japan-holiday-rules
 *
 * Public API exports
 */

// Error system
export {
  HolidayRulesError, HolidayRulesErrorCode,
  ParseError, InvalidRuleError, RecursiveLookupError,
} from './errors'
export type { HolidayRulesErrorCode as HolidayRulesErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, Weekday } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, makeDate,
  yearOf, monthOf, dayOf,
  addDays, daysBetween,
  dayOfWeek, weekdayToIndex, indexToWeekday,
  compareDates, dateEquals, dateBefore, dateAfter,
} from './time-date'

// Predicates
export type {
  Interval, YearPredicate, MonthPredicate, DayPredicate, HolidayLookup,
} from './predicates'
export { Year, Month, Day, MIN_BOUND, MAX_BOUND, nthWeekdayDate } from './predicates'

// Rules
export type { HolidayRule } from './rules'
export { HolidayCategory, holiday, substituteHoliday, nationalHoliday } from './rules'

// Japanese rule table
export {
  JAPANESE_HOLIDAY_RULES, SUBSTITUTE_HOLIDAY_START,
  vernalEquinoxDay, autumnalEquinoxDay,
  isSubstituteSince2007, isSubstituteSince1973, isBridgingHoliday,
} from './japanese-rules'

// Resolution engine
export type { CategoryFilter, ResolvedHoliday, RuleOverlap } from './engine'
export { resolve, auditRules, ALL_CATEGORIES, HOLIDAYS_ONLY } from './engine'

// Calendar
export type {
  Holiday, HolidayCalendar, HolidayCalendarConfig, HolidayLogger,
} from './calendar'
export {
  createHolidayCalendar,
  isHoliday, getHoliday, existsHoliday, getHolidays,
} from './calendar'
