/**
 * Japanese National Holiday Rules
 *
 * Every revision of the national holiday law since 1948, in evaluation
 * order, including the Olympic moves of 2020 and 2021. The same holiday
 * name appears once per era; entries in the same category never match
 * the same date.
 */

import type { LocalDate } from './time-date'
import { addDays, dayOf, dayOfWeek, makeDate, yearOf } from './time-date'
import { Day, type HolidayLookup, Month, Year } from './predicates'
import { type HolidayRule, holiday, nationalHoliday, substituteHoliday } from './rules'

export const SUBSTITUTE_HOLIDAY_START: LocalDate = makeDate(1973, 4, 12)

// ============================================================================
// Equinox Approximations
// ============================================================================

type EquinoxFormula = {
  readonly from: number
  readonly to: number
  readonly base: number
  /** Year the leap-day correction is counted from */
  readonly epoch: number
}

const VERNAL_EQUINOX: readonly EquinoxFormula[] = [
  { from: 1949, to: 1979, base: 20.8357, epoch: 1983 },
  { from: 1980, to: 2099, base: 20.8431, epoch: 1980 },
  { from: 2100, to: 2150, base: 21.851, epoch: 1980 },
]

const AUTUMNAL_EQUINOX: readonly EquinoxFormula[] = [
  { from: 1948, to: 1979, base: 23.2588, epoch: 1983 },
  { from: 1980, to: 2099, base: 23.2488, epoch: 1980 },
  { from: 2100, to: 2150, base: 24.2488, epoch: 1980 },
]

// Both terms truncate toward zero, so years before the epoch round up.
function equinoxDay(f: EquinoxFormula, year: number): number {
  return Math.trunc(f.base + 0.242194 * (year - 1980)) - Math.trunc((year - f.epoch) / 4)
}

function equinoxFor(table: readonly EquinoxFormula[], year: number): number | null {
  const f = table.find(e => year >= e.from && year <= e.to)
  return f ? equinoxDay(f, year) : null
}

/** Day of March, or null outside 1949-2150 */
export function vernalEquinoxDay(year: number): number | null {
  return equinoxFor(VERNAL_EQUINOX, year)
}

/** Day of September, or null outside 1948-2150 */
export function autumnalEquinoxDay(year: number): number | null {
  return equinoxFor(AUTUMNAL_EQUINOX, year)
}

function equinoxRule(name: string, month: number, f: EquinoxFormula): HolidayRule {
  return holiday(
    name,
    Year.range(f.from, f.to),
    Month.just(month),
    Day.computed(date => dayOf(date) === equinoxDay(f, yearOf(date)))
  )
}

// ============================================================================
// Derived Holidays
// ============================================================================

/**
 * 2007 revision: any weekday following an unbroken run of holidays that
 * contains a Sunday.
 */
export function isSubstituteSince2007(date: LocalDate, isHoliday: HolidayLookup): boolean {
  let d = addDays(date, -1)
  while (isHoliday(d)) {
    if (dayOfWeek(d) === 'sun') return true
    d = addDays(d, -1)
  }
  return false
}

/** 1973 revision: only the day right after a Sunday holiday. */
export function isSubstituteSince1973(date: LocalDate, isHoliday: HolidayLookup): boolean {
  if (date < SUBSTITUTE_HOLIDAY_START) return false
  const prev = addDays(date, -1)
  return isHoliday(prev) && dayOfWeek(prev) === 'sun'
}

export function isBridgingHoliday(date: LocalDate, isHoliday: HolidayLookup): boolean {
  if (dayOfWeek(date) === 'sun') return false
  return isHoliday(addDays(date, -1)) && isHoliday(addDays(date, 1))
}

// ============================================================================
// Rule Table
// ============================================================================

export const JAPANESE_HOLIDAY_RULES: readonly HolidayRule[] = Object.freeze([
  holiday('元日', Year.after(1949), Month.just(1), Day.fixed(1)),
  holiday('成人の日', Year.after(2000), Month.just(1), Day.nthWeekday(2, 'mon')),
  holiday('成人の日', Year.range(1949, 1999), Month.just(1), Day.fixed(15)),
  holiday('建国記念の日', Year.after(1967), Month.just(2), Day.fixed(11)),
  holiday('昭和の日', Year.after(2007), Month.just(4), Day.fixed(29)),
  holiday('憲法記念日', Year.after(1949), Month.just(5), Day.fixed(3)),
  holiday('みどりの日', Year.after(2007), Month.just(5), Day.fixed(4)),
  holiday('みどりの日', Year.range(1989, 2006), Month.just(4), Day.fixed(29)),
  holiday('こどもの日', Year.after(1949), Month.just(5), Day.fixed(5)),
  holiday('海の日', Year.after(2022), Month.just(7), Day.nthWeekday(3, 'mon')),
  holiday('海の日', Year.just(2021), Month.just(7), Day.fixed(22)),
  holiday('海の日', Year.just(2020), Month.just(7), Day.fixed(23)),
  holiday('海の日', Year.range(2003, 2019), Month.just(7), Day.nthWeekday(3, 'mon')),
  holiday('海の日', Year.range(1996, 2002), Month.just(7), Day.fixed(20)),
  holiday('山の日', Year.after(2022), Month.just(8), Day.fixed(11)),
  holiday('山の日', Year.just(2021), Month.just(8), Day.fixed(8)),
  holiday('山の日', Year.just(2020), Month.just(8), Day.fixed(10)),
  holiday('山の日', Year.range(2016, 2019), Month.just(8), Day.fixed(11)),
  holiday('敬老の日', Year.after(2003), Month.just(9), Day.nthWeekday(3, 'mon')),
  holiday('敬老の日', Year.range(1966, 2002), Month.just(9), Day.fixed(15)),
  holiday('体育の日', Year.range(2000, 2019), Month.just(10), Day.nthWeekday(2, 'mon')),
  holiday('体育の日', Year.range(1966, 1999), Month.just(10), Day.fixed(10)),
  holiday('スポーツの日', Year.after(2022), Month.just(10), Day.nthWeekday(2, 'mon')),
  holiday('スポーツの日', Year.just(2021), Month.just(7), Day.fixed(23)),
  holiday('スポーツの日', Year.just(2020), Month.just(7), Day.fixed(24)),
  holiday('文化の日', Year.after(1948), Month.just(11), Day.fixed(3)),
  holiday('勤労感謝の日', Year.after(1948), Month.just(11), Day.fixed(23)),
  holiday('天皇誕生日', Year.after(2020), Month.just(2), Day.fixed(23)),
  holiday('天皇誕生日', Year.range(1989, 2018), Month.just(12), Day.fixed(23)),
  holiday('天皇誕生日', Year.range(1949, 1988), Month.just(4), Day.fixed(29)),

  ...VERNAL_EQUINOX.map(f => equinoxRule('春分の日', 3, f)),
  ...AUTUMNAL_EQUINOX.map(f => equinoxRule('秋分の日', 9, f)),

  // One-off ceremonial days
  holiday('即位礼正殿の儀', Year.just(2019), Month.just(10), Day.fixed(22)),
  holiday('即位礼正殿の儀', Year.just(1990), Month.just(11), Day.fixed(12)),
  holiday('天皇の即位の日', Year.just(2019), Month.just(5), Day.fixed(1)),
  holiday('皇太子徳仁親王の結婚の儀', Year.just(1993), Month.just(6), Day.fixed(9)),
  holiday('昭和天皇の大喪の礼', Year.just(1989), Month.just(2), Day.fixed(24)),
  holiday('皇太子明仁親王の結婚の儀', Year.just(1959), Month.just(4), Day.fixed(10)),

  substituteHoliday('振替休日', Year.after(2007), Month.any(), Day.computed(isSubstituteSince2007)),
  substituteHoliday('振替休日', Year.range(1973, 2006), Month.any(), Day.computed(isSubstituteSince1973)),

  nationalHoliday('国民の休日', Year.after(1986), Month.any(), Day.computed(isBridgingHoliday)),
])
