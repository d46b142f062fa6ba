/**
 * Segment 05: Resolution Engine Tests
 *
 * First-match scanning, category filters, substitute and bridging
 * holidays, the recursion bound and the table audit.
 */

import { describe, it, expect, vi } from 'vitest'
import {
  resolve,
  auditRules,
  ALL_CATEGORIES,
  HOLIDAYS_ONLY,
  RecursiveLookupError,
} from '../src/engine'
import {
  JAPANESE_HOLIDAY_RULES,
  isSubstituteSince2007,
  isSubstituteSince1973,
  isBridgingHoliday,
} from '../src/japanese-rules'
import { holiday, substituteHoliday, nationalHoliday } from '../src/rules'
import { Year, Month, Day, type HolidayLookup } from '../src/predicates'
import { HolidayRulesErrorCode } from '../src/errors'
import { makeDate, parseDate, type LocalDate } from '../src/time-date'

function d(s: string): LocalDate {
  const r = parseDate(s)
  if (!r.ok) throw r.error
  return r.value
}

function lookupOf(...dates: string[]): HolidayLookup {
  const set = new Set(dates)
  return (date) => set.has(date)
}

const rules = JAPANESE_HOLIDAY_RULES

// ============================================================================
// 1. FIRST MATCH
// ============================================================================

describe('resolve', () => {
  it('returns name, category and date of the match', () => {
    expect(resolve(rules, d('2024-01-01'))).toEqual({
      name: '元日',
      category: 'holiday',
      date: '2024-01-01',
    })
  })

  it('returns null for an ordinary day', () => {
    expect(resolve(rules, d('2024-01-02'))).toBeNull()
  })

  it('takes the first matching rule in table order', () => {
    const table = [
      holiday('first', Year.any(), Month.just(6), Day.fixed(1)),
      holiday('second', Year.any(), Month.any(), Day.fixed(1)),
    ]
    expect(resolve(table, d('2024-06-01'))?.name).toBe('first')
    expect(resolve(table, d('2024-07-01'))?.name).toBe('second')
  })

  it('prefers the observance over a substitute on the same day', () => {
    // 2008-05-04 was a Sunday; 5/5 keeps its own name
    expect(resolve(rules, d('2008-05-05'))?.name).toBe('こどもの日')
    expect(resolve(rules, d('2008-05-06'))?.name).toBe('振替休日')
  })

  it('returns null before the holiday law for dates with no rule', () => {
    expect(resolve(rules, d('1800-01-01'))).toBeNull()
    expect(resolve(rules, d('1948-01-01'))).toBeNull()
  })
})

// ============================================================================
// 2. CATEGORY FILTERS
// ============================================================================

describe('category filters', () => {
  it('drop substitute holidays when excluded', () => {
    expect(resolve(rules, d('2019-05-06'), HOLIDAYS_ONLY)).toBeNull()
    expect(resolve(rules, d('2019-05-06'), { includeSubstitute: true, includeNational: false })?.category)
      .toBe('substitute')
  })

  it('drop national holidays when excluded', () => {
    expect(resolve(rules, d('2019-04-30'), { includeSubstitute: true, includeNational: false })).toBeNull()
    expect(resolve(rules, d('2019-04-30'), ALL_CATEGORIES)?.category).toBe('national')
  })

  it('never hide genuine holidays', () => {
    expect(resolve(rules, d('2019-05-01'), HOLIDAYS_ONLY)?.name).toBe('天皇の即位の日')
  })

  it('default to all categories', () => {
    expect(resolve(rules, d('2019-05-02'))?.name).toBe('国民の休日')
  })
})

// ============================================================================
// 3. SUBSTITUTE HOLIDAYS
// ============================================================================

describe('substitute holidays (2007 onward)', () => {
  it.each([
    ['2024-02-12'],
    ['2024-11-04'],
    ['2020-02-24'],
    ['2021-08-09'],
    ['2012-01-02'],
  ])('%s follows a Sunday holiday', (date) => {
    expect(resolve(rules, d(date))?.name).toBe('振替休日')
  })

  it('pushes past a run of holidays that contains the Sunday', () => {
    // 2025: 5/3 Sat, 5/4 Sun, 5/5 Mon holidays
    expect(resolve(rules, d('2025-05-06'))?.name).toBe('振替休日')
    expect(resolve(rules, d('2025-05-07'))).toBeNull()
  })

  it('finds the Sunday even when the run began on a weekday', () => {
    // 2019: 5/3 Fri, 5/4 Sat, 5/5 Sun
    expect(resolve(rules, d('2019-05-06'))?.name).toBe('振替休日')
  })

  it('stops at the first Sunday of the run', () => {
    const lookup = vi.fn(lookupOf('2024-05-03', '2024-05-04', '2024-05-05'))
    // 2024-05-05 is a Sunday, met on the first step
    expect(isSubstituteSince2007(d('2024-05-06'), lookup)).toBe(true)
    expect(lookup).toHaveBeenCalledTimes(1)
  })

  it('accepts a Sunday deep inside the run', () => {
    // Sun 2024-03-03, Mon, Tue holidays -> Wed qualifies
    expect(isSubstituteSince2007(d('2024-03-06'), lookupOf('2024-03-03', '2024-03-04', '2024-03-05'))).toBe(true)
  })

  it('rejects a run with no Sunday', () => {
    expect(isSubstituteSince2007(d('2024-03-07'), lookupOf('2024-03-04', '2024-03-05', '2024-03-06'))).toBe(false)
  })

  it('rejects when the previous day is not a holiday', () => {
    expect(isSubstituteSince2007(d('2024-03-05'), lookupOf('2024-03-03'))).toBe(false)
  })
})

describe('substitute holidays (1973-2006)', () => {
  it('applies from 12 April 1973', () => {
    expect(resolve(rules, d('1973-04-30'))?.name).toBe('振替休日')
    // 1973-02-11 was a Sunday, before the law took effect
    expect(resolve(rules, d('1973-02-12'))).toBeNull()
  })

  it('applies in the 1990s', () => {
    expect(resolve(rules, d('1992-05-04'))?.name).toBe('振替休日')
    expect(resolve(rules, d('2002-09-16'))?.name).toBe('振替休日')
  })

  it('only looks one day back', () => {
    // Sun 1990-04-29 and Mon 1990-04-30 holidays -> Tue does not qualify
    const lookup = lookupOf('1990-04-29', '1990-04-30')
    expect(isSubstituteSince1973(d('1990-05-01'), lookup)).toBe(false)
    expect(isSubstituteSince2007(d('1990-05-01'), lookup)).toBe(true)
  })

  it('asks whether the previous day is a holiday', () => {
    const lookup = vi.fn(lookupOf('1990-04-30'))
    // Mon 1990-04-30 is a holiday but not a Sunday
    expect(isSubstituteSince1973(d('1990-05-01'), lookup)).toBe(false)
    expect(lookup).toHaveBeenCalledWith('1990-04-30')
  })

  it('ignores dates before the start date', () => {
    expect(isSubstituteSince1973(d('1973-04-02'), lookupOf('1973-04-01'))).toBe(false)
    expect(isSubstituteSince1973(d('1973-04-16'), lookupOf('1973-04-15'))).toBe(true)
  })
})

// ============================================================================
// 4. NATIONAL (BRIDGING) HOLIDAYS
// ============================================================================

describe('national holidays', () => {
  it.each([
    ['1988-05-04'],
    ['2006-05-04'],
    ['2009-09-22'],
    ['2015-09-22'],
    ['2019-04-30'],
    ['2019-05-02'],
    ['2026-09-22'],
  ])('%s is sandwiched between holidays', (date) => {
    expect(resolve(rules, d(date))?.name).toBe('国民の休日')
  })

  it('does not exist before 1986', () => {
    // 1985-05-04 was a Saturday between two holidays
    expect(resolve(rules, d('1985-05-04'))).toBeNull()
  })

  it('never falls on a Sunday', () => {
    // 1986-05-04 was a Sunday between two holidays
    expect(resolve(rules, d('1986-05-04'))).toBeNull()
    expect(isBridgingHoliday(d('1986-05-04'), () => true)).toBe(false)
  })

  it('requires holidays on both sides', () => {
    expect(isBridgingHoliday(d('2024-03-05'), lookupOf('2024-03-04'))).toBe(false)
    expect(isBridgingHoliday(d('2024-03-05'), lookupOf('2024-03-06'))).toBe(false)
    expect(isBridgingHoliday(d('2024-03-05'), lookupOf('2024-03-04', '2024-03-06'))).toBe(true)
  })
})

// ============================================================================
// 5. RECURSION BOUND
// ============================================================================

describe('recursion bound', () => {
  it('gives derived rules a holiday-only view of neighbours', () => {
    const table = [
      substituteHoliday('s', Year.any(), Month.any(), Day.computed((date, lookup) => lookup(date))),
      nationalHoliday('n', Year.any(), Month.any(), Day.fixed(1)),
    ]
    // the substitute rule's own lookup cannot see 'n'
    expect(resolve(table, d('2024-01-01'))?.name).toBe('n')
  })

  it('rejects a holiday rule that queries other dates', () => {
    const table = [
      holiday('self', Year.any(), Month.any(), Day.computed((date, lookup) => lookup(date))),
    ]
    expect(() => resolve(table, d('2024-01-01'))).toThrow(RecursiveLookupError)
    try {
      resolve(table, d('2024-01-01'))
    } catch (e) {
      expect(e).toBeInstanceOf(RecursiveLookupError)
      if (e instanceof RecursiveLookupError) {
        expect(e.code).toBe(HolidayRulesErrorCode.RECURSIVE_LOOKUP)
      }
    }
  })

  it('never re-enters a derived rule from a derived rule', () => {
    const outer = vi.fn((_date: LocalDate, lookup: HolidayLookup) => lookup(makeDate(2024, 1, 1)))
    const table = [
      holiday('h', Year.any(), Month.just(1), Day.fixed(1)),
      substituteHoliday('s', Year.any(), Month.any(), Day.computed(outer)),
    ]
    expect(resolve(table, d('2024-01-02'))?.name).toBe('s')
    // once for 2024-01-02; the nested holiday-only pass skips 's'
    expect(outer).toHaveBeenCalledTimes(1)
  })
})

// ============================================================================
// 6. AUDIT
// ============================================================================

describe('auditRules', () => {
  it('finds no overlaps in the Japanese table', () => {
    expect(auditRules(JAPANESE_HOLIDAY_RULES)).toEqual([])
  })

  it('reports same-category rules sharing a fixed day', () => {
    const a = holiday('a', Year.range(1990, 2010), Month.just(4), Day.fixed(29))
    const b = holiday('b', Year.after(2005), Month.just(4), Day.fixed(29))
    const overlaps = auditRules([a, b])
    expect(overlaps).toHaveLength(1)
    expect(overlaps[0]?.first).toBe(a)
    expect(overlaps[0]?.second).toBe(b)
    expect(overlaps[0]?.years).toEqual({ start: 2005, end: 2010 })
  })

  it('reports rules sharing an nth weekday', () => {
    const a = holiday('a', Year.any(), Month.just(10), Day.nthWeekday(2, 'mon'))
    const b = holiday('b', Year.any(), Month.any(), Day.nthWeekday(2, 'mon'))
    expect(auditRules([a, b])).toHaveLength(1)
  })

  it('ignores different categories, disjoint years and computed days', () => {
    const fixed = Day.fixed(1)
    expect(auditRules([
      holiday('a', Year.any(), Month.any(), fixed),
      substituteHoliday('b', Year.any(), Month.any(), fixed),
    ])).toEqual([])
    expect(auditRules([
      holiday('a', Year.range(1949, 1988), Month.any(), fixed),
      holiday('b', Year.range(1989, 2006), Month.any(), fixed),
    ])).toEqual([])
    expect(auditRules([
      holiday('a', Year.any(), Month.any(), Day.computed(() => true)),
      holiday('b', Year.any(), Month.any(), Day.computed(() => true)),
    ])).toEqual([])
  })
})
