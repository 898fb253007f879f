import { enUS, de, fr } from 'date-fns/locale'
import {
  compareMonths,
  formatDate,
  generateMonthWeeks,
  isWithinBounds,
  makeDate,
  parseDate,
  shiftMonth,
} from './date'

describe('makeDate', () => {
  it('builds a local-midnight date', () => {
    expect(makeDate(2024, 2, 29)).toEqual(new Date(2024, 1, 29))
  })

  it('keeps years below 100 as given', () => {
    const date = makeDate(50, 3, 10)

    expect(date?.getFullYear()).toBe(50)
    expect(date?.getMonth()).toBe(2)
    expect(date?.getDate()).toBe(10)
    expect(date?.getHours()).toBe(0)
  })

  it('rejects days that do not exist', () => {
    expect(makeDate(2023, 2, 29)).toBeNull()
    expect(makeDate(2024, 13, 1)).toBeNull()
    expect(makeDate(2024, 4, 31)).toBeNull()
    expect(makeDate(2024, 1, 1.5)).toBeNull()
  })
})

describe('generateMonthWeeks', () => {
  it('lays out six Monday-first weeks around March 2024', () => {
    const weeks = generateMonthWeeks({ year: 2024, month: 3 }, 'monday', [6, 7])

    expect(weeks).toHaveLength(6)
    expect(weeks.map((w) => w.key)).toEqual([
      '2024-02-26',
      '2024-03-04',
      '2024-03-11',
      '2024-03-18',
      '2024-03-25',
      '2024-04-01',
    ])
    expect(weeks.map((w) => w.weekNumber)).toEqual([9, 10, 11, 12, 13, 14])

    const first = weeks[0].days
    expect(first[0].inCurrentMonth).toBe(false)
    expect(first[4].date).toEqual(new Date(2024, 2, 1))
    expect(first[4].inCurrentMonth).toBe(true)
    expect(first[4].isWeekend).toBe(false)
    expect(first[5].isWeekend).toBe(true)
    expect(first[6].isWeekend).toBe(true)
  })

  it('starts rows on Sunday and numbers them by their Monday', () => {
    const weeks = generateMonthWeeks({ year: 2024, month: 3 }, 'sunday', [6, 7])

    expect(weeks[0].key).toBe('2024-02-25')
    expect(weeks[0].weekNumber).toBe(9)
    expect(weeks[0].days[0].isWeekend).toBe(true)
  })

  it('follows custom weekend days', () => {
    const weeks = generateMonthWeeks({ year: 2024, month: 3 }, 'monday', [5])
    const days = weeks[1].days

    expect(days.filter((d) => d.isWeekend).map((d) => d.date.getDate())).toEqual([8])
  })
})

describe('month arithmetic', () => {
  it('crosses year boundaries', () => {
    expect(shiftMonth({ year: 2024, month: 12 }, 1)).toEqual({ year: 2025, month: 1 })
    expect(shiftMonth({ year: 2024, month: 1 }, -12)).toEqual({ year: 2023, month: 1 })
  })

  it('orders months', () => {
    expect(compareMonths({ year: 2024, month: 3 }, { year: 2023, month: 12 })).toBeGreaterThan(0)
    expect(compareMonths({ year: 2024, month: 3 }, { year: 2024, month: 3 })).toBe(0)
  })
})

describe('isWithinBounds', () => {
  it('compares whole days', () => {
    const min = new Date(2024, 2, 10, 18, 30)
    expect(isWithinBounds(new Date(2024, 2, 10), min)).toBe(true)
    expect(isWithinBounds(new Date(2024, 2, 9), min)).toBe(false)
    expect(isWithinBounds(new Date(2024, 2, 21), undefined, new Date(2024, 2, 20))).toBe(false)
  })
})

describe('formatDate', () => {
  const date = new Date(2020, 0, 15)

  it('uses the locale short format by default name', () => {
    expect(formatDate(date, 'short', enUS)).toBe('01/15/2020')
    expect(formatDate(date, 'short', fr)).toBe('15/01/2020')
    expect(formatDate(date, 'short', de)).toBe('15.01.2020')
  })

  it('accepts long formats and raw patterns', () => {
    expect(formatDate(date, 'long', enUS)).toBe('January 15th, 2020')
    expect(formatDate(date, 'yyyy-MM-dd', enUS)).toBe('2020-01-15')
  })
})

describe('parseDate', () => {
  it('parses text in the locale format', () => {
    expect(parseDate('01/15/2020', 'short', enUS)).toEqual(new Date(2020, 0, 15))
    expect(parseDate(' 15/01/2020 ', 'short', fr)).toEqual(new Date(2020, 0, 15))
    expect(parseDate('2020-01-15', 'yyyy-MM-dd', enUS)).toEqual(new Date(2020, 0, 15))
  })

  it('returns null for text that is not a date', () => {
    expect(parseDate('', 'short', enUS)).toBeNull()
    expect(parseDate('garbage', 'short', enUS)).toBeNull()
    expect(parseDate('02/30/2020', 'short', enUS)).toBeNull()
  })
})
