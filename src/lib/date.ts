import {
  format,
  parse,
  startOfWeek,
  startOfDay,
  addDays,
  addMonths,
  isSameDay,
  isSameMonth,
  isValid,
  getISOWeek,
  getISODay,
  type Locale,
} from 'date-fns'
import type { DateFormat, DayCell, DisplayedMonth, FirstWeekday, Week } from '../types'

export { format, addDays, addMonths, isSameDay, isSameMonth, startOfDay }

const WEEKS_PER_MONTH_VIEW = 6

const NAMED_FORMATS: Record<string, string> = {
  short: 'P',
  medium: 'PP',
  long: 'PPP',
  full: 'PPPP',
}

export const formatDateKey = (date: Date): string => {
  return format(date, 'yyyy-MM-dd')
}

export const weekStartsOn = (firstWeekday: FirstWeekday): 0 | 1 =>
  firstWeekday === 'sunday' ? 0 : 1

/**
 * Builds the local-midnight date for year/month(1..12)/day, or null when the
 * triple does not name a real day (2023-02-29, month 13, ...).
 */
export const makeDate = (year: number, month: number, day: number): Date | null => {
  if (![year, month, day].every(Number.isInteger)) return null
  const date = new Date(2000, 0, 1)
  // setFullYear keeps years 0..99 literal; the Date constructor maps them to 1900..1999
  date.setFullYear(year, month - 1, day)
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null
  }
  return date
}

export const isValidDate = (value: unknown): value is Date =>
  value instanceof Date && isValid(value)

export const toDisplayedMonth = (date: Date): DisplayedMonth => ({
  year: date.getFullYear(),
  month: date.getMonth() + 1,
})

export const monthStart = ({ year, month }: DisplayedMonth): Date => {
  const date = new Date(year, month - 1, 1)
  date.setFullYear(year)
  return date
}

export const shiftMonth = (displayed: DisplayedMonth, months: number): DisplayedMonth =>
  toDisplayedMonth(addMonths(monthStart(displayed), months))

export const sameMonth = (a: DisplayedMonth, b: DisplayedMonth): boolean =>
  a.year === b.year && a.month === b.month

export const compareMonths = (a: DisplayedMonth, b: DisplayedMonth): number =>
  a.year !== b.year ? a.year - b.year : a.month - b.month

export const isWithinBounds = (date: Date, minDate?: Date, maxDate?: Date): boolean => {
  const day = startOfDay(date).getTime()
  if (minDate && day < startOfDay(minDate).getTime()) return false
  if (maxDate && day > startOfDay(maxDate).getTime()) return false
  return true
}

export const generateMonthWeeks = (
  displayed: DisplayedMonth,
  firstWeekday: FirstWeekday,
  weekendDays: number[]
): Week[] => {
  const first = monthStart(displayed)
  const gridStart = startOfWeek(first, { weekStartsOn: weekStartsOn(firstWeekday) })
  const weekend = new Set(weekendDays)
  const weeks: Week[] = []

  for (let w = 0; w < WEEKS_PER_MONTH_VIEW; w++) {
    const weekStart = addDays(gridStart, w * 7)
    const days: DayCell[] = []
    for (let d = 0; d < 7; d++) {
      const date = addDays(weekStart, d)
      days.push({
        date,
        inCurrentMonth: isSameMonth(date, first),
        isWeekend: weekend.has(getISODay(date)),
      })
    }
    // ISO week of the row's Monday
    const monday = firstWeekday === 'sunday' ? addDays(weekStart, 1) : weekStart
    weeks.push({
      key: formatDateKey(weekStart),
      weekNumber: getISOWeek(monday),
      days,
    })
  }

  return weeks
}

export const resolveFormat = (dateFormat: DateFormat): string =>
  NAMED_FORMATS[dateFormat] ?? dateFormat

export const formatDate = (date: Date, dateFormat: DateFormat, locale: Locale): string => {
  return format(date, resolveFormat(dateFormat), { locale })
}

/** Strict parse: the whole string must match the pattern and name a real day. */
export const parseDate = (text: string, dateFormat: DateFormat, locale: Locale): Date | null => {
  const trimmed = text.trim()
  if (!trimmed) return null
  const pattern = resolveFormat(dateFormat)
  const parsed = parse(trimmed, pattern, new Date(2000, 0, 1), { locale })
  if (!isValid(parsed)) return null
  return startOfDay(parsed)
}
