import type { TextVariable } from '../lib/textVariable'

export type SelectMode = 'none' | 'day'
export type FirstWeekday = 'monday' | 'sunday'
export type WidgetState = 'normal' | 'disabled'

export interface StyleOptions {
  background: string
  foreground: string
  borderColor: string
  headersBackground: string
  headersForeground: string
  selectBackground: string
  selectForeground: string
  disabledSelectBackground: string
  disabledSelectForeground: string
  normalBackground: string
  normalForeground: string
  weekendBackground: string
  weekendForeground: string
  otherMonthBackground: string
  otherMonthForeground: string
  otherMonthWeBackground: string
  otherMonthWeForeground: string
  disabledDayBackground: string
  disabledDayForeground: string
  disabledBackground: string
  disabledForeground: string
  tooltipForeground: string
  tooltipBackground: string
  tooltipAlpha: number
  tooltipDelay: number // ms
}

export interface CalendarOptions extends StyleOptions {
  cursor: string
  font: string
  borderWidth: number
  state: WidgetState
  year?: number
  month?: number // 1..12
  day?: number
  firstWeekday: FirstWeekday
  showWeekNumbers: boolean
  showOtherMonthDays: boolean
  locale: string
  selectMode: SelectMode
  textVariable?: TextVariable
  minDate?: Date
  maxDate?: Date
  datePattern?: string
  weekendDays: number[] // ISO weekdays, 1 = Monday
}

export type CalendarOptionKey = keyof CalendarOptions

export type CalendarInit = Partial<CalendarOptions>

export interface DisplayedMonth {
  year: number
  month: number
}

export interface TagStyle {
  foreground: string
  background: string
  font?: string
  tooltipForeground?: string
  tooltipBackground?: string
}

export type TagOption = keyof TagStyle

export interface Tag extends TagStyle {
  name: string
}

export type CaleventId = number

export interface Calevent {
  id: CaleventId
  date: Date
  text: string
  tags: string[]
}

export type CaleventOption = Exclude<keyof Calevent, 'id'>

export interface CaleventQuery {
  date?: Date
  tag?: string
}

export type DateFormat = 'short' | 'medium' | 'long' | 'full' | (string & {})

export interface DayCell {
  date: Date
  inCurrentMonth: boolean
  isWeekend: boolean
}

export interface Week {
  key: string
  weekNumber: number
  days: DayCell[]
}

export interface CellStyle {
  background: string
  foreground: string
  font?: string
  tooltipBackground: string
  tooltipForeground: string
}
