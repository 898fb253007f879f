export { Calendar } from './Calendar'
export type { CalendarProps } from './Calendar'
export { CalendarHeader } from './CalendarHeader'
export { MonthGrid } from './MonthGrid'
