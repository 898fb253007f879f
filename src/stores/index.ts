export { createCalendarStore, getCalendarHandle, selectDayCalevents } from './calendar.store'
export type { CalendarHandle, CalendarState, CalendarStore } from './calendar.store'
