export { useDismiss } from './useDismiss'
export { useTooltip } from './useTooltip'
export { useCalendar, useCalendarState } from './useCalendar'
