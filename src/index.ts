export * from './components/calendar'
export * from './components/dateentry'
export * from './hooks'
export * from './stores'
export * from './lib'
export * from './types'
export {
  calendarOptionsSchema,
  calendarOptionsPatchSchema,
  styleOptionsSchema,
  CALENDAR_OPTION_KEYS,
} from './schemas/options.schema'
export { tagStyleSchema, caleventSchema, DEFAULT_TAG_STYLE } from './schemas/calevent.schema'
export type { CaleventPatch, TagStylePatch } from './schemas/calevent.schema'
