import { z } from 'zod'
import { DEFAULT_LOCALE } from '../lib/locale'
import { isTextVariable, type TextVariable } from '../lib/textVariable'

const color = z.string().min(1, 'Color is required')

export const styleOptionsSchema = z.object({
  background: color.default('#4d4d4d'),
  foreground: color.default('#ffffff'),
  borderColor: color.default('#b3b3b3'),
  headersBackground: color.default('#b3b3b3'),
  headersForeground: color.default('#000000'),
  selectBackground: color.default('#424242'),
  selectForeground: color.default('#ffffff'),
  disabledSelectBackground: color.default('#8c8c8c'),
  disabledSelectForeground: color.default('#ffffff'),
  normalBackground: color.default('#ffffff'),
  normalForeground: color.default('#000000'),
  weekendBackground: color.default('#cccccc'),
  weekendForeground: color.default('#4d4d4d'),
  otherMonthBackground: color.default('#ededed'),
  otherMonthForeground: color.default('#737373'),
  otherMonthWeBackground: color.default('#bfbfbf'),
  otherMonthWeForeground: color.default('#737373'),
  disabledDayBackground: color.default('#f0f0f0'),
  disabledDayForeground: color.default('#a6a6a6'),
  disabledBackground: color.default('#8c8c8c'),
  disabledForeground: color.default('#d9d9d9'),
  tooltipForeground: color.default('#e5e5e5'),
  tooltipBackground: color.default('#000000'),
  tooltipAlpha: z.number().min(0).max(1).default(0.8),
  tooltipDelay: z.number().int().min(0).default(2000), // ms
})

export const calendarOptionsSchema = styleOptionsSchema
  .extend({
    cursor: z.string().default('pointer'),
    font: z.string().default('14px system-ui, sans-serif'),
    borderWidth: z.number().int().min(0).default(2),
    state: z.enum(['normal', 'disabled']).default('normal'),
    year: z.number().int().min(1).max(9999).optional(),
    month: z.number().int().min(1).max(12).optional(),
    day: z.number().int().min(1).max(31).optional(),
    firstWeekday: z.enum(['monday', 'sunday']).default('monday'),
    showWeekNumbers: z.boolean().default(true),
    showOtherMonthDays: z.boolean().default(true),
    locale: z.string().min(1).default(DEFAULT_LOCALE),
    selectMode: z.enum(['none', 'day']).default('day'),
    textVariable: z.custom<TextVariable>(isTextVariable, 'Expected a text variable').optional(),
    minDate: z.date().optional(),
    maxDate: z.date().optional(),
    datePattern: z.string().min(1).optional(),
    weekendDays: z.array(z.number().int().min(1).max(7)).default([6, 7]),
  })
  .strict()

export const calendarOptionsPatchSchema = calendarOptionsSchema.partial().strict()

export type ParsedCalendarOptions = z.output<typeof calendarOptionsSchema>

export const CALENDAR_OPTION_KEYS = Object.keys(calendarOptionsSchema.shape).sort()

/** Options that only make sense at construction time. */
export const CONSTRUCTION_ONLY_OPTIONS = ['year', 'month', 'day'] as const
