import { z } from 'zod'

export const DEFAULT_TAG_STYLE = {
  foreground: '#ffffff',
  background: '#4169e1',
} as const

export const tagStyleSchema = z
  .object({
    foreground: z.string().min(1),
    background: z.string().min(1),
    font: z.string().min(1).optional(),
    tooltipForeground: z.string().min(1).optional(),
    tooltipBackground: z.string().min(1).optional(),
  })
  .strict()

export const tagStylePatchSchema = tagStyleSchema.partial().strict()

export const TAG_OPTION_KEYS = Object.keys(tagStyleSchema.shape)

const tagName = z.string().min(1, 'Tag name is required')

export const caleventSchema = z
  .object({
    date: z.date(),
    text: z.string().default(''),
    tags: z.array(tagName).default([]),
  })
  .strict()

export const caleventPatchSchema = caleventSchema.partial().strict()

export const CALEVENT_OPTION_KEYS = Object.keys(caleventSchema.shape)

export type CaleventPatch = z.input<typeof caleventPatchSchema>
export type TagStylePatch = z.input<typeof tagStylePatchSchema>
