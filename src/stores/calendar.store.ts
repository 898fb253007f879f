import { createStore, type StoreApi } from 'zustand/vanilla'
import {
  calendarOptionsPatchSchema,
  calendarOptionsSchema,
  CALENDAR_OPTION_KEYS,
  CONSTRUCTION_ONLY_OPTIONS,
} from '../schemas/options.schema'
import {
  caleventPatchSchema,
  caleventSchema,
  CALEVENT_OPTION_KEYS,
  DEFAULT_TAG_STYLE,
  tagStylePatchSchema,
  TAG_OPTION_KEYS,
  type CaleventPatch,
  type TagStylePatch,
} from '../schemas/calevent.schema'
import {
  compareMonths,
  formatDate,
  formatDateKey,
  isSameDay,
  isValidDate,
  isWithinBounds,
  makeDate,
  parseDate,
  sameMonth,
  shiftMonth,
  startOfDay,
  toDisplayedMonth,
} from '../lib/date'
import { resolveLocale } from '../lib/locale'
import { fromZodError, InvalidArgumentError, NotFoundError, UnknownOptionError } from '../lib/errors'
import { createVirtualEventBus, type VirtualEventBus } from '../lib/virtualEvents'
import type {
  Calevent,
  CaleventId,
  CaleventOption,
  CaleventQuery,
  CalendarInit,
  CalendarOptionKey,
  CalendarOptions,
  DateFormat,
  DisplayedMonth,
  Tag,
  TagOption,
  TagStyle,
} from '../types'

export interface CalendarState {
  options: CalendarOptions
  displayed: DisplayedMonth
  selection: Date | null
  // Stacking order, bottom first
  tags: Tag[]
  calevents: Record<CaleventId, Calevent>
  caleventOrder: CaleventId[]
  nextCaleventId: number

  // Selection
  getDate: () => Date | null
  selectionGet: () => Date | null
  selectionSet: (date: Date | string) => void
  selectionClear: () => void

  // Displayed month
  getDisplayedMonth: () => DisplayedMonth
  showMonth: (year: number, month: number) => void
  see: (date: Date) => void
  nextMonth: () => void
  prevMonth: () => void
  nextYear: () => void
  prevYear: () => void

  formatDate: (date?: Date, format?: DateFormat) => string

  // Options
  keys: () => string[]
  cget: <K extends CalendarOptionKey>(key: K) => CalendarOptions[K]
  configure: (patch: CalendarInit) => void

  // Tags
  tagNames: () => string[]
  tagCget: <K extends TagOption>(name: string, option: K) => TagStyle[K]
  tagConfig: (name: string, style?: TagStylePatch) => void
  tagDelete: (name: string) => void
  tagRaise: (name: string, above?: string) => void
  tagLower: (name: string, below?: string) => void

  // Calevents
  caleventCreate: (date: Date, text?: string, tags?: string | string[]) => CaleventId
  caleventConfigure: (id: CaleventId, patch: CaleventPatch) => void
  caleventCget: <K extends CaleventOption>(id: CaleventId, option: K) => Calevent[K]
  caleventRemove: (id: CaleventId | 'all') => void
  caleventRaise: (id: CaleventId, above?: CaleventId) => void
  caleventLower: (id: CaleventId, below?: CaleventId) => void
  getCalevents: (query?: CaleventQuery) => CaleventId[]

  bind: VirtualEventBus['bind']
}

export type CalendarStore = StoreApi<CalendarState>

/** The imperative surface of a calendar: everything but the raw state. */
export type CalendarHandle = Omit<
  CalendarState,
  'options' | 'displayed' | 'selection' | 'tags' | 'calevents' | 'caleventOrder' | 'nextCaleventId'
>

function raiseItem<T>(list: T[], item: T, above?: T): T[] {
  if (item === above) return list
  const rest = list.filter((entry) => entry !== item)
  if (above === undefined) return [...rest, item]
  const index = rest.indexOf(above)
  return [...rest.slice(0, index + 1), item, ...rest.slice(index + 1)]
}

function lowerItem<T>(list: T[], item: T, below?: T): T[] {
  if (item === below) return list
  const rest = list.filter((entry) => entry !== item)
  if (below === undefined) return [item, ...rest]
  const index = rest.indexOf(below)
  return [...rest.slice(0, index), item, ...rest.slice(index)]
}

function clampMonth(displayed: DisplayedMonth, minDate?: Date, maxDate?: Date): DisplayedMonth {
  if (minDate && compareMonths(displayed, toDisplayedMonth(minDate)) < 0) {
    return toDisplayedMonth(minDate)
  }
  if (maxDate && compareMonths(displayed, toDisplayedMonth(maxDate)) > 0) {
    return toDisplayedMonth(maxDate)
  }
  return displayed
}

function checkBoundsOrder(minDate?: Date, maxDate?: Date) {
  if (minDate && maxDate && startOfDay(minDate) > startOfDay(maxDate)) {
    throw new InvalidArgumentError(
      `minDate (${formatDateKey(minDate)}) is after maxDate (${formatDateKey(maxDate)})`
    )
  }
}

function parseOptions(init: CalendarInit): CalendarOptions {
  const parsed = calendarOptionsSchema.safeParse(init)
  if (!parsed.success) throw fromZodError(parsed.error)
  checkBoundsOrder(parsed.data.minDate, parsed.data.maxDate)
  return parsed.data
}

function datePatternOf(options: CalendarOptions): DateFormat {
  return options.datePattern ?? 'short'
}

function initialSelection(options: CalendarOptions, today: Date): Date | null {
  if (options.day !== undefined) {
    const year = options.year ?? today.getFullYear()
    const month = options.month ?? today.getMonth() + 1
    const date = makeDate(year, month, options.day)
    if (!date) {
      throw new InvalidArgumentError(`${year}-${month}-${options.day} is not a valid date`)
    }
    if (!isWithinBounds(date, options.minDate, options.maxDate)) {
      throw new InvalidArgumentError(`${formatDateKey(date)} is outside the allowed range`)
    }
    return date
  }

  const text = options.textVariable?.get()
  if (text) {
    const date = parseDate(text, datePatternOf(options), resolveLocale(options.locale))
    if (date && isWithinBounds(date, options.minDate, options.maxDate)) return date
  }
  return null
}

export function createCalendarStore(init: CalendarInit = {}): CalendarStore {
  const options = parseOptions(init)
  const bus = createVirtualEventBus()
  const today = startOfDay(new Date())
  const initial = initialSelection(options, today)
  const selection = options.selectMode === 'day' ? initial : null

  let displayed: DisplayedMonth
  if (options.year !== undefined || options.month !== undefined) {
    displayed = {
      year: options.year ?? today.getFullYear(),
      month: options.month ?? today.getMonth() + 1,
    }
  } else {
    displayed = toDisplayedMonth(initial ?? today)
  }
  displayed = clampMonth(displayed, options.minDate, options.maxDate)

  if (selection && options.textVariable) {
    options.textVariable.set(
      formatDate(selection, datePatternOf(options), resolveLocale(options.locale))
    )
  }

  const store = createStore<CalendarState>()((set, get) => {
    function setDisplayed(next: DisplayedMonth) {
      const { options, displayed } = get()
      const clamped = clampMonth(next, options.minDate, options.maxDate)
      if (sameMonth(clamped, displayed)) return
      set({ displayed: clamped })
      bus.emit('CalendarMonthChanged', { ...clamped })
    }

    function writeTextVariable(date: Date | null) {
      const { options } = get()
      if (!options.textVariable) return
      options.textVariable.set(
        date ? formatDate(date, datePatternOf(options), resolveLocale(options.locale)) : ''
      )
    }

    function requireCalevent(id: CaleventId): Calevent {
      const ev = get().calevents[id]
      if (!ev) throw new NotFoundError(`Calevent ${id} does not exist`)
      return ev
    }

    function requireTag(name: string): Tag {
      const tag = get().tags.find((t) => t.name === name)
      if (!tag) throw new NotFoundError(`Tag "${name}" does not exist`)
      return tag
    }

    // Tags named by a calevent that are not in the table yet get the default style.
    function ensureTags(names: string[]) {
      const known = new Set(get().tags.map((t) => t.name))
      const missing = names.filter((name) => !known.has(name))
      if (missing.length === 0) return
      set((state) => ({
        tags: [...state.tags, ...missing.map((name) => ({ name, ...DEFAULT_TAG_STYLE }))],
      }))
    }

    return {
      options,
      displayed,
      selection,
      tags: [],
      calevents: {},
      caleventOrder: [],
      nextCaleventId: 0,

      getDate: () => {
        const { selection } = get()
        return selection ? new Date(selection) : null
      },

      selectionGet: () => get().getDate(),

      selectionSet: (value) => {
        const { options } = get()
        if (options.selectMode === 'none') {
          throw new InvalidArgumentError('Selection is disabled (selectMode is "none")')
        }

        let date: Date | null
        if (typeof value === 'string') {
          date = parseDate(value, datePatternOf(options), resolveLocale(options.locale))
          if (!date) throw new InvalidArgumentError(`"${value}" is not a valid date`)
        } else {
          if (!isValidDate(value)) throw new InvalidArgumentError('Invalid date')
          date = startOfDay(value)
        }
        if (!isWithinBounds(date, options.minDate, options.maxDate)) {
          throw new InvalidArgumentError(`${formatDateKey(date)} is outside the allowed range`)
        }

        set({ selection: date })
        setDisplayed(toDisplayedMonth(date))
        writeTextVariable(date)
        bus.emit('CalendarSelected', new Date(date))
      },

      selectionClear: () => {
        set({ selection: null })
        writeTextVariable(null)
      },

      getDisplayedMonth: () => ({ ...get().displayed }),

      showMonth: (year, month) => {
        if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
          throw new InvalidArgumentError(`${year}-${month} is not a valid month`)
        }
        setDisplayed({ year, month })
      },

      see: (date) => {
        if (!isValidDate(date)) throw new InvalidArgumentError('Invalid date')
        setDisplayed(toDisplayedMonth(date))
      },

      nextMonth: () => setDisplayed(shiftMonth(get().displayed, 1)),
      prevMonth: () => setDisplayed(shiftMonth(get().displayed, -1)),
      nextYear: () => setDisplayed(shiftMonth(get().displayed, 12)),
      prevYear: () => setDisplayed(shiftMonth(get().displayed, -12)),

      formatDate: (date, dateFormat = 'short') => {
        const target = date ?? get().selection
        if (!target) return ''
        if (!isValidDate(target)) throw new InvalidArgumentError('Invalid date')
        return formatDate(target, dateFormat, resolveLocale(get().options.locale))
      },

      keys: () => [...CALENDAR_OPTION_KEYS],

      cget: (key) => {
        if (!CALENDAR_OPTION_KEYS.includes(key)) throw new UnknownOptionError(key)
        return get().options[key]
      },

      configure: (patch) => {
        for (const key of Object.keys(patch)) {
          if (CONSTRUCTION_ONLY_OPTIONS.some((k) => k === key)) {
            throw new InvalidArgumentError(`Option "${key}" can only be set at construction`)
          }
        }
        const parsed = calendarOptionsPatchSchema.safeParse(patch)
        if (!parsed.success) throw fromZodError(parsed.error)

        const prev = get().options
        const next: CalendarOptions = { ...prev, ...parsed.data }
        checkBoundsOrder(next.minDate, next.maxDate)
        set({ options: next })

        const { selection } = get()
        if (selection) {
          if (
            next.selectMode === 'none' ||
            !isWithinBounds(selection, next.minDate, next.maxDate)
          ) {
            get().selectionClear()
          } else if (
            next.textVariable !== prev.textVariable ||
            next.datePattern !== prev.datePattern ||
            next.locale !== prev.locale
          ) {
            writeTextVariable(selection)
          }
        }
        setDisplayed(get().displayed)
      },

      tagNames: () => get().tags.map((tag) => tag.name),

      tagCget: (name, option) => {
        if (!TAG_OPTION_KEYS.includes(option)) throw new UnknownOptionError(option)
        return requireTag(name)[option]
      },

      tagConfig: (name, style = {}) => {
        if (!name) throw new InvalidArgumentError('Tag name is required')
        const parsed = tagStylePatchSchema.safeParse(style)
        if (!parsed.success) throw fromZodError(parsed.error)

        set((state) => {
          const exists = state.tags.some((t) => t.name === name)
          if (!exists) {
            return { tags: [...state.tags, { name, ...DEFAULT_TAG_STYLE, ...parsed.data }] }
          }
          return {
            tags: state.tags.map((t) => (t.name === name ? { ...t, ...parsed.data } : t)),
          }
        })
      },

      tagDelete: (name) => {
        requireTag(name)
        set((state) => {
          const calevents: Record<CaleventId, Calevent> = {}
          for (const id of state.caleventOrder) {
            const ev = state.calevents[id]
            calevents[id] = ev.tags.includes(name)
              ? { ...ev, tags: ev.tags.filter((t) => t !== name) }
              : ev
          }
          return { tags: state.tags.filter((t) => t.name !== name), calevents }
        })
      },

      tagRaise: (name, above) => {
        const tag = requireTag(name)
        const reference = above === undefined ? undefined : requireTag(above)
        set((state) => ({ tags: raiseItem(state.tags, tag, reference) }))
      },

      tagLower: (name, below) => {
        const tag = requireTag(name)
        const reference = below === undefined ? undefined : requireTag(below)
        set((state) => ({ tags: lowerItem(state.tags, tag, reference) }))
      },

      caleventCreate: (date, text = '', tags = []) => {
        const parsed = caleventSchema.safeParse({
          date,
          text,
          tags: typeof tags === 'string' ? [tags] : tags,
        })
        if (!parsed.success) throw fromZodError(parsed.error)

        const uniqueTags = [...new Set(parsed.data.tags)]
        ensureTags(uniqueTags)

        const id = get().nextCaleventId
        const ev: Calevent = {
          id,
          date: startOfDay(parsed.data.date),
          text: parsed.data.text,
          tags: uniqueTags,
        }
        set((state) => ({
          calevents: { ...state.calevents, [id]: ev },
          caleventOrder: [...state.caleventOrder, id],
          nextCaleventId: id + 1,
        }))
        return id
      },

      caleventConfigure: (id, patch) => {
        const ev = requireCalevent(id)
        const parsed = caleventPatchSchema.safeParse(patch)
        if (!parsed.success) throw fromZodError(parsed.error)

        const next: Calevent = { ...ev }
        if (parsed.data.date !== undefined) next.date = startOfDay(parsed.data.date)
        if (parsed.data.text !== undefined) next.text = parsed.data.text
        if (parsed.data.tags !== undefined) {
          next.tags = [...new Set(parsed.data.tags)]
          ensureTags(next.tags)
        }
        set((state) => ({ calevents: { ...state.calevents, [id]: next } }))
      },

      caleventCget: (id, option) => {
        if (!CALEVENT_OPTION_KEYS.includes(option)) throw new UnknownOptionError(option)
        const ev = requireCalevent(id)
        const copy: Calevent = { ...ev, date: new Date(ev.date), tags: [...ev.tags] }
        return copy[option]
      },

      caleventRemove: (id) => {
        if (id === 'all') {
          set({ calevents: {}, caleventOrder: [] })
          return
        }
        requireCalevent(id)
        set((state) => {
          const calevents = { ...state.calevents }
          delete calevents[id]
          return { calevents, caleventOrder: state.caleventOrder.filter((i) => i !== id) }
        })
      },

      caleventRaise: (id, above) => {
        requireCalevent(id)
        if (above !== undefined) requireCalevent(above)
        set((state) => ({ caleventOrder: raiseItem(state.caleventOrder, id, above) }))
      },

      caleventLower: (id, below) => {
        requireCalevent(id)
        if (below !== undefined) requireCalevent(below)
        set((state) => ({ caleventOrder: lowerItem(state.caleventOrder, id, below) }))
      },

      getCalevents: (query = {}) => {
        const { calevents, caleventOrder } = get()
        if (query.date !== undefined && !isValidDate(query.date)) {
          throw new InvalidArgumentError('Invalid date')
        }
        return caleventOrder.filter((id) => {
          const ev = calevents[id]
          if (query.date && !isSameDay(ev.date, query.date)) return false
          if (query.tag !== undefined && !ev.tags.includes(query.tag)) return false
          return true
        })
      },

      bind: bus.bind,
    }
  })

  return store
}

/** Calevents falling on `date`, bottom of the stack first. */
export function selectDayCalevents(
  state: Pick<CalendarState, 'calevents' | 'caleventOrder'>,
  date: Date
): Calevent[] {
  const result: Calevent[] = []
  for (const id of state.caleventOrder) {
    const ev = state.calevents[id]
    if (isSameDay(ev.date, date)) result.push(ev)
  }
  return result
}

export function getCalendarHandle(store: CalendarStore): CalendarHandle {
  // Actions never change identity, so the handle stays valid for the store's lifetime.
  const {
    options: _options,
    displayed: _displayed,
    selection: _selection,
    tags: _tags,
    calevents: _calevents,
    caleventOrder: _caleventOrder,
    nextCaleventId: _nextCaleventId,
    ...handle
  } = store.getState()
  return handle
}
