import { forwardRef, useCallback, useEffect, useImperativeHandle, useMemo, useRef, useState } from 'react'
import { CalendarDays } from 'lucide-react'
import { Calendar } from '../calendar/Calendar'
import { useCalendar, useCalendarState } from '../../hooks/useCalendar'
import { useDismiss } from '../../hooks/useDismiss'
import { formatDate, isWithinBounds, makeDate, parseDate, startOfDay } from '../../lib/date'
import { resolveLocale } from '../../lib/locale'
import { InvalidArgumentError } from '../../lib/errors'
import { getCalendarHandle, type CalendarHandle, type CalendarStore } from '../../stores'
import type { CalendarInit, CalendarOptions } from '../../types'

export interface DateEntryProps extends Omit<CalendarInit, 'selectMode'> {
  className?: string
  /** Accessible name of the text field. */
  label?: string
  onDateEntrySelected?: (date: Date) => void
}

export interface DateEntryHandle {
  getDate: () => Date
  setDate: (date: Date | string) => void
  dropDown: () => void
  calendar: CalendarHandle
}

function initialDate(store: CalendarStore): Date {
  const { selection, options } = store.getState()
  if (selection) return selection
  const today = startOfDay(new Date())
  const date = makeDate(
    options.year ?? today.getFullYear(),
    options.month ?? today.getMonth() + 1,
    options.day ?? today.getDate()
  )
  return date ?? today
}

/**
 * Text entry with a drop-down calendar. The text always ends up holding a
 * valid date: on blur, input that does not parse with the date pattern is
 * replaced by the last valid date.
 */
export const DateEntry = forwardRef<DateEntryHandle, DateEntryProps>(function DateEntry(
  { className, label = 'Date', onDateEntrySelected, ...init },
  ref
) {
  const store = useCalendar({ ...init, selectMode: 'day' })
  const options = useCalendarState(store, (s) => s.options)
  const locale = useMemo(() => resolveLocale(options.locale), [options.locale])
  const pattern = options.datePattern ?? 'short'

  const [date, setDateState] = useState(() => initialDate(store))
  const [text, setText] = useState(() => formatDate(date, pattern, locale))
  const [open, setOpen] = useState(false)

  const rootRef = useRef<HTMLDivElement>(null)
  const inputRef = useRef<HTMLInputElement>(null)
  const dateRef = useRef(date)
  const syncingRef = useRef(false)
  const selectedRef = useRef(onDateEntrySelected)
  dateRef.current = date
  selectedRef.current = onDateEntrySelected

  const parseText = useCallback(
    (value: string, opts: CalendarOptions): Date | null => {
      const parsed = parseDate(value, opts.datePattern ?? 'short', resolveLocale(opts.locale))
      if (!parsed || !isWithinBounds(parsed, opts.minDate, opts.maxDate)) return null
      return parsed
    },
    []
  )

  const commit = useCallback(
    (next: Date) => {
      const opts = store.getState().options
      setDateState(next)
      dateRef.current = next
      setText(formatDate(next, opts.datePattern ?? 'short', resolveLocale(opts.locale)))
    },
    [store]
  )

  const validate = useCallback((): Date => {
    const value = inputRef.current?.value ?? ''
    const parsed = parseText(value, store.getState().options)
    if (parsed) {
      setDateState(parsed)
      dateRef.current = parsed
      return parsed
    }
    commit(dateRef.current)
    return dateRef.current
  }, [commit, parseText, store])

  const close = useCallback(() => setOpen(false), [])

  const dropDown = useCallback(() => {
    if (open) {
      setOpen(false)
      return
    }
    const current = validate()
    syncingRef.current = true
    try {
      store.getState().selectionSet(current)
    } catch (err) {
      // the entry's date may sit outside minDate/maxDate; open on the nearest month instead
      if (!(err instanceof InvalidArgumentError)) throw err
      store.getState().selectionClear()
      store.getState().see(current)
    } finally {
      syncingRef.current = false
    }
    setOpen(true)
  }, [open, store, validate])

  const dismissRefs = useMemo(() => [rootRef], [])
  useDismiss(dismissRefs, close, open)

  useEffect(() => {
    return store.getState().bind('CalendarSelected', (selected) => {
      if (syncingRef.current) return
      commit(selected)
      setOpen(false)
      inputRef.current?.focus()
      selectedRef.current?.(selected)
      rootRef.current?.dispatchEvent(
        new CustomEvent('DateEntrySelected', { detail: selected, bubbles: true })
      )
    })
  }, [commit, store])

  // A new locale or pattern rewrites the current date in the new format.
  useEffect(() => {
    setText(formatDate(dateRef.current, pattern, locale))
  }, [pattern, locale])

  useImperativeHandle(
    ref,
    () => ({
      getDate: () => new Date(validate()),
      setDate: (value) => {
        if (typeof value === 'string') {
          const parsed = parseText(value, store.getState().options)
          if (!parsed) throw new InvalidArgumentError(`"${value}" is not a valid date`)
          commit(parsed)
        } else {
          if (Number.isNaN(value.getTime())) throw new InvalidArgumentError('Invalid date')
          commit(startOfDay(value))
        }
      },
      dropDown,
      calendar: getCalendarHandle(store),
    }),
    [commit, dropDown, parseText, store, validate]
  )

  const disabled = options.state === 'disabled'

  return (
    <div
      ref={rootRef}
      className={['date-entry', className].filter(Boolean).join(' ')}
      style={{ position: 'relative', display: 'inline-block' }}
    >
      <div className="date-entry-field" style={{ display: 'flex', alignItems: 'center' }}>
        <input
          ref={inputRef}
          type="text"
          aria-label={label}
          value={text}
          disabled={disabled}
          onChange={(e) => setText(e.target.value)}
          onBlur={() => {
            validate()
          }}
          onKeyDown={(e) => {
            if (e.key === 'Enter') validate()
          }}
          style={{ font: options.font }}
        />
        <button
          type="button"
          aria-label="Open calendar"
          aria-expanded={open}
          disabled={disabled}
          onClick={dropDown}
          className="date-entry-button"
          style={{ padding: '4px' }}
        >
          <CalendarDays size={16} />
        </button>
      </div>

      {open && (
        <div
          className="date-entry-dropdown"
          style={{ position: 'absolute', top: '100%', left: 0, zIndex: 50 }}
        >
          <Calendar store={store} />
        </div>
      )}
    </div>
  )
})
