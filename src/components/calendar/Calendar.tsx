import { forwardRef, useEffect, useImperativeHandle, useRef } from 'react'
import { useCalendar, useCalendarState } from '../../hooks/useCalendar'
import { getCalendarHandle, type CalendarHandle, type CalendarStore } from '../../stores'
import { CalendarHeader } from './CalendarHeader'
import { MonthGrid } from './MonthGrid'
import type { CalendarInit, DisplayedMonth } from '../../types'

export interface CalendarProps extends CalendarInit {
  /** Render an existing store instead of creating one from the options. */
  store?: CalendarStore
  className?: string
  onCalendarSelected?: (date: Date) => void
  onCalendarMonthChanged?: (month: DisplayedMonth) => void
}

/**
 * Month calendar. `CalendarSelected` and `CalendarMonthChanged` are delivered to
 * the matching props and dispatched as bubbling DOM CustomEvents on the root.
 */
export const Calendar = forwardRef<CalendarHandle, CalendarProps>(function Calendar(
  { store: externalStore, className, onCalendarSelected, onCalendarMonthChanged, ...init },
  ref
) {
  const store = useCalendar(init, externalStore)
  const rootRef = useRef<HTMLDivElement>(null)
  const selectedRef = useRef(onCalendarSelected)
  const monthChangedRef = useRef(onCalendarMonthChanged)
  selectedRef.current = onCalendarSelected
  monthChangedRef.current = onCalendarMonthChanged

  useImperativeHandle(ref, () => getCalendarHandle(store), [store])

  useEffect(() => {
    const { bind } = store.getState()
    const unbindSelected = bind('CalendarSelected', (date) => {
      selectedRef.current?.(date)
      rootRef.current?.dispatchEvent(
        new CustomEvent('CalendarSelected', { detail: date, bubbles: true })
      )
    })
    const unbindMonth = bind('CalendarMonthChanged', (month) => {
      monthChangedRef.current?.(month)
      rootRef.current?.dispatchEvent(
        new CustomEvent('CalendarMonthChanged', { detail: month, bubbles: true })
      )
    })
    return () => {
      unbindSelected()
      unbindMonth()
    }
  }, [store])

  const options = useCalendarState(store, (s) => s.options)
  const disabled = options.state === 'disabled'

  return (
    <div
      ref={rootRef}
      className={['calendar', className].filter(Boolean).join(' ')}
      aria-disabled={disabled}
      style={{
        display: 'inline-block',
        backgroundColor: disabled ? options.disabledBackground : options.background,
        border: `${options.borderWidth}px solid ${options.borderColor}`,
        font: options.font,
      }}
    >
      <CalendarHeader store={store} />
      <MonthGrid store={store} />
    </div>
  )
})
