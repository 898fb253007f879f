import { useMemo, type ReactNode } from 'react'
import { ChevronLeft, ChevronRight, ChevronsLeft, ChevronsRight } from 'lucide-react'
import { compareMonths, toDisplayedMonth } from '../../lib/date'
import { getMonthName, resolveLocale } from '../../lib/locale'
import { useCalendarState } from '../../hooks/useCalendar'
import type { CalendarStore } from '../../stores'

interface CalendarHeaderProps {
  store: CalendarStore
}

interface NavButtonProps {
  label: string
  disabled: boolean
  onClick: () => void
  children: ReactNode
}

function NavButton({ label, disabled, onClick, children }: NavButtonProps) {
  return (
    <button
      type="button"
      aria-label={label}
      disabled={disabled}
      onClick={onClick}
      className="calendar-nav-button"
      style={{
        display: 'flex',
        alignItems: 'center',
        justifyContent: 'center',
        padding: '4px',
        borderRadius: '6px',
        background: 'transparent',
        border: 'none',
        color: 'inherit',
        cursor: disabled ? 'default' : 'pointer',
        opacity: disabled ? 0.4 : 1,
      }}
    >
      {children}
    </button>
  )
}

export function CalendarHeader({ store }: CalendarHeaderProps) {
  const options = useCalendarState(store, (s) => s.options)
  const displayed = useCalendarState(store, (s) => s.displayed)
  const { prevMonth, nextMonth, prevYear, nextYear } = store.getState()

  const locale = useMemo(() => resolveLocale(options.locale), [options.locale])
  const disabled = options.state === 'disabled'
  const first = options.minDate ? toDisplayedMonth(options.minDate) : null
  const last = options.maxDate ? toDisplayedMonth(options.maxDate) : null

  // Navigation clamps to the bounds, so a step is possible until the view reaches them.
  const canGoBack = !disabled && (first === null || compareMonths(displayed, first) > 0)
  const canGoForward = !disabled && (last === null || compareMonths(displayed, last) < 0)

  return (
    <div
      className="calendar-header"
      style={{
        padding: '4px',
        display: 'flex',
        alignItems: 'center',
        justifyContent: 'space-between',
        color: disabled ? options.disabledForeground : options.foreground,
      }}
    >
      <div className="calendar-nav" style={{ display: 'flex', alignItems: 'center' }}>
        <NavButton label="Previous month" disabled={!canGoBack} onClick={prevMonth}>
          <ChevronLeft size={16} />
        </NavButton>
        <span className="calendar-month-label" style={{ minWidth: '6em', textAlign: 'center', fontWeight: 600 }}>
          {getMonthName(locale, displayed.month)}
        </span>
        <NavButton label="Next month" disabled={!canGoForward} onClick={nextMonth}>
          <ChevronRight size={16} />
        </NavButton>
      </div>

      <div className="calendar-nav" style={{ display: 'flex', alignItems: 'center' }}>
        <NavButton label="Previous year" disabled={!canGoBack} onClick={prevYear}>
          <ChevronsLeft size={16} />
        </NavButton>
        <span className="calendar-year-label" style={{ fontWeight: 600 }}>{displayed.year}</span>
        <NavButton label="Next year" disabled={!canGoForward} onClick={nextYear}>
          <ChevronsRight size={16} />
        </NavButton>
      </div>
    </div>
  )
}
