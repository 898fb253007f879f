import { useMemo } from 'react'
import { generateMonthWeeks, isSameDay, isWithinBounds, weekStartsOn } from '../../lib/date'
import { getDayNames, resolveLocale } from '../../lib/locale'
import { resolveDayStyle } from '../../lib/cellStyle'
import { useCalendarState } from '../../hooks/useCalendar'
import { selectDayCalevents, type CalendarStore } from '../../stores'
import { DayCell } from './DayCell'

interface MonthGridProps {
  store: CalendarStore
}

export function MonthGrid({ store }: MonthGridProps) {
  const options = useCalendarState(store, (s) => s.options)
  const displayed = useCalendarState(store, (s) => s.displayed)
  const selection = useCalendarState(store, (s) => s.selection)
  const tags = useCalendarState(store, (s) => s.tags)
  const calevents = useCalendarState(store, (s) => s.calevents)
  const caleventOrder = useCalendarState(store, (s) => s.caleventOrder)
  const selectionSet = useCalendarState(store, (s) => s.selectionSet)

  const locale = useMemo(() => resolveLocale(options.locale), [options.locale])
  const dayNames = useMemo(
    () => getDayNames(locale, weekStartsOn(options.firstWeekday)),
    [locale, options.firstWeekday]
  )
  const weeks = useMemo(
    () => generateMonthWeeks(displayed, options.firstWeekday, options.weekendDays),
    [displayed, options.firstWeekday, options.weekendDays]
  )

  const disabled = options.state === 'disabled'
  const columns = options.showWeekNumbers ? 8 : 7
  const headerStyle = {
    backgroundColor: options.headersBackground,
    color: options.headersForeground,
  }

  return (
    <div
      role="grid"
      className="calendar-grid"
      style={{ display: 'grid', gridTemplateColumns: `repeat(${columns}, minmax(0, 1fr))`, gap: '1px' }}
    >
      <div role="row" style={{ display: 'contents' }}>
        {options.showWeekNumbers && (
          <div role="columnheader" className="calendar-weeknumber-header" style={headerStyle} />
        )}
        {dayNames.map((name, i) => (
          <div
            key={`${i}-${name}`}
            role="columnheader"
            className="calendar-dayname"
            style={{ ...headerStyle, textAlign: 'center', fontWeight: 500, padding: '4px 0' }}
          >
            {name}
          </div>
        ))}
      </div>

      {weeks.map((week) => (
        <div key={week.key} role="row" style={{ display: 'contents' }}>
          {options.showWeekNumbers && (
            <div
              role="rowheader"
              className="calendar-weeknumber"
              style={{ ...headerStyle, textAlign: 'center', fontSize: '0.75em', padding: '4px 0' }}
            >
              {week.weekNumber}
            </div>
          )}
          {week.days.map((cell) => {
            const hidden = !cell.inCurrentMonth && !options.showOtherMonthDays
            const selected = selection !== null && isSameDay(selection, cell.date)
            const outOfBounds = !isWithinBounds(cell.date, options.minDate, options.maxDate)
            const dayCalevents = selectDayCalevents({ calevents, caleventOrder }, cell.date)
            const style = resolveDayStyle(cell, {
              options,
              selected,
              outOfBounds,
              calevents: dayCalevents,
              tags,
            })

            return (
              <DayCell
                key={cell.date.getTime()}
                cell={cell}
                style={style}
                locale={locale}
                selected={selected}
                hidden={hidden}
                clickable={!disabled && !outOfBounds && options.selectMode === 'day'}
                cursor={options.cursor}
                tooltipLines={dayCalevents.map((ev) => ev.text).filter((text) => text.length > 0)}
                tooltipAlpha={options.tooltipAlpha}
                tooltipDelay={options.tooltipDelay}
                onSelect={selectionSet}
              />
            )
          })}
        </div>
      ))}
    </div>
  )
}
