import { format, type Locale } from 'date-fns'
import { useTooltip } from '../../hooks/useTooltip'
import { formatDateKey } from '../../lib/date'
import { Tooltip } from './Tooltip'
import type { CellStyle, DayCell as DayCellModel } from '../../types'

interface DayCellProps {
  cell: DayCellModel
  style: CellStyle
  locale: Locale
  selected: boolean
  hidden: boolean
  clickable: boolean
  cursor: string
  tooltipLines: string[]
  tooltipAlpha: number
  tooltipDelay: number
  onSelect: (date: Date) => void
}

export function DayCell({
  cell,
  style,
  locale,
  selected,
  hidden,
  clickable,
  cursor,
  tooltipLines,
  tooltipAlpha,
  tooltipDelay,
  onSelect,
}: DayCellProps) {
  const tooltip = useTooltip(tooltipDelay)
  const hasTooltip = tooltipLines.length > 0

  if (hidden) {
    return <div role="gridcell" className="calendar-day calendar-day-blank" />
  }

  return (
    <div
      role="gridcell"
      aria-selected={selected}
      className="calendar-day"
      style={{ position: 'relative' }}
      onMouseEnter={hasTooltip ? tooltip.schedule : undefined}
      onMouseLeave={hasTooltip ? tooltip.cancel : undefined}
    >
      <button
        type="button"
        data-date={formatDateKey(cell.date)}
        aria-label={format(cell.date, 'PPPP', { locale })}
        aria-disabled={!clickable}
        onClick={() => {
          if (clickable) onSelect(cell.date)
        }}
        className="calendar-day-button"
        style={{
          width: '100%',
          height: '100%',
          textAlign: 'center',
          backgroundColor: style.background,
          color: style.foreground,
          font: style.font ?? 'inherit',
          cursor: clickable ? cursor : 'default',
          border: 'none',
          padding: '4px 0',
        }}
      >
        {format(cell.date, 'd')}
      </button>
      {hasTooltip && tooltip.visible && (
        <Tooltip
          lines={tooltipLines}
          background={style.tooltipBackground}
          foreground={style.tooltipForeground}
          alpha={tooltipAlpha}
        />
      )}
    </div>
  )
}
