import type { Calevent, CellStyle, DayCell, StyleOptions, Tag, WidgetState } from '../types'

export interface DayStyleContext {
  options: StyleOptions & { state: WidgetState }
  selected: boolean
  outOfBounds: boolean
  /** Calevents on the day, bottom of the stack first. */
  calevents: Calevent[]
  /** Tag table in stacking order, bottom first. */
  tags: Tag[]
}

type Layer = Partial<CellStyle>

function baseStyle(cell: DayCell, options: StyleOptions): Layer {
  if (!cell.inCurrentMonth) {
    return cell.isWeekend
      ? { background: options.otherMonthWeBackground, foreground: options.otherMonthWeForeground }
      : { background: options.otherMonthBackground, foreground: options.otherMonthForeground }
  }
  return cell.isWeekend
    ? { background: options.weekendBackground, foreground: options.weekendForeground }
    : { background: options.normalBackground, foreground: options.normalForeground }
}

function applyLayer(target: Layer, layer: Layer): Layer {
  const next = { ...target }
  if (layer.background !== undefined) next.background = layer.background
  if (layer.foreground !== undefined) next.foreground = layer.foreground
  if (layer.font !== undefined) next.font = layer.font
  if (layer.tooltipBackground !== undefined) next.tooltipBackground = layer.tooltipBackground
  if (layer.tooltipForeground !== undefined) next.tooltipForeground = layer.tooltipForeground
  return next
}

/**
 * Orders the tags carried by a day's calevents: calevent stacking first, then
 * tag stacking inside each calevent. The last entry is the topmost layer.
 */
export function layeredTags(calevents: Calevent[], tags: Tag[]): Tag[] {
  const rank = new Map(tags.map((tag, index) => [tag.name, index]))
  const byName = new Map(tags.map((tag) => [tag.name, tag]))
  const layers: Tag[] = []

  for (const ev of calevents) {
    const ordered = ev.tags
      .filter((name) => rank.has(name))
      .sort((a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0))
    for (const name of ordered) {
      const tag = byName.get(name)
      if (tag) layers.push(tag)
    }
  }
  return layers
}

/**
 * Effective style of a day cell. Selection and disabled colors sit above the
 * calevent tags; on other days every tag attribute is resolved topmost-wins.
 */
export function resolveDayStyle(cell: DayCell, ctx: DayStyleContext): CellStyle {
  const { options } = ctx
  const disabled = options.state === 'disabled'
  let style: Layer = {
    ...baseStyle(cell, options),
    tooltipBackground: options.tooltipBackground,
    tooltipForeground: options.tooltipForeground,
  }

  for (const tag of layeredTags(ctx.calevents, ctx.tags)) {
    style = applyLayer(style, tag)
  }

  if (ctx.selected) {
    style = applyLayer(style, disabled
      ? { background: options.disabledSelectBackground, foreground: options.disabledSelectForeground }
      : { background: options.selectBackground, foreground: options.selectForeground })
  } else if (disabled || ctx.outOfBounds) {
    style = applyLayer(style, {
      background: options.disabledDayBackground,
      foreground: options.disabledDayForeground,
    })
  }

  return {
    background: style.background ?? options.normalBackground,
    foreground: style.foreground ?? options.normalForeground,
    font: style.font,
    tooltipBackground: style.tooltipBackground ?? options.tooltipBackground,
    tooltipForeground: style.tooltipForeground ?? options.tooltipForeground,
  }
}
