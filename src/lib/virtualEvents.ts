import type { DisplayedMonth } from '../types'

export interface CalendarEventMap {
  CalendarSelected: Date
  CalendarMonthChanged: DisplayedMonth
}

export type CalendarEventName = keyof CalendarEventMap

export type CalendarEventHandler<K extends CalendarEventName> = (detail: CalendarEventMap[K]) => void

type HandlerSets = { [K in CalendarEventName]: Set<CalendarEventHandler<K>> }

export interface VirtualEventBus {
  bind: <K extends CalendarEventName>(name: K, handler: CalendarEventHandler<K>) => () => void
  emit: <K extends CalendarEventName>(name: K, detail: CalendarEventMap[K]) => void
}

export function createVirtualEventBus(): VirtualEventBus {
  const handlers: HandlerSets = {
    CalendarSelected: new Set(),
    CalendarMonthChanged: new Set(),
  }

  return {
    bind<K extends CalendarEventName>(name: K, handler: CalendarEventHandler<K>) {
      const set: Set<CalendarEventHandler<K>> = handlers[name]
      set.add(handler)
      return () => {
        set.delete(handler)
      }
    },

    emit<K extends CalendarEventName>(name: K, detail: CalendarEventMap[K]) {
      const set: Set<CalendarEventHandler<K>> = handlers[name]
      for (const handler of [...set]) {
        try {
          handler(detail)
        } catch (err) {
          console.error(`${name} handler failed:`, err)
        }
      }
    },
  }
}
