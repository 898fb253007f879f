import { useState } from 'react'
import { useStore } from 'zustand'
import { createCalendarStore, type CalendarState, type CalendarStore } from '../stores'
import type { CalendarInit } from '../types'

/**
 * Creates the store backing one calendar. Options are read on the first render
 * only; later changes go through `configure`.
 */
export function useCalendar(init: CalendarInit, store?: CalendarStore): CalendarStore {
  const [created] = useState(() => store ?? createCalendarStore(init))
  return created
}

export function useCalendarState<T>(store: CalendarStore, selector: (state: CalendarState) => T): T {
  return useStore(store, selector)
}
