import { createStore } from 'zustand/vanilla'

export interface TextVariable {
  get: () => string
  set: (value: string) => void
  subscribe: (listener: (value: string) => void) => () => void
}

/**
 * Observable string the calendar mirrors its selection into, so a label or an
 * input elsewhere in the page can follow the selected date.
 */
export function createTextVariable(initial = ''): TextVariable {
  const store = createStore<{ value: string }>(() => ({ value: initial }))

  return {
    get: () => store.getState().value,
    set: (value) => store.setState({ value }),
    subscribe: (listener) =>
      store.subscribe((state, prev) => {
        if (state.value !== prev.value) listener(state.value)
      }),
  }
}

export function isTextVariable(value: unknown): value is TextVariable {
  if (typeof value !== 'object' || value === null) return false
  return (
    'get' in value && typeof value.get === 'function' &&
    'set' in value && typeof value.set === 'function' &&
    'subscribe' in value && typeof value.subscribe === 'function'
  )
}
