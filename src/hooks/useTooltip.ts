import { useCallback, useEffect, useRef, useState } from 'react'

interface Tooltip {
  visible: boolean
  schedule: () => void
  cancel: () => void
}

/** Single-shot delayed show; leaving before the delay elapses cancels it. */
export function useTooltip(delay: number): Tooltip {
  const [visible, setVisible] = useState(false)
  const timerRef = useRef<ReturnType<typeof setTimeout> | null>(null)

  const clearTimer = () => {
    if (timerRef.current !== null) {
      clearTimeout(timerRef.current)
      timerRef.current = null
    }
  }

  const schedule = useCallback(() => {
    clearTimer()
    timerRef.current = setTimeout(() => {
      timerRef.current = null
      setVisible(true)
    }, delay)
  }, [delay])

  const cancel = useCallback(() => {
    clearTimer()
    setVisible(false)
  }, [])

  useEffect(() => {
    return () => {
      if (timerRef.current !== null) clearTimeout(timerRef.current)
    }
  }, [])

  return { visible, schedule, cancel }
}
