import { useEffect, type RefObject } from 'react'

/**
 * Calls `onDismiss` on a mousedown outside every given element, or on Escape.
 */
export function useDismiss(
  refs: RefObject<HTMLElement>[],
  onDismiss: () => void,
  enabled = true
) {
  useEffect(() => {
    if (!enabled) return

    const handleMouseDown = (e: MouseEvent) => {
      const target = e.target
      if (!(target instanceof Node)) return
      const inside = refs.some((ref) => ref.current?.contains(target))
      if (!inside) onDismiss()
    }

    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'Escape') onDismiss()
    }

    document.addEventListener('mousedown', handleMouseDown)
    document.addEventListener('keydown', handleKeyDown)
    return () => {
      document.removeEventListener('mousedown', handleMouseDown)
      document.removeEventListener('keydown', handleKeyDown)
    }
  }, [refs, onDismiss, enabled])
}
