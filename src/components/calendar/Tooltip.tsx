interface TooltipProps {
  lines: string[]
  background: string
  foreground: string
  alpha: number
}

export function Tooltip({ lines, background, foreground, alpha }: TooltipProps) {
  return (
    <div
      role="tooltip"
      className="calendar-tooltip"
      style={{
        position: 'absolute',
        top: '100%',
        left: '50%',
        transform: 'translateX(-50%)',
        marginTop: '4px',
        padding: '4px 8px',
        borderRadius: '4px',
        whiteSpace: 'pre',
        zIndex: 50,
        pointerEvents: 'none',
        backgroundColor: background,
        color: foreground,
        opacity: alpha,
      }}
    >
      {lines.map((line, i) => (
        <div key={i}>{line}</div>
      ))}
    </div>
  )
}
