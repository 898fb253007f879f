import type { ZodError } from 'zod'

export type CalendarErrorCode = 'invalid-argument' | 'not-found' | 'unknown-option'

export class CalendarError extends Error {
  constructor(
    message: string,
    public code: CalendarErrorCode,
    public details?: unknown,
  ) {
    super(message)
    this.name = 'CalendarError'
  }
}

export class InvalidArgumentError extends CalendarError {
  constructor(message: string, details?: unknown) {
    super(message, 'invalid-argument', details)
    this.name = 'InvalidArgumentError'
  }
}

export class NotFoundError extends CalendarError {
  constructor(message: string, details?: unknown) {
    super(message, 'not-found', details)
    this.name = 'NotFoundError'
  }
}

export class UnknownOptionError extends CalendarError {
  constructor(public option: string) {
    super(`Unknown option "${option}"`, 'unknown-option')
    this.name = 'UnknownOptionError'
  }
}

/**
 * Maps a zod failure onto the widget's error classes: unrecognised keys become
 * an {@link UnknownOptionError}, anything else an {@link InvalidArgumentError}
 * naming the first offending path.
 */
export function fromZodError(error: ZodError): CalendarError {
  for (const issue of error.issues) {
    if (issue.code === 'unrecognized_keys' && issue.keys.length > 0) {
      return new UnknownOptionError(issue.keys[0])
    }
  }
  const first = error.issues[0]
  const path = first?.path.join('.') ?? ''
  const message = first ? first.message : 'Invalid value'
  return new InvalidArgumentError(path ? `${path}: ${message}` : message, error.issues)
}
