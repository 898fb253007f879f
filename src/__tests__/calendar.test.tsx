/**
 * Tests for the Calendar component
 */

import { createRef } from 'react'
import { act, fireEvent, render, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import { Calendar } from '../components/calendar'
import type { CalendarHandle } from '../stores'

describe('Calendar', () => {
  describe('rendering', () => {
    it('shows the month, year and week numbers', () => {
      render(<Calendar year={2024} month={3} />)

      expect(screen.getByText('March')).toBeInTheDocument()
      expect(screen.getByText('2024')).toBeInTheDocument()
      expect(screen.getAllByRole('rowheader').map((cell) => cell.textContent)).toEqual([
        '9',
        '10',
        '11',
        '12',
        '13',
        '14',
      ])
    })

    it('labels the columns from the first weekday', () => {
      render(<Calendar year={2024} month={3} firstWeekday="sunday" showWeekNumbers={false} />)

      const headers = screen.getAllByRole('columnheader').map((cell) => cell.textContent)
      expect(headers).toEqual(['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'])
      expect(screen.queryAllByRole('rowheader')).toHaveLength(0)
    })

    it('carries only its own class names', () => {
      render(<Calendar year={2024} month={3} className="booking" />)

      expect(screen.getByRole('grid')).toHaveAttribute('class', 'calendar-grid')
      expect(screen.getByRole('grid').parentElement).toHaveAttribute('class', 'calendar booking')
      expect(screen.getByRole('button', { name: 'Next month' })).toHaveAttribute(
        'class',
        'calendar-nav-button'
      )
    })

    it('hides days of the adjacent months when asked', () => {
      render(<Calendar year={2024} month={3} showOtherMonthDays={false} />)

      expect(screen.queryByLabelText('Monday, February 26th, 2024')).not.toBeInTheDocument()
      expect(screen.getByLabelText('Friday, March 1st, 2024')).toBeInTheDocument()
    })

    it('uses the locale for names', () => {
      render(<Calendar year={2024} month={3} locale="fr_FR" />)

      expect(screen.getByText('Mars')).toBeInTheDocument()
    })
  })

  describe('selection', () => {
    it('selects a clicked day and reports it', async () => {
      const user = userEvent.setup()
      const onSelected = jest.fn()
      const details: unknown[] = []
      const listener = (e: Event) => {
        if (e instanceof CustomEvent) details.push(e.detail)
      }
      document.addEventListener('CalendarSelected', listener)

      render(<Calendar year={2024} month={3} onCalendarSelected={onSelected} />)
      await user.click(screen.getByLabelText('Friday, March 15th, 2024'))

      expect(onSelected).toHaveBeenCalledTimes(1)
      expect(onSelected).toHaveBeenCalledWith(new Date(2024, 2, 15))
      expect(details).toEqual([new Date(2024, 2, 15)])
      expect(screen.getByLabelText('Friday, March 15th, 2024').parentElement).toHaveAttribute(
        'aria-selected',
        'true'
      )
      document.removeEventListener('CalendarSelected', listener)
    })

    it('ignores clicks while disabled', async () => {
      const user = userEvent.setup()
      const onSelected = jest.fn()

      render(<Calendar year={2024} month={3} state="disabled" onCalendarSelected={onSelected} />)
      await user.click(screen.getByLabelText('Friday, March 15th, 2024'))

      expect(onSelected).not.toHaveBeenCalled()
      expect(screen.getByRole('button', { name: 'Next month' })).toBeDisabled()
    })

    it('ignores clicks outside the date bounds', async () => {
      const user = userEvent.setup()
      const onSelected = jest.fn()

      render(
        <Calendar
          year={2024}
          month={3}
          minDate={new Date(2024, 2, 10)}
          onCalendarSelected={onSelected}
        />
      )
      await user.click(screen.getByLabelText('Saturday, March 9th, 2024'))

      expect(onSelected).not.toHaveBeenCalled()
      expect(screen.getByRole('button', { name: 'Previous month' })).toBeDisabled()
    })
  })

  describe('navigation', () => {
    it('moves to the next month and reports it once', async () => {
      const user = userEvent.setup()
      const onMonthChanged = jest.fn()

      render(<Calendar year={2024} month={3} onCalendarMonthChanged={onMonthChanged} />)
      await user.click(screen.getByRole('button', { name: 'Next month' }))

      expect(onMonthChanged).toHaveBeenCalledTimes(1)
      expect(onMonthChanged).toHaveBeenCalledWith({ year: 2024, month: 4 })
      expect(screen.getByText('April')).toBeInTheDocument()
    })

    it('moves by a year', async () => {
      const user = userEvent.setup()

      render(<Calendar year={2024} month={3} />)
      await user.click(screen.getByRole('button', { name: 'Previous year' }))

      expect(screen.getByText('2023')).toBeInTheDocument()
      expect(screen.getByText('March')).toBeInTheDocument()
    })
  })

  describe('calevents', () => {
    it('colors tagged days', () => {
      const ref = createRef<CalendarHandle>()
      render(<Calendar ref={ref} year={2024} month={3} />)

      act(() => {
        ref.current?.tagConfig('holiday', { background: '#ff0000', foreground: '#00ff00' })
        ref.current?.caleventCreate(new Date(2024, 2, 12), 'Day off', 'holiday')
      })

      expect(screen.getByLabelText('Tuesday, March 12th, 2024')).toHaveStyle({
        backgroundColor: '#ff0000',
        color: '#00ff00',
      })
    })

    it('shows the event texts after the tooltip delay', () => {
      jest.useFakeTimers()
      try {
        const ref = createRef<CalendarHandle>()
        render(<Calendar ref={ref} year={2024} month={3} tooltipDelay={500} />)
        act(() => {
          ref.current?.caleventCreate(new Date(2024, 2, 12), 'Dentist')
          ref.current?.caleventCreate(new Date(2024, 2, 12), 'Call Sam')
        })

        const cell = screen.getByLabelText('Tuesday, March 12th, 2024').parentElement
        if (!cell) throw new Error('day cell not found')

        fireEvent.mouseEnter(cell)
        act(() => {
          jest.advanceTimersByTime(499)
        })
        expect(screen.queryByRole('tooltip')).not.toBeInTheDocument()

        act(() => {
          jest.advanceTimersByTime(1)
        })
        expect(screen.getByRole('tooltip')).toHaveTextContent('DentistCall Sam')

        fireEvent.mouseLeave(cell)
        expect(screen.queryByRole('tooltip')).not.toBeInTheDocument()
      } finally {
        jest.useRealTimers()
      }
    })

    it('drops a pending tooltip when the pointer leaves early', () => {
      jest.useFakeTimers()
      try {
        const ref = createRef<CalendarHandle>()
        render(<Calendar ref={ref} year={2024} month={3} tooltipDelay={500} />)
        act(() => {
          ref.current?.caleventCreate(new Date(2024, 2, 12), 'Dentist')
        })

        const cell = screen.getByLabelText('Tuesday, March 12th, 2024').parentElement
        if (!cell) throw new Error('day cell not found')

        fireEvent.mouseEnter(cell)
        act(() => {
          jest.advanceTimersByTime(499)
        })
        fireEvent.mouseLeave(cell)
        act(() => {
          jest.advanceTimersByTime(1000)
        })

        expect(screen.queryByRole('tooltip')).not.toBeInTheDocument()
      } finally {
        jest.useRealTimers()
      }
    })
  })
})
