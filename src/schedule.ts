import { getDay } from 'date-fns'
import { WEEKDAYS } from './constants'
import type { Weekday } from './constants'
import { ValidationError } from './errors'
import type { ScheduleSlot } from './types'

const EXAMPLE = 'Mon@09:00-10:30'

export function isWeekday(value: string): value is Weekday {
	return WEEKDAYS.some((day) => day === value)
}

/**
 * Canonical label for the local day of week of `date`, independent of locale.
 */
export function weekdayLabel(date: Date): Weekday {
	return WEEKDAYS[getDay(date)]
}

function badPiece(piece: string): ValidationError {
	return new ValidationError(`Bad schedule piece "${piece}". Example: ${EXAMPLE}`)
}

function parsePiece(piece: string): ScheduleSlot {
	const space = piece.indexOf(' ')
	const token = space === -1 ? piece : piece.slice(0, space)
	const location = space === -1 ? '' : piece.slice(space + 1).trim()

	const dayAndTimes = token.split('@')
	if (dayAndTimes.length !== 2) throw badPiece(piece)
	const [dayText, times] = dayAndTimes
	const range = times.split('-')
	if (range.length !== 2) throw badPiece(piece)

	const day = dayText.trim()
	if (!isWeekday(day)) {
		throw new ValidationError(`Unknown weekday "${day}" in "${piece}". Use one of: ${WEEKDAYS.join(', ')}`)
	}
	const start = range[0].trim()
	const end = range[1].trim()
	if (!start || !end) throw badPiece(piece)
	return { day, start, end, location }
}

/**
 * Parses "Mon@09:00-10:30,Tue@11:00-12:30 Room201" into slots.
 * Any bad piece fails the whole call.
 */
export function parseSchedule(text: string): ScheduleSlot[] {
	return text
		.split(',')
		.map((piece) => piece.trim())
		.filter(Boolean)
		.map(parsePiece)
}

export function formatSlot(slot: ScheduleSlot): string {
	const base = `${slot.day}@${slot.start}-${slot.end}`
	return slot.location ? `${base} ${slot.location}` : base
}

export function formatSchedule(slots: readonly ScheduleSlot[]): string {
	return slots.map(formatSlot).join(',')
}
