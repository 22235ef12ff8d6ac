import { format, isValid, parseISO } from 'date-fns'
import { DATE_FORMAT } from '../constants'

// Calendar date, optionally followed by a time with a T or space delimiter and an offset.
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/

/**
 * Parses a stored date or date-time. Date-only values resolve to local midnight.
 * Returns undefined for anything that is not a valid ISO calendar date.
 */
export function parseDateTime(value: string): Date | undefined {
	const text = value.trim()
	if (!ISO_DATE_TIME.test(text)) return undefined
	const parsed = parseISO(text)
	return isValid(parsed) ? parsed : undefined
}

export function toCalendarDate(value: string | Date): string | undefined {
	const parsed = typeof value === 'string' ? parseDateTime(value) : value
	if (!parsed || !isValid(parsed)) return undefined
	return format(parsed, DATE_FORMAT)
}

export function isMidnight(date: Date): boolean {
	return date.getHours() === 0 && date.getMinutes() === 0 && date.getSeconds() === 0
}
