import { addDays, format } from 'date-fns'
import { DATE_FORMAT, DATE_TIME_FORMAT, DEFAULT_ALERT_THRESHOLD } from './constants'
import { weekdayLabel } from './schedule'
import type {
	Assignment,
	AttendanceAlert,
	AttendanceSummaryRow,
	PlannerDocument,
	TodaysClass,
} from './types'
import { isMidnight, parseDateTime } from './utils/dates'

export function todaysClasses(doc: PlannerDocument, today: Date): TodaysClass[] {
	const day = weekdayLabel(today)
	const out: TodaysClass[] = []
	for (const subject of doc.subjects) {
		for (const slot of subject.schedule) {
			if (slot.day === day) out.push({ subject, slot })
		}
	}
	return out
}

function percentOf(present: number, total: number): number {
	// A subject without records counts as fully attended.
	return total === 0 ? 100 : (100 * present) / total
}

export function attendancePercent(doc: PlannerDocument, subjectId: string): number {
	const rows = doc.attendance.filter((r) => r.subjectId === subjectId)
	return percentOf(rows.filter((r) => r.present).length, rows.length)
}

export function attendanceSummary(doc: PlannerDocument): AttendanceSummaryRow[] {
	return doc.subjects.map((subject) => {
		const rows = doc.attendance.filter((r) => r.subjectId === subject.id)
		const present = rows.filter((r) => r.present).length
		return { subject, present, total: rows.length, percent: percentOf(present, rows.length) }
	})
}

export function attendanceAlerts(
	doc: PlannerDocument,
	threshold: number = DEFAULT_ALERT_THRESHOLD,
): AttendanceAlert[] {
	return attendanceSummary(doc)
		.filter((row) => row.percent < threshold)
		.map(({ subject, percent }) => ({ subject, percent }))
}

interface DatedAssignment {
	assignment: Assignment
	due: Date
}

/**
 * Assignments due within [now, now + windowDays], soonest first.
 * Equal due dates keep their insertion order.
 */
export function upcomingAssignments(doc: PlannerDocument, now: Date, windowDays: number): Assignment[] {
	const from = now.getTime()
	const until = addDays(now, windowDays).getTime()
	const dated: DatedAssignment[] = []
	for (const assignment of doc.assignments) {
		const due = assignment.dueAt ? parseDateTime(assignment.dueAt) : undefined
		if (due && due.getTime() >= from && due.getTime() <= until) dated.push({ assignment, due })
	}
	return dated.sort((a, b) => a.due.getTime() - b.due.getTime()).map((d) => d.assignment)
}

export function formatDueDate(value: string | null | undefined): string {
	if (!value) return 'N/A'
	const parsed = parseDateTime(value)
	if (!parsed) return value
	return format(parsed, isMidnight(parsed) ? DATE_FORMAT : DATE_TIME_FORMAT)
}

export function subjectName(doc: PlannerDocument, subjectId: string | null): string {
	const subject = subjectId ? doc.subjects.find((s) => s.id === subjectId) : undefined
	return subject?.name ?? 'No subject'
}
