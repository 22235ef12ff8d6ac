import { DEFAULT_ALERT_THRESHOLD, DEFAULT_UPCOMING_DAYS } from './constants'
import type { Assignment, PlannerDocument } from './types'
import {
	attendanceAlerts,
	attendanceSummary,
	formatDueDate,
	subjectName,
	todaysClasses,
	upcomingAssignments,
} from './views'

// Plain-text screens for the menu. Each renderer returns the lines to print.

export interface DashboardOptions {
	upcomingDays?: number
	alertThreshold?: number
}

function located(location: string): string {
	return location ? ` @ ${location}` : ''
}

export function renderSubjects(doc: PlannerDocument): string[] {
	if (!doc.subjects.length) return ['No subjects found. Add one from the menu.']
	const lines: string[] = []
	doc.subjects.forEach((s, i) => {
		lines.push(`${i + 1}. ${s.name}${s.code ? ` [${s.code}]` : ''} (id:${s.id})`)
		if (s.prof) lines.push(`   Prof: ${s.prof}`)
		for (const slot of s.schedule) {
			lines.push(`   - ${slot.day} ${slot.start}-${slot.end}${located(slot.location)}`)
		}
		lines.push('')
	})
	return lines
}

export function renderAttendanceLog(doc: PlannerDocument): string[] {
	if (!doc.attendance.length) return ['No attendance recorded.']
	return doc.attendance.map(
		(r, i) => `${i + 1}. ${r.date} ${subjectName(doc, r.subjectId)} - ${r.present ? 'Present' : 'Absent'} (id:${r.id})`,
	)
}

export function renderAttendanceReport(doc: PlannerDocument, threshold: number = DEFAULT_ALERT_THRESHOLD): string[] {
	if (!doc.subjects.length) return ['No subjects.']
	return attendanceSummary(doc).map(({ subject, present, total, percent }) => {
		const status = percent >= threshold ? 'OK' : `LOW (<${threshold}%)`
		const code = subject.code ? ` (${subject.code})` : ''
		return `- ${subject.name}${code}: ${percent.toFixed(1)}% [${present}/${total}] -> ${status}`
	})
}

function byDueText(a: Assignment, b: Assignment): number {
	const left = a.dueAt ?? ''
	const right = b.dueAt ?? ''
	return left < right ? -1 : left > right ? 1 : 0
}

/**
 * All assignments ordered by due text (undated first), or only those due
 * within the next `upcomingDays` days when it is positive.
 */
export function renderAssignments(doc: PlannerDocument, now: Date, upcomingDays = 0): string[] {
	const assignments =
		upcomingDays > 0 ? upcomingAssignments(doc, now, upcomingDays) : [...doc.assignments].sort(byDueText)
	if (!assignments.length) return ['No assignments found.']
	const lines: string[] = []
	for (const a of assignments) {
		lines.push(`- ${a.title} [${subjectName(doc, a.subjectId)}] (id:${a.id})`)
		lines.push(`   Due: ${formatDueDate(a.dueAt)}   Status: ${a.completed ? 'Done' : 'Pending'}`)
		if (a.description) lines.push(`   ${a.description}`)
		lines.push('')
	}
	return lines
}

export function renderBackups(paths: readonly string[]): string[] {
	if (!paths.length) return ['No backups found.']
	return paths.map((p, i) => `${i + 1}. ${p}`)
}

export function renderDashboard(doc: PlannerDocument, now: Date, options: DashboardOptions = {}): string[] {
	const upcomingDays = options.upcomingDays ?? DEFAULT_UPCOMING_DAYS
	const threshold = options.alertThreshold ?? DEFAULT_ALERT_THRESHOLD
	const lines: string[] = []

	const classes = todaysClasses(doc, now)
	if (classes.length) {
		lines.push("Today's classes:")
		for (const { subject, slot } of classes) {
			lines.push(`- ${subject.name} ${slot.start}-${slot.end}${located(slot.location)}`)
		}
	} else {
		lines.push('No classes scheduled for today.')
	}
	lines.push('')

	const upcoming = upcomingAssignments(doc, now, upcomingDays)
	if (upcoming.length) {
		lines.push(`Upcoming assignments (next ${upcomingDays} days):`)
		for (const a of upcoming) {
			lines.push(`- ${a.title} [${subjectName(doc, a.subjectId)}] due ${formatDueDate(a.dueAt)}`)
		}
	} else {
		lines.push(`No upcoming assignments in the next ${upcomingDays} days.`)
	}
	lines.push('')

	lines.push(`Attendance alerts (below ${threshold}%):`)
	const alerts = attendanceAlerts(doc, threshold)
	if (alerts.length) {
		for (const { subject, percent } of alerts) {
			lines.push(`- ${subject.name}: ${percent.toFixed(1)}%`)
		}
	} else {
		lines.push('No attendance alerts.')
	}
	return lines
}
