import { describe, expect, it } from 'vitest'
import { addAssignment, addSubject, createDocument, recordAttendance } from './planner'
import type { PlannerDocument } from './types'
import {
	attendanceAlerts,
	attendancePercent,
	attendanceSummary,
	formatDueDate,
	subjectName,
	todaysClasses,
	upcomingAssignments,
} from './views'

const MONDAY = new Date(2024, 0, 1, 7, 30)

function record(doc: PlannerDocument, subjectId: string, marks: boolean[]) {
	marks.forEach((present, i) => recordAttendance(doc, subjectId, `2024-01-${String(i + 1).padStart(2, '0')}`, present))
}

describe('todaysClasses', () => {
	it('returns slots for the current weekday in subject then slot order', () => {
		const doc = createDocument()
		const calculus = addSubject(doc, { name: 'Calculus', schedule: 'Mon@11:00-12:00,Wed@09:00-10:00,Mon@08:00-09:00' })
		addSubject(doc, { name: 'History', schedule: 'Tue@09:00-10:00' })
		const physics = addSubject(doc, { name: 'Physics', schedule: 'Mon@13:00-14:00 Lab 2' })

		const classes = todaysClasses(doc, MONDAY)

		expect(classes.map((c) => [c.subject, c.slot])).toEqual([
			[calculus, { day: 'Mon', start: '11:00', end: '12:00', location: '' }],
			[calculus, { day: 'Mon', start: '08:00', end: '09:00', location: '' }],
			[physics, { day: 'Mon', start: '13:00', end: '14:00', location: 'Lab 2' }],
		])
	})

	it('is empty on a day without classes', () => {
		const doc = createDocument()
		addSubject(doc, { name: 'Calculus', schedule: 'Mon@11:00-12:00' })
		expect(todaysClasses(doc, new Date(2024, 0, 6))).toEqual([])
	})
})

describe('attendancePercent', () => {
	it('is 100 for a subject without records', () => {
		const doc = createDocument()
		const subject = addSubject(doc, { name: 'Calculus' })
		expect(attendancePercent(doc, subject.id)).toBe(100)
		expect(attendancePercent(doc, 'no-such-subject')).toBe(100)
	})

	it('is the share of present records', () => {
		const doc = createDocument()
		const calculus = addSubject(doc, { name: 'Calculus' })
		const physics = addSubject(doc, { name: 'Physics' })
		record(doc, calculus.id, [true, true, true, false])
		record(doc, physics.id, [true, false, false])
		expect(attendancePercent(doc, calculus.id)).toBe(75)
		expect(attendancePercent(doc, physics.id)).toBeCloseTo(100 / 3, 10)
	})

	it('equals 100*N/(N+M) for N present and M absent records', () => {
		for (const [n, m] of [[0, 1], [1, 0], [2, 5], [7, 3]]) {
			const doc = createDocument()
			const subject = addSubject(doc, { name: 'Calculus' })
			record(doc, subject.id, [...Array<boolean>(n).fill(true), ...Array<boolean>(m).fill(false)])
			expect(attendancePercent(doc, subject.id)).toBeCloseTo((100 * n) / (n + m), 10)
		}
	})
})

describe('attendanceSummary and alerts', () => {
	function sample() {
		const doc = createDocument()
		const calculus = addSubject(doc, { name: 'Calculus' })
		const physics = addSubject(doc, { name: 'Physics' })
		const chemistry = addSubject(doc, { name: 'Chemistry' })
		const history = addSubject(doc, { name: 'History' })
		record(doc, calculus.id, [true, false, true])
		record(doc, physics.id, [true, true, true, false])
		record(doc, history.id, [false])
		return { doc, calculus, physics, chemistry, history }
	}

	it('summarizes each subject', () => {
		const { doc, calculus, physics, chemistry, history } = sample()
		expect(attendanceSummary(doc)).toEqual([
			{ subject: calculus, present: 2, total: 3, percent: (100 * 2) / 3 },
			{ subject: physics, present: 3, total: 4, percent: 75 },
			{ subject: chemistry, present: 0, total: 0, percent: 100 },
			{ subject: history, present: 0, total: 1, percent: 0 },
		])
	})

	it('flags subjects strictly below the threshold in subject order', () => {
		const { doc, calculus, physics, history } = sample()
		expect(attendanceAlerts(doc)).toEqual([
			{ subject: calculus, percent: (100 * 2) / 3 },
			{ subject: history, percent: 0 },
		])
		expect(attendanceAlerts(doc, 80).map((a) => a.subject)).toEqual([calculus, physics, history])
	})
})

describe('upcomingAssignments', () => {
	const NEW_YEAR = new Date(2024, 0, 1, 0, 0)

	it('keeps only assignments due inside the window', () => {
		const doc = createDocument()
		const soon = addAssignment(doc, { title: 'Soon', dueAt: '2024-01-03' })
		addAssignment(doc, { title: 'Later', dueAt: '2024-01-10' })
		addAssignment(doc, { title: 'Undated' })
		expect(upcomingAssignments(doc, NEW_YEAR, 7)).toEqual([soon])
	})

	it('includes both window edges and skips past or unreadable dates', () => {
		const doc = createDocument()
		const start = addAssignment(doc, { title: 'Start', dueAt: '2024-01-01' })
		const end = addAssignment(doc, { title: 'End', dueAt: '2024-01-08T00:00' })
		addAssignment(doc, { title: 'Past', dueAt: '2023-12-31T23:59' })
		addAssignment(doc, { title: 'Just after', dueAt: '2024-01-08T00:01' })
		doc.assignments.push({ ...start, id: 'legacy', title: 'Legacy', dueAt: 'tomorrow' })
		expect(upcomingAssignments(doc, NEW_YEAR, 7)).toEqual([start, end])
	})

	it('sorts by due date and keeps insertion order on ties', () => {
		const doc = createDocument()
		const a = addAssignment(doc, { title: 'A', dueAt: '2024-01-05T10:00' })
		const b = addAssignment(doc, { title: 'B', dueAt: '2024-01-02' })
		const c = addAssignment(doc, { title: 'C', dueAt: '2024-01-05 10:00' })
		const d = addAssignment(doc, { title: 'D', dueAt: '2024-01-04T23:00' })
		expect(upcomingAssignments(doc, NEW_YEAR, 7)).toEqual([b, d, a, c])
	})
})

describe('formatDueDate', () => {
	it('returns N/A for absent values', () => {
		expect(formatDueDate(null)).toBe('N/A')
		expect(formatDueDate(undefined)).toBe('N/A')
		expect(formatDueDate('')).toBe('N/A')
	})

	it('drops a midnight time and keeps any other time', () => {
		expect(formatDueDate('2024-01-03')).toBe('2024-01-03')
		expect(formatDueDate('2024-01-03T00:00')).toBe('2024-01-03')
		expect(formatDueDate('2024-01-03T14:05')).toBe('2024-01-03 14:05')
		expect(formatDueDate('2024-01-03 14:05:30')).toBe('2024-01-03 14:05')
	})

	it('returns unreadable values verbatim', () => {
		expect(formatDueDate('next week')).toBe('next week')
		expect(formatDueDate('2024-02-30')).toBe('2024-02-30')
	})
})

describe('subjectName', () => {
	it('falls back for unassigned or dangling references', () => {
		const doc = createDocument()
		const calculus = addSubject(doc, { name: 'Calculus' })
		expect(subjectName(doc, calculus.id)).toBe('Calculus')
		expect(subjectName(doc, null)).toBe('No subject')
		expect(subjectName(doc, 'gone')).toBe('No subject')
	})
})
