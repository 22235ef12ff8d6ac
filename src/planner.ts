import { NotFoundError, ValidationError } from './errors'
import type { RecordKind } from './errors'
import { parseSchedule } from './schedule'
import type {
	Assignment,
	AssignmentInput,
	AttendanceRecord,
	CascadeResult,
	PlannerDocument,
	ScheduleSlot,
	Subject,
	SubjectInput,
} from './types'
import { parseDateTime, toCalendarDate } from './utils/dates'
import { newId } from './utils/ids'

/*
 * Mutations over a loaded document. Every operation validates its input
 * before touching the document; persisting is left to the caller.
 */

export function createDocument(now: Date = new Date()): PlannerDocument {
	return { subjects: [], attendance: [], assignments: [], meta: { createdAt: now.toISOString() } }
}

export function demoDocument(now: Date = new Date()): PlannerDocument {
	const doc = createDocument(now)
	addSubject(doc, { name: 'Engineering Mechanics', code: 'ME101', prof: 'Dr. Seenu', schedule: 'Mon@09:00-10:30 Room 101' }, now)
	addSubject(doc, { name: 'Calculus', code: 'MA101', prof: 'Dr. Roy', schedule: 'Tue@11:00-12:30' }, now)
	return doc
}

export function findSubject(doc: PlannerDocument, id: string): Subject | undefined {
	return doc.subjects.find((s) => s.id === id)
}

function indexOf(items: readonly { id: string }[], id: string, kind: RecordKind): number {
	const index = items.findIndex((item) => item.id === id)
	if (index === -1) throw new NotFoundError(kind, id)
	return index
}

interface SubjectFields {
	name: string
	code: string
	prof: string
	schedule: ScheduleSlot[]
}

function readSubjectInput(input: SubjectInput): SubjectFields {
	const name = input.name.trim()
	if (!name) throw new ValidationError('Subject name cannot be empty.')
	return {
		name,
		code: input.code?.trim() ?? '',
		prof: input.prof?.trim() ?? '',
		schedule: parseSchedule(input.schedule ?? ''),
	}
}

export function addSubject(doc: PlannerDocument, input: SubjectInput, now: Date = new Date()): Subject {
	const fields = readSubjectInput(input)
	const subject: Subject = { id: newId(doc.subjects), ...fields, createdAt: now.toISOString() }
	doc.subjects.push(subject)
	return subject
}

export function updateSubject(doc: PlannerDocument, id: string, input: SubjectInput): Subject {
	const subject = doc.subjects[indexOf(doc.subjects, id, 'subject')]
	Object.assign(subject, readSubjectInput(input))
	return subject
}

/**
 * Removes the subject together with its attendance records and assignments.
 * Unassigned assignments are kept.
 */
export function deleteSubject(doc: PlannerDocument, id: string): CascadeResult {
	const index = indexOf(doc.subjects, id, 'subject')
	doc.subjects.splice(index, 1)
	const attendanceBefore = doc.attendance.length
	const assignmentsBefore = doc.assignments.length
	doc.attendance = doc.attendance.filter((r) => r.subjectId !== id)
	doc.assignments = doc.assignments.filter((a) => a.subjectId !== id)
	return {
		attendance: attendanceBefore - doc.attendance.length,
		assignments: assignmentsBefore - doc.assignments.length,
	}
}

export function recordAttendance(
	doc: PlannerDocument,
	subjectId: string,
	date: string | Date,
	present: boolean,
	now: Date = new Date(),
): AttendanceRecord {
	indexOf(doc.subjects, subjectId, 'subject')
	const day = toCalendarDate(date)
	if (!day) throw new ValidationError(`Bad date "${String(date)}". Use YYYY-MM-DD.`)
	const record: AttendanceRecord = {
		id: newId(doc.attendance),
		subjectId,
		date: day,
		present,
		createdAt: now.toISOString(),
	}
	doc.attendance.push(record)
	return record
}

export function deleteAttendance(doc: PlannerDocument, id: string): AttendanceRecord {
	const [removed] = doc.attendance.splice(indexOf(doc.attendance, id, 'attendance record'), 1)
	return removed
}

export function addAssignment(doc: PlannerDocument, input: AssignmentInput, now: Date = new Date()): Assignment {
	const title = input.title.trim()
	if (!title) throw new ValidationError('Assignment title cannot be empty.')
	const dueAt = input.dueAt?.trim() || null
	if (dueAt && !parseDateTime(dueAt)) {
		throw new ValidationError(`Bad due date "${dueAt}". Use YYYY-MM-DD or YYYY-MM-DDTHH:MM.`)
	}
	const subjectId = input.subjectId || null
	if (subjectId) indexOf(doc.subjects, subjectId, 'subject')

	const assignment: Assignment = {
		id: newId(doc.assignments),
		subjectId,
		title,
		description: input.description?.trim() ?? '',
		dueAt,
		completed: false,
		createdAt: now.toISOString(),
	}
	doc.assignments.push(assignment)
	return assignment
}

export function toggleAssignment(doc: PlannerDocument, id: string): Assignment {
	const assignment = doc.assignments[indexOf(doc.assignments, id, 'assignment')]
	assignment.completed = !assignment.completed
	return assignment
}

export function deleteAssignment(doc: PlannerDocument, id: string): Assignment {
	const [removed] = doc.assignments.splice(indexOf(doc.assignments, id, 'assignment'), 1)
	return removed
}
