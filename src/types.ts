import type { Weekday } from './constants'

export interface ScheduleSlot {
	day: Weekday
	start: string
	end: string
	location: string
}

export interface Subject {
	id: string
	name: string
	code: string
	prof: string
	schedule: ScheduleSlot[]
	createdAt: string // ISO string
}

export interface AttendanceRecord {
	id: string
	subjectId: string
	date: string // YYYY-MM-DD
	present: boolean
	createdAt: string
}

export interface Assignment {
	id: string
	/**
	 * null for assignments that belong to no subject
	 */
	subjectId: string | null
	title: string
	description: string
	/**
	 * Date (YYYY-MM-DD) or date-time (YYYY-MM-DDTHH:MM) exactly as entered
	 */
	dueAt: string | null
	completed: boolean
	createdAt: string
}

export interface PlannerDocument {
	subjects: Subject[]
	attendance: AttendanceRecord[]
	assignments: Assignment[]
	meta: {
		createdAt: string
	}
}

export interface SubjectInput {
	name: string
	code?: string
	prof?: string
	/**
	 * Schedule notation, e.g. "Mon@09:00-10:30,Tue@11:00-12:30 Room201"
	 */
	schedule?: string
}

export interface AssignmentInput {
	subjectId?: string | null
	title: string
	description?: string
	dueAt?: string | null
}

export interface TodaysClass {
	subject: Subject
	slot: ScheduleSlot
}

export interface AttendanceAlert {
	subject: Subject
	percent: number
}

export interface AttendanceSummaryRow {
	subject: Subject
	present: number
	total: number
	percent: number
}

export interface CascadeResult {
	attendance: number
	assignments: number
}
