import { z } from 'zod'
import { WEEKDAYS } from './constants'

export const scheduleSlotSchema = z.object({
	day: z.enum(WEEKDAYS),
	start: z.string(),
	end: z.string(),
	location: z.string().default(''),
})

export const subjectSchema = z.object({
	id: z.string().min(1),
	name: z.string().min(1),
	code: z.string().default(''),
	prof: z.string().default(''),
	schedule: z.array(scheduleSlotSchema).default([]),
	createdAt: z.string(),
})

export const attendanceRecordSchema = z.object({
	id: z.string().min(1),
	subjectId: z.string(),
	date: z.string(),
	present: z.boolean(),
	createdAt: z.string(),
})

export const assignmentSchema = z.object({
	id: z.string().min(1),
	subjectId: z.string().nullable().default(null),
	title: z.string().min(1),
	description: z.string().default(''),
	dueAt: z.string().nullable().default(null),
	completed: z.boolean().default(false),
	createdAt: z.string(),
})

function uniqueIds<T extends { id: string }>(items: T[], ctx: z.RefinementCtx) {
	const seen = new Set<string>()
	items.forEach((item, index) => {
		if (seen.has(item.id)) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate id "${item.id}"` })
		}
		seen.add(item.id)
	})
}

export const plannerDocumentSchema = z.object({
	subjects: z.array(subjectSchema).default([]).superRefine(uniqueIds),
	attendance: z.array(attendanceRecordSchema).default([]).superRefine(uniqueIds),
	assignments: z.array(assignmentSchema).default([]).superRefine(uniqueIds),
	meta: z.object({
		createdAt: z.string(),
	}),
})

export function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
		.join('; ')
}
