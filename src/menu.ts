import fs from 'node:fs'
import { format } from 'date-fns'
import type { StoreApi } from 'zustand/vanilla'
import { BACKUP_STAMP_FORMAT, DATE_FORMAT, DEFAULT_ALERT_THRESHOLD, DEFAULT_UPCOMING_DAYS } from './constants'
import { PlannerError, StorageError, ValidationError, errorMessage } from './errors'
import { formatSchedule } from './schedule'
import {
	renderAssignments,
	renderAttendanceLog,
	renderAttendanceReport,
	renderBackups,
	renderDashboard,
	renderSubjects,
} from './screens'
import type { PlannerStore } from './store'
import type { Subject } from './types'
import { attendanceToCsv } from './utils/csv'
import { subjectName } from './views'

export interface MenuIO {
	ask: (question: string) => Promise<string>
	print: (line?: string) => void
}

export interface MenuOptions {
	upcomingDays?: number
	alertThreshold?: number
	now?: () => Date
}

interface MenuContext {
	store: StoreApi<PlannerStore>
	io: MenuIO
	upcomingDays: number
	alertThreshold: number
	now: () => Date
}

interface MenuItem {
	key: string
	label: string
	run: (ctx: MenuContext) => Promise<void>
}

const SCHEDULE_HINT = 'e.g. Mon@09:00-10:30,Tue@11:00-12:30 Room201'

function printAll(io: MenuIO, lines: readonly string[]) {
	for (const line of lines) io.print(line)
}

function isYes(answer: string, fallback: boolean): boolean {
	const text = answer.trim().toLowerCase()
	if (!text) return fallback
	return text === 'y' || text === 'yes'
}

/**
 * Prompts for a 1-based position in `items`. Blank input returns undefined when
 * `optional` is set.
 */
async function choose<T>(
	io: MenuIO,
	items: readonly T[],
	label: (item: T) => string,
	prompt: string,
	optional = false,
): Promise<T | undefined> {
	items.forEach((item, i) => io.print(`${i + 1}. ${label(item)}`))
	const answer = (await io.ask(prompt)).trim()
	if (!answer && optional) return undefined
	const n = Number(answer)
	if (!Number.isInteger(n) || n < 1 || n > items.length) {
		throw new ValidationError(`Enter a number between 1 and ${items.length}.`)
	}
	return items[n - 1]
}

async function chooseSubject(ctx: MenuContext, prompt: string, optional = false): Promise<Subject | undefined> {
	const { subjects } = ctx.store.getState().refresh()
	if (!subjects.length) {
		if (optional) return undefined
		throw new ValidationError('No subjects available. Add subjects first.')
	}
	return choose(ctx.io, subjects, (s) => (s.code ? `${s.name} (${s.code})` : s.name), prompt, optional)
}

const CLEAR_MARKER = '-'

/**
 * Blank keeps `current`. With `clearable`, the clear marker empties the field.
 */
async function askWithDefault(io: MenuIO, question: string, current: string, clearable = false): Promise<string> {
	const hint = clearable ? `, '${CLEAR_MARKER}' to clear` : ''
	const answer = (await io.ask(`${question} [${current}${hint}]: `)).trim()
	if (clearable && answer === CLEAR_MARKER) return ''
	return answer || current
}

const items: MenuItem[] = [
	{
		key: '1',
		label: 'Add Subject',
		async run({ store, io }) {
			const name = await io.ask('Subject name (e.g. Calculus): ')
			const code = await io.ask('Code (optional, e.g. MA101): ')
			const prof = await io.ask('Professor (optional): ')
			const schedule = await io.ask(`Schedule (${SCHEDULE_HINT}) [blank for none]: `)
			const subject = store.getState().addSubject({ name, code, prof, schedule })
			io.print(`Subject added (id:${subject.id}).`)
		},
	},
	{
		key: '2',
		label: 'Edit Subject',
		async run(ctx) {
			const subject = await chooseSubject(ctx, 'Subject to edit: ')
			if (!subject) return
			const { io, store } = ctx
			const name = await askWithDefault(io, 'Name', subject.name)
			const code = await askWithDefault(io, 'Code', subject.code)
			const prof = await askWithDefault(io, 'Professor', subject.prof)
			const schedule = await askWithDefault(io, 'Schedule', formatSchedule(subject.schedule))
			store.getState().updateSubject(subject.id, { name, code, prof, schedule })
			io.print('Subject updated.')
		},
	},
	{
		key: '3',
		label: 'Delete Subject',
		async run(ctx) {
			const subject = await chooseSubject(ctx, 'Subject to delete: ')
			if (!subject) return
			const { io, store } = ctx
			if (!isYes(await io.ask(`Delete ${subject.name} with its attendance and assignments? (y/n) [n]: `), false)) return
			const removed = store.getState().deleteSubject(subject.id)
			io.print(
				`Deleted ${subject.name}, ${removed.attendance} attendance record(s) and ${removed.assignments} assignment(s).`,
			)
		},
	},
	{
		key: '4',
		label: 'List Subjects',
		async run({ store, io }) {
			printAll(io, renderSubjects(store.getState().refresh()))
		},
	},
	{
		key: '5',
		label: 'Record Attendance',
		async run(ctx) {
			const subject = await chooseSubject(ctx, 'Subject to record attendance for: ')
			if (!subject) return
			const { io, store } = ctx
			const today = format(ctx.now(), DATE_FORMAT)
			const date = (await io.ask(`Date (YYYY-MM-DD) [${today}]: `)).trim() || today
			const present = isYes(await io.ask('Present? (y/n) [y]: '), true)
			const record = store.getState().recordAttendance(subject.id, date, present)
			io.print(`Recorded ${present ? 'Present' : 'Absent'} for ${subject.name} on ${record.date}.`)
		},
	},
	{
		key: '6',
		label: 'Delete Attendance Entry',
		async run({ store, io }) {
			const doc = store.getState().refresh()
			if (!doc.attendance.length) {
				io.print('No attendance recorded.')
				return
			}
			printAll(io, renderAttendanceLog(doc))
			const answer = (await io.ask('Entry number to delete: ')).trim()
			const n = Number(answer)
			if (!Number.isInteger(n) || n < 1 || n > doc.attendance.length) {
				throw new ValidationError(`Enter a number between 1 and ${doc.attendance.length}.`)
			}
			store.getState().deleteAttendance(doc.attendance[n - 1].id)
			io.print('Attendance entry deleted.')
		},
	},
	{
		key: '7',
		label: 'Attendance Report',
		async run({ store, io, alertThreshold }) {
			printAll(io, renderAttendanceReport(store.getState().refresh(), alertThreshold))
		},
	},
	{
		key: '8',
		label: 'Add Assignment',
		async run(ctx) {
			const subject = await chooseSubject(ctx, 'Subject number (blank for unassigned): ', true)
			const { io, store } = ctx
			const title = await io.ask('Title: ')
			const description = await io.ask('Description (optional): ')
			const dueAt = await io.ask('Due date (YYYY-MM-DD or YYYY-MM-DDTHH:MM) [optional]: ')
			store.getState().addAssignment({ subjectId: subject?.id ?? null, title, description, dueAt })
			io.print('Assignment added.')
		},
	},
	{
		key: '9',
		label: 'List Assignments',
		async run({ store, io, now }) {
			const answer = (await io.ask('Only those due in the next N days? [blank for all]: ')).trim()
			const days = answer ? Number(answer) : 0
			if (!Number.isInteger(days) || days < 0) throw new ValidationError('Enter a whole number of days.')
			printAll(io, renderAssignments(store.getState().refresh(), now(), days))
		},
	},
	{
		key: '10',
		label: 'Toggle Assignment Completion',
		async run({ store, io }) {
			const doc = store.getState().refresh()
			if (!doc.assignments.length) {
				io.print('No assignments.')
				return
			}
			const assignment = await choose(
				io,
				doc.assignments,
				(a) => `${a.title} [${subjectName(doc, a.subjectId)}] - ${a.completed ? 'Done' : 'Pending'}`,
				'Number to toggle: ',
			)
			if (!assignment) return
			const toggled = store.getState().toggleAssignment(assignment.id)
			io.print(`${toggled.title} is now ${toggled.completed ? 'Done' : 'Pending'}.`)
		},
	},
	{
		key: '11',
		label: 'Delete Assignment',
		async run({ store, io }) {
			const doc = store.getState().refresh()
			if (!doc.assignments.length) {
				io.print('No assignments.')
				return
			}
			const assignment = await choose(
				io,
				doc.assignments,
				(a) => `${a.title} [${subjectName(doc, a.subjectId)}]`,
				'Number to delete: ',
			)
			if (!assignment) return
			store.getState().deleteAssignment(assignment.id)
			io.print(`Deleted ${assignment.title}.`)
		},
	},
	{
		key: '12',
		label: 'Dashboard',
		async run({ store, io, now, upcomingDays, alertThreshold }) {
			printAll(io, renderDashboard(store.getState().refresh(), now(), { upcomingDays, alertThreshold }))
		},
	},
	{
		key: '13',
		label: 'Export Data',
		async run({ store, io, now }) {
			const fallback = `export_${format(now(), BACKUP_STAMP_FORMAT)}.json`
			const target = (await io.ask(`File to export to [${fallback}]: `)).trim() || fallback
			store.getState().exportData(target)
			io.print(`Exported to ${target}.`)
		},
	},
	{
		key: '14',
		label: 'Import Data',
		async run({ store, io }) {
			const source = (await io.ask('Path to JSON file to import: ')).trim()
			if (!source) throw new ValidationError('No file given.')
			const safety = store.getState().importData(source)
			io.print(`Imported ${source}. Previous data backed up to ${safety}.`)
		},
	},
	{
		key: '15',
		label: 'Export Attendance CSV',
		async run({ store, io, now }) {
			const fallback = `attendance_${format(now(), BACKUP_STAMP_FORMAT)}.csv`
			const target = (await io.ask(`CSV file [${fallback}]: `)).trim() || fallback
			const csv = attendanceToCsv(store.getState().refresh())
			try {
				fs.writeFileSync(target, csv)
			} catch (e) {
				throw new StorageError(`Cannot write ${target}: ${errorMessage(e)}`, target, { cause: e })
			}
			io.print(`Attendance written to ${target}.`)
		},
	},
	{
		key: '16',
		label: 'Backup Data',
		async run({ store, io }) {
			io.print(`Backup created at ${store.getState().backupNow()}.`)
		},
	},
	{
		key: '17',
		label: 'Restore Backup',
		async run({ store, io }) {
			const backups = store.getState().listBackups()
			if (!backups.length) {
				printAll(io, renderBackups(backups))
				return
			}
			const backupPath = await choose(io, backups, (p) => p, 'Backup to restore: ')
			if (!backupPath) return
			const safety = store.getState().restoreBackup(backupPath)
			io.print(`Restored ${backupPath}. Previous data backed up to ${safety}.`)
		},
	},
	{
		key: '18',
		label: 'Init Demo Data',
		async run({ store, io }) {
			if (!isYes(await io.ask('Replace all data with demo data? (y/n) [n]: '), false)) return
			const safety = store.getState().initDemo()
			io.print(`Demo data created. Previous data backed up to ${safety}.`)
		},
	},
]

function printStatus(store: StoreApi<PlannerStore>, io: MenuIO) {
	const { document, lastBackup } = store.getState()
	if (document) {
		const { subjects, attendance, assignments } = document
		io.print(`Subjects: ${subjects.length} | Attendance: ${attendance.length} | Assignments: ${assignments.length}`)
	}
	if (lastBackup) io.print(`Last backup: ${lastBackup}`)
}

/**
 * Numbered menu loop. Planner errors are printed and the loop continues;
 * anything else propagates to the caller. Returns when the user picks 0.
 */
export async function runMenu(store: StoreApi<PlannerStore>, io: MenuIO, options: MenuOptions = {}): Promise<void> {
	const ctx: MenuContext = {
		store,
		io,
		upcomingDays: options.upcomingDays ?? DEFAULT_UPCOMING_DAYS,
		alertThreshold: options.alertThreshold ?? DEFAULT_ALERT_THRESHOLD,
		now: options.now ?? (() => new Date()),
	}
	try {
		store.getState().refresh()
	} catch (e) {
		if (!(e instanceof PlannerError)) throw e
		io.print(`Error: ${e.message}`)
	}
	for (;;) {
		io.print('')
		io.print('Study Planner - Menu')
		printStatus(store, io)
		for (const item of items) io.print(`${item.key}) ${item.label}`)
		io.print('0) Exit')
		const choice = (await io.ask('Choose an option: ')).trim()
		if (choice === '0') {
			io.print('Goodbye.')
			return
		}
		const item = items.find((i) => i.key === choice)
		if (!item) {
			io.print('Invalid option. Enter a number from the menu.')
			continue
		}
		try {
			await item.run(ctx)
		} catch (e) {
			if (!(e instanceof PlannerError)) throw e
			io.print(`Error: ${e.message}`)
		}
	}
}
