import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { PlannerDB } from './db'
import {
	addAssignment,
	addSubject,
	deleteAssignment,
	deleteAttendance,
	deleteSubject,
	demoDocument,
	recordAttendance,
	toggleAssignment,
	updateSubject,
} from './planner'
import type {
	Assignment,
	AssignmentInput,
	AttendanceRecord,
	CascadeResult,
	PlannerDocument,
	Subject,
	SubjectInput,
} from './types'

interface PlannerState {
	/**
	 * Document as of the last load or save; the file stays the source of truth
	 */
	document?: PlannerDocument
	lastBackup?: string
}

interface Actions {
	refresh: () => PlannerDocument
	addSubject: (input: SubjectInput) => Subject
	updateSubject: (id: string, input: SubjectInput) => Subject
	deleteSubject: (id: string) => CascadeResult
	recordAttendance: (subjectId: string, date: string | Date, present: boolean) => AttendanceRecord
	deleteAttendance: (id: string) => AttendanceRecord
	addAssignment: (input: AssignmentInput) => Assignment
	toggleAssignment: (id: string) => Assignment
	deleteAssignment: (id: string) => Assignment
	backupNow: () => string
	listBackups: () => string[]
	restoreBackup: (backupPath: string) => string
	exportData: (target: string) => void
	importData: (source: string) => string
	initDemo: () => string
}

export type PlannerStore = PlannerState & Actions

const LOG_PREFIX = '[Store]'

export function createPlannerStore(db: PlannerDB, now: () => Date = () => new Date()): StoreApi<PlannerStore> {
	return createStore<PlannerStore>((set) => {
		// One user action: fresh load, mutation, immediate save. A throwing mutation saves nothing.
		function commit<T>(mutate: (doc: PlannerDocument) => T): T {
			const document = db.load()
			const result = mutate(document)
			db.save(document)
			set({ document })
			return result
		}

		function refresh(): PlannerDocument {
			const document = db.load()
			set({ document })
			return document
		}

		return {
			refresh,
			addSubject: (input) => commit((doc) => addSubject(doc, input, now())),
			updateSubject: (id, input) => commit((doc) => updateSubject(doc, id, input)),
			deleteSubject: (id) =>
				commit((doc) => {
					const removed = deleteSubject(doc, id)
					console.log(LOG_PREFIX, 'Deleted subject', { id, ...removed })
					return removed
				}),
			recordAttendance: (subjectId, date, present) =>
				commit((doc) => recordAttendance(doc, subjectId, date, present, now())),
			deleteAttendance: (id) => commit((doc) => deleteAttendance(doc, id)),
			addAssignment: (input) => commit((doc) => addAssignment(doc, input, now())),
			toggleAssignment: (id) => commit((doc) => toggleAssignment(doc, id)),
			deleteAssignment: (id) => commit((doc) => deleteAssignment(doc, id)),
			backupNow() {
				const lastBackup = db.backup()
				set({ lastBackup })
				return lastBackup
			},
			listBackups: () => db.listBackups(),
			restoreBackup(backupPath) {
				const lastBackup = db.restore(backupPath)
				set({ lastBackup })
				refresh()
				return lastBackup
			},
			exportData(target) {
				db.exportTo(target)
			},
			importData(source) {
				const lastBackup = db.importFrom(source)
				set({ lastBackup, document: undefined })
				try {
					refresh()
				} catch (e) {
					console.warn(LOG_PREFIX, 'Imported file does not load; previous data kept in backup', { lastBackup })
					throw e
				}
				return lastBackup
			},
			initDemo() {
				const lastBackup = db.backup()
				const document = demoDocument(now())
				db.save(document)
				set({ lastBackup, document })
				return lastBackup
			},
		}
	})
}
