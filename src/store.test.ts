import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { PlannerDB } from './db'
import { NotFoundError, StorageError, ValidationError } from './errors'
import { createPlannerStore } from './store'

let dir: string
let db: PlannerDB
const NOW = new Date(2024, 0, 1, 10, 0, 0)

function readDisk() {
	return new PlannerDB({ dataFile: db.dataFile, backupDir: db.backupDir }).load()
}

beforeEach(() => {
	vi.spyOn(console, 'log').mockImplementation(() => {})
	vi.spyOn(console, 'warn').mockImplementation(() => {})
	dir = fs.mkdtempSync(path.join(os.tmpdir(), 'planner-store-'))
	db = new PlannerDB({ dataFile: path.join(dir, 'data.json'), backupDir: path.join(dir, 'backups'), now: () => NOW })
})

afterEach(() => {
	vi.restoreAllMocks()
	fs.rmSync(dir, { recursive: true, force: true })
})

describe('createPlannerStore', () => {
	it('persists every mutation immediately', () => {
		const store = createPlannerStore(db, () => NOW)
		const { addSubject, recordAttendance, addAssignment, toggleAssignment } = store.getState()

		const subject = addSubject({ name: 'Calculus', schedule: 'Mon@09:00-10:30' })
		const record = recordAttendance(subject.id, '2024-01-01', true)
		const assignment = addAssignment({ subjectId: subject.id, title: 'Problem set', dueAt: '2024-01-05' })
		toggleAssignment(assignment.id)

		const disk = readDisk()
		expect(disk.subjects).toEqual([subject])
		expect(disk.attendance).toEqual([record])
		expect(disk.assignments).toEqual([{ ...assignment, completed: true }])
		expect(store.getState().document).toEqual(disk)
	})

	it('updates and deletes through the file', () => {
		const store = createPlannerStore(db, () => NOW)
		const { addSubject, updateSubject, deleteSubject, recordAttendance, deleteAttendance } = store.getState()
		const calculus = addSubject({ name: 'Calculus' })
		const physics = addSubject({ name: 'Physics' })
		const first = recordAttendance(physics.id, '2024-01-01', true)
		recordAttendance(calculus.id, '2024-01-01', false)

		updateSubject(physics.id, { name: 'Physics I', code: 'PH101' })
		expect(deleteSubject(calculus.id)).toEqual({ attendance: 1, assignments: 0 })
		deleteAttendance(first.id)

		const disk = readDisk()
		expect(disk.subjects.map((s) => [s.name, s.code])).toEqual([['Physics I', 'PH101']])
		expect(disk.attendance).toEqual([])
	})

	it('saves nothing when an action fails', () => {
		const store = createPlannerStore(db, () => NOW)
		store.getState().addSubject({ name: 'Calculus' })
		const before = fs.readFileSync(db.dataFile, 'utf8')

		expect(() => store.getState().addAssignment({ title: '' })).toThrow(ValidationError)
		expect(() => store.getState().deleteAssignment('missing')).toThrow(NotFoundError)
		expect(() => store.getState().addSubject({ name: 'Physics', schedule: 'Funday@1-2' })).toThrow(ValidationError)

		expect(fs.readFileSync(db.dataFile, 'utf8')).toBe(before)
	})

	it('sees changes written by another handle on the next action', () => {
		const store = createPlannerStore(db, () => NOW)
		store.getState().addSubject({ name: 'Calculus' })
		const other = new PlannerDB({ dataFile: db.dataFile, backupDir: db.backupDir })
		const doc = other.load()
		doc.subjects[0].name = 'Calculus (edited)'
		other.save(doc)

		store.getState().addSubject({ name: 'Physics' })

		expect(readDisk().subjects.map((s) => s.name)).toEqual(['Calculus (edited)', 'Physics'])
	})

	it('backs up, lists and restores', () => {
		const store = createPlannerStore(db, () => NOW)
		const calculus = store.getState().addSubject({ name: 'Calculus' })
		const backupPath = store.getState().backupNow()
		store.getState().deleteSubject(calculus.id)

		const safety = store.getState().restoreBackup(backupPath)

		expect(store.getState().listBackups()).toEqual([backupPath, safety])
		expect(store.getState().lastBackup).toBe(safety)
		expect(store.getState().document?.subjects).toEqual([calculus])
	})

	it('replaces the data with the demo set after a backup', () => {
		const store = createPlannerStore(db, () => NOW)
		store.getState().addSubject({ name: 'Calculus' })
		const safety = store.getState().initDemo()
		expect(readDisk().subjects.map((s) => s.code)).toEqual(['ME101', 'MA101'])
		expect(JSON.parse(fs.readFileSync(safety, 'utf8')).subjects[0].name).toBe('Calculus')
	})

	it('imports a file and reports when it cannot be loaded', () => {
		const store = createPlannerStore(db, () => NOW)
		store.getState().addSubject({ name: 'Calculus' })
		const source = path.join(dir, 'import.json')
		fs.writeFileSync(source, JSON.stringify({ subjects: 'not a list', meta: { createdAt: 'x' } }))

		expect(() => store.getState().importData(source)).toThrow(StorageError)
		expect(store.getState().document).toBeUndefined()
		expect(store.getState().listBackups()).toHaveLength(1)
	})

	it('exports the current document', () => {
		const store = createPlannerStore(db, () => NOW)
		store.getState().addSubject({ name: 'Calculus' })
		const target = path.join(dir, 'export.json')
		store.getState().exportData(target)
		expect(fs.readFileSync(target, 'utf8')).toBe(fs.readFileSync(db.dataFile, 'utf8'))
	})
})
