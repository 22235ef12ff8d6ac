import Papa from 'papaparse'
import type { PlannerDocument } from '../types'

export const ATTENDANCE_CSV_FIELDS = ['date', 'subject', 'code', 'status']

export function attendanceToCsv(doc: PlannerDocument): string {
	const subjectById = new Map(doc.subjects.map((s) => [s.id, s]))
	const data = doc.attendance.map((r) => {
		const subject = subjectById.get(r.subjectId)
		return [r.date, subject?.name ?? '', subject?.code ?? '', r.present ? 'PRESENT' : 'ABSENT']
	})
	const csv = Papa.unparse({ fields: ATTENDANCE_CSV_FIELDS, data }, { newline: '\n' })
	// papaparse ends a header-only table with a newline; rows never get one
	return data.length ? csv : csv.replace(/\n$/, '')
}
