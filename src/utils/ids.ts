import { v4 as uuidv4 } from 'uuid'

const ID_LENGTH = 10

/**
 * Short hex id, regenerated until it is unused within `existing`.
 */
export function newId(existing: readonly { id: string }[]): string {
	const used = new Set(existing.map((item) => item.id))
	let id: string
	do {
		id = uuidv4().replace(/-/g, '').slice(0, ID_LENGTH)
	} while (used.has(id))
	return id
}
