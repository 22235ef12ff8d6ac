export type RecordKind = 'subject' | 'attendance record' | 'assignment'

export class PlannerError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = new.target.name
	}
}

/** Malformed or missing user input. */
export class ValidationError extends PlannerError {}

export class NotFoundError extends PlannerError {
	readonly kind: RecordKind
	readonly id: string

	constructor(kind: RecordKind, id: string) {
		super(`No ${kind} with id "${id}".`)
		this.kind = kind
		this.id = id
	}
}

/** The data file or a named backup is missing, unreadable or corrupt. */
export class StorageError extends PlannerError {
	readonly path: string

	constructor(message: string, path: string, options?: ErrorOptions) {
		super(message, options)
		this.path = path
	}
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e)
}
