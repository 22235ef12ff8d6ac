import fs from 'node:fs'
import path from 'node:path'
import { format } from 'date-fns'
import { BACKUP_STAMP_FORMAT } from './constants'
import { StorageError, errorMessage } from './errors'
import { createDocument } from './planner'
import { describeIssues, plannerDocumentSchema } from './schema'
import type { PlannerDocument } from './types'

const LOG_PREFIX = '[DB]'
const BACKUP_PREFIX = 'data_backup_'
// Same-second backups get _001, _002, ... so names still sort in creation order
const BACKUP_SUFFIX_WIDTH = 3

export interface PlannerDBOptions {
	dataFile: string
	backupDir: string
	now?: () => Date
}

/**
 * Handle on the single JSON document at `dataFile` and its backups.
 * All I/O is synchronous.
 */
export class PlannerDB {
	readonly dataFile: string
	readonly backupDir: string
	private readonly now: () => Date

	constructor(options: PlannerDBOptions) {
		this.dataFile = options.dataFile
		this.backupDir = options.backupDir
		this.now = options.now ?? (() => new Date())
	}

	/** Writes an empty document when none exists yet. Never overwrites. */
	ensure(): void {
		if (fs.existsSync(this.dataFile)) return
		console.log(LOG_PREFIX, 'Creating data file', { dataFile: this.dataFile })
		this.save(createDocument(this.now()))
	}

	load(): PlannerDocument {
		this.ensure()
		const result = plannerDocumentSchema.safeParse(readJson(this.dataFile))
		if (!result.success) {
			throw new StorageError(
				`${this.dataFile} is not a planner document (${describeIssues(result.error)})`,
				this.dataFile,
				{ cause: result.error },
			)
		}
		return result.data
	}

	save(document: PlannerDocument): void {
		this.write(JSON.stringify(document, null, 2))
	}

	/** Copies the current document into the backup directory and returns the copy's path. */
	backup(): string {
		this.ensure()
		try {
			fs.mkdirSync(this.backupDir, { recursive: true })
			const dest = this.nextBackupPath()
			fs.copyFileSync(this.dataFile, dest)
			console.log(LOG_PREFIX, 'Backup written', { dest })
			return dest
		} catch (e) {
			throw new StorageError(`Cannot back up ${this.dataFile}: ${errorMessage(e)}`, this.backupDir, { cause: e })
		}
	}

	listBackups(): string[] {
		if (!fs.existsSync(this.backupDir)) return []
		return fs
			.readdirSync(this.backupDir)
			.filter((name) => name.endsWith('.json'))
			.sort()
			.map((name) => path.join(this.backupDir, name))
	}

	/**
	 * Replaces the document with `backupPath` after taking a safety backup.
	 * Returns the safety backup's path.
	 */
	restore(backupPath: string): string {
		if (!fs.existsSync(backupPath)) throw new StorageError(`Backup not found: ${backupPath}`, backupPath)
		const content = readText(backupPath)
		const safety = this.backup()
		this.write(content)
		console.log(LOG_PREFIX, 'Restored backup', { backupPath, safety })
		return safety
	}

	exportTo(target: string): void {
		this.ensure()
		try {
			fs.mkdirSync(path.dirname(target), { recursive: true })
			fs.copyFileSync(this.dataFile, target)
		} catch (e) {
			throw new StorageError(`Cannot export to ${target}: ${errorMessage(e)}`, target, { cause: e })
		}
		console.log(LOG_PREFIX, 'Exported', { target })
	}

	/**
	 * Overwrites the document with the JSON at `source`, which is trusted as-is
	 * once it parses. Returns the safety backup's path.
	 */
	importFrom(source: string): string {
		if (!fs.existsSync(source)) throw new StorageError(`File not found: ${source}`, source)
		const content = readText(source)
		parseJson(content, source)
		const safety = this.backup()
		this.write(content)
		console.log(LOG_PREFIX, 'Imported', { source, safety })
		return safety
	}

	private write(content: string): void {
		const tmp = `${this.dataFile}.tmp`
		try {
			fs.mkdirSync(path.dirname(this.dataFile), { recursive: true })
			fs.writeFileSync(tmp, content)
			fs.renameSync(tmp, this.dataFile)
		} catch (e) {
			throw new StorageError(`Cannot write ${this.dataFile}: ${errorMessage(e)}`, this.dataFile, { cause: e })
		}
	}

	// Two backups within the same second get a numeric suffix, which sorts after the plain name.
	private nextBackupPath(): string {
		const stamp = format(this.now(), BACKUP_STAMP_FORMAT)
		let dest = path.join(this.backupDir, `${BACKUP_PREFIX}${stamp}.json`)
		for (let n = 1; fs.existsSync(dest); n++) {
			dest = path.join(this.backupDir, `${BACKUP_PREFIX}${stamp}_${String(n).padStart(BACKUP_SUFFIX_WIDTH, '0')}.json`)
		}
		return dest
	}
}

function readText(file: string): string {
	try {
		return fs.readFileSync(file, 'utf8')
	} catch (e) {
		throw new StorageError(`Cannot read ${file}: ${errorMessage(e)}`, file, { cause: e })
	}
}

function parseJson(text: string, file: string): unknown {
	try {
		return JSON.parse(text)
	} catch (e) {
		throw new StorageError(`${file} is not valid JSON`, file, { cause: e })
	}
}

function readJson(file: string): unknown {
	return parseJson(readText(file), file)
}
