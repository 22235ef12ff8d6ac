import { z } from 'zod'
import {
	DEFAULT_ALERT_THRESHOLD,
	DEFAULT_BACKUP_DIR,
	DEFAULT_DATA_FILE,
	DEFAULT_UPCOMING_DAYS,
} from './constants'
import { ValidationError } from './errors'
import { describeIssues } from './schema'

const envSchema = z.object({
	PLANNER_DATA_FILE: z.string().min(1).default(DEFAULT_DATA_FILE),
	PLANNER_BACKUP_DIR: z.string().min(1).default(DEFAULT_BACKUP_DIR),
	PLANNER_UPCOMING_DAYS: z.coerce.number().int().positive().default(DEFAULT_UPCOMING_DAYS),
	PLANNER_ALERT_THRESHOLD: z.coerce.number().min(0).max(100).default(DEFAULT_ALERT_THRESHOLD),
})

export interface PlannerConfig {
	dataFile: string
	backupDir: string
	upcomingDays: number
	alertThreshold: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
	const result = envSchema.safeParse(env)
	if (!result.success) throw new ValidationError(`Invalid configuration: ${describeIssues(result.error)}`)
	const { PLANNER_DATA_FILE, PLANNER_BACKUP_DIR, PLANNER_UPCOMING_DAYS, PLANNER_ALERT_THRESHOLD } = result.data
	return {
		dataFile: PLANNER_DATA_FILE,
		backupDir: PLANNER_BACKUP_DIR,
		upcomingDays: PLANNER_UPCOMING_DAYS,
		alertThreshold: PLANNER_ALERT_THRESHOLD,
	}
}
