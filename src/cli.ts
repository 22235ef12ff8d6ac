import { stdin, stdout } from 'node:process'
import { loadConfig } from './config'
import { PlannerDB } from './db'
import { createPlannerStore } from './store'
import { runTerminal } from './terminal'

const LOG_PREFIX = '[CLI]'

async function main() {
	const config = loadConfig()
	const db = new PlannerDB({ dataFile: config.dataFile, backupDir: config.backupDir })
	await runTerminal(createPlannerStore(db), stdin, stdout, {
		upcomingDays: config.upcomingDays,
		alertThreshold: config.alertThreshold,
	})
}

main().catch((e) => {
	console.error(LOG_PREFIX, 'Planner stopped', e)
	process.exitCode = 1
})
