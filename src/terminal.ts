import readline from 'node:readline/promises'
import type { StoreApi } from 'zustand/vanilla'
import { runMenu } from './menu'
import type { MenuOptions } from './menu'
import type { PlannerStore } from './store'

/**
 * Runs the menu over a pair of streams. Closing the input (Ctrl-D) or Ctrl-C
 * at a prompt ends the session the same way as choosing 0.
 */
export async function runTerminal(
	store: StoreApi<PlannerStore>,
	input: NodeJS.ReadableStream,
	output: NodeJS.WritableStream,
	options: MenuOptions = {},
): Promise<void> {
	const rl = readline.createInterface({ input, output })
	const controller = new AbortController()
	let closed = false
	rl.on('SIGINT', () => rl.close())
	rl.on('close', () => {
		closed = true
		controller.abort()
	})
	try {
		await runMenu(
			store,
			{
				ask: (question) => rl.question(question, { signal: controller.signal }),
				print: (line = '') => output.write(`${line}\n`),
			},
			options,
		)
	} catch (e) {
		if (!closed) throw e
		output.write('\nExiting.\n')
	} finally {
		rl.close()
	}
}
