import { fileURLToPath } from 'url'

import { Logger } from '../traversal.js'

/**
 * A logger that keeps the warnings it receives, to assert on them.
 */
export const createRecordingLogger = (): Logger & { warnings: string[] } => {
	const warnings: string[] = []
	return {
		warnings,
		debug: () => {},
		warn: (message: unknown) => {
			warnings.push(String(message))
		},
	}
}

/**
 * Splits operator output into its lines, dropping the trailing empty one.
 */
export const lines = (output: string): string[] => output.split('\n').filter(line => line !== '')

export const fixturePath = (name: string): string => fileURLToPath(new URL(`fixtures/${name}`, import.meta.url))

/**
 * Runs `fn` and returns what it threw.
 */
export function catchError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (error) {
		return error
	}
	throw new Error('Expected the function to throw')
}
