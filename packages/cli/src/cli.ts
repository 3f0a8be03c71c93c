#!/usr/bin/env -S node --import tsx

import { run } from './kernel.ts'
import { isBrokenPipe } from './utils.ts'

// Output piped into a reader that closes early (`tshint codes | head`).
process.stdout.on('error', (error: unknown) => {
	if (isBrokenPipe(error)) {
		process.exit(process.exitCode ?? 0)
	}
	console.error(error)
	process.exit(1)
})

run(process.argv.slice(2))
	.then((exitCode) => {
		process.exitCode = exitCode
	})
	.catch((error: unknown) => {
		console.error(error)
		process.exit(1)
	})
