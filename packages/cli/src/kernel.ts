import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CodesCommand from './commands/codes.ts'
import ExplainCommand from './commands/explain.ts'

const version = '0.1.0'

export function createKernel(): ReturnType<typeof Kernel.create> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'tshint')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([ExplainCommand, CodesCommand, HelpCommand]))

	kernel.on('version', async () => {
		console.log(`tshint v${version}`)
		return true
	})

	return kernel
}

/**
 * Run one command line and return the exit code the command set.
 */
export async function run(argv: string[]): Promise<number> {
	const kernel = createKernel()
	await kernel.handle(argv)
	return kernel.exitCode ?? 0
}
