import { readFile } from 'node:fs/promises'
import { text } from 'node:stream/consumers'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	type AnalyzedDiagnostic,
	analyzeDiagnostics,
	type DiagnosticError,
	type Emphasize,
	parseDiagnosticOutput,
	plain,
	type Token,
	tokenize,
} from '@tshint/analyzer'
import { EmphasisTone } from '@tshint/diagnostics'
import {
	formatExplanation,
	formatInvalidFormatError,
	formatReadError,
	formatSourceWarning,
	formatSummary,
	getErrorMessage,
	isValidFormat,
	type OutputFormat,
	resolveSourcePath,
	toExplanationRecord,
} from '../utils.ts'

export default class ExplainCommand extends BaseCommand {
	static override commandName = 'explain'
	static override description = 'Explain TypeScript checker errors with fix suggestions'

	@args.string({
		description: 'File with tsc output (reads stdin when omitted)',
		required: false,
	})
	declare input?: string

	@flags.string({ description: 'Directory tsc ran in, used to locate source files' })
	declare cwd?: string

	@flags.string({
		alias: 'f',
		default: 'text',
		description: 'Output format: text (default) or json',
	})
	declare format: string

	@flags.boolean({ description: 'Do not color extracted values' })
	declare plain: boolean

	private async readCheckerOutput(): Promise<string | null> {
		if (this.input === undefined) {
			return text(process.stdin)
		}
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private async readSourceTokens(file: string): Promise<readonly Token[]> {
		const path = resolveSourcePath(file, this.cwd)
		try {
			return tokenize(await readFile(path, 'utf-8'))
		} catch (error: unknown) {
			this.logger.warning(`${formatSourceWarning(path)} (${getErrorMessage(error)})`)
			return []
		}
	}

	private async loadTokens(errors: readonly DiagnosticError[]): Promise<Map<string, readonly Token[]>> {
		const tokens = new Map<string, readonly Token[]>()
		for (const { file } of errors) {
			if (!tokens.has(file)) {
				tokens.set(file, await this.readSourceTokens(file))
			}
		}
		return tokens
	}

	private createEmphasis(format: OutputFormat): Emphasize {
		if (this.plain || format === 'json') return plain
		return (value, tone) => {
			if (tone === EmphasisTone.Expected) return this.colors.green(value)
			if (tone === EmphasisTone.Warning) return this.colors.yellow(value)
			return this.colors.red(value)
		}
	}

	private print(results: AnalyzedDiagnostic[], format: OutputFormat): void {
		if (format === 'json') {
			this.logger.log(JSON.stringify(results.map(toExplanationRecord), null, 2))
			return
		}
		for (const result of results) {
			this.logger.log(formatExplanation(result))
			this.logger.log('')
		}
		this.logger.info(formatSummary(results))
	}

	override async run(): Promise<void> {
		const format = this.format
		if (!isValidFormat(format)) {
			this.logger.error(formatInvalidFormatError(format))
			this.exitCode = 1
			return
		}

		const output = await this.readCheckerOutput()
		if (output === null) return

		const errors = parseDiagnosticOutput(output)
		const tokens = await this.loadTokens(errors)
		const results = analyzeDiagnostics(errors, (file) => tokens.get(file) ?? [], {
			emphasize: this.createEmphasis(format),
		})
		this.print(results, format)
	}
}
