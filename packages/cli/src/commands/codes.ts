import { BaseCommand } from '@adonisjs/ace'
import { formatCodeRows } from '../utils.ts'

export default class CodesCommand extends BaseCommand {
	static override commandName = 'codes'
	static override description = 'List the checker codes tshint recognizes'

	override async run(): Promise<void> {
		for (const row of formatCodeRows()) {
			this.logger.log(row)
		}
	}
}
