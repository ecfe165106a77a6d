/**
 * Import Command
 *
 * Load a source tree and import it in dependency order.
 *
 * Usage:
 *   aspectdb import <dir> [--lenient] [--permissive] [--config <file>] [--json]
 */

import type { ParsedArgs } from '../types'
import { print, printError, printSuccess } from '../utils'
import { prepare } from '../setup'
import { DocumentService } from '../../service/DocumentService'
import { BatchImporter, summarize } from '../../import/batch'

export async function importCommand(parsed: ParsedArgs, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { config, tree } = await prepare(parsed, env)

  const service = new DocumentService({ config })
  const report = new BatchImporter(service).run(tree, { mode: config.importMode, parseMode: config.parseMode })
  const summary = summarize(report)

  if (parsed.options.json) {
    print(JSON.stringify({
      order: report.order,
      summary,
      skipped: report.skipped,
      failed: report.failed.map(f => ({ slug: f.slug, language: f.language, error: f.error.toJSON() })),
    }, null, 2))
  } else if (!parsed.options.quiet) {
    for (const result of report.results) {
      const label = result.language === null ? result.slug : `${result.slug}@${result.language}`
      print(`${label}: ${result.outcome} (v${result.version})`)
    }
    for (const skip of report.skipped) {
      print(`${skip.slug}: skipped, ${skip.reason}`)
    }
  }

  for (const failure of report.failed) {
    const label = failure.language === null ? failure.slug : `${failure.slug}@${failure.language}`
    printError(`${label}: ${failure.error.message}`)
  }

  if (report.failed.length > 0) {
    return 1
  }
  if (!parsed.options.json) {
    printSuccess(`Imported ${report.order.length} document(s): ${summary.created} created, ${summary.bumped} bumped, ${summary.smashed} smashed, ${summary.unchanged} unchanged`)
  }
  return 0
}
