/**
 * BatchImporter - loads a set of interdependent documents in dependency order
 *
 * Records are ordered by {@link resolveOrder} and written strictly one
 * after another, each base document followed by its overlays. A record
 * that fails (its template is missing, its overlay does not line up, its
 * aspects do not parse) is reported and the run goes on with the next one.
 *
 * @module import/batch
 */

import type { SourceRecord, SourceTree } from './loader'
import type { DocumentService, WriteOutcome } from '../service/DocumentService'
import { resolveOrder } from '../dependencies'
import type { OrderMode } from '../dependencies'
import type { ParseMode } from '../schema/parser'
import { domainDefaultLanguage } from '../config'
import type { AspectDBError } from '../errors'
import { isAspectDBError } from '../errors'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface ImportResult {
  slug: string
  /** null for the base document */
  language: string | null
  outcome: WriteOutcome
  version: number
}

export interface ImportSkip {
  slug: string
  reason: string
}

export interface ImportFailure {
  slug: string
  language: string | null
  error: AspectDBError
}

export interface ImportReport {
  /** Slugs in the order they were written */
  order: string[]
  results: ImportResult[]
  skipped: ImportSkip[]
  failed: ImportFailure[]
}

export interface ImportOptions {
  /** Cycle handling, defaults to the service's configured import mode */
  mode?: OrderMode | undefined
  parseMode?: ParseMode | undefined
}

export interface ImportSummary {
  created: number
  bumped: number
  smashed: number
  unchanged: number
  skipped: number
  failed: number
}

// =============================================================================
// BatchImporter
// =============================================================================

export class BatchImporter {
  constructor(
    private readonly service: DocumentService,
    private readonly logger?: Logger | undefined
  ) {}

  private get log(): Logger {
    return resolveLogger(this.logger)
  }

  /**
   * Import every record
   *
   * @throws CircularDependencyError in strict mode when the records contain a cycle
   */
  run(source: SourceTree | readonly SourceRecord[], options: ImportOptions = {}): ImportReport {
    const records = 'records' in source ? source.records : source
    const mode = options.mode ?? this.service.config.importMode
    const report: ImportReport = { order: [], results: [], skipped: [], failed: [] }

    const candidates: SourceRecord[] = []
    for (const record of records) {
      const existing = this.service.store.getBase(record.slug)
      if (existing && existing.domain !== record.domain) {
        const reason = `slug already exists in domain "${existing.domain}"`
        this.log.warn(`${record.slug} (${record.domain}): ${reason}, skipped`)
        report.skipped.push({ slug: record.slug, reason })
        continue
      }
      candidates.push(record)
    }

    const ordered = resolveOrder(candidates, { mode, logger: this.logger })
    for (const slug of ordered.unresolved.keys()) {
      report.skipped.push({ slug, reason: 'part of a dependency cycle' })
    }

    for (const record of ordered.nodes) {
      report.order.push(record.slug)
      this.importRecord(record, options, report)
    }

    const summary = summarize(report)
    this.log.info(
      `import finished: ${summary.created} created, ${summary.bumped} bumped, ${summary.smashed} smashed, ` +
      `${summary.unchanged} unchanged, ${summary.skipped} skipped, ${summary.failed} failed`
    )
    return report
  }

  private importRecord(record: SourceRecord, options: ImportOptions, report: ImportReport): void {
    try {
      const result = this.service.updateOrInsert(
        {
          slug: record.slug,
          domain: record.domain,
          kind: record.kind,
          content: record.content,
          templateSlug: record.templateSlug,
        },
        { parseMode: options.parseMode }
      )
      report.results.push({ slug: record.slug, language: null, outcome: result.outcome, version: result.version })
    } catch (error) {
      this.fail(record.slug, null, error, report)
      return
    }

    const defaultLanguage = domainDefaultLanguage(this.service.config, record.domain)
    const overlays = [...record.overlays].sort((a, b) =>
      Number(b.language === defaultLanguage) - Number(a.language === defaultLanguage)
    )
    for (const overlay of overlays) {
      try {
        const result = this.service.submitOverlay({
          slug: record.slug,
          language: overlay.language,
          content: overlay.content,
        })
        report.results.push({
          slug: record.slug,
          language: overlay.language,
          outcome: result.outcome,
          version: result.version,
        })
      } catch (error) {
        this.fail(record.slug, overlay.language, error, report)
      }
    }
  }

  private fail(slug: string, language: string | null, error: unknown, report: ImportReport): void {
    if (!isAspectDBError(error)) throw error
    const label = language === null ? slug : `${slug}@${language}`
    this.log.error(`${label}: ${error.message}`, error)
    report.failed.push({ slug, language, error })
  }
}

/**
 * Count a report's outcomes
 */
export function summarize(report: ImportReport): ImportSummary {
  const summary: ImportSummary = { created: 0, bumped: 0, smashed: 0, unchanged: 0, skipped: 0, failed: 0 }
  for (const result of report.results) {
    summary[result.outcome]++
  }
  summary.skipped = report.skipped.length
  summary.failed = report.failed.length
  return summary
}
