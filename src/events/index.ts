/**
 * Commit notifications
 *
 * Observers registered with {@link CommitObservers.onDocumentCommitted} are
 * told about every change that reaches the store. A failing observer is
 * logged and ignored: notification happens after the commit, so it can
 * never undo one.
 *
 * @module events
 */

import type { StoredDocument } from '../types/document'
import type { Logger } from '../utils/logger'
import type { MaybeAsyncCallback } from '../utils/safe-callback'
import { safeCallback } from '../utils/safe-callback'

export type CommitAction =
  | 'created'
  | 'bumped'
  | 'smashed'
  | 'version-smashed'
  | 'removed'

export interface CommitEvent {
  action: CommitAction
  document: StoredDocument
  /** Version after the commit (the removed version for `removed`) */
  version: number
}

export type CommitHandler = MaybeAsyncCallback<[CommitEvent]>

export class CommitObservers {
  private handlers: CommitHandler[] = []
  private pending = new Set<Promise<void>>()

  constructor(private readonly logger?: Logger | undefined) {}

  /**
   * Register a handler
   * @returns Function to unregister the handler
   */
  onDocumentCommitted(handler: CommitHandler): () => void {
    this.handlers.push(handler)
    return () => {
      const index = this.handlers.indexOf(handler)
      if (index > -1) {
        this.handlers.splice(index, 1)
      }
    }
  }

  notify(event: CommitEvent): void {
    for (const handler of [...this.handlers]) {
      const result = safeCallback(
        handler,
        {
          logger: this.logger,
          logPrefix: '[commit]',
          context: { action: event.action, slug: event.document.slug, version: event.version },
        },
        event
      )
      if (result.type === 'async') {
        const tracked = result.promise.finally(() => {
          this.pending.delete(tracked)
        })
        this.pending.add(tracked)
      }
    }
  }

  /**
   * Wait for every async handler started so far
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending])
  }

  get size(): number {
    return this.handlers.length
  }
}
