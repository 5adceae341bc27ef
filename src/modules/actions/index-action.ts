/**
 * Index step action: rebuild the full-text index from the document store.
 */

import type { ActionContext, ActionResult, StepAction } from '../executor/action-registry.js'
import type { SearchIndex } from '../documents/search-index.js'

export class IndexRebuildAction implements StepAction {
  readonly mode = 'inline' as const

  constructor(private readonly _searchIndex: SearchIndex) {}

  async run(ctx: ActionContext): Promise<ActionResult> {
    const indexed = this._searchIndex.rebuild()
    ctx.log('info', `Indexed ${String(indexed)} document(s)`)
    return { result: { indexed }, resultCount: indexed }
  }
}
