import type { ItemHandle, ListHandle } from '../core/types.js';
import type { ContentStore } from '../store/ContentStore.js';
import { attempt } from '../utils/result.js';

export interface ScanBudget {
  readonly budgetExhausted: boolean;
}

export type ScanStep =
  | { kind: 'item'; item: ItemHandle }
  | { kind: 'failed'; error: Error; pagesRead: number };

/**
 * Pull-based walk over one list's items, page by page through the store cursor.
 * The budget is re-checked before every page request and before every item, so
 * once it is exhausted no further page is fetched and nothing more is yielded,
 * even mid-page. A failed page yields a single `failed` step and ends the walk.
 */
export async function* pageItems(
  store: ContentStore,
  list: ListHandle,
  pageSize: number,
  budget: ScanBudget,
): AsyncGenerator<ScanStep, void, undefined> {
  let cursor: string | undefined;
  let pagesRead = 0;
  for (;;) {
    if (budget.budgetExhausted) return;
    const page = await attempt(() => store.getItemsPage(list, pageSize, cursor));
    if (!page.ok) {
      yield { kind: 'failed', error: page.error, pagesRead };
      return;
    }
    pagesRead += 1;
    for (const item of page.value.items) {
      if (budget.budgetExhausted) return;
      yield { kind: 'item', item };
    }
    if (!page.value.nextCursor) return;
    cursor = page.value.nextCursor;
  }
}
