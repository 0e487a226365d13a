import { consola } from 'consola'

import type { SafeApiHttp } from './safe-api-http'
import type { Schema } from './safe-schemas'
import type { IPaginatedResponse } from './safe-types'

/**
 * Lazily walks a paginated list endpoint, yielding every result in server
 * order. The first page is requested from `firstUrl` with `query` applied;
 * each later page is requested from the `next` link exactly as the service
 * returned it. A failed page request ends the sequence with that error,
 * after the results of the earlier pages have been yielded.
 */
export async function* paginate<T>(
  http: SafeApiHttp,
  firstUrl: URL | string,
  schema: Schema<IPaginatedResponse<T>>,
  query: Record<string, string> = {}
): AsyncGenerator<T, void, undefined> {
  let page = await http.get(firstUrl, schema, query)
  let pageNumber = 1

  for (;;) {
    consola.debug(
      `Page ${pageNumber}: ${page.results.length} of ${page.count} results`
    )
    yield* page.results

    if (page.next === null) return
    pageNumber++
    page = await http.get(page.next, schema)
  }
}

/**
 * Drains a paginated sequence into an array
 */
export const collect = async <T>(source: AsyncIterable<T>): Promise<T[]> => {
  const items: T[] = []
  for await (const item of source) items.push(item)
  return items
}
