// ---------------------------------------------------------------------------
// GoCardless Client – Cursor Pagination
// ---------------------------------------------------------------------------

import type { CursorParams, ListMetaPayload, ListResponse } from "./types";

/** Fetches one page for the given params. */
export type PageFetcher<T, P extends CursorParams> = (
  params: P,
) => Promise<ListResponse<T>>;

/**
 * Lazily walk every page of a list endpoint, yielding items one at a time.
 *
 * Each page is requested with `after` set to the previous page's
 * `meta.cursors.after`; iteration ends when that cursor is null or
 * missing. Nothing is fetched until the first item is pulled, and
 * breaking out of a `for await` stops further requests.
 *
 * @example
 * ```ts
 * for await (const mandate of client.mandates.all({ status: ['active'] })) {
 *   console.log(mandate.id);
 * }
 * ```
 */
export async function* paginate<T, P extends CursorParams>(
  fetchPage: PageFetcher<T, P>,
  params: P,
): AsyncGenerator<T, void, undefined> {
  let after: string | null | undefined = params.after;

  do {
    const page = await fetchPage({ ...params, after: after ?? undefined });

    for (const item of page.data) {
      yield item;
    }

    after = page.meta?.cursors?.after;
  } while (after);
}

/**
 * Unwrap a list envelope (`{"customers": [...], "meta": {...}}`) into a
 * `ListResponse`. Missing cursors become null.
 */
export function toListResponse<T>(
  data: readonly T[] | undefined,
  meta: ListMetaPayload | undefined,
): ListResponse<T> {
  return {
    data: data ?? [],
    meta: {
      cursors: {
        before: meta?.cursors?.before ?? null,
        after: meta?.cursors?.after ?? null,
      },
      limit: meta?.limit ?? 0,
    },
  };
}
