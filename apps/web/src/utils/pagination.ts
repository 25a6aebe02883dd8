export type Pagination = {
  page: number;
  pageSize: number;
  pageCount: number;
  totalItems: number;
  offset: number;
  hasPrevious: boolean;
  hasNext: boolean;
  previousPage: number | null;
  nextPage: number | null;
};

export function parsePageNumber(value: unknown) {
  const parsed = Number.parseInt(String(value ?? ""), 10);
  return Number.isFinite(parsed) ? parsed : 1;
}

// Out-of-range pages clamp to the nearest valid page; an empty list still has one page.
export function paginate(totalItems: number, requestedPage: number, pageSize: number): Pagination {
  const pageCount = Math.max(1, Math.ceil(totalItems / pageSize));
  const page = Math.min(Math.max(1, Math.trunc(requestedPage) || 1), pageCount);

  return {
    page,
    pageSize,
    pageCount,
    totalItems,
    offset: (page - 1) * pageSize,
    hasPrevious: page > 1,
    hasNext: page < pageCount,
    previousPage: page > 1 ? page - 1 : null,
    nextPage: page < pageCount ? page + 1 : null
  };
}
