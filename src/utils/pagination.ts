export interface PageQuery {
  limit?: number
  offset?: number
}

export interface Page {
  limit: number
  offset: number
}

export interface Paginated<T> {
  items: T[]
  pagination: {
    total: number
    limit: number
    offset: number
    hasMore: boolean
  }
}

export const resolvePage = (query: PageQuery): Page => ({
  limit: Math.min(Math.max(query.limit ?? 50, 1), 100),
  offset: Math.max(query.offset ?? 0, 0),
})

export const paginate = <T>(items: T[], total: number, page: Page): Paginated<T> => ({
  items,
  pagination: {
    total,
    limit: page.limit,
    offset: page.offset,
    hasMore: page.offset + page.limit < total,
  },
})
