/** One page of a cursor-paginated listing. */
export interface Page<T> {
  /** Cursor of the following page; 0 when the listing is exhausted. */
  nextPage: number

  /** Items in remote order. */
  items: T[]
}
