export interface JsonApiCursorInterface {
  /** Number of rows to skip */
  cursor?: number;
  /** Number of rows to fetch, one more than the page size */
  take: number;
}
