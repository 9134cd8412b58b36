export interface PageRequest {
  skip: number;
  limit: number;
}

export interface Page<T> {
  items: T[];
  totalCount: number;
  hasNextPage: boolean;
}

export function toPage<T>(items: T[], totalCount: number, request: PageRequest): Page<T> {
  return {
    items,
    totalCount,
    hasNextPage: request.skip + items.length < totalCount,
  };
}

/** `?, ?, ?` for an IN list of the given length. */
export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
