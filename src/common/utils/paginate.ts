import { FindManyOptions, ObjectLiteral, Repository } from 'typeorm';

/** What page links are built from; an express `Request` satisfies it. */
export interface PageRequest {
  protocol: string;
  path: string;
  get(name: 'host'): string | undefined;
}

export interface PaginationParams {
  offset?: number;
  limit?: number;
  req: PageRequest;
}

export interface PaginationResult<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

export async function paginate<T extends ObjectLiteral>(
  repo: Repository<T>,
  { offset = 0, limit = 10, req }: PaginationParams,
  options: Omit<FindManyOptions<T>, 'skip' | 'take'> = {},
): Promise<PaginationResult<T>> {
  const [results, count] = await repo.findAndCount({
    ...options,
    skip: offset,
    take: limit,
  });

  const baseUrl = req.protocol + '://' + req.get('host') + req.path;
  const nextOffset = offset + limit;
  const prevOffset = Math.max(offset - limit, 0);

  return {
    count,
    next:
      offset + results.length < count
        ? `${baseUrl}?offset=${nextOffset}&limit=${limit}`
        : null,
    previous:
      offset > 0 ? `${baseUrl}?offset=${prevOffset}&limit=${limit}` : null,
    results,
  };
}
