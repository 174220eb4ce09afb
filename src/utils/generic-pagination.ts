import { SelectQueryBuilder, ObjectLiteral } from 'typeorm';
import { trace, SpanStatusCode, SpanKind } from '@opentelemetry/api';

export interface PaginationOptions {
  page: number;
  limit: number;
}

export interface PaginationResult<T> {
  data: T[];
  total: number;
  page: number;
  totalPages: number;
}

export async function paginate<T extends ObjectLiteral>(
  query: SelectQueryBuilder<T>,
  { page, limit }: PaginationOptions,
): Promise<PaginationResult<T>> {
  const tracer = trace.getTracer('pagination-util');

  return await tracer.startActiveSpan(
    'paginate',
    {
      kind: SpanKind.INTERNAL,
      attributes: {
        'pagination.page': page,
        'pagination.limit': limit,
        'pagination.offset': (page - 1) * limit,
      },
    },
    async (span) => {
      try {
        const [data, total] = await query
          .skip((page - 1) * limit)
          .take(limit)
          .getManyAndCount();
        const totalPages = Math.ceil(total / limit);

        span.setAttribute('pagination.total_records', total);
        span.setAttribute('pagination.records_returned', data.length);

        return { data, total, page, totalPages };
      } catch (error) {
        if (error instanceof Error) {
          span.recordException(error);
        }
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message:
            error instanceof Error
              ? error.message
              : 'Unknown error in pagination',
        });
        throw error;
      } finally {
        span.end();
      }
    },
  );
}
