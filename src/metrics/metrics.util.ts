/**
 * Low-cardinality label for a request path: the first segment after the
 * api prefix and version, e.g. `/api/v1/events/foo-abc12` -> `events`.
 */
export function getApiArea(url: string): string {
  const segments = url
    .split('?')[0]
    .split('/')
    .filter((segment) => segment.length > 0);
  const area = segments.find(
    (segment, index) => index > 0 && !/^v\d+$/.test(segment),
  );
  return area ?? segments[0] ?? 'root';
}
