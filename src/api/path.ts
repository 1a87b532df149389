import { ValidationError } from '../errors.js';

/** Non-empty segments of the request path, still percent-encoded. */
export function pathSegments(req: Request): string[] {
  return new URL(req.url).pathname.split('/').filter(Boolean);
}

/** Decode one path parameter; a broken percent-escape is the caller's fault. */
export function decodePathParam(segment: string | undefined, name: string): string {
  try {
    return decodeURIComponent(segment ?? '');
  } catch (err) {
    if (err instanceof URIError) {
      throw new ValidationError(`${name} is not a valid path segment`);
    }
    throw err;
  }
}
