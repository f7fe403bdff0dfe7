import { Transform } from 'class-transformer';

export function stripTags(input: string): string {
  return input.replace(/<[^>]*>/g, '').trim();
}

/**
 * Strip tags and trim before validation runs, so length checks such as
 * `@MinLength(1)` see the value that will be stored.
 */
export function Sanitized(): PropertyDecorator {
  return Transform(({ value }: { value: unknown }) => (typeof value === 'string' ? stripTags(value) : value));
}
