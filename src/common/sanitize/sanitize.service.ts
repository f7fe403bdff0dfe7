import { Injectable } from '@nestjs/common';
import { stripTags } from './sanitized.decorator';

@Injectable()
export class SanitizeService {
  /** Strip HTML tags and trim whitespace from user input */
  sanitize(input: string): string {
    return stripTags(input);
  }

  /** Like sanitize(), but maps empty or missing input to undefined */
  optional(input: string | undefined): string | undefined {
    if (input === undefined) return undefined;
    const cleaned = this.sanitize(input);
    return cleaned.length ? cleaned : undefined;
  }
}
