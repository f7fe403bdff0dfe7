import { Injectable } from '@nestjs/common';
import { randomBytes } from 'crypto';

const URL_ALPHABET = 'useandom-26T198340PX75pxJACKVERYMINDBUSHWOLF_GQZbfghjklqvwyzrict';

function nanoid(size = 21): string {
  const bytes = randomBytes(size);
  let id = '';
  for (const byte of bytes) {
    id += URL_ALPHABET[byte & 63];
  }
  return id;
}

@Injectable()
export class IdService {
  /** URL-safe submission ID (21 chars) */
  generateId(): string {
    return nanoid();
  }
}
