import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { EncryptionService } from '../encryption/encryption.service';

export const ADMIN_KEY_HEADER = 'x-admin-key';

@Injectable()
export class AdminGuard implements CanActivate {
  constructor(
    private readonly config: ConfigService,
    private readonly encryption: EncryptionService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    if (!this.isAdmin(req.header(ADMIN_KEY_HEADER))) {
      throw new UnauthorizedException('Admin key required');
    }
    return true;
  }

  /** True when the supplied key matches ADMIN_API_KEY. An unset key disables admin access. */
  isAdmin(key: string | undefined): boolean {
    const expected = this.config.get<string>('ADMIN_API_KEY');
    if (!expected || !key) return false;
    return this.encryption.safeEqual(key, expected);
  }
}
