import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { AdminGuard, ADMIN_KEY_HEADER } from './admin.guard';
import { EncryptionService } from '../encryption/encryption.service';
import { TEST_ENCRYPTION_KEY } from '../../testing/fixtures';

describe('AdminGuard', () => {
  const encryption = new EncryptionService(new ConfigService({ PII_ENCRYPTION_KEY: TEST_ENCRYPTION_KEY }));

  it('accepts the configured admin key', () => {
    const guard = new AdminGuard(new ConfigService({ ADMIN_API_KEY: 'test-admin-key' }), encryption);

    expect(guard.isAdmin('test-admin-key')).toBe(true);
    expect(guard.isAdmin('wrong-key')).toBe(false);
    expect(guard.isAdmin(undefined)).toBe(false);
  });

  it('denies everyone when no admin key is configured', () => {
    const guard = new AdminGuard(new ConfigService({}), encryption);

    expect(guard.isAdmin('')).toBe(false);
    expect(guard.isAdmin('anything')).toBe(false);
  });

  describe('canActivate', () => {
    const guard = new AdminGuard(new ConfigService({ ADMIN_API_KEY: 'test-admin-key' }), encryption);
    const contextWith = (headers: Record<string, string>) =>
      new ExecutionContextHost([{ header: (name: string) => headers[name.toLowerCase()] }]);

    it('lets requests with the admin key through', () => {
      expect(guard.canActivate(contextWith({ [ADMIN_KEY_HEADER]: 'test-admin-key' }))).toBe(true);
    });

    it('rejects a wrong or missing key with 401', () => {
      expect(() => guard.canActivate(contextWith({ [ADMIN_KEY_HEADER]: 'wrong-key' }))).toThrow(
        UnauthorizedException,
      );
      expect(() => guard.canActivate(contextWith({}))).toThrow(UnauthorizedException);
    });
  });
});
