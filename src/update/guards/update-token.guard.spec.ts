import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { UpdateTokenGuard } from './update-token.guard';

function contextWith(authorization?: string): ExecutionContextHost {
  return new ExecutionContextHost([{ headers: authorization === undefined ? {} : { authorization } }, {}]);
}

describe('UpdateTokenGuard', () => {
  it('lets every request through when no token is configured', () => {
    const guard = new UpdateTokenGuard(new ConfigService({}));

    expect(guard.canActivate(contextWith())).toBe(true);
  });

  describe('with a configured token', () => {
    const guard = new UpdateTokenGuard(new ConfigService({ UPDATE_API_TOKEN: 'test-secret' }));

    it('accepts a bearer token', () => {
      expect(guard.canActivate(contextWith('Bearer test-secret'))).toBe(true);
      expect(guard.canActivate(contextWith('bearer test-secret'))).toBe(true);
    });

    it('accepts the bare token', () => {
      expect(guard.canActivate(contextWith('test-secret'))).toBe(true);
    });

    it('rejects a missing header', () => {
      expect(() => guard.canActivate(contextWith())).toThrow(UnauthorizedException);
    });

    it('rejects a wrong token', () => {
      expect(() => guard.canActivate(contextWith('Bearer other-secret'))).toThrow('Invalid authorization token');
    });
  });
});
