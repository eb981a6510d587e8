import jwt from 'jsonwebtoken';
import { authenticate, authorize, callerOf } from '../../../src/middleware/auth';
import { config } from '../../../src/config';
import { ForbiddenError, UnauthorizedError } from '../../../src/utils/errors';
import { mockRequest, mockResponse } from '../../helpers/http';

const sign = (claims: object, options: jwt.SignOptions = {}): string =>
  jwt.sign(claims, config.jwt.secret, { issuer: config.jwt.issuer, expiresIn: '1h', ...options });

describe('auth middleware', () => {
  describe('authenticate', () => {
    it('attaches the caller account and role', () => {
      const req = mockRequest({ headers: { authorization: `Bearer ${sign({ sub: 'alice', role: 'ADMIN' })}` } });
      const next = jest.fn();

      authenticate(req, mockResponse().res, next);

      expect(next).toHaveBeenCalledWith();
      expect(req.user).toEqual({ account: 'alice', role: 'ADMIN' });
    });

    it('defaults the role to USER', () => {
      const req = mockRequest({ headers: { authorization: `Bearer ${sign({ sub: 'bob' })}` } });

      authenticate(req, mockResponse().res, jest.fn());

      expect(req.user).toEqual({ account: 'bob', role: 'USER' });
    });

    it('rejects a missing header', () => {
      const next = jest.fn();

      authenticate(mockRequest(), mockResponse().res, next);

      expect(next).toHaveBeenCalledWith(new UnauthorizedError('No authorization header provided'));
    });

    it('rejects a token from another issuer', () => {
      const token = sign({ sub: 'alice' }, { issuer: 'someone-else' });
      const next = jest.fn();

      authenticate(mockRequest({ headers: { authorization: `Bearer ${token}` } }), mockResponse().res, next);

      expect(next).toHaveBeenCalledWith(new UnauthorizedError('Invalid token'));
    });

    it('reports an expired token', () => {
      const token = jwt.sign({ sub: 'alice', exp: Math.floor(Date.now() / 1000) - 60 }, config.jwt.secret, {
        issuer: config.jwt.issuer,
      });
      const next = jest.fn();

      authenticate(mockRequest({ headers: { authorization: `Bearer ${token}` } }), mockResponse().res, next);

      expect(next).toHaveBeenCalledWith(new UnauthorizedError('Token has expired'));
    });

    it('rejects a token without a subject', () => {
      const next = jest.fn();

      authenticate(
        mockRequest({ headers: { authorization: `Bearer ${sign({ role: 'USER' })}` } }),
        mockResponse().res,
        next
      );

      expect(next).toHaveBeenCalledWith(new UnauthorizedError('Token is missing required claims'));
    });
  });

  describe('authorize', () => {
    it('lets allowed roles through', () => {
      const next = jest.fn();

      authorize('ADMIN')(mockRequest({ user: { account: 'root', role: 'ADMIN' } }), mockResponse().res, next);

      expect(next).toHaveBeenCalledWith();
    });

    it('forbids other roles', () => {
      const next = jest.fn();

      authorize('ADMIN')(mockRequest({ user: { account: 'alice', role: 'USER' } }), mockResponse().res, next);

      expect(next.mock.calls[0][0]).toBeInstanceOf(ForbiddenError);
    });
  });

  it('callerOf requires an authenticated request', () => {
    expect(callerOf(mockRequest({ user: { account: 'alice', role: 'USER' } }))).toBe('alice');
    expect(() => callerOf(mockRequest())).toThrow(UnauthorizedError);
  });
});
