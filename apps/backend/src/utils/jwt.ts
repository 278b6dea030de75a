import jwt, { SignOptions } from 'jsonwebtoken';
import { JwtPayload } from '../types';
import config from '../config';
import { UnauthorizedError } from './errors';

export const generateToken = (payload: JwtPayload): string => {
  const options: SignOptions = { expiresIn: config.jwt.expiresInSeconds };
  return jwt.sign(payload, config.jwt.secret, options);
};

const isJwtPayload = (value: unknown): value is JwtPayload => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'sub' in value && typeof value.sub === 'string'
    && 'role' in value && (value.role === 'admin' || value.role === 'seller');
};

export const verifyToken = (token: string): JwtPayload => {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, config.jwt.secret);
  } catch (error) {
    throw new UnauthorizedError('Invalid token');
  }

  if (!isJwtPayload(decoded)) {
    throw new UnauthorizedError('Invalid token payload');
  }

  return decoded;
};

export default {
  generateToken,
  verifyToken,
};
