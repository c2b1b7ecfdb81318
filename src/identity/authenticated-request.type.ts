import { Request } from 'express';
import { JwtPayloadType } from '../auth/strategies/types/jwt-payload.type';
import { Principal } from './domain/principal';

export type AuthenticatedRequest = Request & {
  user?: JwtPayloadType;
  principal?: Principal;
};
