import { Request } from 'express';

export interface AuthUser {
  userId: number;
  username: string;
  isStaff: boolean;
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}
