import type { Request } from 'express';
import type { AuthenticatedPrincipal } from '../../modules/auth/interfaces/authenticated-principal.interface';

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedPrincipal;
}
