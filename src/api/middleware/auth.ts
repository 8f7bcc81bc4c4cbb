import { Request, Response, NextFunction, RequestHandler } from 'express';
import { SupabaseClient } from '@supabase/supabase-js';
import { AuthenticatedUser } from '../types.js';

/**
 * Resolves the bearer token to a Supabase user and exposes it as `req.user`.
 * The user id is the task owner for everything downstream.
 */
export function createAuthenticateUser(supabase: SupabaseClient): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const authHeader = req.headers.authorization;
      if (!authHeader) {
        console.warn('No authorization header provided');
        res.status(401).json({ message: 'No authorization header' });
        return;
      }

      const token = authHeader.startsWith('Bearer ') ? authHeader.slice('Bearer '.length).trim() : authHeader.trim();
      if (!token) {
        console.warn('No token extracted from header');
        res.status(401).json({ message: 'No token provided' });
        return;
      }

      const { data: { user }, error } = await supabase.auth.getUser(token);

      if (error || !user) {
        console.error('Authentication failed:', error?.message || 'No user data');
        res.status(401).json({ message: 'Invalid or expired token' });
        return;
      }

      const authenticated: AuthenticatedUser = {
        id: user.id,
        email: user.email || ''
      };
      req.user = authenticated;

      next();
    } catch (error) {
      console.error('Authentication error:', error);
      res.status(500).json({ message: 'Authentication failed' });
    }
  };
}
