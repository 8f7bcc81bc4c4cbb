export interface AuthenticatedUser {
  id: string;
  email: string;
}

// Extend the Express Request type
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}
