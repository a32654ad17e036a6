import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AccountService } from "../lib/accounts";
import { fromFailure, HttpError } from "../lib/errors";
import type { Role } from "../types/library";

const readBearerToken = (req: Request): string | undefined => {
  const auth = req.headers.authorization;
  if (!auth || !auth.startsWith("Bearer ")) {
    return undefined;
  }
  return auth.replace("Bearer ", "");
};

const readHeader = (req: Request, name: string): string | undefined => {
  const value = req.header(name);
  return value && value.trim().length > 0 ? value.trim() : undefined;
};

export type AuthMiddleware = {
  requireAuth: RequestHandler;
  requireRole: (role: Role) => RequestHandler;
};

export const createAuthMiddleware = (accounts: AccountService): AuthMiddleware => {
  // Librarian clients send X-User-ID; students send their token as X-Auth-Token or a bearer token.
  const requireAuth = (req: Request, _res: Response, next: NextFunction): void => {
    const result = accounts.authenticate({
      userId: readHeader(req, "X-User-ID"),
      token: readHeader(req, "X-Auth-Token") ?? readBearerToken(req)
    });
    if (!result.ok) {
      next(fromFailure(result.error));
      return;
    }
    req.user = result.value;
    next();
  };

  const requireRole = (role: Role) => {
    return (req: Request, _res: Response, next: NextFunction): void => {
      if (!req.user) {
        next(new HttpError(401, "Authentication required or invalid credentials"));
        return;
      }
      if (req.user.role !== role) {
        next(new HttpError(403, `Access denied: ${role} role required`));
        return;
      }
      next();
    };
  };

  return { requireAuth, requireRole };
};
