import type { Identity } from "../library";

declare global {
  namespace Express {
    interface Request {
      user?: Identity;
    }
  }
}

export {};
