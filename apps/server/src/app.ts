import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import morgan from "morgan";
import { corsOrigins, env } from "./config/env";
import type { LibraryStore } from "./db/store";
import { createAccountService } from "./lib/accounts";
import { createBorrowingService } from "./lib/borrowing";
import { createCatalogService } from "./lib/catalog";
import { createAuthMiddleware } from "./middleware/auth";
import { errorHandler } from "./middleware/error-handler";
import { notFoundHandler } from "./middleware/not-found";
import { createApiRouter } from "./routes";

export type AppOptions = {
  store: LibraryStore;
  now?: () => Date;
};

export const createApp = ({ store, now }: AppOptions): Express => {
  const accounts = createAccountService(store);
  const services = {
    accounts,
    catalog: createCatalogService(store),
    borrowing: createBorrowingService(store, {
      maxBorrowedBooks: env.MAX_BORROWED_BOOKS,
      loanWeeks: env.LOAN_WEEKS,
      now: now ?? (() => new Date())
    }),
    auth: createAuthMiddleware(accounts)
  };

  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true
    })
  );
  app.use(helmet());
  if (env.NODE_ENV !== "test") {
    app.use(morgan("combined"));
  }
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      uptime: process.uptime()
    });
  });

  app.use(createApiRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
