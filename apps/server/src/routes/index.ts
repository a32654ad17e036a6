import { Router } from "express";
import type { AccountService } from "../lib/accounts";
import type { BorrowingService } from "../lib/borrowing";
import type { CatalogService } from "../lib/catalog";
import type { AuthMiddleware } from "../middleware/auth";
import { createAuthRouter } from "./auth.routes";
import { createBooksRouter } from "./books.routes";
import { createBorrowingRouter } from "./borrowing.routes";

export type LibraryServices = {
  accounts: AccountService;
  catalog: CatalogService;
  borrowing: BorrowingService;
  auth: AuthMiddleware;
};

export const createApiRouter = (services: LibraryServices): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.status(200).json({
      status: "ok",
      message: "Library records API",
      docs: {
        health: "/health",
        register: "/register",
        login: "/login",
        books: "/books",
        borrow: "/borrow/:bookId",
        reserve: "/reserve/:bookId",
        cancelReservation: "/cancel_reservation/:recordId",
        return: "/return/:recordId",
        myBooks: "/my_books",
        borrowedBooks: "/borrowed_books"
      }
    });
  });

  router.use(createAuthRouter(services));
  router.use("/books", createBooksRouter(services));
  router.use(createBorrowingRouter(services));

  return router;
};
