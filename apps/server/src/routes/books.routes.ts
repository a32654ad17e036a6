import { Router } from "express";
import { z } from "zod";
import { createAuditLog } from "../lib/audit";
import { HttpError, unwrapOrThrow } from "../lib/errors";
import { serializeBook } from "../lib/serializers";
import type { LibraryServices } from "./index";

const requiredBookFieldsSchema = z.object({
  title: z.string().trim().min(1),
  author: z.string().trim().min(1),
  isbn: z.string().trim().min(1)
});

const publicationYearSchema = z.number().int().min(0).max(9999).nullable();

const bookInputSchema = requiredBookFieldsSchema.extend({
  publication_year: publicationYearSchema.optional().transform((value) => value ?? null),
  total_copies: z.number().int().min(0).default(0)
});

const bookUpdateSchema = z.object({
  title: z.string().trim().min(1).optional(),
  author: z.string().trim().min(1).optional(),
  isbn: z.string().trim().min(1).optional(),
  publication_year: publicationYearSchema.optional(),
  total_copies: z.number().int().min(0).optional()
});

const bookQuerySchema = z.object({
  title: z.string().optional(),
  author: z.string().optional(),
  isbn: z.string().optional()
});

const bookParamsSchema = z.object({
  bookId: z.coerce.number().int().min(1)
});

export const createBooksRouter = ({ catalog, borrowing, auth }: LibraryServices): Router => {
  const router = Router();

  router.get("/", auth.requireAuth, (req, res) => {
    const query = bookQuerySchema.parse(req.query);
    res.status(200).json(catalog.listBooks(query).map(serializeBook));
  });

  router.post("/", auth.requireAuth, auth.requireRole("librarian"), (req, res) => {
    const required = requiredBookFieldsSchema.safeParse(req.body ?? {});
    if (!required.success) {
      throw new HttpError(400, "Missing required book details (title, author, isbn)", required.error.flatten().fieldErrors);
    }
    const payload = bookInputSchema.parse(req.body);

    const book = unwrapOrThrow(
      catalog.addBook({
        title: payload.title,
        author: payload.author,
        isbn: payload.isbn,
        publicationYear: payload.publication_year,
        totalCopies: payload.total_copies
      })
    );

    createAuditLog({
      actorUserId: req.user?.id,
      action: "BOOK_CREATED",
      entity: "BOOK",
      entityId: book.id,
      metadata: { title: book.title, totalCopies: book.totalCopies }
    });

    res.status(201).json({ message: "Book added successfully", book: serializeBook(book) });
  });

  router.get("/:bookId", auth.requireAuth, (req, res) => {
    const params = bookParamsSchema.parse(req.params);
    const book = unwrapOrThrow(catalog.getBook(params.bookId));
    res.status(200).json(serializeBook(book));
  });

  router.put("/:bookId", auth.requireAuth, auth.requireRole("librarian"), (req, res) => {
    const params = bookParamsSchema.parse(req.params);
    const payload = bookUpdateSchema.parse(req.body ?? {});

    const book = unwrapOrThrow(
      catalog.updateBook(params.bookId, {
        title: payload.title,
        author: payload.author,
        isbn: payload.isbn,
        publicationYear: payload.publication_year,
        totalCopies: payload.total_copies
      })
    );

    createAuditLog({
      actorUserId: req.user?.id,
      action: "BOOK_UPDATED",
      entity: "BOOK",
      entityId: book.id,
      metadata: { fields: Object.keys(payload) }
    });

    res.status(200).json({ message: "Book updated successfully", book: serializeBook(book) });
  });

  router.delete("/:bookId", auth.requireAuth, auth.requireRole("librarian"), (req, res) => {
    const params = bookParamsSchema.parse(req.params);
    const book = unwrapOrThrow(borrowing.deleteBook(params.bookId));

    createAuditLog({
      actorUserId: req.user?.id,
      action: "BOOK_DELETED",
      entity: "BOOK",
      entityId: book.id,
      metadata: { isbn: book.isbn }
    });

    res.status(200).json({ message: "Book deleted successfully" });
  });

  return router;
};
