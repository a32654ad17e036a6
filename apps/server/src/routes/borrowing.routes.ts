import { Router, type Request } from "express";
import { z } from "zod";
import { createAuditLog } from "../lib/audit";
import { HttpError, unwrapOrThrow } from "../lib/errors";
import { serializeActiveRecord, serializeActiveRecordWithStudent, serializeRecord } from "../lib/serializers";
import type { Identity } from "../types/library";
import type { LibraryServices } from "./index";

const bookParamsSchema = z.object({
  bookId: z.coerce.number().int().min(1)
});

const recordParamsSchema = z.object({
  recordId: z.coerce.number().int().min(1)
});

const currentUser = (req: Request): Identity => {
  if (!req.user) {
    throw new HttpError(401, "Authentication required or invalid credentials");
  }
  return req.user;
};

export const createBorrowingRouter = ({ borrowing, auth }: LibraryServices): Router => {
  const router = Router();
  const studentOnly = auth.requireRole("student");
  const librarianOnly = auth.requireRole("librarian");

  router.post("/borrow/:bookId", auth.requireAuth, studentOnly, (req, res) => {
    const student = currentUser(req);
    const params = bookParamsSchema.parse(req.params);
    const outcome = unwrapOrThrow(borrowing.borrow(student.id, params.bookId));

    createAuditLog({
      actorUserId: student.id,
      action: outcome.collectedReservation ? "RESERVATION_COLLECTED" : "BOOK_BORROWED",
      entity: "BORROWING_RECORD",
      entityId: outcome.record.id,
      metadata: { bookId: outcome.book.id, dueDate: outcome.record.dueDate }
    });

    if (outcome.collectedReservation) {
      res.status(200).json({
        message: "Reserved book collected and borrowed successfully",
        record: serializeRecord(outcome.record)
      });
      return;
    }
    res.status(201).json({ message: "Book borrowed successfully", record: serializeRecord(outcome.record) });
  });

  router.post("/reserve/:bookId", auth.requireAuth, studentOnly, (req, res) => {
    const student = currentUser(req);
    const params = bookParamsSchema.parse(req.params);
    const record = unwrapOrThrow(borrowing.reserve(student.id, params.bookId));

    createAuditLog({
      actorUserId: student.id,
      action: "BOOK_RESERVED",
      entity: "BORROWING_RECORD",
      entityId: record.id,
      metadata: { bookId: record.bookId }
    });

    res.status(201).json({ message: "Book reserved successfully", record: serializeRecord(record) });
  });

  router.post("/cancel_reservation/:recordId", auth.requireAuth, studentOnly, (req, res) => {
    const student = currentUser(req);
    const params = recordParamsSchema.parse(req.params);
    const record = unwrapOrThrow(borrowing.cancelReservation(student.id, params.recordId));

    createAuditLog({
      actorUserId: student.id,
      action: "RESERVATION_CANCELLED",
      entity: "BORROWING_RECORD",
      entityId: record.id,
      metadata: { bookId: record.bookId }
    });

    res.status(200).json({ message: "Reservation cancelled successfully", record: serializeRecord(record) });
  });

  router.post("/return/:recordId", auth.requireAuth, librarianOnly, (req, res) => {
    const librarian = currentUser(req);
    const params = recordParamsSchema.parse(req.params);
    const { record, book } = unwrapOrThrow(borrowing.returnRecord(params.recordId));

    createAuditLog({
      actorUserId: librarian.id,
      action: "BOOK_RETURNED",
      entity: "BORROWING_RECORD",
      entityId: record.id,
      metadata: { bookId: book.id, availableCopies: book.availableCopies }
    });

    res.status(200).json({ message: "Book returned successfully", record: serializeRecord(record) });
  });

  router.get("/my_books", auth.requireAuth, studentOnly, (req, res) => {
    const student = currentUser(req);
    res.status(200).json(borrowing.listActiveForStudent(student.id).map(serializeActiveRecord));
  });

  router.get("/borrowed_books", auth.requireAuth, librarianOnly, (_req, res) => {
    res.status(200).json(borrowing.listActive().map(serializeActiveRecordWithStudent));
  });

  return router;
};
