import type { Book } from "../types/library";
import { failure, messages, type LibraryFailure } from "./failures";
import { ok, type Result } from "./result";

export const borrowedCopies = (book: Book): number => book.totalCopies - book.availableCopies;

export const reserveCopyCheck = (book: Book): Result<Book, LibraryFailure> => {
  if (book.availableCopies <= 0) {
    return failure("OutOfStock", messages.outOfStock, { bookId: book.id });
  }
  return ok(book);
};

export const decrementAvailable = (book: Book): Result<Book, LibraryFailure> => {
  const check = reserveCopyCheck(book);
  if (!check.ok) {
    return check;
  }
  return ok({ ...book, availableCopies: book.availableCopies - 1 });
};

export const incrementAvailable = (book: Book): Result<Book, LibraryFailure> => {
  if (book.availableCopies >= book.totalCopies) {
    return failure("Internal", messages.availableAboveTotal, {
      bookId: book.id,
      availableCopies: book.availableCopies,
      totalCopies: book.totalCopies
    });
  }
  return ok({ ...book, availableCopies: book.availableCopies + 1 });
};

export const adjustTotalCopies = (book: Book, totalCopies: number): Result<Book, LibraryFailure> => {
  const borrowed = borrowedCopies(book);
  if (totalCopies < borrowed) {
    return failure("ValidationError", messages.totalBelowBorrowed, { borrowedCopies: borrowed });
  }
  return ok({
    ...book,
    totalCopies,
    availableCopies: book.availableCopies + (totalCopies - book.totalCopies)
  });
};
