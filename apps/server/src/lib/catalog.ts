import type { LibraryStore } from "../db/store";
import type { Book } from "../types/library";
import { failure, messages, type LibraryFailure } from "./failures";
import { adjustTotalCopies } from "./inventory";
import { ok, type Result } from "./result";

export type BookFilters = {
  title?: string;
  author?: string;
  isbn?: string;
};

export type AddBookInput = {
  title: string;
  author: string;
  isbn: string;
  publicationYear: number | null;
  totalCopies: number;
};

export type UpdateBookInput = Partial<AddBookInput>;

const containsIgnoringCase = (value: string, needle: string): boolean =>
  value.toLowerCase().includes(needle.toLowerCase());

const isbnTaken = (store: LibraryStore, isbn: string, exceptId?: number): boolean =>
  store.listBooks().some((book) => book.isbn === isbn && book.id !== exceptId);

export const createCatalogService = (store: LibraryStore) => {
  const listBooks = (filters: BookFilters = {}): Book[] =>
    store
      .listBooks()
      .filter((book) => !filters.title || containsIgnoringCase(book.title, filters.title))
      .filter((book) => !filters.author || containsIgnoringCase(book.author, filters.author))
      .filter((book) => !filters.isbn || book.isbn === filters.isbn);

  const getBook = (bookId: number): Result<Book, LibraryFailure> => {
    const book = store.findBook(bookId);
    return book ? ok(book) : failure("NotFound", messages.bookNotFound, { bookId });
  };

  const addBook = (input: AddBookInput): Result<Book, LibraryFailure> =>
    store.transaction(() => {
      if (isbnTaken(store, input.isbn)) {
        return failure("Conflict", messages.duplicateIsbn, { isbn: input.isbn });
      }
      return ok(store.insertBook({ ...input, availableCopies: input.totalCopies }));
    });

  const updateBook = (bookId: number, patch: UpdateBookInput): Result<Book, LibraryFailure> =>
    store.transaction(() => {
      const book = store.findBook(bookId);
      if (!book) {
        return failure("NotFound", messages.bookNotFound, { bookId });
      }

      if (patch.isbn !== undefined && patch.isbn !== book.isbn && isbnTaken(store, patch.isbn, bookId)) {
        return failure("Conflict", messages.duplicateIsbn, { isbn: patch.isbn });
      }

      let updated: Book = {
        ...book,
        title: patch.title ?? book.title,
        author: patch.author ?? book.author,
        isbn: patch.isbn ?? book.isbn,
        publicationYear: patch.publicationYear !== undefined ? patch.publicationYear : book.publicationYear
      };

      if (patch.totalCopies !== undefined) {
        const adjusted = adjustTotalCopies(updated, patch.totalCopies);
        if (!adjusted.ok) {
          return adjusted;
        }
        updated = adjusted.value;
      }

      store.upsertBook(updated);
      return ok(updated);
    });

  return {
    listBooks,
    getBook,
    addBook,
    updateBook
  };
};

export type CatalogService = ReturnType<typeof createCatalogService>;
