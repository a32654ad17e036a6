import { err, type Err } from "./result";

export type FailureKind =
  | "NotFound"
  | "Unauthenticated"
  | "Conflict"
  | "OutOfStock"
  | "LimitExceeded"
  | "InvalidState"
  | "ValidationError"
  | "Internal";

export type LibraryFailure = {
  readonly kind: FailureKind;
  readonly message: string;
  readonly details?: Record<string, unknown>;
};

// Response text is part of the client contract; keep these strings stable.
export const messages = {
  bookNotFound: "Book not found",
  recordNotFound: "Borrowing record not found",
  reservationNotFound: "Reservation record not found or does not belong to you",
  associatedBookMissing: "Associated book not found",
  outOfStock: "No copies of this book are currently available",
  alreadyBorrowed: "You have already borrowed this book",
  alreadyBorrowedOrReserved: "You have already borrowed or reserved this book",
  onlyReservedCancellable: "Only reserved books can be cancelled",
  notBorrowedOrReserved: "Book is not currently borrowed or reserved",
  activeRecordsBlockDelete: "Cannot delete book: active borrowing or reservation records exist",
  duplicateIsbn: "Book with this ISBN already exists",
  totalBelowBorrowed: "Cannot reduce total copies below currently borrowed copies",
  availableAboveTotal: "Available copies cannot exceed total copies",
  librarianExists: "Librarian already registered",
  usernameTakenByLibrarian: "Username is already registered to a librarian",
  usernameTaken: "Username already registered",
  invalidCredentials: "Invalid username or password",
  authenticationRequired: "Authentication required or invalid credentials",
  limitReached: (limit: number) => `You have reached the maximum limit of ${limit} borrowed books`
} as const;

export const failure = (
  kind: FailureKind,
  message: string,
  details?: Record<string, unknown>
): Err<LibraryFailure> => err(details ? { kind, message, details } : { kind, message });

export const failureStatus: Record<FailureKind, number> = {
  NotFound: 404,
  Unauthenticated: 401,
  Conflict: 409,
  OutOfStock: 400,
  LimitExceeded: 400,
  InvalidState: 400,
  ValidationError: 400,
  Internal: 500
};
