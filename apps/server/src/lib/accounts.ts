import type { LibraryStore } from "../db/store";
import type { Identity, Role, User } from "../types/library";
import { failure, messages, type LibraryFailure } from "./failures";
import { hashPassword, safeEqual, verifyPassword } from "./hash";
import { signStudentToken, verifyStudentToken } from "./jwt";
import { ok, type Result } from "./result";

export type RegisterInput = {
  username: string;
  password: string;
  role: Role;
};

export type RegisterOutcome = {
  user: User;
  created: boolean;
  tokenIssued: boolean;
};

export type Credentials = {
  userId?: string;
  token?: string;
};

const toIdentity = (user: User): Identity => ({ id: user.id, role: user.role, username: user.username });

const userIdPattern = /^[1-9]\d*$/;

const unauthenticated = () => failure("Unauthenticated", messages.authenticationRequired);

export const createAccountService = (store: LibraryStore) => {
  const issueToken = (user: User): User => {
    const withToken: User = { ...user, token: signStudentToken(user.id) };
    store.upsertUser(withToken);
    return withToken;
  };

  const registerExisting = async (
    existing: User,
    input: RegisterInput
  ): Promise<Result<RegisterOutcome, LibraryFailure>> => {
    if (input.role === "librarian") {
      return failure("Conflict", messages.librarianExists, { username: input.username });
    }
    if (existing.role === "librarian") {
      return failure("Conflict", messages.usernameTakenByLibrarian, { username: input.username });
    }
    if (!(await verifyPassword(input.password, existing.passwordHash))) {
      return failure("Unauthenticated", messages.invalidCredentials);
    }
    if (existing.token) {
      return ok({ user: existing, created: false, tokenIssued: false });
    }

    return store.transaction(() => {
      const current = store.findUser(existing.id) ?? existing;
      if (current.token) {
        return ok({ user: current, created: false, tokenIssued: false });
      }
      return ok({ user: issueToken(current), created: false, tokenIssued: true });
    });
  };

  /**
   * Students get a bearer token on first registration; registering again with the same
   * credentials hands back that token. Librarians authenticate by id and never hold one.
   */
  const register = async (input: RegisterInput): Promise<Result<RegisterOutcome, LibraryFailure>> => {
    const existing = store.findUserByUsername(input.username);
    if (existing) {
      return registerExisting(existing, input);
    }

    const passwordHash = await hashPassword(input.password);

    return store.transaction(() => {
      if (store.findUserByUsername(input.username)) {
        return failure("Conflict", messages.usernameTaken, { username: input.username });
      }
      const user = store.insertUser({ username: input.username, passwordHash, role: input.role, token: null });
      if (user.role === "student") {
        return ok({ user: issueToken(user), created: true, tokenIssued: true });
      }
      return ok({ user, created: true, tokenIssued: false });
    });
  };

  const login = async (username: string, password: string): Promise<Result<User, LibraryFailure>> => {
    const user = store.findUserByUsername(username);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      return failure("Unauthenticated", messages.invalidCredentials);
    }
    return ok(user);
  };

  /** `userId` takes precedence over `token`, matching the header order clients rely on. */
  const authenticate = (credentials: Credentials): Result<Identity, LibraryFailure> => {
    if (credentials.userId) {
      // Decimal digits only; Number() alone accepts "0x1" and "1e0".
      const user = userIdPattern.test(credentials.userId) ? store.findUser(Number(credentials.userId)) : null;
      return user ? ok(toIdentity(user)) : unauthenticated();
    }

    if (!credentials.token) {
      return unauthenticated();
    }

    let subject: number;
    try {
      subject = Number(verifyStudentToken(credentials.token).sub);
    } catch {
      return unauthenticated();
    }

    const user = store.findUser(subject);
    if (!user?.token || !safeEqual(user.token, credentials.token)) {
      return unauthenticated();
    }
    return ok(toIdentity(user));
  };

  return {
    register,
    login,
    authenticate
  };
};

export type AccountService = ReturnType<typeof createAccountService>;
