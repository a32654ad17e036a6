import { Router } from "express";
import { z } from "zod";
import { createAuditLog } from "../lib/audit";
import { asyncRoute } from "../lib/async-route";
import { HttpError, unwrapOrThrow } from "../lib/errors";
import { userRoles } from "../types/library";
import type { LibraryServices } from "./index";

const registerFieldsSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
  role: z.string().trim().min(1)
});

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1)
});

const roleSchema = z.enum(userRoles);

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export const createAuthRouter = ({ accounts }: LibraryServices): Router => {
  const router = Router();

  router.post(
    "/register",
    asyncRoute(async (req, res) => {
      const fields = registerFieldsSchema.safeParse(req.body ?? {});
      if (!fields.success) {
        throw new HttpError(400, "Missing username, password, or role", fields.error.flatten().fieldErrors);
      }
      const role = roleSchema.safeParse(fields.data.role);
      if (!role.success) {
        throw new HttpError(400, "Invalid role. Must be 'student' or 'librarian'");
      }

      const outcome = unwrapOrThrow(
        await accounts.register({ username: fields.data.username, password: fields.data.password, role: role.data })
      );
      const { user } = outcome;

      if (!outcome.created) {
        res.status(200).json({
          message: outcome.tokenIssued ? "Student already registered, token generated" : "Student already registered",
          user_id: user.id,
          role: user.role,
          token: user.token
        });
        return;
      }

      createAuditLog({
        actorUserId: user.id,
        action: "USER_REGISTERED",
        entity: "USER",
        entityId: user.id,
        metadata: { role: user.role }
      });

      res.status(201).json({
        message: `${capitalize(user.role)} registered successfully`,
        user_id: user.id,
        ...(user.role === "student" ? { token: user.token } : {})
      });
    })
  );

  router.post(
    "/login",
    asyncRoute(async (req, res) => {
      const credentials = loginSchema.safeParse(req.body ?? {});
      if (!credentials.success) {
        throw new HttpError(400, "Missing username or password");
      }

      const user = unwrapOrThrow(await accounts.login(credentials.data.username, credentials.data.password));

      res.status(200).json({
        message: "Login successful",
        user_id: user.id,
        role: user.role,
        ...(user.role === "student" && user.token ? { token: user.token } : {})
      });
    })
  );

  return router;
};
